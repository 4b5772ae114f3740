import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, LessThanOrEqual, Repository } from 'typeorm';
import { OutboxEntity, OutboxStatus } from '../database/entities';

export interface AddOutboxEventDto {
  aggregateId: string;
  aggregateType: string;
  eventType: string;
  topic: string;
  partitionKey: string;
  payload: Record<string, unknown>;
  /** When the relay may first pick the event up. Defaults to now. */
  availableAt?: Date;
}

@Injectable()
export class OutboxService {
  private readonly logger = new Logger(OutboxService.name);

  constructor(
    @InjectRepository(OutboxEntity)
    private readonly outboxRepository: Repository<OutboxEntity>,
  ) {}

  /**
   * Add an event to the outbox within the caller's transaction so that it is
   * stored atomically with the business change.
   */
  async add(manager: EntityManager, dto: AddOutboxEventDto): Promise<OutboxEntity> {
    const outboxEvent = manager.create(OutboxEntity, {
      aggregateId: dto.aggregateId,
      aggregateType: dto.aggregateType,
      eventType: dto.eventType,
      topic: dto.topic,
      partitionKey: dto.partitionKey,
      payload: dto.payload,
      status: OutboxStatus.PENDING,
      attempts: 0,
      lastError: null,
      nextAttemptAt: dto.availableAt ?? new Date(),
      publishedAt: null,
    });

    const savedEvent = await manager.save(OutboxEntity, outboxEvent);

    this.logger.log(`Outbox event stored: ${dto.eventType} for ${dto.aggregateType}:${dto.aggregateId}`);

    return savedEvent;
  }

  /**
   * Pending events whose next attempt is due, oldest first
   */
  async findDueEvents(limit: number, now = new Date()): Promise<OutboxEntity[]> {
    return this.outboxRepository.find({
      where: { status: OutboxStatus.PENDING, nextAttemptAt: LessThanOrEqual(now) },
      order: { createdAt: 'ASC', id: 'ASC' },
      take: limit,
    });
  }

  async markPublished(eventId: string): Promise<void> {
    await this.outboxRepository.update(eventId, {
      status: OutboxStatus.PUBLISHED,
      publishedAt: new Date(),
      lastError: null,
    });
  }

  /**
   * Take the event for one publish round: pushes its next attempt to
   * `leaseUntil` if it is still pending and due. Returns the current row, or
   * null when another publisher holds it or it is no longer pending.
   */
  async claim(eventId: string, now: Date, leaseUntil: Date): Promise<OutboxEntity | null> {
    const result = await this.outboxRepository.update(
      { id: eventId, status: OutboxStatus.PENDING, nextAttemptAt: LessThanOrEqual(now) },
      { nextAttemptAt: leaseUntil },
    );
    if (result.affected !== 1) {
      return null;
    }
    return this.outboxRepository.findOneBy({ id: eventId });
  }

  /**
   * Adds `tries` failed attempts to the event and schedules the next one.
   * Returns the attempt count stored afterwards.
   */
  async recordFailure(eventId: string, tries: number, error: string, nextAttemptAt: Date): Promise<number> {
    await this.outboxRepository.update(eventId, {
      attempts: () => `attempts + ${Math.trunc(tries)}`,
      lastError: error.slice(0, 1000),
      nextAttemptAt,
    });
    const event = await this.outboxRepository.findOneByOrFail({ id: eventId });
    return event.attempts;
  }

  async markFailed(eventId: string, error: string): Promise<void> {
    await this.outboxRepository.update(eventId, {
      status: OutboxStatus.FAILED,
      lastError: error.slice(0, 1000),
    });
  }
}
