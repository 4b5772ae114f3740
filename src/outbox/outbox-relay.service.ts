import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AlertService } from '../common/alert.service';
import { errorMessage, PublishError } from '../common/errors';
import { backoffDelay, retryWithBackoff } from '../common/retry';
import { OutboxEntity } from '../database/entities';
import { EVENT_BUS, EventBus, PublishReceipt } from '../event-bus/event-bus';
import { OutboxService } from './outbox.service';

export const OUTBOX_RELAY_INTERVAL = 'outbox-relay';

/** Called once an outbox event has used up its attempt budget. */
export type OutboxFailureHandler = (event: OutboxEntity, error: string) => Promise<void>;

@Injectable()
export class OutboxRelayService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OutboxRelayService.name);
  private readonly batchSize: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly intervalMs: number;
  private readonly publishTimeoutMs: number;
  private readonly failureHandlers = new Map<string, OutboxFailureHandler>();
  private isProcessing = false;

  constructor(
    private readonly outboxService: OutboxService,
    @Inject(EVENT_BUS) private readonly eventBus: EventBus,
    private readonly alertService: AlertService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {
    this.batchSize = this.configService.get<number>('OUTBOX_BATCH_SIZE', 100);
    this.maxAttempts = this.configService.get<number>('OUTBOX_MAX_ATTEMPTS', 10);
    this.backoffBaseMs = this.configService.get<number>('OUTBOX_BACKOFF_BASE_MS', 1000);
    this.intervalMs = this.configService.get<number>('OUTBOX_RELAY_INTERVAL_MS', 5000);
    this.publishTimeoutMs = this.configService.get<number>('KAFKA_PUBLISH_TIMEOUT_MS', 5000);
  }

  onModuleInit() {
    const interval = setInterval(() => void this.relayEvents(), this.intervalMs);
    this.schedulerRegistry.addInterval(OUTBOX_RELAY_INTERVAL, interval);
    this.logger.log(`Outbox relay scheduled every ${this.intervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', OUTBOX_RELAY_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(OUTBOX_RELAY_INTERVAL);
    }
  }

  registerFailureHandler(aggregateType: string, handler: OutboxFailureHandler) {
    this.failureHandlers.set(aggregateType, handler);
  }

  /**
   * How long a publisher holds an event for `attempts` tries: every try may
   * run into the publish timeout, plus the backoff between tries and one
   * relay interval of slack.
   */
  leaseDuration(attempts = 1, initialDelayMs = 0): number {
    let total = attempts * this.publishTimeoutMs + this.intervalMs;
    for (let attempt = 1; attempt < attempts; attempt++) {
      total += backoffDelay(attempt, initialDelayMs);
    }
    return total;
  }

  /**
   * Publish a single outbox event, retrying up to `attempts` times with
   * exponential backoff. Failures are recorded against the event's budget
   * and rethrown as PublishError.
   */
  async publish(event: OutboxEntity, attempts = 1, initialDelayMs = 0): Promise<PublishReceipt> {
    let tries = 0;
    let receipt: PublishReceipt;
    try {
      receipt = await retryWithBackoff(
        () => {
          tries++;
          return this.eventBus.publish(event.topic, {
            key: event.partitionKey,
            value: event.payload,
            headers: { 'event-type': event.eventType, 'aggregate-id': event.aggregateId },
          });
        },
        {
          attempts,
          initialDelayMs,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(`Publish attempt ${attempt} for outbox event ${event.id} failed, retrying in ${delayMs}ms: ${errorMessage(error)}`),
        },
      );
    } catch (error) {
      await this.handleFailure(event, tries, error);
      throw error instanceof PublishError
        ? error
        : new PublishError(`Failed to publish ${event.eventType} for ${event.aggregateId}`, true, { aggregateId: event.aggregateId }, error);
    }

    try {
      await this.outboxService.markPublished(event.id);
    } catch (error) {
      // Stays PENDING and is published again by the relay; consumers deduplicate.
      this.logger.error(`Published outbox event ${event.id} but failed to mark it as published`, error);
    }
    this.logger.log(`Event relayed: ${event.eventType} for ${event.aggregateType}:${event.aggregateId}`);
    return receipt;
  }

  /**
   * Runs on the relay interval: publishes due outbox events, one attempt each.
   */
  async relayEvents() {
    // Prevent concurrent execution
    if (this.isProcessing) {
      this.logger.log('Previous relay is still processing, skipping this cycle');
      return;
    }

    this.isProcessing = true;

    try {
      const events = await this.outboxService.findDueEvents(this.batchSize);

      if (events.length === 0) {
        return;
      }

      this.logger.log(`Processing ${events.length} outbox events`);

      let failedCount = 0;
      for (const event of events) {
        const now = new Date();
        const claimed = await this.outboxService.claim(event.id, now, new Date(now.getTime() + this.leaseDuration()));
        if (!claimed) {
          this.logger.debug(`Outbox event ${event.id} is held by another publisher, skipping`);
          continue;
        }
        try {
          await this.publish(claimed);
        } catch {
          failedCount++;
        }
      }

      if (failedCount > 0) {
        this.logger.warn(`${failedCount} of ${events.length} events failed to relay`);
      }
    } catch (error) {
      this.logger.error('Outbox relay cycle failed', error);
    } finally {
      this.isProcessing = false;
    }
  }

  private async handleFailure(event: OutboxEntity, tries: number, error: unknown) {
    const message = errorMessage(error);
    const expected = event.attempts + tries;
    this.logger.error(`Failed to relay event ${event.id}: ${event.eventType} (attempt ${expected}/${this.maxAttempts})`, error);

    try {
      const nextAttemptAt = new Date(Date.now() + backoffDelay(expected, this.backoffBaseMs, 2, 15 * 60 * 1000));
      const attempts = await this.outboxService.recordFailure(event.id, tries, message, nextAttemptAt);
      event.attempts = attempts;
      if (attempts < this.maxAttempts) {
        return;
      }

      await this.outboxService.markFailed(event.id, message);
      await this.failureHandlers.get(event.aggregateType)?.(event, message);
      this.alertService.raise({
        code: 'OUTBOX_PUBLISH_EXHAUSTED',
        message: `Gave up publishing ${event.eventType} for ${event.aggregateType}:${event.aggregateId} after ${attempts} attempts`,
        context: {
          outboxId: event.id,
          aggregateId: event.aggregateId,
          topic: event.topic,
          lastError: message,
        },
      });
    } catch (bookkeepingError) {
      // The event stays PENDING and is picked up again once it is due.
      this.logger.error(`Failed to record relay failure for outbox event ${event.id}`, bookkeepingError);
    }
  }
}
