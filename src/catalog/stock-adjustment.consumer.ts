import { BeforeApplicationShutdown, Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ConsumerError } from '../common/errors';
import { EVENT_BUS, EventBatch, EventBus, EventSubscription } from '../event-bus/event-bus';
import { OrderPlacedEvent } from '../order/events';
import { CATALOG_STORE, CatalogStore, StockTransaction } from './catalog-store';
import { decodeOrderEvent } from './order-event.codec';

export const DEDUP_PRUNE_INTERVAL = 'applied-order-events-prune';

export enum ConsumerState {
  IDLE = 'IDLE',
  FETCHING = 'FETCHING',
  APPLYING = 'APPLYING',
  STOPPED = 'STOPPED',
}

export interface BatchOutcome {
  applied: number;
  duplicates: number;
  malformed: number;
  unknownItems: number;
}

/**
 * The catalog's only writer. Pulls OrderPlaced batches from the orders topic
 * and decrements stock, one store transaction per batch. The transaction also
 * records every applied order id and the batch's next offset, so a redelivered
 * event changes nothing and a restart resumes after the last applied batch.
 */
@Injectable()
export class StockAdjustmentConsumer implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly logger = new Logger(StockAdjustmentConsumer.name);
  private readonly topic: string;
  private readonly groupId: string;
  private readonly enabled: boolean;
  private readonly maxBatchSize: number;
  private readonly restartDelayMs: number;
  private readonly retentionMs: number;
  private readonly pruneIntervalMs: number;

  private state = ConsumerState.IDLE;
  private running?: Promise<void>;
  private subscription?: EventSubscription;
  private stopRequested = false;
  private wakeUp?: () => void;

  constructor(
    @Inject(CATALOG_STORE) private readonly store: CatalogStore,
    @Inject(EVENT_BUS) private readonly eventBus: EventBus,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {
    this.topic = this.configService.get<string>('ORDERS_TOPIC', 'orders');
    this.groupId = this.configService.get<string>('CATALOG_CONSUMER_GROUP', 'catalog-stock');
    this.enabled = this.configService.get<boolean>('CATALOG_CONSUMER_ENABLED', true);
    this.maxBatchSize = this.configService.get<number>('CONSUMER_BATCH_SIZE', 100);
    this.restartDelayMs = this.configService.get<number>('CONSUMER_RESTART_DELAY_MS', 1000);
    this.retentionMs = this.configService.get<number>('DEDUP_RETENTION_MS', 7 * 24 * 60 * 60 * 1000);
    this.pruneIntervalMs = this.configService.get<number>('DEDUP_PRUNE_INTERVAL_MS', 60 * 60 * 1000);
  }

  get currentState(): ConsumerState {
    return this.state;
  }

  onApplicationBootstrap() {
    const interval = setInterval(() => void this.pruneAppliedEvents(), this.pruneIntervalMs);
    this.schedulerRegistry.addInterval(DEDUP_PRUNE_INTERVAL, interval);

    if (this.enabled) {
      this.start();
    } else {
      this.logger.warn('Stock adjustment consumer is disabled');
    }
  }

  async beforeApplicationShutdown() {
    await this.stop();
    if (this.schedulerRegistry.doesExist('interval', DEDUP_PRUNE_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(DEDUP_PRUNE_INTERVAL);
    }
  }

  start(): void {
    if (this.running) return;

    this.stopRequested = false;
    this.state = ConsumerState.IDLE;
    this.running = this.run().finally(() => {
      this.running = undefined;
    });
    this.logger.log(`Consuming ${this.topic} as ${this.groupId}`);
  }

  /**
   * Cooperative stop: a batch being applied is finished and committed first.
   * Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.wakeUp?.();

    if (this.state !== ConsumerState.APPLYING) {
      await this.closeSubscription();
    }
    await this.running;

    this.state = ConsumerState.STOPPED;
  }

  /**
   * Applies one batch atomically: every decodable event not seen before is
   * applied, and the batch's next offset is committed with it.
   */
  async applyBatch(batch: EventBatch): Promise<BatchOutcome> {
    const outcome = await this.store.applyBatch(
      { groupId: this.groupId, topic: batch.topic, partition: batch.partition, nextOffset: batch.nextOffset },
      async tx => {
        const counts: BatchOutcome = { applied: 0, duplicates: 0, malformed: 0, unknownItems: 0 };

        for (const message of batch.messages) {
          let event: OrderPlacedEvent;
          try {
            event = decodeOrderEvent(message, batch.topic, batch.partition);
          } catch (error) {
            if (!(error instanceof ConsumerError)) throw error;
            counts.malformed++;
            this.logger.error(`Skipping message ${error.topic}-${error.partition}@${error.offset}: ${error.message}`);
            continue;
          }
          await this.applyEvent(tx, event, counts);
        }

        return counts;
      },
    );

    this.logger.log(
      `Batch ${batch.topic}-${batch.partition} committed at ${batch.nextOffset}: ` +
        `${outcome.applied} applied, ${outcome.duplicates} duplicate, ${outcome.malformed} malformed, ${outcome.unknownItems} unknown item`,
    );
    return outcome;
  }

  async pruneAppliedEvents(now = new Date()): Promise<number> {
    try {
      const removed = await this.store.pruneApplied(new Date(now.getTime() - this.retentionMs));
      if (removed > 0) {
        this.logger.log(`Pruned ${removed} applied order records`);
      }
      return removed;
    } catch (error) {
      this.logger.error('Failed to prune applied order records', error);
      return 0;
    }
  }

  private async applyEvent(tx: StockTransaction, event: OrderPlacedEvent, counts: BatchOutcome) {
    if (await tx.isApplied(event.orderId)) {
      counts.duplicates++;
      this.logger.debug(`Order ${event.orderId} already applied, skipping`);
      return;
    }

    const product = await tx.findProduct(event.itemId);
    if (!product) {
      counts.unknownItems++;
      this.logger.warn(`Order ${event.orderId} references unknown item ${event.itemId}, nothing to adjust`);
    } else {
      let remaining = product.quantity - event.quantity;
      if (remaining < 0) {
        this.logger.error(
          `Stock inconsistency for item ${product.id}: order ${event.orderId} takes ${event.quantity}, only ${product.quantity} left. Setting stock to 0`,
        );
        remaining = 0;
      }
      await tx.setQuantity(product.id, remaining);
      counts.applied++;
    }

    await tx.markApplied({
      orderId: event.orderId,
      itemId: event.itemId,
      quantity: event.quantity,
      appliedAt: new Date(),
    });
  }

  private async run() {
    while (!this.stopRequested) {
      try {
        await this.consume();
        if (!this.stopRequested) {
          this.logger.warn(`Subscription to ${this.topic} ended, resubscribing in ${this.restartDelayMs}ms`);
          await this.pause(this.restartDelayMs);
        }
      } catch (error) {
        this.state = ConsumerState.IDLE;
        this.logger.error(`Stock adjustment loop failed, resubscribing in ${this.restartDelayMs}ms`, error);
        await this.closeSubscription();
        await this.pause(this.restartDelayMs);
      }
    }
    this.state = ConsumerState.STOPPED;
  }

  private async consume() {
    const fromOffsets = await this.store.loadOffsets(this.groupId, this.topic);
    const subscription = this.eventBus.subscribe(this.topic, {
      groupId: this.groupId,
      fromOffsets,
      maxBatchSize: this.maxBatchSize,
    });
    this.subscription = subscription;

    if (this.stopRequested) {
      await this.closeSubscription();
      return;
    }

    this.state = ConsumerState.FETCHING;
    for await (const batch of subscription) {
      this.state = ConsumerState.APPLYING;
      await this.applyBatch(batch);
      this.state = ConsumerState.IDLE;
      if (this.stopRequested) break;
      this.state = ConsumerState.FETCHING;
    }

    this.state = ConsumerState.IDLE;
    await this.closeSubscription();
  }

  private async closeSubscription() {
    const subscription = this.subscription;
    this.subscription = undefined;
    if (!subscription) return;

    try {
      await subscription.close();
    } catch (error) {
      this.logger.error(`Failed to close the subscription to ${this.topic}`, error);
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => done(), ms);
      const done = () => {
        clearTimeout(timer);
        this.wakeUp = undefined;
        resolve();
      };
      this.wakeUp = done;
    });
  }
}
