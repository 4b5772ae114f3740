import { Logger } from '@nestjs/common';
import { PublishError } from '../common/errors';
import { BusMessage, EventBatch, EventBus, EventSubscription, OutgoingMessage, PublishReceipt, SubscribeOptions } from './event-bus';

const DEFAULT_BATCH_SIZE = 100;

/** Same idea as the default partitioner: a stable hash of the key modulo the partition count. */
export function partitionForKey(key: string, partitions: number): number {
  let hash = 0;
  for (let i = 0; i < key.length; i++) {
    hash = (Math.imul(31, hash) + key.charCodeAt(i)) | 0;
  }
  return Math.abs(hash) % partitions;
}

/**
 * In-process partitioned log. Used by tests and single-process runs where
 * both services share one event bus instance.
 */
export class InMemoryEventBus implements EventBus {
  private readonly logger = new Logger(InMemoryEventBus.name);
  private readonly topics = new Map<string, BusMessage[][]>();
  private readonly listeners = new Set<() => void>();

  constructor(private readonly partitions = 1) {}

  async publish<T>(topic: string, message: OutgoingMessage<T>): Promise<PublishReceipt> {
    let value: string;
    try {
      value = JSON.stringify(message.value);
    } catch (error) {
      throw new PublishError(`Failed to serialize message for topic ${topic}`, false, { topic, key: message.key }, error);
    }

    const log = this.partitionsOf(topic);
    const partition = partitionForKey(message.key, this.partitions);
    const offset = String(log[partition].length);

    log[partition].push({
      offset,
      key: message.key,
      value,
      timestamp: new Date().toISOString(),
      headers: { ...message.headers },
    });

    this.logger.debug(`Message appended to ${topic}-${partition}@${offset} with key ${message.key}`);
    this.notify();

    return { topic, partition, offset };
  }

  /** Appends a raw value as-is, bypassing serialization. Lets tests inject malformed payloads. */
  appendRaw(topic: string, key: string | null, value: string | null, partition = 0): PublishReceipt {
    const log = this.partitionsOf(topic);
    const offset = String(log[partition].length);
    log[partition].push({ offset, key, value, timestamp: new Date().toISOString(), headers: {} });
    this.notify();
    return { topic, partition, offset };
  }

  /** Number of messages stored on the topic across every partition. */
  size(topic: string): number {
    return this.partitionsOf(topic).reduce((total, log) => total + log.length, 0);
  }

  messages(topic: string): BusMessage[] {
    return this.partitionsOf(topic).flat();
  }

  subscribe(topic: string, options: SubscribeOptions): EventSubscription {
    const positions = new Map<number, number>();
    for (let partition = 0; partition < this.partitions; partition++) {
      positions.set(partition, Number(options.fromOffsets?.get(partition) ?? 0));
    }

    const maxBatchSize = options.maxBatchSize ?? DEFAULT_BATCH_SIZE;
    let closed = false;
    let wake: (() => void) | undefined;
    let cursor = 0;

    const nextBatch = (): EventBatch | undefined => {
      const log = this.partitionsOf(topic);
      for (let step = 0; step < this.partitions; step++) {
        const partition = (cursor + step) % this.partitions;
        const position = positions.get(partition) ?? 0;
        if (log[partition].length > position) {
          const messages = log[partition].slice(position, position + maxBatchSize);
          const nextOffset = position + messages.length;
          positions.set(partition, nextOffset);
          cursor = (partition + 1) % this.partitions;
          return { topic, partition, messages, nextOffset: String(nextOffset) };
        }
      }
      return undefined;
    };

    const listeners = this.listeners;
    const iterator: AsyncIterableIterator<EventBatch> = {
      async next(): Promise<IteratorResult<EventBatch>> {
        while (!closed) {
          const batch = nextBatch();
          if (batch) {
            return { value: batch, done: false };
          }
          await new Promise<void>(resolve => {
            wake = resolve;
            listeners.add(resolve);
          });
          if (wake) listeners.delete(wake);
          wake = undefined;
        }
        return { value: undefined, done: true };
      },
      async return(): Promise<IteratorResult<EventBatch>> {
        close();
        return { value: undefined, done: true };
      },
      [Symbol.asyncIterator]() {
        return iterator;
      },
    };

    const close = () => {
      closed = true;
      if (wake) {
        listeners.delete(wake);
        wake();
      }
    };

    return {
      [Symbol.asyncIterator]: () => iterator,
      close: async () => close(),
    };
  }

  private partitionsOf(topic: string): BusMessage[][] {
    let log = this.topics.get(topic);
    if (!log) {
      log = Array.from({ length: this.partitions }, () => []);
      this.topics.set(topic, log);
    }
    return log;
  }

  private notify() {
    const waiting = [...this.listeners];
    this.listeners.clear();
    for (const resolve of waiting) resolve();
  }
}
