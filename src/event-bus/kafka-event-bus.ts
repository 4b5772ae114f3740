import { Logger, OnModuleDestroy } from '@nestjs/common';
import {
  Consumer,
  EachBatchPayload,
  IHeaders,
  Kafka,
  KafkaJSError,
  KafkaJSRequestTimeoutError,
  Producer,
  TopicPartitionOffsetAndMetadata,
} from 'kafkajs';
import { errorMessage, PublishError } from '../common/errors';
import { BusMessage, EventBatch, EventBus, EventSubscription, OutgoingMessage, PublishReceipt, SubscribeOptions } from './event-bus';
import { HandoffQueue } from './handoff-queue';

export interface KafkaEventBusOptions {
  clientId: string;
  brokers: string[];
  publishTimeoutMs: number;
  retry: {
    retries: number;
    initialRetryTime: number;
    multiplier: number;
  };
}

class PublishTimeoutError extends Error {}

function decodeHeaders(headers: IHeaders | undefined): Record<string, string> {
  const decoded: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (value === undefined) continue;
    decoded[name] = Array.isArray(value) ? value.map(v => v.toString()).join(',') : value.toString();
  }
  return decoded;
}

/**
 * kafkajs transport. Publishing waits for every in-sync replica (acks -1);
 * connection loss is retried by kafkajs with exponential backoff.
 * The producer connects on the first publish.
 *
 * Consumer offsets are owned by the caller: a subscription seeks to the
 * offsets it is given and starts other partitions from the beginning. Once
 * the reader moves past a batch its next offset is also committed to the
 * consumer group, so partitions taken over after a rebalance resume there.
 * A crashed consumer fails the subscription.
 */
export class KafkaEventBus implements EventBus, OnModuleDestroy {
  private readonly logger = new Logger(KafkaEventBus.name);
  private readonly kafka: Kafka;
  private readonly producer: Producer;
  private producerConnection?: Promise<void>;
  private readonly subscriptions = new Set<EventSubscription>();

  constructor(private readonly options: KafkaEventBusOptions) {
    this.kafka = new Kafka({
      clientId: options.clientId,
      brokers: options.brokers,
      retry: options.retry,
    });

    this.producer = this.kafka.producer({ allowAutoTopicCreation: true });
    this.producer.on(this.producer.events.DISCONNECT, () => {
      this.logger.warn('Kafka Producer disconnected, reconnecting on next publish');
      this.producerConnection = undefined;
    });
  }

  async onModuleDestroy() {
    await Promise.all([...this.subscriptions].map(subscription => subscription.close()));
    if (!this.producerConnection) {
      return;
    }
    try {
      await this.producer.disconnect();
      this.logger.log('Kafka Producer disconnected');
    } catch (error) {
      this.logger.error('Failed to disconnect Kafka Producer', error);
    }
  }

  async publish<T>(topic: string, message: OutgoingMessage<T>): Promise<PublishReceipt> {
    const details = { topic, key: message.key };
    let value: string;
    try {
      value = JSON.stringify(message.value);
    } catch (error) {
      throw new PublishError(`Failed to serialize message for topic ${topic}`, false, details, error);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new PublishTimeoutError()), this.options.publishTimeoutMs);
    });

    try {
      await Promise.race([this.connectProducer(), timeout]);
      const [metadata] = await Promise.race([
        this.producer.send({
          topic,
          acks: -1,
          timeout: this.options.publishTimeoutMs,
          messages: [
            {
              key: message.key,
              value,
              headers: {
                'event-time': new Date().toISOString(),
                ...message.headers,
              },
            },
          ],
        }),
        timeout,
      ]);

      const receipt: PublishReceipt = {
        topic,
        partition: metadata?.partition ?? -1,
        offset: metadata?.baseOffset ?? metadata?.offset ?? '-1',
      };
      this.logger.log(`Message sent to topic ${topic}-${receipt.partition} with key ${message.key}`);
      return receipt;
    } catch (error) {
      if (error instanceof PublishTimeoutError || error instanceof KafkaJSRequestTimeoutError) {
        throw new PublishError(`Timed out publishing to ${topic} after ${this.options.publishTimeoutMs}ms`, true, details, error);
      }
      // A broker error after the request went out leaves the outcome unknown.
      const ambiguous = error instanceof KafkaJSError && error.retriable;
      throw new PublishError(`Failed to publish to ${topic}: ${errorMessage(error)}`, ambiguous, details, error);
    } finally {
      clearTimeout(timer);
    }
  }

  subscribe(topic: string, options: SubscribeOptions): EventSubscription {
    const queue = new HandoffQueue<EventBatch>();
    let consumer: Consumer | undefined;
    let starting: Promise<void> | undefined;

    const start = async () => {
      const created = this.kafka.consumer({
        groupId: options.groupId,
        sessionTimeout: 30000,
        heartbeatInterval: 3000,
      });
      consumer = created;
      created.on(created.events.CRASH, ({ payload }) => {
        this.logger.error(`Kafka Consumer for ${topic} crashed (restart: ${payload.restart})`, payload.error);
        queue.fail(payload.error);
      });

      await created.connect();
      await created.subscribe({ topics: [topic], fromBeginning: true });
      await created.run({
        autoCommit: false,
        eachBatch: async (payload: EachBatchPayload) =>
          this.handOver(queue, payload, options.maxBatchSize, offsets => created.commitOffsets(offsets)),
      });
      for (const [partition, offset] of options.fromOffsets ?? []) {
        created.seek({ topic, partition, offset });
      }
      this.logger.log(`Subscribed to ${topic} as ${options.groupId}`);
    };

    const subscription: EventSubscription = {
      [Symbol.asyncIterator]: () => {
        starting ??= start().catch(error => {
          this.logger.error(`Failed to subscribe to ${topic}`, error);
          queue.close();
          throw error;
        });
        const iterator: AsyncIterableIterator<EventBatch> = {
          next: async () => {
            await starting;
            return queue.next();
          },
          return: () => queue.return(),
          [Symbol.asyncIterator]: () => iterator,
        };
        return iterator;
      },
      close: async () => {
        queue.close();
        this.subscriptions.delete(subscription);
        if (consumer) {
          await consumer.disconnect();
          this.logger.log(`Unsubscribed from ${topic}`);
        }
      },
    };

    this.subscriptions.add(subscription);
    return subscription;
  }

  private async handOver(
    queue: HandoffQueue<EventBatch>,
    payload: EachBatchPayload,
    maxBatchSize: number | undefined,
    commit: (offsets: TopicPartitionOffsetAndMetadata[]) => Promise<void>,
  ) {
    const { batch, isRunning, isStale, heartbeat } = payload;
    const all = batch.messages;
    const size = maxBatchSize ?? all.length;

    for (let start = 0; start < all.length; start += size) {
      if (!isRunning() || isStale() || queue.isClosed) return;

      const slice = all.slice(start, start + size);
      const messages: BusMessage[] = slice.map(message => ({
        offset: message.offset,
        key: message.key?.toString() ?? null,
        value: message.value?.toString() ?? null,
        timestamp: new Date(Number(message.timestamp)).toISOString(),
        headers: decodeHeaders(message.headers),
      }));
      const last = slice[slice.length - 1];
      const nextOffset = (BigInt(last.offset) + 1n).toString();

      await queue.offer({ topic: batch.topic, partition: batch.partition, messages, nextOffset });

      if (queue.isClosed) return;
      payload.resolveOffset(last.offset);
      try {
        await commit([{ topic: batch.topic, partition: batch.partition, offset: nextOffset }]);
      } catch (error) {
        this.logger.warn(`Failed to commit offset ${nextOffset} for ${batch.topic}-${batch.partition} to the consumer group: ${errorMessage(error)}`);
      }
      await heartbeat();
    }
  }

  private connectProducer(): Promise<void> {
    this.producerConnection ??= this.producer.connect().then(
      () => this.logger.log('Kafka Producer connected successfully'),
      error => {
        this.producerConnection = undefined;
        throw error;
      },
    );
    return this.producerConnection;
  }
}
