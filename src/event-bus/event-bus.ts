export const EVENT_BUS = Symbol('EVENT_BUS');

export interface OutgoingMessage<T = unknown> {
  /** Partition key. Messages with the same key keep their relative order. */
  key: string;
  value: T;
  headers?: Record<string, string>;
}

/** Broker acknowledgement of a durable write. */
export interface PublishReceipt {
  topic: string;
  partition: number;
  offset: string;
}

export interface BusMessage {
  offset: string;
  key: string | null;
  /** Raw serialized value; decoding belongs to the consumer. */
  value: string | null;
  timestamp: string;
  headers: Record<string, string>;
}

export interface EventBatch {
  topic: string;
  partition: number;
  messages: BusMessage[];
  /** Offset to resume from once every message of the batch is applied. */
  nextOffset: string;
}

export interface SubscribeOptions {
  groupId: string;
  /** partition -> next offset to read. Partitions not listed start at the earliest offset. */
  fromOffsets?: ReadonlyMap<number, string>;
  maxBatchSize?: number;
}

/**
 * A lazy stream of partition batches. Nothing is fetched before iteration
 * starts; pulling the next batch signals that the previous one is done.
 * After `close()` iteration ends and a fresh subscription can be opened
 * from any offset.
 */
export interface EventSubscription extends AsyncIterable<EventBatch> {
  close(): Promise<void>;
}

export interface EventBus {
  /**
   * Resolves once the broker acknowledged the write.
   * Rejects with PublishError; an `ambiguous` failure may still have been written.
   */
  publish<T>(topic: string, message: OutgoingMessage<T>): Promise<PublishReceipt>;

  subscribe(topic: string, options: SubscribeOptions): EventSubscription;
}
