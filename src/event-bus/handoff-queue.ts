interface Entry<T> {
  item: T;
  release: () => void;
}

interface Reader<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

/**
 * Bridges a push-based producer (kafkajs `eachBatch`) to a pull-based reader.
 * `offer` resolves once the reader pulled past the item, so the producer
 * never runs ahead of the reader by more than one item.
 */
export class HandoffQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: Entry<T>[] = [];
  private readonly readers: Reader<T>[] = [];
  private current?: () => void;
  private closed = false;
  private failure?: { error: unknown };

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }

    return new Promise<void>(release => {
      const reader = this.readers.shift();
      if (reader) {
        this.current = release;
        reader.resolve({ value: item, done: false });
      } else {
        this.buffer.push({ item, release });
      }
    });
  }

  next(): Promise<IteratorResult<T>> {
    this.releaseCurrent();

    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    const entry = this.buffer.shift();
    if (entry) {
      this.current = entry.release;
      return Promise.resolve({ value: entry.item, done: false });
    }

    return new Promise((resolve, reject) => this.readers.push({ resolve, reject }));
  }

  return(): Promise<IteratorResult<T>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.releaseCurrent();
    for (const entry of this.buffer.splice(0)) entry.release();
    for (const reader of this.readers.splice(0)) reader.resolve({ value: undefined, done: true });
  }

  /** Closes the queue; the reader's pending and later pulls reject with `error`. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    const readers = this.readers.splice(0);
    this.close();
    for (const reader of readers) reader.reject(error);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private releaseCurrent() {
    const release = this.current;
    this.current = undefined;
    release?.();
  }
}
