import { AppliedOrder, CatalogStore, OffsetPosition, Product, StockTransaction } from '../catalog-store';

const offsetKey = (groupId: string, topic: string, partition: number) => `${groupId}\u0000${topic}\u0000${partition}`;

/**
 * Catalog store held in process memory. Writes of a batch are staged and
 * swapped in at the end, so readers never see half a batch.
 */
export class InMemoryCatalogStore implements CatalogStore {
  private products = new Map<number, Product>();
  private readonly applied = new Map<string, AppliedOrder>();
  private readonly offsets = new Map<string, string>();
  private writeLock: Promise<unknown> = Promise.resolve();

  constructor(private readonly maxAppliedEntries = 100_000) {}

  async listProducts(): Promise<Product[]> {
    return [...this.products.values()].sort((a, b) => a.id - b.id).map(product => ({ ...product }));
  }

  async findProduct(itemId: number): Promise<Product | null> {
    const product = this.products.get(itemId);
    return product ? { ...product } : null;
  }

  async seed(products: Product[]): Promise<number> {
    if (this.products.size > 0) {
      return 0;
    }
    for (const product of products) {
      this.products.set(product.id, { ...product });
    }
    return products.length;
  }

  async loadOffsets(groupId: string, topic: string): Promise<Map<number, string>> {
    const prefix = offsetKey(groupId, topic, 0).slice(0, -1);
    const result = new Map<number, string>();
    for (const [key, offset] of this.offsets) {
      if (key.startsWith(prefix)) {
        result.set(Number(key.slice(prefix.length)), offset);
      }
    }
    return result;
  }

  applyBatch<T>(position: OffsetPosition, work: (tx: StockTransaction) => Promise<T>): Promise<T> {
    const run = this.writeLock.then(() => this.runBatch(position, work));
    this.writeLock = run.catch(() => undefined);
    return run;
  }

  async pruneApplied(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [orderId, record] of this.applied) {
      if (record.appliedAt < cutoff) {
        this.applied.delete(orderId);
        removed++;
      }
    }
    return removed;
  }

  private async runBatch<T>(position: OffsetPosition, work: (tx: StockTransaction) => Promise<T>): Promise<T> {
    const quantities = new Map<number, number>();
    const marks = new Map<string, AppliedOrder>();
    const products = this.products;
    const applied = this.applied;

    const tx: StockTransaction = {
      isApplied: async orderId => marks.has(orderId) || applied.has(orderId),
      findProduct: async itemId => {
        const product = products.get(itemId);
        if (!product) return null;
        return { ...product, quantity: quantities.get(itemId) ?? product.quantity };
      },
      setQuantity: async (itemId, quantity) => {
        if (!products.has(itemId)) {
          throw new Error(`Product ${itemId} does not exist`);
        }
        quantities.set(itemId, quantity);
      },
      markApplied: async record => {
        if (marks.has(record.orderId) || applied.has(record.orderId)) {
          throw new Error(`Order ${record.orderId} is already applied`);
        }
        marks.set(record.orderId, { ...record });
      },
    };

    const result = await work(tx);

    // Commit: copy-on-write swap of the product map, then bookkeeping.
    if (quantities.size > 0) {
      const next = new Map(products);
      for (const [itemId, quantity] of quantities) {
        const product = next.get(itemId);
        if (product) next.set(itemId, { ...product, quantity });
      }
      this.products = next;
    }
    for (const [orderId, record] of marks) {
      applied.set(orderId, record);
    }
    this.evictOverflow();
    this.offsets.set(offsetKey(position.groupId, position.topic, position.partition), position.nextOffset);

    return result;
  }

  private evictOverflow() {
    // Map iteration is insertion order, so the first keys are the oldest.
    for (const orderId of this.applied.keys()) {
      if (this.applied.size <= this.maxAppliedEntries) break;
      this.applied.delete(orderId);
    }
  }
}
