export const CATALOG_STORE = Symbol('CATALOG_STORE');

export interface Product {
  id: number;
  name: string;
  quantity: number;
}

export interface AppliedOrder {
  orderId: string;
  itemId: number;
  quantity: number;
  appliedAt: Date;
}

/** Where a batch ends: committed together with the batch's changes. */
export interface OffsetPosition {
  groupId: string;
  topic: string;
  partition: number;
  nextOffset: string;
}

/**
 * Reads and writes inside one applyBatch() call. Reads see the writes made
 * earlier in the same call.
 */
export interface StockTransaction {
  isApplied(orderId: string): Promise<boolean>;
  findProduct(itemId: number): Promise<Product | null>;
  setQuantity(itemId: number, quantity: number): Promise<void>;
  markApplied(record: AppliedOrder): Promise<void>;
}

/**
 * Product stock plus the consumer's bookkeeping (dedup set and offsets).
 * Only the stock adjustment consumer writes through applyBatch(); every
 * read returns copies.
 */
export interface CatalogStore {
  /** Every product, ordered by id ascending. */
  listProducts(): Promise<Product[]>;
  findProduct(itemId: number): Promise<Product | null>;
  /** Inserts the given products when the store holds none. Returns how many were inserted. */
  seed(products: Product[]): Promise<number>;
  loadOffsets(groupId: string, topic: string): Promise<Map<number, string>>;
  /** Runs `work` and commits its writes and `position` atomically, or nothing at all. */
  applyBatch<T>(position: OffsetPosition, work: (tx: StockTransaction) => Promise<T>): Promise<T>;
  /** Forget dedup records applied before `cutoff`. Returns how many were removed. */
  pruneApplied(cutoff: Date): Promise<number>;
}
