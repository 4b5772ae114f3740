import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ProductNotFoundError } from '../common/errors';
import { CATALOG_STORE, CatalogStore, Product } from './catalog-store';

/** Seed products, injectable so tests can start from their own catalog. */
export const CATALOG_SEED = Symbol('CATALOG_SEED');

@Injectable()
export class CatalogService implements OnModuleInit {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    @Inject(CATALOG_STORE) private readonly store: CatalogStore,
    @Inject(CATALOG_SEED) private readonly seedProducts: Product[],
  ) {}

  async onModuleInit() {
    const inserted = await this.store.seed(this.seedProducts);
    if (inserted > 0) {
      this.logger.log(`Catalog seeded with ${inserted} products`);
    }
  }

  /**
   * Every product, ordered by id ascending.
   */
  async getCatalog(): Promise<Product[]> {
    return this.store.listProducts();
  }

  async getStock(itemId: number): Promise<number> {
    const product = await this.store.findProduct(itemId);
    if (!product) {
      throw new ProductNotFoundError(itemId);
    }
    return product.quantity;
  }
}
