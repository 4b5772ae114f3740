import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, LessThan } from 'typeorm';
import { AppliedOrderEventEntity, ConsumerOffsetEntity, ProductEntity } from '../../database/entities';
import { AppliedOrder, CatalogStore, OffsetPosition, Product, StockTransaction } from '../catalog-store';

const toProduct = (entity: ProductEntity): Product => ({
  id: entity.id,
  name: entity.name,
  quantity: entity.quantity,
});

class TypeOrmStockTransaction implements StockTransaction {
  constructor(private readonly manager: EntityManager) {}

  async isApplied(orderId: string): Promise<boolean> {
    const count = await this.manager.countBy(AppliedOrderEventEntity, { orderId });
    return count > 0;
  }

  async findProduct(itemId: number): Promise<Product | null> {
    // SQLite has no row locks; its writers are serialized per database.
    const lockRows = this.manager.connection.options.type !== 'better-sqlite3';
    const product = await this.manager.findOne(ProductEntity, {
      where: { id: itemId },
      lock: lockRows ? { mode: 'pessimistic_write' } : undefined,
    });
    return product ? toProduct(product) : null;
  }

  async setQuantity(itemId: number, quantity: number): Promise<void> {
    await this.manager.update(ProductEntity, { id: itemId }, { quantity });
  }

  async markApplied(record: AppliedOrder): Promise<void> {
    await this.manager.insert(AppliedOrderEventEntity, record);
  }
}

/** Catalog store on the catalog database, one transaction per applied batch. */
@Injectable()
export class TypeOrmCatalogStore implements CatalogStore {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async listProducts(): Promise<Product[]> {
    const products = await this.dataSource.getRepository(ProductEntity).find({ order: { id: 'ASC' } });
    return products.map(toProduct);
  }

  async findProduct(itemId: number): Promise<Product | null> {
    const product = await this.dataSource.getRepository(ProductEntity).findOneBy({ id: itemId });
    return product ? toProduct(product) : null;
  }

  async seed(products: Product[]): Promise<number> {
    return this.dataSource.transaction(async manager => {
      const existing = await manager.count(ProductEntity);
      if (existing > 0 || products.length === 0) {
        return 0;
      }
      await manager.insert(ProductEntity, products);
      return products.length;
    });
  }

  async loadOffsets(groupId: string, topic: string): Promise<Map<number, string>> {
    const rows = await this.dataSource.getRepository(ConsumerOffsetEntity).findBy({ groupId, topic });
    return new Map(rows.map(row => [row.partition, row.offset]));
  }

  async applyBatch<T>(position: OffsetPosition, work: (tx: StockTransaction) => Promise<T>): Promise<T> {
    return this.dataSource.transaction(async manager => {
      const result = await work(new TypeOrmStockTransaction(manager));
      await manager.upsert(
        ConsumerOffsetEntity,
        {
          groupId: position.groupId,
          topic: position.topic,
          partition: position.partition,
          offset: position.nextOffset,
        },
        ['groupId', 'topic', 'partition'],
      );
      return result;
    });
  }

  async pruneApplied(cutoff: Date): Promise<number> {
    const result = await this.dataSource.getRepository(AppliedOrderEventEntity).delete({ appliedAt: LessThan(cutoff) });
    return result.affected ?? 0;
  }
}
