import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { CatalogStoreKind } from '../config/env.validation';
import { AppliedOrderEventEntity, ConsumerOffsetEntity, ProductEntity } from '../database/entities';
import { loadDefaultSeedProducts } from './catalog-seed';
import { CATALOG_STORE } from './catalog-store';
import { CatalogController } from './catalog.controller';
import { CATALOG_SEED, CatalogService } from './catalog.service';
import { StockAdjustmentConsumer } from './stock-adjustment.consumer';
import { InMemoryCatalogStore } from './stores/in-memory-catalog.store';
import { TypeOrmCatalogStore } from './stores/typeorm-catalog.store';

@Module({})
export class CatalogModule {
  /**
   * Picks the store from CATALOG_STORE once the environment (including .env)
   * has been loaded.
   */
  static async forRoot(): Promise<DynamicModule> {
    await ConfigModule.envVariablesLoaded;
    return CatalogModule.withStore(process.env.CATALOG_STORE === 'memory' ? 'memory' : 'database');
  }

  /** The database store needs a TypeORM connection registered by the importing module. */
  static withStore(kind: CatalogStoreKind): DynamicModule {
    const storeProvider: Provider =
      kind === 'memory'
        ? { provide: CATALOG_STORE, useFactory: () => new InMemoryCatalogStore() }
        : { provide: CATALOG_STORE, useClass: TypeOrmCatalogStore };

    return {
      module: CatalogModule,
      imports: kind === 'memory' ? [] : [TypeOrmModule.forFeature([ProductEntity, AppliedOrderEventEntity, ConsumerOffsetEntity])],
      controllers: [CatalogController],
      providers: [
        storeProvider,
        { provide: CATALOG_SEED, useFactory: loadDefaultSeedProducts },
        CatalogService,
        StockAdjustmentConsumer,
      ],
      exports: [CATALOG_STORE, CatalogService, StockAdjustmentConsumer],
    };
  }
}
