import { Module } from '@nestjs/common';
import { ConditionalModule, ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { CatalogModule } from './catalog/catalog.module';
import { CommonModule } from './common/common.module';
import { validateEnvironment } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { EventBusModule } from './event-bus/event-bus.module';

/** Root module of the catalog service. */
@Module({
  imports: [
    // Config Module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),

    // TypeORM Module, unless the catalog runs on the in-memory store
    ConditionalModule.registerWhen(DatabaseModule, env => env.CATALOG_STORE !== 'memory'),

    // Schedule Module (for dedup pruning)
    ScheduleModule.forRoot(),

    CommonModule,
    EventBusModule,
    CatalogModule.forRoot(),
  ],
})
export class CatalogAppModule {}
