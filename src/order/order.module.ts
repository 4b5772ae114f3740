import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { OrderEntity } from '../database/entities';
import { OutboxModule } from '../outbox/outbox.module';
import { CatalogClient } from './catalog/catalog.client';
import { OrderController } from './order.controller';
import { OrderService } from './order.service';
import { OrderRepository } from './repository/order.repository';

@Module({
  imports: [
    TypeOrmModule.forFeature([OrderEntity]),
    OutboxModule,
    HttpModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        baseURL: configService.get<string>('CATALOG_SERVICE_URL', 'http://localhost:8080'),
        timeout: configService.get<number>('CATALOG_REQUEST_TIMEOUT_MS', 3000),
      }),
      inject: [ConfigService],
    }),
  ],
  controllers: [OrderController],
  providers: [OrderService, OrderRepository, CatalogClient],
  exports: [OrderService],
})
export class OrderModule {}
