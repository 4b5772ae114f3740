import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from './common/common.module';
import { validateEnvironment } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { EventBusModule } from './event-bus/event-bus.module';
import { OrderModule } from './order/order.module';

/** Root module of the order service. */
@Module({
  imports: [
    // Config Module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),

    // TypeORM Module
    DatabaseModule,

    // Schedule Module (for the outbox relay)
    ScheduleModule.forRoot(),

    CommonModule,
    EventBusModule,
    OrderModule,
  ],
})
export class OrderAppModule {}
