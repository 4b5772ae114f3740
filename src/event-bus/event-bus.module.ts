import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { EventBusTransport } from '../config/env.validation';
import { EVENT_BUS, EventBus } from './event-bus';
import { InMemoryEventBus } from './in-memory-event-bus';
import { KafkaEventBus } from './kafka-event-bus';

export function createEventBus(configService: ConfigService): EventBus {
  const transport = configService.get<EventBusTransport>('EVENT_BUS_TRANSPORT', 'kafka');

  if (transport === 'memory') {
    new Logger('EventBusModule').warn('Using the in-memory event bus; events do not leave this process');
    return new InMemoryEventBus(configService.get<number>('MEMORY_BUS_PARTITIONS', 3));
  }

  const brokers = configService
    .get<string>('KAFKA_BROKERS', 'localhost:19092')
    .split(',')
    .map(broker => broker.trim())
    .filter(Boolean);

  return new KafkaEventBus({
    clientId: configService.get<string>('KAFKA_CLIENT_ID', 'order-catalog'),
    brokers,
    publishTimeoutMs: configService.get<number>('KAFKA_PUBLISH_TIMEOUT_MS', 5000),
    retry: {
      retries: configService.get<number>('KAFKA_RETRY_ATTEMPTS', 5),
      initialRetryTime: configService.get<number>('KAFKA_RETRY_INITIAL_MS', 300),
      multiplier: configService.get<number>('KAFKA_RETRY_MULTIPLIER', 2),
    },
  });
}

@Global()
@Module({
  providers: [
    {
      provide: EVENT_BUS,
      useFactory: createEventBus,
      inject: [ConfigService],
    },
  ],
  exports: [EVENT_BUS],
})
export class EventBusModule {}
