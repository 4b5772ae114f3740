import 'reflect-metadata';
import { Logger, LogLevel, Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { CatalogAppModule } from './catalog-app.module';
import { DomainExceptionFilter } from './common/domain-exception.filter';
import { createValidationPipe } from './common/validation';
import type { ServiceName } from './config/env.validation';
import { OrderAppModule } from './order-app.module';

const LOG_LEVELS: readonly LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'];

const services: Record<ServiceName, { module: Type<unknown>; portKey: string }> = {
  order: { module: OrderAppModule, portKey: 'ORDER_SERVICE_PORT' },
  catalog: { module: CatalogAppModule, portKey: 'CATALOG_SERVICE_PORT' },
};

function parseLogLevels(value: string | undefined): LogLevel[] {
  const requested = (value ?? 'log,warn,error').split(',').map(level => level.trim());
  return LOG_LEVELS.filter(level => requested.includes(level));
}

function serviceName(value: string | undefined): ServiceName {
  return value === 'catalog' ? 'catalog' : 'order';
}

async function bootstrap() {
  const name = serviceName(process.env.SERVICE_NAME);
  const { module, portKey } = services[name];

  const app = await NestFactory.create(module, {
    logger: parseLogLevels(process.env.LOG_LEVELS),
  });

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new DomainExceptionFilter());
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>(portKey, name === 'order' ? 8081 : 8080);
  await app.listen(port);

  new Logger('Bootstrap').log(`${name} service listening on port ${port}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error('Failed to start', error);
  process.exit(1);
});
