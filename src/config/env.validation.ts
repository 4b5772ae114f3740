import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsNumber, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export type ServiceName = 'order' | 'catalog';
export type EventBusTransport = 'kafka' | 'memory';
export type CatalogStoreKind = 'database' | 'memory';

const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', '1', 'yes'].includes(value.toLowerCase());
  return value;
};

const toInt = ({ value }: { value: unknown }) => (typeof value === 'string' && value !== '' ? Number(value) : value);

export class EnvironmentVariables {
  @IsIn(['order', 'catalog'])
  @IsOptional()
  SERVICE_NAME: ServiceName = 'order';

  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(65535)
  ORDER_SERVICE_PORT = 8081;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(65535)
  CATALOG_SERVICE_PORT = 8080;

  @IsString()
  CATALOG_SERVICE_URL = 'http://localhost:8080';

  @Transform(toInt)
  @IsInt()
  @Min(1)
  CATALOG_REQUEST_TIMEOUT_MS = 3000;

  // Database (TypeORM)
  @IsIn(['mysql', 'mariadb'])
  DB_TYPE: 'mysql' | 'mariadb' = 'mysql';

  @IsString()
  DB_HOST = 'localhost';

  @Transform(toInt)
  @IsInt()
  DB_PORT = 3306;

  @IsString()
  DB_USERNAME = 'shop';

  @IsString()
  DB_PASSWORD = '';

  @IsString()
  DB_DATABASE = 'shop';

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE = false;

  // Event bus
  @IsIn(['kafka', 'memory'])
  EVENT_BUS_TRANSPORT: EventBusTransport = 'kafka';

  @IsString()
  KAFKA_BROKERS = 'localhost:19092';

  @IsString()
  KAFKA_CLIENT_ID = 'order-catalog';

  @Transform(toInt)
  @IsInt()
  @Min(1)
  KAFKA_PUBLISH_TIMEOUT_MS = 5000;

  @Transform(toInt)
  @IsInt()
  @Min(0)
  KAFKA_RETRY_ATTEMPTS = 5;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  KAFKA_RETRY_INITIAL_MS = 300;

  @Transform(toInt)
  @IsNumber()
  @Min(1)
  KAFKA_RETRY_MULTIPLIER = 2;

  @IsString()
  ORDERS_TOPIC = 'orders';

  @Transform(toInt)
  @IsInt()
  @Min(1)
  MEMORY_BUS_PARTITIONS = 3;

  // Order intake
  @Transform(toInt)
  @IsInt()
  @Min(1)
  PUBLISH_RETRY_ATTEMPTS = 3;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  PERSISTENCE_RETRY_ATTEMPTS = 3;

  @Transform(toInt)
  @IsInt()
  @Min(0)
  RETRY_INITIAL_DELAY_MS = 100;

  // Outbox relay
  @Transform(toInt)
  @IsInt()
  @Min(1)
  OUTBOX_BATCH_SIZE = 100;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  OUTBOX_MAX_ATTEMPTS = 10;

  @Transform(toInt)
  @IsInt()
  @Min(100)
  OUTBOX_RELAY_INTERVAL_MS = 5000;

  @Transform(toInt)
  @IsInt()
  @Min(0)
  OUTBOX_BACKOFF_BASE_MS = 1000;

  // Catalog
  @IsIn(['database', 'memory'])
  CATALOG_STORE: CatalogStoreKind = 'database';

  @IsString()
  CATALOG_CONSUMER_GROUP = 'catalog-stock';

  @Transform(toBoolean)
  @IsBoolean()
  CATALOG_CONSUMER_ENABLED = true;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  CONSUMER_BATCH_SIZE = 100;

  @Transform(toInt)
  @IsInt()
  @Min(0)
  CONSUMER_RESTART_DELAY_MS = 1000;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  DEDUP_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

  @Transform(toInt)
  @IsInt()
  @Min(1000)
  DEDUP_PRUNE_INTERVAL_MS = 60 * 60 * 1000;

  @IsString()
  LOG_LEVELS = 'log,warn,error';
}

/**
 * `validate` hook for ConfigModule.forRoot: converts the raw environment and
 * fills in defaults, failing startup on any invalid value.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors.map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`);
    throw new Error(`Invalid environment configuration\n${details.join('\n')}`);
  }

  return validated;
}
