import { HttpStatus } from '@nestjs/common';

/**
 * Base class for every failure the services raise on purpose.
 * `status` is the HTTP status the failure maps to when it reaches a controller.
 */
export abstract class DomainError extends Error {
  abstract readonly status: HttpStatus;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Client-caused: rejected input. Never retried. */
export class ValidationError extends DomainError {
  readonly status = HttpStatus.BAD_REQUEST;

  constructor(
    message: string,
    readonly violations: string[] = [message],
  ) {
    super(message, { violations });
  }
}

export class InsufficientStockError extends DomainError {
  readonly status = HttpStatus.CONFLICT;

  constructor(itemId: number, requested: number, available: number) {
    super(`Item ${itemId} is out of stock: requested ${requested}, available ${available}`, {
      itemId,
      requested,
      available,
    });
  }
}

export class ProductNotFoundError extends DomainError {
  readonly status = HttpStatus.NOT_FOUND;

  constructor(readonly itemId: number) {
    super(`Product ${itemId} not found`, { itemId });
  }
}

export class OrderNotFoundError extends DomainError {
  readonly status = HttpStatus.NOT_FOUND;

  constructor(orderId: string) {
    super(`Order ${orderId} not found`, { orderId });
  }
}

/** Infrastructure-caused: the order store could not be written after retries. */
export class PersistenceError extends DomainError {
  readonly status = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(message: string, cause?: unknown) {
    super(message, {}, { cause });
  }
}

/**
 * The event bus did not acknowledge a write. When `ambiguous` is set the
 * broker may still have stored the event (e.g. a timeout), so consumers must
 * deduplicate rather than rely on the producer.
 */
export class PublishError extends DomainError {
  readonly status = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(
    message: string,
    readonly ambiguous: boolean,
    details: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, { ...details, ambiguous }, { cause });
  }
}

export class CatalogUnavailableError extends DomainError {
  readonly status = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(cause?: unknown) {
    super('Catalog service is unavailable, please try again later', {}, { cause });
  }
}

/**
 * A consumed message could not be decoded. Skipped by the consumer loop and
 * never mapped to an HTTP response.
 */
export class ConsumerError extends Error {
  constructor(
    message: string,
    readonly topic: string,
    readonly partition: number,
    readonly offset: string,
  ) {
    super(message);
    this.name = ConsumerError.name;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
