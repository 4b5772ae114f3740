import { plainToInstance } from 'class-transformer';
import { Equals, IsInt, IsISO8601, IsNotEmpty, IsString, Min, validateSync } from 'class-validator';
import { ConsumerError } from '../common/errors';
import { BusMessage } from '../event-bus/event-bus';
import { ORDER_PLACED, OrderPlacedEvent } from '../order/events';

class OrderPlacedPayload implements OrderPlacedEvent {
  @Equals(ORDER_PLACED)
  eventType!: typeof ORDER_PLACED;

  @IsString()
  @IsNotEmpty()
  orderId!: string;

  @IsInt()
  @Min(1)
  itemId!: number;

  @IsInt()
  @Min(1)
  quantity!: number;

  @IsISO8601()
  timestamp!: string;

  @IsString()
  source!: string;
}

/**
 * Decodes one consumed message into an OrderPlaced event.
 * Throws ConsumerError for anything that is not a well-formed OrderPlaced.
 */
export function decodeOrderEvent(message: BusMessage, topic: string, partition: number): OrderPlacedEvent {
  const fail = (reason: string) => new ConsumerError(reason, topic, partition, message.offset);

  if (message.value === null) {
    throw fail('Message has no value');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(message.value);
  } catch (error) {
    throw fail(`Message is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw fail('Message is not a JSON object');
  }

  const payload = plainToInstance(OrderPlacedPayload, parsed);
  const errors = validateSync(payload);
  if (errors.length > 0) {
    const details = errors.flatMap(error => Object.values(error.constraints ?? {}));
    throw fail(`Invalid ${ORDER_PLACED} event: ${details.join(', ')}`);
  }

  return {
    eventType: ORDER_PLACED,
    orderId: payload.orderId,
    itemId: payload.itemId,
    quantity: payload.quantity,
    timestamp: payload.timestamp,
    source: payload.source,
  };
}
