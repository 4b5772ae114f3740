export const ORDER_PLACED = 'OrderPlaced';
export const ORDER_EVENT_SOURCE = 'order-service';

/**
 * Published once per accepted order on the orders topic, keyed by item id
 * so that events for one product stay in one partition.
 */
export interface OrderPlacedEvent {
  eventType: typeof ORDER_PLACED;
  orderId: string;
  itemId: number;
  quantity: number;
  /** ISO 8601 */
  timestamp: string;
  source: string;
}
