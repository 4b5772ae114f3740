export * from './applied-order-event.entity';
export * from './consumer-offset.entity';
export * from './order.entity';
export * from './outbox.entity';
export * from './product.entity';
