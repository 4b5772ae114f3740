export * from './create-order.dto';
export * from './order-response.dto';
