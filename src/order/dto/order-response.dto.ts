import { OrderEntity, OrderStatus } from '../../database/entities';

export class OrderResponseDto {
  constructor(
    readonly order_id: string,
    readonly item_id: number,
    readonly name: string,
    readonly address: string,
    readonly quantity: number,
    readonly status: OrderStatus,
    readonly created_at: Date,
  ) {}

  static from(entity: OrderEntity): OrderResponseDto {
    return new OrderResponseDto(
      entity.id,
      entity.itemId,
      entity.customerName,
      entity.shippingAddress,
      entity.quantity,
      entity.status,
      entity.createdAt,
    );
  }
}
