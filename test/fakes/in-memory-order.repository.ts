import { OrderEntity, OrderStatus } from '../../src/database/entities';
import { AddOutboxEventDto } from '../../src/outbox/outbox.service';
import { CreatedOrder, NewOrder } from '../../src/order/repository/order.repository';
import { InMemoryOutboxService } from './in-memory-outbox.service';

/** Stands in for OrderRepository; the order and its outbox event are stored together. */
export class InMemoryOrderRepository {
  readonly orders = new Map<string, OrderEntity>();

  constructor(private readonly outbox: InMemoryOutboxService) {}

  async createWithOutbox(newOrder: NewOrder, outbox: AddOutboxEventDto): Promise<CreatedOrder> {
    if (this.orders.has(newOrder.id)) {
      throw new Error(`Duplicate order id ${newOrder.id}`);
    }
    const now = new Date();
    const order = Object.assign(new OrderEntity(), {
      ...newOrder,
      status: OrderStatus.CREATED,
      createdAt: now,
      updatedAt: now,
    });
    this.orders.set(order.id, order);
    return { order: { ...order }, outboxEvent: this.outbox.store(outbox) };
  }

  async findById(orderId: string): Promise<OrderEntity | null> {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  async updateStatus(orderId: string, status: OrderStatus): Promise<void> {
    const order = this.orders.get(orderId);
    if (order) {
      this.orders.set(orderId, { ...order, status, updatedAt: new Date() });
    }
  }
}
