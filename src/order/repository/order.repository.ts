import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { OrderEntity, OrderStatus, OutboxEntity } from '../../database/entities';
import { AddOutboxEventDto, OutboxService } from '../../outbox/outbox.service';

export interface NewOrder {
  id: string;
  itemId: number;
  customerName: string;
  shippingAddress: string;
  quantity: number;
}

export interface CreatedOrder {
  order: OrderEntity;
  outboxEvent: OutboxEntity;
}

@Injectable()
export class OrderRepository {
  constructor(
    @InjectRepository(OrderEntity) private readonly orderRepository: Repository<OrderEntity>,
    private readonly outboxService: OutboxService,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Insert the order and its outbox event in one transaction. The order id is
   * the primary key, so a duplicate id fails the insert instead of overwriting.
   */
  async createWithOutbox(newOrder: NewOrder, outbox: AddOutboxEventDto): Promise<CreatedOrder> {
    return this.dataSource.transaction(async manager => {
      await manager.insert(OrderEntity, { ...newOrder, status: OrderStatus.CREATED });
      const order = await manager.findOneByOrFail(OrderEntity, { id: newOrder.id });
      const outboxEvent = await this.outboxService.add(manager, outbox);
      return { order, outboxEvent };
    });
  }

  async findById(orderId: string): Promise<OrderEntity | null> {
    return this.orderRepository.findOne({ where: { id: orderId } });
  }

  async updateStatus(orderId: string, status: OrderStatus): Promise<void> {
    await this.orderRepository.update({ id: orderId }, { status });
  }
}
