import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  errorMessage,
  InsufficientStockError,
  OrderNotFoundError,
  PersistenceError,
  PublishError,
  ValidationError,
} from '../common/errors';
import { retryWithBackoff } from '../common/retry';
import { OrderStatus } from '../database/entities';
import { OutboxRelayService } from '../outbox/outbox-relay.service';
import { CatalogClient } from './catalog/catalog.client';
import { CreateOrderDto, OrderResponseDto } from './dto';
import { ORDER_EVENT_SOURCE, ORDER_PLACED, OrderPlacedEvent } from './events';
import { CreatedOrder, OrderRepository } from './repository/order.repository';

export const ORDER_AGGREGATE = 'Order';

@Injectable()
export class OrderService implements OnModuleInit {
  private readonly logger = new Logger(OrderService.name);
  private readonly topic: string;
  private readonly publishAttempts: number;
  private readonly persistenceAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly orderRepository: OrderRepository,
    private readonly outboxRelay: OutboxRelayService,
    private readonly catalogClient: CatalogClient,
    private readonly configService: ConfigService,
  ) {
    this.topic = this.configService.get<string>('ORDERS_TOPIC', 'orders');
    this.publishAttempts = this.configService.get<number>('PUBLISH_RETRY_ATTEMPTS', 3);
    this.persistenceAttempts = this.configService.get<number>('PERSISTENCE_RETRY_ATTEMPTS', 3);
    this.retryDelayMs = this.configService.get<number>('RETRY_INITIAL_DELAY_MS', 100);
  }

  onModuleInit() {
    this.outboxRelay.registerFailureHandler(ORDER_AGGREGATE, async event => {
      await this.orderRepository.updateStatus(event.aggregateId, OrderStatus.FAILED);
      this.logger.error(`Order ${event.aggregateId} marked ${OrderStatus.FAILED}: its ${event.eventType} event could not be published`);
    });
  }

  /**
   * Validate, persist and announce an order.
   *
   * The order and its OrderPlaced outbox event are written in one transaction,
   * then published straight away with a small retry budget. If that budget
   * runs out the order stays CREATED and the outbox relay keeps trying.
   */
  async placeOrder(dto: CreateOrderDto): Promise<OrderResponseDto> {
    this.logger.log(`Handling a request to place an order: item ${dto.item_id}, quantity ${dto.quantity}`);

    await this.checkAvailability(dto.item_id, dto.quantity);

    const orderId = uuidv4();
    const event: OrderPlacedEvent = {
      eventType: ORDER_PLACED,
      orderId,
      itemId: dto.item_id,
      quantity: dto.quantity,
      timestamp: new Date().toISOString(),
      source: ORDER_EVENT_SOURCE,
    };

    const { order, outboxEvent } = await this.persist(orderId, dto, event);
    this.logger.log(`Order created: ${orderId} for item ${dto.item_id}`);

    try {
      await this.outboxRelay.publish(outboxEvent, this.publishAttempts, this.retryDelayMs);
    } catch (error) {
      this.logger.error(`Could not publish ${ORDER_PLACED} for order ${orderId}, left to the outbox relay`, error);
      if (error instanceof PublishError) {
        throw new PublishError(
          'Order was stored but could not be confirmed on the event bus; it will be retried',
          error.ambiguous,
          { order_id: orderId },
          error,
        );
      }
      throw error;
    }

    return OrderResponseDto.from(order);
  }

  async getOrder(orderId: string): Promise<OrderResponseDto> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return OrderResponseDto.from(order);
  }

  private async checkAvailability(itemId: number, quantity: number) {
    const stock = await this.catalogClient.getStock(itemId);

    if (stock === null) {
      throw new ValidationError(`item_id ${itemId} is not a known catalog item`);
    }
    if (quantity > stock) {
      throw new InsufficientStockError(itemId, quantity, stock);
    }
  }

  private async persist(orderId: string, dto: CreateOrderDto, event: OrderPlacedEvent): Promise<CreatedOrder> {
    try {
      return await retryWithBackoff(
        () =>
          this.orderRepository.createWithOutbox(
            {
              id: orderId,
              itemId: dto.item_id,
              customerName: dto.name,
              shippingAddress: dto.address,
              quantity: dto.quantity,
            },
            {
              aggregateId: orderId,
              aggregateType: ORDER_AGGREGATE,
              eventType: ORDER_PLACED,
              topic: this.topic,
              partitionKey: String(dto.item_id),
              payload: { ...event },
              // Held for the inline publish; the relay only takes over once that lease ends.
              availableAt: new Date(Date.now() + this.outboxRelay.leaseDuration(this.publishAttempts, this.retryDelayMs)),
            },
          ),
        {
          attempts: this.persistenceAttempts,
          initialDelayMs: this.retryDelayMs,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(`Persisting order ${orderId} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(error)}`),
        },
      );
    } catch (error) {
      this.logger.error(`Failed to persist order ${orderId}`, error);
      throw new PersistenceError(`Order could not be stored: ${errorMessage(error)}`, error);
    }
  }
}
