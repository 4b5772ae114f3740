import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { CreateOrderDto, OrderResponseDto } from './dto';
import { OrderService } from './order.service';

@Controller('order')
export class OrderController {
  private readonly logger = new Logger(OrderController.name);

  constructor(private readonly orderService: OrderService) {}

  /**
   * POST /order
   * 201 with the stored order, 400 on invalid input, 409 when stock is short,
   * 503 when the order could not be stored or announced.
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async placeOrder(@Body() createOrderDto: CreateOrderDto): Promise<OrderResponseDto> {
    const order = await this.orderService.placeOrder(createOrderDto);

    this.logger.log(`Order has been placed successfully: ${order.order_id}`);

    return order;
  }

  @Get(':id')
  async getOrder(@Param('id', new ParseUUIDPipe({ version: '4' })) id: string): Promise<OrderResponseDto> {
    return this.orderService.getOrder(id);
  }
}
