import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put } from '@nestjs/common';
import { IdSchema, ZodValidationPipe } from '../common/zod-validation.pipe';
import { CreateOrderInput, CreateOrderSchema, OrderReadDto, UpdateOrderInput, UpdateOrderSchema } from './order.dto';
import { OrderService } from './order.service';

@Controller('orders')
export class OrderController {
  constructor(private readonly orderService: OrderService) {}

  @Get(':id')
  findById(@Param('id', new ZodValidationPipe(IdSchema)) id: number): Promise<OrderReadDto> {
    return this.orderService.findById(id);
  }

  @Post()
  createOrder(@Body(new ZodValidationPipe(CreateOrderSchema)) order: CreateOrderInput): Promise<OrderReadDto> {
    return this.orderService.createOrder(order);
  }

  @Put(':id')
  updateOrder(
    @Param('id', new ZodValidationPipe(IdSchema)) id: number,
    @Body(new ZodValidationPipe(UpdateOrderSchema)) order: UpdateOrderInput,
  ): Promise<OrderReadDto> {
    return this.orderService.updateOrder(id, order);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  deleteOrder(@Param('id', new ZodValidationPipe(IdSchema)) id: number): Promise<void> {
    return this.orderService.deleteOrder(id);
  }
}
