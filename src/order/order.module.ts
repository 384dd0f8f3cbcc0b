import { Module } from '@nestjs/common';
import { OrderService, ORDER_REPOSITORY } from './order.service';
import { OrderController } from './order.controller';
import { SqlOrderRepository } from './infrastructure/sql-order.repository';

@Module({
  providers: [
    OrderService,
    {
      provide: ORDER_REPOSITORY,
      useClass: SqlOrderRepository,
    },
  ],
  controllers: [OrderController],
})
export class OrderModule {}
