import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TransactionModule } from './common/transaction.module';
import { databaseOptions } from './config/database';
import { env } from './config/env';
import { CustomerModule } from './customer/customer.module';
import { MenuItemModule } from './menu-item/menu-item.module';
import { OrderModule } from './order/order.module';

@Module({
  imports: [
    TypeOrmModule.forRoot(databaseOptions(env)),
    TransactionModule,
    CustomerModule,
    MenuItemModule,
    OrderModule,
  ],
})
export class AppModule {}
