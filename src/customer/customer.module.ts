import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { env } from '../config/env';
import { CustomerController } from './customer.controller';
import { CUSTOMER_DELETE_POLICY, CUSTOMER_REPOSITORY, CustomerService } from './customer.service';
import { CustomerWriteModel } from './infrastructure/customer.write-model';
import { SqlCustomerRepository } from './infrastructure/sql-customer.repository';

@Module({
  imports: [TypeOrmModule.forFeature([CustomerWriteModel])],
  providers: [
    CustomerService,
    {
      provide: CUSTOMER_REPOSITORY,
      useClass: SqlCustomerRepository,
    },
    {
      provide: CUSTOMER_DELETE_POLICY,
      useValue: env.customerDeletePolicy,
    },
  ],
  controllers: [CustomerController],
})
export class CustomerModule {}
