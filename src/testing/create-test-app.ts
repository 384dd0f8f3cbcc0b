import { INestApplication, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { configureApp } from '../app.setup';
import { TransactionModule } from '../common/transaction.module';
import { IsolationLevel, TRANSACTION_ISOLATION_LEVEL } from '../common/transaction-runner';
import { entities } from '../config/database';
import { CustomerModule } from '../customer/customer.module';
import { CUSTOMER_DELETE_POLICY } from '../customer/customer.service';
import { CustomerDeletePolicy } from '../customer/domain/customer.repository';
import { MenuItemModule } from '../menu-item/menu-item.module';
import { OrderModule } from '../order/order.module';

type TestAppOptions = {
  customerDeletePolicy?: CustomerDeletePolicy;
  isolationLevel?: IsolationLevel;
};

/** Full HTTP app over a fresh in-memory sqlite database. */
export async function createTestApp(options: TestAppOptions = {}): Promise<INestApplication> {
  Logger.overrideLogger(false);
  const moduleRef = await Test.createTestingModule({
    imports: [
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        entities,
        synchronize: true,
        logging: false,
      }),
      TransactionModule,
      CustomerModule,
      MenuItemModule,
      OrderModule,
    ],
  })
    .overrideProvider(CUSTOMER_DELETE_POLICY)
    .useValue(options.customerDeletePolicy ?? 'restrict')
    .overrideProvider(TRANSACTION_ISOLATION_LEVEL)
    .useValue(options.isolationLevel ?? 'SERIALIZABLE')
    .compile();
  const app = configureApp(moduleRef.createNestApplication({ logger: false }));
  await app.init();
  return app;
}
