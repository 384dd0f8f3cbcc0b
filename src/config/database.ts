import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { CustomerWriteModel } from '../customer/infrastructure/customer.write-model';
import { MenuItemWriteModel } from '../menu-item/infrastructure/menu-item.write-model';
import { OrderReadModel } from '../order/infrastructure/order.read-model';
import { OrderWriteModel } from '../order/infrastructure/order.write-model';
import { OrderedItemWriteModel } from '../order/infrastructure/ordered-item.write-model';
import { Env } from './env';

export const entities = [
  CustomerWriteModel,
  MenuItemWriteModel,
  OrderWriteModel,
  OrderedItemWriteModel,
  OrderReadModel,
];

export function databaseOptions(config: Env): TypeOrmModuleOptions {
  if (config.dbType === 'postgres') {
    return {
      type: 'postgres',
      url: config.databaseUrl,
      entities,
      synchronize: config.dbSynchronize,
      logging: config.dbLogging,
    };
  }
  return {
    type: 'better-sqlite3',
    database: config.dbPath,
    entities,
    synchronize: config.dbSynchronize,
    logging: config.dbLogging,
  };
}
