import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { ConflictError } from '../../common/errors';
import { TransactionRunner } from '../../common/transaction-runner';
import { OrderWriteModel } from '../../order/infrastructure/order.write-model';
import { OrderedItemWriteModel } from '../../order/infrastructure/ordered-item.write-model';
import { Customer, CustomerProps } from '../domain/customer';
import { CustomerDeletePolicy, CustomerRepository } from '../domain/customer.repository';
import { CustomerWriteModel } from './customer.write-model';

@Injectable()
export class SqlCustomerRepository implements CustomerRepository {
  private readonly logger = new Logger(SqlCustomerRepository.name);

  constructor(
    @InjectRepository(CustomerWriteModel)
    private readonly customerWriteModelRepository: Repository<CustomerWriteModel>,
    private readonly transactions: TransactionRunner,
  ) {}

  async create(props: CustomerProps): Promise<Customer> {
    return this.transactions.run(async (manager) => {
      await this.assertPhoneAvailable(props.phone, null, manager);
      const record = await manager.save(this.toRecord(props));
      return this.fromRecord(record);
    }, 'phone');
  }

  async findById(id: number): Promise<Customer | null> {
    const record = await this.transactions.read(() => this.customerWriteModelRepository.findOneBy({ id }));
    return record != null ? this.fromRecord(record) : null;
  }

  async update(id: number, changes: Partial<CustomerProps>): Promise<Customer | null> {
    return this.transactions.run(async (manager) => {
      const record = await manager.findOneBy(CustomerWriteModel, { id });
      if (record == null) {
        return null;
      }
      if (changes.phone !== undefined) {
        await this.assertPhoneAvailable(changes.phone, id, manager);
      }
      await manager.createQueryBuilder()
        .update(CustomerWriteModel)
        .set(changes)
        .where('id = :id', { id })
        .execute();
      return this.fromRecord({ ...record, ...changes });
    }, 'phone');
  }

  async delete(id: number, policy: CustomerDeletePolicy): Promise<boolean> {
    return this.transactions.run(async (manager) => {
      if ((await manager.countBy(CustomerWriteModel, { id })) === 0) {
        return false;
      }
      const orders = await manager.find(OrderWriteModel, { select: { id: true }, where: { customerId: id } });
      if (orders.length > 0) {
        if (policy === 'restrict') {
          throw new ConflictError('customer_id', `Customer ${id} has ${orders.length} order(s) and cannot be deleted`);
        }
        const orderIds = orders.map((order) => order.id);
        await manager.delete(OrderedItemWriteModel, { orderId: In(orderIds) });
        await manager.delete(OrderWriteModel, { id: In(orderIds) });
        this.logger.log(`Cascaded delete of customer ${id} to orders ${orderIds.join(', ')}`);
      }
      await manager.delete(CustomerWriteModel, { id });
      return true;
    }, 'customer_id');
  }

  private async assertPhoneAvailable(phone: string, ownerId: number | null, manager: EntityManager): Promise<void> {
    const holder = await manager.findOneBy(CustomerWriteModel, { phone });
    if (holder != null && holder.id !== ownerId) {
      throw new ConflictError('phone', `Phone ${phone} is already registered`);
    }
  }

  private toRecord(props: CustomerProps): CustomerWriteModel {
    const record = new CustomerWriteModel();
    record.name = props.name;
    record.phone = props.phone;
    return record;
  }

  private fromRecord(record: CustomerWriteModel): Customer {
    const { id, name, phone } = record;
    return Customer.restore(id, { name, phone });
  }
}
