import { Injectable } from "@nestjs/common";
import { EntityManager, In } from "typeorm";
import { TransactionRunner } from "../../common/transaction-runner";
import { CustomerWriteModel } from "../../customer/infrastructure/customer.write-model";
import { MenuItemWriteModel } from "../../menu-item/infrastructure/menu-item.write-model";
import { CreateOrderProps, Order } from "../domain/order";
import { OrderLine } from "../domain/order-line";
import { OrderRepository, OrderTransaction } from "../domain/order.repository";
import { OrderReadModel } from "./order.read-model";
import { OrderWriteModel } from "./order.write-model";
import { OrderedItemWriteModel } from "./ordered-item.write-model";

async function readOrder(id: number, manager: EntityManager): Promise<Order | null> {
  const records = await manager.find(OrderReadModel, { where: { id }, order: { lineId: 'ASC' } });
  return fromRecords(records);
}

function fromRecords(records: OrderReadModel[]): Order | null {
  if (records.length === 0) {
    return null;
  }
  const lines: OrderLine[] = [];
  for (const record of records) {
    const { lineId, menuItemId, dishName, price } = record;
    if (lineId == null || menuItemId == null || dishName == null || price == null) {
      continue;
    }
    lines.push(OrderLine.restore(lineId, { menuItemId, dishName, price: Number(price) }));
  }
  const { id, customerId, orderNotes, orderTime } = records[0];
  return Order.restore(id, { customerId, notes: orderNotes, orderTime: Number(orderTime), lines });
}

export class SqlOrderTransaction implements OrderTransaction {
  constructor(private readonly manager: EntityManager) {}

  async customerExists(customerId: number): Promise<boolean> {
    const count = await this.manager.createQueryBuilder()
      .select('customer')
      .from(CustomerWriteModel, 'customer')
      .where('customer.id = :id', { id: customerId })
      .getCount();
    return count > 0;
  }

  async existingMenuItemIds(menuItemIds: number[]): Promise<number[]> {
    if (menuItemIds.length === 0) {
      return [];
    }
    const records = await this.manager.find(MenuItemWriteModel, {
      select: { id: true },
      where: { id: In([...new Set(menuItemIds)]) },
    });
    return records.map((record) => record.id);
  }

  async exists(id: number): Promise<boolean> {
    const count = await this.manager.createQueryBuilder()
      .select('customerOrder')
      .from(OrderWriteModel, 'customerOrder')
      .where('customerOrder.id = :id', { id })
      .getCount();
    return count > 0;
  }

  findById(id: number): Promise<Order | null> {
    return readOrder(id, this.manager);
  }

  async insert(props: CreateOrderProps): Promise<number> {
    const record = new OrderWriteModel();
    record.customerId = props.customerId;
    record.orderNotes = props.notes;
    record.orderTime = props.orderTime;
    const saved = await this.manager.save(record);
    await this.insertLines(saved.id, props.menuItemIds);
    return saved.id;
  }

  async updateNotes(id: number, notes: string | null): Promise<void> {
    await this.manager.createQueryBuilder()
      .update(OrderWriteModel)
      .set({ orderNotes: notes })
      .where('id = :id', { id })
      .execute();
  }

  async replaceLines(id: number, menuItemIds: number[]): Promise<void> {
    await this.manager.delete(OrderedItemWriteModel, { orderId: id });
    await this.insertLines(id, menuItemIds);
  }

  async delete(id: number): Promise<void> {
    await this.manager.delete(OrderedItemWriteModel, { orderId: id });
    await this.manager.delete(OrderWriteModel, { id });
  }

  // one row per id, in request order; duplicates are kept
  private async insertLines(orderId: number, menuItemIds: number[]): Promise<void> {
    if (menuItemIds.length === 0) {
      return;
    }
    await this.manager.createQueryBuilder()
      .insert()
      .into(OrderedItemWriteModel)
      .values(menuItemIds.map((menuItemId) => ({ orderId, menuItemId })))
      .updateEntity(false)
      .execute();
  }
}

@Injectable()
export class SqlOrderRepository implements OrderRepository {
  constructor(private readonly transactions: TransactionRunner) {}

  findById(id: number): Promise<Order | null> {
    return this.transactions.read((manager) => readOrder(id, manager));
  }

  transaction<T>(work: (tx: OrderTransaction) => Promise<T>): Promise<T> {
    return this.transactions.run((manager) => work(new SqlOrderTransaction(manager)), 'order');
  }
}
