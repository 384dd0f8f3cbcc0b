import { INestApplication } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { CustomerService } from '../customer/customer.service';
import { MenuItemService } from '../menu-item/menu-item.service';
import { OrderService } from '../order/order.service';
import { createTestApp } from '../testing/create-test-app';

describe('TransactionRunner', () => {
  let app: INestApplication;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.close();
  });

  async function ticks(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await Promise.resolve();
    }
  }

  it('keeps a committed write when an overlapping transaction fails', async () => {
    const customers = app.get(CustomerService);
    const orders = app.get(OrderService);
    await customers.create({ name: 'Al', phone: '555-1' });
    await app.get(MenuItemService).create({ dish_name: 'Soup', price: 5 });

    for (let offset = 0; offset < 10; offset++) {
      const failing = orders.createOrder({ customer_id: 1, item_ids: [1, 99] });
      await ticks(offset);
      const created = customers.create({ name: 'Bo', phone: `555-2${offset}` });

      const [failed, succeeded] = await Promise.allSettled([failing, created]);

      expect(failed.status).toBe('rejected');
      expect(succeeded.status).toBe('fulfilled');
      if (succeeded.status === 'fulfilled') {
        await expect(customers.findById(succeeded.value.id)).resolves.toEqual(succeeded.value);
      }
    }
  });

  it('never shows a half-replaced item set to a reader', async () => {
    await app.get(CustomerService).create({ name: 'Al', phone: '555-1' });
    const menu = app.get(MenuItemService);
    await menu.create({ dish_name: 'Soup', price: 5 });
    await menu.create({ dish_name: 'Bread', price: 1.25 });
    const orders = app.get(OrderService);
    await orders.createOrder({ customer_id: 1, item_ids: [1, 1] });

    const update = orders.updateOrder(1, { item_ids: [2, 2] });
    await ticks(3);
    const read = await orders.findById(1);
    await update;

    expect([[1, 1], [2, 2]]).toContainEqual(read.items.map((item) => item.id));
  });

  it('opens transactions at the injected isolation level', async () => {
    await app.close();
    app = await createTestApp({ isolationLevel: 'READ UNCOMMITTED' });
    const transaction = jest.spyOn(app.get(DataSource), 'transaction');

    await app.get(CustomerService).create({ name: 'Al', phone: '555-1' });

    expect(transaction).toHaveBeenCalledWith('READ UNCOMMITTED', expect.any(Function));
  });
});
