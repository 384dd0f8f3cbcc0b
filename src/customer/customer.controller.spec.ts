import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { OrderWriteModel } from '../order/infrastructure/order.write-model';
import { OrderedItemWriteModel } from '../order/infrastructure/ordered-item.write-model';
import { createTestApp } from '../testing/create-test-app';
import { CustomerWriteModel } from './infrastructure/customer.write-model';

describe('CustomerController', () => {
  let app: INestApplication;

  const http = () => request(app.getHttpServer());

  async function placeOrder(): Promise<void> {
    await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);
    await http().post('/items').send({ dish_name: 'Soup', price: 5 }).expect(201);
    await http().post('/orders').send({ customer_id: 1, item_ids: [1] }).expect(201);
  }

  describe('with the restrict delete policy', () => {
    beforeEach(async () => {
      app = await createTestApp();
    });

    afterEach(async () => {
      await app.close();
    });

    it('creates and reads a customer', async () => {
      const created = await http().post('/customers').send({ name: '  Al ', phone: '555-1' }).expect(201);
      expect(created.body).toEqual({ id: 1, name: 'Al', phone: '555-1' });

      const fetched = await http().get('/customers/1').expect(200);
      expect(fetched.body).toEqual({ id: 1, name: 'Al', phone: '555-1' });
    });

    it('rejects a duplicate phone and keeps a single row', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);

      const conflict = await http().post('/customers').send({ name: 'Bo', phone: '555-1' }).expect(409);
      expect(conflict.body).toEqual({
        error: { message: 'Phone 555-1 is already registered', status: 409, field: 'phone' },
      });
      expect(await app.get(DataSource).getRepository(CustomerWriteModel).count()).toBe(1);
    });

    it('reports missing and empty fields', async () => {
      const res = await http().post('/customers').send({ name: '' }).expect(422);
      expect(res.body.error.message).toBe('Validation error');
      expect(res.body.error.details.issues).toEqual([
        { path: 'name', message: 'String must contain at least 1 character(s)' },
        { path: 'phone', message: 'Required' },
      ]);
    });

    it('rejects unknown fields', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1', email: 'al@example.com' }).expect(422);
    });

    it('answers 404 for an unknown customer', async () => {
      const res = await http().get('/customers/99').expect(404);
      expect(res.body).toEqual({ error: { message: 'Customer 99 not found', status: 404 } });
    });

    it('rejects a malformed id', async () => {
      await http().get('/customers/abc').expect(422);
      await http().get('/customers/0').expect(422);
      await http().get('/customers/1e3').expect(422);
      await http().get('/customers/0x10').expect(422);
    });

    it('rejects an id beyond the integer column', async () => {
      const res = await http().get('/customers/3000000000').expect(422);
      expect(res.body.error.details.issues).toEqual([
        { path: '', message: 'Number must be less than or equal to 2147483647' },
      ]);
      await http().get('/customers/2147483647').expect(404);
    });

    it('updates only the given fields', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);

      const res = await http().put('/customers/1').send({ phone: '555-2' }).expect(200);
      expect(res.body).toEqual({ id: 1, name: 'Al', phone: '555-2' });
    });

    it('lets a customer keep their own phone', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);

      const res = await http().put('/customers/1').send({ name: 'Alan', phone: '555-1' }).expect(200);
      expect(res.body).toEqual({ id: 1, name: 'Alan', phone: '555-1' });
    });

    it('rejects an update onto another customer phone', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);
      await http().post('/customers').send({ name: 'Bo', phone: '555-2' }).expect(201);

      const res = await http().put('/customers/2').send({ phone: '555-1' }).expect(409);
      expect(res.body.error.field).toBe('phone');
      const unchanged = await http().get('/customers/2').expect(200);
      expect(unchanged.body.phone).toBe('555-2');
    });

    it('rejects an empty update', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);
      await http().put('/customers/1').send({}).expect(422);
    });

    it('answers 404 when updating an unknown customer', async () => {
      await http().put('/customers/7').send({ name: 'Al' }).expect(404);
    });

    it('deletes a customer without orders', async () => {
      await http().post('/customers').send({ name: 'Al', phone: '555-1' }).expect(201);

      await http().delete('/customers/1').expect(204);
      await http().get('/customers/1').expect(404);
      await http().delete('/customers/1').expect(404);
    });

    it('refuses to delete a customer with orders', async () => {
      await placeOrder();

      const res = await http().delete('/customers/1').expect(409);
      expect(res.body).toEqual({
        error: {
          message: 'Customer 1 has 1 order(s) and cannot be deleted',
          status: 409,
          field: 'customer_id',
        },
      });
      await http().get('/customers/1').expect(200);
      await http().get('/orders/1').expect(200);
    });
  });

  describe('with the cascade delete policy', () => {
    beforeEach(async () => {
      app = await createTestApp({ customerDeletePolicy: 'cascade' });
    });

    afterEach(async () => {
      await app.close();
    });

    it('deletes the customer together with their orders and lines', async () => {
      await placeOrder();

      await http().delete('/customers/1').expect(204);
      await http().get('/customers/1').expect(404);
      await http().get('/orders/1').expect(404);
      const dataSource = app.get(DataSource);
      expect(await dataSource.getRepository(OrderWriteModel).count()).toBe(0);
      expect(await dataSource.getRepository(OrderedItemWriteModel).count()).toBe(0);
    });

    it('still answers 404 for an unknown customer', async () => {
      await http().delete('/customers/3').expect(404);
    });
  });
});
