import { Order, orderTimeOf } from './order';
import { OrderLine } from './order-line';

describe('Order', () => {
  const line = (id: number, price: number) => OrderLine.restore(id, { menuItemId: id, dishName: `dish ${id}`, price });

  it('adds line prices in cents', () => {
    const order = Order.restore(1, { customerId: 1, notes: null, orderTime: 0, lines: [line(1, 0.1), line(2, 0.2)] });
    expect(order.total).toBe(0.3);
  });

  it('totals an empty order to zero', () => {
    const order = Order.restore(1, { customerId: 1, notes: null, orderTime: 0, lines: [] });
    expect(order.total).toBe(0);
  });
});

describe('orderTimeOf', () => {
  it('drops milliseconds', () => {
    expect(orderTimeOf(new Date(1_700_000_000_999))).toBe(1_700_000_000);
  });
});
