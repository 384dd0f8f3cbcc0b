import { OrderLine } from './order-line';

export type OrderProps = {
  customerId: number;
  notes: string | null;
  orderTime: number;
  lines: OrderLine[];
}

export type CreateOrderProps = {
  customerId: number;
  notes: string | null;
  orderTime: number;
  menuItemIds: number[];
}

/** Order time is stored as whole epoch seconds. */
export function orderTimeOf(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class Order {
  constructor(private _id: number, private props: OrderProps) {}

  static restore(id: number, props: OrderProps): Order {
    return new Order(id, props);
  }

  get id(): number {
    return this._id;
  }

  get customerId(): number {
    return this.props.customerId;
  }

  get notes(): string | null {
    return this.props.notes;
  }

  get orderTime(): number {
    return this.props.orderTime;
  }

  get lines(): OrderLine[] {
    return this.props.lines;
  }

  get total(): number {
    const cents = this.props.lines.reduce((sum, line) => sum + Math.round(line.price * 100), 0);
    return cents / 100;
  }
}
