export type OrderLineProps = {
  menuItemId: number;
  dishName: string;
  price: number;
}

/** One unit of a menu item on an order, with the item resolved at read time. */
export class OrderLine {
  constructor(private _id: number, private props: OrderLineProps) {}

  static restore(id: number, props: OrderLineProps): OrderLine {
    return new OrderLine(id, props);
  }

  get id(): number {
    return this._id;
  }

  get menuItemId(): number {
    return this.props.menuItemId;
  }

  get dishName(): string {
    return this.props.dishName;
  }

  get price(): number {
    return this.props.price;
  }
}
