export type MenuItemProps = {
  dishName: string;
  price: number;
}

export class MenuItem {
  constructor(private _id: number, private props: MenuItemProps) {}

  static restore(id: number, props: MenuItemProps): MenuItem {
    return new MenuItem(id, props);
  }

  get id(): number {
    return this._id;
  }

  get dishName(): string {
    return this.props.dishName;
  }

  get price(): number {
    return this.props.price;
  }
}
