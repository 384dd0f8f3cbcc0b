export type CustomerProps = {
  name: string;
  phone: string;
}

export class Customer {
  constructor(private _id: number, private props: CustomerProps) {}

  static restore(id: number, props: CustomerProps): Customer {
    return new Customer(id, props);
  }

  get id(): number {
    return this._id;
  }

  get name(): string {
    return this.props.name;
  }

  get phone(): string {
    return this.props.phone;
  }
}
