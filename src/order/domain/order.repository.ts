import { CreateOrderProps, Order } from "./order";

/** What an order write can see and do inside its single transaction. */
export interface OrderTransaction {
  customerExists(customerId: number): Promise<boolean>;
  existingMenuItemIds(menuItemIds: number[]): Promise<number[]>;
  exists(id: number): Promise<boolean>;
  findById(id: number): Promise<Order | null>;
  insert(props: CreateOrderProps): Promise<number>;
  updateNotes(id: number, notes: string | null): Promise<void>;
  replaceLines(id: number, menuItemIds: number[]): Promise<void>;
  delete(id: number): Promise<void>;
}

export interface OrderRepository {
  findById(id: number): Promise<Order | null>;
  transaction<T>(work: (tx: OrderTransaction) => Promise<T>): Promise<T>;
}
