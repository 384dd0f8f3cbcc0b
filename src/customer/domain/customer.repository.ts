import { Customer, CustomerProps } from './customer';

export type CustomerDeletePolicy = 'restrict' | 'cascade';

export interface CustomerRepository {
  create(props: CustomerProps): Promise<Customer>;
  findById(id: number): Promise<Customer | null>;
  update(id: number, changes: Partial<CustomerProps>): Promise<Customer | null>;
  /** Resolves false when there is no such customer. */
  delete(id: number, policy: CustomerDeletePolicy): Promise<boolean>;
}
