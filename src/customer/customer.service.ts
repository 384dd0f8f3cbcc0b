import { Inject, Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../common/errors';
import { CreateCustomerInput, CustomerReadDto, UpdateCustomerInput } from './customer.dto';
import { Customer } from './domain/customer';
import { CustomerDeletePolicy, CustomerRepository } from './domain/customer.repository';

export const CUSTOMER_REPOSITORY = 'CUSTOMER_REPOSITORY';
export const CUSTOMER_DELETE_POLICY = 'CUSTOMER_DELETE_POLICY';

@Injectable()
export class CustomerService {
  private readonly logger = new Logger(CustomerService.name);

  constructor(
    @Inject(CUSTOMER_REPOSITORY) private readonly customerRepository: CustomerRepository,
    @Inject(CUSTOMER_DELETE_POLICY) private readonly deletePolicy: CustomerDeletePolicy,
  ) {}

  async create(input: CreateCustomerInput): Promise<CustomerReadDto> {
    const customer = await this.customerRepository.create(input);
    this.logger.log(`Created customer ${customer.id}`);
    return this.fromDomain(customer);
  }

  async findById(id: number): Promise<CustomerReadDto> {
    const customer = await this.customerRepository.findById(id);
    if (customer == null) {
      throw new NotFoundError('Customer', id);
    }
    return this.fromDomain(customer);
  }

  async update(id: number, input: UpdateCustomerInput): Promise<CustomerReadDto> {
    const customer = await this.customerRepository.update(id, input);
    if (customer == null) {
      throw new NotFoundError('Customer', id);
    }
    this.logger.log(`Updated customer ${id}`);
    return this.fromDomain(customer);
  }

  async delete(id: number): Promise<void> {
    if (!(await this.customerRepository.delete(id, this.deletePolicy))) {
      throw new NotFoundError('Customer', id);
    }
    this.logger.log(`Deleted customer ${id}`);
  }

  private fromDomain(domain: Customer): CustomerReadDto {
    return { id: domain.id, name: domain.name, phone: domain.phone };
  }
}
