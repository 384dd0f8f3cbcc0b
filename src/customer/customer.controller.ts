import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put } from '@nestjs/common';
import { IdSchema, ZodValidationPipe } from '../common/zod-validation.pipe';
import {
  CreateCustomerInput,
  CreateCustomerSchema,
  CustomerReadDto,
  UpdateCustomerInput,
  UpdateCustomerSchema,
} from './customer.dto';
import { CustomerService } from './customer.service';

@Controller('customers')
export class CustomerController {
  constructor(private readonly customerService: CustomerService) {}

  @Post()
  create(@Body(new ZodValidationPipe(CreateCustomerSchema)) body: CreateCustomerInput): Promise<CustomerReadDto> {
    return this.customerService.create(body);
  }

  @Get(':id')
  findById(@Param('id', new ZodValidationPipe(IdSchema)) id: number): Promise<CustomerReadDto> {
    return this.customerService.findById(id);
  }

  @Put(':id')
  update(
    @Param('id', new ZodValidationPipe(IdSchema)) id: number,
    @Body(new ZodValidationPipe(UpdateCustomerSchema)) body: UpdateCustomerInput,
  ): Promise<CustomerReadDto> {
    return this.customerService.update(id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  delete(@Param('id', new ZodValidationPipe(IdSchema)) id: number): Promise<void> {
    return this.customerService.delete(id);
  }
}
