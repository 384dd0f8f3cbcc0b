import { Inject, Injectable, Logger } from '@nestjs/common';
import { NotFoundError, ValidationError } from '../common/errors';
import { Order, orderTimeOf } from './domain/order';
import { OrderRepository, OrderTransaction } from './domain/order.repository';
import { CreateOrderInput, OrderReadDto, UpdateOrderInput } from './order.dto';

export const ORDER_REPOSITORY = 'ORDER_REPOSITORY';

@Injectable()
export class OrderService {
  private readonly logger = new Logger(OrderService.name);

  constructor(@Inject(ORDER_REPOSITORY) private readonly orderRepository: OrderRepository) {}

  async createOrder(input: CreateOrderInput): Promise<OrderReadDto> {
    const order = await this.orderRepository.transaction(async (tx) => {
      if (!(await tx.customerExists(input.customer_id))) {
        throw new NotFoundError('Customer', input.customer_id);
      }
      await this.assertMenuItemsExist(input.item_ids, tx);
      const id = await tx.insert({
        customerId: input.customer_id,
        notes: input.order_notes ?? null,
        orderTime: orderTimeOf(new Date()),
        menuItemIds: input.item_ids,
      });
      return this.mustFind(id, tx);
    });
    this.logger.log(`Created order ${order.id} for customer ${order.customerId} with ${order.lines.length} line(s)`);
    return this.fromDomain(order);
  }

  async findById(id: number): Promise<OrderReadDto> {
    const order = await this.orderRepository.findById(id);
    if (order == null) {
      throw new NotFoundError('Order', id);
    }
    return this.fromDomain(order);
  }

  async updateOrder(id: number, input: UpdateOrderInput): Promise<OrderReadDto> {
    const order = await this.orderRepository.transaction(async (tx) => {
      if (!(await tx.exists(id))) {
        throw new NotFoundError('Order', id);
      }
      if (input.item_ids !== undefined) {
        await this.assertMenuItemsExist(input.item_ids, tx);
      }
      if (input.order_notes !== undefined) {
        await tx.updateNotes(id, input.order_notes);
      }
      if (input.item_ids !== undefined) {
        await tx.replaceLines(id, input.item_ids);
      }
      return this.mustFind(id, tx);
    });
    this.logger.log(`Updated order ${id}`);
    return this.fromDomain(order);
  }

  async deleteOrder(id: number): Promise<void> {
    await this.orderRepository.transaction(async (tx) => {
      if (!(await tx.exists(id))) {
        throw new NotFoundError('Order', id);
      }
      await tx.delete(id);
    });
    this.logger.log(`Deleted order ${id}`);
  }

  // reports every unknown id at once, in request order
  private async assertMenuItemsExist(menuItemIds: number[], tx: OrderTransaction): Promise<void> {
    const known = new Set(await tx.existingMenuItemIds(menuItemIds));
    const missing = [...new Set(menuItemIds)].filter((id) => !known.has(id));
    if (missing.length > 0) {
      this.logger.warn(`Rejected unknown menu item id(s) ${missing.join(', ')}`);
      throw new ValidationError(`Unknown menu item id(s): ${missing.join(', ')}`, { menu_item_ids: missing });
    }
  }

  private async mustFind(id: number, tx: OrderTransaction): Promise<Order> {
    const order = await tx.findById(id);
    if (order == null) {
      throw new NotFoundError('Order', id);
    }
    return order;
  }

  private fromDomain(domain: Order): OrderReadDto {
    return {
      id: domain.id,
      customer_id: domain.customerId,
      order_notes: domain.notes,
      timestamp: domain.orderTime,
      items: domain.lines.map((line) => ({
        id: line.menuItemId,
        dish_name: line.dishName,
        price: line.price,
      })),
      total: domain.total,
    };
  }
}
