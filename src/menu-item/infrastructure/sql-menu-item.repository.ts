import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { ConflictError } from '../../common/errors';
import { TransactionRunner } from '../../common/transaction-runner';
import { OrderedItemWriteModel } from '../../order/infrastructure/ordered-item.write-model';
import { MenuItem, MenuItemProps } from '../domain/menu-item';
import { MenuItemRepository } from '../domain/menu-item.repository';
import { MenuItemWriteModel } from './menu-item.write-model';

@Injectable()
export class SqlMenuItemRepository implements MenuItemRepository {
  constructor(
    @InjectRepository(MenuItemWriteModel)
    private readonly menuItemWriteModelRepository: Repository<MenuItemWriteModel>,
    private readonly transactions: TransactionRunner,
  ) {}

  async create(props: MenuItemProps): Promise<MenuItem> {
    return this.transactions.run(async (manager) => {
      await this.assertDishNameAvailable(props.dishName, null, manager);
      const record = await manager.save(this.toRecord(props));
      return this.fromRecord(record);
    }, 'dish_name');
  }

  async findById(id: number): Promise<MenuItem | null> {
    const record = await this.transactions.read(() => this.menuItemWriteModelRepository.findOneBy({ id }));
    return record != null ? this.fromRecord(record) : null;
  }

  async update(id: number, changes: Partial<MenuItemProps>): Promise<MenuItem | null> {
    return this.transactions.run(async (manager) => {
      const record = await manager.findOneBy(MenuItemWriteModel, { id });
      if (record == null) {
        return null;
      }
      if (changes.dishName !== undefined) {
        await this.assertDishNameAvailable(changes.dishName, id, manager);
      }
      await manager.createQueryBuilder()
        .update(MenuItemWriteModel)
        .set(changes)
        .where('id = :id', { id })
        .execute();
      return this.fromRecord({ ...record, ...changes });
    }, 'dish_name');
  }

  async delete(id: number): Promise<boolean> {
    return this.transactions.run(async (manager) => {
      if ((await manager.countBy(MenuItemWriteModel, { id })) === 0) {
        return false;
      }
      const lines = await manager.countBy(OrderedItemWriteModel, { menuItemId: id });
      if (lines > 0) {
        throw new ConflictError('menu_item_id', `Menu item ${id} is used by ${lines} order line(s) and cannot be deleted`);
      }
      await manager.delete(MenuItemWriteModel, { id });
      return true;
    }, 'menu_item_id');
  }

  private async assertDishNameAvailable(dishName: string, ownerId: number | null, manager: EntityManager): Promise<void> {
    const holder = await manager.findOneBy(MenuItemWriteModel, { dishName });
    if (holder != null && holder.id !== ownerId) {
      throw new ConflictError('dish_name', `Dish ${dishName} is already on the menu`);
    }
  }

  private toRecord(props: MenuItemProps): MenuItemWriteModel {
    const record = new MenuItemWriteModel();
    record.dishName = props.dishName;
    record.price = props.price;
    return record;
  }

  private fromRecord(record: MenuItemWriteModel): MenuItem {
    const { id, dishName, price } = record;
    return MenuItem.restore(id, { dishName, price });
  }
}
