import { Inject, Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../common/errors';
import { MenuItem, MenuItemProps } from './domain/menu-item';
import { MenuItemRepository } from './domain/menu-item.repository';
import { CreateMenuItemInput, MenuItemReadDto, UpdateMenuItemInput } from './menu-item.dto';

export const MENU_ITEM_REPOSITORY = 'MENU_ITEM_REPOSITORY';

@Injectable()
export class MenuItemService {
  private readonly logger = new Logger(MenuItemService.name);

  constructor(@Inject(MENU_ITEM_REPOSITORY) private readonly menuItemRepository: MenuItemRepository) {}

  async create(input: CreateMenuItemInput): Promise<MenuItemReadDto> {
    const item = await this.menuItemRepository.create({ dishName: input.dish_name, price: input.price });
    this.logger.log(`Created menu item ${item.id} (${item.dishName})`);
    return this.fromDomain(item);
  }

  async findById(id: number): Promise<MenuItemReadDto> {
    const item = await this.menuItemRepository.findById(id);
    if (item == null) {
      throw new NotFoundError('Menu item', id);
    }
    return this.fromDomain(item);
  }

  async update(id: number, input: UpdateMenuItemInput): Promise<MenuItemReadDto> {
    const changes: Partial<MenuItemProps> = {};
    if (input.dish_name !== undefined) {
      changes.dishName = input.dish_name;
    }
    if (input.price !== undefined) {
      changes.price = input.price;
    }
    const item = await this.menuItemRepository.update(id, changes);
    if (item == null) {
      throw new NotFoundError('Menu item', id);
    }
    this.logger.log(`Updated menu item ${id}`);
    return this.fromDomain(item);
  }

  async delete(id: number): Promise<void> {
    if (!(await this.menuItemRepository.delete(id))) {
      throw new NotFoundError('Menu item', id);
    }
    this.logger.log(`Deleted menu item ${id}`);
  }

  private fromDomain(domain: MenuItem): MenuItemReadDto {
    return { id: domain.id, dish_name: domain.dishName, price: domain.price };
  }
}
