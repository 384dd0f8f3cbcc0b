import { MenuItem, MenuItemProps } from './menu-item';

export interface MenuItemRepository {
  create(props: MenuItemProps): Promise<MenuItem>;
  findById(id: number): Promise<MenuItem | null>;
  update(id: number, changes: Partial<MenuItemProps>): Promise<MenuItem | null>;
  /** Items referenced by an order line are never deleted. */
  delete(id: number): Promise<boolean>;
}
