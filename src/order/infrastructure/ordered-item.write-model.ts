import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from "typeorm";
import { MenuItemWriteModel } from "../../menu-item/infrastructure/menu-item.write-model";
import { OrderWriteModel } from "./order.write-model";

@Entity({ name: 'ordered_items' })
export class OrderedItemWriteModel {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @ManyToOne(() => OrderWriteModel, { nullable: false })
  @JoinColumn({ name: 'order_id' })
  order?: OrderWriteModel;

  @Column({ name: 'menu_item_id', type: 'integer' })
  menuItemId!: number;

  @ManyToOne(() => MenuItemWriteModel, { nullable: false })
  @JoinColumn({ name: 'menu_item_id' })
  menuItem?: MenuItemWriteModel;
}
