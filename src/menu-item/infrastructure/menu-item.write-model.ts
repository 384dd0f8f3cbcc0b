import { Check, Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { numericTransformer } from '../../common/numeric.transformer';

@Entity({ name: 'menu_items' })
@Check('CHK_menu_items_price', 'price >= 0')
export class MenuItemWriteModel {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'dish_name', type: 'text', unique: true })
  dishName!: string;

  @Column({ name: 'price', type: 'decimal', precision: 10, scale: 2, transformer: numericTransformer })
  price!: number;
}
