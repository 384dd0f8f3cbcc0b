import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from "typeorm";
import { numericTransformer } from "../../common/numeric.transformer";
import { CustomerWriteModel } from "../../customer/infrastructure/customer.write-model";

@Entity({ name: 'customer_orders' })
export class OrderWriteModel {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'customer_id', type: 'integer' })
  customerId!: number;

  @ManyToOne(() => CustomerWriteModel, { nullable: false })
  @JoinColumn({ name: 'customer_id' })
  customer?: CustomerWriteModel;

  @Column({ name: 'order_notes', type: 'text', nullable: true })
  orderNotes!: string | null;

  @Column({ name: 'order_time', type: 'bigint', transformer: numericTransformer })
  orderTime!: number;
}
