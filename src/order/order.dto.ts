import { z } from 'zod';
import { ReferenceIdSchema } from '../common/zod-validation.pipe';

const referenceId = ReferenceIdSchema;

const orderNotes = z.string().nullable();

export const CreateOrderSchema = z.object({
  customer_id: referenceId,
  order_notes: orderNotes.optional(),
  item_ids: z.array(referenceId).min(1),
}).strict();

export const UpdateOrderSchema = z.object({
  order_notes: orderNotes.optional(),
  item_ids: z.array(referenceId).min(1).optional(),
}).strict()
  .refine((body) => Object.keys(body).length > 0, { message: 'At least one field is required' });

export type CreateOrderInput = z.infer<typeof CreateOrderSchema>;
export type UpdateOrderInput = z.infer<typeof UpdateOrderSchema>;

export type OrderItemReadDto = {
  id: number;
  dish_name: string;
  price: number;
};

export type OrderReadDto = {
  id: number;
  customer_id: number;
  order_notes: string | null;
  timestamp: number;
  items: OrderItemReadDto[];
  total: number;
};
