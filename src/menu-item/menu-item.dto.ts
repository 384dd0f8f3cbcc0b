import { z } from 'zod';

// decimal(10,2)
const price = z.number().finite().nonnegative().max(99999999.99)
  .transform((value) => Math.round(value * 100) / 100);

export const CreateMenuItemSchema = z.object({
  dish_name: z.string().trim().min(1),
  price,
}).strict();

export const UpdateMenuItemSchema = CreateMenuItemSchema.partial().strict()
  .refine((body) => Object.keys(body).length > 0, { message: 'At least one field is required' });

export type CreateMenuItemInput = z.infer<typeof CreateMenuItemSchema>;
export type UpdateMenuItemInput = z.infer<typeof UpdateMenuItemSchema>;

export type MenuItemReadDto = {
  id: number;
  dish_name: string;
  price: number;
};
