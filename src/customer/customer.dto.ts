import { z } from 'zod';

export const CreateCustomerSchema = z.object({
  name: z.string().trim().min(1),
  phone: z.string().trim().min(1),
}).strict();

export const UpdateCustomerSchema = CreateCustomerSchema.partial().strict()
  .refine((body) => Object.keys(body).length > 0, { message: 'At least one field is required' });

export type CreateCustomerInput = z.infer<typeof CreateCustomerSchema>;
export type UpdateCustomerInput = z.infer<typeof UpdateCustomerSchema>;

export type CustomerReadDto = {
  id: number;
  name: string;
  phone: string;
};
