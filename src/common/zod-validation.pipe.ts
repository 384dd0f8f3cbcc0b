import { PipeTransform } from '@nestjs/common';
import { z, ZodTypeAny } from 'zod';
import { ValidationError } from './errors';

// ids live in 32-bit integer columns
export const ReferenceIdSchema = z.number().int().positive().max(2147483647);

/** Path `:id`: plain digits only, so `1e3` or `0x10` are not ids. */
export const IdSchema = z.string()
  .regex(/^\d+$/, 'Expected a positive integer')
  .transform(Number)
  .pipe(ReferenceIdSchema);

export class ZodValidationPipe<T extends ZodTypeAny> implements PipeTransform<unknown, z.output<T>> {
  constructor(private readonly schema: T) {}

  transform(value: unknown): z.output<T> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ValidationError('Validation error', { issues });
    }
    return result.data;
  }
}
