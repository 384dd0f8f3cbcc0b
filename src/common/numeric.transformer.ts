import { ValueTransformer } from 'typeorm';

// pg hands back numeric and bigint columns as strings
export const numericTransformer: ValueTransformer = {
  to: (value: number) => value,
  from: (value: string | number | null) => (value == null ? value : Number(value)),
};
