import { ValueTransformer } from 'typeorm';

// pg returns bigint columns as strings
export const bigintTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? 0 : Number(value)),
};
