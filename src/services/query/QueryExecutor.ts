import { ExecutionError } from '../../utils/errors';
import { AggregationPlan } from './AggregationPlan';

export interface QueryExecutor {
  /** Resolves to the plan's single integer, or rejects with `ExecutionError`. */
  execute(plan: AggregationPlan): Promise<number>;
}

const INTEGER_RE = /^-?\d+$/;

/** Accepts a driver scalar (number, bigint or numeric string) that is a safe integer. */
export function toSafeInteger(value: unknown): number {
  let result: number;

  if (typeof value === 'number') {
    result = value;
  } else if (typeof value === 'bigint') {
    result = Number(value);
  } else if (typeof value === 'string' && INTEGER_RE.test(value)) {
    result = Number(value);
  } else {
    throw new ExecutionError(`Aggregate is not an integer: ${String(value)}`);
  }

  if (!Number.isSafeInteger(result)) {
    throw new ExecutionError(`Aggregate is outside the safe integer range: ${String(value)}`);
  }
  return result;
}
