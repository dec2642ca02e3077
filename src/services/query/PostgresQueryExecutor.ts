import { logger } from '../../config/logger';
import { ExecutionError, errorMessage } from '../../utils/errors';
import { AggregationPlan } from './AggregationPlan';
import { QueryExecutor, toSafeInteger } from './QueryExecutor';
import { renderSql } from './sqlRenderer';

/** The slice of a TypeORM `DataSource` the executor uses. */
export interface SqlRunner {
  query(sql: string, parameters?: unknown[]): Promise<unknown>;
}

export class PostgresQueryExecutor implements QueryExecutor {
  constructor(private readonly db: SqlRunner) {}

  async execute(plan: AggregationPlan): Promise<number> {
    const { sql, params } = renderSql(plan);
    logger.debug(`🔍 ${plan.operation}: ${sql}`);

    let rows: unknown;
    try {
      rows = await this.db.query(sql, params);
    } catch (error) {
      throw new ExecutionError(`Query failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!Array.isArray(rows) || rows.length === 0) {
      throw new ExecutionError('Query returned no rows');
    }
    const row: unknown = rows[0];
    if (typeof row !== 'object' || row === null) {
      throw new ExecutionError('Query returned a malformed row');
    }

    const values = Object.values(row);
    if (values.length !== 1) {
      throw new ExecutionError(`Query returned ${values.length} columns, expected 1`);
    }
    if (values[0] === null) {
      throw new ExecutionError('Query returned NULL');
    }
    return toSafeInteger(values[0]);
  }
}
