import { Metric, Operation } from '../../../types/intent';
import { ExecutionError } from '../../../utils/errors';
import { finalTotal, makeIntent } from '../../__tests__/fixtures/intents';
import { PostgresQueryExecutor } from '../PostgresQueryExecutor';
import { QueryCompiler } from '../QueryCompiler';

describe('PostgresQueryExecutor', () => {
  const query = jest.fn();
  const executor = new PostgresQueryExecutor({ query });
  const plan = new QueryCompiler().compile(
    makeIntent({ filters: { thresholds: [finalTotal({ metric: Metric.LIKES, op: '>=', value: 10 })] } })
  );

  beforeEach(() => {
    query.mockReset();
  });

  it('runs the rendered statement and reads the bigint column', async () => {
    query.mockResolvedValue([{ value: '42' }]);

    await expect(executor.execute(plan)).resolves.toBe(42);
    expect(query).toHaveBeenCalledWith(
      'SELECT COUNT(*)::bigint AS value FROM videos v WHERE v.likes_count >= $1',
      [10]
    );
  });

  it('accepts numeric driver values', async () => {
    query.mockResolvedValue([{ value: 0 }]);
    await expect(executor.execute(plan)).resolves.toBe(0);
  });

  it('wraps driver failures', async () => {
    query.mockRejectedValue(new Error('canceling statement due to statement timeout'));
    await expect(executor.execute(plan)).rejects.toThrow(
      new ExecutionError('Query failed: canceling statement due to statement timeout')
    );
  });

  it.each([
    ['no rows', [], 'Query returned no rows'],
    ['a non-array result', { value: 1 }, 'Query returned no rows'],
    ['a scalar row', [7], 'Query returned a malformed row'],
    ['extra columns', [{ value: '1', other: '2' }], 'Query returned 2 columns, expected 1'],
    ['NULL', [{ value: null }], 'Query returned NULL'],
    ['a fraction', [{ value: '12.5' }], 'Aggregate is not an integer: 12.5'],
    ['an unsafe integer', [{ value: '9007199254740993' }], 'Aggregate is outside the safe integer range: 9007199254740993'],
  ])('rejects %s', async (_case, rows, message) => {
    query.mockResolvedValue(rows);

    const result = executor.execute(plan);
    await expect(result).rejects.toBeInstanceOf(ExecutionError);
    await expect(result).rejects.toThrow(message);
  });
});
