import { Metric, Operation } from '../../../types/intent';
import { ExecutionError } from '../../../utils/errors';
import { parseDataset } from '../../dataset/datasetFile';
import { loadFixtureDataset } from '../../__tests__/fixtures/dataset';
import { asOf, finalTotal, makeIntent, measured, published } from '../../__tests__/fixtures/intents';
import { InMemoryQueryExecutor } from '../InMemoryQueryExecutor';
import { QueryCompiler } from '../QueryCompiler';

describe('InMemoryQueryExecutor', () => {
  const compiler = new QueryCompiler();
  const executor = new InMemoryQueryExecutor(loadFixtureDataset());
  const run = (...args: Parameters<typeof makeIntent>) => executor.execute(compiler.compile(makeIntent(...args)));

  describe('publish-date operations', () => {
    it('counts videos on both sides of the range edges', async () => {
      await expect(run({ date_range: published('2025-11-01', '2025-11-05') })).resolves.toBe(3);
      await expect(run({ date_range: published('2025-11-01', '2025-11-05', false) })).resolves.toBe(2);
    });

    it('counts distinct creators and publish days', async () => {
      const date_range = published('2025-11-01', '2025-11-05');
      await expect(run({ operation: Operation.COUNT_DISTINCT_CREATORS, date_range })).resolves.toBe(2);
      await expect(run({ operation: Operation.COUNT_DISTINCT_PUBLISH_DAYS, date_range })).resolves.toBe(3);
    });

    it('filters by creator', async () => {
      await expect(run({ filters: { creator_id: 'creator-alpha' } })).resolves.toBe(2);
      await expect(run({ filters: { creator_id: 'creator-unknown' } })).resolves.toBe(0);
    });

    it('sums final totals under thresholds', async () => {
      const likes = finalTotal({ metric: Metric.LIKES, op: '>', value: 100000 });
      await expect(
        run({ operation: Operation.SUM_TOTAL_METRIC, metric: Metric.VIEWS, filters: { thresholds: [likes] } })
      ).resolves.toBe(320000);
      await expect(
        run({
          operation: Operation.SUM_TOTAL_METRIC,
          metric: Metric.VIEWS,
          filters: { thresholds: [likes, finalTotal({ metric: Metric.VIEWS, op: '<', value: 150000 })] },
        })
      ).resolves.toBe(120000);
    });

    it('sums to zero over no rows', async () => {
      await expect(
        run({ operation: Operation.SUM_TOTAL_METRIC, metric: Metric.VIEWS, date_range: published('2024-01-01') })
      ).resolves.toBe(0);
    });
  });

  describe('snapshot operations', () => {
    it('sums growth over a day and over a band within it', async () => {
      const base = { operation: Operation.SUM_DELTA_METRIC, metric: Metric.VIEWS, date_range: measured('2025-11-03') };
      await expect(run(base)).resolves.toBe(123600);
      await expect(run({ ...base, time_window: { start_time: '10:00', end_time: '13:00' } })).resolves.toBe(123300);
    });

    it('counts the whole end minute of a time window', async () => {
      const snapshot = (id: string, created_at: string, delta_views_count: number) => ({
        id,
        created_at,
        views_count: 100,
        likes_count: 0,
        comments_count: 0,
        reports_count: 0,
        delta_views_count,
        delta_likes_count: 0,
        delta_comments_count: 0,
        delta_reports_count: 0,
      });
      const seconds = new InMemoryQueryExecutor(
        parseDataset({
          videos: [
            {
              id: 'vid-s',
              creator_id: 'creator-alpha',
              video_created_at: '2025-11-01T00:00:00Z',
              views_count: 100,
              likes_count: 0,
              comments_count: 0,
              reports_count: 0,
              snapshots: [
                snapshot('snap-a', '2025-11-03T15:00:30Z', 5),
                snapshot('snap-b', '2025-11-03T15:01:00Z', 7),
                snapshot('snap-c', '2025-11-03T23:59:59Z', 11),
              ],
            },
          ],
        })
      );
      const growth = (start_time: string, end_time: string) =>
        seconds.execute(
          compiler.compile(
            makeIntent({
              operation: Operation.SUM_DELTA_METRIC,
              metric: Metric.VIEWS,
              date_range: measured('2025-11-03'),
              time_window: { start_time, end_time },
            })
          )
        );

      await expect(growth('10:00', '15:00')).resolves.toBe(5);
      await expect(growth('00:00', '23:59')).resolves.toBe(23);
    });

    it('counts snapshots with a negative delta', async () => {
      const base = { operation: Operation.COUNT_SNAPSHOTS_WITH_NEGATIVE_DELTA, metric: Metric.COMMENTS };
      await expect(run({ ...base, date_range: measured('2025-11-03') })).resolves.toBe(1);
      await expect(run({ ...base, date_range: measured('2025-11-03', '2025-11-04') })).resolves.toBe(2);
    });

    it('counts each growing video once', async () => {
      const base = { operation: Operation.COUNT_DISTINCT_VIDEOS_WITH_POSITIVE_DELTA, metric: Metric.VIEWS };
      await expect(run({ ...base, date_range: measured('2025-11-03') })).resolves.toBe(3);
      await expect(run(base)).resolves.toBe(4);
    });
  });

  describe('thresholds against snapshot-scoped ranges', () => {
    const date_range = measured('2025-11-03');

    it('compares final totals of videos measured in the range', async () => {
      await expect(
        run({ date_range, filters: { thresholds: [finalTotal({ metric: Metric.VIEWS, op: '>', value: 4000 })] } })
      ).resolves.toBe(2);
    });

    it('compares the per-video maximum within the range', async () => {
      const views = (op: '>' | '>=', value: number) => ({
        date_range,
        filters: { thresholds: [asOf({ metric: Metric.VIEWS, op, value })] },
      });
      await expect(run(views('>', 4000))).resolves.toBe(1);
      await expect(run(views('>', 1000))).resolves.toBe(2);
      await expect(run(views('>=', 1000))).resolves.toBe(3);
    });

    it('takes the maximum over the whole day under a time window', async () => {
      await expect(
        run({
          date_range,
          time_window: { start_time: '10:00', end_time: '13:00' },
          filters: { thresholds: [asOf({ metric: Metric.VIEWS, op: '>=', value: 1000 })] },
        })
      ).resolves.toBe(3);
    });
  });

  describe('failures', () => {
    it('rejects aggregates beyond the safe integer range', async () => {
      const video = (id: string) => ({
        id,
        creator_id: 'creator-alpha',
        video_created_at: '2025-11-01T00:00:00Z',
        views_count: Number.MAX_SAFE_INTEGER,
        likes_count: 0,
        comments_count: 0,
        reports_count: 0,
      });
      const huge = new InMemoryQueryExecutor(parseDataset({ videos: [video('a'), video('b')] }));

      await expect(
        huge.execute(compiler.compile(makeIntent({ operation: Operation.SUM_TOTAL_METRIC, metric: Metric.VIEWS })))
      ).rejects.toThrow(new ExecutionError('Aggregate is outside the safe integer range: 18014398509481982'));
    });

    it('rejects snapshot predicates on video rows', async () => {
      const bounds = { from: new Date('2025-11-03T00:00:00Z'), to: new Date('2025-11-04T00:00:00Z') };
      await expect(
        executor.execute({
          operation: Operation.COUNT_VIDEOS,
          source: 'videos',
          aggregation: { kind: 'count_rows' },
          predicates: [{ kind: 'measured', bounds }],
          snapshotMax: null,
        })
      ).rejects.toBeInstanceOf(ExecutionError);
    });
  });
});
