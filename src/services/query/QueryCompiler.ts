import { DateRangeScope, Intent, Metric, Operation, ThresholdAppliesTo } from '../../types/intent';
import { InvalidIntentError } from '../../utils/errors';
import { afterMinute, atTimeOfDay, toHalfOpenInterval } from '../intent/dates';
import { Aggregation, AggregationPlan, PlanSource, RowPredicate, TimeBounds } from './AggregationPlan';

interface Recipe {
  source: PlanSource;
  aggregation: Aggregation;
  deltaSign?: 'positive' | 'negative';
}

function requireMetric(intent: Intent): Metric {
  if (intent.metric === null) {
    throw new InvalidIntentError(`${intent.operation} requires a metric`, 'compile');
  }
  return intent.metric;
}

function recipeFor(intent: Intent): Recipe {
  const { operation } = intent;

  switch (operation) {
    case Operation.COUNT_VIDEOS:
      return { source: 'videos', aggregation: { kind: 'count_rows' } };
    case Operation.COUNT_DISTINCT_CREATORS:
      return { source: 'videos', aggregation: { kind: 'count_distinct_creators' } };
    case Operation.COUNT_DISTINCT_PUBLISH_DAYS:
      return { source: 'videos', aggregation: { kind: 'count_distinct_publish_days' } };
    case Operation.SUM_TOTAL_METRIC:
      return { source: 'videos', aggregation: { kind: 'sum_video_total', metric: requireMetric(intent) } };
    case Operation.SUM_DELTA_METRIC:
      return { source: 'snapshots', aggregation: { kind: 'sum_snapshot_delta', metric: requireMetric(intent) } };
    case Operation.COUNT_DISTINCT_VIDEOS_WITH_POSITIVE_DELTA:
      return { source: 'snapshots', aggregation: { kind: 'count_distinct_videos' }, deltaSign: 'positive' };
    case Operation.COUNT_SNAPSHOTS_WITH_NEGATIVE_DELTA:
      return { source: 'snapshots', aggregation: { kind: 'count_rows' }, deltaSign: 'negative' };
    default: {
      const unknown: never = operation;
      throw new InvalidIntentError(`Unknown operation: ${String(unknown)}`, 'compile');
    }
  }
}

/**
 * Compiles a validated intent into an aggregation plan.
 *
 * The user's date range becomes a half-open UTC window here and nowhere else. A time
 * window narrows the snapshot-time predicate to `[day start_time, day end_time + 1 min)`,
 * so the end minute counts whole; the snapshot-max step keeps the full date window.
 */
export class QueryCompiler {
  compile(intent: Intent): AggregationPlan {
    const recipe = recipeFor(intent);
    const { date_range: range, time_window: window, filters } = intent;

    const dateWindow: TimeBounds | null =
      range && toHalfOpenInterval(range.start_date, range.end_date, range.inclusive);
    const snapshotScoped = range?.scope === DateRangeScope.SNAPSHOTS_CREATED_AT;

    if (window && (!range || !snapshotScoped)) {
      throw new InvalidIntentError('time_window without a snapshot-scoped date_range', 'compile');
    }
    const measuredWindow: TimeBounds | null =
      range && window
        ? {
            from: atTimeOfDay(range.start_date, window.start_time),
            to: afterMinute(range.start_date, window.end_time),
          }
        : dateWindow;

    const predicates: RowPredicate[] = [];

    if (recipe.deltaSign) {
      predicates.push({ kind: 'snapshot_delta', metric: requireMetric(intent), sign: recipe.deltaSign });
    }

    if (measuredWindow && dateWindow) {
      if (recipe.source === 'snapshots') {
        if (!snapshotScoped) {
          throw new InvalidIntentError(`${intent.operation} needs a snapshot-scoped date_range`, 'compile');
        }
        predicates.push({ kind: 'measured', bounds: measuredWindow });
      } else if (snapshotScoped) {
        predicates.push({ kind: 'has_snapshot', bounds: measuredWindow });
      } else {
        predicates.push({ kind: 'published', bounds: dateWindow });
      }
    }

    if (filters.creator_id !== null) {
      predicates.push({ kind: 'creator', creatorId: filters.creator_id });
    }

    const asOf = filters.thresholds.filter((t) => t.applies_to === ThresholdAppliesTo.SNAPSHOT_AS_OF);
    for (const { applies_to, metric, op, value } of filters.thresholds) {
      if (applies_to === ThresholdAppliesTo.FINAL_TOTAL) {
        predicates.push({ kind: 'video_total', metric, op, value });
      }
    }
    for (const { metric, op, value } of asOf) {
      predicates.push({ kind: 'snapshot_max', metric, op, value });
    }

    if (asOf.length > 0 && (!dateWindow || !snapshotScoped)) {
      throw new InvalidIntentError('snapshot_as_of threshold without a snapshot-scoped date_range', 'compile');
    }

    return {
      operation: intent.operation,
      source: recipe.source,
      aggregation: recipe.aggregation,
      predicates,
      snapshotMax: asOf.length > 0 && dateWindow ? { bounds: dateWindow } : null,
    };
  }
}
