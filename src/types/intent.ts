// Query intent contract shared by every intent producer, the validator and the compiler.
// Field names follow the JSON wire format.

export enum Operation {
  COUNT_VIDEOS = 'count_videos',
  COUNT_DISTINCT_CREATORS = 'count_distinct_creators',
  COUNT_DISTINCT_PUBLISH_DAYS = 'count_distinct_publish_days',
  SUM_TOTAL_METRIC = 'sum_total_metric',
  SUM_DELTA_METRIC = 'sum_delta_metric',
  COUNT_DISTINCT_VIDEOS_WITH_POSITIVE_DELTA = 'count_distinct_videos_with_positive_delta',
  COUNT_SNAPSHOTS_WITH_NEGATIVE_DELTA = 'count_snapshots_with_negative_delta',
}

export enum Metric {
  VIEWS = 'views',
  LIKES = 'likes',
  COMMENTS = 'comments',
  REPORTS = 'reports',
}

export enum DateRangeScope {
  VIDEOS_PUBLISHED_AT = 'videos_published_at',
  SNAPSHOTS_CREATED_AT = 'snapshots_created_at',
}

export enum ThresholdAppliesTo {
  FINAL_TOTAL = 'final_total',
  SNAPSHOT_AS_OF = 'snapshot_as_of',
}

export type Comparator = '>' | '>=' | '<' | '<=' | '=';

export const COMPARATORS: readonly Comparator[] = ['>', '>=', '<', '<=', '='];

/** Operations that count videos, creators or days and never take a metric. */
export const METRICLESS_OPERATIONS: ReadonlySet<Operation> = new Set([
  Operation.COUNT_VIDEOS,
  Operation.COUNT_DISTINCT_CREATORS,
  Operation.COUNT_DISTINCT_PUBLISH_DAYS,
]);

/** Operations aggregating snapshot rows; their date range must be snapshot-scoped. */
export const SNAPSHOT_OPERATIONS: ReadonlySet<Operation> = new Set([
  Operation.SUM_DELTA_METRIC,
  Operation.COUNT_DISTINCT_VIDEOS_WITH_POSITIVE_DELTA,
  Operation.COUNT_SNAPSHOTS_WITH_NEGATIVE_DELTA,
]);

export interface DateRange {
  scope: DateRangeScope;
  /** YYYY-MM-DD, UTC calendar day */
  start_date: string;
  /** YYYY-MM-DD, UTC calendar day */
  end_date: string;
  inclusive: boolean;
}

export interface TimeWindow {
  /** HH:MM, UTC */
  start_time: string;
  /** HH:MM, UTC */
  end_time: string;
}

export interface Threshold {
  applies_to: ThresholdAppliesTo;
  metric: Metric;
  op: Comparator;
  value: number;
}

export interface IntentFilters {
  creator_id: string | null;
  thresholds: Threshold[];
}

export interface Intent {
  operation: Operation;
  metric: Metric | null;
  date_range: DateRange | null;
  time_window: TimeWindow | null;
  filters: IntentFilters;
}

export type IntentSource = 'rules' | 'llm';
