import { Comparator, Metric, Operation } from '../../types/intent';

/** A half-open interval over UTC instants: `[from, to)`. */
export interface TimeBounds {
  from: Date;
  to: Date;
}

export type PlanSource = 'videos' | 'snapshots';

export type Aggregation =
  | { kind: 'count_rows' }
  | { kind: 'count_distinct_creators' }
  | { kind: 'count_distinct_publish_days' }
  | { kind: 'count_distinct_videos' }
  | { kind: 'sum_video_total'; metric: Metric }
  | { kind: 'sum_snapshot_delta'; metric: Metric };

export type RowPredicate =
  | { kind: 'creator'; creatorId: string }
  | { kind: 'published'; bounds: TimeBounds }
  /** Snapshot rows measured within the bounds */
  | { kind: 'measured'; bounds: TimeBounds }
  /** Video rows with at least one snapshot measured within the bounds */
  | { kind: 'has_snapshot'; bounds: TimeBounds }
  | { kind: 'video_total'; metric: Metric; op: Comparator; value: number }
  | { kind: 'snapshot_delta'; metric: Metric; sign: 'positive' | 'negative' }
  /** Compared against the per-video maxima of the snapshot-max step */
  | { kind: 'snapshot_max'; metric: Metric; op: Comparator; value: number };

/**
 * Grouped aggregate evaluated before the outer aggregation: per video, the maximum of each
 * snapshot total within `bounds`. Only videos with a snapshot in `bounds` take part.
 */
export interface SnapshotMaxStep {
  bounds: TimeBounds;
}

/** Executor-agnostic description of one scalar aggregation. Predicates are ANDed. */
export interface AggregationPlan {
  operation: Operation;
  source: PlanSource;
  aggregation: Aggregation;
  predicates: RowPredicate[];
  snapshotMax: SnapshotMaxStep | null;
}
