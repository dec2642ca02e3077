import { Comparator } from '../../types/intent';
import {
  DELTA_FIELDS,
  Dataset,
  MetricTotals,
  SnapshotRecord,
  TOTAL_FIELDS,
  VideoRecord,
} from '../../types/dataset';
import { ExecutionError } from '../../utils/errors';
import { Aggregation, AggregationPlan, RowPredicate, TimeBounds } from './AggregationPlan';
import { QueryExecutor, toSafeInteger } from './QueryExecutor';

interface Row {
  video: VideoRecord;
  snapshot: SnapshotRecord | null;
}

const COMPARE: Record<Comparator, (left: number, right: number) => boolean> = {
  '>': (l, r) => l > r,
  '>=': (l, r) => l >= r,
  '<': (l, r) => l < r,
  '<=': (l, r) => l <= r,
  '=': (l, r) => l === r,
};

const within = (instant: Date, { from, to }: TimeBounds): boolean => {
  const t = instant.getTime();
  return t >= from.getTime() && t < to.getTime();
};

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

function snapshotOf(row: Row): SnapshotRecord {
  if (row.snapshot === null) {
    throw new ExecutionError('Snapshot predicate on a videos plan');
  }
  return row.snapshot;
}

/**
 * Evaluates plans over an in-process dataset with the same semantics as the SQL rendering.
 * Backs the offline `ask --dataset` mode and the tests.
 */
export class InMemoryQueryExecutor implements QueryExecutor {
  private readonly videosById: Map<string, VideoRecord>;
  private readonly snapshotsByVideo = new Map<string, SnapshotRecord[]>();

  constructor(private readonly dataset: Dataset) {
    this.videosById = new Map(dataset.videos.map((video) => [video.id, video]));
    for (const snapshot of dataset.snapshots) {
      const list = this.snapshotsByVideo.get(snapshot.videoId) ?? [];
      list.push(snapshot);
      this.snapshotsByVideo.set(snapshot.videoId, list);
    }
  }

  async execute(plan: AggregationPlan): Promise<number> {
    const maxima = plan.snapshotMax ? this.snapshotMaxima(plan.snapshotMax.bounds) : null;

    const rows = this.sourceRows(plan).filter(
      (row) =>
        (maxima === null || maxima.has(row.video.id)) &&
        plan.predicates.every((predicate) => this.matches(predicate, row, maxima))
    );

    return toSafeInteger(this.aggregate(plan.aggregation, rows));
  }

  private sourceRows(plan: AggregationPlan): Row[] {
    if (plan.source === 'videos') {
      return this.dataset.videos.map((video) => ({ video, snapshot: null }));
    }
    // Inner join: snapshots of unknown videos drop out
    return this.dataset.snapshots.flatMap((snapshot) => {
      const video = this.videosById.get(snapshot.videoId);
      return video ? [{ video, snapshot }] : [];
    });
  }

  private snapshotMaxima(bounds: TimeBounds): Map<string, MetricTotals> {
    const maxima = new Map<string, MetricTotals>();
    for (const snapshot of this.dataset.snapshots) {
      if (!within(snapshot.createdAt, bounds)) continue;

      const current = maxima.get(snapshot.videoId);
      maxima.set(snapshot.videoId, {
        viewsCount: Math.max(current?.viewsCount ?? -Infinity, snapshot.viewsCount),
        likesCount: Math.max(current?.likesCount ?? -Infinity, snapshot.likesCount),
        commentsCount: Math.max(current?.commentsCount ?? -Infinity, snapshot.commentsCount),
        reportsCount: Math.max(current?.reportsCount ?? -Infinity, snapshot.reportsCount),
      });
    }
    return maxima;
  }

  private matches(predicate: RowPredicate, row: Row, maxima: Map<string, MetricTotals> | null): boolean {
    switch (predicate.kind) {
      case 'creator':
        return row.video.creatorId === predicate.creatorId;
      case 'published':
        return within(row.video.videoCreatedAt, predicate.bounds);
      case 'measured':
        return within(snapshotOf(row).createdAt, predicate.bounds);
      case 'has_snapshot':
        return (this.snapshotsByVideo.get(row.video.id) ?? []).some((snapshot) =>
          within(snapshot.createdAt, predicate.bounds)
        );
      case 'video_total':
        return COMPARE[predicate.op](row.video[TOTAL_FIELDS[predicate.metric]], predicate.value);
      case 'snapshot_delta': {
        const delta = snapshotOf(row)[DELTA_FIELDS[predicate.metric]];
        return predicate.sign === 'positive' ? delta > 0 : delta < 0;
      }
      case 'snapshot_max': {
        const videoMax = maxima?.get(row.video.id);
        if (!videoMax) return false;
        return COMPARE[predicate.op](videoMax[TOTAL_FIELDS[predicate.metric]], predicate.value);
      }
    }
  }

  private aggregate(aggregation: Aggregation, rows: Row[]): number {
    switch (aggregation.kind) {
      case 'count_rows':
        return rows.length;
      case 'count_distinct_creators':
        return new Set(rows.map((row) => row.video.creatorId)).size;
      case 'count_distinct_publish_days':
        return new Set(rows.map((row) => row.video.videoCreatedAt.toISOString().slice(0, 10))).size;
      case 'count_distinct_videos':
        return new Set(rows.map((row) => row.video.id)).size;
      case 'sum_video_total':
        return sum(rows.map((row) => row.video[TOTAL_FIELDS[aggregation.metric]]));
      case 'sum_snapshot_delta':
        return sum(rows.map((row) => snapshotOf(row)[DELTA_FIELDS[aggregation.metric]]));
    }
  }
}
