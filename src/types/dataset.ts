import { Metric } from './intent';

export interface MetricTotals {
  viewsCount: number;
  likesCount: number;
  commentsCount: number;
  reportsCount: number;
}

export interface MetricDeltas {
  deltaViewsCount: number;
  deltaLikesCount: number;
  deltaCommentsCount: number;
  deltaReportsCount: number;
}

export interface VideoRecord extends MetricTotals {
  id: string;
  creatorId: string;
  videoCreatedAt: Date;
}

export interface SnapshotRecord extends MetricTotals, MetricDeltas {
  id: string;
  videoId: string;
  createdAt: Date;
}

export interface Dataset {
  videos: VideoRecord[];
  snapshots: SnapshotRecord[];
}

export const TOTAL_FIELDS: Record<Metric, keyof MetricTotals> = {
  [Metric.VIEWS]: 'viewsCount',
  [Metric.LIKES]: 'likesCount',
  [Metric.COMMENTS]: 'commentsCount',
  [Metric.REPORTS]: 'reportsCount',
};

export const DELTA_FIELDS: Record<Metric, keyof MetricDeltas> = {
  [Metric.VIEWS]: 'deltaViewsCount',
  [Metric.LIKES]: 'deltaLikesCount',
  [Metric.COMMENTS]: 'deltaCommentsCount',
  [Metric.REPORTS]: 'deltaReportsCount',
};
