import { Comparator, Metric } from '../../types/intent';
import { Aggregation, AggregationPlan, RowPredicate, TimeBounds } from './AggregationPlan';

export interface RenderedQuery {
  sql: string;
  params: unknown[];
}

// Identifiers come only from these maps; every value is a bound parameter
export const TOTAL_COLUMNS: Record<Metric, string> = {
  [Metric.VIEWS]: 'views_count',
  [Metric.LIKES]: 'likes_count',
  [Metric.COMMENTS]: 'comments_count',
  [Metric.REPORTS]: 'reports_count',
};

export const DELTA_COLUMNS: Record<Metric, string> = {
  [Metric.VIEWS]: 'delta_views_count',
  [Metric.LIKES]: 'delta_likes_count',
  [Metric.COMMENTS]: 'delta_comments_count',
  [Metric.REPORTS]: 'delta_reports_count',
};

const OPERATORS: Record<Comparator, string> = {
  '>': '>',
  '>=': '>=',
  '<': '<',
  '<=': '<=',
  '=': '=',
};

class ParamList {
  readonly values: unknown[] = [];

  bind(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

const within = (column: string, bounds: TimeBounds, params: ParamList): string =>
  `${column} >= ${params.bind(bounds.from)} AND ${column} < ${params.bind(bounds.to)}`;

function selectExpression(aggregation: Aggregation): string {
  switch (aggregation.kind) {
    case 'count_rows':
      return 'COUNT(*)::bigint';
    case 'count_distinct_creators':
      return 'COUNT(DISTINCT v.creator_id)::bigint';
    case 'count_distinct_publish_days':
      return "COUNT(DISTINCT (v.video_created_at AT TIME ZONE 'UTC')::date)::bigint";
    case 'count_distinct_videos':
      return 'COUNT(DISTINCT v.id)::bigint';
    case 'sum_video_total':
      return `COALESCE(SUM(v.${TOTAL_COLUMNS[aggregation.metric]}), 0)::bigint`;
    case 'sum_snapshot_delta':
      return `COALESCE(SUM(s.${DELTA_COLUMNS[aggregation.metric]}), 0)::bigint`;
  }
}

function predicateClause(predicate: RowPredicate, params: ParamList): string {
  switch (predicate.kind) {
    case 'creator':
      return `v.creator_id = ${params.bind(predicate.creatorId)}`;
    case 'published':
      return within('v.video_created_at', predicate.bounds, params);
    case 'measured':
      return within('s.created_at', predicate.bounds, params);
    case 'has_snapshot':
      return (
        'EXISTS (SELECT 1 FROM video_snapshots hs WHERE hs.video_id = v.id AND ' +
        `${within('hs.created_at', predicate.bounds, params)})`
      );
    case 'video_total':
      return `v.${TOTAL_COLUMNS[predicate.metric]} ${OPERATORS[predicate.op]} ${params.bind(predicate.value)}`;
    case 'snapshot_delta':
      return `s.${DELTA_COLUMNS[predicate.metric]} ${predicate.sign === 'positive' ? '>' : '<'} 0`;
    case 'snapshot_max':
      return `sm.${TOTAL_COLUMNS[predicate.metric]} ${OPERATORS[predicate.op]} ${params.bind(predicate.value)}`;
  }
}

/**
 * Renders a plan as one parameterized Postgres statement returning a single bigint.
 * The snapshot-max step becomes the `snap_max` CTE joined on video id.
 */
export function renderSql(plan: AggregationPlan): RenderedQuery {
  const params = new ParamList();

  let cte = '';
  if (plan.snapshotMax) {
    const maxima = Object.values(TOTAL_COLUMNS)
      .map((column) => `MAX(s.${column}) AS ${column}`)
      .join(', ');
    cte =
      `WITH snap_max AS (SELECT s.video_id, ${maxima} FROM video_snapshots s ` +
      `WHERE ${within('s.created_at', plan.snapshotMax.bounds, params)} GROUP BY s.video_id) `;
  }

  let from =
    plan.source === 'videos' ? 'FROM videos v' : 'FROM video_snapshots s JOIN videos v ON v.id = s.video_id';
  if (plan.snapshotMax) {
    from += ' JOIN snap_max sm ON sm.video_id = v.id';
  }

  const clauses = plan.predicates.map((predicate) => predicateClause(predicate, params));
  const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';

  return {
    sql: `${cte}SELECT ${selectExpression(plan.aggregation)} AS value ${from}${where}`,
    params: params.values,
  };
}
