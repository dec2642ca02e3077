import {
  DateRange,
  DateRangeScope,
  Intent,
  IntentFilters,
  Operation,
  Threshold,
  ThresholdAppliesTo,
} from '../../../types/intent';

export const published = (start_date: string, end_date = start_date, inclusive = true): DateRange => ({
  scope: DateRangeScope.VIDEOS_PUBLISHED_AT,
  start_date,
  end_date,
  inclusive,
});

export const measured = (start_date: string, end_date = start_date, inclusive = true): DateRange => ({
  scope: DateRangeScope.SNAPSHOTS_CREATED_AT,
  start_date,
  end_date,
  inclusive,
});

export const finalTotal = (threshold: Omit<Threshold, 'applies_to'>): Threshold => ({
  applies_to: ThresholdAppliesTo.FINAL_TOTAL,
  ...threshold,
});

export const asOf = (threshold: Omit<Threshold, 'applies_to'>): Threshold => ({
  applies_to: ThresholdAppliesTo.SNAPSHOT_AS_OF,
  ...threshold,
});

type IntentOverrides = Partial<Omit<Intent, 'filters'>> & { filters?: Partial<IntentFilters> };

/** A metricless, unfiltered `count_videos` intent with the given fields replaced. */
export const makeIntent = ({ filters, ...rest }: IntentOverrides = {}): Intent => ({
  operation: Operation.COUNT_VIDEOS,
  metric: null,
  date_range: null,
  time_window: null,
  ...rest,
  filters: { creator_id: null, thresholds: [], ...filters },
});
