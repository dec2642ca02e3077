import Joi from 'joi';
import {
  COMPARATORS,
  DateRangeScope,
  Intent,
  METRICLESS_OPERATIONS,
  Metric,
  Operation,
  SNAPSHOT_OPERATIONS,
  ThresholdAppliesTo,
} from '../../types/intent';
import { ISO_DATE_RE, TIME_RE, inclusiveDaySpan, isIsoDate } from './dates';

export type ValidationOutcome =
  | { ok: true; intent: Intent }
  | { ok: false; kind: 'unsupported' | 'invalid'; reason: string };

const thresholdSchema = Joi.object({
  applies_to: Joi.string().valid(...Object.values(ThresholdAppliesTo)).required(),
  metric: Joi.string().valid(...Object.values(Metric)).required(),
  op: Joi.string().valid(...COMPARATORS).required(),
  // Bound against bigint columns
  value: Joi.number().integer().required(),
});

const intentSchema = Joi.object<Intent>({
  operation: Joi.string().valid(...Object.values(Operation)).required(),
  metric: Joi.string().valid(...Object.values(Metric)).allow(null).required(),
  date_range: Joi.object({
    scope: Joi.string().valid(...Object.values(DateRangeScope)).required(),
    start_date: Joi.string().pattern(ISO_DATE_RE).required(),
    end_date: Joi.string().pattern(ISO_DATE_RE).required(),
    inclusive: Joi.boolean().required(),
  })
    .allow(null)
    .required(),
  time_window: Joi.object({
    start_time: Joi.string().pattern(TIME_RE).required(),
    end_time: Joi.string().pattern(TIME_RE).required(),
  })
    .allow(null)
    .required(),
  filters: Joi.object({
    creator_id: Joi.string().min(1).allow(null).required(),
    thresholds: Joi.array().items(thresholdSchema).required(),
  }).required(),
});

const isEmpty = (raw: unknown): boolean =>
  raw === null ||
  raw === undefined ||
  (typeof raw === 'object' && !Array.isArray(raw) && Object.keys(raw).length === 0);

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/** Cross-field rules the schema cannot express. Returns the first violation, if any. */
function crossFieldViolation(intent: Intent): string | null {
  const { operation, metric, date_range: range, time_window: window, filters } = intent;

  if (METRICLESS_OPERATIONS.has(operation)) {
    if (metric !== null) return `${operation} takes no metric`;
  } else if (metric === null) {
    return `${operation} requires a metric`;
  }

  if (range) {
    if (!isIsoDate(range.start_date) || !isIsoDate(range.end_date)) {
      return 'date_range holds a date that does not exist';
    }
    if (range.start_date > range.end_date) {
      return 'date_range starts after it ends';
    }
    if (!range.inclusive && range.start_date === range.end_date) {
      return 'exclusive date_range is empty';
    }
    if (SNAPSHOT_OPERATIONS.has(operation) && range.scope !== DateRangeScope.SNAPSHOTS_CREATED_AT) {
      return `${operation} needs a snapshots_created_at date_range`;
    }
  }

  if (window) {
    if (!range || range.scope !== DateRangeScope.SNAPSHOTS_CREATED_AT) {
      return 'time_window needs a snapshots_created_at date_range';
    }
    const days = inclusiveDaySpan(range.start_date, range.end_date) - (range.inclusive ? 0 : 1);
    if (days !== 1) {
      return 'time_window needs a single-day date_range';
    }
    if (window.start_time > window.end_time) {
      return 'time_window starts after it ends';
    }
  }

  const asOf = filters.thresholds.some((t) => t.applies_to === ThresholdAppliesTo.SNAPSHOT_AS_OF);
  if (asOf && (!range || range.scope !== DateRangeScope.SNAPSHOTS_CREATED_AT)) {
    return 'snapshot_as_of threshold needs a snapshots_created_at date_range';
  }

  return null;
}

/**
 * The single trust boundary for intents. Rule and LLM output go through the same checks:
 * schema first (closed enums, no unknown keys, exact formats), then cross-field rules.
 * Accepted intents are deep-frozen copies.
 */
export class IntentValidator {
  validate(raw: unknown): ValidationOutcome {
    if (isEmpty(raw)) {
      return { ok: false, kind: 'unsupported', reason: 'empty intent' };
    }

    const { error, value } = intentSchema.validate(raw, { convert: false, abortEarly: true });
    if (error) {
      return { ok: false, kind: 'invalid', reason: error.message };
    }

    const violation = crossFieldViolation(value);
    if (violation) {
      return { ok: false, kind: 'invalid', reason: violation };
    }

    return { ok: true, intent: deepFreeze(structuredClone(value)) };
  }
}
