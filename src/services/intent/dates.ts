import { DateTime } from 'luxon';
import { MONTH_BY_FORM, MONTH_PATTERN } from './lexicon';

// All user dates are UTC calendar days.

export const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
export const TIME_RE = /^([01]\d|2[0-3]):[0-5]\d$/;

export interface CalendarRange {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
}

export type DateExtraction =
  | { kind: 'none' }
  | { kind: 'range'; range: CalendarRange; rest: string }
  | { kind: 'error'; reason: string };

export interface HalfOpenInterval {
  from: Date;
  to: Date;
}

const DAY = '(\\d{1,2})';
const YEAR = '(\\d{4})';
const ISO = '(\\d{4}-\\d{2}-\\d{2})';
const MONTH = `(${MONTH_PATTERN})`;
const YEAR_SUFFIX = '(?: (?:года|год|году|г))?';

// Capture-group order is relied on by the handlers below
const RANGE_RE = new RegExp(
  `(?:^| )с ${DAY}(?: ${MONTH}(?: ${YEAR}${YEAR_SUFFIX})?)? по ${DAY} ${MONTH} ${YEAR}${YEAR_SUFFIX}(?= |$)`
);
const ISO_RANGE_RE = new RegExp(`(?:^| )с ${ISO} по ${ISO}(?= |$)`);
const DAY_RE = new RegExp(`(?:^| )${DAY} ${MONTH} ${YEAR}${YEAR_SUFFIX}(?= |$)`);
const ISO_DAY_RE = new RegExp(`(?:^| )${ISO}(?= |$)`);
const MONTH_RE = new RegExp(`(?:^| )${MONTH} ${YEAR}${YEAR_SUFFIX}(?= |$)`);
const YEAR_RE = new RegExp(`(?:^| )(?:в|за) ${YEAR} (?:году|год)(?= |$)`);

// Residue that signals a date the grammar did not understand
const MONTH_WORD_RE = new RegExp(`(?:^| )(?:${MONTH_PATTERN})(?= |$)`);
const ISO_ANYWHERE_RE = /\d{4}-\d{2}-\d{2}/;

const toDate = (year: number, month: number, day: number): DateTime =>
  DateTime.utc(year, month, day);

const monthOf = (form: string | undefined): number | undefined =>
  form === undefined ? undefined : MONTH_BY_FORM.get(form);

const fromIso = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });

const isoDay = (value: DateTime): string => value.toFormat('yyyy-MM-dd');

function finish(start: DateTime, end: DateTime, text: string, match: RegExpExecArray): DateExtraction {
  if (!start.isValid || !end.isValid) {
    return { kind: 'error', reason: 'invalid calendar date' };
  }
  if (start > end) {
    return { kind: 'error', reason: 'date range starts after it ends' };
  }

  const rest = `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`.trim();
  if (MONTH_WORD_RE.test(rest) || ISO_ANYWHERE_RE.test(rest)) {
    return { kind: 'error', reason: 'more than one date expression' };
  }

  return { kind: 'range', range: { start: isoDay(start), end: isoDay(end) }, rest };
}

/**
 * Finds the single date expression in normalized text.
 *
 * Recognized: `с 1 по 5 ноября 2025`, `с 25 декабря по 5 января 2026`,
 * `с 1 ноября 2025 по 5 января 2026`, `с 2025-11-01 по 2025-11-05`, `28 ноября 2025`,
 * `2025-11-28`, `в июне 2025`, `за 2025 год`. A year is always required.
 */
export function extractDateRange(text: string): DateExtraction {
  let match = RANGE_RE.exec(text);
  if (match) {
    const [, d1, m1, y1, d2, m2, y2] = match;
    const endMonth = monthOf(m2) ?? 0;
    const endYear = Number(y2);
    const end = toDate(endYear, endMonth, Number(d2));
    const startMonth = monthOf(m1) ?? endMonth;

    let start = toDate(y1 ? Number(y1) : endYear, startMonth, Number(d1));
    // "с 25 декабря по 5 января 2026" crosses the year boundary
    if (!y1 && start.isValid && end.isValid && start > end && startMonth > endMonth) {
      start = toDate(endYear - 1, startMonth, Number(d1));
    }
    return finish(start, end, text, match);
  }

  match = ISO_RANGE_RE.exec(text);
  if (match) {
    return finish(fromIso(match[1]), fromIso(match[2]), text, match);
  }

  match = DAY_RE.exec(text);
  if (match) {
    const day = toDate(Number(match[3]), monthOf(match[2]) ?? 0, Number(match[1]));
    return finish(day, day, text, match);
  }

  match = ISO_DAY_RE.exec(text);
  if (match) {
    const day = fromIso(match[1]);
    return finish(day, day, text, match);
  }

  match = MONTH_RE.exec(text);
  if (match) {
    const first = toDate(Number(match[2]), monthOf(match[1]) ?? 0, 1);
    return finish(first, first.endOf('month'), text, match);
  }

  match = YEAR_RE.exec(text);
  if (match) {
    const first = toDate(Number(match[1]), 1, 1);
    return finish(first, first.endOf('year'), text, match);
  }

  if (MONTH_WORD_RE.test(text) || ISO_ANYWHERE_RE.test(text)) {
    return { kind: 'error', reason: 'date expression without a recognizable day, month and year' };
  }
  return { kind: 'none' };
}

export const isIsoDate = (value: string): boolean =>
  ISO_DATE_RE.test(value) && fromIso(value).isValid;

export const isTimeOfDay = (value: string): boolean => TIME_RE.test(value);

/** Number of calendar days covered by an inclusive `[start, end]` range. */
export const inclusiveDaySpan = (start: string, end: string): number =>
  Math.round(fromIso(end).diff(fromIso(start), 'days').days) + 1;

/**
 * Converts a user-facing date range into the half-open UTC interval used for execution.
 * Inclusive `[start, end]` becomes `[start 00:00, end + 1 day 00:00)`; a non-inclusive
 * range is already `[start, end)`.
 */
export function toHalfOpenInterval(start: string, end: string, inclusive: boolean): HalfOpenInterval {
  const from = fromIso(start).startOf('day');
  const endDay = fromIso(end).startOf('day');
  const to = inclusive ? endDay.plus({ days: 1 }) : endDay;
  return { from: from.toJSDate(), to: to.toJSDate() };
}

const timeOfDay = (day: string, time: string): DateTime => {
  const [hour, minute] = time.split(':').map(Number);
  return fromIso(day).set({ hour, minute, second: 0, millisecond: 0 });
};

/** UTC instant of `HH:MM` on the given day. */
export const atTimeOfDay = (day: string, time: string): Date => timeOfDay(day, time).toJSDate();

/** First UTC instant after the minute `HH:MM` on the given day; `23:59` ends at the next midnight. */
export const afterMinute = (day: string, time: string): Date =>
  timeOfDay(day, time).plus({ minutes: 1 }).toJSDate();
