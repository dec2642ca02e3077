import {
  afterMinute,
  atTimeOfDay,
  extractDateRange,
  inclusiveDaySpan,
  isIsoDate,
  isTimeOfDay,
  toHalfOpenInterval,
} from '../dates';

describe('extractDateRange', () => {
  it('reads a day range within one month', () => {
    expect(extractDateRange('с 1 по 5 ноября 2025')).toEqual({
      kind: 'range',
      range: { start: '2025-11-01', end: '2025-11-05' },
      rest: '',
    });
  });

  it('moves the start into the previous year across new year', () => {
    expect(extractDateRange('видео с 25 декабря по 5 января 2026')).toEqual({
      kind: 'range',
      range: { start: '2025-12-25', end: '2026-01-05' },
      rest: 'видео',
    });
  });

  it('reads ISO ranges', () => {
    expect(extractDateRange('с 2025-11-01 по 2025-11-03')).toMatchObject({
      kind: 'range',
      range: { start: '2025-11-01', end: '2025-11-03' },
    });
  });

  it('reads a single day with a year suffix', () => {
    expect(extractDateRange('28 ноября 2025 года')).toMatchObject({
      kind: 'range',
      range: { start: '2025-11-28', end: '2025-11-28' },
    });
  });

  it('reads a whole month in the prepositional case', () => {
    expect(extractDateRange('в июне 2025')).toEqual({
      kind: 'range',
      range: { start: '2025-06-01', end: '2025-06-30' },
      rest: 'в',
    });
  });

  it('reads a whole year', () => {
    expect(extractDateRange('за 2025 год')).toMatchObject({
      kind: 'range',
      range: { start: '2025-01-01', end: '2025-12-31' },
    });
  });

  it('rejects days that do not exist', () => {
    expect(extractDateRange('31 февраля 2025')).toEqual({ kind: 'error', reason: 'invalid calendar date' });
  });

  it('rejects ranges that end before they start', () => {
    expect(extractDateRange('с 10 по 5 ноября 2025')).toEqual({
      kind: 'error',
      reason: 'date range starts after it ends',
    });
  });

  it('rejects a month without a year', () => {
    expect(extractDateRange('5 ноября')).toEqual({
      kind: 'error',
      reason: 'date expression without a recognizable day, month and year',
    });
  });

  it('rejects a second date expression', () => {
    expect(extractDateRange('1 ноября 2025 и 2 ноября 2025')).toEqual({
      kind: 'error',
      reason: 'more than one date expression',
    });
  });

  it('reports no date when there is none', () => {
    expect(extractDateRange('сколько видео')).toEqual({ kind: 'none' });
  });
});

describe('date helpers', () => {
  it('turns an inclusive range into [start, end + 1 day)', () => {
    const { from, to } = toHalfOpenInterval('2025-11-01', '2025-11-05', true);
    expect(from.toISOString()).toBe('2025-11-01T00:00:00.000Z');
    expect(to.toISOString()).toBe('2025-11-06T00:00:00.000Z');
  });

  it('keeps an exclusive range as [start, end)', () => {
    const { to } = toHalfOpenInterval('2025-11-01', '2025-11-05', false);
    expect(to.toISOString()).toBe('2025-11-05T00:00:00.000Z');
  });

  it('counts inclusive days', () => {
    expect(inclusiveDaySpan('2025-11-01', '2025-11-05')).toBe(5);
    expect(inclusiveDaySpan('2025-11-03', '2025-11-03')).toBe(1);
  });

  it('places a time of day on a UTC date', () => {
    expect(atTimeOfDay('2025-11-03', '10:30').toISOString()).toBe('2025-11-03T10:30:00.000Z');
  });

  it('finds the instant after a minute, rolling over at midnight', () => {
    expect(afterMinute('2025-11-03', '15:00').toISOString()).toBe('2025-11-03T15:01:00.000Z');
    expect(afterMinute('2025-11-03', '23:59').toISOString()).toBe('2025-11-04T00:00:00.000Z');
  });

  it('validates calendar dates and times', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2025-02-29')).toBe(false);
    expect(isTimeOfDay('23:59')).toBe(true);
    expect(isTimeOfDay('24:00')).toBe(false);
  });
});
