import { alternation, escapeRegExp, hasPhrase, normalizeText, tokenize } from '../normalize';

describe('normalizeText', () => {
  it('lowercases, converts dotted dates and strips punctuation', () => {
    expect(normalizeText('Сколько  видео, опубликовано 01.11.2025?')).toBe(
      'сколько видео опубликовано 2025-11-01'
    );
  });

  it('folds ё and unicode dashes, keeping times', () => {
    expect(normalizeText('Ёлка — 10:30.')).toBe('елка - 10:30');
  });

  it('turns decimal commas into dots', () => {
    expect(normalizeText('больше 1,5 млн')).toBe('больше 1.5 млн');
  });

  it('drops separators that are not between digits', () => {
    expect(normalizeText('id: abc.')).toBe('id abc');
  });

  it('treats missing text as empty', () => {
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(tokenize('')).toEqual([]);
  });
});

describe('regex helpers', () => {
  it('orders alternatives longest first', () => {
    expect(alternation(['больше', 'не больше'])).toBe('не больше|больше');
  });

  it('escapes regex metacharacters', () => {
    expect(escapeRegExp('a.b(c)')).toBe('a\\.b\\(c\\)');
  });

  it('matches whole words only', () => {
    expect(hasPhrase('на тот момент было', 'тот момент')).toBe(true);
    expect(hasPhrase('скольких видео', 'сколько')).toBe(false);
  });
});
