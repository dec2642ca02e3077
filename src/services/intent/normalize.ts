const DOTTED_DATE_RE = /(\d{1,2})\.(\d{1,2})\.(\d{4})/g;
const DECIMAL_COMMA_RE = /(\d),(\d)/g;
const NON_WORD_RE = /[^0-9a-zа-я_:.\-\s]+/g;
// ':' and '.' survive only between digits (times, decimals)
const STRAY_SEPARATOR_RE = /(?<!\d)[:.]|[:.](?!\d)/g;
const MULTISPACE_RE = /\s+/g;

/**
 * Normalizes user text for rule-based extraction: lowercase, `ё` → `е`, unicode dashes
 * to `-`, `dd.mm.yyyy` to ISO dates, decimal commas to dots, punctuation to spaces, single spaces.
 *
 * Tokenization only; no lemmatization.
 */
export function normalizeText(text: string | null | undefined): string {
  let value = (text ?? '').trim().toLowerCase().replace(/ё/g, 'е');

  value = value.replace(/[\u2010-\u2015\u2212]/g, '-');
  value = value.replace(
    DOTTED_DATE_RE,
    (_match, day: string, month: string, year: string) =>
      `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`
  );
  value = value.replace(DECIMAL_COMMA_RE, '$1.$2');
  value = value.replace(NON_WORD_RE, ' ');
  value = value.replace(STRAY_SEPARATOR_RE, ' ');

  return value.replace(MULTISPACE_RE, ' ').trim();
}

export const tokenize = (normalized: string): string[] =>
  normalized ? normalized.split(' ') : [];

export const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Regex alternation preferring longer phrases ("не больше" before "больше"). */
export const alternation = (phrases: readonly string[]): string =>
  [...phrases]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(escapeRegExp)
    .join('|');

/** Whether `normalized` contains `phrase` as whole words. */
export const hasPhrase = (normalized: string, phrase: string): boolean =>
  ` ${normalized} `.includes(` ${phrase} `);
