import raw from './lexicon.ru.json';
import { COMPARATORS, Comparator, Metric } from '../../types/intent';
import { alternation } from './normalize';

// Typed view over lexicon.ru.json. Anything outside this vocabulary is unsupported.

const METRIC_KEYS: Record<Metric, keyof typeof raw.metricStems> = {
  [Metric.VIEWS]: 'views',
  [Metric.LIKES]: 'likes',
  [Metric.COMMENTS]: 'comments',
  [Metric.REPORTS]: 'reports',
};

export interface MetricStem {
  metric: Metric;
  stem: string;
}

export interface ComparatorPhrase {
  op: Comparator;
  phrase: string;
}

export const MONTH_BY_FORM: ReadonlyMap<string, number> = new Map(
  raw.months.flatMap(({ month, forms }) => forms.map((form): [string, number] => [form, month]))
);

export const METRIC_STEMS: readonly MetricStem[] = Object.values(Metric).flatMap((metric) =>
  raw.metricStems[METRIC_KEYS[metric]].map((stem) => ({ metric, stem }))
);

export const COMPARATOR_PHRASES: readonly ComparatorPhrase[] = COMPARATORS.flatMap((op) =>
  raw.comparators[op].map((phrase) => ({ op, phrase }))
);

export const MAGNITUDES: ReadonlyMap<string, number> = new Map(Object.entries(raw.magnitudes));

export const lexicon = {
  ambiguousMetricStems: raw.ambiguousMetricStems,
  unknownMetricStems: raw.unknownMetricStems,
  countingWords: raw.countingWords,
  sumTotalLeads: raw.sumTotalLeads,
  videoNounStems: raw.videoNounStems,
  creatorNouns: raw.creatorNouns,
  dayNouns: raw.dayNouns,
  cues: raw.operationCues,
  asOfPhrases: raw.asOfPhrases,
  allTimePhrases: raw.allTimePhrases,
  creatorMarkers: raw.creatorMarkers,
  creatorIdMarkers: raw.creatorIdMarkers,
  relativeDateWords: raw.relativeDateWords,
} as const;

// Regex building blocks (no capture groups)
export const MONTH_PATTERN = alternation([...MONTH_BY_FORM.keys()]);
export const METRIC_TOKEN_PATTERN = `(?:${alternation(METRIC_STEMS.map((m) => m.stem))})[^\\s]*`;
export const COMPARATOR_PATTERN = alternation(COMPARATOR_PHRASES.map((c) => c.phrase));

/** Metric named by a token (prefix match on the stems), or null. */
export function metricForToken(token: string): Metric | null {
  const match = METRIC_STEMS.find(({ stem }) => token.startsWith(stem));
  return match ? match.metric : null;
}

export function comparatorForPhrase(phrase: string): Comparator | null {
  const match = COMPARATOR_PHRASES.find((c) => c.phrase === phrase);
  return match ? match.op : null;
}

export const startsWithAny = (token: string, stems: readonly string[]): boolean =>
  stems.some((stem) => token.startsWith(stem));
