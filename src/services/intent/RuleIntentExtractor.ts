import {
  DateRangeScope,
  Intent,
  METRICLESS_OPERATIONS,
  Metric,
  Operation,
  SNAPSHOT_OPERATIONS,
  Threshold,
  ThresholdAppliesTo,
  TimeWindow,
} from '../../types/intent';
import { UnsupportedQueryError } from '../../utils/errors';
import { CalendarRange, extractDateRange, isTimeOfDay } from './dates';
import { IntentProducer, ProducedIntent } from './IntentProducer';
import {
  COMPARATOR_PATTERN,
  MAGNITUDES,
  METRIC_TOKEN_PATTERN,
  MONTH_PATTERN,
  comparatorForPhrase,
  lexicon,
  metricForToken,
  startsWithAny,
} from './lexicon';
import { alternation, hasPhrase, normalizeText, tokenize } from './normalize';

export type ExtractionResult = { ok: true; intent: Intent } | { ok: false; reason: string };

// Single-letter magnitudes ("100к") must be glued to the number; "к" alone is a preposition
const LETTER_MAGNITUDES = [...MAGNITUDES.keys()].filter((form) => form.length === 1);
const WORD_MAGNITUDES = [...MAGNITUDES.keys()].filter((form) => form.length > 1);

const NUMBER = '(\\d{1,3}(?: \\d{3})+|\\d+(?:\\.\\d+)?)';
const VALUE = `${NUMBER}(?: ?(${alternation(WORD_MAGNITUDES)})|(${alternation(LETTER_MAGNITUDES)}))?`;
const METRIC_TOKEN = `(${METRIC_TOKEN_PATTERN})`;
const COMPARATOR = `(${COMPARATOR_PATTERN})`;

// "больше 100 тыс просмотров"
const THRESHOLD_LEADING_RE = new RegExp(`(?:^| )${COMPARATOR} ${VALUE} ${METRIC_TOKEN}(?= |$)`);
// "просмотров больше 100 тыс"
const THRESHOLD_TRAILING_RE = new RegExp(`(?:^| )${METRIC_TOKEN} ${COMPARATOR} ${VALUE}(?= |$)`);
const COMPARATOR_LEFT_RE = new RegExp(`(?:^| )(?:${COMPARATOR_PATTERN})(?= |$)`);

const CREATOR_RE = new RegExp(
  `(?:^| )(?:${alternation(lexicon.creatorMarkers)})(?: с)?(?: (?:${alternation(lexicon.creatorIdMarkers)}))?` +
    ' (?!\\d{4}-\\d{2}-\\d{2}(?: |$))([0-9a-z_-]{6,})(?= |$)'
);

const TIME_WINDOW_RE = /(?:^| )(?:с|между) (\d{1,2}:\d{2}) (?:до|по|и) (\d{1,2}:\d{2})(?= |$)/;
const TIME_LEFT_RE = /\d{1,2}:\d{2}/;

const AS_OF_DAY_RE = new RegExp(`(?:^| )к \\d{1,2} (?:${MONTH_PATTERN})(?= |$)`);
const BARE_METRIC_NUMBER_RE = new RegExp(`(?:^| )\\d+(?:\\.\\d+)? ${METRIC_TOKEN_PATTERN}(?= |$)`);
const NEW_METRIC_RE = new RegExp(`(?:^| )${lexicon.cues.newStem}\\S* ${METRIC_TOKEN_PATTERN}(?= |$)`);
const SUM_TOTAL_RE = new RegExp(
  `(?:^| )(?:${alternation(lexicon.sumTotalLeads)})\\S*(?: всего)? ${METRIC_TOKEN_PATTERN}(?= |$)`
);

// How far after a counting word its noun may appear ("сколько разных видео")
const NOUN_DISTANCE = 2;

function unsupported(reason: string): never {
  throw new UnsupportedQueryError(reason);
}

/** Removes the matched span (without its leading separator) and re-collapses spaces. */
const cut = (text: string, match: RegExpExecArray): string =>
  `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`.replace(/ +/g, ' ').trim();

function parseValue(digits: string, magnitude: string | undefined): number {
  const scale = magnitude === undefined ? 1 : MAGNITUDES.get(magnitude) ?? 1;
  const scaled = Number(digits.replace(/ /g, '')) * scale;
  const rounded = Math.round(scaled);
  const value = Math.abs(scaled - rounded) < 1e-9 ? rounded : scaled;

  if (!Number.isSafeInteger(value)) {
    unsupported(`threshold value "${digits}" is not a whole number`);
  }
  return value;
}

interface RawThreshold {
  metric: Metric;
  op: Threshold['op'];
  value: number;
}

function takeThresholds(text: string): { rest: string; thresholds: RawThreshold[] } {
  const found: RawThreshold[] = [];
  let rest = text;

  const collect = (metricToken: string, phrase: string, digits: string, magnitude: string | undefined) => {
    const metric = metricForToken(metricToken);
    const op = comparatorForPhrase(phrase);
    if (metric === null || op === null) {
      return unsupported(`unreadable threshold "${phrase} ${digits} ${metricToken}"`);
    }
    const value = parseValue(digits, magnitude);
    if (!found.some((t) => t.metric === metric && t.op === op && t.value === value)) {
      found.push({ metric, op, value });
    }
  };

  let match: RegExpExecArray | null;
  while ((match = THRESHOLD_LEADING_RE.exec(rest))) {
    const [, phrase, digits, word, letter, metricToken] = match;
    collect(metricToken, phrase, digits, word ?? letter);
    rest = cut(rest, match);
  }
  while ((match = THRESHOLD_TRAILING_RE.exec(rest))) {
    const [, metricToken, phrase, digits, word, letter] = match;
    collect(metricToken, phrase, digits, word ?? letter);
    rest = cut(rest, match);
  }

  if (COMPARATOR_LEFT_RE.test(rest)) {
    unsupported('comparator without a readable value and metric');
  }
  return { rest, thresholds: found };
}

function takeCreator(text: string): { rest: string; creatorId: string | null } {
  const match = CREATOR_RE.exec(text);
  const rest = match ? cut(text, match) : text;

  if (tokenize(rest).some((token) => lexicon.creatorMarkers.includes(token))) {
    unsupported('creator mentioned without a readable id');
  }
  return { rest, creatorId: match ? match[1] : null };
}

function takeTimeWindow(text: string): { rest: string; window: TimeWindow | null } {
  const match = TIME_WINDOW_RE.exec(text);
  const rest = match ? cut(text, match) : text;

  if (TIME_LEFT_RE.test(rest)) {
    unsupported('time of day outside a "с HH:MM до HH:MM" window');
  }
  if (!match) {
    return { rest, window: null };
  }

  const [startTime, endTime] = [match[1], match[2]].map((time) => time.padStart(5, '0'));
  if (!isTimeOfDay(startTime) || !isTimeOfDay(endTime)) {
    unsupported(`invalid time of day in "${match[0].trim()}"`);
  }
  return { rest, window: { start_time: startTime, end_time: endTime } };
}

/** Whether a counting word is followed, within a couple of tokens, by a matching noun. */
function countsNoun(tokens: string[], isNoun: (token: string) => boolean): boolean {
  return tokens.some(
    (token, i) =>
      lexicon.countingWords.includes(token) &&
      tokens.slice(i + 1, i + 1 + NOUN_DISTANCE).some(isNoun)
  );
}

function detectOperation(text: string): Operation {
  const tokens = tokenize(text);
  const { cues } = lexicon;
  const isVideoNoun = (token: string) => startsWithAny(token, lexicon.videoNounStems);

  if (tokens.some((token) => startsWithAny(token, cues.negativeDeltaStems))) {
    return Operation.COUNT_SNAPSHOTS_WITH_NEGATIVE_DELTA;
  }
  if (cues.growthAmountPhrases.some((phrase) => hasPhrase(text, phrase))) {
    return Operation.SUM_DELTA_METRIC;
  }

  const growth = tokens.some((token) => startsWithAny(token, cues.growthStems));
  const positive =
    growth ||
    NEW_METRIC_RE.test(text) ||
    tokens.some((token) => startsWithAny(token, cues.positiveDeltaStems));
  if (positive && countsNoun(tokens, isVideoNoun)) {
    return Operation.COUNT_DISTINCT_VIDEOS_WITH_POSITIVE_DELTA;
  }
  if (growth || tokens.some((token) => startsWithAny(token, cues.deltaStems))) {
    return Operation.SUM_DELTA_METRIC;
  }

  if (countsNoun(tokens, (token) => lexicon.creatorNouns.includes(token))) {
    return Operation.COUNT_DISTINCT_CREATORS;
  }
  if (countsNoun(tokens, (token) => lexicon.dayNouns.includes(token))) {
    return Operation.COUNT_DISTINCT_PUBLISH_DAYS;
  }
  if (SUM_TOTAL_RE.test(text)) {
    return Operation.SUM_TOTAL_METRIC;
  }
  if (countsNoun(tokens, isVideoNoun)) {
    return Operation.COUNT_VIDEOS;
  }
  return unsupported('no operation cue');
}

function detectMetric(text: string): Metric {
  const families = new Set(
    tokenize(text)
      .map(metricForToken)
      .filter((metric): metric is Metric => metric !== null)
  );
  if (families.size !== 1) {
    unsupported(families.size === 0 ? 'no metric named' : 'several metrics named');
  }
  const [metric] = families;
  return metric;
}

function buildIntent(text: string): Intent {
  let rest = normalizeText(text);
  if (!rest) {
    unsupported('empty text');
  }

  const tokens = tokenize(rest);
  const ambiguous = tokens.find((token) => startsWithAny(token, lexicon.ambiguousMetricStems));
  if (ambiguous) {
    unsupported(`ambiguous metric term "${ambiguous}"`);
  }
  const unknownMetric = tokens.find((token) => startsWithAny(token, lexicon.unknownMetricStems));
  if (unknownMetric) {
    unsupported(`unknown metric term "${unknownMetric}"`);
  }
  const relative = tokens.find((token) => lexicon.relativeDateWords.includes(token));
  if (relative) {
    unsupported(`relative date "${relative}"`);
  }

  const thresholds = takeThresholds(rest);
  const creator = takeCreator(thresholds.rest);
  const timeWindow = takeTimeWindow(creator.rest);
  rest = timeWindow.rest;

  const asOf = lexicon.asOfPhrases.some((phrase) => hasPhrase(rest, phrase)) || AS_OF_DAY_RE.test(rest);
  const allTime = lexicon.allTimePhrases.some((phrase) => hasPhrase(rest, phrase));

  let range: CalendarRange | null = null;
  const dates = extractDateRange(rest);
  if (dates.kind === 'error') {
    unsupported(dates.reason);
  } else if (dates.kind === 'range') {
    if (allTime) {
      unsupported('"за все время" together with a date');
    }
    range = dates.range;
    rest = dates.rest;
  }

  if (BARE_METRIC_NUMBER_RE.test(rest)) {
    unsupported('number next to a metric without a comparator');
  }

  const operation = detectOperation(rest);
  const metric = METRICLESS_OPERATIONS.has(operation) ? null : detectMetric(rest);

  const scope =
    SNAPSHOT_OPERATIONS.has(operation) || asOf
      ? DateRangeScope.SNAPSHOTS_CREATED_AT
      : DateRangeScope.VIDEOS_PUBLISHED_AT;

  if (asOf && range === null) {
    unsupported('"на тот момент" without a date');
  }
  if (timeWindow.window !== null) {
    if (range === null || range.start !== range.end) {
      unsupported('time window needs a single day');
    } else if (scope !== DateRangeScope.SNAPSHOTS_CREATED_AT) {
      unsupported('time window outside snapshot measurements');
    }
  }

  const appliesTo = asOf ? ThresholdAppliesTo.SNAPSHOT_AS_OF : ThresholdAppliesTo.FINAL_TOTAL;

  return {
    operation,
    metric,
    date_range: range && {
      scope,
      start_date: range.start,
      end_date: range.end,
      inclusive: true,
    },
    time_window: timeWindow.window,
    filters: {
      creator_id: creator.creatorId,
      thresholds: thresholds.thresholds.map((t) => ({ applies_to: appliesTo, ...t })),
    },
  };
}

/**
 * Deterministic Russian-language intent extractor over the fixed vocabulary in
 * `lexicon.ru.json`. Anything the vocabulary does not cover is unsupported.
 */
export class RuleIntentExtractor implements IntentProducer {
  readonly source = 'rules' as const;

  extract(text: string): ExtractionResult {
    try {
      return { ok: true, intent: buildIntent(text) };
    } catch (error) {
      if (error instanceof UnsupportedQueryError) {
        return { ok: false, reason: error.message };
      }
      throw error;
    }
  }

  async produce(text: string): Promise<ProducedIntent> {
    const result = this.extract(text);
    return result.ok
      ? { source: this.source, raw: result.intent }
      : { source: this.source, raw: {}, note: result.reason };
  }
}
