import { IntentSource } from '../../types/intent';

/** Raw, unvalidated producer output. `raw` is untrusted until the validator accepts it. */
export interface ProducedIntent {
  source: IntentSource;
  raw: unknown;
  /** Why the producer gave up, when `raw` is the empty intent */
  note?: string;
}

/**
 * A source of raw intents. The answer service walks its producers in order and feeds
 * every output through the same validator; producers never validate for themselves.
 */
export interface IntentProducer {
  readonly source: IntentSource;
  produce(text: string): Promise<ProducedIntent>;
}
