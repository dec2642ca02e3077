import { LlmSettings } from '../config/env';
import { logger } from '../config/logger';
import { Intent, IntentSource } from '../types/intent';
import {
  FailureKind,
  InvalidIntentError,
  PipelineError,
  PipelineStage,
  UnsupportedQueryError,
  errorMessage,
} from '../utils/errors';
import { IntentProducer } from './intent/IntentProducer';
import { IntentValidator } from './intent/IntentValidator';
import { LlmIntentProducer } from './intent/LlmIntentProducer';
import { RuleIntentExtractor } from './intent/RuleIntentExtractor';
import { QueryCompiler } from './query/QueryCompiler';
import { QueryExecutor } from './query/QueryExecutor';

const REPLY_RE = /^-?\d+$/;

/** Renders the single reply line; anything that is not a plain integer becomes `0`. */
export function formatReply(value: number): string {
  const text = String(value);
  return REPLY_RE.test(text) ? text : '0';
}

/** Producer order by configuration: the LLM first when enabled, the rules always last. */
export function buildProducers(llm: LlmSettings): IntentProducer[] {
  const rules = new RuleIntentExtractor();
  return llm.enabled ? [new LlmIntentProducer(llm), rules] : [rules];
}

export interface AnswerServiceOptions {
  producers: IntentProducer[];
  executor: QueryExecutor;
  validator?: IntentValidator;
  compiler?: QueryCompiler;
}

interface ResolvedIntent {
  intent: Intent;
  source: IntentSource;
}

/**
 * Question → integer. Every failure ends here as `0` plus one log record; nothing else
 * ever reaches the caller.
 */
export class AnalyticsAnswerService {
  private readonly producers: IntentProducer[];
  private readonly executor: QueryExecutor;
  private readonly validator: IntentValidator;
  private readonly compiler: QueryCompiler;

  constructor(options: AnswerServiceOptions) {
    this.producers = options.producers;
    this.executor = options.executor;
    this.validator = options.validator ?? new IntentValidator();
    this.compiler = options.compiler ?? new QueryCompiler();
  }

  async answer(text: string): Promise<number> {
    const startedAt = Date.now();
    const question = text.trim();
    let source: IntentSource | null = null;

    const fail = (stage: PipelineStage, kind: FailureKind, reason: string): number => {
      logger.warn('⚠️ Question not answered', {
        stage,
        kind,
        reason,
        source,
        text: question,
        latencyMs: Date.now() - startedAt,
      });
      return 0;
    };

    if (!question) {
      return fail('input', 'Unsupported', 'empty text');
    }
    if (question.startsWith('/')) {
      return fail('input', 'Unsupported', 'command');
    }

    try {
      const resolved = await this.resolveIntent(question);
      source = resolved.source;

      const plan = this.compiler.compile(resolved.intent);
      const value = await this.executor.execute(plan);

      logger.info('✅ Question answered', {
        stage: 'execute',
        kind: 'Ok',
        operation: plan.operation,
        value,
        source,
        text: question,
        latencyMs: Date.now() - startedAt,
      });
      return value;
    } catch (error) {
      if (error instanceof PipelineError) {
        return fail(error.stage, error.kind, error.message);
      }
      logger.error('❌ Unexpected error while answering', error);
      return fail('execute', 'Internal', errorMessage(error));
    }
  }

  /** Walks the producers in order; the first output the validator accepts wins. */
  private async resolveIntent(text: string): Promise<ResolvedIntent> {
    let lastFailure: PipelineError = new UnsupportedQueryError('no intent producer configured');

    for (const producer of this.producers) {
      try {
        const produced = await producer.produce(text);
        const outcome = this.validator.validate(produced.raw);
        if (outcome.ok) {
          return { intent: outcome.intent, source: produced.source };
        }

        lastFailure =
          outcome.kind === 'unsupported'
            ? new UnsupportedQueryError(produced.note ?? outcome.reason)
            : new InvalidIntentError(outcome.reason);
      } catch (error) {
        if (!(error instanceof PipelineError)) {
          throw error;
        }
        lastFailure = error;
      }

      logger.debug(`↪️ ${producer.source} producer gave no usable intent (${lastFailure.kind}): ${lastFailure.message}`);
    }

    throw lastFailure;
  }
}
