import fs from 'fs';
import path from 'path';
import axios, { AxiosInstance } from 'axios';
import Joi from 'joi';
import { LlmSettings } from '../../config/env';
import { logger } from '../../config/logger';
import { PipelineError, ProducerError, ProducerTimeoutError, errorMessage } from '../../utils/errors';
import { IntentProducer, ProducedIntent } from './IntentProducer';

export type ChatTransport = Pick<AxiosInstance, 'post'>;

interface ChatCompletion {
  choices: Array<{ message: { content: string } }>;
}

// Only the fields we read; providers add plenty more
const chatCompletionSchema = Joi.object<ChatCompletion>({
  choices: Joi.array()
    .items(
      Joi.object({
        message: Joi.object({ content: Joi.string().allow('').required() }).unknown().required(),
      }).unknown()
    )
    .min(1)
    .required(),
}).unknown();

const CODE_FENCE_RE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export const PROMPT_PATH = path.join(__dirname, 'prompts', 'intent_v1.md');

export const stripCodeFences = (content: string): string => {
  const trimmed = content.trim();
  const fenced = CODE_FENCE_RE.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
};

/**
 * Asks an OpenAI-compatible chat/completions endpoint for intent JSON.
 * The output is untrusted: the answer service validates it like any other producer's.
 */
export class LlmIntentProducer implements IntentProducer {
  readonly source = 'llm' as const;
  private readonly prompt: string;
  private readonly url: string;

  constructor(
    private readonly settings: LlmSettings,
    private readonly http: ChatTransport = axios
  ) {
    this.prompt = fs.readFileSync(PROMPT_PATH, 'utf-8');
    this.url = `${settings.apiBase.replace(/\/+$/, '')}/chat/completions`;
  }

  async produce(text: string): Promise<ProducedIntent> {
    const content = await this.complete(text);

    let raw: unknown;
    try {
      raw = JSON.parse(stripCodeFences(content));
    } catch (error) {
      throw new ProducerError('LLM did not return valid JSON', { cause: error });
    }

    return { source: this.source, raw };
  }

  private async complete(text: string): Promise<string> {
    const startedAt = Date.now();

    try {
      const response = await this.http.post(
        this.url,
        {
          model: this.settings.model,
          temperature: 0,
          messages: [
            { role: 'system', content: this.prompt },
            { role: 'user', content: text },
          ],
        },
        {
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.settings.apiKey}`,
          },
          timeout: this.settings.timeoutMs,
        }
      );

      const { error, value } = chatCompletionSchema.validate(response.data);
      if (error) {
        throw new ProducerError(`Unexpected LLM response format: ${error.message}`);
      }

      logger.debug(`🤖 LLM replied in ${Date.now() - startedAt}ms (model ${this.settings.model})`);
      return value.choices[0].message.content;
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
          throw new ProducerTimeoutError(`LLM call timed out after ${this.settings.timeoutMs}ms`, {
            cause: error,
          });
        }
        const status = error.response?.status;
        throw new ProducerError(
          status !== undefined ? `LLM HTTP error: ${status}` : `LLM connection error: ${error.message}`,
          { cause: error }
        );
      }
      throw new ProducerError(`LLM call failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
