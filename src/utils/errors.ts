export type FailureKind =
  | 'Unsupported'
  | 'InvalidIntent'
  | 'ProducerTimeout'
  | 'ProducerError'
  | 'ExecutionError'
  | 'Internal';

export type PipelineStage = 'input' | 'produce' | 'validate' | 'compile' | 'execute';

/**
 * Base class for every failure the answer pipeline recovers from.
 * None of these ever reach the user; the orchestrator logs them and replies `0`.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly stage: PipelineStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedQueryError extends PipelineError {
  readonly kind = 'Unsupported';

  constructor(message: string, stage: PipelineStage = 'produce') {
    super(message, stage);
  }
}

export class InvalidIntentError extends PipelineError {
  readonly kind = 'InvalidIntent';

  constructor(message: string, stage: PipelineStage = 'validate') {
    super(message, stage);
  }
}

export class ProducerTimeoutError extends PipelineError {
  readonly kind = 'ProducerTimeout';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'produce', options);
  }
}

export class ProducerError extends PipelineError {
  readonly kind = 'ProducerError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'produce', options);
  }
}

export class ExecutionError extends PipelineError {
  readonly kind = 'ExecutionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'execute', options);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
