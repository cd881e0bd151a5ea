/**
 * Error taxonomy for the context layer
 */

export type ContextErrorCode =
  | 'OVERSIZED_TURN'
  | 'COMPACTION_FAILED'
  | 'PROVIDER_ERROR'
  | 'EMBEDDING_UNAVAILABLE'
  | 'TIMEOUT'
  | 'DIMENSION_MISMATCH'
  | 'TURN_IN_PROGRESS';

export class ContextError extends Error {
  constructor(
    message: string,
    readonly code: ContextErrorCode,
    readonly recoverable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A single turn costs more than the whole buffer. Split or truncate it first.
 */
export class OversizedTurnError extends ContextError {
  constructor(readonly tokenCost: number, readonly tokenLimit: number) {
    super(`Turn costs ${tokenCost} tokens, which exceeds the ${tokenLimit} token limit`, 'OVERSIZED_TURN', false);
  }
}

/**
 * The summarization call failed. The buffer stays over budget and retries on the next put.
 */
export class CompactionFailedError extends ContextError {
  constructor(readonly overBudgetBy: number, cause: unknown) {
    super(`Compaction failed; buffer is ${overBudgetBy} tokens over budget`, 'COMPACTION_FAILED', true, { cause });
  }
}

export class ProviderError extends ContextError {
  constructor(readonly reason: string, cause?: unknown, readonly status?: number) {
    super(`Completion provider failed: ${reason}`, 'PROVIDER_ERROR', true, { cause });
  }
}

export class EmbeddingUnavailableError extends ContextError {
  constructor(readonly reason: string, cause?: unknown) {
    super(`Embedding provider failed: ${reason}`, 'EMBEDDING_UNAVAILABLE', true, { cause });
  }
}

export class TimeoutError extends ContextError {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`, 'TIMEOUT', true);
  }
}

export class DimensionMismatchError extends ContextError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Embedding has ${actual} dimensions, collection expects ${expected}`, 'DIMENSION_MISMATCH', false);
  }
}

export class TurnInProgressError extends ContextError {
  constructor() {
    super('A turn is already in progress for this session', 'TURN_IN_PROGRESS', true);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
