export type RandomIndexErrorCode = 'ERR_CONFIG' | 'ERR_CONTEXT' | 'ERR_ABORTED' | 'ERR_CHECKPOINT' | 'ERR_OVERFLOW';

export class RandomIndexError extends Error {
  readonly code: RandomIndexErrorCode;

  constructor(code: RandomIndexErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid dimension, nonzero count, threshold or seed. Raised before any work starts. */
export class ConfigurationError extends RandomIndexError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('ERR_CONFIG', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class MalformedContextError extends RandomIndexError {
  readonly contextId: number;
  readonly reason: string;

  constructor(contextId: number, reason: string) {
    super('ERR_CONTEXT', `Context ${contextId} is malformed: ${reason}`);
    this.contextId = contextId;
    this.reason = reason;
  }
}

/**
 * Thrown when an AbortSignal fires between units of work. `completed` counts
 * the whole contexts (indexing) or tokens (accumulation) finished before the stop.
 */
export class IndexingAbortedError extends RandomIndexError {
  readonly stage: 'index' | 'accumulate' | 'update';
  readonly completed: number;

  constructor(stage: 'index' | 'accumulate' | 'update', completed: number) {
    super('ERR_ABORTED', `Aborted during ${stage} after ${completed} unit(s)`);
    this.stage = stage;
    this.completed = completed;
  }
}

export class CheckpointMismatchError extends RandomIndexError {
  constructor(expected: string, actual: string) {
    super('ERR_CHECKPOINT', `Checkpoint was written with a different configuration (expected ${expected}, found ${actual})`);
  }
}

/** A running sum left the signed 32-bit range its coordinates are stored in. */
export class SumOverflowError extends RandomIndexError {
  readonly index: number;

  constructor(index: number, value: number) {
    super('ERR_OVERFLOW', `Running sum at index ${index} would be ${value}, outside the 32-bit integer range`);
    this.index = index;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
