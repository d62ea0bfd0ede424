import { FatalError, JobTimeoutError, RetryableError, errorMessage, isEngineError } from '../common/errors';

export type AttemptOutcome =
  | { kind: 'success'; remoteUrl: string | null }
  | { kind: 'retryable'; error: string }
  | { kind: 'fatal'; error: string; reason?: string }
  | { kind: 'timeout'; error: string }
  /** Cancelled before the upload started; nothing to report. */
  | { kind: 'aborted' };

/**
 * Maps a thrown error onto an outcome. Errors outside the engine taxonomy are
 * treated as transient.
 */
export function classifyError(error: unknown): AttemptOutcome {
  if (error instanceof RetryableError) {
    return { kind: 'retryable', error: error.message };
  }
  if (error instanceof FatalError) {
    return { kind: 'fatal', error: error.message, reason: error.reason };
  }
  if (error instanceof JobTimeoutError) {
    return { kind: 'timeout', error: error.message };
  }
  if (isEngineError(error)) {
    return { kind: 'fatal', error: error.message, reason: error.kind };
  }
  return { kind: 'retryable', error: errorMessage(error) };
}
