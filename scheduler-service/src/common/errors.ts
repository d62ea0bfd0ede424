export type EngineErrorKind =
  | 'configuration'
  | 'resource_busy'
  | 'resource_timeout'
  | 'retryable'
  | 'fatal'
  | 'timeout'
  | 'not_found'
  | 'invalid_transition';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad campaign or job input. Aborts a planner run as a whole. */
export class ConfigurationError extends EngineError {
  readonly kind = 'configuration';
}

export class ResourceBusyError extends EngineError {
  readonly kind = 'resource_busy';
}

/** A job could not be dispatched within the configured max wait. */
export class ResourceTimeoutError extends EngineError {
  readonly kind = 'resource_timeout';
}

export class RetryableError extends EngineError {
  readonly kind = 'retryable';
}

export class FatalError extends EngineError {
  readonly kind = 'fatal';

  constructor(
    message: string,
    readonly reason?: string,
    details: Record<string, unknown> = {},
  ) {
    super(message, details);
  }
}

/** Hard per-job ceiling exceeded. Bypasses remaining retries. */
export class JobTimeoutError extends EngineError {
  readonly kind = 'timeout';
}

export class NotFoundError extends EngineError {
  readonly kind = 'not_found';
}

export class InvalidTransitionError extends EngineError {
  readonly kind = 'invalid_transition';
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
