import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { RandomSource } from '../common/random';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitterFactor?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
}

/** min(maxDelayMs, initialDelayMs * multiplier^attempt), attempt counted from 0. */
export function cappedExponentialDelay(
  attempt: number,
  initialDelayMs: number,
  multiplier: number,
  maxDelayMs: number,
): number {
  return Math.min(maxDelayMs, initialDelayMs * Math.pow(multiplier, Math.max(0, attempt)));
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class ExponentialBackoff {
  private readonly logger = new Logger(ExponentialBackoff.name);
  private readonly options: Required<RetryOptions>;

  constructor(options: RetryOptions = {}) {
    this.options = {
      maxRetries: 3,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      backoffMultiplier: 2,
      jitterFactor: 0.1,
      shouldRetry: () => true,
      random: { next: () => Math.random() },
      sleep: defaultSleep,
      ...options,
    };
  }

  async execute<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<T> {
    const { maxRetries } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        if (attempt > 0) {
          this.logger.log(
            `Retrying ${operationName} (attempt ${attempt + 1}/${maxRetries + 1})`
          );
        }

        return await operation();
      } catch (error) {
        if (attempt >= maxRetries) {
          this.logger.error(
            `${operationName} failed after ${maxRetries + 1} attempts: ${errorMessage(error)}`
          );
          throw error;
        }

        if (!this.options.shouldRetry(error, attempt)) {
          this.logger.warn(
            `${operationName} failed and should not retry: ${errorMessage(error)}`
          );
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        this.logger.warn(
          `${operationName} failed (attempt ${attempt + 1}), retrying in ${delay}ms: ${errorMessage(error)}`
        );

        await this.options.sleep(delay);
      }
    }
  }

  calculateDelay(attempt: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs, jitterFactor, random } = this.options;
    const baseDelay = cappedExponentialDelay(attempt, initialDelayMs, backoffMultiplier, maxDelayMs);
    const jitter = baseDelay * jitterFactor * random.next();

    return Math.round(baseDelay + jitter);
  }
}

export function withExponentialBackoff<T>(
  operation: () => Promise<T>,
  options?: RetryOptions,
  operationName?: string
): Promise<T> {
  const backoff = new ExponentialBackoff(options);
  return backoff.execute(operation, operationName);
}
