import { Inject, Injectable } from '@nestjs/common';
import { RandomFactory } from '../common/random';
import { cappedExponentialDelay } from '../utils/exponential-backoff';
import { BACKOFF_SETTINGS, RANDOM_FACTORY } from './engine.tokens';

export interface BackoffSettings {
  baseMs: number;
  maxMs: number;
  /** Upper bound (exclusive) of the random offset added after capping. */
  jitterMs: number;
}

/**
 * Computes when a retried job may run again:
 * min(maxMs, baseMs * 2^(retryCount - 1)) + jitter.
 *
 * Jitter is drawn from a generator seeded with the job id and retry count, so
 * the same job retried the same number of times always lands on the same
 * offset.
 */
@Injectable()
export class BackoffController {
  constructor(
    @Inject(BACKOFF_SETTINGS) private readonly settings: BackoffSettings,
    @Inject(RANDOM_FACTORY) private readonly randomFactory: RandomFactory,
  ) {}

  delayFor(jobId: string, retryCount: number): number {
    const base = cappedExponentialDelay(retryCount - 1, this.settings.baseMs, 2, this.settings.maxMs);
    const random = this.randomFactory(`${jobId}:${retryCount}`);
    return base + Math.floor(this.settings.jitterMs * random.next());
  }

  nextAttemptAt(jobId: string, retryCount: number, now: Date): Date {
    return new Date(now.getTime() + this.delayFor(jobId, retryCount));
  }
}
