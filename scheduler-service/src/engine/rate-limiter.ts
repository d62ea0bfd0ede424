import { Logger } from '@nestjs/common';
import { Clock } from '../common/clock';

export const TASK_CATEGORIES = ['upload', 'account-test', 'proxy-check'] as const;

export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export type RateBudgets = Record<TaskCategory, number>;

const MINUTE_MS = 60_000;

class TokenBucket {
  private tokens: number;
  private updatedAt: number;

  constructor(
    private readonly perMinute: number,
    nowMs: number,
  ) {
    this.tokens = perMinute;
    this.updatedAt = nowMs;
  }

  get unlimited(): boolean {
    return this.perMinute <= 0;
  }

  available(nowMs: number): number {
    this.refill(nowMs);
    return this.unlimited ? Number.POSITIVE_INFINITY : Math.floor(this.tokens);
  }

  tryTake(nowMs: number): boolean {
    if (this.unlimited) {
      return true;
    }
    this.refill(nowMs);
    if (this.tokens < 1) {
      return false;
    }
    this.tokens -= 1;
    return true;
  }

  msUntilNext(nowMs: number): number {
    this.refill(nowMs);
    if (this.unlimited || this.tokens >= 1) {
      return 0;
    }
    return Math.ceil(((1 - this.tokens) * MINUTE_MS) / this.perMinute);
  }

  private refill(nowMs: number): void {
    const elapsed = nowMs - this.updatedAt;
    if (elapsed <= 0) {
      return;
    }
    this.tokens = Math.min(this.perMinute, this.tokens + (elapsed * this.perMinute) / MINUTE_MS);
    this.updatedAt = nowMs;
  }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Per-category token buckets with independent tasks/minute budgets.
 * A budget of 0 disables limiting for that category.
 */
export class RateLimiter {
  private readonly logger = new Logger(RateLimiter.name);
  private readonly buckets: Map<TaskCategory, TokenBucket>;

  constructor(
    budgets: RateBudgets,
    private readonly clock: Clock,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
  ) {
    const nowMs = clock.now().getTime();
    this.buckets = new Map(
      TASK_CATEGORIES.map((category) => [category, new TokenBucket(budgets[category], nowMs)]),
    );
  }

  private bucket(category: TaskCategory): TokenBucket {
    const bucket = this.buckets.get(category);
    if (!bucket) {
      throw new Error(`Unknown task category: ${category}`);
    }
    return bucket;
  }

  tryConsume(category: TaskCategory): boolean {
    return this.bucket(category).tryTake(this.clock.now().getTime());
  }

  available(category: TaskCategory): number {
    return this.bucket(category).available(this.clock.now().getTime());
  }

  /** Suspends until a token for `category` is taken. */
  async acquire(category: TaskCategory): Promise<void> {
    const bucket = this.bucket(category);
    for (;;) {
      const nowMs = this.clock.now().getTime();
      if (bucket.tryTake(nowMs)) {
        return;
      }
      const waitMs = Math.max(1, bucket.msUntilNext(nowMs));
      this.logger.debug(`Waiting ${waitMs}ms for a ${category} token`);
      await this.sleep(waitMs);
    }
  }
}
