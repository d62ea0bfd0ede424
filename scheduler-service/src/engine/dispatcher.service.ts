import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { Clock } from '../common/clock';
import { errorMessage } from '../common/errors';
import { CampaignStatus } from '../campaign/entities/campaign.entity';
import { Job, JobStatus } from '../jobs/entities/job.entity';
import { CampaignRepository, JobRepository } from '../persistence/repositories';
import { DISPATCHER_OPTIONS } from './engine.tokens';
import { JobExecutor } from './job-executor';
import { JobLifecycleService } from './job-lifecycle.service';
import { RateLimiter } from './rate-limiter';
import { ResourceAllocator } from './resource-allocator';
import { WorkerPool } from './worker-pool';

export interface DispatcherOptions {
  tickMs: number;
  batchSize: number;
  /** Pending longer than this after becoming due fails with ResourceTimeout. */
  maxPendingWaitMs: number;
  /** RUNNING rows older than this with no live attempt are reclaimed. */
  jobTimeoutMs: number;
}

export interface TickReport {
  dispatched: number;
  deferred: number;
  timedOut: number;
  recovered: number;
}

@Injectable()
export class DispatcherService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(DispatcherService.name);
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    private readonly jobs: JobRepository,
    private readonly campaigns: CampaignRepository,
    private readonly allocator: ResourceAllocator,
    private readonly rateLimiter: RateLimiter,
    private readonly pool: WorkerPool,
    private readonly lifecycle: JobLifecycleService,
    private readonly executor: JobExecutor,
    private readonly clock: Clock,
    @Inject(DISPATCHER_OPTIONS) private readonly options: DispatcherOptions,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.recoverInterrupted();
    this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.logger.log(`Dispatcher started (tick ${this.options.tickMs}ms, ${this.pool.size} workers)`);
    this.timer = setInterval(() => {
      this.tick().catch((error) => {
        this.logger.error(`Dispatcher tick failed: ${errorMessage(error)}`);
      });
    }, this.options.tickMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.log('Dispatcher stopped, draining workers');
    }
    await this.pool.onIdle();
  }

  /**
   * One scan over due jobs. Ticks never overlap; a tick that fires while the
   * previous one is still running is skipped.
   */
  async tick(): Promise<TickReport> {
    const report: TickReport = { dispatched: 0, deferred: 0, timedOut: 0, recovered: 0 };
    if (this.ticking) {
      return report;
    }
    this.ticking = true;

    try {
      const now = this.clock.now();
      const { recovered, busyAccounts } = await this.recoverStalled(now);
      report.recovered = recovered;

      const due = await this.jobs.findDue(now, this.options.batchSize);
      const campaignStatus = new Map<string, CampaignStatus | null>();

      for (const job of due) {
        // Campaign status first: jobs of a paused campaign never hit the max wait.
        if (!campaignStatus.has(job.campaignId)) {
          const campaign = await this.campaigns.findById(job.campaignId);
          campaignStatus.set(job.campaignId, campaign?.status ?? null);
        }
        if (campaignStatus.get(job.campaignId) !== CampaignStatus.RUNNING) {
          report.deferred++;
          continue;
        }

        if (this.waitedTooLong(job, now)) {
          const failed = await this.lifecycle.failUnschedulable(
            job,
            `Not dispatched within ${this.options.maxPendingWaitMs}ms of becoming due`,
          );
          if (failed) {
            report.timedOut++;
          }
          continue;
        }

        if (await this.dispatch(job, busyAccounts)) {
          report.dispatched++;
        } else {
          report.deferred++;
        }
      }
    } finally {
      this.ticking = false;
    }

    if (report.dispatched + report.timedOut + report.recovered > 0) {
      this.logger.log('Dispatcher tick', report);
    }
    return report;
  }

  private waitedTooLong(job: Job, now: Date): boolean {
    const waitingSince = Math.max(job.scheduledAt.getTime(), job.eligibleAt.getTime());
    return now.getTime() - waitingSince > this.options.maxPendingWaitMs;
  }

  /** Lease, then rate-limit token, then hand-off. Any miss leaves the job pending. */
  private async dispatch(job: Job, busyAccounts: ReadonlySet<string>): Promise<boolean> {
    if (!this.pool.hasCapacity() || busyAccounts.has(job.accountId)) {
      return false;
    }

    const lease = this.allocator.tryAcquire(job.accountId, { jobId: job.id, campaignId: job.campaignId });
    if (!lease) {
      return false;
    }

    if (!this.rateLimiter.tryConsume('upload')) {
      this.allocator.release(lease);
      return false;
    }

    const attemptToken = randomUUID();
    const running = await this.lifecycle.markRunning(job, attemptToken);
    if (!running) {
      this.allocator.release(lease);
      return false;
    }

    // Only this tick submits work, so the capacity seen above still holds.
    this.pool.submit(() => this.executor.execute(running, lease, attemptToken), `job ${job.id}`);

    this.logger.debug('Job dispatched', { jobId: job.id, accountId: job.accountId });
    return true;
  }

  /**
   * RUNNING rows left behind by a previous process have no attempt running.
   * Each is reported as an interrupted attempt, so it retries under its
   * normal budget instead of holding its account until the job timeout.
   */
  async recoverInterrupted(): Promise<number> {
    const running = await this.jobs.find({ statuses: [JobStatus.RUNNING] });
    let recovered = 0;

    for (const job of running) {
      if (this.executor.isRunning(job.id) || !job.attemptToken) {
        continue;
      }
      const settled = await this.lifecycle.report(job.id, job.attemptToken, {
        kind: 'retryable',
        error: 'Attempt interrupted by a restart',
      });
      if (settled) {
        recovered++;
      }
    }

    if (recovered > 0) {
      this.logger.warn(`Recovered ${recovered} jobs interrupted by a restart`);
    }
    return recovered;
  }

  /**
   * RUNNING jobs with no live attempt in this process (crash, lost report)
   * past the job timeout are failed and their leases revoked. Until then
   * their accounts count as busy, lease or not.
   */
  private async recoverStalled(now: Date): Promise<{ recovered: number; busyAccounts: Set<string> }> {
    const running = await this.jobs.find({ statuses: [JobStatus.RUNNING] });
    const busyAccounts = new Set<string>();
    let recovered = 0;

    for (const job of running) {
      if (this.executor.isRunning(job.id)) {
        continue;
      }
      if (
        !job.startedAt ||
        !job.attemptToken ||
        now.getTime() - job.startedAt.getTime() <= this.options.jobTimeoutMs
      ) {
        busyAccounts.add(job.accountId);
        continue;
      }

      const failed = await this.lifecycle.report(job.id, job.attemptToken, {
        kind: 'timeout',
        error: `Job ${job.id} exceeded ${this.options.jobTimeoutMs}ms without reporting`,
      });
      if (this.allocator.holderOf(job.accountId)?.jobId === job.id) {
        this.allocator.revoke(job.accountId);
      }
      if (failed) {
        recovered++;
      }
    }
    return { recovered, busyAccounts };
  }
}
