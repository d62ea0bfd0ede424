import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { InvalidTransitionError, NotFoundError } from '../common/errors';
import { CampaignStatus } from '../campaign/entities/campaign.entity';
import { Job, JobStatus } from '../jobs/entities/job.entity';
import { CampaignRepository, JobPatch, JobRepository } from '../persistence/repositories';
import { AttemptOutcome } from './attempt-outcome';
import { BackoffController } from './backoff-controller';
import { CampaignProgressService } from './campaign-progress.service';
import { EngineEventPattern, EngineEventPublisher } from './engine-events';
import { JobEvent, sourceStatuses } from './job-state-machine';

export function isRetryExhausted(job: Pick<Job, 'retryCount' | 'maxRetries'>): boolean {
  return job.retryCount >= job.maxRetries;
}

/**
 * Owns every job status change. Each write is a fenced update on the
 * statuses the state machine accepts for the event, so concurrent or stale
 * callers lose instead of overwriting.
 */
@Injectable()
export class JobLifecycleService {
  private readonly logger = new Logger(JobLifecycleService.name);

  constructor(
    private readonly jobs: JobRepository,
    private readonly campaigns: CampaignRepository,
    private readonly backoff: BackoffController,
    private readonly progress: CampaignProgressService,
    private readonly events: EngineEventPublisher,
    private readonly clock: Clock,
  ) {}

  private apply(
    job: Pick<Job, 'id'>,
    event: JobEvent,
    patch: JobPatch,
    fence: { attemptToken?: string; held?: boolean; statuses?: JobStatus[] } = {},
  ): Promise<Job | null> {
    return this.jobs.transition(job.id, { statuses: sourceStatuses(event), ...fence }, patch);
  }

  /** PENDING → RUNNING under a fresh attempt token. */
  async markRunning(job: Job, attemptToken: string): Promise<Job | null> {
    const running = await this.apply(
      job,
      'DISPATCH',
      { status: JobStatus.RUNNING, startedAt: this.clock.now(), attemptToken },
      { held: false },
    );
    if (running) {
      await this.emit('job.running', running);
    }
    return running;
  }

  /**
   * Applies an execution result. Reports are accepted only while the job is
   * RUNNING with the same attempt token; anything else is stale and dropped.
   */
  async report(jobId: string, attemptToken: string, outcome: AttemptOutcome): Promise<Job | null> {
    if (outcome.kind === 'aborted') {
      return null;
    }

    const current = await this.jobs.findById(jobId);
    if (!current || current.status !== JobStatus.RUNNING || current.attemptToken !== attemptToken) {
      this.logger.warn('Discarding stale job report', {
        jobId,
        outcome: outcome.kind,
        status: current?.status,
      });
      return null;
    }

    const now = this.clock.now();
    const fence = { attemptToken };

    switch (outcome.kind) {
      case 'success': {
        const completed = await this.apply(
          current,
          'SUCCEED',
          {
            status: JobStatus.COMPLETED,
            completedAt: now,
            remoteUrl: outcome.remoteUrl,
            attemptToken: null,
            errorMessage: null,
            errorKind: null,
          },
          fence,
        );
        return this.settled(completed, 'job.completed');
      }

      case 'retryable': {
        if (!isRetryExhausted(current)) {
          return this.scheduleRetry(current, attemptToken, outcome.error, now);
        }
        const failed = await this.apply(
          current,
          'FAIL',
          {
            status: JobStatus.FAILED,
            completedAt: now,
            attemptToken: null,
            errorMessage: `Max retries exceeded: ${outcome.error}`,
            errorKind: 'retryable',
          },
          fence,
        );
        return this.settled(failed, 'job.failed');
      }

      case 'fatal':
      case 'timeout': {
        const failed = await this.apply(
          current,
          'FAIL',
          {
            status: JobStatus.FAILED,
            completedAt: now,
            attemptToken: null,
            errorMessage: outcome.error,
            errorKind: outcome.kind,
          },
          fence,
        );
        return this.settled(failed, 'job.failed');
      }
    }
  }

  private async scheduleRetry(current: Job, attemptToken: string, error: string, now: Date): Promise<Job | null> {
    const retryCount = current.retryCount + 1;
    const nextAttemptAt = this.backoff.nextAttemptAt(current.id, retryCount, now);

    const retrying = await this.apply(
      current,
      'RETRY',
      {
        status: JobStatus.RETRYING,
        retryCount,
        attemptToken: null,
        errorMessage: `Retry ${retryCount}/${current.maxRetries}: ${error}`,
        errorKind: 'retryable',
        scheduledAt: nextAttemptAt,
        eligibleAt: nextAttemptAt,
      },
      { attemptToken },
    );
    if (!retrying) {
      return null;
    }

    this.logger.log('Job will retry', {
      jobId: current.id,
      retryCount,
      maxRetries: current.maxRetries,
      nextAttemptAt: nextAttemptAt.toISOString(),
    });
    await this.emit('job.retrying', retrying);

    // RETRYING settles into PENDING straight away; a paused campaign keeps it held.
    const campaign = await this.campaigns.findById(current.campaignId);
    return this.apply(retrying, 'REQUEUE', {
      status: JobStatus.PENDING,
      held: campaign?.status === CampaignStatus.PAUSED,
    });
  }

  /** Fails a job that stayed pending past the max wait. Retry budget untouched. */
  async failUnschedulable(job: Job, reason: string): Promise<Job | null> {
    const failed = await this.apply(
      job,
      'FAIL',
      {
        status: JobStatus.FAILED,
        completedAt: this.clock.now(),
        errorMessage: reason,
        errorKind: 'resource_timeout',
      },
      { statuses: [JobStatus.PENDING] },
    );
    return this.settled(failed, 'job.failed');
  }

  async cancel(jobId: string): Promise<Job> {
    const job = await this.requireJob(jobId);
    const cancelled = await this.apply(job, 'CANCEL', {
      status: JobStatus.CANCELLED,
      completedAt: this.clock.now(),
      attemptToken: null,
    });
    if (!cancelled) {
      throw new InvalidTransitionError(`Job ${jobId} cannot be cancelled from ${job.status}`, {
        status: job.status,
      });
    }
    await this.settled(cancelled, 'job.cancelled');
    return cancelled;
  }

  /**
   * Operator retry: FAILED/CANCELLED → PENDING. Each retry spends one unit of
   * the job's budget; an exhausted job stays where it is.
   */
  async requeue(jobId: string): Promise<Job> {
    const job = await this.requireJob(jobId);
    const campaign = await this.campaigns.findById(job.campaignId);
    if (!campaign || campaign.status === CampaignStatus.CANCELLED) {
      throw new InvalidTransitionError(`Job ${jobId} belongs to a cancelled campaign`);
    }
    if (isRetryExhausted(job)) {
      throw new InvalidTransitionError(`Job ${jobId} has reached its retry limit (${job.maxRetries})`, {
        retryCount: job.retryCount,
        maxRetries: job.maxRetries,
      });
    }

    const now = this.clock.now();
    const pending = await this.apply(job, 'REOPEN', {
      status: JobStatus.PENDING,
      held: campaign.status === CampaignStatus.PAUSED,
      retryCount: job.retryCount + 1,
      scheduledAt: now,
      eligibleAt: now,
      startedAt: null,
      completedAt: null,
      attemptToken: null,
      errorMessage: null,
      errorKind: null,
    });
    if (!pending) {
      throw new InvalidTransitionError(`Job ${jobId} cannot be retried from ${job.status}`, {
        status: job.status,
      });
    }

    this.logger.log('Job requeued', {
      jobId,
      campaignId: job.campaignId,
      retryCount: pending.retryCount,
      maxRetries: pending.maxRetries,
    });
    await this.progress.reopen(job.campaignId);
    return pending;
  }

  /**
   * Requeues failed jobs that still have retries left, across every campaign
   * or within one. Exhausted jobs and jobs of cancelled campaigns are skipped.
   */
  async requeueFailed(campaignId?: string): Promise<Job[]> {
    const failed = await this.jobs.find({ campaignId, statuses: [JobStatus.FAILED] });
    const requeued: Job[] = [];
    for (const job of failed) {
      if (isRetryExhausted(job)) {
        continue;
      }
      try {
        requeued.push(await this.requeue(job.id));
      } catch (error) {
        if (!(error instanceof InvalidTransitionError)) {
          throw error;
        }
        this.logger.debug('Skipping failed job', { jobId: job.id, reason: error.message });
      }
    }
    this.logger.log('Failed jobs requeued', {
      campaignId,
      requeued: requeued.length,
      skipped: failed.length - requeued.length,
    });
    return requeued;
  }

  private async requireJob(jobId: string): Promise<Job> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundError(`Job with ID ${jobId} not found`);
    }
    return job;
  }

  private async settled(job: Job | null, pattern: EngineEventPattern): Promise<Job | null> {
    if (!job) {
      return null;
    }
    if (job.status === JobStatus.FAILED) {
      this.logger.error('Job failed', { jobId: job.id, errorKind: job.errorKind, error: job.errorMessage });
    } else {
      this.logger.log(`Job ${job.status}`, { jobId: job.id });
    }
    await this.emit(pattern, job);
    await this.progress.refresh(job.campaignId);
    return job;
  }

  private emit(pattern: EngineEventPattern, job: Job): Promise<void> {
    return this.events.publish({
      pattern,
      campaignId: job.campaignId,
      jobId: job.id,
      accountId: job.accountId,
      retryCount: job.retryCount,
      error: job.errorMessage ?? undefined,
      occurredAt: this.clock.now().toISOString(),
    });
  }
}
