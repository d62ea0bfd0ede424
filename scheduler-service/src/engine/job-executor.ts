import { Inject, Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { AccountStatus } from '../inventory/entities/account.entity';
import { Job } from '../jobs/entities/job.entity';
import { AccountRepository } from '../persistence/repositories';
import { AutomationGateway, UploadResult } from '../automation/automation.gateway';
import { AttemptOutcome, classifyError } from './attempt-outcome';
import { EXECUTOR_OPTIONS } from './engine.tokens';
import { JobLifecycleService } from './job-lifecycle.service';
import { Lease, ResourceAllocator } from './resource-allocator';

export interface ExecutorOptions {
  /** Hard ceiling for a whole attempt. */
  jobTimeoutMs: number;
}

function toOutcome(result: UploadResult): AttemptOutcome {
  if (result.success) {
    return { kind: 'success', remoteUrl: result.remoteUrl };
  }
  if (result.errorKind === 'transient') {
    return { kind: 'retryable', error: result.error };
  }
  return { kind: 'fatal', error: result.error, reason: result.errorKind };
}

/**
 * Runs one attempt of a dispatched job on a worker. The outcome is reported
 * before the lease is released, so the account never has two RUNNING jobs.
 */
@Injectable()
export class JobExecutor {
  private readonly logger = new Logger(JobExecutor.name);
  private readonly inflight = new Map<string, AbortController>();

  constructor(
    private readonly gateway: AutomationGateway,
    private readonly lifecycle: JobLifecycleService,
    private readonly allocator: ResourceAllocator,
    private readonly accounts: AccountRepository,
    private readonly clock: Clock,
    @Inject(EXECUTOR_OPTIONS) private readonly options: ExecutorOptions,
  ) {}

  isRunning(jobId: string): boolean {
    return this.inflight.has(jobId);
  }

  /** Cooperative cancel: the attempt stops at its next checkpoint. */
  abort(jobId: string): boolean {
    const controller = this.inflight.get(jobId);
    if (!controller) {
      return false;
    }
    controller.abort();
    return true;
  }

  async execute(job: Job, lease: Lease, attemptToken: string): Promise<void> {
    const controller = new AbortController();
    this.inflight.set(job.id, controller);
    const startedAt = Date.now();

    let outcome: AttemptOutcome;
    try {
      outcome = await this.withTimeout(this.attempt(job, controller.signal), job.id);
    } catch (error) {
      outcome = classifyError(error);
    }

    if (outcome.kind === 'timeout') {
      controller.abort();
    }

    try {
      const updated = await this.lifecycle.report(job.id, attemptToken, outcome);
      if (updated) {
        await this.recordAccountEffects(job, outcome);
      }
      this.logger.log('Job attempt finished', {
        jobId: job.id,
        outcome: outcome.kind,
        applied: updated !== null,
        duration: Date.now() - startedAt,
      });
    } finally {
      this.inflight.delete(job.id);
      this.allocator.release(lease);
    }
  }

  private async attempt(job: Job, signal: AbortSignal): Promise<AttemptOutcome> {
    if (signal.aborted) {
      return { kind: 'aborted' };
    }
    const result = await this.gateway.upload(
      {
        jobId: job.id,
        accountId: job.accountId,
        proxyId: job.proxyId,
        videoPath: job.videoRef,
        caption: job.caption,
      },
      signal,
    );
    return toOutcome(result);
  }

  private async withTimeout(work: Promise<AttemptOutcome>, jobId: string): Promise<AttemptOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<AttemptOutcome>((resolve) => {
      timer = setTimeout(
        () =>
          resolve({
            kind: 'timeout',
            error: `Job ${jobId} exceeded ${this.options.jobTimeoutMs}ms`,
          }),
        this.options.jobTimeoutMs,
      );
    });
    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async recordAccountEffects(job: Job, outcome: AttemptOutcome): Promise<void> {
    if (outcome.kind === 'success') {
      await this.accounts.update(job.accountId, { lastUsedAt: this.clock.now() });
    } else if (outcome.kind === 'fatal' && outcome.reason === 'banned') {
      this.logger.warn('Account banned, removing from rotation', { accountId: job.accountId });
      await this.accounts.update(job.accountId, { status: AccountStatus.BANNED });
    }
  }
}
