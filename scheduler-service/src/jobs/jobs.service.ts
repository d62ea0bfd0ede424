import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../common/errors';
import { JobCounts, JobRepository } from '../persistence/repositories';
import { JobExecutor } from '../engine/job-executor';
import { JobLifecycleService } from '../engine/job-lifecycle.service';
import { Job, JobStatus } from './entities/job.entity';
import { ListJobsQueryDto } from './dto/list-jobs.query';

export type JobStatistics = JobCounts & {
  /** Completed share of all jobs, in percent, two decimals. */
  successRate: number;
};

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    private readonly jobs: JobRepository,
    private readonly lifecycle: JobLifecycleService,
    private readonly executor: JobExecutor,
  ) {}

  findAll(query: ListJobsQueryDto): Promise<Job[]> {
    return this.jobs.find({
      campaignId: query.campaignId,
      statuses: query.status ? [query.status] : undefined,
    });
  }

  async findOne(id: string): Promise<Job> {
    const job = await this.jobs.findById(id);
    if (!job) {
      throw new NotFoundError(`Job with ID ${id} not found`);
    }
    return job;
  }

  async statistics(campaignId?: string): Promise<JobStatistics> {
    const counts = await this.jobs.count({ campaignId });
    const successRate = counts.total > 0 ? Math.round((counts[JobStatus.COMPLETED] / counts.total) * 10_000) / 100 : 0;
    return { ...counts, successRate };
  }

  retry(id: string): Promise<Job> {
    return this.lifecycle.requeue(id);
  }

  retryFailed(campaignId?: string): Promise<Job[]> {
    return this.lifecycle.requeueFailed(campaignId);
  }

  /**
   * Marks the job cancelled, then signals a live attempt to stop at its next
   * checkpoint. Its late result, if any, is discarded as stale.
   */
  async cancel(id: string): Promise<Job> {
    const job = await this.lifecycle.cancel(id);
    if (this.executor.abort(id)) {
      this.logger.log('Signalled in-flight attempt to stop', { jobId: id });
    }
    return job;
  }
}
