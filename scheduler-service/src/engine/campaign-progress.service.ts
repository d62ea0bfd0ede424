import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { NotFoundError } from '../common/errors';
import { CampaignStatus } from '../campaign/entities/campaign.entity';
import { JobStatus } from '../jobs/entities/job.entity';
import { CampaignRepository, JobCounts, JobRepository } from '../persistence/repositories';
import { EngineEventPublisher } from './engine-events';

export interface CampaignSummary {
  campaignId: string;
  status: CampaignStatus;
  counts: JobCounts;
  /** e.g. "12/50 completed, 3 failed" */
  text: string;
}

export function formatSummary(counts: JobCounts): string {
  let text = `${counts[JobStatus.COMPLETED]}/${counts.total} completed, ${counts[JobStatus.FAILED]} failed`;
  if (counts[JobStatus.CANCELLED] > 0) {
    text += `, ${counts[JobStatus.CANCELLED]} cancelled`;
  }
  return text;
}

/** Aggregates job outcomes into campaign status. */
@Injectable()
export class CampaignProgressService {
  private readonly logger = new Logger(CampaignProgressService.name);

  constructor(
    private readonly campaigns: CampaignRepository,
    private readonly jobs: JobRepository,
    private readonly events: EngineEventPublisher,
    private readonly clock: Clock,
  ) {}

  async summarize(campaignId: string): Promise<CampaignSummary> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) {
      throw new NotFoundError(`Campaign with ID ${campaignId} not found`);
    }
    const counts = await this.jobs.countByCampaign(campaignId);
    return { campaignId, status: campaign.status, counts, text: formatSummary(counts) };
  }

  /** Completes the campaign once every job is terminal. */
  async refresh(campaignId: string): Promise<void> {
    const counts = await this.jobs.countByCampaign(campaignId);
    const open = counts[JobStatus.PENDING] + counts[JobStatus.RUNNING] + counts[JobStatus.RETRYING];
    if (counts.total === 0 || open > 0) {
      return;
    }

    const completed = await this.campaigns.transition(
      campaignId,
      [CampaignStatus.RUNNING, CampaignStatus.PAUSED],
      { status: CampaignStatus.COMPLETED, completedAt: this.clock.now() },
    );
    if (!completed) {
      return;
    }

    const text = formatSummary(counts);
    this.logger.log('Campaign completed', { campaignId, summary: text });
    await this.events.publish({
      pattern: 'campaign.completed',
      campaignId,
      occurredAt: this.clock.now().toISOString(),
    });
  }

  /** Moves a completed campaign back to running after an operator retry. */
  async reopen(campaignId: string): Promise<void> {
    const reopened = await this.campaigns.transition(campaignId, [CampaignStatus.COMPLETED], {
      status: CampaignStatus.RUNNING,
      completedAt: null,
    });
    if (reopened) {
      this.logger.log('Campaign reopened', { campaignId });
    }
  }
}
