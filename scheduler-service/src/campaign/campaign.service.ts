import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { InvalidTransitionError, NotFoundError } from '../common/errors';
import { ConfigService } from '../config/config.service';
import { Job, JobStatus } from '../jobs/entities/job.entity';
import { CampaignPatch, CampaignRepository, JobRepository } from '../persistence/repositories';
import { CampaignProgressService, CampaignSummary } from '../engine/campaign-progress.service';
import { JobExecutor } from '../engine/job-executor';
import { JobLifecycleService } from '../engine/job-lifecycle.service';
import { Campaign, CampaignStatus } from './entities/campaign.entity';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import { UpdateCampaignDto } from './dto/update-campaign.dto';
import { CampaignPlanner } from './campaign-planner';

export interface CampaignStartResult {
  campaign: Campaign;
  jobsCreated: number;
}

@Injectable()
export class CampaignService {
  private readonly logger = new Logger(CampaignService.name);

  constructor(
    private readonly campaigns: CampaignRepository,
    private readonly jobs: JobRepository,
    private readonly planner: CampaignPlanner,
    private readonly lifecycle: JobLifecycleService,
    private readonly executor: JobExecutor,
    private readonly progress: CampaignProgressService,
    private readonly configService: ConfigService,
    private readonly clock: Clock,
  ) {}

  async create(createCampaignDto: CreateCampaignDto): Promise<Campaign> {
    const campaign = await this.campaigns.create({
      name: createCampaignDto.name,
      videoRefs: createCampaignDto.videoRefs,
      captionTemplate: createCampaignDto.captionTemplate,
      accountSelection: createCampaignDto.accountSelection,
      scheduleStart: new Date(createCampaignDto.scheduleStart),
      scheduleEnd: new Date(createCampaignDto.scheduleEnd),
      delayMinSeconds: createCampaignDto.delayMinSeconds,
      delayMaxSeconds: createCampaignDto.delayMaxSeconds,
      maxRetries: createCampaignDto.maxRetries ?? this.configService.defaultMaxRetries,
      seed: createCampaignDto.seed ?? null,
    });
    this.logger.log(`Campaign created with ID: ${campaign.id}`);
    return campaign;
  }

  /** Edits a campaign that has not started; a started one has its jobs already planned. */
  async update(id: string, changes: UpdateCampaignDto): Promise<Campaign> {
    const patch: CampaignPatch = {
      ...(changes.name !== undefined && { name: changes.name }),
      ...(changes.videoRefs !== undefined && { videoRefs: changes.videoRefs }),
      ...(changes.captionTemplate !== undefined && { captionTemplate: changes.captionTemplate }),
      ...(changes.accountSelection !== undefined && { accountSelection: changes.accountSelection }),
      ...(changes.scheduleStart !== undefined && { scheduleStart: new Date(changes.scheduleStart) }),
      ...(changes.scheduleEnd !== undefined && { scheduleEnd: new Date(changes.scheduleEnd) }),
      ...(changes.delayMinSeconds !== undefined && { delayMinSeconds: changes.delayMinSeconds }),
      ...(changes.delayMaxSeconds !== undefined && { delayMaxSeconds: changes.delayMaxSeconds }),
      ...(changes.maxRetries !== undefined && { maxRetries: changes.maxRetries }),
      ...(changes.seed !== undefined && { seed: changes.seed }),
    };

    if (Object.keys(patch).length === 0) {
      return this.findOne(id);
    }

    const updated = await this.campaigns.transition(id, [CampaignStatus.DRAFT, CampaignStatus.SCHEDULED], patch);
    if (!updated) {
      throw await this.transitionError(id, 'edit');
    }
    this.logger.log('Campaign updated', { campaignId: id, fields: Object.keys(patch) });
    return updated;
  }

  async findOne(id: string): Promise<Campaign> {
    const campaign = await this.campaigns.findById(id);

    if (!campaign) {
      this.logger.warn('Campaign not found', { campaignId: id });
      throw new NotFoundError(`Campaign with ID ${id} not found`);
    }

    return campaign;
  }

  findAll(): Promise<Campaign[]> {
    return this.campaigns.list();
  }

  summary(id: string): Promise<CampaignSummary> {
    return this.progress.summarize(id);
  }

  /**
   * Plans the full job set and activates the campaign. A planner failure
   * propagates to the caller and leaves the campaign as it was.
   */
  async start(id: string): Promise<CampaignStartResult> {
    const campaign = await this.findOne(id);
    if (campaign.status !== CampaignStatus.DRAFT && campaign.status !== CampaignStatus.SCHEDULED) {
      throw new InvalidTransitionError(`Campaign ${id} cannot start from ${campaign.status}`, {
        status: campaign.status,
      });
    }

    const jobs = await this.planner.plan(campaign);
    const started = await this.campaigns.activate(id, jobs, this.clock.now());

    this.logger.log(`Campaign ${id} started with ${jobs.length} jobs`);
    return { campaign: started, jobsCreated: jobs.length };
  }

  /** Freezes dispatch: pending jobs become held, nothing is cancelled. */
  async pause(id: string): Promise<Campaign> {
    const paused = await this.campaigns.transition(id, [CampaignStatus.RUNNING], {
      status: CampaignStatus.PAUSED,
    });
    if (!paused) {
      throw await this.transitionError(id, 'pause');
    }

    const held = await this.jobs.updateWhere(
      { campaignId: id, statuses: [JobStatus.PENDING], held: false },
      { held: true },
    );
    this.logger.log('Campaign paused', { campaignId: id, heldJobs: held });
    return paused;
  }

  async resume(id: string): Promise<Campaign> {
    const resumed = await this.campaigns.transition(id, [CampaignStatus.PAUSED], {
      status: CampaignStatus.RUNNING,
    });
    if (!resumed) {
      throw await this.transitionError(id, 'resume');
    }

    // The max-wait clock restarts for every job that sat out the pause.
    const released = await this.jobs.updateWhere(
      { campaignId: id, statuses: [JobStatus.PENDING] },
      { held: false, eligibleAt: this.clock.now() },
    );
    this.logger.log('Campaign resumed', { campaignId: id, releasedJobs: released });
    return resumed;
  }

  async cancel(id: string): Promise<Campaign> {
    const cancelled = await this.campaigns.transition(
      id,
      [CampaignStatus.DRAFT, CampaignStatus.SCHEDULED, CampaignStatus.RUNNING, CampaignStatus.PAUSED],
      { status: CampaignStatus.CANCELLED, completedAt: this.clock.now() },
    );
    if (!cancelled) {
      throw await this.transitionError(id, 'cancel');
    }

    const open = await this.jobs.find({
      campaignId: id,
      statuses: [JobStatus.PENDING, JobStatus.RUNNING, JobStatus.RETRYING],
    });
    let cancelledJobs = 0;
    for (const job of open) {
      if (await this.cancelJob(job)) {
        cancelledJobs++;
      }
    }

    this.logger.log('Campaign cancelled', { campaignId: id, cancelledJobs });
    return cancelled;
  }

  /** Requeues the campaign's failed jobs that have retries left. */
  async retryFailed(id: string): Promise<Job[]> {
    const campaign = await this.findOne(id);
    if (campaign.status === CampaignStatus.CANCELLED) {
      throw new InvalidTransitionError(`Cannot retry jobs of cancelled campaign ${id}`, {
        status: campaign.status,
      });
    }
    return this.lifecycle.requeueFailed(id);
  }

  private async cancelJob(job: Job): Promise<boolean> {
    try {
      await this.lifecycle.cancel(job.id);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        // Finished between the scan and the cancel.
        return false;
      }
      throw error;
    }
    this.executor.abort(job.id);
    return true;
  }

  private async transitionError(id: string, action: string): Promise<Error> {
    const campaign = await this.findOne(id);
    return new InvalidTransitionError(`Cannot ${action} campaign ${id} in status ${campaign.status}`, {
      status: campaign.status,
    });
  }
}
