import { Campaign, CampaignStatus } from '../campaign/entities/campaign.entity';
import { Job, JobStatus } from '../jobs/entities/job.entity';
import { Account, AccountStatus } from '../inventory/entities/account.entity';
import { ProxyEndpoint } from '../inventory/entities/proxy.entity';

export type NewCampaign = Pick<
  Campaign,
  | 'name'
  | 'videoRefs'
  | 'captionTemplate'
  | 'accountSelection'
  | 'scheduleStart'
  | 'scheduleEnd'
  | 'delayMinSeconds'
  | 'delayMaxSeconds'
  | 'maxRetries'
> & { seed?: string | null };

export type CampaignPatch = Partial<Omit<Campaign, 'id' | 'createdAt' | 'updatedAt'>>;

export type JobPatch = Partial<Omit<Job, 'id' | 'campaignId' | 'accountId' | 'createdAt' | 'updatedAt'>>;

export interface JobFilter {
  campaignId?: string;
  statuses?: JobStatus[];
  held?: boolean;
}

/** Preconditions for a fenced job update. */
export interface JobExpectation {
  statuses: JobStatus[];
  attemptToken?: string;
  held?: boolean;
}

export type JobCounts = Record<JobStatus, number> & { total: number; held: number };

export function emptyJobCounts(): JobCounts {
  return {
    [JobStatus.PENDING]: 0,
    [JobStatus.RUNNING]: 0,
    [JobStatus.RETRYING]: 0,
    [JobStatus.COMPLETED]: 0,
    [JobStatus.FAILED]: 0,
    [JobStatus.CANCELLED]: 0,
    total: 0,
    held: 0,
  };
}

/** Due-job ordering: scheduled time, then id. */
export function compareJobsForDispatch(a: Job, b: Job): number {
  const diff = a.scheduledAt.getTime() - b.scheduledAt.getTime();
  if (diff !== 0) {
    return diff;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export abstract class CampaignRepository {
  abstract create(input: NewCampaign): Promise<Campaign>;
  abstract findById(id: string): Promise<Campaign | null>;
  abstract list(): Promise<Campaign[]>;
  abstract update(id: string, patch: CampaignPatch): Promise<Campaign | null>;
  /**
   * Apply `patch` only while the campaign is in one of `statuses`.
   * Returns the updated campaign, or null when the precondition failed.
   */
  abstract transition(id: string, statuses: CampaignStatus[], patch: CampaignPatch): Promise<Campaign | null>;
  /**
   * Persist a planned job set and move the campaign to running in one unit.
   * Either every job is stored and the campaign is running, or nothing changes.
   */
  abstract activate(campaignId: string, jobs: Job[], startedAt: Date): Promise<Campaign>;
}

export abstract class JobRepository {
  abstract findById(id: string): Promise<Job | null>;
  abstract find(filter: JobFilter): Promise<Job[]>;
  /** Pending, not held, scheduled at or before `now`; ordered for dispatch. */
  abstract findDue(now: Date, limit: number): Promise<Job[]>;
  /** Fenced update; null when the job no longer matches `expected`. */
  abstract transition(id: string, expected: JobExpectation, patch: JobPatch): Promise<Job | null>;
  abstract updateWhere(filter: JobFilter, patch: JobPatch): Promise<number>;
  /** Status totals over the matching jobs. */
  abstract count(filter: JobFilter): Promise<JobCounts>;

  countByCampaign(campaignId: string): Promise<JobCounts> {
    return this.count({ campaignId });
  }
}

export abstract class AccountRepository {
  abstract findById(id: string): Promise<Account | null>;
  abstract findByIds(ids: string[]): Promise<Account[]>;
  abstract findByStatus(status: AccountStatus): Promise<Account[]>;
  abstract update(id: string, patch: Partial<Pick<Account, 'status' | 'lastUsedAt' | 'proxyId'>>): Promise<void>;
}

export abstract class ProxyRepository {
  abstract findById(id: string): Promise<ProxyEndpoint | null>;
  abstract list(): Promise<ProxyEndpoint[]>;
  abstract update(id: string, patch: Partial<Pick<ProxyEndpoint, 'status' | 'latencyMs' | 'lastCheckedAt'>>): Promise<void>;
}
