import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { Campaign, CampaignStatus } from '../../campaign/entities/campaign.entity';
import { Job, JobStatus } from '../../jobs/entities/job.entity';
import { Account, AccountStatus } from '../../inventory/entities/account.entity';
import { ProxyEndpoint, ProxyStatus } from '../../inventory/entities/proxy.entity';
import { InvalidTransitionError, NotFoundError } from '../../common/errors';
import {
  AccountRepository,
  CampaignPatch,
  CampaignRepository,
  JobCounts,
  JobExpectation,
  JobFilter,
  JobPatch,
  JobRepository,
  NewCampaign,
  ProxyRepository,
  compareJobsForDispatch,
  emptyJobCounts,
} from '../repositories';

// Rows are copied on the way in and out so callers never share state with the store.
function copy<T extends object>(ctor: new () => T, row: T): T {
  return Object.assign(new ctor(), row);
}

function matchesFilter(job: Job, filter: JobFilter): boolean {
  if (filter.campaignId !== undefined && job.campaignId !== filter.campaignId) {
    return false;
  }
  if (filter.statuses !== undefined && !filter.statuses.includes(job.status)) {
    return false;
  }
  if (filter.held !== undefined && job.held !== filter.held) {
    return false;
  }
  return true;
}

@Injectable()
export class MemoryJobRepository extends JobRepository {
  private readonly rows = new Map<string, Job>();

  /** Insert without the campaign-activation path; used by activate() and fixtures. */
  insertMany(jobs: Job[]): void {
    const duplicate = jobs.find((job) => this.rows.has(job.id));
    if (duplicate) {
      throw new InvalidTransitionError(`Job ${duplicate.id} already exists`);
    }
    const now = new Date();
    for (const job of jobs) {
      this.rows.set(job.id, copy(Job, { ...job, createdAt: now, updatedAt: now }));
    }
  }

  async findById(id: string): Promise<Job | null> {
    const row = this.rows.get(id);
    return row ? copy(Job, row) : null;
  }

  async find(filter: JobFilter): Promise<Job[]> {
    return [...this.rows.values()]
      .filter((job) => matchesFilter(job, filter))
      .sort(compareJobsForDispatch)
      .map((job) => copy(Job, job));
  }

  async findDue(now: Date, limit: number): Promise<Job[]> {
    const due = await this.find({ statuses: [JobStatus.PENDING], held: false });
    return due.filter((job) => job.scheduledAt.getTime() <= now.getTime()).slice(0, limit);
  }

  async transition(id: string, expected: JobExpectation, patch: JobPatch): Promise<Job | null> {
    const row = this.rows.get(id);
    if (!row || !expected.statuses.includes(row.status)) {
      return null;
    }
    if (expected.attemptToken !== undefined && row.attemptToken !== expected.attemptToken) {
      return null;
    }
    if (expected.held !== undefined && row.held !== expected.held) {
      return null;
    }
    const updated = copy(Job, { ...row, ...patch, updatedAt: new Date() });
    this.rows.set(id, updated);
    return copy(Job, updated);
  }

  async updateWhere(filter: JobFilter, patch: JobPatch): Promise<number> {
    let affected = 0;
    for (const [id, row] of this.rows) {
      if (matchesFilter(row, filter)) {
        this.rows.set(id, copy(Job, { ...row, ...patch, updatedAt: new Date() }));
        affected++;
      }
    }
    return affected;
  }

  async count(filter: JobFilter): Promise<JobCounts> {
    const counts = emptyJobCounts();
    for (const job of this.rows.values()) {
      if (!matchesFilter(job, filter)) {
        continue;
      }
      counts[job.status]++;
      counts.total++;
      if (job.held) {
        counts.held++;
      }
    }
    return counts;
  }
}

@Injectable()
export class MemoryCampaignRepository extends CampaignRepository {
  private readonly rows = new Map<string, Campaign>();

  constructor(private readonly jobs: MemoryJobRepository) {
    super();
  }

  async create(input: NewCampaign): Promise<Campaign> {
    const now = new Date();
    const campaign = copy(Campaign, {
      id: randomUUID(),
      status: CampaignStatus.DRAFT,
      errorMessage: null,
      startedAt: null,
      completedAt: null,
      createdAt: now,
      updatedAt: now,
      ...input,
      seed: input.seed ?? null,
    });
    this.rows.set(campaign.id, campaign);
    return copy(Campaign, campaign);
  }

  async findById(id: string): Promise<Campaign | null> {
    const row = this.rows.get(id);
    return row ? copy(Campaign, row) : null;
  }

  async list(): Promise<Campaign[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((row) => copy(Campaign, row));
  }

  async update(id: string, patch: CampaignPatch): Promise<Campaign | null> {
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }
    const updated = copy(Campaign, { ...row, ...patch, updatedAt: new Date() });
    this.rows.set(id, updated);
    return copy(Campaign, updated);
  }

  async transition(id: string, statuses: CampaignStatus[], patch: CampaignPatch): Promise<Campaign | null> {
    const row = this.rows.get(id);
    if (!row || !statuses.includes(row.status)) {
      return null;
    }
    return this.update(id, patch);
  }

  async activate(campaignId: string, jobs: Job[], startedAt: Date): Promise<Campaign> {
    const row = this.rows.get(campaignId);
    if (!row) {
      throw new NotFoundError(`Campaign ${campaignId} not found`);
    }
    if (row.status !== CampaignStatus.DRAFT && row.status !== CampaignStatus.SCHEDULED) {
      throw new InvalidTransitionError(`Campaign ${campaignId} cannot start from ${row.status}`);
    }
    this.jobs.insertMany(jobs);
    const updated = await this.update(campaignId, { status: CampaignStatus.RUNNING, startedAt });
    if (!updated) {
      throw new NotFoundError(`Campaign ${campaignId} not found`);
    }
    return updated;
  }
}

@Injectable()
export class MemoryAccountRepository extends AccountRepository {
  private readonly rows = new Map<string, Account>();

  seed(accounts: Array<Partial<Account> & Pick<Account, 'id'>>): void {
    const now = new Date();
    for (const account of accounts) {
      this.rows.set(
        account.id,
        copy(Account, {
          handle: account.id,
          status: AccountStatus.ACTIVE,
          proxyId: null,
          lastUsedAt: null,
          createdAt: now,
          updatedAt: now,
          ...account,
        }),
      );
    }
  }

  async findById(id: string): Promise<Account | null> {
    const row = this.rows.get(id);
    return row ? copy(Account, row) : null;
  }

  async findByIds(ids: string[]): Promise<Account[]> {
    return ids.flatMap((id) => {
      const row = this.rows.get(id);
      return row ? [copy(Account, row)] : [];
    });
  }

  async findByStatus(status: AccountStatus): Promise<Account[]> {
    return [...this.rows.values()]
      .filter((row) => row.status === status)
      .sort((a, b) => a.handle.localeCompare(b.handle))
      .map((row) => copy(Account, row));
  }

  async update(id: string, patch: Partial<Pick<Account, 'status' | 'lastUsedAt' | 'proxyId'>>): Promise<void> {
    const row = this.rows.get(id);
    if (row) {
      this.rows.set(id, copy(Account, { ...row, ...patch, updatedAt: new Date() }));
    }
  }
}

@Injectable()
export class MemoryProxyRepository extends ProxyRepository {
  private readonly rows = new Map<string, ProxyEndpoint>();

  seed(proxies: Array<Partial<ProxyEndpoint> & Pick<ProxyEndpoint, 'id'>>): void {
    for (const proxy of proxies) {
      this.rows.set(
        proxy.id,
        copy(ProxyEndpoint, {
          host: '127.0.0.1',
          port: 8080,
          status: ProxyStatus.INACTIVE,
          latencyMs: null,
          lastCheckedAt: null,
          createdAt: new Date(),
          ...proxy,
        }),
      );
    }
  }

  async findById(id: string): Promise<ProxyEndpoint | null> {
    const row = this.rows.get(id);
    return row ? copy(ProxyEndpoint, row) : null;
  }

  async list(): Promise<ProxyEndpoint[]> {
    return [...this.rows.values()].map((row) => copy(ProxyEndpoint, row));
  }

  async update(
    id: string,
    patch: Partial<Pick<ProxyEndpoint, 'status' | 'latencyMs' | 'lastCheckedAt'>>,
  ): Promise<void> {
    const row = this.rows.get(id);
    if (row) {
      this.rows.set(id, copy(ProxyEndpoint, { ...row, ...patch }));
    }
  }
}
