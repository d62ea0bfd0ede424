import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, In, LessThanOrEqual, Repository } from 'typeorm';
import { Campaign, CampaignStatus } from '../../campaign/entities/campaign.entity';
import { Job, JobStatus } from '../../jobs/entities/job.entity';
import { Account, AccountStatus } from '../../inventory/entities/account.entity';
import { ProxyEndpoint } from '../../inventory/entities/proxy.entity';
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
  emptyJobCounts,
} from '../repositories';

function jobWhere(filter: JobFilter): FindOptionsWhere<Job> {
  const where: FindOptionsWhere<Job> = {};
  if (filter.campaignId !== undefined) {
    where.campaignId = filter.campaignId;
  }
  if (filter.statuses !== undefined) {
    where.status = In(filter.statuses);
  }
  if (filter.held !== undefined) {
    where.held = filter.held;
  }
  return where;
}

interface StatusCountRow {
  status: JobStatus;
  held: boolean;
  count: string;
}

@Injectable()
export class TypeOrmJobRepository extends JobRepository {
  constructor(
    @InjectRepository(Job)
    private readonly jobRepository: Repository<Job>,
  ) {
    super();
  }

  findById(id: string): Promise<Job | null> {
    return this.jobRepository.findOne({ where: { id } });
  }

  find(filter: JobFilter): Promise<Job[]> {
    return this.jobRepository.find({
      where: jobWhere(filter),
      order: { scheduledAt: 'ASC', id: 'ASC' },
    });
  }

  findDue(now: Date, limit: number): Promise<Job[]> {
    return this.jobRepository.find({
      where: {
        status: JobStatus.PENDING,
        held: false,
        scheduledAt: LessThanOrEqual(now),
      },
      order: { scheduledAt: 'ASC', id: 'ASC' },
      take: limit,
    });
  }

  async transition(id: string, expected: JobExpectation, patch: JobPatch): Promise<Job | null> {
    const where: FindOptionsWhere<Job> = { id, status: In(expected.statuses) };
    if (expected.attemptToken !== undefined) {
      where.attemptToken = expected.attemptToken;
    }
    if (expected.held !== undefined) {
      where.held = expected.held;
    }
    // Single conditional UPDATE: the row lock makes the status check and write atomic.
    const result = await this.jobRepository.update(where, patch);
    if (!result.affected) {
      return null;
    }
    return this.findById(id);
  }

  async updateWhere(filter: JobFilter, patch: JobPatch): Promise<number> {
    const result = await this.jobRepository.update(jobWhere(filter), patch);
    return result.affected ?? 0;
  }

  async count(filter: JobFilter): Promise<JobCounts> {
    const query = this.jobRepository
      .createQueryBuilder('job')
      .select('job.status', 'status')
      .addSelect('job.held', 'held')
      .addSelect('COUNT(*)', 'count')
      .groupBy('job.status')
      .addGroupBy('job.held');
    if (filter.campaignId !== undefined) {
      query.andWhere('job.campaign_id = :campaignId', { campaignId: filter.campaignId });
    }
    if (filter.statuses !== undefined) {
      query.andWhere('job.status IN (:...statuses)', { statuses: filter.statuses });
    }
    if (filter.held !== undefined) {
      query.andWhere('job.held = :held', { held: filter.held });
    }
    const rows = await query.getRawMany<StatusCountRow>();

    const counts = emptyJobCounts();
    for (const row of rows) {
      const count = parseInt(row.count, 10);
      counts[row.status] += count;
      counts.total += count;
      if (row.held) {
        counts.held += count;
      }
    }
    return counts;
  }
}

@Injectable()
export class TypeOrmCampaignRepository extends CampaignRepository {
  constructor(
    @InjectRepository(Campaign)
    private readonly campaignRepository: Repository<Campaign>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  create(input: NewCampaign): Promise<Campaign> {
    const campaign = this.campaignRepository.create({
      ...input,
      status: CampaignStatus.DRAFT,
    });
    return this.campaignRepository.save(campaign);
  }

  findById(id: string): Promise<Campaign | null> {
    return this.campaignRepository.findOne({ where: { id } });
  }

  list(): Promise<Campaign[]> {
    return this.campaignRepository.find({ order: { createdAt: 'ASC' } });
  }

  async update(id: string, patch: CampaignPatch): Promise<Campaign | null> {
    await this.campaignRepository.update(id, patch);
    return this.findById(id);
  }

  async transition(id: string, statuses: CampaignStatus[], patch: CampaignPatch): Promise<Campaign | null> {
    const result = await this.campaignRepository.update({ id, status: In(statuses) }, patch);
    if (!result.affected) {
      return null;
    }
    return this.findById(id);
  }

  activate(campaignId: string, jobs: Job[], startedAt: Date): Promise<Campaign> {
    return this.dataSource.transaction(async (manager) => {
      const result = await manager.update(
        Campaign,
        { id: campaignId, status: In([CampaignStatus.DRAFT, CampaignStatus.SCHEDULED]) },
        { status: CampaignStatus.RUNNING, startedAt },
      );
      if (!result.affected) {
        throw new InvalidTransitionError(`Campaign ${campaignId} is not startable`);
      }

      await manager.insert(Job, jobs);

      const campaign = await manager.findOne(Campaign, { where: { id: campaignId } });
      if (!campaign) {
        throw new NotFoundError(`Campaign ${campaignId} not found`);
      }
      return campaign;
    });
  }
}

@Injectable()
export class TypeOrmAccountRepository extends AccountRepository {
  constructor(
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
  ) {
    super();
  }

  findById(id: string): Promise<Account | null> {
    return this.accountRepository.findOne({ where: { id } });
  }

  async findByIds(ids: string[]): Promise<Account[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.accountRepository.find({ where: { id: In(ids) } });
  }

  findByStatus(status: AccountStatus): Promise<Account[]> {
    return this.accountRepository.find({ where: { status }, order: { handle: 'ASC' } });
  }

  async update(id: string, patch: Partial<Pick<Account, 'status' | 'lastUsedAt' | 'proxyId'>>): Promise<void> {
    await this.accountRepository.update(id, patch);
  }
}

@Injectable()
export class TypeOrmProxyRepository extends ProxyRepository {
  constructor(
    @InjectRepository(ProxyEndpoint)
    private readonly proxyRepository: Repository<ProxyEndpoint>,
  ) {
    super();
  }

  findById(id: string): Promise<ProxyEndpoint | null> {
    return this.proxyRepository.findOne({ where: { id } });
  }

  list(): Promise<ProxyEndpoint[]> {
    return this.proxyRepository.find({ order: { host: 'ASC', port: 'ASC' } });
  }

  async update(
    id: string,
    patch: Partial<Pick<ProxyEndpoint, 'status' | 'latencyMs' | 'lastCheckedAt'>>,
  ): Promise<void> {
    await this.proxyRepository.update(id, patch);
  }
}
