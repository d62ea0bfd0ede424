import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '../common/errors';
import { RandomFactory, RandomSource, sampleWithoutReplacement, uniform } from '../common/random';
import { Account, AccountStatus } from '../inventory/entities/account.entity';
import { Job, JobStatus } from '../jobs/entities/job.entity';
import { AccountRepository, compareJobsForDispatch } from '../persistence/repositories';
import { RANDOM_FACTORY } from '../engine/engine.tokens';
import { ResourceAllocator } from '../engine/resource-allocator';
import { AccountFilters, AccountSelection, Campaign } from './entities/campaign.entity';

export interface CaptionContext {
  account: string;
  video: string;
  index: number;
}

/** Replaces `{account}`, `{video}` and `{index}`; other braces are left as written. */
export function renderCaption(template: string, context: CaptionContext): string {
  return template.replace(/\{(account|video|index)\}/g, (_match, key: keyof CaptionContext) =>
    String(context[key]),
  );
}

/**
 * Expands a campaign into its complete job set.
 *
 * Pairs videos with accounts round-robin over max(videos, accounts) slots and
 * spreads them evenly across the schedule window, each slot offset by a
 * seeded random delay and clamped to the window. Any configuration problem
 * throws before a single job exists.
 */
@Injectable()
export class CampaignPlanner {
  private readonly logger = new Logger(CampaignPlanner.name);

  constructor(
    private readonly accounts: AccountRepository,
    private readonly allocator: ResourceAllocator,
    @Inject(RANDOM_FACTORY) private readonly randomFactory: RandomFactory,
  ) {}

  async plan(campaign: Campaign): Promise<Job[]> {
    this.validate(campaign);

    const random = this.randomFactory(campaign.seed ?? campaign.id);
    const accounts = await this.selectAccounts(campaign.accountSelection, random);
    if (accounts.length === 0) {
      throw new ConfigurationError('No eligible accounts for campaign', {
        campaignId: campaign.id,
        strategy: campaign.accountSelection.strategy,
      });
    }

    const videos = campaign.videoRefs;
    const start = campaign.scheduleStart.getTime();
    const end = campaign.scheduleEnd.getTime();
    const pairCount = Math.max(videos.length, accounts.length);
    const baseInterval = (end - start) / pairCount;

    const jobs: Job[] = [];
    for (let i = 0; i < pairCount; i++) {
      const account = accounts[i % accounts.length];
      const videoRef = videos[i % videos.length];
      const delayMs = uniform(random, campaign.delayMinSeconds, campaign.delayMaxSeconds) * 1000;
      const scheduledAt = new Date(Math.min(end, Math.max(start, Math.round(start + i * baseInterval + delayMs))));

      jobs.push(
        Object.assign(new Job(), {
          id: randomUUID(),
          campaignId: campaign.id,
          accountId: account.id,
          proxyId: account.proxyId,
          videoRef,
          caption: renderCaption(campaign.captionTemplate, {
            account: account.handle,
            video: videoRef,
            index: i + 1,
          }),
          status: JobStatus.PENDING,
          held: false,
          scheduledAt,
          eligibleAt: scheduledAt,
          startedAt: null,
          completedAt: null,
          retryCount: 0,
          maxRetries: campaign.maxRetries,
          attemptToken: null,
          errorMessage: null,
          errorKind: null,
          remoteUrl: null,
        }),
      );
    }

    jobs.sort(compareJobsForDispatch);
    this.logger.log('Campaign planned', {
      campaignId: campaign.id,
      accounts: accounts.length,
      videos: videos.length,
      jobs: jobs.length,
    });
    return jobs;
  }

  private validate(campaign: Campaign): void {
    const start = campaign.scheduleStart.getTime();
    const end = campaign.scheduleEnd.getTime();
    if (Number.isNaN(start) || Number.isNaN(end)) {
      throw new ConfigurationError('Schedule window has an invalid date', { campaignId: campaign.id });
    }
    if (end - start <= 0) {
      throw new ConfigurationError('Schedule window must end after it starts', {
        campaignId: campaign.id,
        scheduleStart: campaign.scheduleStart.toISOString(),
        scheduleEnd: campaign.scheduleEnd.toISOString(),
      });
    }
    if (campaign.delayMinSeconds < 0 || campaign.delayMaxSeconds < campaign.delayMinSeconds) {
      throw new ConfigurationError('Delay range must satisfy 0 <= min <= max', {
        campaignId: campaign.id,
        delayMinSeconds: campaign.delayMinSeconds,
        delayMaxSeconds: campaign.delayMaxSeconds,
      });
    }
    if (campaign.videoRefs.length === 0) {
      throw new ConfigurationError('Campaign has no videos', { campaignId: campaign.id });
    }
  }

  private async selectAccounts(selection: AccountSelection, random: RandomSource): Promise<Account[]> {
    switch (selection.strategy) {
      case 'ALL':
        return this.eligibleAccounts(selection.filters);

      case 'RANDOM': {
        const count = selection.count ?? 0;
        if (!Number.isInteger(count) || count < 1) {
          throw new ConfigurationError('RANDOM selection needs a positive integer count', { count });
        }
        const eligible = await this.eligibleAccounts(selection.filters);
        if (count > eligible.length) {
          this.logger.warn(`RANDOM(${count}) exceeds ${eligible.length} eligible accounts, using all`);
        }
        return sampleWithoutReplacement(random, eligible, count);
      }

      case 'SPECIFIC':
        return this.specificAccounts(selection.accountIds ?? []);
    }
  }

  /** Active accounts not leased by another running campaign, after filters. */
  private async eligibleAccounts(filters: AccountFilters = {}): Promise<Account[]> {
    const excluded = new Set(filters.excludeAccountIds ?? []);
    const active = await this.accounts.findByStatus(AccountStatus.ACTIVE);
    return active.filter(
      (account) =>
        !this.allocator.isLeased(account.id) &&
        !excluded.has(account.id) &&
        (!filters.requireProxy || account.proxyId !== null) &&
        (filters.proxyId === undefined || account.proxyId === filters.proxyId),
    );
  }

  private async specificAccounts(accountIds: string[]): Promise<Account[]> {
    const ids = [...new Set(accountIds)];
    if (ids.length === 0) {
      throw new ConfigurationError('SPECIFIC selection needs at least one account id');
    }

    const found = new Map((await this.accounts.findByIds(ids)).map((account) => [account.id, account]));
    const missing = ids.filter((id) => !found.has(id));
    if (missing.length > 0) {
      throw new ConfigurationError(`Unknown accounts: ${missing.join(', ')}`, { missing });
    }

    const accounts = ids.flatMap((id) => {
      const account = found.get(id);
      return account ? [account] : [];
    });
    const inactive = accounts.filter((account) => account.status !== AccountStatus.ACTIVE);
    if (inactive.length > 0) {
      throw new ConfigurationError(`Accounts not active: ${inactive.map((account) => account.id).join(', ')}`, {
        inactive: inactive.map((account) => ({ id: account.id, status: account.status })),
      });
    }
    return accounts;
  }
}
