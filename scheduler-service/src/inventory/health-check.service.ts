import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { NotFoundError, errorMessage } from '../common/errors';
import { AccountRepository, ProxyRepository } from '../persistence/repositories';
import { AutomationGateway } from '../automation/automation.gateway';
import { RateLimiter } from '../engine/rate-limiter';
import { AccountStatus } from './entities/account.entity';
import { ProxyStatus } from './entities/proxy.entity';

export interface ProxyCheckReport {
  proxyId: string;
  status: ProxyStatus;
  latencyMs: number | null;
  error?: string;
}

export interface AccountTestReport {
  accountId: string;
  valid: boolean;
  status: AccountStatus;
}

/**
 * Proxy and account checks. Each waits on its own rate-limit bucket and never
 * touches job state.
 */
@Injectable()
export class HealthCheckService {
  private readonly logger = new Logger(HealthCheckService.name);

  constructor(
    private readonly proxies: ProxyRepository,
    private readonly accounts: AccountRepository,
    private readonly gateway: AutomationGateway,
    private readonly rateLimiter: RateLimiter,
    private readonly clock: Clock,
  ) {}

  async checkProxy(proxyId: string): Promise<ProxyCheckReport> {
    const proxy = await this.proxies.findById(proxyId);
    if (!proxy) {
      throw new NotFoundError(`Proxy ${proxyId} not found`);
    }

    await this.rateLimiter.acquire('proxy-check');

    let report: ProxyCheckReport;
    try {
      const result = await this.gateway.checkProxy(proxy);
      report = result.working
        ? { proxyId, status: ProxyStatus.ACTIVE, latencyMs: result.latencyMs }
        : { proxyId, status: ProxyStatus.ERROR, latencyMs: null, error: result.error };
    } catch (error) {
      report = { proxyId, status: ProxyStatus.ERROR, latencyMs: null, error: errorMessage(error) };
    }

    await this.proxies.update(proxyId, {
      status: report.status,
      latencyMs: report.latencyMs,
      lastCheckedAt: this.clock.now(),
    });

    if (report.status === ProxyStatus.ACTIVE) {
      this.logger.log(`Proxy ${proxy.host}:${proxy.port} is active (latency: ${report.latencyMs}ms)`);
    } else {
      this.logger.warn(`Proxy ${proxy.host}:${proxy.port} failed: ${report.error ?? 'unknown error'}`);
    }
    return report;
  }

  async checkAllProxies(): Promise<ProxyCheckReport[]> {
    const proxies = await this.proxies.list();
    const reports: ProxyCheckReport[] = [];
    for (const proxy of proxies) {
      reports.push(await this.checkProxy(proxy.id));
    }
    return reports;
  }

  async testAccount(accountId: string): Promise<AccountTestReport> {
    const account = await this.accounts.findById(accountId);
    if (!account) {
      throw new NotFoundError(`Account ${accountId} not found`);
    }

    await this.rateLimiter.acquire('account-test');

    let valid: boolean;
    try {
      ({ valid } = await this.gateway.testAccount(account));
    } catch (error) {
      this.logger.error(`Error testing account ${accountId}: ${errorMessage(error)}`);
      valid = false;
    }

    const status = valid ? AccountStatus.ACTIVE : AccountStatus.INACTIVE;
    await this.accounts.update(accountId, { status });
    if (valid) {
      this.logger.log(`Account ${account.handle} is valid`);
    } else {
      this.logger.warn(`Account ${account.handle} failed its session test`);
    }
    return { accountId, valid, status };
  }
}
