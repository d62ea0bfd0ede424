import { Account } from '../inventory/entities/account.entity';
import { ProxyEndpoint } from '../inventory/entities/proxy.entity';
import {
  AccountCheckResult,
  AutomationGateway,
  ProxyCheckResult,
  UploadRequest,
  UploadResult,
} from '../automation/automation.gateway';
import { EngineEvent, EngineEventPattern, EngineEventPublisher } from '../engine/engine-events';

export type UploadHandler = (request: UploadRequest, signal: AbortSignal) => Promise<UploadResult>;

/**
 * Scriptable automation gateway. Uploads succeed unless a handler is queued
 * for the call; it also records how many uploads overlap per account.
 */
export class FakeAutomationGateway extends AutomationGateway {
  readonly uploads: UploadRequest[] = [];
  readonly maxConcurrentByAccount = new Map<string, number>();
  proxyResults = new Map<string, ProxyCheckResult | Error>();
  accountResults = new Map<string, AccountCheckResult | Error>();

  private readonly queued: UploadHandler[] = [];
  private readonly active = new Map<string, number>();
  private fallback: UploadHandler = async (request) => ({
    success: true,
    remoteUrl: `https://videos.example.test/${request.jobId}`,
  });

  /** Handlers consumed one per upload, in call order. */
  enqueue(...handlers: UploadHandler[]): void {
    this.queued.push(...handlers);
  }

  setDefault(handler: UploadHandler): void {
    this.fallback = handler;
  }

  async upload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult> {
    this.uploads.push(request);
    const running = (this.active.get(request.accountId) ?? 0) + 1;
    this.active.set(request.accountId, running);
    this.maxConcurrentByAccount.set(
      request.accountId,
      Math.max(running, this.maxConcurrentByAccount.get(request.accountId) ?? 0),
    );

    try {
      const handler = this.queued.shift() ?? this.fallback;
      return await handler(request, signal);
    } finally {
      this.active.set(request.accountId, (this.active.get(request.accountId) ?? 1) - 1);
    }
  }

  async checkProxy(proxy: ProxyEndpoint): Promise<ProxyCheckResult> {
    const result = this.proxyResults.get(proxy.id) ?? { working: true, latencyMs: 42 };
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async testAccount(account: Account): Promise<AccountCheckResult> {
    const result = this.accountResults.get(account.id) ?? { valid: true };
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export class RecordingEventPublisher extends EngineEventPublisher {
  readonly events: EngineEvent[] = [];

  async publish(event: EngineEvent): Promise<void> {
    this.events.push(event);
  }

  patterns(): EngineEventPattern[] {
    return this.events.map((event) => event.pattern);
  }
}

export const transient = (error: string): UploadHandler => async () => ({
  success: false,
  error,
  errorKind: 'transient',
});

export const permanent = (error: string, errorKind: 'permanent' | 'banned' = 'permanent'): UploadHandler =>
  async () => ({ success: false, error, errorKind });

export const neverSettles = (): UploadHandler => () => new Promise<UploadResult>(() => undefined);
