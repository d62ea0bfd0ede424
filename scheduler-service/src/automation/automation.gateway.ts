import { Account } from '../inventory/entities/account.entity';
import { ProxyEndpoint } from '../inventory/entities/proxy.entity';

export interface UploadRequest {
  jobId: string;
  accountId: string;
  proxyId: string | null;
  videoPath: string;
  caption: string;
}

/** `banned` is permanent and also takes the account out of rotation. */
export type UploadErrorKind = 'transient' | 'permanent' | 'banned';

export type UploadResult =
  | { success: true; remoteUrl: string | null }
  | { success: false; error: string; errorKind: UploadErrorKind };

export interface ProxyCheckResult {
  working: boolean;
  latencyMs: number | null;
  error?: string;
}

export interface AccountCheckResult {
  valid: boolean;
}

/**
 * Boundary to the browser-automation workers. Implementations may also throw
 * RetryableError or FatalError from `upload`.
 */
export abstract class AutomationGateway {
  abstract upload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult>;
  abstract checkProxy(proxy: ProxyEndpoint): Promise<ProxyCheckResult>;
  abstract testAccount(account: Account): Promise<AccountCheckResult>;
}
