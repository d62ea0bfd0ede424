import { randomUUID } from 'node:crypto';
import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { ResourceBusyError } from '../common/errors';

export interface LeaseHolder {
  jobId: string;
  campaignId: string;
}

export interface Lease {
  /** Exclusivity key: the account id. */
  key: string;
  token: string;
  holder: LeaseHolder;
  acquiredAt: Date;
}

/**
 * Lease table keyed by account id.
 *
 * Every operation runs to completion without awaiting, so on the event loop
 * acquire-if-free and release are linearizable. The proxy follows the account
 * record and is never leased on its own.
 */
@Injectable()
export class ResourceAllocator {
  private readonly logger = new Logger(ResourceAllocator.name);
  private readonly leases = new Map<string, Lease>();

  constructor(private readonly clock: Clock) {}

  tryAcquire(accountId: string, holder: LeaseHolder): Lease | null {
    if (this.leases.has(accountId)) {
      return null;
    }
    const lease: Lease = {
      key: accountId,
      token: randomUUID(),
      holder,
      acquiredAt: this.clock.now(),
    };
    this.leases.set(accountId, lease);
    this.logger.debug('Lease acquired', { accountId, jobId: holder.jobId });
    return lease;
  }

  acquire(accountId: string, holder: LeaseHolder): Lease {
    const lease = this.tryAcquire(accountId, holder);
    if (!lease) {
      throw new ResourceBusyError(`Account ${accountId} is leased`, {
        accountId,
        heldBy: this.leases.get(accountId)?.holder.jobId,
      });
    }
    return lease;
  }

  /**
   * Idempotent. A lease that was revoked and re-granted to someone else is
   * left alone: only the matching token releases.
   */
  release(lease: Lease): boolean {
    const current = this.leases.get(lease.key);
    if (!current || current.token !== lease.token) {
      return false;
    }
    this.leases.delete(lease.key);
    this.logger.debug('Lease released', { accountId: lease.key, jobId: lease.holder.jobId });
    return true;
  }

  /** Forcible removal regardless of token. */
  revoke(accountId: string): Lease | null {
    const current = this.leases.get(accountId);
    if (!current) {
      return null;
    }
    this.leases.delete(accountId);
    this.logger.warn('Lease revoked', { accountId, jobId: current.holder.jobId });
    return current;
  }

  holderOf(accountId: string): LeaseHolder | null {
    return this.leases.get(accountId)?.holder ?? null;
  }

  isLeased(accountId: string): boolean {
    return this.leases.has(accountId);
  }

  get size(): number {
    return this.leases.size;
  }
}
