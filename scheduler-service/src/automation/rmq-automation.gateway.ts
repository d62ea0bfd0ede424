import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import { validate } from 'class-validator';
import { TimeoutError } from 'rxjs';
import { ConfigService } from '../config/config.service';
import { FatalError, RetryableError, errorMessage } from '../common/errors';
import { Account } from '../inventory/entities/account.entity';
import { ProxyEndpoint } from '../inventory/entities/proxy.entity';
import { RabbitMQService } from '../rabbitmq/rabbitmq.service';
import {
  AccountTestReplyMessage,
  AUTOMATION_PATTERNS,
  ProxyCheckReplyMessage,
  UploadReplyMessage,
  UploadRequestMessage,
} from '../rabbitmq/types';
import {
  AccountCheckResult,
  AutomationGateway,
  ProxyCheckResult,
  UploadRequest,
  UploadResult,
} from './automation.gateway';

/** Automation collaborator reached over RabbitMQ request/response. */
@Injectable()
export class RmqAutomationGateway extends AutomationGateway {
  private readonly logger = new Logger(RmqAutomationGateway.name);

  constructor(
    @Inject(RabbitMQService) private readonly rabbitMQService: Pick<RabbitMQService, 'request'>,
    private readonly configService: ConfigService,
  ) {
    super();
  }

  async upload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult> {
    if (signal.aborted) {
      throw new FatalError(`Upload for job ${request.jobId} was cancelled`, 'cancelled');
    }

    const message = plainToInstance(UploadRequestMessage, request);
    const invalid = await validate(message);
    if (invalid.length > 0) {
      // Resending the same job data cannot fix it.
      throw new FatalError(`Upload for job ${request.jobId} has an invalid request`, 'permanent', {
        errors: invalid.map((error) => error.property),
      });
    }
    const reply = await this.call(AUTOMATION_PATTERNS.upload, message, UploadReplyMessage);

    if (reply.success) {
      return { success: true, remoteUrl: reply.remoteUrl ?? null };
    }
    return {
      success: false,
      error: reply.error ?? 'Upload rejected',
      errorKind: reply.errorKind ?? 'transient',
    };
  }

  async checkProxy(proxy: ProxyEndpoint): Promise<ProxyCheckResult> {
    const reply = await this.call(
      AUTOMATION_PATTERNS.checkProxy,
      { proxyId: proxy.id, host: proxy.host, port: proxy.port },
      ProxyCheckReplyMessage,
    );
    return { working: reply.working, latencyMs: reply.latencyMs ?? null, error: reply.error };
  }

  async testAccount(account: Account): Promise<AccountCheckResult> {
    const reply = await this.call(
      AUTOMATION_PATTERNS.testAccount,
      { accountId: account.id, proxyId: account.proxyId },
      AccountTestReplyMessage,
    );
    return { valid: reply.valid };
  }

  private async call<T extends object>(
    pattern: string,
    payload: object,
    replyType: ClassConstructor<T>,
  ): Promise<T> {
    let raw: unknown;
    try {
      raw = await this.rabbitMQService.request(
        pattern,
        payload,
        this.configService.automationRequestTimeoutMs,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new RetryableError(`${pattern} timed out`, { pattern });
      }
      throw new RetryableError(`${pattern} failed: ${errorMessage(error)}`, { pattern });
    }

    if (typeof raw !== 'object' || raw === null) {
      throw new RetryableError(`${pattern} returned a malformed reply`, { pattern });
    }

    const reply = plainToInstance(replyType, raw);
    const errors = await validate(reply);
    if (errors.length > 0) {
      this.logger.warn('Invalid automation reply', {
        pattern,
        errors: errors.map((error) => error.toString()),
      });
      throw new RetryableError(`${pattern} returned a malformed reply`, { pattern });
    }
    return reply;
  }
}
