import { TimeoutError } from 'rxjs';
import { FatalError, RetryableError } from '../common/errors';
import { ConfigService } from '../config/config.service';
import { Account, AccountStatus } from '../inventory/entities/account.entity';
import { ProxyEndpoint, ProxyStatus } from '../inventory/entities/proxy.entity';
import { TEST_ENV } from '../testing/engine-harness';
import { AUTOMATION_PATTERNS } from '../rabbitmq/types';
import { UploadRequest } from './automation.gateway';
import { RmqAutomationGateway } from './rmq-automation.gateway';

describe('RmqAutomationGateway', () => {
  const request: UploadRequest = {
    jobId: '7b0c1f52-4a55-4d0e-9a53-0f3f3c0f6a11',
    accountId: '2c9d7e0a-0a8e-4f73-9a44-5bd6a3c3f9b2',
    proxyId: null,
    videoPath: 'videos/a.mp4',
    caption: 'hello',
  };
  const config = new ConfigService({ ...TEST_ENV, AUTOMATION_REQUEST_TIMEOUT_MS: '1500' });
  let send: jest.Mock<Promise<unknown>, [string, object, number]>;
  let gateway: RmqAutomationGateway;

  beforeEach(() => {
    send = jest.fn<Promise<unknown>, [string, object, number]>();
    gateway = new RmqAutomationGateway({ request: send }, config);
  });

  it('sends the upload on the automation pattern with the configured timeout', async () => {
    send.mockResolvedValue({ success: true, remoteUrl: 'https://videos.example.test/1' });

    const result = await gateway.upload(request, new AbortController().signal);

    expect(result).toEqual({ success: true, remoteUrl: 'https://videos.example.test/1' });
    expect(send).toHaveBeenCalledWith(AUTOMATION_PATTERNS.upload, expect.objectContaining(request), 1500);
  });

  it('maps a rejected upload and defaults its kind to transient', async () => {
    send.mockResolvedValueOnce({ success: false, error: 'captcha', errorKind: 'banned' });
    send.mockResolvedValueOnce({ success: false });

    expect(await gateway.upload(request, new AbortController().signal)).toEqual({
      success: false,
      error: 'captcha',
      errorKind: 'banned',
    });
    expect(await gateway.upload(request, new AbortController().signal)).toEqual({
      success: false,
      error: 'Upload rejected',
      errorKind: 'transient',
    });
  });

  it('turns malformed replies into retryable errors', async () => {
    send.mockResolvedValueOnce('ok');
    send.mockResolvedValueOnce({ success: 'yes' });

    await expect(gateway.upload(request, new AbortController().signal)).rejects.toBeInstanceOf(RetryableError);
    await expect(gateway.upload(request, new AbortController().signal)).rejects.toThrow(
      'automation.upload returned a malformed reply',
    );
  });

  it('turns a reply timeout into a retryable error', async () => {
    send.mockRejectedValue(new TimeoutError());

    await expect(gateway.upload(request, new AbortController().signal)).rejects.toThrow('automation.upload timed out');
  });

  it('does not send an upload that was already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.upload(request, controller.signal)).rejects.toBeInstanceOf(FatalError);
    expect(send).not.toHaveBeenCalled();
  });

  it('refuses to send an upload request that fails validation', async () => {
    const attempt = gateway.upload({ ...request, accountId: 'not-a-uuid', videoPath: '' }, new AbortController().signal);

    await expect(attempt).rejects.toBeInstanceOf(FatalError);
    await expect(attempt).rejects.toMatchObject({
      reason: 'permanent',
      details: { errors: ['accountId', 'videoPath'] },
    });
    expect(send).not.toHaveBeenCalled();
  });

  it('reads proxy and account check replies', async () => {
    send.mockResolvedValueOnce({ working: true, latencyMs: 120 });
    send.mockResolvedValueOnce({ valid: false });
    const account = Object.assign(new Account(), { id: 'account-1', status: AccountStatus.ACTIVE, proxyId: null });

    expect(
      await gateway.checkProxy(
        Object.assign(new ProxyEndpoint(), { id: 'proxy-1', host: '10.0.0.1', port: 3128, status: ProxyStatus.ACTIVE }),
      ),
    ).toEqual({ working: true, latencyMs: 120, error: undefined });
    expect(await gateway.testAccount(account)).toEqual({ valid: false });
    expect(send.mock.calls.map(([pattern]) => pattern)).toEqual([
      AUTOMATION_PATTERNS.checkProxy,
      AUTOMATION_PATTERNS.testAccount,
    ]);
  });
});
