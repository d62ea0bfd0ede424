import { JobStatus } from './entities/job.entity';
import { EngineHarness, createEngineHarness, startCampaign } from '../testing/engine-harness';
import { permanent } from '../testing/fakes';
import { JobsService } from './jobs.service';

describe('JobsService', () => {
  let harness: EngineHarness;
  let service: JobsService;

  beforeEach(() => {
    harness = createEngineHarness();
    harness.accounts.seed([{ id: 'account-1' }, { id: 'account-2' }, { id: 'account-3' }]);
    service = new JobsService(harness.jobs, harness.lifecycle, harness.executor);
  });

  describe('statistics', () => {
    it('reports zero success for an empty store', async () => {
      expect(await service.statistics()).toMatchObject({ total: 0, successRate: 0 });
    });

    it('totals jobs per status with a success rate, overall or per campaign', async () => {
      harness.gateway.enqueue(permanent('rejected'));
      const { campaign: finished } = await startCampaign(harness);
      harness.clock.set('2025-01-01T00:40:00.000Z');
      await harness.tickAndSettle();
      await startCampaign(harness);

      expect(await service.statistics(finished.id)).toEqual({
        [JobStatus.PENDING]: 0,
        [JobStatus.RUNNING]: 0,
        [JobStatus.RETRYING]: 0,
        [JobStatus.COMPLETED]: 2,
        [JobStatus.FAILED]: 1,
        [JobStatus.CANCELLED]: 0,
        total: 3,
        held: 0,
        successRate: 66.67,
      });
      expect(await service.statistics()).toMatchObject({
        [JobStatus.PENDING]: 3,
        [JobStatus.COMPLETED]: 2,
        total: 6,
        successRate: 33.33,
      });
    });
  });

  describe('retryFailed', () => {
    it('requeues failed jobs with retries left across every campaign', async () => {
      const first = await startCampaign(harness);
      const second = await startCampaign(harness);
      const [retryable] = await harness.jobs.find({ campaignId: first.campaign.id });
      const [spent, other] = await harness.jobs.find({ campaignId: second.campaign.id });
      const pending = { statuses: [JobStatus.PENDING] };
      await harness.jobs.transition(retryable.id, pending, { status: JobStatus.FAILED });
      await harness.jobs.transition(spent.id, pending, { status: JobStatus.FAILED, retryCount: 3 });
      await harness.jobs.transition(other.id, pending, { status: JobStatus.FAILED, retryCount: 1 });

      const requeued = await service.retryFailed();

      expect(requeued.map((job) => [job.id, job.status, job.retryCount])).toEqual([
        [retryable.id, JobStatus.PENDING, 1],
        [other.id, JobStatus.PENDING, 2],
      ]);
      expect((await harness.jobs.findById(spent.id))?.status).toBe(JobStatus.FAILED);
    });

    it('limits the sweep to one campaign when asked', async () => {
      const first = await startCampaign(harness);
      const second = await startCampaign(harness);
      await harness.jobs.updateWhere({ statuses: [JobStatus.PENDING] }, { status: JobStatus.FAILED });

      const requeued = await service.retryFailed(second.campaign.id);

      expect(requeued).toHaveLength(3);
      expect(requeued.every((job) => job.campaignId === second.campaign.id)).toBe(true);
      expect((await harness.jobs.count({ campaignId: first.campaign.id }))[JobStatus.FAILED]).toBe(3);
    });

    it('skips failed jobs of cancelled campaigns', async () => {
      const { campaign } = await startCampaign(harness);
      await harness.campaignService.cancel(campaign.id);
      await harness.jobs.updateWhere({ campaignId: campaign.id }, { status: JobStatus.FAILED });

      expect(await service.retryFailed()).toEqual([]);
    });
  });
});
