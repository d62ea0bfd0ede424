import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { ConfigurationError, InvalidTransitionError, NotFoundError } from '../common/errors';
import { JobStatus } from '../jobs/entities/job.entity';
import { EngineHarness, createEngineHarness } from '../testing/engine-harness';
import { permanent } from '../testing/fakes';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import { UpdateCampaignDto } from './dto/update-campaign.dto';
import { CampaignStatus } from './entities/campaign.entity';

const dto = (overrides: Partial<CreateCampaignDto> = {}): CreateCampaignDto =>
  plainToInstance(CreateCampaignDto, {
    name: 'Summer drop',
    videoRefs: ['videos/summer.mp4'],
    captionTemplate: 'Clip {index} from {account}',
    accountSelection: { strategy: 'ALL' },
    scheduleStart: '2025-01-01T00:00:00.000Z',
    scheduleEnd: '2025-01-01T02:00:00.000Z',
    delayMinSeconds: 0,
    delayMaxSeconds: 30,
    ...overrides,
  });

describe('CreateCampaignDto', () => {
  it('accepts a well-formed body', async () => {
    expect(await validate(dto())).toEqual([]);
  });

  it('rejects an unknown strategy and an empty video list', async () => {
    const errors = await validate(dto({ videoRefs: [], accountSelection: { strategy: 'ALL' } }));
    const nested = await validate(
      plainToInstance(CreateCampaignDto, { ...dto(), accountSelection: { strategy: 'SOME' } }),
    );

    expect(errors.map((error) => error.property)).toEqual(['videoRefs']);
    expect(nested.map((error) => error.property)).toEqual(['accountSelection']);
  });
});

describe('CampaignService', () => {
  let harness: EngineHarness;

  beforeEach(() => {
    harness = createEngineHarness();
    harness.accounts.seed([
      { id: 'account-1', handle: 'alpha' },
      { id: 'account-2', handle: 'bravo' },
    ]);
  });

  describe('create', () => {
    it('stores a draft with the configured default retry budget', async () => {
      const campaign = await harness.campaignService.create(dto());

      expect(campaign).toMatchObject({
        name: 'Summer drop',
        status: CampaignStatus.DRAFT,
        maxRetries: 3,
        seed: null,
        scheduleStart: new Date('2025-01-01T00:00:00.000Z'),
        scheduleEnd: new Date('2025-01-01T02:00:00.000Z'),
      });
      expect(await harness.campaignService.findAll()).toHaveLength(1);
    });

    it('keeps an explicit retry budget and seed', async () => {
      const campaign = await harness.campaignService.create(dto({ maxRetries: 0, seed: 'fixed' }));

      expect(campaign).toMatchObject({ maxRetries: 0, seed: 'fixed' });
    });
  });

  it('throws NotFound for an unknown campaign', async () => {
    await expect(harness.campaignService.findOne('00000000-0000-0000-0000-000000000000')).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  describe('start', () => {
    it('plans the jobs and moves the campaign to running', async () => {
      const { id } = await harness.campaignService.create(dto());

      const result = await harness.campaignService.start(id);

      expect(result.jobsCreated).toBe(2);
      expect(result.campaign).toMatchObject({ status: CampaignStatus.RUNNING, startedAt: harness.clock.now() });
      expect((await harness.jobs.find({ campaignId: id })).map((job) => job.caption)).toEqual([
        'Clip 1 from alpha',
        'Clip 2 from bravo',
      ]);
    });

    it('refuses to start twice', async () => {
      const { id } = await harness.campaignService.create(dto());
      await harness.campaignService.start(id);

      await expect(harness.campaignService.start(id)).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(await harness.jobs.find({ campaignId: id })).toHaveLength(2);
    });

    it('leaves the campaign untouched when planning fails', async () => {
      const { id } = await harness.campaignService.create(
        dto({ accountSelection: { strategy: 'SPECIFIC', accountIds: ['account-1', 'account-9'] } }),
      );

      await expect(harness.campaignService.start(id)).rejects.toBeInstanceOf(ConfigurationError);
      expect((await harness.campaignService.findOne(id)).status).toBe(CampaignStatus.DRAFT);
      expect(await harness.jobs.find({ campaignId: id })).toEqual([]);
    });
  });

  describe('pause and resume', () => {
    it('holds pending jobs while paused', async () => {
      const { id } = await harness.campaignService.create(dto());
      await harness.campaignService.start(id);

      const paused = await harness.campaignService.pause(id);

      expect(paused.status).toBe(CampaignStatus.PAUSED);
      expect((await harness.jobs.find({ campaignId: id })).map((job) => job.held)).toEqual([true, true]);

      harness.clock.advance(90_000);
      await harness.campaignService.resume(id);
      const jobs = await harness.jobs.find({ campaignId: id });
      expect(jobs.map((job) => job.held)).toEqual([false, false]);
      expect(jobs.map((job) => job.eligibleAt)).toEqual([harness.clock.now(), harness.clock.now()]);
    });

    it('rejects pausing a draft and resuming a running campaign', async () => {
      const { id } = await harness.campaignService.create(dto());

      await expect(harness.campaignService.pause(id)).rejects.toThrow(`Cannot pause campaign ${id} in status draft`);
      await harness.campaignService.start(id);
      await expect(harness.campaignService.resume(id)).rejects.toThrow(
        `Cannot resume campaign ${id} in status running`,
      );
    });
  });

  describe('cancel', () => {
    it('cancels open jobs and keeps finished ones', async () => {
      const { id } = await harness.campaignService.create(dto());
      await harness.campaignService.start(id);
      harness.clock.set('2025-01-01T00:10:00.000Z');
      await harness.tickAndSettle();

      const cancelled = await harness.campaignService.cancel(id);

      expect(cancelled.status).toBe(CampaignStatus.CANCELLED);
      expect((await harness.jobs.find({ campaignId: id })).map((job) => job.status)).toEqual([
        JobStatus.COMPLETED,
        JobStatus.CANCELLED,
      ]);
      await expect(harness.campaignService.cancel(id)).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe('update', () => {
    it('edits only the given fields of a draft', async () => {
      const { id } = await harness.campaignService.create(dto());

      const updated = await harness.campaignService.update(
        id,
        plainToInstance(UpdateCampaignDto, { name: 'Winter drop', scheduleEnd: '2025-01-01T03:00:00.000Z' }),
      );

      expect(updated).toMatchObject({
        name: 'Winter drop',
        captionTemplate: 'Clip {index} from {account}',
        scheduleStart: new Date('2025-01-01T00:00:00.000Z'),
        scheduleEnd: new Date('2025-01-01T03:00:00.000Z'),
        status: CampaignStatus.DRAFT,
      });
    });

    it('refuses to edit a started campaign', async () => {
      const { id } = await harness.campaignService.create(dto());
      await harness.campaignService.start(id);

      await expect(
        harness.campaignService.update(id, plainToInstance(UpdateCampaignDto, { name: 'Too late' })),
      ).rejects.toThrow(`Cannot edit campaign ${id} in status running`);
      expect((await harness.campaignService.findOne(id)).name).toBe('Summer drop');
    });

    it('validates edits like a new campaign', async () => {
      const errors = await validate(plainToInstance(UpdateCampaignDto, { videoRefs: [], delayMinSeconds: -1 }));

      expect(errors.map((error) => error.property)).toEqual(['videoRefs', 'delayMinSeconds']);
    });
  });

  describe('retryFailed', () => {
    it('requeues every failed job of the campaign', async () => {
      harness.gateway.enqueue(permanent('rejected'), permanent('rejected'));
      const { id } = await harness.campaignService.create(dto({ scheduleEnd: '2025-01-01T00:10:00.000Z' }));
      await harness.campaignService.start(id);
      harness.clock.set('2025-01-01T00:10:00.000Z');
      await harness.tickAndSettle();
      expect((await harness.campaignService.summary(id)).text).toBe('0/2 completed, 2 failed');

      const requeued = await harness.campaignService.retryFailed(id);

      expect(requeued.map((job) => job.status)).toEqual([JobStatus.PENDING, JobStatus.PENDING]);
      expect((await harness.campaignService.findOne(id)).status).toBe(CampaignStatus.RUNNING);

      await harness.tickAndSettle();
      expect(await harness.campaignService.summary(id)).toMatchObject({
        status: CampaignStatus.COMPLETED,
        text: '2/2 completed, 0 failed',
      });
    });

    it('leaves jobs without retries left as failed', async () => {
      const { id } = await harness.campaignService.create(dto({ maxRetries: 1 }));
      await harness.campaignService.start(id);
      const [spent, fresh] = await harness.jobs.find({ campaignId: id });
      const pending = { statuses: [JobStatus.PENDING] };
      await harness.jobs.transition(spent.id, pending, { status: JobStatus.FAILED, retryCount: 1 });
      await harness.jobs.transition(fresh.id, pending, { status: JobStatus.FAILED });

      const requeued = await harness.campaignService.retryFailed(id);

      expect(requeued.map((job) => [job.id, job.retryCount])).toEqual([[fresh.id, 1]]);
      expect((await harness.jobs.findById(spent.id))?.status).toBe(JobStatus.FAILED);
    });

    it('refuses a cancelled campaign', async () => {
      const { id } = await harness.campaignService.create(dto());
      await harness.campaignService.cancel(id);

      await expect(harness.campaignService.retryFailed(id)).rejects.toThrow(
        `Cannot retry jobs of cancelled campaign ${id}`,
      );
    });
  });
});
