import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from './app.module';
import { AutomationGateway } from './automation/automation.gateway';
import { CampaignService } from './campaign/campaign.service';
import { ConfigService } from './config/config.service';
import { DispatcherService } from './engine/dispatcher.service';
import { WorkerPool } from './engine/worker-pool';
import { JobStatus } from './jobs/entities/job.entity';
import { JobsService } from './jobs/jobs.service';
import { MemoryAccountRepository } from './persistence/memory/memory.repositories';
import { RabbitMQService } from './rabbitmq/rabbitmq.service';
import { TEST_ENV } from './testing/engine-harness';
import { FakeAutomationGateway, RecordingEventPublisher } from './testing/fakes';

describe('AppModule (memory storage)', () => {
  let moduleRef: TestingModule;
  const events = new RecordingEventPublisher();
  const gateway = new FakeAutomationGateway();

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [AppModule.forRoot('memory')],
    })
      .overrideProvider(ConfigService)
      .useValue(new ConfigService(TEST_ENV))
      .overrideProvider(RabbitMQService)
      .useValue(events)
      .overrideProvider(AutomationGateway)
      .useValue(gateway)
      .compile();
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('runs a campaign from creation to completion', async () => {
    moduleRef.get(MemoryAccountRepository, { strict: false }).seed([
      { id: 'b7e4b2a2-8d43-4a8e-9d5c-2f0d6f1f6a01', handle: 'alpha' },
      { id: 'c1a8f0e4-52a6-4b0e-8d3b-0e4a9b7f2c02', handle: 'bravo' },
    ]);
    const campaigns = moduleRef.get(CampaignService, { strict: false });
    const now = Date.now();

    const campaign = await campaigns.create({
      name: 'Integration',
      videoRefs: ['videos/one.mp4'],
      captionTemplate: '{account}',
      accountSelection: { strategy: 'ALL' },
      scheduleStart: new Date(now - 120_000).toISOString(),
      scheduleEnd: new Date(now - 60_000).toISOString(),
      delayMinSeconds: 0,
      delayMaxSeconds: 0,
    });
    expect((await campaigns.start(campaign.id)).jobsCreated).toBe(2);

    const report = await moduleRef.get(DispatcherService, { strict: false }).tick();
    await moduleRef.get(WorkerPool, { strict: false }).onIdle();

    expect(report.dispatched).toBe(2);
    const jobs = await moduleRef.get(JobsService, { strict: false }).findAll({ campaignId: campaign.id });
    expect(jobs.map((job) => job.status)).toEqual([JobStatus.COMPLETED, JobStatus.COMPLETED]);
    expect((await campaigns.summary(campaign.id)).text).toBe('2/2 completed, 0 failed');
    expect(events.patterns()).toContain('campaign.completed');
    expect(gateway.uploads.map((upload) => upload.caption).sort()).toEqual(['alpha', 'bravo']);
  });
});
