import { Module } from '@nestjs/common';
import { Clock, SystemClock } from '../common/clock';
import { createSeededRandom } from '../common/random';
import { ConfigService } from '../config/config.service';
import { RabbitMQModule } from '../rabbitmq/rabbitmq.module';
import { BackoffController, BackoffSettings } from './backoff-controller';
import { CampaignProgressService } from './campaign-progress.service';
import { DispatcherOptions, DispatcherService } from './dispatcher.service';
import { BACKOFF_SETTINGS, DISPATCHER_OPTIONS, EXECUTOR_OPTIONS, RANDOM_FACTORY } from './engine.tokens';
import { ExecutorOptions, JobExecutor } from './job-executor';
import { JobLifecycleService } from './job-lifecycle.service';
import { RateLimiter } from './rate-limiter';
import { ResourceAllocator } from './resource-allocator';
import { WorkerPool } from './worker-pool';

@Module({
  imports: [RabbitMQModule],
  providers: [
    { provide: Clock, useClass: SystemClock },
    { provide: RANDOM_FACTORY, useValue: createSeededRandom },
    {
      provide: BACKOFF_SETTINGS,
      useFactory: (config: ConfigService): BackoffSettings => ({
        baseMs: config.backoffBaseMs,
        maxMs: config.backoffMaxMs,
        jitterMs: config.backoffJitterMs,
      }),
      inject: [ConfigService],
    },
    {
      provide: DISPATCHER_OPTIONS,
      useFactory: (config: ConfigService): DispatcherOptions => ({
        tickMs: config.dispatchTickMs,
        batchSize: config.dispatchBatchSize,
        maxPendingWaitMs: config.maxPendingWaitMs,
        jobTimeoutMs: config.jobTimeoutMs,
      }),
      inject: [ConfigService],
    },
    {
      provide: EXECUTOR_OPTIONS,
      useFactory: (config: ConfigService): ExecutorOptions => ({ jobTimeoutMs: config.jobTimeoutMs }),
      inject: [ConfigService],
    },
    {
      provide: RateLimiter,
      useFactory: (config: ConfigService, clock: Clock) => new RateLimiter(config.rateLimits, clock),
      inject: [ConfigService, Clock],
    },
    {
      provide: WorkerPool,
      useFactory: (config: ConfigService) => new WorkerPool(config.workerPoolSize),
      inject: [ConfigService],
    },
    ResourceAllocator,
    BackoffController,
    CampaignProgressService,
    JobLifecycleService,
    JobExecutor,
    DispatcherService,
  ],
  exports: [
    Clock,
    RANDOM_FACTORY,
    RateLimiter,
    ResourceAllocator,
    CampaignProgressService,
    JobLifecycleService,
    JobExecutor,
    RabbitMQModule,
  ],
})
export class EngineModule {}
