import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';

@Module({
  imports: [EngineModule],
  controllers: [JobsController],
  providers: [JobsService],
})
export class JobsModule {}
