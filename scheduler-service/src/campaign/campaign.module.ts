import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module';
import { CampaignController } from './campaign.controller';
import { CampaignService } from './campaign.service';
import { CampaignPlanner } from './campaign-planner';

@Module({
  imports: [EngineModule],
  controllers: [CampaignController],
  providers: [CampaignService, CampaignPlanner],
  exports: [CampaignService],
})
export class CampaignModule {}
