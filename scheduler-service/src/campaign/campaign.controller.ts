import { Body, Controller, Get, HttpCode, Param, ParseUUIDPipe, Post, Put, Logger } from '@nestjs/common';
import { CampaignService, CampaignStartResult } from './campaign.service';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import { UpdateCampaignDto } from './dto/update-campaign.dto';
import { Campaign } from './entities/campaign.entity';
import { CampaignSummary } from '../engine/campaign-progress.service';
import { Job } from '../jobs/entities/job.entity';

@Controller('campaigns')
export class CampaignController {
  private readonly logger = new Logger(CampaignController.name);

  constructor(private readonly campaignService: CampaignService) {}

  @Post()
  async createCampaign(@Body() createCampaignDto: CreateCampaignDto): Promise<Campaign> {
    this.logger.log(`Creating campaign: ${createCampaignDto.name}`);
    return this.campaignService.create(createCampaignDto);
  }

  @Get()
  async listCampaigns(): Promise<Campaign[]> {
    return this.campaignService.findAll();
  }

  @Get(':id')
  async getCampaign(@Param('id', ParseUUIDPipe) id: string): Promise<Campaign> {
    this.logger.log(`Fetching campaign with ID: ${id}`);
    return this.campaignService.findOne(id);
  }

  @Put(':id')
  async updateCampaign(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateCampaignDto: UpdateCampaignDto,
  ): Promise<Campaign> {
    this.logger.log(`Updating campaign ${id}`);
    return this.campaignService.update(id, updateCampaignDto);
  }

  @Get(':id/summary')
  async getSummary(@Param('id', ParseUUIDPipe) id: string): Promise<CampaignSummary> {
    return this.campaignService.summary(id);
  }

  @Post(':id/start')
  @HttpCode(200)
  async startCampaign(@Param('id', ParseUUIDPipe) id: string): Promise<CampaignStartResult> {
    this.logger.log(`Starting campaign ${id}`);
    return this.campaignService.start(id);
  }

  @Post(':id/pause')
  @HttpCode(200)
  async pauseCampaign(@Param('id', ParseUUIDPipe) id: string): Promise<Campaign> {
    return this.campaignService.pause(id);
  }

  @Post(':id/resume')
  @HttpCode(200)
  async resumeCampaign(@Param('id', ParseUUIDPipe) id: string): Promise<Campaign> {
    return this.campaignService.resume(id);
  }

  @Post(':id/cancel')
  @HttpCode(200)
  async cancelCampaign(@Param('id', ParseUUIDPipe) id: string): Promise<Campaign> {
    return this.campaignService.cancel(id);
  }

  @Post(':id/retry-failed')
  @HttpCode(200)
  async retryFailed(@Param('id', ParseUUIDPipe) id: string): Promise<Job[]> {
    return this.campaignService.retryFailed(id);
  }
}
