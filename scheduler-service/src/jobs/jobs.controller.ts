import { Controller, Get, HttpCode, Param, ParseUUIDPipe, Post, Query } from '@nestjs/common';
import { JobStatistics, JobsService } from './jobs.service';
import { CampaignScopeQueryDto, ListJobsQueryDto } from './dto/list-jobs.query';
import { Job } from './entities/job.entity';

@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Get()
  async listJobs(@Query() query: ListJobsQueryDto): Promise<Job[]> {
    return this.jobsService.findAll(query);
  }

  @Get('statistics/summary')
  async getStatistics(@Query() query: CampaignScopeQueryDto): Promise<JobStatistics> {
    return this.jobsService.statistics(query.campaignId);
  }

  @Post('retry-failed')
  @HttpCode(200)
  async retryFailed(@Query() query: CampaignScopeQueryDto): Promise<Job[]> {
    return this.jobsService.retryFailed(query.campaignId);
  }

  @Get(':id')
  async getJob(@Param('id', ParseUUIDPipe) id: string): Promise<Job> {
    return this.jobsService.findOne(id);
  }

  @Post(':id/retry')
  @HttpCode(200)
  async retryJob(@Param('id', ParseUUIDPipe) id: string): Promise<Job> {
    return this.jobsService.retry(id);
  }

  @Post(':id/cancel')
  @HttpCode(200)
  async cancelJob(@Param('id', ParseUUIDPipe) id: string): Promise<Job> {
    return this.jobsService.cancel(id);
  }
}
