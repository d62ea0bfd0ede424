import { IsEnum, IsOptional, IsUUID } from 'class-validator';
import { JobStatus } from '../entities/job.entity';

export class ListJobsQueryDto {
  @IsOptional()
  @IsUUID()
  campaignId?: string;

  @IsOptional()
  @IsEnum(JobStatus)
  status?: JobStatus;
}

export class CampaignScopeQueryDto {
  @IsOptional()
  @IsUUID()
  campaignId?: string;
}
