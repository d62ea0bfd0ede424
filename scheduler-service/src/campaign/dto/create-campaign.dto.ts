import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDateString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  Min,
  Max,
  ValidateNested,
} from 'class-validator';
import { AccountSelectionStrategy } from '../entities/campaign.entity';

export class AccountFiltersDto {
  @IsOptional()
  @IsBoolean()
  requireProxy?: boolean;

  @IsOptional()
  @IsUUID()
  proxyId?: string;

  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  excludeAccountIds?: string[];
}

export class AccountSelectionDto {
  @IsIn(['ALL', 'RANDOM', 'SPECIFIC'])
  strategy!: AccountSelectionStrategy;

  @IsOptional()
  @IsInt()
  @Min(1)
  count?: number;

  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  accountIds?: string[];

  @IsOptional()
  @ValidateNested()
  @Type(() => AccountFiltersDto)
  filters?: AccountFiltersDto;
}

export class CreateCampaignDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @MaxLength(500, { each: true })
  videoRefs!: string[];

  @IsString()
  @IsNotEmpty()
  @MaxLength(2200)
  captionTemplate!: string;

  @ValidateNested()
  @Type(() => AccountSelectionDto)
  accountSelection!: AccountSelectionDto;

  @IsDateString()
  scheduleStart!: string;

  @IsDateString()
  scheduleEnd!: string;

  @IsInt()
  @Min(0)
  delayMinSeconds!: number;

  @IsInt()
  @Min(0)
  delayMaxSeconds!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(10)
  maxRetries?: number;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  seed?: string;
}
