import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  Max,
  ValidateNested,
} from 'class-validator';
import { AccountSelectionDto } from './create-campaign.dto';

/** Partial edit of a campaign that has not started. Omitted fields keep their value. */
export class UpdateCampaignDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @MaxLength(500, { each: true })
  videoRefs?: string[];

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(2200)
  captionTemplate?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => AccountSelectionDto)
  accountSelection?: AccountSelectionDto;

  @IsOptional()
  @IsDateString()
  scheduleStart?: string;

  @IsOptional()
  @IsDateString()
  scheduleEnd?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  delayMinSeconds?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  delayMaxSeconds?: number;

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
