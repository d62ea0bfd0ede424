import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, Min } from 'class-validator';
import { UploadErrorKind } from '../automation/automation.gateway';

export const AUTOMATION_PATTERNS = {
  upload: 'automation.upload',
  checkProxy: 'automation.proxy.check',
  testAccount: 'automation.account.test',
} as const;

export class UploadRequestMessage {
  @IsUUID()
  @IsNotEmpty()
  jobId!: string;

  @IsUUID()
  @IsNotEmpty()
  accountId!: string;

  @IsOptional()
  @IsUUID()
  proxyId!: string | null;

  @IsString()
  @IsNotEmpty()
  videoPath!: string;

  @IsString()
  caption!: string;
}

export class UploadReplyMessage {
  @IsBoolean()
  success!: boolean;

  @IsOptional()
  @IsString()
  remoteUrl?: string;

  @IsOptional()
  @IsString()
  error?: string;

  @IsOptional()
  @IsIn(['transient', 'permanent', 'banned'])
  errorKind?: UploadErrorKind;
}

export class ProxyCheckReplyMessage {
  @IsBoolean()
  working!: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  latencyMs?: number;

  @IsOptional()
  @IsString()
  error?: string;
}

export class AccountTestReplyMessage {
  @IsBoolean()
  valid!: boolean;
}
