import { Entity, Column, PrimaryColumn, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  RETRYING = 'retrying',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

@Entity('jobs')
@Index(['status', 'scheduledAt'])
export class Job {
  @PrimaryColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'campaign_id', type: 'uuid' })
  campaignId!: string;

  @Index()
  @Column({ name: 'account_id', type: 'uuid' })
  accountId!: string;

  @Column({ name: 'proxy_id', type: 'uuid', nullable: true })
  proxyId!: string | null;

  @Column({ name: 'video_ref', type: 'varchar', length: 500 })
  videoRef!: string;

  @Column({ type: 'text' })
  caption!: string;

  @Column({
    type: 'enum',
    enum: JobStatus,
    default: JobStatus.PENDING,
  })
  status!: JobStatus;

  /** Pending but frozen by a campaign pause. */
  @Column({ type: 'boolean', default: false })
  held!: boolean;

  @Column({ name: 'scheduled_at', type: 'timestamptz' })
  scheduledAt!: Date;

  /** Start of the max-wait clock: first moment the job could be dispatched. */
  @Column({ name: 'eligible_at', type: 'timestamptz' })
  eligibleAt!: Date;

  @Column({ name: 'started_at', type: 'timestamptz', nullable: true })
  startedAt!: Date | null;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @Column({ name: 'retry_count', type: 'int', default: 0 })
  retryCount!: number;

  @Column({ name: 'max_retries', type: 'int', default: 3 })
  maxRetries!: number;

  @Column({ name: 'attempt_token', type: 'varchar', length: 64, nullable: true })
  attemptToken!: string | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'error_kind', type: 'varchar', length: 32, nullable: true })
  errorKind!: string | null;

  @Column({ name: 'remote_url', type: 'varchar', length: 500, nullable: true })
  remoteUrl!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
