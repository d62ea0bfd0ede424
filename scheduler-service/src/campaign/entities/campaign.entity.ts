import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';

export enum CampaignStatus {
  DRAFT = 'draft',
  SCHEDULED = 'scheduled',
  RUNNING = 'running',
  PAUSED = 'paused',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export type AccountSelectionStrategy = 'ALL' | 'RANDOM' | 'SPECIFIC';

export interface AccountFilters {
  requireProxy?: boolean;
  /** Only accounts routed through this proxy. */
  proxyId?: string;
  excludeAccountIds?: string[];
}

export interface AccountSelection {
  strategy: AccountSelectionStrategy;
  /** Sample size for RANDOM. */
  count?: number;
  /** Explicit list for SPECIFIC. */
  accountIds?: string[];
  filters?: AccountFilters;
}

@Entity('campaigns')
export class Campaign {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({
    type: 'enum',
    enum: CampaignStatus,
    default: CampaignStatus.DRAFT,
  })
  status!: CampaignStatus;

  @Column({ name: 'video_refs', type: 'jsonb' })
  videoRefs!: string[];

  @Column({ name: 'caption_template', type: 'text' })
  captionTemplate!: string;

  @Column({ name: 'account_selection', type: 'jsonb' })
  accountSelection!: AccountSelection;

  @Column({ name: 'schedule_start', type: 'timestamptz' })
  scheduleStart!: Date;

  @Column({ name: 'schedule_end', type: 'timestamptz' })
  scheduleEnd!: Date;

  @Column({ name: 'delay_min_seconds', type: 'int', default: 0 })
  delayMinSeconds!: number;

  @Column({ name: 'delay_max_seconds', type: 'int', default: 0 })
  delayMaxSeconds!: number;

  @Column({ name: 'max_retries', type: 'int', default: 3 })
  maxRetries!: number;

  @Column({ type: 'varchar', length: 128, nullable: true })
  seed!: string | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'started_at', type: 'timestamptz', nullable: true })
  startedAt!: Date | null;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
