export type EngineEventPattern =
  | 'job.running'
  | 'job.completed'
  | 'job.retrying'
  | 'job.failed'
  | 'job.cancelled'
  | 'campaign.completed';

export interface EngineEvent {
  pattern: EngineEventPattern;
  campaignId: string;
  jobId?: string;
  accountId?: string;
  retryCount?: number;
  error?: string;
  occurredAt: string;
}

/** Outbound lifecycle notifications. Publishing never fails the caller. */
export abstract class EngineEventPublisher {
  abstract publish(event: EngineEvent): Promise<void>;
}
