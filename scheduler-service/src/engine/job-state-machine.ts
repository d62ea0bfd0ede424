import { JobStatus } from '../jobs/entities/job.entity';

export type JobEvent =
  | 'DISPATCH'
  | 'SUCCEED'
  | 'RETRY'
  | 'REQUEUE'
  | 'FAIL'
  | 'CANCEL'
  | 'REOPEN';

const transitions: Record<JobStatus, Partial<Record<JobEvent, JobStatus>>> = {
  [JobStatus.PENDING]: {
    DISPATCH: JobStatus.RUNNING,
    // Unschedulable past the max wait.
    FAIL: JobStatus.FAILED,
    CANCEL: JobStatus.CANCELLED,
  },
  [JobStatus.RUNNING]: {
    SUCCEED: JobStatus.COMPLETED,
    RETRY: JobStatus.RETRYING,
    FAIL: JobStatus.FAILED,
    CANCEL: JobStatus.CANCELLED,
  },
  [JobStatus.RETRYING]: {
    REQUEUE: JobStatus.PENDING,
    CANCEL: JobStatus.CANCELLED,
  },
  [JobStatus.COMPLETED]: {},
  // Operator retry is the only way out of a terminal state.
  [JobStatus.FAILED]: {
    REOPEN: JobStatus.PENDING,
  },
  [JobStatus.CANCELLED]: {
    REOPEN: JobStatus.PENDING,
  },
};

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED,
];

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function nextJobStatus(current: JobStatus, event: JobEvent): JobStatus | null {
  return transitions[current][event] ?? null;
}

/** Statuses from which `event` is accepted, for fenced updates. */
export function sourceStatuses(event: JobEvent): JobStatus[] {
  return Object.values(JobStatus).filter((status) => transitions[status][event] !== undefined);
}

export function targetStatus(event: JobEvent): JobStatus {
  const target = Object.values(JobStatus)
    .map((status) => transitions[status][event])
    .find((status): status is JobStatus => status !== undefined);
  if (!target) {
    throw new Error(`No transition defined for ${event}`);
  }
  return target;
}
