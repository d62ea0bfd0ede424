import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';

export type WorkerTask = () => Promise<void>;

/**
 * Fixed-size pool for job execution. Handoff never blocks: callers check
 * `hasCapacity()` and keep the job for a later tick when every slot is busy.
 */
export class WorkerPool {
  private readonly logger = new Logger(WorkerPool.name);
  private readonly inflight = new Set<Promise<void>>();

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  get running(): number {
    return this.inflight.size;
  }

  hasCapacity(): boolean {
    return this.inflight.size < this.size;
  }

  submit(task: WorkerTask, label = 'task'): void {
    if (!this.hasCapacity()) {
      throw new Error(`Worker pool is full (${this.size} running)`);
    }
    const run = this.run(task, label).finally(() => {
      this.inflight.delete(run);
    });
    this.inflight.add(run);
  }

  /** Resolves once nothing is running, including work submitted while waiting. */
  async onIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  private async run(task: WorkerTask, label: string): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.logger.error(`Worker ${label} crashed: ${errorMessage(error)}`);
    }
  }
}
