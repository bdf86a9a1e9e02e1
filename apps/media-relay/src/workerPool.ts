import { JobStore } from './jobStore';
import { logger } from './logger';
import { processVideoFile, ProcessorContext } from './processor';
import { Job, ProcessOutcome } from './types';

export type JobHandler = (job: Job, ctx: ProcessorContext) => Promise<ProcessOutcome>;

export interface WorkerPoolOptions {
  size: number;
  context: ProcessorContext;
  handler?: JobHandler;
  /** Called after a job has released its slot, whatever the outcome */
  onSettled?: (job: Job, outcome: ProcessOutcome | Error) => void;
}

/**
 * Fixed number of workers draining one JobStore. Each worker parks in
 * `dequeue` while there is nothing to do.
 */
export class WorkerPool {
  private loops: Promise<void>[] = [];
  private readonly handler: JobHandler;

  constructor(private readonly store: JobStore, private readonly opts: WorkerPoolOptions) {
    if (!Number.isInteger(opts.size) || opts.size <= 0) {
      throw new RangeError(`Worker count must be a positive integer, got ${opts.size}`);
    }
    this.handler = opts.handler ?? processVideoFile;
  }

  get size(): number {
    return this.opts.size;
  }

  start(): void {
    if (this.loops.length > 0) return;
    logger.info(`👷 Starting ${this.opts.size} workers`);
    for (let i = 1; i <= this.opts.size; i++) {
      this.loops.push(this.runWorker(`worker-${i}`));
    }
  }

  /** Closes the store and waits for queued and in-flight jobs to finish. */
  async stop(): Promise<void> {
    this.store.close();
    await Promise.all(this.loops);
    this.loops = [];
  }

  private async runWorker(workerId: string): Promise<void> {
    for (;;) {
      const job = await this.store.dequeue();
      if (!job) break;
      let outcome: ProcessOutcome | Error;
      try {
        outcome = await this.handler(job, this.opts.context);
      } catch (err) {
        outcome = err instanceof Error ? err : new Error(String(err));
        logger.error(`❌ [${workerId}] Job ${job.id} (${job.originalName}) dropped: ${outcome.message}`);
      } finally {
        this.store.release(job.displayName);
      }
      try {
        this.opts.onSettled?.(job, outcome);
      } catch (err) {
        logger.error(`[${workerId}] onSettled hook failed for job ${job.id}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    logger.info(`[${workerId}] stopped`);
  }
}
