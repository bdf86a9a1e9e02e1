import { Job, QueueSnapshot } from './types';

type Waiter = (job: Job | undefined) => void;

/**
 * Bounded FIFO of pending jobs plus the admission counter.
 *
 * Occupancy is the number of admitted names not yet released, so a job
 * keeps its slot while it is being staged, while queued and while a worker
 * runs it. Every method is synchronous except `dequeue`, which parks the
 * caller until a job arrives or the store is closed.
 */
export class JobStore {
  private readonly queue: Job[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly reserved = new Set<string>();
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get occupancy(): number {
    return this.reserved.size;
  }

  isSaturated(): boolean {
    return this.closed || this.reserved.size >= this.capacity;
  }

  isNameReserved(name: string): boolean {
    return this.reserved.has(name);
  }

  tryAdmit(name: string): boolean {
    if (this.reserved.has(name)) {
      throw new Error(`Name already admitted: ${name}`);
    }
    if (this.isSaturated()) return false;
    this.reserved.add(name);
    return true;
  }

  enqueue(job: Job): void {
    if (!this.reserved.has(job.displayName)) {
      throw new Error(`Job ${job.id} was not admitted (${job.displayName})`);
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(job);
      return;
    }
    this.queue.push(job);
  }

  poll(): Job | undefined {
    return this.queue.shift();
  }

  dequeue(): Promise<Job | undefined> {
    const head = this.queue.shift();
    if (head) return Promise.resolve(head);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise<Job | undefined>((resolve) => this.waiters.push(resolve));
  }

  release(name: string): void {
    if (!this.reserved.delete(name)) {
      throw new Error(`Release of a name that holds no slot: ${name}`);
    }
  }

  /** Wakes blocked workers; jobs still queued are drained before they see the end. */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  snapshot(): QueueSnapshot {
    return {
      occupancy: this.reserved.size,
      capacity: this.capacity,
      queued: this.queue.length,
      inFlight: this.reserved.size - this.queue.length
    };
  }
}
