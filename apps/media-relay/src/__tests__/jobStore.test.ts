import { describe, it, expect } from 'vitest';
import { JobStore } from '../jobStore';
import { Job } from '../types';

function makeJob(name: string): Job {
  return { id: `id-${name}`, stagedPath: `/staging/${name}`, displayName: name, fallbackName: name, originalName: name, admittedAt: 0 };
}

function admitAndEnqueue(store: JobStore, name: string): Job {
  expect(store.tryAdmit(name)).toBe(true);
  const job = makeJob(name);
  store.enqueue(job);
  return job;
}

describe('JobStore', () => {
  it('rejects capacities that are not positive integers', () => {
    expect(() => new JobStore(0)).toThrow(RangeError);
    expect(() => new JobStore(1.5)).toThrow(RangeError);
  });

  it('admits exactly capacity jobs and refuses the rest without side effects', () => {
    const store = new JobStore(2);
    const results = ['a.mp4', 'b.mp4', 'c.mp4'].map((name) => store.tryAdmit(name));

    expect(results).toEqual([true, true, false]);
    expect(store.occupancy).toBe(2);
    expect(store.isNameReserved('c.mp4')).toBe(false);
    expect(store.isSaturated()).toBe(true);
  });

  it('counts only the room left when jobs are already resident', () => {
    const store = new JobStore(5);
    admitAndEnqueue(store, 'resident-1.mp4');
    admitAndEnqueue(store, 'resident-2.mp4');

    let admitted = 0;
    for (let i = 0; i < 10; i++) {
      if (store.tryAdmit(`burst-${i}.mp4`)) admitted++;
      expect(store.occupancy).toBeLessThanOrEqual(store.capacity);
    }
    expect(admitted).toBe(3);
  });

  it('keeps occupancy while a dequeued job is still being processed', async () => {
    const store = new JobStore(1);
    admitAndEnqueue(store, 'a.mp4');

    const job = await store.dequeue();
    expect(job?.displayName).toBe('a.mp4');
    expect(store.snapshot()).toEqual({ occupancy: 1, capacity: 1, queued: 0, inFlight: 1 });
    expect(store.tryAdmit('b.mp4')).toBe(false);

    store.release('a.mp4');
    expect(store.occupancy).toBe(0);
    expect(store.tryAdmit('b.mp4')).toBe(true);
  });

  it('hands jobs out in arrival order', async () => {
    const store = new JobStore(3);
    admitAndEnqueue(store, 'first.mp4');
    admitAndEnqueue(store, 'second.mp4');
    admitAndEnqueue(store, 'third.mp4');

    const order = [await store.dequeue(), store.poll(), await store.dequeue()].map((job) => job?.displayName);
    expect(order).toEqual(['first.mp4', 'second.mp4', 'third.mp4']);
    expect(store.poll()).toBeUndefined();
  });

  it('wakes a blocked dequeue when a job is enqueued', async () => {
    const store = new JobStore(2);
    const first = store.dequeue();
    const second = store.dequeue();

    const a = admitAndEnqueue(store, 'a.mp4');
    const b = admitAndEnqueue(store, 'b.mp4');

    await expect(first).resolves.toBe(a);
    await expect(second).resolves.toBe(b);
    expect(store.snapshot().queued).toBe(0);
  });

  it('resolves waiters with undefined on close and refuses new admissions', async () => {
    const store = new JobStore(2);
    const waiting = store.dequeue();
    store.close();

    await expect(waiting).resolves.toBeUndefined();
    expect(store.tryAdmit('late.mp4')).toBe(false);
    await expect(store.dequeue()).resolves.toBeUndefined();
  });

  it('drains queued jobs before reporting the end after close', async () => {
    const store = new JobStore(2);
    const job = admitAndEnqueue(store, 'a.mp4');
    store.close();

    await expect(store.dequeue()).resolves.toBe(job);
    await expect(store.dequeue()).resolves.toBeUndefined();
  });

  it('refuses to enqueue a job that was never admitted', () => {
    const store = new JobStore(1);
    expect(() => store.enqueue(makeJob('ghost.mp4'))).toThrow('was not admitted');
  });

  it('detects a second release of the same job', () => {
    const store = new JobStore(1);
    store.tryAdmit('a.mp4');
    store.release('a.mp4');
    expect(() => store.release('a.mp4')).toThrow('holds no slot');
    expect(store.occupancy).toBe(0);
  });

  it('throws when a reserved name is admitted twice', () => {
    const store = new JobStore(3);
    store.tryAdmit('a.mp4');
    expect(() => store.tryAdmit('a.mp4')).toThrow('already admitted');
    expect(store.occupancy).toBe(1);
  });
});
