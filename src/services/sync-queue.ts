import { Semaphore } from "./net-throttle.js";

/**
 * Keyed job queue: a job scheduled while another with the same key is in
 * flight shares that job's result instead of running again.
 */
export class SyncQueue<T> {
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly gate: Semaphore;

  constructor(concurrency = 2) {
    this.gate = new Semaphore(concurrency);
  }

  schedule(key: string, job: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const run = async (): Promise<T> => {
      await this.gate.acquire();
      try {
        return await job();
      } finally {
        this.gate.release();
        this.inflight.delete(key);
      }
    };

    const promise = run();
    this.inflight.set(key, promise);
    return promise;
  }

  /** @internal Read by tests only. */
  get size(): number {
    return this.inflight.size;
  }
}
