import { OffApiError, RateLimitError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("throttle");

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Fixed-window token bucket: `capacity` takes per `refillEveryMs`, refilled in full.
 */
export class TokenBucket {
  private tokens: number;
  private windowStart: number;

  constructor(
    readonly capacity: number,
    readonly refillEveryMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.tokens = capacity;
    this.windowStart = now();
  }

  async take(): Promise<void> {
    for (;;) {
      const elapsed = this.now() - this.windowStart;
      if (elapsed >= this.refillEveryMs) {
        this.tokens = this.capacity;
        this.windowStart = this.now();
      }
      if (this.tokens > 0) {
        this.tokens--;
        return;
      }
      await sleep(Math.max(1, this.refillEveryMs - elapsed));
    }
  }

  /** @internal Read by tests only. */
  get available(): number {
    return this.tokens;
  }
}

/** Counting semaphore; waiters are released in FIFO order. */
export class Semaphore {
  private running = 0;
  private readonly waiters: (() => void)[] = [];

  constructor(readonly limit: number) {}

  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // the slot passes straight to the next waiter
      next();
      return;
    }
    this.running = Math.max(0, this.running - 1);
  }

  /** @internal Read by tests only. */
  get active(): number {
    return this.running;
  }
}

export interface NetThrottleOptions {
  searchPerMinute: number;
  productPerMinute: number;
  maxConcurrent: number;
  maxAttempts?: number;
  baseDelayMs?: number;
}

function isTransient(error: unknown): boolean {
  if (error instanceof RateLimitError) return true;
  if (error instanceof OffApiError) return (error.statusCode ?? 0) >= 500;
  // fetch rejects with TypeError on network failures
  return error instanceof TypeError;
}

/**
 * Per-channel rate limits (search vs product) plus a global concurrency cap,
 * with exponential backoff on transient failures.
 */
export class NetThrottle {
  private readonly searchBucket: TokenBucket;
  private readonly productBucket: TokenBucket;
  private readonly gate: Semaphore;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(options: NetThrottleOptions) {
    this.searchBucket = new TokenBucket(options.searchPerMinute, 60_000);
    this.productBucket = new TokenBucket(options.productPerMinute, 60_000);
    this.gate = new Semaphore(options.maxConcurrent);
    this.maxAttempts = options.maxAttempts ?? 5;
    this.baseDelayMs = options.baseDelayMs ?? 300;
  }

  runSearch<T>(fn: () => Promise<T>): Promise<T> {
    return this.run(this.searchBucket, fn);
  }

  runProduct<T>(fn: () => Promise<T>): Promise<T> {
    return this.run(this.productBucket, fn);
  }

  private async run<T>(bucket: TokenBucket, fn: () => Promise<T>): Promise<T> {
    await bucket.take();
    await this.gate.acquire();
    try {
      return await this.withBackoff(fn);
    } finally {
      this.gate.release();
    }
  }

  private async withBackoff<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt + 1 >= this.maxAttempts || !isTransient(error)) throw error;

        const base = this.baseDelayMs * 2 ** attempt;
        const retryAfterMs =
          error instanceof RateLimitError && error.retryAfterSeconds !== null ? error.retryAfterSeconds * 1000 : 0;
        const delay = Math.max(retryAfterMs, base + Math.floor(Math.random() * base * 0.25));

        log.warn(`Attempt ${attempt + 1} failed, retrying in ${delay}ms`, error instanceof Error ? error.message : error);
        await sleep(delay);
      }
    }
  }
}
