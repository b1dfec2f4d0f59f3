import { ConfigError } from "../../utils/errors.js";
import { PerfTimeSource, type TimeSource } from "../utils/time.js";
import type {
  AcquireOptions,
  AcquireOutcome,
  LimiterStats,
  TokenBucketOptions,
} from "./types.js";

const GRANTED: AcquireOutcome = { status: "granted" };
const TIMEOUT: AcquireOutcome = { status: "timeout" };
const ABORTED: AcquireOutcome = { status: "aborted" };
const CLOSED: AcquireOutcome = { status: "closed" };

// Shortest suspension, so float residue never produces a zero-delay spin
const MIN_WAIT_MS = 1;

interface Waiter {
  timer: ReturnType<typeof setTimeout>;
  wake: () => void;
}

/**
 * Token bucket shared by every worker of a pool.
 *
 * Refill is lazy: each acquisition attempt credits `elapsed * rate` tokens,
 * capped at `capacity`. The refill-check-consume step is synchronous, so
 * concurrent acquirers on the event loop cannot oversubscribe the bucket.
 * Waiters are not served in FIFO order.
 */
export class TokenBucketLimiter {
  readonly capacity: number;
  readonly ratePerSecond: number;

  private tokens: number;
  private lastRefillMs: number;
  private readonly time: TimeSource;
  private readonly waiters = new Set<Waiter>();
  private closed = false;
  private granted = 0;
  private timeouts = 0;

  constructor(options: TokenBucketOptions) {
    const { ratePerSecond } = options;
    if (!Number.isFinite(ratePerSecond) || ratePerSecond <= 0) {
      throw new ConfigError(`Rate must be a positive number, got ${ratePerSecond}`, {
        ratePerSecond,
      });
    }

    const capacity = options.capacity ?? Math.max(1, ratePerSecond);
    if (!Number.isFinite(capacity) || capacity < 1 || capacity < ratePerSecond) {
      throw new ConfigError(
        `Capacity must be >= 1 and >= rate (${ratePerSecond}), got ${capacity}`,
        { capacity, ratePerSecond },
      );
    }

    this.ratePerSecond = ratePerSecond;
    this.capacity = capacity;
    this.tokens = Math.min(capacity, Math.max(0, options.initialTokens ?? 0));
    this.time = options.time ?? new PerfTimeSource();
    this.lastRefillMs = this.time.nowMs();
  }

  /**
   * Wait until `n` tokens are available and consume them.
   * A `timeout` outcome is a normal rate wait, not a failure.
   */
  async acquire(n: number = 1, options: AcquireOptions = {}): Promise<AcquireOutcome> {
    if (!Number.isFinite(n) || n <= 0 || n > this.capacity) {
      throw new RangeError(`Cannot acquire ${n} tokens from a bucket of capacity ${this.capacity}`);
    }

    const { signal } = options;
    const deadline = this.time.nowMs() + (options.timeoutMs ?? Number.POSITIVE_INFINITY);

    while (!this.closed) {
      if (signal?.aborted) return ABORTED;

      const waitMs = this.tryConsume(n);
      if (waitMs === 0) {
        this.granted += n;
        return GRANTED;
      }

      const remaining = deadline - this.time.nowMs();
      if (remaining <= 0) {
        this.timeouts++;
        return TIMEOUT;
      }

      await this.suspend(Math.min(Math.max(waitMs, MIN_WAIT_MS), remaining), signal);
    }

    return CLOSED;
  }

  /**
   * Refill, then consume `n` tokens if present.
   * Returns 0 on success, otherwise the milliseconds until enough tokens accrue.
   */
  private tryConsume(n: number): number {
    const now = this.time.nowMs();
    const elapsedMs = Math.max(0, now - this.lastRefillMs);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs * this.ratePerSecond) / 1000);
    this.lastRefillMs = now;

    if (this.tokens >= n) {
      this.tokens -= n;
      return 0;
    }

    return ((n - this.tokens) / this.ratePerSecond) * 1000;
  }

  private suspend(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const waiter: Waiter = {
        timer: setTimeout(() => waiter.wake(), ms),
        wake: () => {
          clearTimeout(waiter.timer);
          signal?.removeEventListener("abort", waiter.wake);
          this.waiters.delete(waiter);
          resolve();
        },
      };
      this.waiters.add(waiter);
      signal?.addEventListener("abort", waiter.wake, { once: true });
    });
  }

  /**
   * Wake every waiter; pending and future acquisitions report `closed`.
   */
  close(): void {
    this.closed = true;
    for (const waiter of [...this.waiters]) {
      waiter.wake();
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  stats(): LimiterStats {
    return {
      granted: this.granted,
      timeouts: this.timeouts,
      tokens: this.tokens,
      capacity: this.capacity,
      ratePerSecond: this.ratePerSecond,
    };
  }
}
