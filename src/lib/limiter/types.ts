import type { TimeSource } from "../utils/time.js";

export interface TokenBucketOptions {
  /** Tokens added per second; the aggregate ops/sec target */
  ratePerSecond: number;
  /** Burst ceiling. Defaults to max(1, ratePerSecond) */
  capacity?: number;
  /** Tokens available at construction, clamped to capacity. Defaults to 0 */
  initialTokens?: number;
  time?: TimeSource;
}

export interface AcquireOptions {
  /** Give up after this long. Omitted means wait indefinitely */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type AcquireOutcome =
  | { status: "granted" }
  | { status: "timeout" }
  | { status: "aborted" }
  | { status: "closed" };

export interface LimiterStats {
  granted: number;
  timeouts: number;
  tokens: number;
  capacity: number;
  ratePerSecond: number;
}
