import { performance } from "node:perf_hooks";

export interface TimeSource {
  nowMs(): number;
}

export class PerfTimeSource implements TimeSource {
  nowMs(): number {
    return performance.now();
  }
}

/**
 * Wall-clock source. Follows `Date.now()`, which test fake timers control.
 */
export class WallTimeSource implements TimeSource {
  nowMs(): number {
    return Date.now();
  }
}

/**
 * Resolves after `ms`, or early when `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
