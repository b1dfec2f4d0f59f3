import type { OperationOutcome, OutcomeSink } from "./types.js";

export { WorkerPool } from "./worker-pool.js";
export { WorkloadMetrics } from "./metrics.js";
export type { KindMetrics, LatencyStats, MetricsSnapshot } from "./metrics.js";
export type {
  OperationOutcome,
  OutcomeClass,
  OutcomeSink,
  PoolReport,
  RunOptions,
  WorkerPoolOptions,
  WorkerState,
  WorkerStatus,
} from "./types.js";

/**
 * One sink that records into each of `sinks` in order
 */
export function composeSinks(...sinks: OutcomeSink[]): OutcomeSink {
  return {
    record(outcome: OperationOutcome): void {
      for (const sink of sinks) sink.record(outcome);
    },
  };
}
