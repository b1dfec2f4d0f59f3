/**
 * Reporter module types
 */

import type { LivenessConfig } from "../../types/config.js";
import type { HeartbeatState } from "../heartbeat/types.js";
import type { LimiterStats } from "../limiter/types.js";
import type { DetectedClusterType, PreloadResult, ShardSetupResult } from "../storage/index.js";
import type { MetricsSnapshot } from "../workload/metrics.js";
import type { PoolReport } from "../workload/types.js";

/**
 * `ok`: drained with a healthy connection. `degraded`: the heartbeat ended
 * degraded. `drain_timeout`: workers were abandoned at the grace deadline.
 */
export type RunStatus = "ok" | "degraded" | "drain_timeout";

export type SummaryConfig = Omit<LivenessConfig, "errorSinkTarget"> & {
  errorSink: "sentry" | "log";
};

export interface RunSetup {
  clusterType: DetectedClusterType;
  shardKey: ShardSetupResult;
  preload: PreloadResult;
}

export interface RunSummary {
  status: RunStatus;
  run: {
    id: string;
    startedAt: string;
    stoppedAt: string;
    durationMs: number;
  };
  config: SummaryConfig;
  setup: RunSetup | null;
  pool: PoolReport;
  metrics: MetricsSnapshot;
  heartbeat: HeartbeatState;
  limiter: LimiterStats;
}

export interface RunResults {
  pool: PoolReport;
  metrics: MetricsSnapshot;
  heartbeat: HeartbeatState;
  limiter: LimiterStats;
}
