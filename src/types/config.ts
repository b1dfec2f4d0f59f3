/**
 * Configuration types for mongo-liveness
 */

import type { LogLevel } from "../utils/logger.js";
import type { ClusterTopology, OperationMix } from "./workload.js";

/**
 * Fully resolved and validated configuration of one run
 */
export interface LivenessConfig {
  uri: string;
  db: string;
  collection: string;
  /** Dataset size to preload before the workload starts */
  totalDocs: number;
  opsPerSecond: number;
  workerCount: number;
  /** Passed through to the driver */
  maxPoolSize: number;
  operationMix: OperationMix;
  clusterTopology: ClusterTopology;
  zones: string[];
  /** Sentry DSN; errors go to the log only when unset */
  errorSinkTarget?: string;
  logLevel: LogLevel;
  heartbeatIntervalMs: number;
  heartbeatFailureThreshold: number;
  heartbeatTimeoutMs: number;
  acquireTimeoutMs: number;
  shutdownGraceMs: number;
  reportIntervalMs: number;
  /** Stop after this many seconds; runs until a signal when unset */
  durationSec?: number;
  seed?: string;
  /** Write the run summary JSON here as well as to stdout */
  summaryPath?: string;
}

/**
 * Raw values as they arrive from CLI flags, environment or a config file.
 * Strings are parsed once by resolveConfig.
 */
export type RawConfigValue = string | number | boolean | string[] | Record<string, number>;

export type RawLivenessConfig = Partial<Record<keyof LivenessConfig, RawConfigValue>>;
