/**
 * CLI option types
 */

import type { RawLivenessConfig } from "../../types/config.js";

/**
 * Options shared by `run` and `inspect`, as commander hands them over
 */
export interface ConnectionCommandOptions {
  uri?: string;
  db?: string;
  coll?: string;
  clusterType?: string;
  zones?: string;
  logLevel?: string;
  envFile?: string;
  config?: string;
}

/**
 * Options for the run command. Numbers stay strings until resolveConfig.
 */
export interface RunCommandOptions extends ConnectionCommandOptions {
  totalDocs?: string;
  opsPerSec?: string;
  workers?: string;
  maxPoolSize?: string;
  opMix?: string;
  sentryDsn?: string;
  heartbeatInterval?: string;
  heartbeatThreshold?: string;
  heartbeatTimeout?: string;
  acquireTimeout?: string;
  grace?: string;
  reportInterval?: string;
  duration?: string;
  seed?: string;
  summaryFile?: string;
}

/**
 * Map flag names onto config fields
 */
export function configFromOptions(options: RunCommandOptions): RawLivenessConfig {
  return {
    uri: options.uri,
    db: options.db,
    collection: options.coll,
    clusterTopology: options.clusterType,
    zones: options.zones,
    logLevel: options.logLevel,
    totalDocs: options.totalDocs,
    opsPerSecond: options.opsPerSec,
    workerCount: options.workers,
    maxPoolSize: options.maxPoolSize,
    operationMix: options.opMix,
    errorSinkTarget: options.sentryDsn,
    heartbeatIntervalMs: options.heartbeatInterval,
    heartbeatFailureThreshold: options.heartbeatThreshold,
    heartbeatTimeoutMs: options.heartbeatTimeout,
    acquireTimeoutMs: options.acquireTimeout,
    shutdownGraceMs: options.grace,
    reportIntervalMs: options.reportInterval,
    durationSec: options.duration,
    seed: options.seed,
    summaryPath: options.summaryFile,
  };
}
