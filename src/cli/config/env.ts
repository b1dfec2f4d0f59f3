/**
 * Environment variable layer
 */

import { config as loadDotenv } from "dotenv";
import type { RawLivenessConfig } from "../../types/config.js";
import { logger } from "../../utils/logger.js";

/** Environment variable consulted for each config field */
export const ENV_KEYS = {
  uri: "MONGODB_URI",
  db: "MONGO_DB",
  collection: "MONGO_COLL",
  totalDocs: "TOTAL_DOCS",
  opsPerSecond: "OPS_PER_SEC",
  workerCount: "WORKERS",
  maxPoolSize: "MAX_POOL_SIZE",
  operationMix: "OP_MIX",
  clusterTopology: "CLUSTER_TYPE",
  zones: "ZONES",
  errorSinkTarget: "SENTRY_DSN",
  logLevel: "LOG_LEVEL",
  heartbeatIntervalMs: "HEARTBEAT_INTERVAL_MS",
  heartbeatFailureThreshold: "HEARTBEAT_THRESHOLD",
  heartbeatTimeoutMs: "HEARTBEAT_TIMEOUT_MS",
  acquireTimeoutMs: "ACQUIRE_TIMEOUT_MS",
  shutdownGraceMs: "SHUTDOWN_GRACE_MS",
  reportIntervalMs: "REPORT_INTERVAL_MS",
  durationSec: "DURATION_SEC",
  seed: "SEED",
  summaryPath: "SUMMARY_FILE",
} as const satisfies Record<keyof RawLivenessConfig, string>;

/**
 * Load a .env file into process.env. Variables already set are kept.
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : {});
  if (result.error) {
    // A missing default .env is normal
    if (path) {
      logger.warn("Could not load env file", { path, error: result.error.message });
    }
    return;
  }
  logger.debug("Loaded env file", { keys: Object.keys(result.parsed ?? {}).length });
}

/**
 * Map environment variables onto raw config fields. Empty values are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RawLivenessConfig {
  const config: RawLivenessConfig = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value === undefined || value.trim() === "") continue;
    if (isRawKey(field)) config[field] = value;
  }
  return config;
}

function isRawKey(field: string): field is keyof typeof ENV_KEYS {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, field);
}
