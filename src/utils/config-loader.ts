/**
 * Configuration resolution: merge raw layers, parse once, validate.
 */

import type { LivenessConfig, RawConfigValue, RawLivenessConfig } from "../types/config.js";
import {
  OPERATION_KINDS,
  isClusterTopology,
  isOperationKind,
  type OperationMix,
} from "../types/workload.js";
import { DEFAULT_OPERATION_MIX, OperationSelector, parseOperationMix } from "../lib/selector/index.js";
import { DEFAULT_ZONES, parseZones } from "../lib/router/index.js";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, isLogLevel, logger } from "./logger.js";

export const DEFAULT_CONFIG: Omit<LivenessConfig, "uri"> = {
  db: "liveness",
  collection: "probe",
  totalDocs: 1000,
  opsPerSecond: 50,
  workerCount: 4,
  maxPoolSize: 50,
  operationMix: { ...DEFAULT_OPERATION_MIX },
  clusterTopology: "replica_set",
  zones: [...DEFAULT_ZONES],
  logLevel: "info",
  heartbeatIntervalMs: 1000,
  heartbeatFailureThreshold: 3,
  heartbeatTimeoutMs: 5000,
  acquireTimeoutMs: 1000,
  shutdownGraceMs: 5000,
  reportIntervalMs: 10000,
};

export interface ConfigLayers {
  cli?: RawLivenessConfig;
  env?: RawLivenessConfig;
  file?: RawLivenessConfig;
}

/**
 * Merge layers with precedence CLI > environment > config file > defaults,
 * then parse and validate every field.
 *
 * @throws ConfigError listing the first invalid field
 *
 * @example
 * resolveConfig({ cli: { uri: "mongodb://localhost", opsPerSecond: "200" } });
 */
export function resolveConfig(layers: ConfigLayers): LivenessConfig {
  const raw: RawLivenessConfig = {
    ...definedOnly(layers.file),
    ...definedOnly(layers.env),
    ...definedOnly(layers.cli),
  };

  const uri = optionalString("uri", raw.uri);
  if (!uri) {
    throw new ConfigError("--uri or MONGODB_URI must be provided");
  }

  const config: LivenessConfig = {
    uri,
    db: optionalString("db", raw.db) ?? DEFAULT_CONFIG.db,
    collection: optionalString("collection", raw.collection) ?? DEFAULT_CONFIG.collection,
    totalDocs: integer("totalDocs", raw.totalDocs, DEFAULT_CONFIG.totalDocs, 0),
    opsPerSecond: positiveNumber("opsPerSecond", raw.opsPerSecond, DEFAULT_CONFIG.opsPerSecond),
    workerCount: integer("workerCount", raw.workerCount, DEFAULT_CONFIG.workerCount, 1),
    maxPoolSize: integer("maxPoolSize", raw.maxPoolSize, DEFAULT_CONFIG.maxPoolSize, 1),
    operationMix: operationMix(raw.operationMix),
    clusterTopology: topology(raw.clusterTopology),
    zones: zones(raw.zones),
    logLevel: logLevel(raw.logLevel),
    heartbeatIntervalMs: positiveNumber(
      "heartbeatIntervalMs",
      raw.heartbeatIntervalMs,
      DEFAULT_CONFIG.heartbeatIntervalMs,
    ),
    heartbeatFailureThreshold: integer(
      "heartbeatFailureThreshold",
      raw.heartbeatFailureThreshold,
      DEFAULT_CONFIG.heartbeatFailureThreshold,
      1,
    ),
    heartbeatTimeoutMs: positiveNumber(
      "heartbeatTimeoutMs",
      raw.heartbeatTimeoutMs,
      DEFAULT_CONFIG.heartbeatTimeoutMs,
    ),
    acquireTimeoutMs: positiveNumber(
      "acquireTimeoutMs",
      raw.acquireTimeoutMs,
      DEFAULT_CONFIG.acquireTimeoutMs,
    ),
    shutdownGraceMs: integer("shutdownGraceMs", raw.shutdownGraceMs, DEFAULT_CONFIG.shutdownGraceMs, 0),
    reportIntervalMs: positiveNumber(
      "reportIntervalMs",
      raw.reportIntervalMs,
      DEFAULT_CONFIG.reportIntervalMs,
    ),
  };

  const errorSinkTarget = optionalString("errorSinkTarget", raw.errorSinkTarget);
  if (errorSinkTarget) config.errorSinkTarget = errorSinkTarget;

  if (raw.durationSec !== undefined) {
    config.durationSec = positiveNumber("durationSec", raw.durationSec, 0);
  }

  const seed = optionalString("seed", raw.seed);
  if (seed) config.seed = seed;

  const summaryPath = optionalString("summaryPath", raw.summaryPath);
  if (summaryPath) config.summaryPath = summaryPath;

  // Rejects an all-zero mix here rather than when the pool starts
  new OperationSelector(config.operationMix);

  logger.debug("Configuration resolved", {
    db: config.db,
    collection: config.collection,
    opsPerSecond: config.opsPerSecond,
    workerCount: config.workerCount,
    clusterTopology: config.clusterTopology,
  });

  return config;
}

function definedOnly(layer: RawLivenessConfig | undefined): RawLivenessConfig {
  if (!layer) return {};
  return Object.fromEntries(
    Object.entries(layer).filter(([, value]) => value !== undefined && value !== ""),
  );
}

function optionalString(field: string, value: RawConfigValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") {
    throw new ConfigError(`${field} must be a string`, { field });
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function toNumber(field: string, value: RawConfigValue): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${field} must be a number, got ${JSON.stringify(value)}`, { field });
  }
  return parsed;
}

function integer(
  field: string,
  value: RawConfigValue | undefined,
  fallback: number,
  min: number,
): number {
  if (value === undefined) return fallback;
  const parsed = toNumber(field, value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${field} must be an integer >= ${min}, got ${parsed}`, { field });
  }
  return parsed;
}

function positiveNumber(field: string, value: RawConfigValue | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = toNumber(field, value);
  if (parsed <= 0) {
    throw new ConfigError(`${field} must be > 0, got ${parsed}`, { field });
  }
  return parsed;
}

function operationMix(value: RawConfigValue | undefined): OperationMix {
  if (value === undefined) return { ...DEFAULT_CONFIG.operationMix };
  if (typeof value === "string") return parseOperationMix(value);
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError("operationMix must be a string like find=70,insert=20 or a map of weights");
  }

  const mix: OperationMix = {};
  for (const [kind, weight] of Object.entries(value)) {
    if (!isOperationKind(kind)) {
      throw new ConfigError(
        `Unknown operation kind "${kind}". Expected one of: ${OPERATION_KINDS.join(", ")}`,
      );
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`Weight for "${kind}" must be a non-negative number, got ${weight}`);
    }
    mix[kind] = weight;
  }
  return mix;
}

function topology(value: RawConfigValue | undefined): LivenessConfig["clusterTopology"] {
  const name = optionalString("clusterTopology", value) ?? DEFAULT_CONFIG.clusterTopology;
  if (!isClusterTopology(name)) {
    throw new ConfigError(
      `Invalid cluster topology "${name}". Expected one of: replica_set, sharded, geosharded`,
      { field: "clusterTopology" },
    );
  }
  return name;
}

function zones(value: RawConfigValue | undefined): string[] {
  if (value === undefined) return [...DEFAULT_CONFIG.zones];
  const list = Array.isArray(value)
    ? value.map((zone) => zone.trim()).filter((zone) => zone.length > 0)
    : typeof value === "string"
      ? parseZones(value)
      : null;
  if (!list) {
    throw new ConfigError("zones must be a comma-separated string or a list", { field: "zones" });
  }
  if (list.length === 0) {
    throw new ConfigError("zones must contain at least one location", { field: "zones" });
  }
  return list;
}

function logLevel(value: RawConfigValue | undefined): LivenessConfig["logLevel"] {
  const name = (optionalString("logLevel", value) ?? DEFAULT_CONFIG.logLevel).toLowerCase();
  if (!isLogLevel(name)) {
    throw new ConfigError(`logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${name}"`, {
      field: "logLevel",
    });
  }
  return name;
}
