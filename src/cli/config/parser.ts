/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { LivenessConfig, RawConfigValue, RawLivenessConfig } from "../../types/config.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const CONFIG_FILE_KEYS = [
  "uri",
  "db",
  "collection",
  "totalDocs",
  "opsPerSecond",
  "workerCount",
  "maxPoolSize",
  "operationMix",
  "clusterTopology",
  "zones",
  "errorSinkTarget",
  "logLevel",
  "heartbeatIntervalMs",
  "heartbeatFailureThreshold",
  "heartbeatTimeoutMs",
  "acquireTimeoutMs",
  "shutdownGraceMs",
  "reportIntervalMs",
  "durationSec",
  "seed",
  "summaryPath",
] as const satisfies readonly (keyof LivenessConfig)[];

type ConfigFileKey = (typeof CONFIG_FILE_KEYS)[number];

function isConfigFileKey(key: string): key is ConfigFileKey {
  return CONFIG_FILE_KEYS.some((known) => known === key);
}

/**
 * Parse configuration file (JSON or YAML) into raw, unvalidated values
 */
export function parseConfigFile(filePath: string): RawLivenessConfig {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, { cause: error });
  }

  const config = toRawConfig(parsed, filePath);
  logger.info("Configuration file parsed successfully", {
    keys: Object.keys(config),
  });
  return config;
}

/**
 * Check the shape of a parsed document. Values are range-checked later by resolveConfig.
 */
export function toRawConfig(parsed: unknown, source: string): RawLivenessConfig {
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${source}`);
  }

  const config: RawLivenessConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isConfigFileKey(key)) {
      throw new ConfigError(`Unknown config key "${key}" in ${source}`, { key });
    }
    if (value === null || value === undefined) continue;
    config[key] = toRawValue(key, value);
  }
  return config;
}

function toRawValue(key: string, value: unknown): RawConfigValue {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== "string") {
        throw new ConfigError(`"${key}" must be a list of strings`, { key });
      }
      items.push(item);
    }
    return items;
  }
  if (isRecord(value)) {
    const weights: Record<string, number> = {};
    for (const [name, weight] of Object.entries(value)) {
      if (typeof weight !== "number") {
        throw new ConfigError(`"${key}.${name}" must be a number`, { key });
      }
      weights[name] = weight;
    }
    return weights;
  }
  throw new ConfigError(`Unsupported value for "${key}"`, { key });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
