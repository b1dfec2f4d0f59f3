import type { Command } from "commander";
import type { LivenessConfig } from "../../types/config.js";
import { ErrorCode, LivenessError, errorMessage } from "../../utils/errors.js";
import { resolveConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import { configFromEnv, loadEnvFile } from "../config/env.js";
import { parseConfigFile } from "../config/parser.js";
import { configFromOptions, type RunCommandOptions } from "../config/types.js";

/**
 * Connection flags common to every command
 */
export function addConnectionOptions(command: Command): Command {
  return command
    .option("--uri <uri>", "MongoDB connection string (env: MONGODB_URI)")
    .option("--db <name>", "Database name (env: MONGO_DB)")
    .option("--coll <name>", "Collection name (env: MONGO_COLL)")
    .option(
      "--cluster-type <type>",
      "Cluster topology: replica_set, sharded, geosharded (env: CLUSTER_TYPE)",
    )
    .option("--zones <codes>", "Comma-separated zone codes for geosharded keys (env: ZONES)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug (env: LOG_LEVEL)")
    .option("--env-file <path>", "Load environment variables from this file instead of ./.env")
    .option("--config <path>", "Path to configuration file (JSON/YAML)");
}

/**
 * Resolve flags, environment and config file into one validated config,
 * and apply its log level
 */
export function loadConfig(options: RunCommandOptions): LivenessConfig {
  loadEnvFile(options.envFile);
  const config = resolveConfig({
    cli: configFromOptions(options),
    env: configFromEnv(),
    file: options.config ? parseConfigFile(options.config) : undefined,
  });
  logger.setLevel(config.logLevel);
  return config;
}

/**
 * Print the error as a JSON response and exit: 2 for configuration errors, 1 otherwise
 */
export function exitWithError(error: unknown, phase: string): never {
  const livenessError =
    error instanceof LivenessError
      ? error
      : new LivenessError(ErrorCode.GENERAL_ERROR, errorMessage(error), undefined, {
          cause: error,
        });

  if (livenessError.code !== ErrorCode.CONFIG_ERROR) {
    logger.error(`${phase} failed`, livenessError);
  }
  console.error(JSON.stringify(livenessError.toResponse(phase), null, 2));
  process.exit(livenessError.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
}
