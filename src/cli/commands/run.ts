import { Command } from "commander";
import { LivenessRunner } from "../../lib/runner/index.js";
import { logger } from "../../utils/logger.js";
import type { RunCommandOptions } from "../config/types.js";
import { addConnectionOptions, exitWithError, loadConfig } from "./shared.js";

/**
 * Create run command: preload, then drive the workload until SIGINT/SIGTERM or --duration
 */
export function createRunCommand(): Command {
  const command = new Command("run").description(
    "Run a rate-limited find/insert/update workload and report liveness",
  );

  return addConnectionOptions(command)
    .option("--total-docs <number>", "Documents to preload before the workload (env: TOTAL_DOCS)")
    .option("--ops-per-sec <number>", "Aggregate operations per second (env: OPS_PER_SEC)")
    .option("--workers <number>", "Concurrent workers (env: WORKERS)")
    .option("--max-pool-size <number>", "Driver connection pool size (env: MAX_POOL_SIZE)")
    .option("--op-mix <mix>", "Operation weights, e.g. find=70,insert=20,update=10 (env: OP_MIX)")
    .option("--sentry-dsn <dsn>", "Report errors to Sentry (env: SENTRY_DSN)")
    .option("--heartbeat-interval <ms>", "Heartbeat probe interval (env: HEARTBEAT_INTERVAL_MS)")
    .option(
      "--heartbeat-threshold <count>",
      "Consecutive probe failures before degraded (env: HEARTBEAT_THRESHOLD)",
    )
    .option("--heartbeat-timeout <ms>", "Probe timeout (env: HEARTBEAT_TIMEOUT_MS)")
    .option("--acquire-timeout <ms>", "Max wait for a rate token (env: ACQUIRE_TIMEOUT_MS)")
    .option("--grace <ms>", "Drain period after shutdown (env: SHUTDOWN_GRACE_MS)")
    .option("--report-interval <ms>", "Throughput log interval (env: REPORT_INTERVAL_MS)")
    .option("--duration <seconds>", "Stop after this many seconds (env: DURATION_SEC)")
    .option("--seed <seed>", "Seed for deterministic document payloads (env: SEED)")
    .option("--summary-file <path>", "Also write the run summary JSON here (env: SUMMARY_FILE)")
    .action(async (opts: RunCommandOptions) => {
      try {
        const config = loadConfig(opts);
        const runner = new LivenessRunner({ config });

        const shutdown = new AbortController();
        const onSignal = (signal: NodeJS.Signals) => {
          if (shutdown.signal.aborted) {
            logger.warn(`Received ${signal} again; exiting now`);
            process.exit(130);
          }
          logger.info(`Received ${signal}; shutting down`);
          shutdown.abort();
        };
        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);

        const summary = await runner.run(shutdown.signal);

        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        console.log(JSON.stringify(summary, null, 2));
        process.exit(0);
      } catch (error) {
        exitWithError(error, "run");
      }
    });
}
