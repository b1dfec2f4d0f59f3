/**
 * Reporter module - run summaries and error sinks
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { LivenessConfig } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { sanitizeUri } from "../storage/mongo-errors.js";
import type { RunResults, RunSetup, RunStatus, RunSummary, SummaryConfig } from "./types.js";

export {
  FanoutErrorSink,
  LogErrorSink,
  SentryErrorSink,
  createErrorSink,
} from "./error-sink.js";
export type { ErrorContext, ErrorSeverity, ErrorSink, SentryErrorSinkOptions } from "./error-sink.js";
export { OperationErrorReporter } from "./outcome-reporter.js";
export type {
  RunResults,
  RunSetup,
  RunStatus,
  RunSummary,
  SummaryConfig,
} from "./types.js";

/**
 * Mask the URI and drop the error sink target before config leaves the process
 */
export function summarizeConfig(config: LivenessConfig): SummaryConfig {
  const { errorSinkTarget, ...rest } = config;
  return {
    ...rest,
    uri: sanitizeUri(config.uri),
    errorSink: errorSinkTarget ? "sentry" : "log",
  };
}

export function runStatus(results: RunResults): RunStatus {
  if (!results.pool.drained) return "drain_timeout";
  return results.heartbeat.health === "healthy" ? "ok" : "degraded";
}

/**
 * RunReporter collects what one run did into a JSON summary
 */
export class RunReporter {
  readonly runId: string;
  private readonly startedAt: Date;
  private readonly config: SummaryConfig;
  private setup: RunSetup | null = null;
  private summary: RunSummary | null = null;

  constructor(config: LivenessConfig, now: Date = new Date()) {
    this.runId = crypto.randomBytes(8).toString("hex");
    this.startedAt = now;
    this.config = summarizeConfig(config);
  }

  recordSetup(setup: RunSetup): void {
    this.setup = setup;
    logger.debug("Run setup recorded", {
      runId: this.runId,
      clusterType: setup.clusterType,
      shardKey: setup.shardKey.status,
    });
  }

  complete(results: RunResults, now: Date = new Date()): RunSummary {
    this.summary = {
      status: runStatus(results),
      run: {
        id: this.runId,
        startedAt: this.startedAt.toISOString(),
        stoppedAt: now.toISOString(),
        durationMs: now.getTime() - this.startedAt.getTime(),
      },
      config: this.config,
      setup: this.setup,
      pool: results.pool,
      metrics: results.metrics,
      heartbeat: results.heartbeat,
      limiter: results.limiter,
    };
    return this.summary;
  }

  getSummary(): RunSummary | null {
    return this.summary;
  }

  /**
   * Save the summary to a JSON file, creating parent directories
   */
  async save(outputPath: string): Promise<void> {
    if (!this.summary) {
      throw new Error("Run has not completed; nothing to save");
    }
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(this.summary, null, 2));
    logger.info("Run summary saved", { path: outputPath });
  }
}
