/**
 * One liveness run: connect, prepare the collection, drive the workload
 * until shutdown, then report.
 */

import type { LivenessConfig } from "../../types/config.js";
import { ConnectivityError, errorMessage } from "../../utils/errors.js";
import { logger as rootLogger, type Logger } from "../../utils/logger.js";
import { DocumentFactory } from "../generator/document-factory.js";
import { HeartbeatMonitor, type HealthTransition } from "../heartbeat/index.js";
import { TokenBucketLimiter } from "../limiter/index.js";
import {
  OperationErrorReporter,
  RunReporter,
  createErrorSink,
  type ErrorSink,
  type RunSummary,
} from "../reporter/index.js";
import { DocumentKeyRouter, type KeySpace } from "../router/index.js";
import { OperationSelector } from "../selector/index.js";
import {
  createMongoStorage,
  ensureShardKey,
  logClusterInfo,
  preloadDataset,
  sanitizeUri,
  type LivenessBackend,
  type MongoStorageConfig,
} from "../storage/index.js";
import type { TimeSource } from "../utils/time.js";
import { WorkerPool, WorkloadMetrics, composeSinks } from "../workload/index.js";

export type ConnectFn = (config: MongoStorageConfig) => Promise<LivenessBackend>;

export interface LivenessRunnerOptions {
  config: LivenessConfig;
  /** Defaults to a connected MongoStorage */
  connect?: ConnectFn;
  /** Defaults to createErrorSink(config.errorSinkTarget) */
  errorSink?: ErrorSink;
  /** Documents per preload batch. Defaults to 1000 */
  preloadBatchSize?: number;
  /** Clock for the limiter and heartbeat */
  time?: TimeSource;
  logger?: Logger;
}

const FLUSH_TIMEOUT_MS = 2000;

export class LivenessRunner {
  private readonly config: LivenessConfig;
  private readonly connect: ConnectFn;
  private readonly errorSink: ErrorSink;
  private readonly preloadBatchSize: number;
  private readonly log: Logger;

  private readonly router: DocumentKeyRouter;
  private readonly selector: OperationSelector;
  private readonly limiter: TokenBucketLimiter;
  private readonly documents: DocumentFactory;
  private readonly heartbeat: HeartbeatMonitor;

  /**
   * Builds every component up front so a ConfigError surfaces before any connection
   */
  constructor(options: LivenessRunnerOptions) {
    const { config } = options;
    this.config = config;
    this.connect = options.connect ?? createMongoStorage;
    this.log = options.logger ?? rootLogger.child("runner");
    this.errorSink = options.errorSink ?? createErrorSink(config.errorSinkTarget);
    this.preloadBatchSize = options.preloadBatchSize ?? 1000;

    this.router = new DocumentKeyRouter({ topology: config.clusterTopology, zones: config.zones });
    this.selector = new OperationSelector(config.operationMix);
    this.limiter = new TokenBucketLimiter({ ratePerSecond: config.opsPerSecond, time: options.time });
    this.documents = new DocumentFactory(config.seed !== undefined ? { seed: config.seed } : {});
    this.heartbeat = new HeartbeatMonitor({
      failureThreshold: config.heartbeatFailureThreshold,
      probeTimeoutMs: config.heartbeatTimeoutMs,
      time: options.time,
    });
  }

  /**
   * Run until `signal` aborts or `durationSec` elapses, then drain and summarize
   */
  async run(signal: AbortSignal): Promise<RunSummary> {
    const { config } = this;
    const reporter = new RunReporter(config);

    this.log.info("Connecting", {
      uri: sanitizeUri(config.uri),
      db: config.db,
      collection: config.collection,
      maxPoolSize: config.maxPoolSize,
    });
    const storage = await this.connect({
      uri: config.uri,
      database: config.db,
      collection: config.collection,
      maxPoolSize: config.maxPoolSize,
      errorSink: this.errorSink,
    });

    let summary: RunSummary;
    try {
      const clusterType = await logClusterInfo(
        storage.admin(),
        storage.database(),
        config.db,
        config.collection,
      );
      const shardKey = await ensureShardKey({
        admin: storage.admin(),
        db: storage.database(),
        dbName: config.db,
        collection: config.collection,
        pattern: this.router.shardKeyPattern(),
        errorSink: this.errorSink,
      });
      await this.ensureIndexes(storage);

      const { result: preload, keySpace } = await preloadDataset({
        loader: storage,
        router: this.router,
        documents: this.documents,
        totalDocs: config.totalDocs,
        batchSize: this.preloadBatchSize,
        errorSink: this.errorSink,
      });
      reporter.recordSetup({ clusterType, shardKey, preload });

      summary = await this.drive(storage, keySpace, reporter, signal);
    } finally {
      await this.closeStorage(storage);
      const flushed = await this.errorSink.flush(FLUSH_TIMEOUT_MS);
      if (!flushed) {
        this.log.warn("Error sink did not flush in time", { timeoutMs: FLUSH_TIMEOUT_MS });
      }
    }

    if (config.summaryPath) {
      await reporter.save(config.summaryPath);
    }
    this.log.info("Run finished", {
      status: summary.status,
      attempts: summary.metrics.attempts,
      throughput: Number(summary.metrics.throughput.toFixed(2)),
    });
    return summary;
  }

  private async drive(
    storage: LivenessBackend,
    keySpace: KeySpace,
    reporter: RunReporter,
    signal: AbortSignal,
  ): Promise<RunSummary> {
    const { config } = this;
    const metrics = new WorkloadMetrics(Date.now, this.log.child("metrics"));
    const pool = new WorkerPool({
      limiter: this.limiter,
      selector: this.selector,
      router: this.router,
      keySpace,
      documents: this.documents,
      storage,
      sink: composeSinks(metrics, new OperationErrorReporter(this.errorSink)),
      acquireTimeoutMs: config.acquireTimeoutMs,
    });

    const shutdown = new AbortController();
    const onAbort = () => shutdown.abort();
    if (signal.aborted) {
      shutdown.abort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    let durationTimer: ReturnType<typeof setTimeout> | undefined;
    if (config.durationSec !== undefined) {
      durationTimer = setTimeout(() => {
        this.log.info(`Duration of ${config.durationSec}s elapsed; stopping`);
        shutdown.abort();
      }, config.durationSec * 1000);
    }

    const unsubscribe = this.heartbeat.onTransition((transition) => this.onHealth(transition));
    this.heartbeat.start(config.heartbeatIntervalMs, () => storage.ping());
    metrics.reportEvery(config.reportIntervalMs);

    try {
      const poolReport = await pool.run(config.workerCount, shutdown.signal, {
        graceMs: config.shutdownGraceMs,
      });
      return reporter.complete({
        pool: poolReport,
        metrics: metrics.snapshot(),
        heartbeat: this.heartbeat.getState(),
        limiter: this.limiter.stats(),
      });
    } finally {
      clearTimeout(durationTimer);
      signal.removeEventListener("abort", onAbort);
      metrics.stopReporting();
      this.limiter.close();
      await this.heartbeat.stop();
      unsubscribe();
    }
  }

  private onHealth(transition: HealthTransition): void {
    if (transition.to === "degraded") {
      const error = new ConnectivityError("Connectivity degraded", {
        consecutiveFailures: transition.consecutiveFailures,
        ...(transition.error !== undefined ? { lastError: transition.error } : {}),
      });
      this.errorSink.captureMessage(error.message, "error", {
        source: "heartbeat",
        tags: { code: error.code },
        extra: error.details,
      });
      return;
    }
    this.errorSink.captureMessage("Connectivity recovered", "info", { source: "heartbeat" });
  }

  private async ensureIndexes(storage: LivenessBackend): Promise<void> {
    try {
      await storage.ensureIndexes();
    } catch (error) {
      this.log.warn("Could not create indexes", { error: errorMessage(error) });
      this.errorSink.captureException(error, { source: "setup", tags: { step: "ensureIndexes" } });
    }
  }

  private async closeStorage(storage: LivenessBackend): Promise<void> {
    try {
      await storage.close();
    } catch (error) {
      this.log.warn("Error closing storage", { error: errorMessage(error) });
    }
  }
}
