/**
 * Aggregate counters for the whole pool
 */

import { logger as rootLogger, type Logger } from "../../utils/logger.js";
import { OPERATION_KINDS, type OperationKind } from "../../types/workload.js";
import type { OperationOutcome, OutcomeSink } from "./types.js";

export interface LatencyStats {
  count: number;
  totalMs: number;
  minMs: number | null;
  maxMs: number | null;
  meanMs: number | null;
}

export interface KindMetrics {
  attempts: number;
  successes: number;
  operationErrors: number;
  unexpectedErrors: number;
  latency: LatencyStats;
}

export interface MetricsSnapshot {
  elapsedMs: number;
  attempts: number;
  successes: number;
  operationErrors: number;
  unexpectedErrors: number;
  /** Attempts per second since the metrics started */
  throughput: number;
  byKind: Record<OperationKind, KindMetrics>;
}

function emptyKindMetrics(): KindMetrics {
  return {
    attempts: 0,
    successes: 0,
    operationErrors: 0,
    unexpectedErrors: 0,
    latency: { count: 0, totalMs: 0, minMs: null, maxMs: null, meanMs: null },
  };
}

export class WorkloadMetrics implements OutcomeSink {
  private readonly byKind: Record<OperationKind, KindMetrics> = {
    find: emptyKindMetrics(),
    insert: emptyKindMetrics(),
    update: emptyKindMetrics(),
  };
  private readonly startedAt: number;
  private reportTimer: ReturnType<typeof setInterval> | null = null;
  private lastReport: { at: number; attempts: number };
  private readonly log: Logger;

  constructor(
    private readonly now: () => number = Date.now,
    log?: Logger,
  ) {
    this.startedAt = now();
    this.lastReport = { at: this.startedAt, attempts: 0 };
    this.log = log ?? rootLogger.child("metrics");
  }

  record(outcome: OperationOutcome): void {
    const metrics = this.byKind[outcome.kind];
    metrics.attempts++;
    if (outcome.outcome === "success") {
      metrics.successes++;
    } else if (outcome.outcome === "operation_error") {
      metrics.operationErrors++;
    } else {
      metrics.unexpectedErrors++;
    }

    const latency = metrics.latency;
    latency.count++;
    latency.totalMs += outcome.durationMs;
    latency.minMs = latency.minMs === null ? outcome.durationMs : Math.min(latency.minMs, outcome.durationMs);
    latency.maxMs = latency.maxMs === null ? outcome.durationMs : Math.max(latency.maxMs, outcome.durationMs);
    latency.meanMs = latency.totalMs / latency.count;
  }

  snapshot(): MetricsSnapshot {
    const elapsedMs = this.now() - this.startedAt;
    const copy = (kind: OperationKind): KindMetrics => ({
      ...this.byKind[kind],
      latency: { ...this.byKind[kind].latency },
    });
    const byKind = { find: copy("find"), insert: copy("insert"), update: copy("update") };

    let attempts = 0;
    let successes = 0;
    let operationErrors = 0;
    let unexpectedErrors = 0;
    for (const kind of OPERATION_KINDS) {
      attempts += byKind[kind].attempts;
      successes += byKind[kind].successes;
      operationErrors += byKind[kind].operationErrors;
      unexpectedErrors += byKind[kind].unexpectedErrors;
    }

    return {
      elapsedMs,
      attempts,
      successes,
      operationErrors,
      unexpectedErrors,
      throughput: elapsedMs > 0 ? (attempts * 1000) / elapsedMs : 0,
      byKind,
    };
  }

  /**
   * Log throughput over each interval until stopReporting()
   */
  reportEvery(intervalMs: number): void {
    this.stopReporting();
    this.reportTimer = setInterval(() => this.logInterval(), intervalMs);
    this.reportTimer.unref();
  }

  stopReporting(): void {
    if (this.reportTimer) {
      clearInterval(this.reportTimer);
      this.reportTimer = null;
    }
  }

  private logInterval(): void {
    const snap = this.snapshot();
    const now = this.now();
    const windowMs = now - this.lastReport.at;
    const windowOps = snap.attempts - this.lastReport.attempts;
    this.lastReport = { at: now, attempts: snap.attempts };

    this.log.info("Workload throughput", {
      opsPerSec: windowMs > 0 ? Math.round((windowOps * 1000 * 100) / windowMs) / 100 : 0,
      total: snap.attempts,
      errors: snap.operationErrors + snap.unexpectedErrors,
      find: snap.byKind.find.attempts,
      insert: snap.byKind.insert.attempts,
      update: snap.byKind.update.attempts,
    });
  }
}
