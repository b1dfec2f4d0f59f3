import type { Logger } from "../../utils/logger.js";
import type { DocumentKey, OperationKind } from "../../types/workload.js";
import type { DocumentFactory } from "../generator/document-factory.js";
import type { TokenBucketLimiter } from "../limiter/token-bucket.js";
import type { DocumentKeyRouter, KeySpace } from "../router/index.js";
import type { OperationSelector } from "../selector/index.js";
import type { StorageClient } from "../storage/types.js";

export type OutcomeClass = "success" | "operation_error" | "unexpected_error";

export interface OperationOutcome {
  workerId: number;
  kind: OperationKind;
  key: DocumentKey;
  outcome: OutcomeClass;
  durationMs: number;
  /** Set for anything but success */
  error?: unknown;
  /** For operation errors, the storage layer's transient hint */
  transient?: boolean;
}

/**
 * Receives every classified operation outcome
 */
export interface OutcomeSink {
  record(outcome: OperationOutcome): void;
}

export type WorkerStatus = "running" | "stopping" | "stopped";

export interface WorkerState {
  id: number;
  status: WorkerStatus;
  attempts: number;
  successes: number;
  operationErrors: number;
  unexpectedErrors: number;
  failures: Record<OperationKind, number>;
  lastOperationAt: number | null;
}

export interface WorkerPoolOptions {
  limiter: TokenBucketLimiter;
  selector: OperationSelector;
  router: DocumentKeyRouter;
  keySpace: KeySpace;
  documents: DocumentFactory;
  storage: StorageClient;
  sink: OutcomeSink;
  /** Bounded wait per acquisition; a timeout just retries. Defaults to 1000 */
  acquireTimeoutMs?: number;
  /** Pause after a failed operation. Defaults to 50 */
  errorBackoffMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  /** How long to wait for in-flight work after shutdown. Defaults to 5000 */
  graceMs?: number;
}

export interface PoolReport {
  /** Every worker exited within the grace period */
  drained: boolean;
  /** Workers still running at the grace deadline */
  abandoned: number[];
  workers: WorkerState[];
  startedAt: number;
  stoppedAt: number;
}
