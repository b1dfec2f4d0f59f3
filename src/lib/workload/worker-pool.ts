/**
 * Dispatcher running N concurrent workers against one shared limiter.
 *
 * Each worker: acquire a token (bounded wait) -> select a kind -> build the
 * key -> call storage -> classify -> report -> repeat until shutdown.
 * Operation failures never stop the pool; only the shutdown signal does.
 */

import { ConfigError, StorageError } from "../../utils/errors.js";
import { logger as rootLogger, type Logger } from "../../utils/logger.js";
import { PerfTimeSource, sleep } from "../utils/time.js";
import type { DocumentKey, OperationKind } from "../../types/workload.js";
import type {
  OperationOutcome,
  PoolReport,
  RunOptions,
  WorkerPoolOptions,
  WorkerState,
} from "./types.js";

interface PreparedOperation {
  kind: OperationKind;
  key: DocumentKey;
  execute: () => Promise<unknown>;
}

function createWorkerState(id: number): WorkerState {
  return {
    id,
    status: "running",
    attempts: 0,
    successes: 0,
    operationErrors: 0,
    unexpectedErrors: 0,
    failures: { find: 0, insert: 0, update: 0 },
    lastOperationAt: null,
  };
}

interface AbortWait {
  promise: Promise<void>;
  dispose: () => void;
}

function whenAborted(signal: AbortSignal): AbortWait {
  if (signal.aborted) return { promise: Promise.resolve(), dispose: () => undefined };
  let onAbort: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export class WorkerPool {
  private readonly options: WorkerPoolOptions;
  private readonly acquireTimeoutMs: number;
  private readonly errorBackoffMs: number;
  private readonly log: Logger;
  private readonly clock = new PerfTimeSource();
  private workers: WorkerState[] = [];
  private running = false;

  constructor(options: WorkerPoolOptions) {
    this.options = options;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 1000;
    this.errorBackoffMs = options.errorBackoffMs ?? 50;
    this.log = options.logger ?? rootLogger.child("workload");

    if (!(this.acquireTimeoutMs > 0)) {
      throw new ConfigError(`Acquire timeout must be > 0, got ${this.acquireTimeoutMs}`);
    }
    if (!(this.errorBackoffMs >= 0)) {
      throw new ConfigError(`Error backoff must be >= 0, got ${this.errorBackoffMs}`);
    }
  }

  /**
   * Run `workerCount` workers until `shutdownSignal` aborts, then drain.
   *
   * Workers stop acquiring as soon as the signal fires and finish any
   * in-flight storage call. The returned report lists workers still busy
   * when `graceMs` elapsed after the signal; they are abandoned, not killed.
   */
  async run(
    workerCount: number,
    shutdownSignal: AbortSignal,
    runOptions: RunOptions = {},
  ): Promise<PoolReport> {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new ConfigError(`Worker count must be an integer >= 1, got ${workerCount}`);
    }
    const graceMs = runOptions.graceMs ?? 5000;
    if (!Number.isFinite(graceMs) || graceMs < 0) {
      throw new ConfigError(`Shutdown grace must be >= 0, got ${graceMs}`);
    }
    if (this.running) {
      throw new Error("Worker pool is already running");
    }

    this.running = true;
    const startedAt = Date.now();
    this.workers = Array.from({ length: workerCount }, (_, id) => createWorkerState(id));
    this.log.info(`Starting ${workerCount} workers`);

    const exits = this.workers.map((state) => this.workerLoop(state, shutdownSignal));
    const allExited = Promise.all(exits).then(() => true);
    const aborted = whenAborted(shutdownSignal);

    try {
      await Promise.race([aborted.promise, allExited]);

      for (const state of this.workers) {
        if (state.status === "running") state.status = "stopping";
      }
      this.log.info("Shutdown signalled; draining workers", { graceMs });

      const drained = await this.waitForDrain(allExited, graceMs);
      const abandoned = this.workers
        .filter((state) => state.status !== "stopped")
        .map((state) => state.id);

      if (drained) {
        this.log.info("All workers drained");
      } else {
        this.log.warn("Grace period elapsed; abandoning workers", { abandoned });
      }

      return {
        drained,
        abandoned,
        workers: this.snapshot(),
        startedAt,
        stoppedAt: Date.now(),
      };
    } finally {
      aborted.dispose();
      this.running = false;
    }
  }

  snapshot(): WorkerState[] {
    return this.workers.map((state) => ({ ...state, failures: { ...state.failures } }));
  }

  private async waitForDrain(allExited: Promise<boolean>, graceMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    try {
      return await Promise.race([allExited, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async workerLoop(state: WorkerState, signal: AbortSignal): Promise<void> {
    const { limiter } = this.options;
    try {
      while (!signal.aborted) {
        const grant = await limiter.acquire(1, { timeoutMs: this.acquireTimeoutMs, signal });
        if (grant.status === "timeout") continue;
        if (grant.status !== "granted") break;

        const succeeded = await this.dispatch(state);
        if (!succeeded && this.errorBackoffMs > 0) {
          await sleep(this.errorBackoffMs, signal);
        }
      }
    } finally {
      state.status = "stopped";
    }
  }

  /**
   * Perform one operation. Never throws; returns whether it succeeded.
   */
  private async dispatch(state: WorkerState): Promise<boolean> {
    const op = this.prepare(this.options.selector.select());
    state.attempts++;
    const started = this.clock.nowMs();

    let outcome: OperationOutcome;
    try {
      await op.execute();
      state.successes++;
      outcome = this.outcome(state, op, "success", started);
    } catch (error) {
      state.failures[op.kind]++;
      if (error instanceof StorageError) {
        state.operationErrors++;
        outcome = {
          ...this.outcome(state, op, "operation_error", started),
          error,
          transient: error.transient,
        };
      } else {
        state.unexpectedErrors++;
        outcome = { ...this.outcome(state, op, "unexpected_error", started), error };
      }
    }
    state.lastOperationAt = Date.now();

    try {
      this.options.sink.record(outcome);
    } catch (sinkError) {
      this.log.error("Outcome sink threw", { error: String(sinkError) });
    }
    return outcome.outcome === "success";
  }

  private outcome(
    state: WorkerState,
    op: PreparedOperation,
    outcome: OperationOutcome["outcome"],
    started: number,
  ): OperationOutcome {
    return {
      workerId: state.id,
      kind: op.kind,
      key: op.key,
      outcome,
      durationMs: this.clock.nowMs() - started,
    };
  }

  private prepare(selected: OperationKind): PreparedOperation {
    const { router, keySpace, documents, storage } = this.options;

    if (selected !== "insert") {
      const sequence = keySpace.pickExisting();
      if (sequence !== undefined) {
        const key = router.buildKey(sequence);
        return selected === "find"
          ? { kind: "find", key, execute: () => storage.find(key) }
          : { kind: "update", key, execute: () => storage.update(key, documents.touch()) };
      }
      // Nothing to read or update yet
    }

    const sequence = keySpace.reserve();
    const key = router.buildKey(sequence);
    return {
      kind: "insert",
      key,
      execute: async () => {
        try {
          await storage.insert(documents.build(key));
        } catch (error) {
          // The document is there either way
          if (error instanceof StorageError && error.storageCode === "DUPLICATE_KEY") {
            keySpace.commit(sequence);
          }
          throw error;
        }
        keySpace.commit(sequence);
      },
    };
  }
}
