/**
 * Periodic connectivity probe, independent of the workload's rate limiter.
 *
 * A single failed operation under load is expected; a run of failed probes
 * means the connection or pool itself is unusable. The monitor turns the
 * latter into a `degraded` transition for the surrounding process.
 */

import { ConfigError, errorMessage } from "../../utils/errors.js";
import { logger as rootLogger, type Logger } from "../../utils/logger.js";
import { WallTimeSource, type TimeSource } from "../utils/time.js";
import type {
  HealthTransition,
  HeartbeatMonitorOptions,
  HeartbeatProbe,
  HeartbeatState,
  TransitionListener,
} from "./types.js";

export type {
  HealthStatus,
  HealthTransition,
  HeartbeatMonitorOptions,
  HeartbeatProbe,
  HeartbeatState,
  TransitionListener,
} from "./types.js";

class ProbeTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Heartbeat probe timed out after ${timeoutMs}ms`);
    this.name = "ProbeTimeoutError";
  }
}

export class HeartbeatMonitor {
  readonly failureThreshold: number;
  private readonly probeTimeoutMs: number | undefined;
  private readonly time: TimeSource;
  private readonly log: Logger;
  private readonly listeners = new Set<TransitionListener>();

  private state: HeartbeatState = {
    health: "healthy",
    lastSuccessAt: null,
    consecutiveFailures: 0,
    totalProbes: 0,
    totalFailures: 0,
  };

  private probe: HeartbeatProbe | null = null;
  private intervalMs = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<HeartbeatState> | null = null;
  private running = false;
  /** Bumped by start and stop so a superseded chain never reschedules */
  private generation = 0;

  constructor(options: HeartbeatMonitorOptions = {}) {
    const threshold = options.failureThreshold ?? 3;
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new ConfigError(`Heartbeat failure threshold must be an integer >= 1, got ${threshold}`);
    }
    if (options.probeTimeoutMs !== undefined && !(options.probeTimeoutMs > 0)) {
      throw new ConfigError(`Heartbeat probe timeout must be > 0, got ${options.probeTimeoutMs}`);
    }
    this.failureThreshold = threshold;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.time = options.time ?? new WallTimeSource();
    this.log = options.logger ?? rootLogger.child("heartbeat");
  }

  /**
   * Probe now, then again `intervalMs` after each probe settles
   */
  start(intervalMs: number, probe: HeartbeatProbe): void {
    if (this.running) {
      throw new Error("Heartbeat monitor already started");
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new ConfigError(`Heartbeat interval must be > 0, got ${intervalMs}`);
    }
    this.probe = probe;
    this.intervalMs = intervalMs;
    this.running = true;
    const generation = ++this.generation;
    this.log.debug("Heartbeat started", { intervalMs, failureThreshold: this.failureThreshold });
    void this.tick(generation);
  }

  /**
   * Cancel the schedule. A probe already in flight completes and is recorded.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.log.debug("Heartbeat stopped", { ...this.state });
  }

  /**
   * Run a single probe and record its result
   */
  probeOnce(probe: HeartbeatProbe | null = this.probe): Promise<HeartbeatState> {
    if (!probe) {
      return Promise.reject(new Error("No heartbeat probe configured"));
    }
    const run = this.execute(probe).finally(() => {
      if (this.inFlight === run) this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getState(): HeartbeatState {
    return { ...this.state };
  }

  isRunning(): boolean {
    return this.running;
  }

  private async tick(generation: number): Promise<void> {
    if (generation !== this.generation) return;
    this.timer = null;

    if (this.inFlight) {
      // A ping from a stopped chain is still settling
      await this.inFlight;
      if (generation !== this.generation) return;
    }
    await this.probeOnce();

    if (generation === this.generation) {
      this.timer = setTimeout(() => void this.tick(generation), this.intervalMs);
    }
  }

  private async execute(probe: HeartbeatProbe): Promise<HeartbeatState> {
    this.state.totalProbes++;
    try {
      await this.withTimeout(probe());
      this.recordSuccess();
    } catch (error) {
      this.recordFailure(error);
    }
    return this.getState();
  }

  private withTimeout(pending: Promise<unknown>): Promise<unknown> {
    const timeoutMs = this.probeTimeoutMs;
    if (timeoutMs === undefined) return pending;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ProbeTimeoutError(timeoutMs)), timeoutMs);
    });
    return Promise.race([pending, timeout]).finally(() => clearTimeout(timer));
  }

  private recordSuccess(): void {
    const previous = this.state.consecutiveFailures;
    this.state.consecutiveFailures = 0;
    this.state.lastSuccessAt = this.time.nowMs();
    delete this.state.lastError;

    if (this.state.health === "degraded") {
      this.state.health = "healthy";
      this.log.info("Connectivity recovered", { afterFailures: previous });
      this.emit({ from: "degraded", to: "healthy", consecutiveFailures: 0, at: this.time.nowMs() });
    }
  }

  private recordFailure(error: unknown): void {
    const message = errorMessage(error);
    this.state.consecutiveFailures++;
    this.state.totalFailures++;
    this.state.lastError = message;
    this.log.warn("Heartbeat probe failed", {
      consecutiveFailures: this.state.consecutiveFailures,
      error: message,
    });

    if (
      this.state.health === "healthy" &&
      this.state.consecutiveFailures >= this.failureThreshold
    ) {
      this.state.health = "degraded";
      this.log.error("Connectivity degraded", {
        consecutiveFailures: this.state.consecutiveFailures,
        error: message,
      });
      this.emit({
        from: "healthy",
        to: "degraded",
        consecutiveFailures: this.state.consecutiveFailures,
        at: this.time.nowMs(),
        error: message,
      });
    }
  }

  private emit(transition: HealthTransition): void {
    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (error) {
        this.log.error("Heartbeat transition listener threw", { error: errorMessage(error) });
      }
    }
  }
}
