import type { Logger } from "../../utils/logger.js";
import type { TimeSource } from "../utils/time.js";

export type HealthStatus = "healthy" | "degraded";

export interface HeartbeatState {
  health: HealthStatus;
  lastSuccessAt: number | null;
  consecutiveFailures: number;
  totalProbes: number;
  totalFailures: number;
  lastError?: string;
}

export interface HealthTransition {
  from: HealthStatus;
  to: HealthStatus;
  consecutiveFailures: number;
  at: number;
  /** Last probe error, on a transition to degraded */
  error?: string;
}

export type HeartbeatProbe = () => Promise<unknown>;

export type TransitionListener = (transition: HealthTransition) => void;

export interface HeartbeatMonitorOptions {
  /** Consecutive failures that flip health to degraded. Defaults to 3 */
  failureThreshold?: number;
  /** A probe still pending after this long counts as failed */
  probeTimeoutMs?: number;
  time?: TimeSource;
  logger?: Logger;
}
