/**
 * Error reporting destinations
 */

import * as Sentry from "@sentry/node";
import { logger as rootLogger, type Logger } from "../../utils/logger.js";
import { errorMessage } from "../../utils/errors.js";

export type ErrorSeverity = "error" | "warning" | "info";

/**
 * Context attached to every report so it can be triaged on its own
 */
export interface ErrorContext {
  /** Short machine-readable origin, e.g. "operation", "heartbeat", "setup" */
  source: string;
  tags?: Record<string, string | number | boolean>;
  extra?: Record<string, unknown>;
}

export interface ErrorSink {
  readonly name: string;
  captureException(error: unknown, context: ErrorContext): void;
  captureMessage(message: string, severity: ErrorSeverity, context: ErrorContext): void;
  /** Resolves true when buffered reports were delivered within `timeoutMs` */
  flush(timeoutMs: number): Promise<boolean>;
}

/**
 * Writes reports through the logger. Default when no remote sink is configured.
 */
export class LogErrorSink implements ErrorSink {
  readonly name = "log";
  private readonly log: Logger;

  constructor(log: Logger = rootLogger.child("errors")) {
    this.log = log;
  }

  captureException(error: unknown, context: ErrorContext): void {
    this.log.error(`[${context.source}] ${errorMessage(error)}`, {
      ...context.tags,
      ...context.extra,
    });
  }

  captureMessage(message: string, severity: ErrorSeverity, context: ErrorContext): void {
    const meta = { ...context.tags, ...context.extra };
    if (severity === "error") {
      this.log.error(`[${context.source}] ${message}`, meta);
    } else if (severity === "warning") {
      this.log.warn(`[${context.source}] ${message}`, meta);
    } else {
      this.log.info(`[${context.source}] ${message}`, meta);
    }
  }

  async flush(): Promise<boolean> {
    return true;
  }
}

export interface SentryErrorSinkOptions {
  dsn: string;
  environment?: string;
  release?: string;
}

/**
 * Sends reports to Sentry. Tracing is disabled; only errors and messages are sent.
 */
export class SentryErrorSink implements ErrorSink {
  readonly name = "sentry";

  constructor(options: SentryErrorSinkOptions) {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      release: options.release,
      tracesSampleRate: 0,
    });
  }

  captureException(error: unknown, context: ErrorContext): void {
    Sentry.captureException(error, {
      tags: { source: context.source, ...context.tags },
      extra: context.extra,
    });
  }

  captureMessage(message: string, severity: ErrorSeverity, context: ErrorContext): void {
    Sentry.captureMessage(message, {
      level: severity,
      tags: { source: context.source, ...context.tags },
      extra: context.extra,
    });
  }

  flush(timeoutMs: number): Promise<boolean> {
    return Sentry.flush(timeoutMs);
  }
}

/**
 * Reports to every sink in order
 */
export class FanoutErrorSink implements ErrorSink {
  readonly name: string;

  constructor(private readonly sinks: readonly ErrorSink[]) {
    this.name = sinks.map((sink) => sink.name).join("+");
  }

  captureException(error: unknown, context: ErrorContext): void {
    for (const sink of this.sinks) sink.captureException(error, context);
  }

  captureMessage(message: string, severity: ErrorSeverity, context: ErrorContext): void {
    for (const sink of this.sinks) sink.captureMessage(message, severity, context);
  }

  async flush(timeoutMs: number): Promise<boolean> {
    const results = await Promise.all(this.sinks.map((sink) => sink.flush(timeoutMs)));
    return results.every(Boolean);
  }
}

/**
 * Log sink always; Sentry in addition when a DSN is given
 */
export function createErrorSink(target?: string, log?: Logger): ErrorSink {
  const logSink = new LogErrorSink(log);
  if (!target) {
    return logSink;
  }
  return new FanoutErrorSink([logSink, new SentryErrorSink({ dsn: target })]);
}
