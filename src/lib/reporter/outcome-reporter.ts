import type { OperationOutcome, OutcomeSink } from "../workload/types.js";
import type { ErrorSink } from "./error-sink.js";

/**
 * Forwards failed operations to an error sink with the context needed to
 * triage them: kind, key, worker and the transient hint.
 */
export class OperationErrorReporter implements OutcomeSink {
  constructor(private readonly errorSink: ErrorSink) {}

  record(outcome: OperationOutcome): void {
    if (outcome.outcome === "success") return;

    this.errorSink.captureException(outcome.error, {
      source: "operation",
      tags: {
        kind: outcome.kind,
        outcome: outcome.outcome,
        worker: outcome.workerId,
        ...(outcome.transient !== undefined ? { transient: outcome.transient } : {}),
      },
      extra: {
        id: outcome.key.id,
        sequence: outcome.key.sequence,
        ...(outcome.key.location !== undefined ? { location: outcome.key.location } : {}),
        durationMs: outcome.durationMs,
      },
    });
  }
}
