import { describe, it, expect, afterEach, vi } from 'vitest';
import { WorkloadMetrics, composeSinks } from '../../../src/lib/workload/index.js';
import type { OperationOutcome } from '../../../src/lib/workload/index.js';
import { StorageError } from '../../../src/utils/errors.js';
import { createLogger } from '../../../src/utils/logger.js';

function outcome(overrides: Partial<OperationOutcome>): OperationOutcome {
  return {
    workerId: 0,
    kind: 'find',
    key: { id: 'doc-000000000001', sequence: 1 },
    outcome: 'success',
    durationMs: 10,
    ...overrides,
  };
}

describe('WorkloadMetrics', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should count outcomes per kind and class', () => {
    let now = 1_000;
    const metrics = new WorkloadMetrics(() => now, createLogger({ level: 'error' }));

    metrics.record(outcome({ durationMs: 4 }));
    metrics.record(outcome({ durationMs: 12 }));
    metrics.record(
      outcome({
        kind: 'update',
        outcome: 'operation_error',
        durationMs: 30,
        error: new StorageError('NOT_FOUND', 'No document matched', false),
        transient: false,
      }),
    );
    metrics.record(outcome({ kind: 'insert', outcome: 'unexpected_error', durationMs: 2 }));
    now = 3_000;

    const snapshot = metrics.snapshot();
    expect(snapshot).toMatchObject({
      elapsedMs: 2_000,
      attempts: 4,
      successes: 2,
      operationErrors: 1,
      unexpectedErrors: 1,
      throughput: 2,
    });
    expect(snapshot.byKind.find).toEqual({
      attempts: 2,
      successes: 2,
      operationErrors: 0,
      unexpectedErrors: 0,
      latency: { count: 2, totalMs: 16, minMs: 4, maxMs: 12, meanMs: 8 },
    });
    expect(snapshot.byKind.update.operationErrors).toBe(1);
    expect(snapshot.byKind.insert.unexpectedErrors).toBe(1);
  });

  it('should return snapshots detached from later records', () => {
    const metrics = new WorkloadMetrics(() => 0, createLogger({ level: 'error' }));
    const before = metrics.snapshot();

    metrics.record(outcome({}));

    expect(before.byKind.find.attempts).toBe(0);
    expect(before.byKind.find.latency.minMs).toBeNull();
    expect(before.throughput).toBe(0);
  });

  it('should log interval throughput until stopped', () => {
    vi.useFakeTimers();
    const log = createLogger({ level: 'error' });
    const info = vi.spyOn(log, 'info');
    const metrics = new WorkloadMetrics(() => Date.now(), log);

    metrics.reportEvery(1_000);
    for (let i = 0; i < 5; i++) metrics.record(outcome({}));
    vi.advanceTimersByTime(1_000);

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('Workload throughput', {
      opsPerSec: 5,
      total: 5,
      errors: 0,
      find: 5,
      insert: 0,
      update: 0,
    });

    metrics.stopReporting();
    vi.advanceTimersByTime(5_000);
    expect(info).toHaveBeenCalledTimes(1);
  });
});

describe('composeSinks', () => {
  it('should record into every sink in order', () => {
    const seen: string[] = [];
    const sink = composeSinks(
      { record: () => seen.push('first') },
      { record: () => seen.push('second') },
    );

    sink.record(outcome({}));

    expect(seen).toEqual(['first', 'second']);
  });
});
