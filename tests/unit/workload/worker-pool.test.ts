import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WorkerPool } from '../../../src/lib/workload/index.js';
import type { OperationOutcome, WorkerPoolOptions } from '../../../src/lib/workload/index.js';
import { TokenBucketLimiter } from '../../../src/lib/limiter/index.js';
import { OperationSelector } from '../../../src/lib/selector/index.js';
import { DocumentKeyRouter, KeySpace } from '../../../src/lib/router/index.js';
import { DocumentFactory } from '../../../src/lib/generator/document-factory.js';
import { WallTimeSource } from '../../../src/lib/utils/time.js';
import { ConfigError, StorageError } from '../../../src/utils/errors.js';
import { createLogger } from '../../../src/utils/logger.js';
import type { OperationMix } from '../../../src/types/workload.js';
import { InMemoryStorage } from '../../helpers/in-memory-storage.js';

const quiet = createLogger({ level: 'error', prefix: 'test' });

interface Harness {
  pool: WorkerPool;
  storage: InMemoryStorage;
  limiter: TokenBucketLimiter;
  keySpace: KeySpace;
  outcomes: OperationOutcome[];
}

function createHarness(
  mix: OperationMix,
  overrides: Partial<WorkerPoolOptions> & { ratePerSecond?: number; initialTokens?: number; existing?: number } = {},
): Harness {
  const storage = new InMemoryStorage();
  const limiter = new TokenBucketLimiter({
    ratePerSecond: overrides.ratePerSecond ?? 10,
    initialTokens: overrides.initialTokens ?? 0,
    time: new WallTimeSource(),
  });
  const keySpace = new KeySpace(overrides.existing ?? 0);
  const outcomes: OperationOutcome[] = [];

  const pool = new WorkerPool({
    limiter,
    selector: new OperationSelector(mix),
    router: new DocumentKeyRouter({ topology: 'replica_set' }),
    keySpace,
    documents: new DocumentFactory({ seed: 'test-seed', minimal: true }),
    storage,
    sink: { record: (outcome) => outcomes.push(outcome) },
    errorBackoffMs: 0,
    logger: quiet,
    ...overrides,
  });

  return { pool, storage, limiter, keySpace, outcomes };
}

describe('WorkerPool', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject invalid worker counts and grace periods', async () => {
    const { pool } = createHarness({ find: 1 });
    const controller = new AbortController();

    await expect(pool.run(0, controller.signal)).rejects.toThrow(ConfigError);
    await expect(pool.run(1.5, controller.signal)).rejects.toThrow(ConfigError);
    await expect(pool.run(1, controller.signal, { graceMs: -1 })).rejects.toThrow(ConfigError);
  });

  it('should reject a non-positive acquire timeout', () => {
    expect(() => createHarness({ find: 1 }, { acquireTimeoutMs: 0 })).toThrow(ConfigError);
  });

  it('should insert first when the key space is empty, then read existing keys', async () => {
    const { pool, outcomes } = createHarness({ find: 1 });
    const controller = new AbortController();
    const run = pool.run(1, controller.signal);

    await vi.advanceTimersByTimeAsync(300);
    controller.abort();
    const report = await run;

    expect(outcomes.length).toBe(3);
    expect(outcomes[0]).toMatchObject({
      kind: 'insert',
      outcome: 'success',
      key: { id: 'doc-000000000000', sequence: 0 },
    });
    expect(outcomes.slice(1).every((outcome) => outcome.kind === 'find')).toBe(true);
    expect(outcomes.slice(1).every((outcome) => outcome.key.sequence === 0)).toBe(true);
    expect(report.workers[0]).toMatchObject({ attempts: 3, successes: 3, status: 'stopped' });
  });

  it('should not read or update a sequence whose insert failed', async () => {
    const { pool, storage, keySpace, outcomes } = createHarness({ update: 1 });
    vi.spyOn(storage, 'insert').mockRejectedValueOnce(
      new StorageError('NETWORK', 'connection reset', true),
    );
    const controller = new AbortController();
    const run = pool.run(1, controller.signal);

    await vi.advanceTimersByTimeAsync(1000);
    controller.abort();
    await run;

    expect(outcomes).toHaveLength(10);
    expect(outcomes[0]).toMatchObject({ kind: 'insert', outcome: 'operation_error', key: { sequence: 0 } });
    expect(outcomes[1]).toMatchObject({ kind: 'insert', outcome: 'success', key: { sequence: 1 } });
    const updates = outcomes.slice(2);
    expect(updates.every((outcome) => outcome.kind === 'update' && outcome.outcome === 'success')).toBe(true);
    expect(updates.every((outcome) => outcome.key.sequence === 1)).toBe(true);
    expect(keySpace.size()).toBe(1);
    expect(keySpace.nextSequence()).toBe(2);
  });

  it('should keep a sequence whose insert hit an existing document', async () => {
    const { pool, storage, keySpace, outcomes } = createHarness({ insert: 1 });
    vi.spyOn(storage, 'insert').mockRejectedValueOnce(
      new StorageError('DUPLICATE_KEY', 'duplicate key doc-000000000000', false),
    );
    const controller = new AbortController();
    const run = pool.run(1, controller.signal);

    await vi.advanceTimersByTimeAsync(200);
    controller.abort();
    await run;

    expect(outcomes.map((outcome) => outcome.outcome)).toEqual(['operation_error', 'success']);
    expect(keySpace.size()).toBe(2);
  });

  it('should remove its abort listener when every worker exits on its own', async () => {
    const { pool, limiter } = createHarness({ find: 1 }, { existing: 1 });
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, 'addEventListener');
    const removed = vi.spyOn(controller.signal, 'removeEventListener');
    const run = pool.run(2, controller.signal);

    await vi.advanceTimersByTimeAsync(300);
    limiter.close();
    const report = await run;

    expect(report.drained).toBe(true);
    expect(added.mock.calls.length).toBeGreaterThan(0);
    const removedListeners = removed.mock.calls.map((call) => call[1]);
    for (const call of added.mock.calls) {
      expect(removedListeners).toContain(call[1]);
    }
  });

  it('should classify StorageError as an operation error with its transient hint', async () => {
    const { pool, storage, outcomes } = createHarness({ update: 1 }, { existing: 5 });
    storage.failures.update = new StorageError('TIMEOUT', 'operation timed out', true);
    const controller = new AbortController();
    const run = pool.run(2, controller.signal);

    await vi.advanceTimersByTimeAsync(1000);
    controller.abort();
    const report = await run;

    expect(outcomes.length).toBeGreaterThan(0);
    for (const outcome of outcomes) {
      expect(outcome.outcome).toBe('operation_error');
      expect(outcome.transient).toBe(true);
      expect(outcome.kind).toBe('update');
      expect(outcome.error).toBeInstanceOf(StorageError);
    }
    const failures = report.workers.reduce((sum, worker) => sum + worker.failures.update, 0);
    expect(failures).toBe(outcomes.length);
  });

  it('should classify any other error as unexpected and keep the worker running', async () => {
    const { pool, storage, outcomes } = createHarness({ find: 1 }, { existing: 5 });
    storage.failures.find = new TypeError('boom');
    const controller = new AbortController();
    const run = pool.run(1, controller.signal);

    await vi.advanceTimersByTimeAsync(500);
    controller.abort();
    const report = await run;

    expect(outcomes.length).toBe(5);
    expect(outcomes.every((outcome) => outcome.outcome === 'unexpected_error')).toBe(true);
    expect(outcomes.every((outcome) => outcome.transient === undefined)).toBe(true);
    expect(report.workers[0]?.unexpectedErrors).toBe(5);
  });

  it('should keep running when the outcome sink throws', async () => {
    let records = 0;
    const { pool } = createHarness(
      { find: 1 },
      {
        existing: 1,
        sink: {
          record: () => {
            records++;
            throw new Error('sink failure');
          },
        },
      },
    );
    const controller = new AbortController();
    const run = pool.run(1, controller.signal);

    await vi.advanceTimersByTimeAsync(400);
    controller.abort();
    await run;

    expect(records).toBe(4);
  });

  it('should stop acquiring tokens once shutdown is signalled', async () => {
    const { pool, limiter, storage } = createHarness({ find: 1 }, { existing: 1 });
    const controller = new AbortController();
    const run = pool.run(3, controller.signal);

    await vi.advanceTimersByTimeAsync(500);
    controller.abort();
    const report = await run;
    const grantedAtShutdown = limiter.stats().granted;
    const callsAtShutdown = storage.calls.find;

    await vi.advanceTimersByTimeAsync(5000);

    expect(report.drained).toBe(true);
    expect(report.abandoned).toEqual([]);
    expect(report.workers.every((worker) => worker.status === 'stopped')).toBe(true);
    expect(limiter.stats().granted).toBe(grantedAtShutdown);
    expect(storage.calls.find).toBe(callsAtShutdown);
  });

  it('should let in-flight operations finish within the grace period', async () => {
    const { pool, storage, outcomes } = createHarness({ find: 1 }, { existing: 1, initialTokens: 2 });
    storage.latencyMs = 200;
    const controller = new AbortController();
    const run = pool.run(2, controller.signal, { graceMs: 1000 });

    await vi.advanceTimersByTimeAsync(0);
    controller.abort();
    await vi.advanceTimersByTimeAsync(200);
    const report = await run;

    expect(report.drained).toBe(true);
    expect(outcomes).toHaveLength(2);
    expect(outcomes.every((outcome) => outcome.outcome === 'success')).toBe(true);
  });

  it('should abandon workers still busy exactly at the grace deadline', async () => {
    const { pool, storage } = createHarness({ find: 1 }, { existing: 1, initialTokens: 2 });
    storage.latencyMs = 10_000;
    const controller = new AbortController();
    const run = pool.run(2, controller.signal, { graceMs: 500 });
    let settled = false;
    void run.then(() => {
      settled = true;
    });

    await vi.advanceTimersByTimeAsync(0);
    expect(storage.calls.find).toBe(2);
    controller.abort();

    await vi.advanceTimersByTimeAsync(499);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const report = await run;
    expect(settled).toBe(true);
    expect(report.drained).toBe(false);
    expect(report.abandoned).toEqual([0, 1]);
    expect(report.workers.map((worker) => worker.status)).toEqual(['stopping', 'stopping']);

    await vi.advanceTimersByTimeAsync(10_000);
  });

  it('should refuse to run twice concurrently', async () => {
    const { pool } = createHarness({ find: 1 });
    const controller = new AbortController();
    const run = pool.run(1, controller.signal);

    await expect(pool.run(1, controller.signal)).rejects.toThrow('Worker pool is already running');

    controller.abort();
    await run;
  });
});
