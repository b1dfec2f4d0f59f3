import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../../../src/utils/config-loader.js';
import { DEFAULT_ZONES } from '../../../src/lib/router/index.js';
import { ConfigError } from '../../../src/utils/errors.js';

const uri = 'mongodb://localhost:27017';

describe('resolveConfig', () => {
  it('should fill defaults around the required uri', () => {
    const config = resolveConfig({ cli: { uri } });

    expect(config).toEqual({ uri, ...DEFAULT_CONFIG });
    expect(config.operationMix).toEqual({ find: 70, insert: 20, update: 10 });
    expect(config.zones).toEqual([...DEFAULT_ZONES]);
    expect(config.durationSec).toBeUndefined();
  });

  it('should fail without a uri', () => {
    expect(() => resolveConfig({})).toThrow(ConfigError);
    expect(() => resolveConfig({ cli: { uri: '   ' } })).toThrow('--uri or MONGODB_URI must be provided');
  });

  it('should apply precedence CLI > environment > file', () => {
    const config = resolveConfig({
      file: { uri: 'mongodb://file', db: 'file-db', collection: 'file-coll', workerCount: 2 },
      env: { uri: 'mongodb://env', db: 'env-db' },
      cli: { uri: 'mongodb://cli' },
    });

    expect(config.uri).toBe('mongodb://cli');
    expect(config.db).toBe('env-db');
    expect(config.collection).toBe('file-coll');
    expect(config.workerCount).toBe(2);
  });

  it('should ignore empty and undefined values from higher layers', () => {
    const config = resolveConfig({
      env: { uri, db: 'env-db' },
      cli: { db: undefined, collection: '' },
    });

    expect(config.db).toBe('env-db');
    expect(config.collection).toBe('probe');
  });

  it('should parse numeric strings once', () => {
    const config = resolveConfig({
      cli: {
        uri,
        opsPerSecond: '250.5',
        workerCount: '16',
        maxPoolSize: '100',
        totalDocs: '0',
        shutdownGraceMs: '0',
        durationSec: '30',
        heartbeatFailureThreshold: '5',
      },
    });

    expect(config).toMatchObject({
      opsPerSecond: 250.5,
      workerCount: 16,
      maxPoolSize: 100,
      totalDocs: 0,
      shutdownGraceMs: 0,
      durationSec: 30,
      heartbeatFailureThreshold: 5,
    });
  });

  it('should parse mix, topology, zones and log level', () => {
    const config = resolveConfig({
      env: {
        uri,
        operationMix: 'find=1,update=1',
        clusterTopology: 'geosharded',
        zones: 'EU, AP',
        logLevel: 'DEBUG',
        errorSinkTarget: 'https://public@sentry.example.com/1',
        seed: 'test-seed',
      },
    });

    expect(config.operationMix).toEqual({ find: 1, update: 1 });
    expect(config.clusterTopology).toBe('geosharded');
    expect(config.zones).toEqual(['EU', 'AP']);
    expect(config.logLevel).toBe('debug');
    expect(config.errorSinkTarget).toBe('https://public@sentry.example.com/1');
    expect(config.seed).toBe('test-seed');
  });

  it('should accept structured values from a config file', () => {
    const config = resolveConfig({
      file: { uri, operationMix: { find: 3, insert: 1 }, zones: ['US', 'JP'], opsPerSecond: 20 },
    });

    expect(config.operationMix).toEqual({ find: 3, insert: 1 });
    expect(config.zones).toEqual(['US', 'JP']);
    expect(config.opsPerSecond).toBe(20);
  });

  it.each([
    ['an unknown topology', { clusterTopology: 'standalone' }],
    ['a malformed mix', { operationMix: 'find=lots' }],
    ['an all-zero mix', { operationMix: 'find=0,insert=0' }],
    ['an unknown kind in a mix map', { operationMix: { delete: 1 } }],
    ['a zero rate', { opsPerSecond: '0' }],
    ['a non-numeric rate', { opsPerSecond: 'fast' }],
    ['zero workers', { workerCount: '0' }],
    ['fractional workers', { workerCount: '2.5' }],
    ['a zero pool size', { maxPoolSize: 0 }],
    ['negative totalDocs', { totalDocs: '-1' }],
    ['a zero heartbeat interval', { heartbeatIntervalMs: '0' }],
    ['a zero report interval', { reportIntervalMs: '0' }],
    ['a zero duration', { durationSec: '0' }],
    ['an empty zone list', { zones: ' , ' }],
    ['an unknown log level', { logLevel: 'verbose' }],
    ['a boolean where a string belongs', { db: true }],
  ])('should reject %s', (_label, overrides) => {
    expect(() => resolveConfig({ cli: { uri, ...overrides } })).toThrow(ConfigError);
  });
});
