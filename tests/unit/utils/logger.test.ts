import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger, createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'warn', prefix: 'test' });

    log.info('hidden');
    log.debug('hidden');

    expect(write).not.toHaveBeenCalled();
  });

  it('should write info lines to stderr with prefix and JSON metadata', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'info', prefix: 'test' });

    log.info('started', { workers: 4 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(
      /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[test\] INFO: started \{"workers":4\}\n$/,
    );
  });

  it('should give children a component prefix and follow the parent level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const parent = new Logger({ level: 'error', prefix: 'liveness' });
    const child = parent.child('workload');

    child.info('hidden');
    expect(write).not.toHaveBeenCalled();

    parent.setLevel('debug');
    expect(child.getLevel()).toBe('debug');
    child.debug('visible');
    expect(String(write.mock.calls[0]?.[0])).toContain('[liveness:workload] DEBUG: visible');
  });

  it('should recognise valid levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
