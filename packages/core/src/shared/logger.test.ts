import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from './logger.js';

describe('logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('writes tagged lines to stderr at or above the current level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');
    const log = createLogger('test');

    log.info('hidden');
    log.warn('shown', 42);

    expect(spy).toHaveBeenCalledTimes(1);
    const [prefix, ...rest] = spy.mock.calls[0];
    expect(prefix).toMatch(/^\d{4}-\d{2}-\d{2}T.+ \[WARN \] \[test\]$/);
    expect(rest).toEqual(['shown', 42]);
  });

  it('recognizes valid level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
