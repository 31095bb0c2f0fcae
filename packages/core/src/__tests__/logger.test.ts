import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getDialect } from '../dialects.js';
import { getLogLevel, isDebugEnabled, levelFromEnv, logRecovery, onLog, setLogLevel, timer } from '../logger.js';
import type { LogEntry } from '../logger.js';

describe('Logger', () => {
  const initial = getLogLevel();

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('maps PVL_DEBUG to a level', () => {
    expect(levelFromEnv({})).toBe('info');
    expect(levelFromEnv({ PVL_DEBUG: '1' })).toBe('debug');
    expect(levelFromEnv({ PVL_DEBUG: 'true' })).toBe('debug');
    expect(levelFromEnv({ PVL_DEBUG: 'error' })).toBe('error');
    expect(levelFromEnv({ PVL_DEBUG: 'verbose' })).toBe('info');
  });

  it('filters entries below the current level', () => {
    const seen: LogEntry[] = [];
    const off = onLog((entry) => seen.push(entry));
    setLogLevel('info');
    logRecovery('omni', 'dropped', 1);
    setLogLevel('debug');
    logRecovery('omni', 'kept', 2);
    off();
    expect(seen.map((e) => e.data?.key)).toEqual(['kept']);
    expect(console.debug).toHaveBeenCalledWith(
      '[pvl] recovered empty value for "kept" at line 2 (omni) {"dialect":"omni","key":"kept","lineno":2}',
    );
  });

  it('stops calling a callback after unsubscribe', () => {
    const seen: string[] = [];
    const off = onLog((entry) => seen.push(entry.message));
    setLogLevel('debug');
    off();
    logRecovery('omni', 'a', 1);
    expect(seen).toEqual([]);
  });

  it('reports lenient recoveries at debug level', () => {
    const seen: LogEntry[] = [];
    const off = onLog((entry) => seen.push(entry));
    setLogLevel('debug');
    expect(isDebugEnabled()).toBe(true);
    getDialect('omni').parser.parse('a =\nEND');
    off();
    const recovery = seen.find((e) => e.message.startsWith('recovered'));
    expect(recovery?.message).toBe('recovered empty value for "a" at line 1 (omni)');
    expect(recovery?.data).toEqual({ dialect: 'omni', key: 'a', lineno: 1 });
  });

  it('times an operation at debug level', () => {
    const seen: LogEntry[] = [];
    const off = onLog((entry) => seen.push(entry));
    setLogLevel('debug');
    const duration = timer('step').endWith({ items: 2n });
    off();
    expect(duration).toBeGreaterThanOrEqual(0);
    expect(seen[0]?.message).toMatch(/^step: \d+\.\d{2}ms$/);
    expect(seen[0]?.data?.items).toBe(2n);
  });
});
