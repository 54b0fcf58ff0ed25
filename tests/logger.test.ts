import { afterEach, describe, expect, it, vi } from 'vitest';
import metrics from '../src/metrics/index.js';
import { getLogLevel, onLogLevelChange, setLogLevel } from '../src/logger.js';

describe('LoggerLevels', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
  });

  it('LoggerLevelsNormalize accepts mixed case and whitespace', () => {
    expect(setLogLevel(' WARN ')).toBe('warn');
    expect(getLogLevel()).toBe('warn');
  });

  it('LoggerLevelsRejectUnknown names the available levels', () => {
    const current = getLogLevel();
    expect(() => setLogLevel('verbose')).toThrow(
      'Unknown log level "verbose" (available: debug, error, fatal, info, trace, warn)'
    );
    expect(getLogLevel()).toBe(current);
  });

  it('LoggerLevelsNotify informs listeners of changes only', () => {
    setLogLevel('debug');
    const listener = vi.fn();
    const detach = onLogLevelChange(listener);

    setLogLevel('trace');
    setLogLevel('trace');
    detach();
    setLogLevel('debug');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('trace', 'debug');
  });

  it('LoggerLevelsMetrics counts the level change log line', () => {
    setLogLevel('debug');
    const before = metrics.exportLogLevelMetrics().byLevel.info ?? 0;

    setLogLevel('info');

    expect(getLogLevel()).toBe('info');
    expect(metrics.exportLogLevelMetrics().byLevel.info).toBe(before + 1);
  });
});
