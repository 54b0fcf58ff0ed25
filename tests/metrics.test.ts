import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';

function seededRegistry() {
  const registry = new MetricsRegistry();
  registry.recordFilterRun('kinds', 4, 1);
  registry.recordFilterRun('kinds', 2, 2);
  registry.recordFilterFailure('around', 'no events');
  return registry;
}

describe('MetricsFilterCounters', () => {
  it('MetricsFilterSnapshot aggregates runs failures and dropped events', () => {
    const snapshot = seededRegistry().snapshot();

    expect(snapshot.filters.runs).toBe(2);
    expect(snapshot.filters.failures).toBe(1);
    expect(Object.keys(snapshot.filters.byFilter)).toEqual(['around', 'kinds']);
    expect(snapshot.filters.byFilter.kinds).toMatchObject({
      runs: 2,
      failures: 0,
      eventsIn: 6,
      eventsOut: 3,
      eventsDropped: 3,
      lastFailureAt: null,
      lastFailureReason: null
    });
    expect(snapshot.filters.byFilter.around).toMatchObject({
      runs: 0,
      failures: 1,
      lastRunAt: null,
      lastFailureReason: 'no events'
    });
  });

  it('MetricsLatency tracks count and bounds per stage', () => {
    const registry = new MetricsRegistry();
    registry.observeLatency('filters.kinds', 2);
    registry.observeLatency('filters.kinds', 6);
    registry.observeLatency('filters.kinds', Number.NaN);

    expect(registry.snapshot().latencies['filters.kinds']).toEqual({
      count: 2,
      totalMs: 8,
      minMs: 2,
      maxMs: 6,
      averageMs: 4
    });
  });

  it('MetricsReset clears every counter', () => {
    const registry = seededRegistry();
    registry.incrementLogLevel('warn');
    registry.observeLatency('filters.kinds', 3);

    registry.reset();

    const snapshot = registry.snapshot();
    expect(snapshot.filters).toEqual({ runs: 0, failures: 0, byFilter: {} });
    expect(snapshot.logs.byLevel).toEqual({});
    expect(snapshot.latencies).toEqual({});
  });

  it('MetricsLogLevels counts log calls and remembers the last error', () => {
    const registry = new MetricsRegistry();
    registry.incrementLogLevel('INFO');
    registry.incrementLogLevel('error', { message: 'stage failed' });

    const logs = registry.exportLogLevelMetrics();
    expect(logs.byLevel).toEqual({ info: 1, error: 1 });
    expect(logs.lastErrorMessage).toBe('stage failed');
    expect(logs.lastErrorAt).not.toBeNull();
  });
});
