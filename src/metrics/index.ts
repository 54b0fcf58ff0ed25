import pino from 'pino';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type FilterStageState = {
  runs: number;
  failures: number;
  eventsIn: number;
  eventsOut: number;
  lastRunAt: number | null;
  lastFailureAt: number | null;
  lastFailureReason: string | null;
};

type FilterStageSnapshot = {
  runs: number;
  failures: number;
  eventsIn: number;
  eventsOut: number;
  eventsDropped: number;
  lastRunAt: string | null;
  lastFailureAt: string | null;
  lastFailureReason: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  filters: {
    runs: number;
    failures: number;
    byFilter: Record<string, FilterStageSnapshot>;
  };
  latencies: Record<string, LatencyStats>;
};

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly filterStages = new Map<string, FilterStageState>();
  private readonly latencyStats = new Map<
    string,
    { count: number; totalMs: number; minMs: number; maxMs: number }
  >();

  reset() {
    this.logLevelCounters.clear();
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.filterStages.clear();
    this.latencyStats.clear();
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordFilterRun(filter: string, eventsIn: number, eventsOut: number) {
    const state = getFilterStageState(this.filterStages, filter);
    state.runs += 1;
    state.eventsIn += Math.max(0, eventsIn);
    state.eventsOut += Math.max(0, eventsOut);
    state.lastRunAt = Date.now();
  }

  recordFilterFailure(filter: string, reason: string) {
    const state = getFilterStageState(this.filterStages, filter);
    state.failures += 1;
    state.lastFailureAt = Date.now();
    state.lastFailureReason = reason;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    let runs = 0;
    let failures = 0;
    const byFilter: Record<string, FilterStageSnapshot> = {};
    const ordered = Array.from(this.filterStages.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [filter, state] of ordered) {
      runs += state.runs;
      failures += state.failures;
      byFilter[filter] = {
        runs: state.runs,
        failures: state.failures,
        eventsIn: state.eventsIn,
        eventsOut: state.eventsOut,
        eventsDropped: Math.max(0, state.eventsIn - state.eventsOut),
        lastRunAt: state.lastRunAt ? new Date(state.lastRunAt).toISOString() : null,
        lastFailureAt: state.lastFailureAt ? new Date(state.lastFailureAt).toISOString() : null,
        lastFailureReason: state.lastFailureReason
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      filters: { runs, failures, byFilter },
      latencies: mapFromLatencies(this.latencyStats)
    };
  }
}

function getFilterStageState(map: Map<string, FilterStageState>, filter: string): FilterStageState {
  const existing = map.get(filter);
  if (existing) {
    return existing;
  }
  const created: FilterStageState = {
    runs: 0,
    failures: 0,
    eventsIn: 0,
    eventsOut: 0,
    lastRunAt: null,
    lastFailureAt: null,
    lastFailureReason: null
  };
  map.set(filter, created);
  return created;
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const values: Record<string, number> = pino.levels.values;
  const entries = Array.from(source.entries()).sort(([a], [b]) => {
    const delta = (values[a] ?? Number.MAX_SAFE_INTEGER) - (values[b] ?? Number.MAX_SAFE_INTEGER);
    return delta !== 0 ? delta : a.localeCompare(b);
  });
  return Object.fromEntries(entries);
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.count > 0 ? stats.minMs : 0,
      maxMs: stats.maxMs,
      averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
    };
  }
  return result;
}

const defaultRegistry = new MetricsRegistry();

export type { MetricsSnapshot, FilterStageSnapshot, LatencyStats };
export { MetricsRegistry };
export default defaultRegistry;
