import { performance } from 'node:perf_hooks';
import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { ClusterEvent, EventFilter, FilterResult } from '../types.js';

interface FilterChainDependencies {
  log?: Pick<typeof logger, 'debug' | 'warn'>;
  metrics?: MetricsRegistry;
}

/**
 * Applies each filter to the output of the previous one. The input is copied
 * first so no stage ever aliases the caller's array. A stage returning `null`
 * ends the chain with `null`.
 */
export class FilterChain implements EventFilter {
  readonly name = 'chain';
  readonly filters: readonly EventFilter[];
  private readonly log: Pick<typeof logger, 'debug' | 'warn'>;
  private readonly metrics: MetricsRegistry;

  constructor(filters: Iterable<EventFilter> = [], dependencies: FilterChainDependencies = {}) {
    this.filters = Object.freeze(Array.from(filters));
    this.log = dependencies.log ?? logger;
    this.metrics = dependencies.metrics ?? defaultMetrics;
  }

  get size(): number {
    return this.filters.length;
  }

  filterEvents(events: readonly ClusterEvent[]): FilterResult {
    let current: ClusterEvent[] = events.slice();

    for (const [index, filter] of this.filters.entries()) {
      const started = performance.now();
      const next = filter.filterEvents(current);
      this.metrics.observeLatency(`filters.${filter.name}`, performance.now() - started);

      if (next === null) {
        this.log.warn(
          { filter: filter.name, stage: index, input: current.length },
          'Filter stage produced no result'
        );
        return null;
      }

      this.metrics.recordFilterRun(filter.name, current.length, next.length);
      this.log.debug(
        { filter: filter.name, stage: index, input: current.length, output: next.length },
        'Filter stage applied'
      );
      current = next;
    }

    return current;
  }
}
