import { describe, expect, it, vi } from 'vitest';
import { FilterChain } from '../src/filters/chain.js';
import { NamespaceFilter, WarningFilter } from '../src/filters/fields.js';
import { KindFilter } from '../src/filters/kind.js';
import { AroundTimeFilter } from '../src/filters/timeWindow.js';
import { KindRuleSet } from '../src/kinds/rules.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { ClusterEvent, EventFilter } from '../src/types.js';
import { captureSink, makeEvent } from './helpers/events.js';

function createLog() {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe('FilterChain', () => {
  const shopWarning = makeEvent({
    type: 'Warning',
    involvedObject: { namespace: 'shop', apiVersion: 'apps/v1', kind: 'Deployment' }
  });
  const shopNormal = makeEvent({ involvedObject: { namespace: 'shop', apiVersion: 'v1', kind: 'Pod' } });
  const systemWarning = makeEvent({
    type: 'Warning',
    involvedObject: { namespace: 'kube-system', apiVersion: 'v1', kind: 'Pod' }
  });
  const events = [shopWarning, shopNormal, systemWarning];

  it('FilterChainEmpty returns a copy of the input', () => {
    const chain = new FilterChain([], { log: createLog(), metrics: new MetricsRegistry() });
    const result = chain.filterEvents(events);
    expect(result).toEqual(events);
    expect(result).not.toBe(events);
  });

  it('FilterChainComposes threads each stage output into the next stage', () => {
    const chain = new FilterChain(
      [
        new WarningFilter(),
        new NamespaceFilter(['shop', 'kube-system']),
        new KindFilter({ rules: KindRuleSet.fromStrings(['*.apps']) })
      ],
      { log: createLog(), metrics: new MetricsRegistry() }
    );
    expect(chain.filterEvents(events)).toEqual([shopWarning]);
  });

  it('FilterChainOrder hands every stage the previous result', () => {
    const seen: number[] = [];
    const counting = (name: string): EventFilter => ({
      name,
      filterEvents(input: readonly ClusterEvent[]) {
        seen.push(input.length);
        return input.slice(1);
      }
    });
    const chain = new FilterChain([counting('first'), counting('second'), counting('third')], {
      log: createLog(),
      metrics: new MetricsRegistry()
    });

    expect(chain.filterEvents(events)).toEqual([systemWarning]);
    expect(seen).toEqual([3, 2, 1]);
  });

  it('FilterChainStopsOnNoResult returns null and skips remaining stages', () => {
    const sink = captureSink();
    const metrics = new MetricsRegistry();
    const log = createLog();
    const after = { name: 'after', filterEvents: vi.fn((input: readonly ClusterEvent[]) => [...input]) };
    const chain = new FilterChain(
      [new AroundTimeFilter({ around: 'noon', durationMs: 60_000, stderr: sink, metrics }), after],
      { log, metrics }
    );

    expect(chain.filterEvents(events)).toBeNull();
    expect(after.filterEvents).not.toHaveBeenCalled();
    expect(sink.lines).toHaveLength(1);
    expect(log.warn).toHaveBeenCalledWith(
      { filter: 'around', stage: 0, input: 3 },
      'Filter stage produced no result'
    );
  });

  it('FilterChainNests accepts a chain as one of its stages', () => {
    const metrics = new MetricsRegistry();
    const inner = new FilterChain([new WarningFilter()], { log: createLog(), metrics });
    const outer = new FilterChain([inner, new NamespaceFilter(['kube-system'])], {
      log: createLog(),
      metrics
    });
    expect(outer.filterEvents(events)).toEqual([systemWarning]);
  });

  it('FilterChainRecordsMetrics counts events in and out per stage', () => {
    const metrics = new MetricsRegistry();
    const log = createLog();
    const chain = new FilterChain([new WarningFilter(), new NamespaceFilter(['shop'])], {
      log,
      metrics
    });

    chain.filterEvents(events);

    const snapshot = metrics.snapshot();
    expect(snapshot.filters.runs).toBe(2);
    expect(snapshot.filters.byFilter.warnings).toMatchObject({ runs: 1, eventsIn: 3, eventsOut: 2, eventsDropped: 1 });
    expect(snapshot.filters.byFilter.namespaces).toMatchObject({ runs: 1, eventsIn: 2, eventsOut: 1 });
    expect(snapshot.latencies['filters.warnings']?.count).toBe(1);
    expect(log.debug).toHaveBeenCalledTimes(2);
    expect(log.debug).toHaveBeenLastCalledWith(
      { filter: 'namespaces', stage: 1, input: 2, output: 1 },
      'Filter stage applied'
    );
  });

  it('FilterChainLeavesInputAlone does not mutate the caller array', () => {
    const input = [...events];
    new FilterChain([new WarningFilter()], { log: createLog(), metrics: new MetricsRegistry() }).filterEvents(input);
    expect(input).toEqual(events);
  });
});
