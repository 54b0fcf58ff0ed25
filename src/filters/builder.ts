import type { DiagnosticSink, EventFilter, KindMatchingMode, KindRule } from '../types.js';
import type { MetricsRegistry } from '../metrics/index.js';
import { KindRuleSet, parseKindRule } from '../kinds/rules.js';
import { parseDuration } from '../utils/duration.js';
import { FilterChain } from './chain.js';
import {
  ComponentFilter,
  NameFilter,
  NamespaceFilter,
  ReasonFilter,
  UidFilter,
  WarningFilter
} from './fields.js';
import { DEFAULT_KIND_MATCHING, KindFilter } from './kind.js';
import { AroundTimeFilter } from './timeWindow.js';

export const DEFAULT_AROUND_DURATION = '5m';

export type EventFilterOptions = {
  warningsOnly?: boolean;
  namespaces?: string[];
  names?: string[];
  uids?: string[];
  reasons?: string[];
  components?: string[];
  kinds?: string[];
  kindMatching?: KindMatchingMode;
  around?: string;
  aroundDuration?: string | number;
};

export type EventFilterDependencies = {
  stderr?: DiagnosticSink;
  metrics?: MetricsRegistry;
};

export class FilterOptionsError extends Error {
  constructor(public readonly problems: string[]) {
    super(problems.join('; '));
    this.name = 'FilterOptionsError';
  }
}

function hasValues(values: string[] | undefined): values is string[] {
  return Array.isArray(values) && values.length > 0;
}

/**
 * Builds the chain in a fixed order: warnings, namespaces, names, uids,
 * reasons, components, kinds, time window. Unset options add no stage.
 * Every problem in the options is collected before throwing.
 */
export function buildEventFilters(
  options: EventFilterOptions,
  dependencies: EventFilterDependencies = {}
): FilterChain {
  const problems: string[] = [];
  const filters: EventFilter[] = [];

  if (options.warningsOnly) {
    filters.push(new WarningFilter());
  }
  if (hasValues(options.namespaces)) {
    filters.push(new NamespaceFilter(options.namespaces));
  }
  if (hasValues(options.names)) {
    filters.push(new NameFilter(options.names));
  }
  if (hasValues(options.uids)) {
    filters.push(new UidFilter(options.uids));
  }
  if (hasValues(options.reasons)) {
    filters.push(new ReasonFilter(options.reasons));
  }
  if (hasValues(options.components)) {
    filters.push(new ComponentFilter(options.components));
  }

  if (hasValues(options.kinds)) {
    const rules: KindRule[] = [];
    options.kinds.forEach((text, index) => {
      try {
        rules.push(parseKindRule(text));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        problems.push(`kinds[${index}]: ${message}`);
      }
    });
    filters.push(
      new KindFilter({
        rules: new KindRuleSet(rules),
        mode: options.kindMatching ?? DEFAULT_KIND_MATCHING
      })
    );
  }

  if (typeof options.around === 'string' && options.around.length > 0) {
    let durationMs = 0;
    try {
      durationMs = parseDuration(options.aroundDuration ?? DEFAULT_AROUND_DURATION);
      if (durationMs < 0) {
        problems.push('aroundDuration must not be negative');
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      problems.push(`aroundDuration: ${message}`);
    }
    filters.push(
      new AroundTimeFilter({
        around: options.around,
        durationMs,
        stderr: dependencies.stderr,
        metrics: dependencies.metrics
      })
    );
  }

  if (problems.length > 0) {
    throw new FilterOptionsError(problems);
  }

  return new FilterChain(filters, { metrics: dependencies.metrics });
}
