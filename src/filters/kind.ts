import type { ClusterEvent, EventFilter, GroupKind, KindMatchingMode, KindRule } from '../types.js';
import { GroupKindSet, resolveGroupKind } from '../kinds/groupKind.js';
import { KindRuleSet, NEGATION_PREFIX, WILDCARD, patternMatches } from '../kinds/rules.js';

export type KindFilterOptions = {
  rules: KindRuleSet | Iterable<KindRule>;
  mode?: KindMatchingMode;
};

export const DEFAULT_KIND_MATCHING: KindMatchingMode = 'strict';

function ruleMatches(rule: KindRule, actual: GroupKind): boolean {
  return patternMatches(rule.group, actual.group) && patternMatches(rule.kind, actual.kind);
}

/**
 * Single pass: any matching negated rule drops the event, otherwise any
 * matching positive rule keeps it. Rule order does not matter.
 */
export function matchesStrict(rules: readonly KindRule[], actual: GroupKind): boolean {
  let included = false;
  for (const rule of rules) {
    if (!ruleMatches(rule, actual)) {
      continue;
    }
    if (rule.negate) {
      return false;
    }
    included = true;
  }
  return included;
}

/**
 * How many times the legacy evaluation appends an event: 0, 1 or 2.
 *
 * Exact exclusion skips the event outright. Otherwise an exact inclusion
 * appends it, and unless a wildcard exclusion applies, the first wildcard
 * inclusion appends it again. A wildcard exclusion never retracts the exact
 * inclusion.
 */
export function legacyMatchCount(keys: GroupKindSet, actual: GroupKind): number {
  const negatedKind = `${NEGATION_PREFIX}${actual.kind}`;
  if (keys.has({ group: actual.group, kind: negatedKind })) {
    return 0;
  }

  let count = keys.has(actual) ? 1 : 0;

  for (const key of keys) {
    if (key.group === WILDCARD && key.kind === negatedKind) {
      return count;
    }
    if (key.kind === `${NEGATION_PREFIX}${WILDCARD}` && key.group === actual.group) {
      return count;
    }
  }

  for (const key of keys) {
    if (
      (key.group === WILDCARD && key.kind === WILDCARD) ||
      (key.group === WILDCARD && key.kind === actual.kind) ||
      (key.kind === WILDCARD && key.group === actual.group)
    ) {
      count += 1;
      break;
    }
  }
  return count;
}

export class KindFilter implements EventFilter {
  readonly name = 'kinds';
  readonly ruleSet: KindRuleSet;
  readonly mode: KindMatchingMode;

  constructor(options: KindFilterOptions) {
    this.ruleSet = options.rules instanceof KindRuleSet ? options.rules : new KindRuleSet(options.rules);
    this.mode = options.mode ?? DEFAULT_KIND_MATCHING;
  }

  filterEvents(events: readonly ClusterEvent[]): ClusterEvent[] {
    const kept: ClusterEvent[] = [];
    for (const event of events) {
      const actual = resolveGroupKind(event.involvedObject);
      if (this.mode === 'legacy') {
        const count = legacyMatchCount(this.ruleSet.keys, actual);
        for (let index = 0; index < count; index += 1) {
          kept.push(event);
        }
        continue;
      }
      if (matchesStrict(this.ruleSet.rules, actual)) {
        kept.push(event);
      }
    }
    return kept;
  }
}
