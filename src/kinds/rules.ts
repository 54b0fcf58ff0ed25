import type { GroupKind, KindRule, RulePattern } from '../types.js';
import { GroupKindSet, parseGroupKind } from './groupKind.js';

export const WILDCARD = '*';
export const NEGATION_PREFIX = '-';

const ANY: RulePattern = { match: 'any' };

function decodePattern(value: string): RulePattern {
  return value === WILDCARD ? ANY : { match: 'exact', value };
}

function encodePattern(pattern: RulePattern): string {
  return pattern.match === 'any' ? WILDCARD : pattern.value;
}

export function patternMatches(pattern: RulePattern, actual: string): boolean {
  return pattern.match === 'any' || pattern.value === actual;
}

/**
 * Reads the string-encoded form: `*` means any value and a leading `-` on
 * the kind negates the rule.
 */
export function decodeGroupKind(groupKind: GroupKind): KindRule {
  const negate = groupKind.kind.startsWith(NEGATION_PREFIX);
  const kind = negate ? groupKind.kind.slice(NEGATION_PREFIX.length) : groupKind.kind;
  return {
    group: decodePattern(groupKind.group),
    kind: decodePattern(kind),
    negate
  };
}

export function encodeKindRule(rule: KindRule): GroupKind {
  const kind = encodePattern(rule.kind);
  return {
    group: encodePattern(rule.group),
    kind: rule.negate ? `${NEGATION_PREFIX}${kind}` : kind
  };
}

export class KindRuleSyntaxError extends Error {
  constructor(
    public readonly input: string,
    detail: string
  ) {
    super(`invalid kind rule "${input}": ${detail}`);
    this.name = 'KindRuleSyntaxError';
  }
}

/**
 * Parses `[-]Kind[.group]` as typed on the command line, e.g. `Deployment.apps`,
 * `-Pod`, `*.apps`, `-*.apps` or `*.*`.
 */
export function parseKindRule(text: string): KindRule {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new KindRuleSyntaxError(text, 'empty rule');
  }
  const groupKind = parseGroupKind(trimmed);
  const body = groupKind.kind.startsWith(NEGATION_PREFIX)
    ? groupKind.kind.slice(NEGATION_PREFIX.length)
    : groupKind.kind;
  if (!body) {
    throw new KindRuleSyntaxError(text, 'kind must not be empty');
  }
  if (body.startsWith(NEGATION_PREFIX)) {
    throw new KindRuleSyntaxError(text, 'kind may be negated only once');
  }
  return decodeGroupKind(groupKind);
}

export function formatKindRule(rule: KindRule): string {
  const { group, kind } = encodeKindRule(rule);
  return group.length > 0 ? `${kind}.${group}` : kind;
}

/**
 * Ordered, immutable rule list. The string-encoded key set is kept alongside
 * for the legacy evaluation order.
 */
export class KindRuleSet {
  readonly rules: readonly KindRule[];
  readonly keys: GroupKindSet;

  constructor(rules: Iterable<KindRule>) {
    this.rules = Object.freeze(Array.from(rules, rule => Object.freeze({ ...rule })));
    this.keys = new GroupKindSet(this.rules.map(encodeKindRule));
  }

  static fromStrings(texts: Iterable<string>): KindRuleSet {
    return new KindRuleSet(Array.from(texts, parseKindRule));
  }

  static fromGroupKinds(groupKinds: Iterable<GroupKind>): KindRuleSet {
    return new KindRuleSet(Array.from(groupKinds, decodeGroupKind));
  }

  /**
   * Reads a keyed set whose keys are `kind.group` strings (`Deployment.apps`,
   * `-Pod`, `*.*`). Entries mapped to `false` are left out.
   */
  static fromKeyedSet(keyed: ReadonlyMap<string, boolean>): KindRuleSet {
    const groupKinds: GroupKind[] = [];
    for (const [key, enabled] of keyed) {
      if (enabled) {
        groupKinds.push(parseGroupKind(key));
      }
    }
    return KindRuleSet.fromGroupKinds(groupKinds);
  }

  get size(): number {
    return this.rules.length;
  }

  toStrings(): string[] {
    return this.rules.map(formatKindRule);
  }
}
