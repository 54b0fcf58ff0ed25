import type { GroupKind, GroupVersion, ObjectReference } from '../types.js';

/**
 * Splits an `apiVersion` such as `apps/v1` into group and version. A bare
 * version (`v1`) belongs to the core group, which has an empty name.
 */
export function parseGroupVersion(apiVersion: string): GroupVersion {
  if (apiVersion.length === 0 || apiVersion === '/') {
    return { group: '', version: '' };
  }

  const separator = apiVersion.indexOf('/');
  if (separator === -1) {
    return { group: '', version: apiVersion };
  }
  if (apiVersion.indexOf('/', separator + 1) !== -1) {
    throw new Error(`unexpected GroupVersion string: ${apiVersion}`);
  }
  return {
    group: apiVersion.slice(0, separator),
    version: apiVersion.slice(separator + 1)
  };
}

/**
 * `Deployment.apps` -> { kind: 'Deployment', group: 'apps' }. Only the first
 * dot separates, so `Lease.coordination.k8s.io` keeps the dotted group.
 */
export function parseGroupKind(text: string): GroupKind {
  const separator = text.indexOf('.');
  if (separator === -1) {
    return { group: '', kind: text };
  }
  return {
    group: text.slice(separator + 1),
    kind: text.slice(0, separator)
  };
}

export function formatGroupKind(groupKind: GroupKind): string {
  return groupKind.group.length > 0 ? `${groupKind.kind}.${groupKind.group}` : groupKind.kind;
}

export function groupKindEquals(left: GroupKind, right: GroupKind): boolean {
  return left.group === right.group && left.kind === right.kind;
}

export function resolveGroupKind(reference: ObjectReference): GroupKind {
  const apiVersion = reference.apiVersion ?? '';
  const kind = reference.kind ?? '';
  try {
    return { group: parseGroupVersion(apiVersion).group, kind };
  } catch {
    // more than one slash: the raw apiVersion stands in for the group
    return { group: apiVersion, kind };
  }
}

/**
 * Value-keyed set of GroupKinds; object identity plays no part in lookups.
 */
export class GroupKindSet implements Iterable<GroupKind> {
  private readonly byGroup = new Map<string, Set<string>>();
  private count = 0;

  constructor(values: Iterable<GroupKind> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  get size(): number {
    return this.count;
  }

  add(groupKind: GroupKind): this {
    const kinds = this.byGroup.get(groupKind.group) ?? new Set<string>();
    if (!kinds.has(groupKind.kind)) {
      kinds.add(groupKind.kind);
      this.count += 1;
    }
    this.byGroup.set(groupKind.group, kinds);
    return this;
  }

  has(groupKind: GroupKind): boolean {
    return this.byGroup.get(groupKind.group)?.has(groupKind.kind) ?? false;
  }

  *[Symbol.iterator](): Iterator<GroupKind> {
    for (const [group, kinds] of this.byGroup) {
      for (const kind of kinds) {
        yield { group, kind };
      }
    }
  }
}
