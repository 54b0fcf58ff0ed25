export interface Membership {
  readonly acceptsAll: boolean;
  accepts(candidate: string | null | undefined): boolean;
}

const ACCEPT_ALL: Membership = {
  acceptsAll: true,
  accepts() {
    return true;
  }
};

class SetMembership implements Membership {
  readonly acceptsAll = false;
  private readonly values: ReadonlySet<string>;

  constructor(values: ReadonlySet<string>) {
    this.values = values;
  }

  accepts(candidate: string | null | undefined): boolean {
    return this.values.has(candidate ?? '');
  }
}

export function acceptAll(): Membership {
  return ACCEPT_ALL;
}

/**
 * An empty or missing set accepts every candidate.
 */
export function createMembership(values?: Iterable<string> | null): Membership {
  if (!values) {
    return ACCEPT_ALL;
  }
  const set = new Set(values);
  if (set.size === 0) {
    return ACCEPT_ALL;
  }
  return new SetMembership(set);
}

export function isMembership(value: unknown): value is Membership {
  return (
    typeof value === 'object' &&
    value !== null &&
    'accepts' in value &&
    typeof value.accepts === 'function' &&
    'acceptsAll' in value &&
    typeof value.acceptsAll === 'boolean'
  );
}

export function toMembership(value?: Membership | Iterable<string> | null): Membership {
  if (isMembership(value)) {
    return value;
  }
  return createMembership(value);
}
