import type { ClusterEvent, EventFilter } from '../types.js';
import { toMembership, type Membership } from '../utils/membership.js';

type FieldSelector = (event: ClusterEvent) => string | undefined;

export type AcceptedValues = Membership | Iterable<string> | null | undefined;

/**
 * Keeps events whose selected field is accepted by the membership predicate.
 * An empty acceptance set keeps everything.
 */
abstract class FieldFilter implements EventFilter {
  abstract readonly name: string;
  readonly accepted: Membership;

  protected constructor(
    accepted: AcceptedValues,
    private readonly select: FieldSelector
  ) {
    this.accepted = toMembership(accepted);
  }

  filterEvents(events: readonly ClusterEvent[]): ClusterEvent[] {
    const kept: ClusterEvent[] = [];
    for (const event of events) {
      if (this.accepted.accepts(this.select(event))) {
        kept.push(event);
      }
    }
    return kept;
  }
}

export class WarningFilter implements EventFilter {
  readonly name = 'warnings';

  filterEvents(events: readonly ClusterEvent[]): ClusterEvent[] {
    return events.filter(event => event.type === 'Warning');
  }
}

export class NamespaceFilter extends FieldFilter {
  readonly name = 'namespaces';

  constructor(namespaces: AcceptedValues) {
    super(namespaces, event => event.involvedObject.namespace);
  }
}

export class NameFilter extends FieldFilter {
  readonly name = 'names';

  constructor(names: AcceptedValues) {
    super(names, event => event.involvedObject.name);
  }
}

export class ReasonFilter extends FieldFilter {
  readonly name = 'reasons';

  constructor(reasons: AcceptedValues) {
    super(reasons, event => event.reason);
  }
}

export class UidFilter extends FieldFilter {
  readonly name = 'uids';

  constructor(uids: AcceptedValues) {
    super(uids, event => event.involvedObject.uid);
  }
}

export class ComponentFilter extends FieldFilter {
  readonly name = 'components';

  constructor(components: AcceptedValues) {
    super(components, event => event.reportingComponent);
  }
}
