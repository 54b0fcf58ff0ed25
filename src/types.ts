export type EventSeverity = 'Normal' | 'Warning';

export interface ObjectReference {
  namespace?: string;
  name?: string;
  uid?: string;
  kind?: string;
  apiVersion?: string;
}

/**
 * Event as served by the cluster API. Timestamps keep the offset they were
 * serialized with; a `Date` is read as UTC.
 */
export interface ClusterEvent {
  type: EventSeverity;
  involvedObject: ObjectReference;
  reason?: string;
  message?: string;
  reportingComponent?: string;
  lastTimestamp: string | Date;
}

export interface GroupKind {
  group: string;
  kind: string;
}

export interface GroupVersion {
  group: string;
  version: string;
}

export type RulePattern = { match: 'any' } | { match: 'exact'; value: string };

export interface KindRule {
  group: RulePattern;
  kind: RulePattern;
  negate: boolean;
}

export type KindMatchingMode = 'strict' | 'legacy';

/**
 * `null` is the absent marker: the filter could not run, which is distinct
 * from a run that kept nothing.
 */
export type FilterResult = ClusterEvent[] | null;

export interface EventFilter {
  readonly name: string;
  filterEvents(events: readonly ClusterEvent[]): FilterResult;
}

export type DiagnosticSink = {
  write(chunk: string): unknown;
};
