export type {
  ClusterEvent,
  DiagnosticSink,
  EventFilter,
  EventSeverity,
  FilterResult,
  GroupKind,
  GroupVersion,
  KindMatchingMode,
  KindRule,
  ObjectReference,
  RulePattern
} from './types.js';
export { acceptAll, createMembership, toMembership, type Membership } from './utils/membership.js';
export { parseDuration, formatDuration } from './utils/duration.js';
export {
  GroupKindSet,
  formatGroupKind,
  groupKindEquals,
  parseGroupKind,
  parseGroupVersion,
  resolveGroupKind
} from './kinds/groupKind.js';
export {
  KindRuleSet,
  KindRuleSyntaxError,
  decodeGroupKind,
  encodeKindRule,
  formatKindRule,
  parseKindRule
} from './kinds/rules.js';
export {
  ComponentFilter,
  NameFilter,
  NamespaceFilter,
  ReasonFilter,
  UidFilter,
  WarningFilter,
  type AcceptedValues
} from './filters/fields.js';
export {
  AroundTimeFilter,
  AroundTimeFormatError,
  parseAroundTime,
  type AroundTimeFilterOptions
} from './filters/timeWindow.js';
export {
  DEFAULT_KIND_MATCHING,
  KindFilter,
  legacyMatchCount,
  matchesStrict,
  type KindFilterOptions
} from './filters/kind.js';
export { FilterChain } from './filters/chain.js';
export {
  DEFAULT_AROUND_DURATION,
  FilterOptionsError,
  buildEventFilters,
  type EventFilterDependencies,
  type EventFilterOptions
} from './filters/builder.js';
export {
  ConfigManager,
  getDefaultConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type EventFiltersConfig,
  type FilterProfile
} from './config/index.js';
export { default as logger, getLogLevel, setLogLevel, onLogLevelChange } from './logger.js';
export { default as metrics, MetricsRegistry, type MetricsSnapshot } from './metrics/index.js';
