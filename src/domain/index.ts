export type { RawEvent, EventRecord, GeoLocation } from './event.js';
export type {
  MagnitudeBucket,
  RecencyBucket,
  DepthBucket,
  EventFeatures,
  Cluster,
  TimelineBin,
  WindowAggregates,
  DerivedFeatureSet,
} from './features.js';
export { MAGNITUDE_BUCKETS, RECENCY_BUCKETS, DEPTH_BUCKETS } from './features.js';
export type { Snapshot } from './snapshot.js';
export { FetchError, ProcessingError, ConfigError } from './errors.js';
export type { FetchErrorKind, FetchErrorReason } from './errors.js';
export type {
  Rule,
  RuleResult,
  Recommendation,
  RationaleCondition,
  ComparisonOperator,
  Severity,
} from './rules/index.js';
export { SEVERITY_RANK, createDefaultRules } from './rules/index.js';
export type { RuleThresholds } from './rules/index.js';
