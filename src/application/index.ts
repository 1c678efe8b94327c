export { featureSchema, featureCollectionSchema, parseFeedPayload } from './feed-schema.js';
export type { FeedFeature, FetchResult } from './feed-schema.js';
export type { FeedSource } from './feed-source.js';
export { IngestionStore } from './ingestion-store.js';
export type { UpsertResult } from './ingestion-store.js';
export { clusterEvents, haversineKm, UnionFind } from './clustering.js';
export type { ClusterOptions, ClusterableEvent } from './clustering.js';
export { derive, magnitudeBucket, recencyBucket, depthBucket } from './transform-engine.js';
export type { TransformOptions } from './transform-engine.js';
export { analyze, evaluateRules, compareRecommendations } from './analysis-engine.js';
export { SnapshotStore, deepFreeze } from './snapshot-store.js';
export { PipelineOrchestrator } from './pipeline-orchestrator.js';
export type {
  PipelineState,
  PipelineStats,
  PipelineLog,
  CycleReport,
  CycleOutcome,
  CycleError,
  OrchestratorOptions,
  PublishListener,
} from './pipeline-orchestrator.js';
export { pipelineConfigSchema, magnitudeThresholdsSchema } from './config-schema.js';
export type { PipelineConfig, PipelineConfigInput } from './config-schema.js';
export { listEvents, getEvent, joinEventFeatures } from './query-events.js';
export type { ListEventsParams, EventView } from './query-events.js';
export { snapshotToCsv, escapeCsvField } from './export-csv.js';
export { getHealth } from './health.js';
export type { HealthReport, HealthStatus } from './health.js';
