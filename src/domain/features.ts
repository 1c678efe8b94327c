/** Discrete magnitude classes, ordered weakest → strongest. */
export const MAGNITUDE_BUCKETS = ['minor', 'light', 'moderate', 'strong', 'major'] as const;
export type MagnitudeBucket = (typeof MAGNITUDE_BUCKETS)[number];

/** Age classes relative to the cycle's `now`. */
export const RECENCY_BUCKETS = ['last_hour', 'last_day', 'last_week', 'older'] as const;
export type RecencyBucket = (typeof RECENCY_BUCKETS)[number];

export const DEPTH_BUCKETS = ['shallow', 'intermediate', 'deep', 'very_deep', 'unknown'] as const;
export type DepthBucket = (typeof DEPTH_BUCKETS)[number];

/** Per-event derived attributes. */
export interface EventFeatures {
  readonly event_id: string;
  readonly observed_at: number; // epoch ms
  readonly magnitude: number;
  readonly place: string | null;
  readonly magnitude_bucket: MagnitudeBucket;
  readonly recency_bucket: RecencyBucket;
  readonly depth_bucket: DepthBucket;
  readonly hour_utc: number;
  /** Observed within the last cycle interval. */
  readonly is_new: boolean;
  /** `null` when the event is not part of any multi-event cluster. */
  readonly cluster_id: string | null;
}

/** A group of events close in space and time. */
export interface Cluster {
  readonly cluster_id: string;
  readonly event_ids: readonly string[]; // sorted
  readonly size: number;
  readonly max_magnitude: number;
  readonly first_observed_at: number;
  readonly last_observed_at: number;
  readonly centroid: { readonly latitude: number; readonly longitude: number };
}

export interface TimelineBin {
  readonly bin_start: number; // epoch ms
  readonly count: number;
}

/** Window-level aggregates over every event in the view. */
export interface WindowAggregates {
  readonly total_events: number;
  readonly count_by_magnitude_bucket: Readonly<Record<MagnitudeBucket, number>>;
  readonly count_by_recency_bucket: Readonly<Record<RecencyBucket, number>>;
  readonly count_by_depth_bucket: Readonly<Record<DepthBucket, number>>;
  /** Events observed within the last cycle interval. */
  readonly new_event_count: number;
  readonly new_event_rate_per_hour: number;
  readonly missing_location_count: number;
  readonly mean_magnitude: number;
  readonly max_magnitude: number;
  readonly timeline: readonly TimelineBin[];
}

/**
 * Everything the transform stage computes for one cycle.
 *
 * Cycle-scoped: built fresh from the store view and discarded
 * with the snapshot that carries it.
 */
export interface DerivedFeatureSet {
  readonly generated_at: number; // epoch ms, the cycle's `now`
  readonly events: readonly EventFeatures[];
  readonly clusters: readonly Cluster[];
  readonly aggregates: WindowAggregates;
}
