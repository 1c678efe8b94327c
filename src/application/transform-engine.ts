import type {
  DepthBucket,
  DerivedFeatureSet,
  EventFeatures,
  EventRecord,
  MagnitudeBucket,
  RecencyBucket,
  TimelineBin,
} from '../domain/index.js';
import { clusterEvents } from './clustering.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

/** Upper depth bounds (km, inclusive) for shallow, intermediate and deep. */
const DEPTH_BREAKPOINTS = [10, 50, 200] as const;

export interface TransformOptions {
  /** Lower bounds of light, moderate, strong and major. */
  readonly magnitudeThresholds: readonly [number, number, number, number];
  readonly clusterRadiusKm: number;
  readonly clusterWindowSeconds: number;
  /** Length of one cycle; defines which events count as new. */
  readonly cycleIntervalSeconds: number;
  readonly timelineBinSeconds: number;
}

export function magnitudeBucket(
  magnitude: number,
  thresholds: TransformOptions['magnitudeThresholds'],
): MagnitudeBucket {
  const [light, moderate, strong, major] = thresholds;
  if (magnitude >= major) return 'major';
  if (magnitude >= strong) return 'strong';
  if (magnitude >= moderate) return 'moderate';
  if (magnitude >= light) return 'light';
  return 'minor';
}

/** Future-dated events are treated as age 0. */
export function recencyBucket(observedAt: number, now: number): RecencyBucket {
  const age = Math.max(0, now - observedAt);
  if (age < HOUR_MS) return 'last_hour';
  if (age < DAY_MS) return 'last_day';
  if (age < WEEK_MS) return 'last_week';
  return 'older';
}

export function depthBucket(depthKm: number | null): DepthBucket {
  if (depthKm === null) return 'unknown';
  const [shallow, intermediate, deep] = DEPTH_BREAKPOINTS;
  if (depthKm <= shallow) return 'shallow';
  if (depthKm <= intermediate) return 'intermediate';
  if (depthKm <= deep) return 'deep';
  return 'very_deep';
}

function round(n: number, dp: number): number {
  const m = Math.pow(10, dp);
  return Math.round(n * m) / m;
}

function buildTimeline(events: readonly EventRecord[], binSeconds: number): TimelineBin[] {
  const binMs = binSeconds * 1000;
  const bins = new Map<number, number>();
  for (const e of events) {
    const start = Math.floor(e.observed_at / binMs) * binMs;
    bins.set(start, (bins.get(start) ?? 0) + 1);
  }
  return [...bins.entries()]
    .sort(([a], [b]) => a - b)
    .map(([bin_start, count]) => ({ bin_start, count }));
}

/**
 * Derives per-event and window-level features from a store view.
 *
 * Pure: the result depends only on the arguments. Events keep the
 * order of the input view. An empty view yields zeroed aggregates.
 */
export function derive(
  events: readonly EventRecord[],
  options: TransformOptions,
  now: number,
): DerivedFeatureSet {
  const clusters = clusterEvents(events, {
    radiusKm: options.clusterRadiusKm,
    windowSeconds: options.clusterWindowSeconds,
  });

  const clusterOf = new Map<string, string>();
  for (const cluster of clusters) {
    for (const id of cluster.event_ids) clusterOf.set(id, cluster.cluster_id);
  }

  const newSince = now - options.cycleIntervalSeconds * 1000;
  const byMagnitude: Record<MagnitudeBucket, number> = { minor: 0, light: 0, moderate: 0, strong: 0, major: 0 };
  const byRecency: Record<RecencyBucket, number> = { last_hour: 0, last_day: 0, last_week: 0, older: 0 };
  const byDepth: Record<DepthBucket, number> = { shallow: 0, intermediate: 0, deep: 0, very_deep: 0, unknown: 0 };
  let newCount = 0;
  let missingLocation = 0;
  let magnitudeSum = 0;
  let maxMagnitude = 0;

  const features: EventFeatures[] = events.map((e, i) => {
    const feature: EventFeatures = {
      event_id: e.event_id,
      observed_at: e.observed_at,
      magnitude: e.magnitude,
      place: e.place,
      magnitude_bucket: magnitudeBucket(e.magnitude, options.magnitudeThresholds),
      recency_bucket: recencyBucket(e.observed_at, now),
      depth_bucket: depthBucket(e.location.depth_km),
      hour_utc: new Date(e.observed_at).getUTCHours(),
      is_new: e.observed_at > newSince && e.observed_at <= now,
      cluster_id: clusterOf.get(e.event_id) ?? null,
    };

    byMagnitude[feature.magnitude_bucket]++;
    byRecency[feature.recency_bucket]++;
    byDepth[feature.depth_bucket]++;
    if (feature.is_new) newCount++;
    if (e.location.latitude === null || e.location.longitude === null) missingLocation++;
    magnitudeSum += e.magnitude;
    maxMagnitude = i === 0 ? e.magnitude : Math.max(maxMagnitude, e.magnitude);

    return feature;
  });

  return {
    generated_at: now,
    events: features,
    clusters,
    aggregates: {
      total_events: events.length,
      count_by_magnitude_bucket: byMagnitude,
      count_by_recency_bucket: byRecency,
      count_by_depth_bucket: byDepth,
      new_event_count: newCount,
      new_event_rate_per_hour: round((newCount * 3600) / options.cycleIntervalSeconds, 4),
      missing_location_count: missingLocation,
      mean_magnitude: events.length > 0 ? round(magnitudeSum / events.length, 4) : 0,
      max_magnitude: maxMagnitude,
      timeline: buildTimeline(events, options.timelineBinSeconds),
    },
  };
}
