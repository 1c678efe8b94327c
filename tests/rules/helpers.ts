import { vi } from 'vitest';
import type {
  Cluster,
  DerivedFeatureSet,
  EventFeatures,
  RawEvent,
  WindowAggregates,
} from '../../src/domain/index.js';

let counter = 0;

/** Fixed "now" for deterministic recency and age checks. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

/**
 * Factory for feed events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeRawEvent(overrides: Partial<RawEvent> = {}): RawEvent {
  counter++;
  const observedAt = overrides.observed_at ?? FIXED_NOW - 10 * MINUTE_MS;
  return {
    event_id: overrides.event_id ?? `ev-${counter}`,
    observed_at: observedAt,
    source_updated_at: overrides.source_updated_at ?? observedAt,
    magnitude: overrides.magnitude ?? 2.5,
    location: overrides.location ?? { latitude: 35.0, longitude: 139.0, depth_km: 10 },
    place: overrides.place !== undefined ? overrides.place : 'Test Region',
    url: overrides.url ?? null,
    status: overrides.status ?? 'automatic',
    tsunami: overrides.tsunami ?? false,
  };
}

/** Factory for per-event features, unclustered and recent by default. */
export function makeFeatures(overrides: Partial<EventFeatures> = {}): EventFeatures {
  counter++;
  return {
    event_id: overrides.event_id ?? `ev-${counter}`,
    observed_at: overrides.observed_at ?? FIXED_NOW - 10 * MINUTE_MS,
    magnitude: overrides.magnitude ?? 2.5,
    place: overrides.place !== undefined ? overrides.place : 'Test Region',
    magnitude_bucket: overrides.magnitude_bucket ?? 'minor',
    recency_bucket: overrides.recency_bucket ?? 'last_hour',
    depth_bucket: overrides.depth_bucket ?? 'shallow',
    hour_utc: overrides.hour_utc ?? 11,
    is_new: overrides.is_new ?? false,
    cluster_id: overrides.cluster_id ?? null,
  };
}

export function makeCluster(overrides: Partial<Cluster> & { cluster_id: string }): Cluster {
  return {
    event_ids: [],
    size: 2,
    max_magnitude: 0,
    first_observed_at: FIXED_NOW - HOUR_MS,
    last_observed_at: FIXED_NOW - 10 * MINUTE_MS,
    centroid: { latitude: 35, longitude: 139 },
    ...overrides,
  };
}

function emptyAggregates(): WindowAggregates {
  return {
    total_events: 0,
    count_by_magnitude_bucket: { minor: 0, light: 0, moderate: 0, strong: 0, major: 0 },
    count_by_recency_bucket: { last_hour: 0, last_day: 0, last_week: 0, older: 0 },
    count_by_depth_bucket: { shallow: 0, intermediate: 0, deep: 0, very_deep: 0, unknown: 0 },
    new_event_count: 0,
    new_event_rate_per_hour: 0,
    missing_location_count: 0,
    mean_magnitude: 0,
    max_magnitude: 0,
    timeline: [],
  };
}

/** Hand-built feature set for rule tests; aggregates default to zero. */
export function makeDerived(
  parts: {
    events?: EventFeatures[];
    clusters?: Cluster[];
    aggregates?: Partial<WindowAggregates>;
    generated_at?: number;
  } = {},
): DerivedFeatureSet {
  return {
    generated_at: parts.generated_at ?? FIXED_NOW,
    events: parts.events ?? [],
    clusters: parts.clusters ?? [],
    aggregates: { ...emptyAggregates(), ...parts.aggregates },
  };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Logger stand-in for code typed against the minimal pipeline logger. */
export function fakePipelineLog() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
