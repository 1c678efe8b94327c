import type { EventFeatures, EventRecord, MagnitudeBucket, Snapshot } from '../domain/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

/** A stored record joined with the features derived for it this cycle. */
export type EventView = EventRecord & Pick<
  EventFeatures,
  'magnitude_bucket' | 'recency_bucket' | 'depth_bucket' | 'hour_utc' | 'is_new' | 'cluster_id'
>;

export interface ListEventsParams {
  limit?: number;
  offset?: number;
  magnitude_bucket?: MagnitudeBucket;
  cluster_id?: string;
}

/**
 * Joins a snapshot's records with their derived features, keeping the
 * snapshot's order (newest first).
 */
export function joinEventFeatures(snapshot: Snapshot): EventView[] {
  const featuresById = new Map<string, EventFeatures>();
  for (const f of snapshot.derived_features.events) featuresById.set(f.event_id, f);

  const views: EventView[] = [];
  for (const record of snapshot.events) {
    const f = featuresById.get(record.event_id);
    if (f === undefined) continue;
    views.push({
      ...record,
      magnitude_bucket: f.magnitude_bucket,
      recency_bucket: f.recency_bucket,
      depth_bucket: f.depth_bucket,
      hour_utc: f.hour_utc,
      is_new: f.is_new,
      cluster_id: f.cluster_id,
    });
  }
  return views;
}

/**
 * Use case: list events of a snapshot with pagination and filters.
 * Clamps limit to [1, 500], defaults to 50.
 */
export function listEvents(snapshot: Snapshot, params: ListEventsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const matching = joinEventFeatures(snapshot).filter((e) =>
    (params.magnitude_bucket === undefined || e.magnitude_bucket === params.magnitude_bucket)
    && (params.cluster_id === undefined || e.cluster_id === params.cluster_id));

  const data = matching.slice(offset, offset + limit);

  return {
    cycle_sequence_number: snapshot.cycle_sequence_number,
    data,
    pagination: { limit, offset, count: data.length, total: matching.length },
  };
}

/**
 * Use case: fetch a single event by ID.
 * Returns null if not found.
 */
export function getEvent(snapshot: Snapshot, eventId: string): EventView | null {
  return joinEventFeatures(snapshot).find((e) => e.event_id === eventId) ?? null;
}
