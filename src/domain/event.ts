/**
 * Core domain types for the seismic event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the pipeline. They carry no framework dependencies.
 */

/**
 * Geographic position of an event.
 *
 * Any component may be `null` when the feed omits it or sends an
 * out-of-range value. Unknown is never coerced to zero.
 */
export interface GeoLocation {
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly depth_km: number | null;
}

/**
 * A single feed record after boundary validation.
 *
 * `source_updated_at` is the feed's last-modified time and decides
 * whether a re-observed event is a revision.
 */
export interface RawEvent {
  readonly event_id: string;
  readonly observed_at: number; // epoch ms
  readonly source_updated_at: number; // epoch ms
  readonly magnitude: number;
  readonly location: GeoLocation;
  readonly place: string | null;
  readonly url: string | null;
  readonly status: string | null;
  readonly tsunami: boolean;
}

/**
 * An event as held by the ingestion store.
 *
 * Records are frozen; a revision or re-observation replaces the
 * whole object rather than mutating it.
 */
export interface EventRecord extends RawEvent {
  readonly last_seen_at: number; // epoch ms, local clock
}
