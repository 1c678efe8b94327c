import type { EventRecord, RawEvent } from '../domain/index.js';

/** Per-call outcome counts of `upsert()`. Stale replays count as unchanged. */
export interface UpsertResult {
  readonly added: number;
  readonly revised: number;
  readonly unchanged: number;
}

function freezeRecord(event: RawEvent, lastSeenAt: number): EventRecord {
  return Object.freeze({
    event_id: event.event_id,
    observed_at: event.observed_at,
    source_updated_at: event.source_updated_at,
    magnitude: event.magnitude,
    location: Object.freeze({
      latitude: event.location.latitude,
      longitude: event.location.longitude,
      depth_km: event.location.depth_km,
    }),
    place: event.place,
    url: event.url,
    status: event.status,
    tsunami: event.tsunami,
    last_seen_at: lastSeenAt,
  });
}

/** True when a replay carries exactly the stored mutable fields. */
function sameContent(event: RawEvent, record: EventRecord): boolean {
  return event.magnitude === record.magnitude
    && event.location.latitude === record.location.latitude
    && event.location.longitude === record.location.longitude
    && event.location.depth_km === record.location.depth_km
    && event.place === record.place
    && event.url === record.url
    && event.status === record.status
    && event.tsunami === record.tsunami;
}

/** Newest first; ties broken by id so views are deterministic. */
function byObservedAtDesc(a: EventRecord, b: EventRecord): number {
  if (a.observed_at !== b.observed_at) return b.observed_at - a.observed_at;
  if (a.event_id < b.event_id) return -1;
  if (a.event_id > b.event_id) return 1;
  return 0;
}

/**
 * Deduplicated, time-windowed set of known events.
 *
 * Keyed by `event_id`. Records are frozen and replaced wholesale on
 * revision, so a view handed downstream never changes under its reader.
 *
 * Single writer: only the orchestrator calls the mutating methods, one
 * cycle at a time.
 */
export class IngestionStore {
  private readonly records: Map<string, EventRecord> = new Map();

  /**
   * Applies a batch of feed events.
   *
   * - unknown id → inserted (added)
   * - same `source_updated_at`, same content → unchanged, `last_seen_at` refreshed
   * - newer `source_updated_at` → mutable fields replaced (revised);
   *   `event_id` and `observed_at` keep their stored values
   * - older `source_updated_at`, or same but conflicting content → stale,
   *   ignored (unchanged)
   */
  upsert(events: readonly RawEvent[], now: number): UpsertResult {
    let added = 0;
    let revised = 0;
    let unchanged = 0;

    for (const event of events) {
      const existing = this.records.get(event.event_id);

      if (existing === undefined) {
        this.records.set(event.event_id, freezeRecord(event, now));
        added++;
        continue;
      }

      if (event.source_updated_at > existing.source_updated_at) {
        this.records.set(
          existing.event_id,
          freezeRecord({ ...event, event_id: existing.event_id, observed_at: existing.observed_at }, now),
        );
        revised++;
        continue;
      }

      if (event.source_updated_at === existing.source_updated_at && sameContent(event, existing)) {
        this.records.set(existing.event_id, freezeRecord(existing, now));
      }

      unchanged++;
    }

    return { added, revised, unchanged };
  }

  /** Removes every record observed before `olderThan` (epoch ms). */
  evict(olderThan: number): number {
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.observed_at < olderThan) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Read-only copy of the current contents, newest first.
   *
   * The array is new on every call; later upserts do not show through it.
   */
  snapshotView(): readonly EventRecord[] {
    return Object.freeze([...this.records.values()].sort(byObservedAtDesc));
  }

  get(eventId: string): EventRecord | undefined {
    return this.records.get(eventId);
  }

  /** Drops everything. Returns the number of records removed. */
  clear(): number {
    const removed = this.records.size;
    this.records.clear();
    return removed;
  }

  get size(): number {
    return this.records.size;
  }
}
