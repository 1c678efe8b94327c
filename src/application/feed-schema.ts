import { z } from 'zod';
import type { GeoLocation, RawEvent } from '../domain/index.js';
import { FetchError } from '../domain/index.js';

/**
 * Zod schema for one GeoJSON feature of the seismic feed.
 *
 * - `properties.time` / `properties.updated` are epoch milliseconds.
 * - `updated` may be absent; the event time stands in for it.
 * - `geometry.coordinates` is validated per component (see toLocation),
 *   so a bad depth does not discard an otherwise usable event.
 */
export const featureSchema = z.object({
  id: z.string().min(1),
  properties: z.object({
    time: z.number().int().nonnegative(),
    updated: z.number().int().nonnegative().nullish(),
    mag: z.number().finite().min(-2).max(10),
    place: z.string().nullish(),
    url: z.string().nullish(),
    status: z.string().nullish(),
    tsunami: z.union([z.number(), z.boolean()]).nullish(),
  }),
  geometry: z.object({
    coordinates: z.array(z.unknown()),
  }).nullish(),
});

export type FeedFeature = z.infer<typeof featureSchema>;

/** Top-level envelope. Anything without a `features` array is unusable. */
export const featureCollectionSchema = z.object({
  features: z.array(z.unknown()),
});

const longitudeSchema = z.number().finite().min(-180).max(180);
const latitudeSchema = z.number().finite().min(-90).max(90);
const depthSchema = z.number().finite().min(-10).max(1000);

/**
 * Outcome of one fetch: the parsed events plus how many features were
 * dropped, or a classified failure.
 */
export type FetchResult =
  | { readonly ok: true; readonly events: readonly RawEvent[]; readonly skipped: number }
  | { readonly ok: false; readonly error: FetchError };

function component(schema: z.ZodNumber, value: unknown): number | null {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function toLocation(geometry: FeedFeature['geometry']): GeoLocation {
  const coords = geometry?.coordinates ?? [];
  return {
    longitude: component(longitudeSchema, coords[0]),
    latitude: component(latitudeSchema, coords[1]),
    depth_km: component(depthSchema, coords[2]),
  };
}

function toRawEvent(feature: FeedFeature): RawEvent {
  const p = feature.properties;
  const tsunami = typeof p.tsunami === 'boolean' ? p.tsunami : (p.tsunami ?? 0) !== 0;

  return {
    event_id: feature.id,
    observed_at: p.time,
    source_updated_at: p.updated ?? p.time,
    magnitude: p.mag,
    location: toLocation(feature.geometry),
    place: p.place ?? null,
    url: p.url ?? null,
    status: p.status ?? null,
    tsunami,
  };
}

/**
 * Maps a decoded feed body to RawEvents.
 *
 * Malformed features are skipped and counted. Only a body that is not
 * a feature collection at all yields a permanent FetchError.
 */
export function parseFeedPayload(body: unknown): FetchResult {
  const envelope = featureCollectionSchema.safeParse(body);

  if (!envelope.success) {
    return {
      ok: false,
      error: new FetchError(
        'permanent',
        'unparsable_payload',
        'Feed payload is not a feature collection',
        { cause: envelope.error },
      ),
    };
  }

  const events: RawEvent[] = [];
  let skipped = 0;

  for (const candidate of envelope.data.features) {
    const parsed = featureSchema.safeParse(candidate);
    if (parsed.success) {
      events.push(toRawEvent(parsed.data));
    } else {
      skipped++;
    }
  }

  return { ok: true, events, skipped };
}
