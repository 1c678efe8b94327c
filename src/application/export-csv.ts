import type { Snapshot } from '../domain/index.js';
import { joinEventFeatures } from './query-events.js';
import type { EventView } from './query-events.js';

const COLUMNS = [
  'event_id',
  'observed_at',
  'place',
  'magnitude',
  'magnitude_bucket',
  'latitude',
  'longitude',
  'depth_km',
  'depth_bucket',
  'cluster_id',
  'status',
  'tsunami',
  'url',
] as const;

type Cell = string | number | boolean | null;

/** RFC 4180 quoting: fields with a comma, quote or line break are wrapped. */
export function escapeCsvField(value: Cell): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function row(e: EventView): Cell[] {
  return [
    e.event_id,
    new Date(e.observed_at).toISOString(),
    e.place,
    e.magnitude,
    e.magnitude_bucket,
    e.location.latitude,
    e.location.longitude,
    e.location.depth_km,
    e.depth_bucket,
    e.cluster_id,
    e.status,
    e.tsunami,
    e.url,
  ];
}

/**
 * Renders a snapshot's events as CSV, header first, newest event first.
 * Lines end in CRLF.
 */
export function snapshotToCsv(snapshot: Snapshot): string {
  const lines = [COLUMNS.join(',')];
  for (const e of joinEventFeatures(snapshot)) {
    lines.push(row(e).map(escapeCsvField).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
