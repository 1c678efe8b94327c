import type { Cluster, GeoLocation } from '../domain/index.js';

const EARTH_RADIUS_KM = 6371.0088;

export interface LatLon {
  readonly latitude: number;
  readonly longitude: number;
}

/** Great-circle distance in kilometres. */
export function haversineKm(a: LatLon, b: LatLon): number {
  const toRad = (deg: number): number => (deg * Math.PI) / 180;
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const h = Math.sin(dLat / 2) ** 2
    + Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Disjoint-set forest with path compression and union by rank.
 */
export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  find(i: number): number {
    let root = i;
    while (this.parentOf(root) !== root) root = this.parentOf(root);

    // Path compression
    let node = i;
    while (node !== root) {
      const next = this.parentOf(node);
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;

    const rankA = this.rank[ra] ?? 0;
    const rankB = this.rank[rb] ?? 0;
    if (rankA < rankB) {
      this.parent[ra] = rb;
    } else if (rankA > rankB) {
      this.parent[rb] = ra;
    } else {
      this.parent[rb] = ra;
      this.rank[ra] = rankA + 1;
    }
  }

  private parentOf(i: number): number {
    const p = this.parent[i];
    if (p === undefined) throw new RangeError(`UnionFind index out of range: ${i}`);
    return p;
  }
}

/** Minimal event shape needed for clustering. */
export interface ClusterableEvent {
  readonly event_id: string;
  readonly observed_at: number;
  readonly magnitude: number;
  readonly location: GeoLocation;
}

export interface ClusterOptions {
  readonly radiusKm: number;
  readonly windowSeconds: number;
}

interface Located {
  readonly event: ClusterableEvent;
  readonly position: LatLon;
}

function locate(event: ClusterableEvent): Located | null {
  const { latitude, longitude } = event.location;
  if (latitude === null || longitude === null) return null;
  return { event, position: { latitude, longitude } };
}

/**
 * Groups events that lie within `radiusKm` and `windowSeconds` of each
 * other, transitively.
 *
 * Pairwise comparison over a time-sorted list; the inner scan stops at
 * the first event outside the time window. Events with an unknown
 * position never join a cluster. Only components of two or more events
 * are returned, ordered by `cluster_id`.
 */
export function clusterEvents(
  events: readonly ClusterableEvent[],
  options: ClusterOptions,
): Cluster[] {
  const located = events
    .map(locate)
    .filter((l): l is Located => l !== null)
    .sort((a, b) =>
      a.event.observed_at - b.event.observed_at
      || (a.event.event_id < b.event.event_id ? -1 : a.event.event_id > b.event.event_id ? 1 : 0));

  const windowMs = options.windowSeconds * 1000;
  const uf = new UnionFind(located.length);

  located.forEach((a, i) => {
    for (let j = i + 1; j < located.length; j++) {
      const b = located[j];
      if (b === undefined || b.event.observed_at - a.event.observed_at > windowMs) break;
      if (haversineKm(a.position, b.position) <= options.radiusKm) {
        uf.union(i, j);
      }
    }
  });

  const components = new Map<number, Located[]>();
  located.forEach((l, i) => {
    const root = uf.find(i);
    const members = components.get(root) ?? [];
    members.push(l);
    components.set(root, members);
  });

  const clusters: Cluster[] = [];
  for (const members of components.values()) {
    if (members.length < 2) continue;

    const eventIds = members.map((m) => m.event.event_id).sort();
    const observed = members.map((m) => m.event.observed_at);
    const latSum = members.reduce((acc, m) => acc + m.position.latitude, 0);
    const lonSum = members.reduce((acc, m) => acc + m.position.longitude, 0);

    clusters.push({
      cluster_id: `cluster:${eventIds[0] ?? ''}`,
      event_ids: eventIds,
      size: members.length,
      max_magnitude: Math.max(...members.map((m) => m.event.magnitude)),
      first_observed_at: Math.min(...observed),
      last_observed_at: Math.max(...observed),
      centroid: {
        latitude: latSum / members.length,
        longitude: lonSum / members.length,
      },
    });
  }

  return clusters.sort((a, b) => (a.cluster_id < b.cluster_id ? -1 : a.cluster_id > b.cluster_id ? 1 : 0));
}
