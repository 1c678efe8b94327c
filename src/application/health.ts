import type { Snapshot } from '../domain/index.js';
import type { PipelineState, PipelineStats } from './pipeline-orchestrator.js';

/** A snapshot older than this many poll intervals marks the pipeline degraded. */
const STALE_INTERVALS = 3;

export type HealthStatus = 'ok' | 'degraded' | 'starting';

export interface HealthReport {
  status: HealthStatus;
  state: PipelineState;
  cycle_sequence_number: number | null;
  snapshot_age_seconds: number | null;
  consecutive_fetch_failures: number;
  last_error: PipelineStats['last_error'];
}

/**
 * Use case: summarise pipeline liveness for the health endpoint.
 *
 * - `starting`: no snapshot yet and no failure so far
 * - `degraded`: no snapshot after a failure, the last cycle failed,
 *   or the snapshot is older than STALE_INTERVALS poll intervals
 * - `ok`: otherwise
 */
export function getHealth(
  stats: PipelineStats,
  snapshot: Snapshot | null,
  now: number,
  pollIntervalMs: number,
): HealthReport {
  const ageMs = snapshot === null ? null : Math.max(0, now - snapshot.cycle_timestamp);

  let status: HealthStatus;
  if (snapshot === null) {
    status = stats.last_error === null ? 'starting' : 'degraded';
  } else if (stats.last_cycle !== null && stats.last_cycle.outcome !== 'published') {
    status = 'degraded';
  } else if (ageMs !== null && ageMs > STALE_INTERVALS * pollIntervalMs) {
    status = 'degraded';
  } else {
    status = 'ok';
  }

  return {
    status,
    state: stats.state,
    cycle_sequence_number: snapshot?.cycle_sequence_number ?? null,
    snapshot_age_seconds: ageMs === null ? null : Math.round(ageMs / 1000),
    consecutive_fetch_failures: stats.consecutive_fetch_failures,
    last_error: stats.last_error,
  };
}
