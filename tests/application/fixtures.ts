import { IngestionStore } from '../../src/application/ingestion-store.js';
import { derive } from '../../src/application/transform-engine.js';
import { analyze } from '../../src/application/analysis-engine.js';
import { createDefaultRules } from '../../src/domain/index.js';
import type { RawEvent, Snapshot } from '../../src/domain/index.js';
import { FIXED_NOW } from '../rules/helpers.js';

/** Runs the processing stages by hand to get a realistic snapshot. */
export function buildSnapshot(events: RawEvent[], sequence = 1, now = FIXED_NOW): Snapshot {
  const store = new IngestionStore();
  store.upsert(events, now);
  const view = store.snapshotView();
  const derived = derive(view, {
    magnitudeThresholds: [4, 5, 6, 7],
    clusterRadiusKm: 50,
    clusterWindowSeconds: 86_400,
    cycleIntervalSeconds: 60,
    timelineBinSeconds: 900,
  }, now);

  return {
    events: view,
    derived_features: derived,
    recommendations: analyze(derived, createDefaultRules({
      magnitudeThresholds: [4, 5, 6, 7],
      minClusterEventsAboveModerate: 1,
      rateSpikePerHour: 120,
      rateSpikeMinEvents: 5,
    })),
    cycle_timestamp: now,
    cycle_sequence_number: sequence,
  };
}
