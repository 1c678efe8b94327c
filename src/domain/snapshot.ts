import type { EventRecord } from './event.js';
import type { DerivedFeatureSet } from './features.js';
import type { Recommendation } from './rules/types.js';

/**
 * The unit of publication.
 *
 * Built once per successful cycle, deep-frozen, and swapped in by
 * reference. Readers holding an older snapshot keep a valid view.
 */
export interface Snapshot {
  readonly events: readonly EventRecord[];
  readonly derived_features: DerivedFeatureSet;
  readonly recommendations: readonly Recommendation[];
  readonly cycle_timestamp: number; // epoch ms
  readonly cycle_sequence_number: number;
}
