import type { DerivedFeatureSet } from '../features.js';
import type { Rule, RuleResult } from './types.js';
import {
  DAY_SECONDS,
  ageSeconds,
  byEventId,
  compare,
  condition,
  latestObservedAt,
  plural,
} from './conditions.js';

const RULE_ID = 'isolated-strong-event';

/**
 * Isolated strong event rule.
 *
 * Triggers for strong events within the last day that belong to no
 * cluster. Clustered events are reported by the cluster rule instead.
 */
export function createIsolatedStrongEventRule(strongThreshold: number = 6): Rule {
  return {
    id: RULE_ID,
    name: 'Isolated Strong Event',
    description: `Triggers when an unclustered event of magnitude >=${strongThreshold} was observed in the last 24h`,
    severity: 'high',

    evaluate(derived: DerivedFeatureSet): RuleResult {
      const now = derived.generated_at;
      const hits = derived.events
        .filter((e) =>
          e.cluster_id === null
          && compare(ageSeconds(e, now), '<', DAY_SECONDS)
          && compare(e.magnitude, '>=', strongThreshold))
        .sort(byEventId);

      if (hits.length === 0) {
        return { triggered: false, rule_id: RULE_ID };
      }

      const places = hits
        .map((e) => e.place)
        .filter((p): p is string => p !== null);
      const where = places.length > 0 ? ` near ${places.join(', ')}` : '';

      return {
        triggered: true,
        rule_id: RULE_ID,
        recommendation: {
          rule_id: RULE_ID,
          action: 'alert-regional-operations',
          subject_ids: hits.map((e) => e.event_id),
          severity: 'high',
          rationale: hits.flatMap((e) => [
            condition('magnitude', e.event_id, '>=', strongThreshold, e.magnitude),
            condition('age_seconds', e.event_id, '<', DAY_SECONDS, ageSeconds(e, now)),
          ]),
          summary: `Strong event: ${plural(hits.length, 'isolated event')} at or above magnitude ${strongThreshold}${where}`,
          latest_observed_at: latestObservedAt(hits),
          generated_at: now,
        },
      };
    },
  };
}
