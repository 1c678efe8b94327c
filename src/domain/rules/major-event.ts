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

const RULE_ID = 'major-event';

/**
 * Major event rule.
 *
 * Triggers when any event observed within the last day reaches the
 * major magnitude breakpoint, clustered or not.
 */
export function createMajorEventRule(majorThreshold: number = 7): Rule {
  return {
    id: RULE_ID,
    name: 'Major Event',
    description: `Triggers when an event of magnitude >=${majorThreshold} was observed in the last 24h`,
    severity: 'critical',

    evaluate(derived: DerivedFeatureSet): RuleResult {
      const now = derived.generated_at;
      const hits = derived.events
        .filter((e) =>
          compare(ageSeconds(e, now), '<', DAY_SECONDS)
          && compare(e.magnitude, '>=', majorThreshold))
        .sort(byEventId);

      if (hits.length === 0) {
        return { triggered: false, rule_id: RULE_ID };
      }

      const strongest = Math.max(...hits.map((e) => e.magnitude));

      return {
        triggered: true,
        rule_id: RULE_ID,
        recommendation: {
          rule_id: RULE_ID,
          action: 'alert-regional-operations',
          subject_ids: hits.map((e) => e.event_id),
          severity: 'critical',
          rationale: hits.flatMap((e) => [
            condition('magnitude', e.event_id, '>=', majorThreshold, e.magnitude),
            condition('age_seconds', e.event_id, '<', DAY_SECONDS, ageSeconds(e, now)),
          ]),
          summary: `Major event: ${plural(hits.length, 'event')} at or above magnitude ${majorThreshold} in the last 24h (max ${strongest})`,
          latest_observed_at: latestObservedAt(hits),
          generated_at: now,
        },
      };
    },
  };
}
