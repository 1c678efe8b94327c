import type { DerivedFeatureSet } from '../features.js';
import type { Rule, RuleResult } from './types.js';
import {
  HOUR_SECONDS,
  ageSeconds,
  byEventId,
  compare,
  condition,
  latestObservedAt,
  plural,
} from './conditions.js';

const RULE_ID = 'notable-isolated-event';

/**
 * Notable event rule.
 *
 * Low-severity watch item: unclustered events from the last hour
 * between the light and strong breakpoints.
 */
export function createNotableIsolatedEventRule(
  lightThreshold: number = 4,
  strongThreshold: number = 6,
): Rule {
  return {
    id: RULE_ID,
    name: 'Notable Isolated Event',
    description: `Triggers for unclustered events of magnitude in [${lightThreshold}, ${strongThreshold}) within the last hour`,
    severity: 'low',

    evaluate(derived: DerivedFeatureSet): RuleResult {
      const now = derived.generated_at;
      const hits = derived.events
        .filter((e) =>
          e.cluster_id === null
          && compare(ageSeconds(e, now), '<', HOUR_SECONDS)
          && compare(e.magnitude, '>=', lightThreshold)
          && compare(e.magnitude, '<', strongThreshold))
        .sort(byEventId);

      if (hits.length === 0) {
        return { triggered: false, rule_id: RULE_ID };
      }

      return {
        triggered: true,
        rule_id: RULE_ID,
        recommendation: {
          rule_id: RULE_ID,
          action: 'monitor',
          subject_ids: hits.map((e) => e.event_id),
          severity: 'low',
          rationale: hits.flatMap((e) => [
            condition('magnitude', e.event_id, '>=', lightThreshold, e.magnitude),
            condition('magnitude', e.event_id, '<', strongThreshold, e.magnitude),
            condition('age_seconds', e.event_id, '<', HOUR_SECONDS, ageSeconds(e, now)),
          ]),
          summary: `Notable activity: ${plural(hits.length, 'isolated event')} of magnitude ${lightThreshold}-${strongThreshold} in the last hour, continue monitoring`,
          latest_observed_at: latestObservedAt(hits),
          generated_at: now,
        },
      };
    },
  };
}
