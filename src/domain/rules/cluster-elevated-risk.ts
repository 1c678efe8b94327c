import type { Cluster, DerivedFeatureSet, EventFeatures } from '../features.js';
import type { RationaleCondition, Rule, RuleResult } from './types.js';
import {
  DAY_SECONDS,
  ageSeconds,
  byEventId,
  compare,
  condition,
  plural,
} from './conditions.js';

const RULE_ID = 'cluster-elevated-risk';

interface QualifyingCluster {
  readonly cluster: Cluster;
  readonly members: readonly EventFeatures[];
}

/**
 * Elevated-risk cluster rule.
 *
 * A cluster qualifies when at least `minEventsAboveModerate` of its
 * members observed within the last day reach the moderate breakpoint.
 * Every qualifying cluster becomes a subject of the single
 * recommendation this rule emits.
 */
export function createClusterElevatedRiskRule(
  moderateThreshold: number = 5,
  minEventsAboveModerate: number = 1,
): Rule {
  return {
    id: RULE_ID,
    name: 'Elevated-Risk Cluster',
    description: `Triggers when a cluster holds >=${minEventsAboveModerate} events of magnitude >=${moderateThreshold} within 24h`,
    severity: 'high',

    evaluate(derived: DerivedFeatureSet): RuleResult {
      const now = derived.generated_at;
      const qualifying: QualifyingCluster[] = [];

      for (const cluster of derived.clusters) {
        const members = derived.events
          .filter((e) =>
            e.cluster_id === cluster.cluster_id
            && compare(ageSeconds(e, now), '<', DAY_SECONDS)
            && compare(e.magnitude, '>=', moderateThreshold))
          .sort(byEventId);

        if (compare(members.length, '>=', minEventsAboveModerate) && members.length > 0) {
          qualifying.push({ cluster, members });
        }
      }

      if (qualifying.length === 0) {
        return { triggered: false, rule_id: RULE_ID };
      }

      qualifying.sort((a, b) =>
        a.cluster.cluster_id < b.cluster.cluster_id ? -1 : a.cluster.cluster_id > b.cluster.cluster_id ? 1 : 0);

      const rationale: RationaleCondition[] = [];
      const parts: string[] = [];
      for (const { cluster, members } of qualifying) {
        rationale.push(condition(
          'cluster.events_above_moderate',
          cluster.cluster_id,
          '>=',
          minEventsAboveModerate,
          members.length,
        ));
        for (const e of members) {
          rationale.push(condition('magnitude', e.event_id, '>=', moderateThreshold, e.magnitude));
          rationale.push(condition('age_seconds', e.event_id, '<', DAY_SECONDS, ageSeconds(e, now)));
        }
        parts.push(
          `Elevated-risk cluster ${cluster.cluster_id} (${plural(cluster.size, 'event')}): `
          + `${plural(members.length, 'event')} above moderate threshold (${moderateThreshold})`,
        );
      }

      return {
        triggered: true,
        rule_id: RULE_ID,
        recommendation: {
          rule_id: RULE_ID,
          action: 'issue-regional-advisory',
          subject_ids: qualifying.map((q) => q.cluster.cluster_id),
          severity: 'high',
          rationale,
          summary: parts.join('; '),
          latest_observed_at: Math.max(...qualifying.map((q) => q.cluster.last_observed_at)),
          generated_at: now,
        },
      };
    },
  };
}
