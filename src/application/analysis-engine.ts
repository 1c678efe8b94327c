import type { Recommendation, Rule, RuleResult, DerivedFeatureSet } from '../domain/index.js';
import { SEVERITY_RANK } from '../domain/index.js';

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Element-wise lexicographic order; a prefix sorts first. */
function compareIdLists(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareStrings(a[i] ?? '', b[i] ?? '');
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

/**
 * Output order: severity desc, recency desc, subject ids asc, rule id asc.
 */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  return (SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity])
    || (b.latest_observed_at - a.latest_observed_at)
    || compareIdLists(a.subject_ids, b.subject_ids)
    || compareStrings(a.rule_id, b.rule_id);
}

/**
 * Evaluates every rule against one cycle's features.
 *
 * Rules run in list order and independently; the engine keeps no
 * state across calls. A rule that throws propagates to the caller,
 * which treats it as a processing fault.
 */
export function evaluateRules(
  derived: DerivedFeatureSet,
  rules: readonly Rule[],
): { results: RuleResult[]; recommendations: Recommendation[] } {
  const results: RuleResult[] = [];
  const recommendations: Recommendation[] = [];

  for (const rule of rules) {
    const result = rule.evaluate(derived);
    results.push(result);

    if (result.triggered) {
      recommendations.push(result.recommendation);
    }
  }

  return { results, recommendations: recommendations.sort(compareRecommendations) };
}

/** Ranked recommendations for one feature set. */
export function analyze(derived: DerivedFeatureSet, rules: readonly Rule[]): Recommendation[] {
  return evaluateRules(derived, rules).recommendations;
}
