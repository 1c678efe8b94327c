import { describe, it, expect } from 'vitest';
import { createIsolatedStrongEventRule } from '../../src/domain/rules/isolated-strong-event.js';
import { makeDerived, makeFeatures } from './helpers.js';

describe('Isolated Strong Event Rule', () => {
  const rule = createIsolatedStrongEventRule(6);

  it('should trigger for an unclustered strong event', () => {
    const event = makeFeatures({ event_id: 'a', magnitude: 6.3, place: 'Offshore Region' });
    const result = rule.evaluate(makeDerived({ events: [event] }));

    expect(result.triggered).toBe(true);
    if (result.triggered) {
      expect(result.recommendation.severity).toBe('high');
      expect(result.recommendation.subject_ids).toEqual(['a']);
      expect(result.recommendation.summary).toBe(
        'Strong event: 1 isolated event at or above magnitude 6 near Offshore Region',
      );
    }
  });

  it('should omit the place clause when no place is known', () => {
    const event = makeFeatures({ event_id: 'a', magnitude: 6.0, place: null });
    const result = rule.evaluate(makeDerived({ events: [event] }));
    expect(result.triggered).toBe(true);
    if (result.triggered) {
      expect(result.recommendation.summary).toBe('Strong event: 1 isolated event at or above magnitude 6');
    }
  });

  it('should not trigger for clustered events', () => {
    const event = makeFeatures({ magnitude: 6.5, cluster_id: 'cluster:x' });
    expect(rule.evaluate(makeDerived({ events: [event] })).triggered).toBe(false);
  });

  it('should not trigger below the strong breakpoint', () => {
    const event = makeFeatures({ magnitude: 5.9 });
    expect(rule.evaluate(makeDerived({ events: [event] })).triggered).toBe(false);
  });
});
