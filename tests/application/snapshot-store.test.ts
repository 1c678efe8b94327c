import { describe, it, expect } from 'vitest';
import { SnapshotStore, deepFreeze } from '../../src/application/snapshot-store.js';
import type { Snapshot } from '../../src/domain/index.js';
import { FIXED_NOW, makeDerived } from '../rules/helpers.js';

function fakeSnapshot(sequence: number): Snapshot {
  return {
    events: [],
    derived_features: makeDerived(),
    recommendations: [],
    cycle_timestamp: FIXED_NOW,
    cycle_sequence_number: sequence,
  };
}

describe('SnapshotStore', () => {
  it('is empty before the first publish', () => {
    expect(new SnapshotStore().get()).toBeNull();
  });

  it('publish() replaces the snapshot and returns the previous one', () => {
    const store = new SnapshotStore();
    const first = fakeSnapshot(1);
    const second = fakeSnapshot(2);

    expect(store.publish(first)).toBeNull();
    expect(store.publish(second)).toBe(first);
    expect(store.get()).toBe(second);
  });

  it('get() returns the same reference (no defensive copy)', () => {
    const store = new SnapshotStore();
    const snapshot = fakeSnapshot(1);
    store.publish(snapshot);
    expect(store.get()).toBe(snapshot);
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const snapshot = deepFreeze(fakeSnapshot(1));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.derived_features)).toBe(true);
    expect(Object.isFrozen(snapshot.derived_features.aggregates.count_by_magnitude_bucket)).toBe(true);
    expect(Object.isFrozen(snapshot.recommendations)).toBe(true);
  });

  it('passes primitives through', () => {
    expect(deepFreeze(5)).toBe(5);
    expect(deepFreeze(null)).toBeNull();
  });
});
