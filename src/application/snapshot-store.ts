import type { Snapshot } from '../domain/index.js';

/**
 * Recursively freezes a plain object graph and returns it.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object') return value;
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * Holder for the currently published snapshot.
 *
 * The orchestrator calls `publish()` once per successful cycle; readers
 * call `get()`. Both are synchronous, so a reader always sees either the
 * old snapshot or the new one, never a partial mix. Replaced snapshots
 * stay valid for anyone still holding them.
 */
export class SnapshotStore {
  private current: Snapshot | null = null;

  /** Returns the current snapshot, or `null` before the first publish. O(1), no copy. */
  get(): Snapshot | null {
    return this.current;
  }

  /** Atomically replaces the snapshot. Returns the one it replaced. */
  publish(next: Snapshot): Snapshot | null {
    const previous = this.current;
    this.current = next;
    return previous;
  }
}
