export const MAX_HISTORY = 50;

/**
 * Linear snapshot history. `entries[cursor]` is the current snapshot.
 * Invariants:
 *  - 0 <= cursor < entries.length
 *  - entries.length <= capacity
 */
export type History<T> = {
  readonly entries: readonly T[];
  readonly cursor: number;
  readonly capacity: number;
};

export function createHistory<T>(initial: T, capacity: number = MAX_HISTORY): History<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
  }
  return { entries: [initial], cursor: 0, capacity };
}

/**
 * Drop the redo tail, append `entry` and make it current. Past capacity the oldest snapshot
 * is evicted instead of advancing, so the window slides and the cursor stays at the tail.
 */
export function pushHistory<T>(history: History<T>, entry: T): History<T> {
  const entries = [...history.entries.slice(0, history.cursor + 1), entry];
  if (entries.length > history.capacity) entries.splice(0, entries.length - history.capacity);
  return { entries, cursor: entries.length - 1, capacity: history.capacity };
}

export function undoHistory<T>(history: History<T>): History<T> {
  if (!canUndo(history)) return history;
  return { ...history, cursor: history.cursor - 1 };
}

export function redoHistory<T>(history: History<T>): History<T> {
  if (!canRedo(history)) return history;
  return { ...history, cursor: history.cursor + 1 };
}

export function canUndo<T>(history: History<T>): boolean {
  return history.cursor > 0;
}

export function canRedo<T>(history: History<T>): boolean {
  return history.cursor < history.entries.length - 1;
}

export function currentEntry<T>(history: History<T>): T {
  return history.entries[history.cursor];
}
