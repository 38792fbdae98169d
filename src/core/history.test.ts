import { describe, it, expect } from 'vitest';
import {
  MAX_HISTORY,
  canRedo,
  canUndo,
  createHistory,
  currentEntry,
  pushHistory,
  redoHistory,
  undoHistory,
} from './history';

describe('history', () => {
  it('starts with one entry and nothing to undo or redo', () => {
    const h = createHistory('d0');
    expect(h.capacity).toBe(MAX_HISTORY);
    expect(currentEntry(h)).toBe('d0');
    expect(canUndo(h)).toBe(false);
    expect(canRedo(h)).toBe(false);
    expect(undoHistory(h)).toBe(h);
    expect(redoHistory(h)).toBe(h);
  });

  it('rejects a capacity below one', () => {
    expect(() => createHistory('d0', 0)).toThrow(RangeError);
    expect(() => createHistory('d0', 2.5)).toThrow(RangeError);
  });

  it('evicts the oldest snapshots past capacity', () => {
    let h = createHistory('d0');
    for (let i = 1; i <= 60; i++) h = pushHistory(h, `d${i}`);
    expect(h.entries.length).toBe(50);
    expect(h.entries[0]).toBe('d11');
    expect(currentEntry(h)).toBe('d60');

    for (let i = 0; i < 49; i++) h = undoHistory(h);
    expect(currentEntry(h)).toBe('d11');
    expect(canUndo(h)).toBe(false);
  });

  it('drops the redo tail on push', () => {
    let h = createHistory('a');
    h = pushHistory(h, 'b');
    h = pushHistory(h, 'c');
    h = undoHistory(undoHistory(h));
    expect(currentEntry(h)).toBe('a');
    h = pushHistory(h, 'x');
    expect(h.entries).toEqual(['a', 'x']);
    expect(canRedo(h)).toBe(false);
  });

  it('undo then redo returns to the same snapshot', () => {
    let h = createHistory('a');
    h = pushHistory(h, 'b');
    const undone = undoHistory(h);
    expect(currentEntry(undone)).toBe('a');
    expect(canRedo(undone)).toBe(true);
    expect(currentEntry(redoHistory(undone))).toBe('b');
  });
});
