import { useEffect, useRef } from 'react';
import type { Layout } from '../core/layout';
import { useEditorStore, type EditorStoreHook } from '../state/store';

export type LayoutAutosaveOptions = {
  store?: EditorStoreHook;
};

/**
 * Call `onChange` with the new layout every time the current layout changes
 * (edits, undo/redo, imports, clear). Not called on mount.
 */
export function useLayoutAutosave(
  onChange: (layout: Layout) => void,
  options?: LayoutAutosaveOptions,
): void {
  const store = options?.store ?? useEditorStore;
  const callback = useRef(onChange);
  callback.current = onChange;

  useEffect(
    () =>
      store.subscribe((state, prev) => {
        if (state.layout !== prev.layout) callback.current(state.layout);
      }),
    [store],
  );
}
