import { useEffect } from 'react';
import type { RefObject } from 'react';
import { useEditorStore, type EditorStoreHook } from '../state/store';

export type EditorShortcutOptions = {
  /** Store to drive. Defaults to the application-wide `useEditorStore`. */
  store?: EditorStoreHook;
  /** Ctrl/Cmd+Z undo, Ctrl/Cmd+Y and Ctrl/Cmd+Shift+Z redo */
  undoRedo?: boolean;
  /** Delete / Backspace removes the selected widget (edit mode only) */
  deletion?: boolean;
};

const defaultOptions: Required<Omit<EditorShortcutOptions, 'store'>> = {
  undoRedo: true,
  deletion: true,
};

function isTextInput(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  const tag = target.tagName.toLowerCase();
  if (tag === 'input' || tag === 'textarea' || tag === 'select') return true;
  return target.isContentEditable;
}

/**
 * Keyboard shortcuts for an editor surface.
 * Usage:
 * const ref = useRef<HTMLDivElement>(null);
 * useEditorShortcuts(ref, { deletion: false });
 */
export function useEditorShortcuts(ref: RefObject<HTMLElement>, options?: EditorShortcutOptions): void {
  const store = options?.store ?? useEditorStore;
  const undoRedo = options?.undoRedo ?? defaultOptions.undoRedo;
  const deletion = options?.deletion ?? defaultOptions.deletion;

  useEffect(() => {
    const el = ref.current;
    if (!el) return;

    function onKeyDown(e: KeyboardEvent) {
      // typing in a field keeps its own undo and delete
      if (isTextInput(e.target)) return;

      if (undoRedo && (e.ctrlKey || e.metaKey) && !e.altKey) {
        const keyLower = e.key.toLowerCase();
        if (keyLower === 'z') {
          e.preventDefault();
          const { undo, redo } = store.getState();
          if (e.shiftKey) redo();
          else undo();
          return;
        }
        if (keyLower === 'y' && !e.shiftKey) {
          e.preventDefault();
          store.getState().redo();
          return;
        }
      }

      if (deletion && (e.key === 'Delete' || e.key === 'Backspace')) {
        const { editMode, selectedWidgetId, deleteWidget } = store.getState();
        if (editMode && selectedWidgetId !== null) {
          e.preventDefault();
          deleteWidget(selectedWidgetId);
        }
      }
    }

    el.addEventListener('keydown', onKeyDown);
    return () => el.removeEventListener('keydown', onKeyDown);
  }, [ref, store, undoRedo, deletion]);
}
