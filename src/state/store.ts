import { create, type StoreApi, type UseBoundStore } from 'zustand';
import { useShallow } from 'zustand/react/shallow';
import type { JsonValue, LayoutNode, WidgetConfig, WidgetId } from '../types';
import { DeserializationError, InvalidOperationError, type LayoutError, type Result } from '../core/errors';
import {
  MAX_HISTORY,
  canRedo,
  canUndo,
  createHistory,
  currentEntry,
  pushHistory,
  redoHistory,
  undoHistory,
  type History,
} from '../core/history';
import { createWidgetId, type WidgetIdGenerator } from '../core/id';
import { Layout } from '../core/layout';
import { createLogger, type LogLevel, type Logger } from '../core/logger';
import type { WidgetRegistry } from '../core/registry';
import { fromJson, toJson, toJsonPretty } from '../core/serialization';
import type { LayoutStorage } from '../core/storage';
import { createStandardRegistry } from '../widgets/standard';

export type EditorOptions = {
  /** Widget catalog. Defaults to the standard widgets. */
  registry?: WidgetRegistry;
  /** Autosave target. Without one nothing is persisted. */
  storage?: LayoutStorage | null;
  /** Starting layout. Without one the stored layout is loaded, else an empty layout. */
  initialLayout?: Layout | null;
  historyCapacity?: number;
  logLevel?: LogLevel;
  /** Id source for new widgets (UUID v4 by default). */
  idGenerator?: WidgetIdGenerator;
};

export type EditorState = {
  /** Current document; always `currentEntry(history)`. */
  readonly layout: Layout;
  readonly history: History<Layout>;
  readonly selectedWidgetId: WidgetId | null;
  /** UI: false while previewing; not part of history */
  readonly editMode: boolean;
  /** Last rejected operation, cleared by the next accepted one. */
  readonly lastError: LayoutError | null;
  readonly registry: WidgetRegistry;
};

export type EditorActions = {
  /** Add a widget with its default config: under the selected widget when it accepts children, else as a root. */
  addWidget: (type: string) => WidgetId | null;
  /** Insert a widget at a clamped position under `parentId`, or in the root list when null. */
  dropWidget: (type: string, parentId: WidgetId | null, position: number) => WidgetId | null;
  deleteWidget: (id: WidgetId) => void;
  moveWidgetUp: (id: WidgetId) => void;
  moveWidgetDown: (id: WidgetId) => void;
  updateWidgetConfig: (id: WidgetId, config: WidgetConfig) => void;
  setLayoutMetadata: (key: string, value: JsonValue) => void;
  selectWidget: (id: WidgetId | null) => void;
  toggleEditMode: () => void;
  undo: () => void;
  redo: () => void;
  /** Replace the document with decoded JSON. Returns the error when the text is rejected. */
  importLayout: (json: string) => DeserializationError | null;
  exportLayout: (options?: { pretty?: boolean }) => string | null;
  /** Wipe storage and start over from an empty layout with a fresh history. */
  clear: () => void;
  /** Reload the autosaved layout, resetting history. Returns false when nothing usable is stored. */
  loadFromStorage: () => boolean;
  clearError: () => void;
};

export type EditorStore = EditorState & EditorActions;
export type EditorStoreHook = UseBoundStore<StoreApi<EditorStore>>;

function readStored(storage: LayoutStorage | null, logger: Logger): Layout | null {
  if (!storage) return null;
  let json: string | null;
  try {
    json = storage.load();
  } catch (e) {
    logger.warn('Could not read autosaved layout', e);
    return null;
  }
  if (json === null) return null;
  const decoded = fromJson(json);
  if (!decoded.ok) {
    logger.warn('Ignoring autosaved layout', decoded.error.message);
    return null;
  }
  return decoded.value;
}

function isInSubtree(layout: Layout, rootId: WidgetId, id: WidgetId): boolean {
  return id === rootId || layout.descendants(rootId).includes(id);
}

export function createEditorStore(options: EditorOptions = {}): EditorStoreHook {
  const registry = options.registry ?? createStandardRegistry();
  const storage = options.storage ?? null;
  const capacity = options.historyCapacity ?? MAX_HISTORY;
  const nextId = options.idGenerator ?? createWidgetId;
  const logger = createLogger('layout-editor', options.logLevel ?? 'warn');

  const initialLayout = options.initialLayout ?? readStored(storage, logger) ?? Layout.empty();
  const initialHistory = createHistory(initialLayout, capacity);

  function persist(layout: Layout): void {
    if (!storage) return;
    const encoded = toJson(layout);
    if (!encoded.ok) {
      logger.error('Autosave skipped', encoded.error.message);
      return;
    }
    try {
      storage.save(encoded.value);
    } catch (e) {
      logger.error('Autosave failed', e);
    }
  }

  return create<EditorStore>()((set, get) => {
    /** Record a rejected operation. Stale references log at debug, anything else at warn. */
    function reject(error: LayoutError): void {
      if (error.kind === 'not-found' || error.kind === 'invalid-operation') {
        logger.debug('Operation ignored', error.message);
      } else {
        logger.warn('Operation rejected', error.message);
      }
      set({ lastError: error });
    }

    /** Push a mutation result into history. Identity results (no-ops) do not create an entry. */
    function commit(result: Result<Layout>, extra: Partial<EditorState> = {}): boolean {
      if (!result.ok) {
        reject(result.error);
        return false;
      }
      const s = get();
      if (result.value === s.layout) {
        set({ lastError: null, ...extra });
        return true;
      }
      const history = pushHistory(s.history, result.value);
      set({ history, layout: currentEntry(history), lastError: null, ...extra });
      persist(result.value);
      return true;
    }

    function acceptsChildren(node: LayoutNode): boolean {
      const definition = registry.createWidget(node.config.widgetType);
      return definition.ok && definition.value.canHaveChildren;
    }

    function moveTo(history: History<Layout>): void {
      const { history: before, selectedWidgetId } = get();
      if (history === before) return;
      const layout = currentEntry(history);
      set({
        history,
        layout,
        selectedWidgetId:
          selectedWidgetId !== null && layout.hasWidget(selectedWidgetId) ? selectedWidgetId : null,
        lastError: null,
      });
      persist(layout);
    }

    return {
      layout: initialLayout,
      history: initialHistory,
      selectedWidgetId: null,
      editMode: true,
      lastError: null,
      registry,

      addWidget: (type) => {
        const definition = registry.createWidget(type);
        if (!definition.ok) {
          reject(definition.error);
          return null;
        }
        const { layout, selectedWidgetId } = get();
        const id = nextId();
        const config = definition.value.defaultConfig();
        const parent = selectedWidgetId !== null ? layout.getWidget(selectedWidgetId) : undefined;
        const result =
          selectedWidgetId !== null && parent && acceptsChildren(parent)
            ? layout.addChildWidget(selectedWidgetId, id, config)
            : layout.addRootWidget(id, config);
        return commit(result) ? id : null;
      },

      dropWidget: (type, parentId, position) => {
        const definition = registry.createWidget(type);
        if (!definition.ok) {
          reject(definition.error);
          return null;
        }
        const { layout } = get();
        const id = nextId();
        const config = definition.value.defaultConfig();
        if (parentId === null) {
          return commit(layout.insertRootWidget(id, config, position)) ? id : null;
        }
        const parent = layout.getWidget(parentId);
        if (parent && !acceptsChildren(parent)) {
          reject(new InvalidOperationError(`Widget type '${parent.config.widgetType}' cannot have children`));
          return null;
        }
        return commit(layout.insertChildWidget(parentId, id, config, position)) ? id : null;
      },

      deleteWidget: (id) => {
        const { layout, selectedWidgetId } = get();
        const clearsSelection = selectedWidgetId !== null && isInSubtree(layout, id, selectedWidgetId);
        commit(layout.removeWidget(id), clearsSelection ? { selectedWidgetId: null } : {});
      },

      moveWidgetUp: (id) => {
        commit(get().layout.moveWidgetUp(id));
      },

      moveWidgetDown: (id) => {
        commit(get().layout.moveWidgetDown(id));
      },

      updateWidgetConfig: (id, config) => {
        const definition = registry.createWidget(config.widgetType);
        const invalid = definition.ok ? (definition.value.validateConfig?.(config) ?? null) : null;
        if (invalid) {
          reject(invalid);
          return;
        }
        commit(get().layout.updateWidgetConfig(id, config));
      },

      setLayoutMetadata: (key, value) => {
        commit({ ok: true, value: get().layout.setMetadata(key, value) });
      },

      selectWidget: (id) => set({ selectedWidgetId: id }),

      toggleEditMode: () =>
        set((s) => ({
          editMode: !s.editMode,
          // leaving edit mode drops the selection
          selectedWidgetId: s.editMode ? null : s.selectedWidgetId,
        })),

      undo: () => moveTo(undoHistory(get().history)),

      redo: () => moveTo(redoHistory(get().history)),

      importLayout: (json) => {
        const decoded = fromJson(json);
        if (!decoded.ok) {
          logger.error('Failed to import layout', decoded.error.message);
          set({ lastError: decoded.error });
          return decoded.error;
        }
        commit(decoded, { selectedWidgetId: null });
        return null;
      },

      exportLayout: (exportOptions) => {
        const { layout } = get();
        const encoded = exportOptions?.pretty ? toJsonPretty(layout) : toJson(layout);
        if (!encoded.ok) {
          logger.error('Failed to export layout', encoded.error.message);
          set({ lastError: encoded.error });
          return null;
        }
        return encoded.value;
      },

      clear: () => {
        if (storage) {
          try {
            storage.clear();
          } catch (e) {
            logger.error('Could not clear autosaved layout', e);
          }
        }
        const layout = Layout.empty();
        set({
          layout,
          history: createHistory(layout, capacity),
          selectedWidgetId: null,
          lastError: null,
        });
      },

      loadFromStorage: () => {
        const stored = readStored(storage, logger);
        if (!stored) return false;
        set({
          layout: stored,
          history: createHistory(stored, capacity),
          selectedWidgetId: null,
          lastError: null,
        });
        return true;
      },

      clearError: () => set({ lastError: null }),
    };
  });
}

/** Application-wide editor store with the standard widgets and no autosave. */
export const useEditorStore = createEditorStore();

// Convenience hooks
export function useLayout(): Layout {
  return useEditorStore((s) => s.layout);
}

export function useRootWidgetIds(): readonly WidgetId[] {
  return useEditorStore((s) => s.layout.rootWidgets());
}

export function useWidget(id: WidgetId): LayoutNode | undefined {
  return useEditorStore((s) => s.layout.getWidget(id));
}

export function useSelectedWidgetId(): WidgetId | null {
  return useEditorStore((s) => s.selectedWidgetId);
}

export function useEditMode(): boolean {
  return useEditorStore((s) => s.editMode);
}

export function useLastError(): LayoutError | null {
  return useEditorStore((s) => s.lastError);
}

export function useHistoryState(): { canUndo: boolean; canRedo: boolean } {
  return useEditorStore(
    useShallow((s) => ({ canUndo: canUndo(s.history), canRedo: canRedo(s.history) })),
  );
}

export function useEditorActions(): Pick<
  EditorActions,
  | 'addWidget'
  | 'dropWidget'
  | 'deleteWidget'
  | 'moveWidgetUp'
  | 'moveWidgetDown'
  | 'updateWidgetConfig'
  | 'selectWidget'
  | 'toggleEditMode'
> {
  return useEditorStore(
    useShallow((s) => ({
      addWidget: s.addWidget,
      dropWidget: s.dropWidget,
      deleteWidget: s.deleteWidget,
      moveWidgetUp: s.moveWidgetUp,
      moveWidgetDown: s.moveWidgetDown,
      updateWidgetConfig: s.updateWidgetConfig,
      selectWidget: s.selectWidget,
      toggleEditMode: s.toggleEditMode,
    })),
  );
}

export function useHistoryActions(): Pick<EditorActions, 'undo' | 'redo'> {
  return useEditorStore(useShallow((s) => ({ undo: s.undo, redo: s.redo })));
}

export function useDocumentActions(): Pick<
  EditorActions,
  'importLayout' | 'exportLayout' | 'clear' | 'loadFromStorage'
> {
  return useEditorStore(
    useShallow((s) => ({
      importLayout: s.importLayout,
      exportLayout: s.exportLayout,
      clear: s.clear,
      loadFromStorage: s.loadFromStorage,
    })),
  );
}
