import { createMemoryLayoutStorage } from '../core/storage';
import { createEditorStore, type EditorOptions } from './store';

/** Fresh store with sequential ids (`w1`, `w2`, ...), memory storage and logging off. */
export function setupStore(options: EditorOptions = {}) {
  let n = 0;
  const storage = createMemoryLayoutStorage();
  const store = createEditorStore({
    idGenerator: () => `w${++n}`,
    logLevel: 'silent',
    storage,
    ...options,
  });
  return { store, storage };
}
