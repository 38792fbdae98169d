/** Where autosaved layout JSON lives. The core never touches storage itself; the editor store does. */
export type LayoutStorage = {
  save(json: string): void;
  load(): string | null;
  clear(): void;
};

export const AUTOSAVE_KEY = 'page-layout-editor-autosave';

type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

/**
 * Storage backed by Web Storage (window.localStorage unless another is given).
 * Returns null where no Web Storage exists, e.g. outside the browser.
 */
export function createLocalLayoutStorage(
  key: string = AUTOSAVE_KEY,
  storage?: KeyValueStorage,
): LayoutStorage | null {
  const backing = storage ?? (typeof window !== 'undefined' ? window.localStorage : undefined);
  if (!backing) return null;
  return {
    save: (json) => backing.setItem(key, json),
    load: () => backing.getItem(key),
    clear: () => backing.removeItem(key),
  };
}

export function createMemoryLayoutStorage(initial: string | null = null): LayoutStorage {
  let stored = initial;
  return {
    save: (json) => {
      stored = json;
    },
    load: () => stored,
    clear: () => {
      stored = null;
    },
  };
}
