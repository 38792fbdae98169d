/* @vitest-environment jsdom */

import { act } from 'react';
import ReactDOM from 'react-dom/client';
import { describe, it, expect, vi } from 'vitest';
import type { Layout } from '../core/layout';
import type { EditorStoreHook } from '../state/store';
import { useLayoutAutosave } from './useLayoutAutosave';
import { setupStore } from '../state/testUtils';

function AutosaveHost(props: { store: EditorStoreHook; onChange: (layout: Layout) => void }) {
  useLayoutAutosave(props.onChange, { store: props.store });
  return null;
}

async function mount(store: EditorStoreHook, onChange: (layout: Layout) => void) {
  const root = ReactDOM.createRoot(document.createElement('div'));
  await act(async () => {
    root.render(<AutosaveHost store={store} onChange={onChange} />);
  });
  return () =>
    act(() => {
      root.unmount();
    });
}

describe('useLayoutAutosave', () => {
  it('reports each layout change but not the initial one', async () => {
    const { store } = setupStore();
    const onChange = vi.fn();
    const unmount = await mount(store, onChange);
    expect(onChange).not.toHaveBeenCalled();

    store.getState().addWidget('text');
    store.getState().undo();
    expect(onChange).toHaveBeenCalledTimes(2);
    expect(onChange.mock.calls[0][0]).toBe(store.getState().history.entries[1]);
    expect(onChange.mock.calls[1][0]).toBe(store.getState().layout);
    await unmount();
  });

  it('ignores selection and mode changes', async () => {
    const { store } = setupStore();
    store.getState().addWidget('text');
    const onChange = vi.fn();
    const unmount = await mount(store, onChange);

    store.getState().selectWidget('w1');
    store.getState().toggleEditMode();
    store.getState().moveWidgetUp('w1');
    expect(onChange).not.toHaveBeenCalled();
    await unmount();
  });

  it('unsubscribes on unmount', async () => {
    const { store } = setupStore();
    const onChange = vi.fn();
    const unmount = await mount(store, onChange);
    await unmount();

    store.getState().addWidget('text');
    expect(onChange).not.toHaveBeenCalled();
  });
});
