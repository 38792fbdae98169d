/* @vitest-environment jsdom */

import { act } from 'react';
import ReactDOM from 'react-dom/client';
import { describe, it, expect, beforeEach } from 'vitest';
import {
  useEditMode,
  useEditorActions,
  useEditorStore,
  useHistoryState,
  useRootWidgetIds,
  useSelectedWidgetId,
  useWidget,
} from './store';

function Probe() {
  const ids = useRootWidgetIds();
  const first = useWidget(ids[0] ?? '');
  const selected = useSelectedWidgetId();
  const editMode = useEditMode();
  const { canUndo, canRedo } = useHistoryState();
  return (
    <div
      data-testid="probe"
      data-count={ids.length}
      data-first-type={first?.config.widgetType ?? ''}
      data-selected={selected ?? ''}
      data-edit={String(editMode)}
      data-undo={String(canUndo)}
      data-redo={String(canRedo)}
    />
  );
}

let actions: ReturnType<typeof useEditorActions> | null = null;
function ActionsProbe() {
  actions = useEditorActions();
  return null;
}

async function render() {
  const container = document.createElement('div');
  document.body.appendChild(container);
  const root = ReactDOM.createRoot(container);
  await act(async () => {
    root.render(
      <>
        <Probe />
        <ActionsProbe />
      </>,
    );
  });
  const probe = container.querySelector('[data-testid="probe"]');
  if (!probe) throw new Error('probe not rendered');
  return {
    probe,
    unmount: () =>
      act(() => {
        root.unmount();
      }),
  };
}

beforeEach(() => {
  useEditorStore.getState().clear();
  useEditorStore.setState({ editMode: true });
  actions = null;
});

describe('store selector hooks', () => {
  it('re-render with layout, selection and history changes', async () => {
    const { probe, unmount } = await render();
    expect(probe.getAttribute('data-count')).toBe('0');
    expect(probe.getAttribute('data-undo')).toBe('false');

    let id: string | null = null;
    act(() => {
      id = actions?.addWidget('container.card') ?? null;
    });
    expect(probe.getAttribute('data-count')).toBe('1');
    expect(probe.getAttribute('data-first-type')).toBe('container.card');
    expect(probe.getAttribute('data-undo')).toBe('true');

    act(() => {
      actions?.selectWidget(id);
    });
    expect(probe.getAttribute('data-selected')).toBe(id);

    act(() => {
      useEditorStore.getState().undo();
    });
    expect(probe.getAttribute('data-count')).toBe('0');
    expect(probe.getAttribute('data-selected')).toBe('');
    expect(probe.getAttribute('data-redo')).toBe('true');

    act(() => {
      actions?.toggleEditMode();
    });
    expect(probe.getAttribute('data-edit')).toBe('false');
    await unmount();
  });

  it('hands out stable action references', async () => {
    const { unmount } = await render();
    const before = actions;
    act(() => {
      useEditorStore.getState().addWidget('text');
    });
    expect(actions).not.toBeNull();
    expect(actions?.addWidget).toBe(before?.addWidget);
    await unmount();
  });
});
