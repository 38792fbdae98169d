export * from './types';
export * from './core/errors';
export * from './core/id';
export * from './core/widgetConfig';
export * from './core/layout';
export * from './core/history';
export * from './core/serialization';
export * from './core/registry';
export * from './core/storage';
export * from './core/logger';
export * from './widgets/standard';
export * from './state/store';
export * from './react/useEditorShortcuts';
export * from './react/useLayoutAutosave';
