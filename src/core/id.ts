import type { WidgetId } from '../types';

export type WidgetIdGenerator = () => WidgetId;

/**
 * New widget id (UUID v4). Uses crypto.randomUUID when available; falls back to a
 * Math.random based v4 template otherwise. Tests inject a deterministic generator instead.
 */
export function createWidgetId(): WidgetId {
  if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
    return crypto.randomUUID();
  }
  return 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
    const r = (Math.random() * 16) | 0;
    const v = c === 'x' ? r : (r & 0x3) | 0x8;
    return v.toString(16);
  });
}
