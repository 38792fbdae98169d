import type { JsonObject, JsonValue, WidgetConfig } from '../types';

/** Mutable form of a config, for building one up in place before it is handed to a layout. */
export type WidgetConfigDraft = {
  widgetType: string;
  properties: JsonObject;
  cssClasses: string[];
  inlineStyles: Record<string, string>;
};

export function createWidgetConfig(widgetType: string): WidgetConfigDraft {
  return { widgetType, properties: {}, cssClasses: [], inlineStyles: {} };
}

export function withProperty(config: WidgetConfig, key: string, value: JsonValue): WidgetConfig {
  return { ...config, properties: { ...config.properties, [key]: value } };
}

export function withoutProperty(config: WidgetConfig, key: string): WidgetConfig {
  if (!Object.prototype.hasOwnProperty.call(config.properties, key)) return config;
  const properties: JsonObject = { ...config.properties };
  delete properties[key];
  return { ...config, properties };
}

/** Appends a CSS class; a class already present is not added twice. */
export function withClass(config: WidgetConfig, className: string): WidgetConfig {
  if (config.cssClasses.includes(className)) return config;
  return { ...config, cssClasses: [...config.cssClasses, className] };
}

export function withoutClass(config: WidgetConfig, className: string): WidgetConfig {
  if (!config.cssClasses.includes(className)) return config;
  return { ...config, cssClasses: config.cssClasses.filter((c) => c !== className) };
}

export function withStyle(config: WidgetConfig, property: string, value: string): WidgetConfig {
  return { ...config, inlineStyles: { ...config.inlineStyles, [property]: value } };
}

export function withoutStyle(config: WidgetConfig, property: string): WidgetConfig {
  if (!Object.prototype.hasOwnProperty.call(config.inlineStyles, property)) return config;
  const inlineStyles: Record<string, string> = { ...config.inlineStyles };
  delete inlineStyles[property];
  return { ...config, inlineStyles };
}

export function getProperty(config: WidgetConfig, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(config.properties, key)
    ? config.properties[key]
    : undefined;
}

/** In-place setter for drafts. Configs stored in a layout are frozen and must go through `withProperty`. */
export function setProperty(config: WidgetConfigDraft, key: string, value: JsonValue): void {
  config.properties = { ...config.properties, [key]: value };
}

/** Deep copy of a config, frozen so that a layout can share it between snapshots. */
export function freezeConfig(config: WidgetConfig): WidgetConfig {
  return Object.freeze({
    widgetType: config.widgetType,
    properties: deepFreezeJson(cloneJsonObject(config.properties)),
    cssClasses: Object.freeze([...config.cssClasses]),
    inlineStyles: Object.freeze({ ...config.inlineStyles }),
  });
}

/** Keys are defined as own properties, so `__proto__` survives as an ordinary key. */
export function cloneJsonObject(value: Readonly<JsonObject>): JsonObject {
  return Object.fromEntries(Object.entries(value).map(([k, v]): [string, JsonValue] => [k, cloneJson(v)]));
}

export function cloneJson(value: JsonValue): JsonValue {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(cloneJson);
  return cloneJsonObject(value);
}

export function deepFreezeJson<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreezeJson(v);
    Object.freeze(value);
  }
  return value;
}

export function configsEqual(a: WidgetConfig, b: WidgetConfig): boolean {
  return (
    a.widgetType === b.widgetType &&
    jsonEqual(a.properties, b.properties) &&
    a.cssClasses.length === b.cssClasses.length &&
    a.cssClasses.every((c, i) => c === b.cssClasses[i]) &&
    jsonEqual(a.inlineStyles, b.inlineStyles)
  );
}

export function jsonEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((v, i) => jsonEqual(v, b[i]));
  }
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every(
    (k) => Object.prototype.hasOwnProperty.call(b, k) && jsonEqual(a[k], b[k]),
  );
}
