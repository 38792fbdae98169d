import { z } from 'zod';
import type { JsonObject, JsonValue, LayoutDocument, LayoutNode, WidgetId } from '../types';
import { DeserializationError, SerializationError, err, ok, type Result } from './errors';
import { Layout, RESERVED_WIDGET_ID, reservedIdError } from './layout';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

// z.record rebuilds objects and drops `__proto__` keys, so free-form maps are checked in place.
const jsonObjectSchema = z.custom<JsonObject>(
  (value) => isRecord(value) && Object.values(value).every(isJsonValue),
  { message: 'Expected an object of JSON values' },
);

const stringMapSchema = z.custom<Record<string, string>>(
  (value) => isRecord(value) && Object.values(value).every((v) => typeof v === 'string'),
  { message: 'Expected an object of strings' },
);

const widgetConfigSchema = z.object({
  widget_type: z.string(),
  properties: jsonObjectSchema.default(() => ({})),
  css_classes: z.array(z.string()).default([]),
  inline_styles: stringMapSchema.default(() => ({})),
});

const layoutNodeSchema = z.object({
  config: widgetConfigSchema,
  children: z.array(z.string()),
  parent: z.string().nullable(),
  metadata: jsonObjectSchema.default(() => ({})),
});

export const serializedLayoutSchema = z.object({
  version: z.string().min(1),
  root_nodes: z.array(z.string()),
  nodes: z.record(layoutNodeSchema),
  metadata: jsonObjectSchema.default(() => ({})),
});

/** Wire (snake_case) form of a layout, as written to JSON and autosave storage. */
export type SerializedLayout = z.infer<typeof serializedLayoutSchema>;
export type SerializedLayoutNode = z.infer<typeof layoutNodeSchema>;

export function toSerializedLayout(layout: Layout): SerializedLayout {
  const doc = layout.toSerialized();
  const nodes = Object.fromEntries(
    [...doc.nodes].map(([id, node]): [WidgetId, SerializedLayoutNode] => [
      id,
      {
        config: {
          widget_type: node.config.widgetType,
          properties: { ...node.config.properties },
          css_classes: [...node.config.cssClasses],
          inline_styles: { ...node.config.inlineStyles },
        },
        children: [...node.children],
        parent: node.parent,
        metadata: { ...node.metadata },
      },
    ]),
  );
  return {
    version: doc.version,
    root_nodes: [...doc.rootNodes],
    nodes,
    metadata: { ...doc.metadata },
  };
}

export function fromSerializedLayout(serialized: SerializedLayout): Result<Layout, DeserializationError> {
  const nodes = new Map<WidgetId, LayoutNode>();
  for (const [id, node] of Object.entries(serialized.nodes)) {
    nodes.set(id, {
      config: {
        widgetType: node.config.widget_type,
        properties: node.config.properties,
        cssClasses: node.config.css_classes,
        inlineStyles: node.config.inline_styles,
      },
      children: node.children,
      parent: node.parent,
      metadata: node.metadata,
    });
  }
  const doc: LayoutDocument = {
    version: serialized.version,
    rootNodes: serialized.root_nodes,
    nodes,
    metadata: serialized.metadata,
  };
  const result = Layout.fromSerialized(doc);
  if (!result.ok) return err(new DeserializationError(result.error.message));
  return result;
}

function hasNonFiniteNumber(value: JsonValue): boolean {
  if (typeof value === 'number') return !Number.isFinite(value);
  if (value === null || typeof value !== 'object') return false;
  return Object.values(value).some(hasNonFiniteNumber);
}

function encode(layout: Layout, space: number | undefined): Result<string, SerializationError> {
  const serialized = toSerializedLayout(layout);
  // JSON.stringify would silently turn NaN/Infinity into null and break the round trip.
  for (const [id, node] of Object.entries(serialized.nodes)) {
    if (hasNonFiniteNumber(node.config.properties) || hasNonFiniteNumber(node.metadata)) {
      return err(new SerializationError(`Widget ${id} holds a non-finite number`));
    }
  }
  if (hasNonFiniteNumber(serialized.metadata)) {
    return err(new SerializationError('Layout metadata holds a non-finite number'));
  }
  try {
    return ok(JSON.stringify(serialized, undefined, space));
  } catch (e) {
    return err(new SerializationError(e instanceof Error ? e.message : String(e)));
  }
}

/** Compact JSON text of a layout. */
export function toJson(layout: Layout): Result<string, SerializationError> {
  return encode(layout, undefined);
}

/** Two-space indented JSON text of a layout. */
export function toJsonPretty(layout: Layout): Result<string, SerializationError> {
  return encode(layout, 2);
}

/**
 * Decode JSON text into a validated layout. Malformed JSON, a wrong shape and a structurally
 * broken document (dangling child, missing root) all fail here with a DeserializationError.
 * The stored version string is carried through as is.
 */
export function fromJson(json: string): Result<Layout, DeserializationError> {
  const trimmed = json.trim();
  if (!trimmed) return err(new DeserializationError('Empty layout document'));
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (e) {
    return err(new DeserializationError(e instanceof Error ? e.message : String(e)));
  }
  const nodes = isRecord(parsed) ? parsed.nodes : undefined;
  if (isRecord(nodes) && Object.prototype.hasOwnProperty.call(nodes, RESERVED_WIDGET_ID)) {
    return err(new DeserializationError(reservedIdError().message));
  }
  const shaped = serializedLayoutSchema.safeParse(parsed);
  if (!shaped.success) {
    return err(new DeserializationError(formatIssues(shaped.error)));
  }
  return fromSerializedLayout(shaped.data);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
