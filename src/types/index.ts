/** Opaque widget identifier (UUID v4 text). Sole addressing mechanism across a layout. */
export type WidgetId = string;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type WidgetConfig = {
  /** Registry type tag, e.g. `container.row` or `basic.button`. */
  readonly widgetType: string;
  /** Free-form widget properties. Keys are unordered, last write wins. */
  readonly properties: Readonly<JsonObject>;
  readonly cssClasses: readonly string[];
  readonly inlineStyles: Readonly<Record<string, string>>;
};

export type LayoutNode = {
  readonly config: WidgetConfig;
  readonly children: readonly WidgetId[];
  /**
   * Invariants:
   *  - `null` iff the id is listed in the document's root list
   *  - otherwise references a node whose `children` contains this id exactly once
   */
  readonly parent: WidgetId | null;
  readonly metadata: Readonly<JsonObject>;
};

export type LayoutDocument = {
  readonly version: string;
  readonly rootNodes: readonly WidgetId[];
  readonly nodes: ReadonlyMap<WidgetId, LayoutNode>;
  readonly metadata: Readonly<JsonObject>;
};
