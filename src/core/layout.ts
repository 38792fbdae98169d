import type { JsonObject, JsonValue, LayoutDocument, LayoutNode, WidgetConfig, WidgetId } from '../types';
import {
  InvalidOperationError,
  WidgetNotFoundError,
  err,
  ok,
  type Result,
} from './errors';
import { cloneJson, cloneJsonObject, configsEqual, deepFreezeJson, freezeConfig, jsonEqual } from './widgetConfig';

export const LAYOUT_VERSION = '1.0';

/** Object-key ids that plain-object wire maps cannot carry. */
export const RESERVED_WIDGET_ID = '__proto__';

export function reservedIdError(): InvalidOperationError {
  return new InvalidOperationError(`Widget id ${RESERVED_WIDGET_ID} is reserved`);
}

/** Clamp an insert position into [0, length]. NaN maps to 0, fractions are floored. */
export function clampPosition(position: number, length: number): number {
  if (Number.isNaN(position)) return 0;
  return Math.min(Math.max(Math.floor(position), 0), length);
}

function insertAt(list: readonly WidgetId[], id: WidgetId, position: number): readonly WidgetId[] {
  const pos = clampPosition(position, list.length);
  return Object.freeze([...list.slice(0, pos), id, ...list.slice(pos)]);
}

function swap(list: readonly WidgetId[], i: number, j: number): readonly WidgetId[] {
  const next = list.slice();
  next[i] = list[j];
  next[j] = list[i];
  return Object.freeze(next);
}

function freezeNode(node: LayoutNode): LayoutNode {
  return Object.freeze({
    config: node.config,
    children: Object.isFrozen(node.children) ? node.children : Object.freeze([...node.children]),
    parent: node.parent,
    metadata: node.metadata,
  });
}

function createNode(config: WidgetConfig, parent: WidgetId | null): LayoutNode {
  return Object.freeze({
    config: freezeConfig(config),
    children: Object.freeze([]),
    parent,
    metadata: Object.freeze({}),
  });
}

/**
 * Structural validation of a document. Reports the first violation found, checking in order:
 * reserved ids, root references, child references, duplicate ids within a list,
 * parent/children symmetry and acyclicity.
 */
export function validateDocument(doc: LayoutDocument): Result<LayoutDocument, InvalidOperationError> {
  const { nodes, rootNodes } = doc;

  if (
    rootNodes.includes(RESERVED_WIDGET_ID) ||
    nodes.has(RESERVED_WIDGET_ID) ||
    [...nodes.values()].some((node) => node.children.includes(RESERVED_WIDGET_ID))
  ) {
    return err(reservedIdError());
  }

  for (const rootId of rootNodes) {
    if (!nodes.has(rootId)) {
      return err(new InvalidOperationError(`Root node ${rootId} not found in nodes`));
    }
  }
  for (const [id, node] of nodes) {
    for (const childId of node.children) {
      if (!nodes.has(childId)) {
        return err(new InvalidOperationError(`Node ${id} references non-existent child ${childId}`));
      }
    }
  }

  const roots = new Set<WidgetId>();
  for (const rootId of rootNodes) {
    if (roots.has(rootId)) {
      return err(new InvalidOperationError(`Root node ${rootId} is listed more than once`));
    }
    roots.add(rootId);
  }
  for (const [id, node] of nodes) {
    if (new Set(node.children).size !== node.children.length) {
      return err(new InvalidOperationError(`Node ${id} lists a child more than once`));
    }
  }

  for (const [id, node] of nodes) {
    if (node.parent === null) {
      if (!roots.has(id)) {
        return err(new InvalidOperationError(`Node ${id} has no parent but is not a root`));
      }
      continue;
    }
    if (roots.has(id)) {
      return err(new InvalidOperationError(`Root node ${id} has parent ${node.parent}`));
    }
    const parent = nodes.get(node.parent);
    if (!parent) {
      return err(new InvalidOperationError(`Node ${id} references non-existent parent ${node.parent}`));
    }
    if (!parent.children.includes(id)) {
      return err(new InvalidOperationError(`Node ${id} is not listed in children of ${node.parent}`));
    }
  }
  for (const [id, node] of nodes) {
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child && child.parent !== id) {
        return err(
          new InvalidOperationError(`Node ${childId} is listed in children of ${id} but has parent ${String(child.parent)}`),
        );
      }
    }
  }

  // Parent chains must end at a root; a revisit means a cycle.
  const settled = new Set<WidgetId>();
  for (const id of nodes.keys()) {
    const chain = new Set<WidgetId>();
    let cur: WidgetId | null = id;
    while (cur !== null && !settled.has(cur)) {
      if (chain.has(cur)) {
        return err(new InvalidOperationError(`Node ${cur} is its own ancestor`));
      }
      chain.add(cur);
      cur = nodes.get(cur)?.parent ?? null;
    }
    for (const c of chain) settled.add(c);
  }

  return ok(doc);
}

/**
 * Validated, immutable layout handle.
 *
 * Every mutation returns a new `Layout` and leaves the receiver untouched; operations that
 * change nothing (a boundary move, a repeated child insert) return the receiver itself so
 * callers can skip history pushes with an identity check.
 */
export class Layout {
  private constructor(private readonly doc: LayoutDocument) {}

  static empty(): Layout {
    return new Layout(
      Object.freeze({
        version: LAYOUT_VERSION,
        rootNodes: Object.freeze([]),
        nodes: new Map<WidgetId, LayoutNode>(),
        metadata: Object.freeze({}),
      }),
    );
  }

  /** Validate a document and wrap a frozen copy of it. */
  static fromSerialized(doc: LayoutDocument): Result<Layout, InvalidOperationError> {
    const checked = validateDocument(doc);
    if (!checked.ok) return checked;
    const nodes = new Map<WidgetId, LayoutNode>();
    for (const [id, node] of doc.nodes) {
      nodes.set(
        id,
        freezeNode({
          config: freezeConfig(node.config),
          children: node.children,
          parent: node.parent,
          metadata: deepFreezeJson(cloneJsonObject(node.metadata)),
        }),
      );
    }
    return ok(
      new Layout(
        Object.freeze({
          version: doc.version,
          rootNodes: Object.freeze([...doc.rootNodes]),
          nodes,
          metadata: deepFreezeJson(cloneJsonObject(doc.metadata)),
        }),
      ),
    );
  }

  toSerialized(): LayoutDocument {
    return this.doc;
  }

  get version(): string {
    return this.doc.version;
  }

  get metadata(): Readonly<JsonObject> {
    return this.doc.metadata;
  }

  /** Number of nodes in the layout. */
  get size(): number {
    return this.doc.nodes.size;
  }

  rootWidgets(): readonly WidgetId[] {
    return this.doc.rootNodes;
  }

  getWidget(id: WidgetId): LayoutNode | undefined {
    return this.doc.nodes.get(id);
  }

  hasWidget(id: WidgetId): boolean {
    return this.doc.nodes.has(id);
  }

  /** Descendant ids of `id` in depth-first order (empty for unknown ids and leaves). */
  descendants(id: WidgetId): WidgetId[] {
    const out: WidgetId[] = [];
    const seen = new Set<WidgetId>([id]);
    const stack = [...(this.doc.nodes.get(id)?.children ?? [])].reverse();
    for (let cur = stack.pop(); cur !== undefined; cur = stack.pop()) {
      if (seen.has(cur)) continue;
      seen.add(cur);
      out.push(cur);
      const children = this.doc.nodes.get(cur)?.children ?? [];
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
    return out;
  }

  validate(): Result<Layout, InvalidOperationError> {
    const checked = validateDocument(this.doc);
    return checked.ok ? ok(this) : checked;
  }

  addRootWidget(id: WidgetId, config: WidgetConfig): Result<Layout> {
    return this.attachRoot(id, config, this.doc.rootNodes.length);
  }

  insertRootWidget(id: WidgetId, config: WidgetConfig, position: number): Result<Layout> {
    return this.attachRoot(id, config, position);
  }

  addChildWidget(parentId: WidgetId, childId: WidgetId, config: WidgetConfig): Result<Layout> {
    return this.attachChild(parentId, childId, config, null);
  }

  insertChildWidget(
    parentId: WidgetId,
    childId: WidgetId,
    config: WidgetConfig,
    position: number,
  ): Result<Layout> {
    return this.attachChild(parentId, childId, config, position);
  }

  /** Remove a widget and its whole subtree. */
  removeWidget(id: WidgetId): Result<Layout> {
    const node = this.doc.nodes.get(id);
    if (!node) return err(new WidgetNotFoundError(id));

    const nodes = new Map(this.doc.nodes);
    let rootNodes = this.doc.rootNodes;
    if (node.parent !== null) {
      const parent = nodes.get(node.parent);
      if (parent) {
        nodes.set(node.parent, freezeNode({ ...parent, children: parent.children.filter((c) => c !== id) }));
      }
    } else {
      rootNodes = Object.freeze(rootNodes.filter((r) => r !== id));
    }

    const visited = new Set<WidgetId>();
    const stack: WidgetId[] = [id];
    for (let cur = stack.pop(); cur !== undefined; cur = stack.pop()) {
      if (visited.has(cur)) return err(new InvalidOperationError(`Cycle detected at widget ${cur}`));
      visited.add(cur);
      for (const child of nodes.get(cur)?.children ?? []) stack.push(child);
    }
    for (const removed of visited) nodes.delete(removed);

    return ok(this.with({ nodes, rootNodes }));
  }

  moveWidgetUp(id: WidgetId): Result<Layout> {
    return this.shift(id, -1);
  }

  moveWidgetDown(id: WidgetId): Result<Layout> {
    return this.shift(id, 1);
  }

  updateWidgetConfig(id: WidgetId, config: WidgetConfig): Result<Layout> {
    const node = this.doc.nodes.get(id);
    if (!node) return err(new WidgetNotFoundError(id));
    if (configsEqual(node.config, config)) return ok(this);
    const nodes = new Map(this.doc.nodes);
    nodes.set(id, freezeNode({ ...node, config: freezeConfig(config) }));
    return ok(this.with({ nodes }));
  }

  setWidgetMetadata(id: WidgetId, key: string, value: JsonValue): Result<Layout> {
    const node = this.doc.nodes.get(id);
    if (!node) return err(new WidgetNotFoundError(id));
    if (Object.prototype.hasOwnProperty.call(node.metadata, key) && jsonEqual(node.metadata[key], value)) {
      return ok(this);
    }
    const metadata = deepFreezeJson({ ...node.metadata, [key]: cloneJson(value) });
    const nodes = new Map(this.doc.nodes);
    nodes.set(id, freezeNode({ ...node, metadata }));
    return ok(this.with({ nodes }));
  }

  setMetadata(key: string, value: JsonValue): Layout {
    const current = this.doc.metadata;
    if (Object.prototype.hasOwnProperty.call(current, key) && jsonEqual(current[key], value)) return this;
    return this.with({ metadata: deepFreezeJson({ ...current, [key]: cloneJson(value) }) });
  }

  private with(patch: Partial<LayoutDocument>): Layout {
    return new Layout(Object.freeze({ ...this.doc, ...patch }));
  }

  private attachRoot(id: WidgetId, config: WidgetConfig, position: number): Result<Layout> {
    if (id === RESERVED_WIDGET_ID) return err(reservedIdError());
    if (this.doc.nodes.has(id)) {
      return err(new InvalidOperationError(`Widget ${id} already exists`));
    }
    const nodes = new Map(this.doc.nodes);
    nodes.set(id, createNode(config, null));
    return ok(this.with({ nodes, rootNodes: insertAt(this.doc.rootNodes, id, position) }));
  }

  private attachChild(
    parentId: WidgetId,
    childId: WidgetId,
    config: WidgetConfig,
    position: number | null,
  ): Result<Layout> {
    if (childId === RESERVED_WIDGET_ID) return err(reservedIdError());
    const parent = this.doc.nodes.get(parentId);
    if (!parent) return err(new WidgetNotFoundError(parentId));
    const existing = this.doc.nodes.get(childId);
    if (existing) {
      // Children behave as a set: repeating an insert under the same parent is a no-op.
      if (existing.parent === parentId) return ok(this);
      return err(new InvalidOperationError(`Widget ${childId} already exists`));
    }
    const children = insertAt(parent.children, childId, position ?? parent.children.length);
    const nodes = new Map(this.doc.nodes);
    nodes.set(parentId, freezeNode({ ...parent, children }));
    nodes.set(childId, createNode(config, parentId));
    return ok(this.with({ nodes }));
  }

  private shift(id: WidgetId, delta: -1 | 1): Result<Layout> {
    const node = this.doc.nodes.get(id);
    if (!node) return err(new WidgetNotFoundError(id));

    if (node.parent !== null) {
      const parent = this.doc.nodes.get(node.parent);
      if (!parent) return err(new WidgetNotFoundError(node.parent));
      const pos = parent.children.indexOf(id);
      if (pos < 0) return err(new InvalidOperationError('Widget not found in parent'));
      const target = pos + delta;
      if (target < 0 || target >= parent.children.length) return ok(this);
      const nodes = new Map(this.doc.nodes);
      nodes.set(node.parent, freezeNode({ ...parent, children: swap(parent.children, pos, target) }));
      return ok(this.with({ nodes }));
    }

    const roots = this.doc.rootNodes;
    const pos = roots.indexOf(id);
    if (pos < 0) return err(new InvalidOperationError('Widget not found in roots'));
    const target = pos + delta;
    if (target < 0 || target >= roots.length) return ok(this);
    return ok(this.with({ rootNodes: swap(roots, pos, target) }));
  }
}
