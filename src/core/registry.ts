import type { WidgetConfig } from '../types';
import {
  InvalidOperationError,
  WidgetNotFoundError,
  err,
  ok,
  type InvalidConfigError,
  type Result,
} from './errors';

/**
 * Behaviour of one widget type. The layout itself only stores the type tag; renderers,
 * palettes and drop targets look the definition up here.
 */
export type WidgetDefinition = {
  readonly type: string;
  readonly displayName: string;
  readonly description: string;
  /** Whether drops and palette adds may nest widgets under this one. */
  readonly canHaveChildren: boolean;
  defaultConfig(): WidgetConfig;
  /** Returns an error for a config this widget cannot render. Absent means every config is accepted. */
  validateConfig?(config: WidgetConfig): InvalidConfigError | null;
};

export type WidgetRegistry = {
  register(definition: WidgetDefinition): Result<WidgetDefinition, InvalidOperationError>;
  createWidget(type: string): Result<WidgetDefinition, WidgetNotFoundError>;
  has(type: string): boolean;
  /** Registered type tags in registration order. */
  widgetTypes(): string[];
  readonly size: number;
};

export function createWidgetRegistry(definitions: readonly WidgetDefinition[] = []): WidgetRegistry {
  const byType = new Map<string, WidgetDefinition>();

  const registry: WidgetRegistry = {
    register(definition) {
      if (byType.has(definition.type)) {
        return err(new InvalidOperationError(`Widget type '${definition.type}' is already registered`));
      }
      byType.set(definition.type, definition);
      return ok(definition);
    },
    createWidget(type) {
      const definition = byType.get(type);
      return definition ? ok(definition) : err(new WidgetNotFoundError(type));
    },
    has: (type) => byType.has(type),
    widgetTypes: () => [...byType.keys()],
    get size() {
      return byType.size;
    },
  };

  // Duplicates in the initial list throw.
  for (const definition of definitions) {
    const registered = registry.register(definition);
    if (!registered.ok) throw registered.error;
  }
  return registry;
}
