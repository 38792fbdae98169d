export type LayoutErrorKind =
  | 'not-found'
  | 'invalid-operation'
  | 'invalid-config'
  | 'serialization'
  | 'deserialization';

export abstract class LayoutError extends Error {
  abstract readonly kind: LayoutErrorKind;
}

/** A referenced widget (or widget type, for registry lookups) is absent. */
export class WidgetNotFoundError extends LayoutError {
  readonly kind = 'not-found';
  constructor(readonly id: string) {
    super(`Widget not found: ${id}`);
    this.name = 'WidgetNotFoundError';
  }
}

export class InvalidOperationError extends LayoutError {
  readonly kind = 'invalid-operation';
  constructor(detail: string) {
    super(`Invalid operation: ${detail}`);
    this.name = 'InvalidOperationError';
  }
}

export class InvalidConfigError extends LayoutError {
  readonly kind = 'invalid-config';
  constructor(detail: string) {
    super(`Invalid widget configuration: ${detail}`);
    this.name = 'InvalidConfigError';
  }
}

export class SerializationError extends LayoutError {
  readonly kind = 'serialization';
  constructor(detail: string) {
    super(`Serialization error: ${detail}`);
    this.name = 'SerializationError';
  }
}

export class DeserializationError extends LayoutError {
  readonly kind = 'deserialization';
  constructor(detail: string) {
    super(`Deserialization error: ${detail}`);
    this.name = 'DeserializationError';
  }
}

export type Result<T, E extends LayoutError = LayoutError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends LayoutError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
