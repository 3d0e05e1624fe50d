/**
 * Type definitions for CFG++ schemas.
 *
 * @packageDocumentation
 */

import type { Value } from '../value/index.js';

/** Primitive type kinds. */
export type PrimitiveKind = 'null' | 'boolean' | 'integer' | 'double' | 'string';

export interface PrimitiveType {
  readonly kind: PrimitiveKind;
}

/** Every element must match `element`. */
export interface ArrayType {
  readonly kind: 'array';
  readonly element: TypeDefinition;
}

/** Reference to a named object schema. */
export interface ObjectType {
  readonly kind: 'object';
  readonly name: string;
}

/** Reference to a named enum. */
export interface EnumType {
  readonly kind: 'enum';
  readonly name: string;
}

/** Matches when any member matches; members are tried in order. */
export interface UnionType {
  readonly kind: 'union';
  readonly members: readonly TypeDefinition[];
}

/** `null`, or a value of `inner`. */
export interface OptionalType {
  readonly kind: 'optional';
  readonly inner: TypeDefinition;
}

/**
 * Structural type a value is checked against.
 */
export type TypeDefinition =
  | PrimitiveType
  | ArrayType
  | ObjectType
  | EnumType
  | UnionType
  | OptionalType;

/**
 * Extra check applied to a value once its type has matched.
 *
 * Length bounds apply to strings (measured in UTF-8 bytes), value bounds to integers and doubles, and
 * `pattern` must match the whole string. `custom` names a hook registered with
 * the validator.
 */
export type Constraint =
  | { readonly kind: 'minLength'; readonly value: number }
  | { readonly kind: 'maxLength'; readonly value: number }
  | { readonly kind: 'minValue'; readonly value: number }
  | { readonly kind: 'maxValue'; readonly value: number }
  | { readonly kind: 'pattern'; readonly pattern: string }
  | { readonly kind: 'custom'; readonly name: string };

/**
 * Declaration of one object field.
 */
export interface FieldDefinition {
  readonly type: TypeDefinition;
  /** A missing required field is an error, default or not. */
  readonly required: boolean;
  /** Value filled in by `Schema.applyDefaults` when the field is absent. */
  readonly defaultValue?: Value;
  readonly constraints: readonly Constraint[];
}

/**
 * Fields of a named object schema.
 */
export type ObjectSchemaFields = ReadonlyMap<string, FieldDefinition>;

/**
 * Host-supplied check behind a `custom` constraint.
 *
 * @returns A failure message, or `undefined` when the value passes.
 */
export type CustomConstraintHook = (value: Value, path: string) => string | undefined;

/**
 * Options for {@link FieldDefinition} construction via {@link field}.
 */
export interface FieldOptions {
  /** @defaultValue true */
  readonly required?: boolean;
  readonly defaultValue?: Value;
  readonly constraints?: readonly Constraint[];
}

/**
 * Builds a field definition.
 *
 * @example
 * ```typescript
 * field(t.integer(), { constraints: [{ kind: 'minValue', value: 1 }] });
 * ```
 *
 * @param type - The field's type.
 * @param options - Requiredness, default and constraints.
 * @returns The field definition.
 */
export function field(type: TypeDefinition, options: FieldOptions = {}): FieldDefinition {
  return {
    type,
    required: options.required ?? true,
    constraints: [...(options.constraints ?? [])],
    ...(options.defaultValue !== undefined ? { defaultValue: options.defaultValue } : {}),
  };
}

/**
 * Type definition constructors.
 */
export const t = {
  null: (): PrimitiveType => ({ kind: 'null' }),
  boolean: (): PrimitiveType => ({ kind: 'boolean' }),
  integer: (): PrimitiveType => ({ kind: 'integer' }),
  double: (): PrimitiveType => ({ kind: 'double' }),
  string: (): PrimitiveType => ({ kind: 'string' }),
  array: (element: TypeDefinition): ArrayType => ({ kind: 'array', element }),
  object: (name: string): ObjectType => ({ kind: 'object', name }),
  enum: (name: string): EnumType => ({ kind: 'enum', name }),
  union: (...members: TypeDefinition[]): UnionType => ({ kind: 'union', members }),
  optional: (inner: TypeDefinition): OptionalType => ({ kind: 'optional', inner }),
} as const;

/**
 * Renders a type definition for messages, e.g. `array<object(Server)>`.
 *
 * @param type - The type to render.
 * @returns Its display form.
 */
export function typeDefinitionName(type: TypeDefinition): string {
  switch (type.kind) {
    case 'array':
      return `array<${typeDefinitionName(type.element)}>`;
    case 'optional':
      return `optional<${typeDefinitionName(type.inner)}>`;
    case 'object':
    case 'enum':
      return `${type.kind}(${type.name})`;
    case 'union':
      return `union(${type.members.map(typeDefinitionName).join(', ')})`;
    default:
      return type.kind;
  }
}
