/**
 * Schema module: type declarations, schema text reader and validator.
 *
 * @packageDocumentation
 */

export { Schema } from './schema.js';
export type { SchemaOptions } from './schema.js';
export { parseSchema, parseSchemaFile, parseTypeText } from './parser.js';
export { field, t, typeDefinitionName } from './types.js';
export type {
  ArrayType,
  Constraint,
  CustomConstraintHook,
  EnumType,
  FieldDefinition,
  FieldOptions,
  ObjectSchemaFields,
  ObjectType,
  OptionalType,
  PrimitiveKind,
  PrimitiveType,
  TypeDefinition,
  UnionType,
} from './types.js';
