/**
 * Schema model and validator.
 *
 * A {@link Schema} holds named enums, named object schemas and an optional
 * root type. Validation walks a value tree against the root type and collects
 * every failure instead of stopping at the first one.
 *
 * @packageDocumentation
 */

import { SchemaValidationError } from '../errors/index.js';
import type { ValidationError } from '../errors/index.js';
import { array, cloneValue, object } from '../value/index.js';
import type { Value } from '../value/index.js';
import { typeDefinitionName } from './types.js';
import type {
  Constraint,
  CustomConstraintHook,
  FieldDefinition,
  ObjectSchemaFields,
  TypeDefinition,
} from './types.js';

/**
 * Options for a {@link Schema}.
 */
export interface SchemaOptions {
  /**
   * Hooks consulted by `custom` constraints, keyed by constraint name.
   * A constraint naming an unregistered hook passes.
   */
  readonly customConstraints?: Readonly<Record<string, CustomConstraintHook>>;
}

function joinPath(path: string, key: string): string {
  return path === '' ? key : `${path}.${key}`;
}

/**
 * Named type declarations plus the validator over them.
 *
 * @example
 * ```typescript
 * const schema = new Schema()
 *   .addEnum('Level', ['debug', 'info'])
 *   .addObjectSchema('Logging', { level: field(t.enum('Level')) })
 *   .setRootType(t.object('Logging'));
 * schema.validate(parse('level = trace')); // one "Invalid enum value" error
 * ```
 */
export class Schema {
  private readonly enums = new Map<string, readonly string[]>();
  private readonly objectSchemas = new Map<string, ObjectSchemaFields>();
  private readonly customConstraints = new Map<string, CustomConstraintHook>();
  private rootType: TypeDefinition | undefined;

  /**
   * Creates an empty schema.
   *
   * @param options - Custom constraint hooks.
   */
  constructor(options: SchemaOptions = {}) {
    for (const [name, hook] of Object.entries(options.customConstraints ?? {})) {
      this.customConstraints.set(name, hook);
    }
  }

  /**
   * Declares an enum. Redeclaring a name replaces it.
   */
  addEnum(name: string, values: readonly string[]): this {
    this.enums.set(name, [...values]);
    return this;
  }

  /**
   * Declares an object schema. Redeclaring a name replaces it.
   *
   * @param name - Schema name referenced by `object(name)` types.
   * @param fields - Field declarations keyed by field name.
   */
  addObjectSchema(name: string, fields: Readonly<Record<string, FieldDefinition>>): this {
    this.objectSchemas.set(name, new Map(Object.entries(fields)));
    return this;
  }

  /**
   * Sets the type the whole tree is validated against.
   */
  setRootType(type: TypeDefinition): this {
    this.rootType = type;
    return this;
  }

  /**
   * Registers the hook behind `custom` constraints named `name`.
   */
  registerCustomConstraint(name: string, hook: CustomConstraintHook): this {
    this.customConstraints.set(name, hook);
    return this;
  }

  getEnum(name: string): readonly string[] | undefined {
    return this.enums.get(name);
  }

  getObjectSchema(name: string): ObjectSchemaFields | undefined {
    return this.objectSchemas.get(name);
  }

  getRootType(): TypeDefinition | undefined {
    return this.rootType;
  }

  /** Names of the declared enums, in declaration order. */
  enumNames(): string[] {
    return [...this.enums.keys()];
  }

  /** Names of the declared object schemas, in declaration order. */
  objectSchemaNames(): string[] {
    return [...this.objectSchemas.keys()];
  }

  /**
   * Validates a tree against the root type.
   *
   * Without a root type every tree is accepted.
   *
   * @param value - The tree to check.
   * @returns Every failure found; empty when the tree is valid.
   */
  validate(value: Value): ValidationError[] {
    const errors: ValidationError[] = [];
    if (this.rootType !== undefined) {
      this.validateType(value, this.rootType, '', errors);
    }
    return errors;
  }

  /**
   * Validates one value against a field declaration: its type first, then its
   * constraints if the type matched.
   *
   * @param value - The field's value.
   * @param definition - The field declaration.
   * @param path - Locator used in error records.
   * @returns Every failure found.
   */
  validateField(value: Value, definition: FieldDefinition, path = ''): ValidationError[] {
    const errors: ValidationError[] = [];
    this.checkField(value, definition, path, errors);
    return errors;
  }

  /**
   * Validates a tree and throws when it is invalid.
   *
   * @throws SchemaValidationError carrying every failure.
   */
  assertValid(value: Value): void {
    const errors = this.validate(value);
    if (errors.length > 0) {
      throw new SchemaValidationError(errors);
    }
  }

  /**
   * Returns a copy of the tree with absent fields that declare a default
   * filled in, following the root type. The input is not modified.
   *
   * @param value - The tree to complete.
   * @returns The completed copy.
   */
  applyDefaults(value: Value): Value {
    return this.rootType === undefined ? cloneValue(value) : this.fillDefaults(value, this.rootType);
  }

  private validateType(
    value: Value,
    type: TypeDefinition,
    path: string,
    errors: ValidationError[]
  ): void {
    switch (type.kind) {
      case 'null':
      case 'boolean':
      case 'integer':
      case 'double':
      case 'string':
        if (value.type !== type.kind) {
          errors.push(this.mismatch(value, type, path));
        }
        return;

      case 'array':
        if (value.type !== 'array') {
          errors.push(this.mismatch(value, type, path));
          return;
        }
        value.items.forEach((item, index) => {
          this.validateType(item, type.element, `${path}[${String(index)}]`, errors);
        });
        return;

      case 'object': {
        // Schema text cannot tell enum references from object references.
        if (value.type === 'enum' && this.enums.has(type.name)) {
          this.validateEnum(value.value, type.name, path, errors);
          return;
        }
        if (value.type !== 'object') {
          errors.push(this.mismatch(value, type, path));
          return;
        }
        const fields = this.objectSchemas.get(type.name);
        if (fields === undefined) {
          errors.push({
            path,
            message: `Unknown object schema '${type.name}'`,
            expectedType: typeDefinitionName(type),
            actualType: value.type,
          });
          return;
        }
        this.validateObject(value.entries, fields, path, errors);
        return;
      }

      case 'enum':
        if (value.type !== 'enum') {
          errors.push(this.mismatch(value, type, path));
          return;
        }
        this.validateEnum(value.value, type.name, path, errors);
        return;

      case 'union':
        for (const member of type.members) {
          const memberErrors: ValidationError[] = [];
          this.validateType(value, member, path, memberErrors);
          if (memberErrors.length === 0) {
            return;
          }
        }
        errors.push({
          path,
          message: 'Value does not match any type in union',
          expectedType: typeDefinitionName(type),
          actualType: value.type,
        });
        return;

      case 'optional':
        if (value.type !== 'null') {
          this.validateType(value, type.inner, path, errors);
        }
        return;
    }
  }

  private validateObject(
    entries: ReadonlyMap<string, Value>,
    fields: ObjectSchemaFields,
    path: string,
    errors: ValidationError[]
  ): void {
    for (const [name, definition] of fields) {
      const fieldPath = joinPath(path, name);
      const child = entries.get(name);
      if (child !== undefined) {
        this.checkField(child, definition, fieldPath, errors);
      } else if (definition.required) {
        errors.push({
          path: fieldPath,
          message: `Required field '${name}' is missing`,
          expectedType: typeDefinitionName(definition.type),
        });
      }
    }

    for (const [key, child] of entries) {
      if (!fields.has(key)) {
        errors.push({
          path: joinPath(path, key),
          message: `Unexpected field '${key}'`,
          actualType: child.type,
        });
      }
    }
  }

  private validateEnum(text: string, name: string, path: string, errors: ValidationError[]): void {
    const allowed = this.enums.get(name);
    if (allowed === undefined) {
      errors.push({
        path,
        message: `Unknown enum type '${name}'`,
        expectedType: `enum(${name})`,
        actualType: 'enum',
      });
      return;
    }
    if (!allowed.includes(text)) {
      errors.push({
        path,
        message: `Invalid enum value '${text}', expected one of: ${allowed.join(', ')}`,
        expectedType: `enum(${name})`,
        actualType: `enum(${text})`,
      });
    }
  }

  private checkField(
    value: Value,
    definition: FieldDefinition,
    path: string,
    errors: ValidationError[]
  ): void {
    const before = errors.length;
    this.validateType(value, definition.type, path, errors);
    if (errors.length > before) {
      return;
    }
    for (const constraint of definition.constraints) {
      this.checkConstraint(value, constraint, path, errors);
    }
  }

  private checkConstraint(
    value: Value,
    constraint: Constraint,
    path: string,
    errors: ValidationError[]
  ): void {
    const fail = (message: string): void => {
      errors.push({ path, message });
    };

    switch (constraint.kind) {
      case 'minLength':
      case 'maxLength': {
        if (value.type !== 'string') {
          return;
        }
        const length = Buffer.byteLength(value.value, 'utf8');
        if (constraint.kind === 'minLength' && length < constraint.value) {
          fail(`String length ${String(length)} is less than minimum ${String(constraint.value)}`);
        } else if (constraint.kind === 'maxLength' && length > constraint.value) {
          fail(`String length ${String(length)} exceeds maximum ${String(constraint.value)}`);
        }
        return;
      }

      case 'minValue':
      case 'maxValue': {
        const numeric =
          value.type === 'integer' ? Number(value.value) : value.type === 'double' ? value.value : undefined;
        if (numeric === undefined) {
          return;
        }
        if (constraint.kind === 'minValue' && numeric < constraint.value) {
          fail(`Value ${String(numeric)} is less than minimum ${String(constraint.value)}`);
        } else if (constraint.kind === 'maxValue' && numeric > constraint.value) {
          fail(`Value ${String(numeric)} exceeds maximum ${String(constraint.value)}`);
        }
        return;
      }

      case 'pattern': {
        if (value.type !== 'string') {
          return;
        }
        let regex: RegExp;
        try {
          regex = new RegExp(`^(?:${constraint.pattern})$`);
        } catch (error) {
          if (error instanceof SyntaxError) {
            fail(`Invalid pattern ${constraint.pattern}: ${error.message}`);
            return;
          }
          throw error;
        }
        if (!regex.test(value.value)) {
          fail(`String '${value.value}' does not match pattern ${constraint.pattern}`);
        }
        return;
      }

      case 'custom': {
        const hook = this.customConstraints.get(constraint.name);
        const failure = hook?.(value, path);
        if (failure !== undefined) {
          fail(failure);
        }
        return;
      }
    }
  }

  private mismatch(value: Value, type: TypeDefinition, path: string): ValidationError {
    return {
      path,
      message: 'Type mismatch',
      expectedType: typeDefinitionName(type),
      actualType: value.type,
    };
  }

  private fillDefaults(value: Value, type: TypeDefinition): Value {
    switch (type.kind) {
      case 'array':
        if (value.type !== 'array') {
          return cloneValue(value);
        }
        return array(value.items.map((item) => this.fillDefaults(item, type.element)));

      case 'optional':
        return value.type === 'null' ? value : this.fillDefaults(value, type.inner);

      case 'union': {
        const member = type.members.find((candidate) => {
          const memberErrors: ValidationError[] = [];
          this.validateType(value, candidate, '', memberErrors);
          return memberErrors.length === 0;
        });
        return member === undefined ? cloneValue(value) : this.fillDefaults(value, member);
      }

      case 'object': {
        const fields = this.objectSchemas.get(type.name);
        if (value.type !== 'object' || fields === undefined) {
          return cloneValue(value);
        }
        const result = object();
        for (const [key, child] of value.entries) {
          const definition = fields.get(key);
          result.entries.set(
            key,
            definition === undefined ? cloneValue(child) : this.fillDefaults(child, definition.type)
          );
        }
        for (const [key, definition] of fields) {
          if (!result.entries.has(key) && definition.defaultValue !== undefined) {
            result.entries.set(key, cloneValue(definition.defaultValue));
          }
        }
        return result;
      }

      default:
        return cloneValue(value);
    }
  }
}
