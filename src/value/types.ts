/**
 * The CFG++ value tree.
 *
 * A value is a closed union discriminated on `type`. Arrays and objects own
 * their children exclusively; the parser never produces shared sub-trees or
 * cycles.
 *
 * @packageDocumentation
 */

import { ValueTypeError } from '../errors/index.js';

/** The `null` literal. */
export interface NullValue {
  readonly type: 'null';
}

export interface BooleanValue {
  readonly type: 'boolean';
  readonly value: boolean;
}

/**
 * A 64-bit signed integer. Carried as `bigint` so values beyond
 * `Number.MAX_SAFE_INTEGER` survive unchanged.
 */
export interface IntegerValue {
  readonly type: 'integer';
  readonly value: bigint;
}

export interface DoubleValue {
  readonly type: 'double';
  readonly value: number;
}

export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

/** A bare identifier used as a value, e.g. `level = debug`. */
export interface EnumValue {
  readonly type: 'enum';
  readonly value: string;
}

/** Ordered sequence of values; order is preserved exactly as written. */
export interface ArrayValue {
  readonly type: 'array';
  readonly items: Value[];
}

/** Mapping of unique keys to values; key order carries no meaning. */
export interface ObjectValue {
  readonly type: 'object';
  readonly entries: Map<string, Value>;
}

/**
 * Any CFG++ value.
 */
export type Value =
  | NullValue
  | BooleanValue
  | IntegerValue
  | DoubleValue
  | StringValue
  | EnumValue
  | ArrayValue
  | ObjectValue;

/**
 * Name of a value variant.
 */
export type ValueType = Value['type'];

/**
 * Name of a value's variant, as used in error messages.
 */
export function typeName(value: Value): ValueType {
  return value.type;
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Checks whether an integer fits the signed 64-bit range.
 *
 * @param value - Integer to check.
 * @returns True if `value` is representable as an int64.
 */
export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

const NULL_VALUE: NullValue = { type: 'null' };

export function nullValue(): NullValue {
  return NULL_VALUE;
}

export function bool(value: boolean): BooleanValue {
  return { type: 'boolean', value };
}

/**
 * Creates an integer value.
 *
 * @param value - An integral number or a bigint.
 * @returns The integer value.
 * @throws ValueTypeError if `value` is not integral or exceeds the int64 range.
 */
export function int(value: number | bigint): IntegerValue {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new ValueTypeError('integer', 'double');
  }
  const big = typeof value === 'bigint' ? value : BigInt(value);
  if (!isInt64(big)) {
    throw new ValueTypeError('64-bit integer', `out-of-range integer ${big.toString()}`);
  }
  return { type: 'integer', value: big };
}

export function double(value: number): DoubleValue {
  return { type: 'double', value };
}

export function str(value: string): StringValue {
  return { type: 'string', value };
}

export function enumValue(value: string): EnumValue {
  return { type: 'enum', value };
}

export function array(items: Value[] = []): ArrayValue {
  return { type: 'array', items };
}

/**
 * Creates an object value.
 *
 * @param entries - Initial key/value pairs; a later duplicate key wins.
 * @returns The object value.
 */
export function object(entries: Iterable<readonly [string, Value]> = []): ObjectValue {
  return { type: 'object', entries: new Map(entries) };
}

/**
 * Deep-copies a value tree.
 *
 * @param value - Tree to copy.
 * @returns A tree equal to `value` sharing no containers with it.
 */
export function cloneValue(value: Value): Value {
  switch (value.type) {
    case 'array':
      return array(value.items.map(cloneValue));
    case 'object':
      return object([...value.entries].map(([key, child]) => [key, cloneValue(child)] as const));
    default:
      return value;
  }
}
