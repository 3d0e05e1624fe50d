/**
 * Conversions between value trees and plain JavaScript data.
 *
 * @packageDocumentation
 */

import { ValueTypeError } from '../errors/index.js';
import { array, bool, double, int, nullValue, object, str } from './types.js';
import type { Value } from './types.js';

/**
 * Plain JavaScript form of a value tree.
 */
export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Renders a value in CFG++-like display form: strings quoted, enums bare,
 * arrays as `[a, b]` and objects as `{key: value, ...}`.
 *
 * @param value - Value to render.
 * @returns Display text.
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'boolean':
      return String(value.value);
    case 'integer':
      return value.value.toString();
    case 'double':
      return String(value.value);
    case 'string':
      return `"${value.value}"`;
    case 'enum':
      return value.value;
    case 'array':
      return `[${value.items.map(formatValue).join(', ')}]`;
    case 'object':
      return `{${[...value.entries].map(([key, child]) => `${key}: ${formatValue(child)}`).join(', ')}}`;
  }
}

/**
 * Converts a value tree into plain data.
 *
 * Objects become records, enums become their text, and integers become
 * `number` when they are safe integers and `bigint` otherwise.
 *
 * @param value - Tree to convert.
 * @returns Plain data equivalent of `value`.
 */
export function toPlain(value: Value): PlainValue {
  switch (value.type) {
    case 'null':
      return null;
    case 'boolean':
    case 'double':
    case 'string':
    case 'enum':
      return value.value;
    case 'integer': {
      const asNumber = Number(value.value);
      return Number.isSafeInteger(asNumber) ? asNumber : value.value;
    }
    case 'array':
      return value.items.map(toPlain);
    case 'object':
      return Object.fromEntries([...value.entries].map(([key, child]) => [key, toPlain(child)]));
  }
}

function isPlainRecord(input: object): input is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/** Constructor name of an object, or its `[object Tag]` text when it has none. */
function describeObject(input: object): string {
  const proto: unknown = Object.getPrototypeOf(input);
  if (typeof proto === 'object' && proto !== null && 'constructor' in proto) {
    const ctor: unknown = proto.constructor;
    if (typeof ctor === 'function' && ctor.name !== '') {
      return ctor.name;
    }
  }
  return Object.prototype.toString.call(input);
}

/**
 * Converts plain data into a value tree.
 *
 * Safe integers become integers, other numbers doubles. Strings never
 * become enums.
 *
 * @param input - Data to convert.
 * @returns The equivalent value tree.
 * @throws ValueTypeError for inputs with no value equivalent (functions,
 *   `undefined`, class instances, non-finite numbers, ...).
 */
export function fromPlain(input: unknown): Value {
  if (input === null) {
    return nullValue();
  }
  switch (typeof input) {
    case 'boolean':
      return bool(input);
    case 'string':
      return str(input);
    case 'bigint':
      return int(input);
    case 'number':
      if (!Number.isFinite(input)) {
        throw new ValueTypeError('finite number', String(input));
      }
      return Number.isSafeInteger(input) ? int(input) : double(input);
    case 'object':
      if (Array.isArray(input)) {
        return array(input.map((item: unknown) => fromPlain(item)));
      }
      if (isPlainRecord(input)) {
        return object(Object.entries(input).map(([key, child]) => [key, fromPlain(child)] as const));
      }
      throw new ValueTypeError('plain object', describeObject(input));
    default:
      throw new ValueTypeError('plain value', typeof input);
  }
}
