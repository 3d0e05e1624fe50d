/**
 * Accessors and mutators over the value tree.
 *
 * Lookups never throw: asking an object for an index, or a scalar for a key,
 * yields `undefined` exactly like a missing key does. Mutators throw
 * {@link ValueTypeError} when applied to the wrong container.
 *
 * @packageDocumentation
 */

import { IndexOutOfBoundsError, KeyNotFoundError, ValueTypeError } from '../errors/index.js';
import type { Value } from './types.js';

/**
 * Looks up a key on an object value.
 *
 * @param value - Any value.
 * @param key - Key to look up.
 * @returns The child, or `undefined` if `value` is not an object or lacks `key`.
 */
export function get(value: Value, key: string): Value | undefined {
  return value.type === 'object' ? value.entries.get(key) : undefined;
}

/**
 * Looks up an index on an array value.
 *
 * @param value - Any value.
 * @param index - 0-based index.
 * @returns The element, or `undefined` if `value` is not an array or too short.
 */
export function getIndex(value: Value, index: number): Value | undefined {
  if (value.type !== 'array' || !Number.isInteger(index) || index < 0) {
    return undefined;
  }
  return value.items[index];
}

/** One step of a parsed path. */
type PathStep =
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'index'; readonly index: number };

const INDEXED_SEGMENT = /^([^[\]]*)((?:\[\d+\])+)$/;
const INDEX = /\[(\d+)\]/g;

/**
 * Splits a path such as `servers[0].ports[1]` into key and index steps.
 *
 * A segment that does not end in well-formed `[n]` suffixes is taken as a
 * literal key.
 */
function parsePath(path: string): PathStep[] {
  const steps: PathStep[] = [];

  for (const segment of path.split('.')) {
    const match = INDEXED_SEGMENT.exec(segment);
    if (match === null) {
      steps.push({ kind: 'key', key: segment });
      continue;
    }

    const [, field = '', suffix = ''] = match;
    if (field !== '') {
      steps.push({ kind: 'key', key: field });
    }
    for (const [, digits = ''] of suffix.matchAll(INDEX)) {
      steps.push({ kind: 'index', index: Number(digits) });
    }
  }

  return steps;
}

/**
 * Navigates a dotted/bracketed path.
 *
 * @example
 * ```typescript
 * getPath(config, 'database.host');
 * getPath(config, 'servers[0].name');
 * ```
 *
 * @param value - Root of the traversal.
 * @param path - Dot-separated keys, each optionally followed by `[n]` indices.
 * @returns The value at `path`, or `undefined` at the first missing step.
 */
export function getPath(value: Value, path: string): Value | undefined {
  let current: Value | undefined = value;
  for (const step of parsePath(path)) {
    if (current === undefined) {
      return undefined;
    }
    current = step.kind === 'key' ? get(current, step.key) : getIndex(current, step.index);
  }
  return current;
}

/**
 * Navigates a path like {@link getPath} but reports what was missing.
 *
 * @param value - Root of the traversal.
 * @param path - Path to follow.
 * @returns The value at `path`.
 * @throws KeyNotFoundError when a key step is missing.
 * @throws IndexOutOfBoundsError when an index step is missing.
 */
export function requirePath(value: Value, path: string): Value {
  let current = value;
  for (const step of parsePath(path)) {
    if (step.kind === 'key') {
      const next = get(current, step.key);
      if (next === undefined) {
        throw new KeyNotFoundError(step.key);
      }
      current = next;
    } else {
      const next = getIndex(current, step.index);
      if (next === undefined) {
        throw new IndexOutOfBoundsError(step.index);
      }
      current = next;
    }
  }
  return current;
}

/**
 * Sets a key on an object value, replacing any earlier entry.
 *
 * @param target - Object to mutate.
 * @param key - Key to set.
 * @param child - New value.
 * @throws ValueTypeError if `target` is not an object.
 */
export function set(target: Value, key: string, child: Value): void {
  if (target.type !== 'object') {
    throw new ValueTypeError('object', target.type);
  }
  target.entries.set(key, child);
}

/**
 * Appends an element to an array value.
 *
 * @param target - Array to mutate.
 * @param child - Element to append.
 * @throws ValueTypeError if `target` is not an array.
 */
export function push(target: Value, child: Value): void {
  if (target.type !== 'array') {
    throw new ValueTypeError('array', target.type);
  }
  target.items.push(child);
}

/**
 * Number of elements or entries.
 *
 * @returns The count for arrays and objects, and 0 for every scalar.
 */
export function len(value: Value): number {
  switch (value.type) {
    case 'array':
      return value.items.length;
    case 'object':
      return value.entries.size;
    default:
      return 0;
  }
}

/**
 * Whether an array or object has no children.
 *
 * @returns `false` for every scalar.
 */
export function isEmpty(value: Value): boolean {
  switch (value.type) {
    case 'array':
      return value.items.length === 0;
    case 'object':
      return value.entries.size === 0;
    default:
      return false;
  }
}

export function asBoolean(value: Value): boolean | undefined {
  return value.type === 'boolean' ? value.value : undefined;
}

export function asInteger(value: Value): bigint | undefined {
  return value.type === 'integer' ? value.value : undefined;
}

export function asDouble(value: Value): number | undefined {
  return value.type === 'double' ? value.value : undefined;
}

/**
 * Text of a string or enum value.
 */
export function asString(value: Value): string | undefined {
  return value.type === 'string' || value.type === 'enum' ? value.value : undefined;
}

export function asArray(value: Value): Value[] | undefined {
  return value.type === 'array' ? value.items : undefined;
}

export function asObject(value: Value): Map<string, Value> | undefined {
  return value.type === 'object' ? value.entries : undefined;
}
