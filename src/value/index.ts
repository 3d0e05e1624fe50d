/**
 * Value module: the typed tree produced by the parser and consumed by the
 * schema validator.
 *
 * @packageDocumentation
 */

export {
  array,
  bool,
  cloneValue,
  double,
  enumValue,
  int,
  isInt64,
  nullValue,
  object,
  str,
  typeName,
} from './types.js';
export type {
  ArrayValue,
  BooleanValue,
  DoubleValue,
  EnumValue,
  IntegerValue,
  NullValue,
  ObjectValue,
  StringValue,
  Value,
  ValueType,
} from './types.js';
export {
  asArray,
  asBoolean,
  asDouble,
  asInteger,
  asObject,
  asString,
  get,
  getIndex,
  getPath,
  isEmpty,
  len,
  push,
  requirePath,
  set,
} from './access.js';
export { formatValue, fromPlain, toPlain } from './convert.js';
export type { PlainValue } from './convert.js';
