/**
 * Error hierarchy for CFG++ parsing, value access and schema validation.
 *
 * Lexing and parsing fail fast with one of these errors; schema validation
 * collects {@link ValidationError} records instead and only throws
 * {@link SchemaValidationError} when asked to assert.
 *
 * @packageDocumentation
 */

/**
 * Discriminator carried by every CFG++ error.
 */
export type CfgppErrorCode =
  | 'syntax'
  | 'type'
  | 'key_not_found'
  | 'index_out_of_bounds'
  | 'io'
  | 'include'
  | 'env_var'
  | 'schema_parse'
  | 'schema_validation'
  | 'parse';

/**
 * Individual schema validation failure.
 */
export interface ValidationError {
  /** Dotted/bracketed locator of the offending value, e.g. `servers[0].port`. */
  readonly path: string;
  /** Human-readable description of the failure. */
  readonly message: string;
  /** Name of the expected type, when the failure is a type mismatch. */
  readonly expectedType?: string;
  /** Name of the type actually found. */
  readonly actualType?: string;
}

/**
 * Formats a validation error for display.
 *
 * @param error - The validation error.
 * @returns `Validation error at '<path>': <message>`.
 */
export function formatValidationError(error: ValidationError): string {
  return `Validation error at '${error.path}': ${error.message}`;
}

/**
 * Base class for all errors raised by this package.
 */
export class CfgppError extends Error {
  /** Kind of failure. */
  public readonly code: CfgppErrorCode;

  /**
   * Creates a new CfgppError.
   *
   * @param code - Kind of failure.
   * @param message - Descriptive error message.
   */
  constructor(code: CfgppErrorCode, message: string) {
    super(message);
    this.name = 'CfgppError';
    this.code = code;
  }
}

/**
 * Lexical or grammatical error at a source position.
 */
export class CfgppSyntaxError extends CfgppError {
  /** 1-based line of the offending token. */
  public readonly line: number;
  /** 1-based column of the offending token. */
  public readonly column: number;
  /** The message without position information. */
  public readonly reason: string;
  /** File the text came from, when it was read from disk. */
  public readonly file: string | undefined;

  /**
   * Creates a new CfgppSyntaxError.
   *
   * @param reason - What went wrong.
   * @param line - 1-based line.
   * @param column - 1-based column.
   * @param file - Source file, if known.
   */
  constructor(reason: string, line: number, column: number, file?: string) {
    const location = file === undefined ? '' : ` in ${file}`;
    super(
      'syntax',
      `Syntax error${location} at line ${String(line)}, column ${String(column)}: ${reason}`
    );
    this.name = 'CfgppSyntaxError';
    this.reason = reason;
    this.line = line;
    this.column = column;
    this.file = file;
  }

  /**
   * Returns a copy of this error attributed to a source file.
   *
   * @param file - Path of the file the text was read from.
   */
  inFile(file: string): CfgppSyntaxError {
    return new CfgppSyntaxError(this.reason, this.line, this.column, file);
  }
}

/**
 * A value operation was applied to the wrong kind of value.
 */
export class ValueTypeError extends CfgppError {
  /** The kind the operation needed. */
  public readonly expected: string;
  /** The kind it was given. */
  public readonly actual: string;

  /**
   * Creates a new ValueTypeError.
   *
   * @param expected - The kind the operation needed.
   * @param actual - The kind it was given.
   */
  constructor(expected: string, actual: string) {
    super('type', `Type error: expected ${expected}, found ${actual}`);
    this.name = 'ValueTypeError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * An object key required by a path lookup is absent.
 */
export class KeyNotFoundError extends CfgppError {
  public readonly key: string;

  constructor(key: string) {
    super('key_not_found', `Key not found: ${key}`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * An array index required by a path lookup is outside the array.
 */
export class IndexOutOfBoundsError extends CfgppError {
  public readonly index: number;

  constructor(index: number) {
    super('index_out_of_bounds', `Index out of bounds: ${String(index)}`);
    this.name = 'IndexOutOfBoundsError';
    this.index = index;
  }
}

/**
 * Reading a configuration or schema file failed.
 */
export class IoError extends CfgppError {
  /** The underlying error, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new IoError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super('io', `I/O error: ${message}`);
    this.name = 'IoError';
    this.cause = cause;
  }
}

/**
 * An include directive could not be resolved or was refused.
 */
export class IncludeError extends CfgppError {
  /** Path as written in the directive. */
  public readonly path: string;
  /** Why the include failed. */
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super('include', `Include error: ${path} - ${reason}`);
    this.name = 'IncludeError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * An environment variable reference without default could not be resolved.
 */
export class EnvVarError extends CfgppError {
  /** Name of the variable. */
  public readonly variable: string;
  public readonly reason: string;

  constructor(variable: string, reason: string) {
    super('env_var', `Environment variable error: ${variable} - ${reason}`);
    this.name = 'EnvVarError';
    this.variable = variable;
    this.reason = reason;
  }
}

/**
 * Schema definition text is malformed.
 */
export class SchemaParseError extends CfgppError {
  /** 1-based line of the schema text where parsing failed. */
  public readonly line: number;

  constructor(message: string, line: number) {
    super('schema_parse', `Schema parse error at line ${String(line)}: ${message}`);
    this.name = 'SchemaParseError';
    this.line = line;
  }
}

/**
 * Raised by `Schema.assertValid` when validation produced errors.
 */
export class SchemaValidationError extends CfgppError {
  /** Every failure found, in discovery order. */
  public readonly errors: readonly ValidationError[];

  /**
   * Creates a new SchemaValidationError.
   *
   * @param errors - The collected validation failures.
   */
  constructor(errors: readonly ValidationError[]) {
    const summary = errors.map(formatValidationError).join('\n');
    super(
      'schema_validation',
      `Schema validation failed with ${String(errors.length)} error(s):\n${summary}`
    );
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

/**
 * Generic parse failure without a source position.
 */
export class ParseError extends CfgppError {
  constructor(message: string) {
    super('parse', `Parse error: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * Type guard for errors raised by this package.
 *
 * @param error - Any caught value.
 * @returns True if `error` is a {@link CfgppError}.
 */
export function isCfgppError(error: unknown): error is CfgppError {
  return error instanceof CfgppError;
}
