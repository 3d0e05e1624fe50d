/**
 * Option types for the CFG++ parser.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * Behavioral switches for a {@link Parser}.
 */
export interface ParserOptions {
  /** Substitute `${NAME}` references; when false the raw text becomes a string. */
  readonly expandEnvVars: boolean;
  /** Follow `@include` / `@import`; when false a directive is a syntax error. */
  readonly processIncludes: boolean;
  /** Deepest include nesting allowed before failing with an IncludeError. */
  readonly maxIncludeDepth: number;
  /** Ordered roots searched for included files. */
  readonly includePaths: readonly string[];
  /** Check grammar only: build nothing and read no environment; includes are still checked. */
  readonly syntaxOnly: boolean;
}

/**
 * Any subset of {@link ParserOptions}.
 */
export type PartialParserOptions = Partial<ParserOptions>;

/**
 * Environment lookup capability used for `${NAME}` expansion.
 *
 * @returns The variable's text, or `undefined` when it is unset.
 */
export type EnvLookup = (name: string) => string | undefined;

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Everything a {@link Parser} can be constructed with.
 */
export interface ParserConfig extends PartialParserOptions {
  /**
   * Source of environment variable values.
   * @defaultValue reads `process.env`
   */
  readonly env?: EnvLookup;
  /**
   * Logger receiving include and expansion events at debug level.
   */
  readonly logger?: Logger;
}
