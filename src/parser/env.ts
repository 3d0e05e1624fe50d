/**
 * Environment access for the parser.
 *
 * Two concerns live here: the default lookup used for `${NAME}` expansion,
 * and CFGPP_* environment variables that override parser options.
 *
 * Override precedence: explicit options > env > defaults
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { DEFAULT_PARSER_OPTIONS } from './defaults.js';
import type { EnvLookup, EnvRecord, ParserOptions, PartialParserOptions } from './types.js';

/**
 * Gets the default environment from Node.js process.env.
 * Returns an empty object if process is not available.
 */
function getDefaultEnv(): EnvRecord {
  const globalProcess = (globalThis as { process?: { env?: EnvRecord } }).process;
  return globalProcess?.env ?? {};
}

/**
 * Creates an {@link EnvLookup} over an environment record.
 *
 * @param env - The record to read (defaults to process.env, read at lookup time).
 * @returns A lookup function.
 */
export function envLookupFrom(env?: EnvRecord): EnvLookup {
  return (name) => (env ?? getDefaultEnv())[name];
}

/**
 * Lookup over the live process environment.
 */
export const processEnvLookup: EnvLookup = envLookupFrom();

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type MutableParserOptions = { -readonly [K in keyof ParserOptions]?: ParserOptions[K] };

/**
 * How one CFGPP_* variable maps onto the options.
 */
interface EnvVarMapping {
  readonly description: string;
  readonly type: 'boolean' | 'integer' | 'path list';
  readonly apply: (target: MutableParserOptions, raw: string, envVar: string) => void;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to a non-negative integer.
 *
 * @throws EnvCoercionError if the value is empty, fractional or negative.
 */
function coerceToCount(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'integer', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (!Number.isInteger(num) || num < 0) {
    throw new EnvCoercionError(envVar, value, 'non-negative integer');
  }

  return num;
}

/**
 * Splits a search path on the platform delimiter (`:` on POSIX, `;` on Windows).
 */
function coerceToPathList(value: string): string[] {
  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  CFGPP_EXPAND_ENV_VARS: {
    description: 'Enable or disable ${NAME} expansion (true/false)',
    type: 'boolean',
    apply: (target, raw, envVar) => {
      target.expandEnvVars = coerceToBoolean(raw, envVar);
    },
  },
  CFGPP_PROCESS_INCLUDES: {
    description: 'Enable or disable @include/@import directives (true/false)',
    type: 'boolean',
    apply: (target, raw, envVar) => {
      target.processIncludes = coerceToBoolean(raw, envVar);
    },
  },
  CFGPP_MAX_INCLUDE_DEPTH: {
    description: 'Override the maximum include nesting depth',
    type: 'integer',
    apply: (target, raw, envVar) => {
      target.maxIncludeDepth = coerceToCount(raw, envVar);
    },
  },
  CFGPP_INCLUDE_PATH: {
    description: `Include search roots, separated by '${path.delimiter}'`,
    type: 'path list',
    apply: (target, raw) => {
      target.includePaths = coerceToPathList(raw);
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Options taken from environment variables. */
  overrides: PartialParserOptions;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads CFGPP_* environment variables into parser option overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ CFGPP_MAX_INCLUDE_DEPTH: '3' });
 * // overrides.maxIncludeDepth === 3
 * ```
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError on the first bad value unless `collectErrors` is set.
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: MutableParserOptions = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Builds complete parser options from explicit settings, the environment and
 * the defaults, in that order of precedence.
 *
 * @param explicit - Options given in code.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Complete options.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function resolveParserOptions(
  explicit: PartialParserOptions = {},
  env: EnvRecord = getDefaultEnv()
): ParserOptions {
  const { overrides } = readEnvOverrides(env);
  return mergeParserOptions(mergeParserOptions(DEFAULT_PARSER_OPTIONS, overrides), explicit);
}

/**
 * Merges defined fields of `partial` over `base`.
 *
 * @param base - Complete options.
 * @param partial - Fields to override; `undefined` fields are ignored.
 * @returns A new options object.
 */
export function mergeParserOptions(base: ParserOptions, partial: PartialParserOptions): ParserOptions {
  return {
    expandEnvVars: partial.expandEnvVars ?? base.expandEnvVars,
    processIncludes: partial.processIncludes ?? base.processIncludes,
    maxIncludeDepth: partial.maxIncludeDepth ?? base.maxIncludeDepth,
    includePaths: [...(partial.includePaths ?? base.includePaths)],
    syntaxOnly: partial.syntaxOnly ?? base.syntaxOnly,
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, { description, type }]) => [
      envVar,
      { description, type },
    ])
  );
}
