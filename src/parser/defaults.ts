/**
 * Default parser options.
 *
 * @packageDocumentation
 */

import type { ParserOptions } from './types.js';

/** File extension tried for include paths written without one. */
export const DEFAULT_EXTENSION = '.cfgpp';

/**
 * Defaults: expand variables, follow includes up to ten levels deep from the
 * current directory, build the full value tree.
 */
export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  expandEnvVars: true,
  processIncludes: true,
  maxIncludeDepth: 10,
  includePaths: ['.'],
  syntaxOnly: false,
};

/**
 * Returns a fresh copy of the default options.
 */
export function getDefaultParserOptions(): ParserOptions {
  return { ...DEFAULT_PARSER_OPTIONS, includePaths: [...DEFAULT_PARSER_OPTIONS.includePaths] };
}
