/**
 * Parser module: builds value trees from CFG++ text and files.
 *
 * @packageDocumentation
 */

export { Parser, parse, parseFile, parseFiles, validateSyntax } from './parser.js';
export { DEFAULT_EXTENSION, DEFAULT_PARSER_OPTIONS, getDefaultParserOptions } from './defaults.js';
export {
  EnvCoercionError,
  envLookupFrom,
  getEnvVarDocumentation,
  mergeParserOptions,
  processEnvLookup,
  readEnvOverrides,
  resolveParserOptions,
} from './env.js';
export type { EnvOverrideResult } from './env.js';
export { includeCandidates, resolveInclude } from './include.js';
export type { FileChecker } from './include.js';
export type {
  EnvLookup,
  EnvRecord,
  ParserConfig,
  ParserOptions,
  PartialParserOptions,
} from './types.js';
