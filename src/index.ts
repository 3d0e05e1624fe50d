/**
 * CFG++
 *
 * Configuration language toolkit: scan source text, build a typed value tree
 * (with `${NAME}` expansion and `@include` resolution), navigate it, and
 * validate it against a schema.
 *
 * @example
 * ```typescript
 * import { getPath, parse, parseSchema, t } from 'cfgpp';
 *
 * const config = parse('database { host = "localhost"; port = 5432; }');
 * getPath(config, 'database.port'); // { type: 'integer', value: 5432n }
 *
 * const schema = parseSchema('Database {\n  host: string;\n  port: integer;\n}');
 * schema.setRootType(t.object('Database'));
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './errors/index.js';
export * from './lexer/index.js';
export * from './value/index.js';
export * from './parser/index.js';
export * from './schema/index.js';
export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions, LogSink } from './utils/logger.js';
