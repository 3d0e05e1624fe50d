/**
 * Recursive-descent builder turning CFG++ tokens into a {@link Value} tree.
 *
 * Each source text (the root input and every included file) is walked by its
 * own {@link SourceBuilder} with a private cursor, so an include never disturbs
 * the token position of the file that contains it. The {@link Parser} owns the
 * options and the environment lookup and hands them to every builder.
 *
 * @packageDocumentation
 */

import {
  CfgppSyntaxError,
  EnvVarError,
  IncludeError,
  IoError,
  ParseError,
} from '../errors/index.js';
import { tokenize } from '../lexer/index.js';
import type { Token, TokenKind } from '../lexer/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { PathValidationError, safeReadFileSync, validatePath } from '../utils/safe-fs.js';
import { array, bool, double, enumValue, int, isInt64, nullValue, object, str } from '../value/index.js';
import type { ObjectValue, Value } from '../value/index.js';
import { DEFAULT_PARSER_OPTIONS } from './defaults.js';
import { envLookupFrom, mergeParserOptions, processEnvLookup, resolveParserOptions } from './env.js';
import { resolveInclude } from './include.js';
import type { EnvLookup, EnvRecord, ParserConfig, ParserOptions } from './types.js';

/** Display labels for punctuation in error messages. */
const TOKEN_LABELS: Partial<Record<TokenKind, string>> = {
  lbrace: "'{'",
  rbrace: "'}'",
  lbracket: "'['",
  rbracket: "']'",
  lparen: "'('",
  rparen: "')'",
  equals: "'='",
  semicolon: "';'",
  comma: "','",
  dot: "'.'",
  colon: "':'",
  plus: "'+'",
  minus: "'-'",
  star: "'*'",
  slash: "'/'",
  namespace: "'::'",
};

function describeKind(kind: TokenKind): string {
  return TOKEN_LABELS[kind] ?? kind;
}

function describeToken(token: Token): string {
  if (token.kind === 'eof') {
    return 'end of input';
  }
  return TOKEN_LABELS[token.kind] ?? `${token.kind} '${token.lexeme}'`;
}

function syntaxError(reason: string, token: Token): CfgppSyntaxError {
  return new CfgppSyntaxError(reason, token.line, token.column);
}

/**
 * Where a source text sits in the include tree.
 */
interface SourceFrame {
  /** Absolute path of the file, when the text was read from disk. */
  readonly file?: string;
  /** Include nesting level; the root input is 0. */
  readonly depth: number;
  /** Absolute paths of the files currently being parsed, outermost first. */
  readonly chain: readonly string[];
}

/**
 * Services a builder needs from its parser.
 */
interface BuildContext {
  readonly options: ParserOptions;
  readonly env: EnvLookup;
  readonly logger: Logger;
  /**
   * When set, containers are parsed and discarded and the result is null.
   * Included files are still resolved and checked.
   */
  readonly syntaxOnly: boolean;
  readonly parseIncluded: (file: string, frame: SourceFrame) => Value;
}

/**
 * Cursor over the tokens of one source text.
 */
class SourceBuilder {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly ctx: BuildContext,
    private readonly frame: SourceFrame
  ) {}

  /**
   * Parses the whole stream: empty input, a document of fields, or a single
   * value with an optional trailing `;`.
   */
  parseTop(): Value {
    if (this.check('eof')) {
      return this.ctx.syntaxOnly ? nullValue() : object();
    }

    if (this.startsDocument()) {
      return this.parseDocument();
    }

    const value = this.parseValue();
    this.match('semicolon');
    const trailing = this.current();
    if (trailing.kind !== 'eof') {
      throw syntaxError(`Unexpected ${describeToken(trailing)} after top-level value`, trailing);
    }
    return this.ctx.syntaxOnly ? nullValue() : value;
  }

  private startsDocument(): boolean {
    const first = this.current();
    if (first.kind === 'identifier') {
      const next = this.peekAt(1).kind;
      return next === 'equals' || next === 'lbrace';
    }
    if (first.kind === 'include' || first.kind === 'import') {
      // A lone include stands for the included value itself.
      const after = this.peekAt(2);
      const end = after.kind === 'semicolon' ? this.peekAt(3) : after;
      return end.kind !== 'eof';
    }
    return false;
  }

  private parseDocument(): Value {
    const entries = this.ctx.syntaxOnly ? undefined : new Map<string, Value>();

    while (!this.check('eof')) {
      const token = this.current();
      if (token.kind === 'include' || token.kind === 'import') {
        const included = this.parseInclude();
        if (entries !== undefined) {
          if (included.value.type !== 'object') {
            throw new IncludeError(
              included.path,
              `Included file must contain an object at document level, found ${included.value.type}`
            );
          }
          for (const [key, value] of included.value.entries) {
            entries.set(key, value);
          }
        }
      } else {
        this.parseField(entries);
      }
      this.match('semicolon');
    }

    return entries === undefined ? nullValue() : object(entries);
  }

  private parseValue(): Value {
    const token = this.current();

    switch (token.kind) {
      case 'string':
        this.advance();
        return str(token.lexeme);
      case 'integer':
        this.advance();
        return this.integerLiteral(token, token, false);
      case 'double':
        this.advance();
        return this.doubleLiteral(token, token, false);
      case 'plus':
      case 'minus':
        return this.parseSignedNumber();
      case 'boolean':
        this.advance();
        return bool(token.lexeme === 'true');
      case 'null':
        this.advance();
        return nullValue();
      case 'lbrace':
        return this.parseObjectBody();
      case 'lbracket':
        return this.parseArray();
      case 'identifier':
        this.advance();
        return this.check('lbrace') ? this.parseObjectBody() : enumValue(token.lexeme);
      case 'include':
      case 'import':
        return this.parseInclude().value;
      case 'envvar':
        this.advance();
        return this.expandEnvVar(token);
      case 'eof':
        throw syntaxError('Unexpected end of input', token);
      default:
        throw syntaxError(`Unexpected token: ${describeToken(token)}`, token);
    }
  }

  private parseObjectBody(): Value {
    this.expect('lbrace');
    const entries = this.ctx.syntaxOnly ? undefined : new Map<string, Value>();

    while (!this.check('rbrace') && !this.check('eof')) {
      this.parseField(entries);
      this.match('semicolon');
    }

    this.expect('rbrace');
    return entries === undefined ? nullValue() : object(entries);
  }

  private parseField(entries: Map<string, Value> | undefined): void {
    const key = this.expect('identifier').lexeme;
    let value: Value;
    if (this.check('lbrace')) {
      value = this.parseObjectBody();
    } else {
      this.expect('equals');
      value = this.parseValue();
    }
    entries?.set(key, value);
  }

  private parseArray(): Value {
    this.expect('lbracket');
    const items = this.ctx.syntaxOnly ? undefined : new Array<Value>();

    while (!this.check('rbracket') && !this.check('eof')) {
      const item = this.parseValue();
      items?.push(item);
      this.match('comma');
    }

    this.expect('rbracket');
    return items === undefined ? nullValue() : array(items);
  }

  private parseSignedNumber(): Value {
    const sign = this.advance();
    const number = this.current();
    const negative = sign.kind === 'minus';

    if (number.kind === 'integer') {
      this.advance();
      return this.integerLiteral(number, sign, negative);
    }
    if (number.kind === 'double') {
      this.advance();
      return this.doubleLiteral(number, sign, negative);
    }
    throw syntaxError(`Unexpected token: ${describeToken(sign)}`, sign);
  }

  private integerLiteral(token: Token, start: Token, negative: boolean): Value {
    const magnitude = BigInt(token.lexeme);
    const value = negative ? -magnitude : magnitude;
    if (!isInt64(value)) {
      throw syntaxError(`Invalid integer: ${negative ? '-' : ''}${token.lexeme}`, start);
    }
    return int(value);
  }

  private doubleLiteral(token: Token, start: Token, negative: boolean): Value {
    const value = Number(token.lexeme);
    if (!Number.isFinite(value)) {
      throw syntaxError(`Invalid double: ${negative ? '-' : ''}${token.lexeme}`, start);
    }
    return double(negative ? -value : value);
  }

  private parseInclude(): { path: string; value: Value } {
    const directive = this.advance();
    const { options, logger } = this.ctx;

    if (!options.processIncludes) {
      throw syntaxError('Include directives are disabled', directive);
    }

    const includePath = this.expect('string').lexeme;

    let file: string;
    try {
      file = resolveInclude(includePath, options.includePaths, this.frame.file);
    } catch (error) {
      logger.debug('include_failed', {
        path: includePath,
        from: this.frame.file ?? '<input>',
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    if (this.frame.chain.includes(file)) {
      throw new IncludeError(includePath, 'Circular include detected');
    }
    if (this.frame.depth >= options.maxIncludeDepth) {
      throw new IncludeError(
        includePath,
        `Maximum include depth (${String(options.maxIncludeDepth)}) exceeded`
      );
    }

    const depth = this.frame.depth + 1;
    logger.debug('include_resolved', { path: includePath, file, depth });
    const value = this.ctx.parseIncluded(file, {
      file,
      depth,
      chain: [...this.frame.chain, file],
    });
    return { path: includePath, value };
  }

  private expandEnvVar(token: Token): Value {
    if (!this.ctx.options.expandEnvVars) {
      return str(token.lexeme);
    }
    if (this.ctx.syntaxOnly) {
      return nullValue();
    }

    const content = token.lexeme.slice(2, -1);
    const separator = content.indexOf(':-');
    const name = separator < 0 ? content : content.slice(0, separator);
    const fallback = separator < 0 ? undefined : content.slice(separator + 2);

    const found = this.ctx.env(name);
    if (found !== undefined) {
      return str(found);
    }
    if (fallback !== undefined) {
      this.ctx.logger.debug('env_var_defaulted', { variable: name });
      return str(fallback);
    }
    throw new EnvVarError(name, 'Environment variable not found');
  }

  private current(): Token {
    return this.peekAt(0);
  }

  private peekAt(offset: number): Token {
    // Past the end every lookahead sees the final eof token.
    const token = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
    if (token === undefined) {
      throw new ParseError('Token stream is empty');
    }
    return token;
  }

  private advance(): Token {
    const token = this.current();
    if (token.kind !== 'eof') {
      this.pos += 1;
    }
    return token;
  }

  private check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (this.check(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(kind: TokenKind): Token {
    const token = this.current();
    if (token.kind !== kind) {
      throw syntaxError(`Expected ${describeKind(kind)}, found ${describeToken(token)}`, token);
    }
    return this.advance();
  }
}

/**
 * Reads a source file, mapping every failure to an {@link IoError}.
 */
function readSource(filePath: string): { file: string; text: string } {
  try {
    const file = validatePath(filePath);
    return { file, text: safeReadFileSync(file) };
  } catch (error) {
    if (error instanceof PathValidationError) {
      throw new IoError(`${error.message}: '${filePath}'`, error);
    }
    if (error instanceof Error) {
      throw new IoError(`Failed to read file '${filePath}': ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * CFG++ parser: scans and builds source text with fixed options.
 *
 * @example
 * ```typescript
 * const parser = new Parser({ env: (name) => (name === 'HOST' ? 'db1' : undefined) });
 * const config = parser.parse('database { host = ${HOST}; port = 5432; }');
 * getPath(config, 'database.host'); // { type: 'string', value: 'db1' }
 * ```
 */
export class Parser {
  private readonly options: ParserOptions;
  private readonly env: EnvLookup;
  private readonly logger: Logger;

  /**
   * Creates a new Parser.
   *
   * @param config - Options, environment lookup and logger; unset options take
   *   their defaults.
   */
  constructor(config: ParserConfig = {}) {
    const { env, logger, ...options } = config;
    this.options = mergeParserOptions(DEFAULT_PARSER_OPTIONS, options);
    this.env = env ?? processEnvLookup;
    this.logger = (logger ?? defaultLogger).child('Parser');
  }

  /**
   * Creates a parser whose options also honour CFGPP_* environment variables.
   *
   * Precedence: explicit options > env > defaults. Variable expansion reads the
   * same environment unless `config.env` is given.
   *
   * @param config - Explicit options.
   * @param env - The environment object to read from (defaults to process.env).
   * @throws EnvCoercionError if a CFGPP_* variable cannot be coerced.
   */
  static fromEnvironment(config: ParserConfig = {}, env?: EnvRecord): Parser {
    const { env: lookup, logger, ...explicit } = config;
    const options = resolveParserOptions(explicit, env);
    return new Parser({
      ...options,
      env: lookup ?? envLookupFrom(env),
      ...(logger !== undefined ? { logger } : {}),
    });
  }

  /**
   * The effective options of this parser.
   */
  getOptions(): ParserOptions {
    return mergeParserOptions(this.options, {});
  }

  /**
   * Parses source text. Includes are resolved against the configured include
   * paths only.
   *
   * @param input - CFG++ source text.
   * @returns The value tree, or null in syntax-only mode.
   * @throws CfgppSyntaxError, IncludeError, EnvVarError or IoError on the first failure.
   */
  parse(input: string): Value {
    return this.run(input, { depth: 0, chain: [] }, this.options.syntaxOnly);
  }

  /**
   * Reads and parses a file. Includes are searched next to the file first.
   *
   * @param filePath - Path of the file.
   * @returns The value tree, or null in syntax-only mode.
   * @throws IoError if the file cannot be read.
   */
  parseFile(filePath: string): Value {
    const { file, text } = readSource(filePath);
    return this.run(text, { file, depth: 0, chain: [file] }, this.options.syntaxOnly);
  }

  /**
   * Parses several files and merges their top-level objects, later keys
   * overriding earlier ones. Files whose result is not an object contribute
   * nothing.
   *
   * @param filePaths - Files in merge order.
   * @returns The merged object.
   */
  parseFiles(filePaths: readonly string[]): ObjectValue {
    const merged = new Map<string, Value>();

    for (const filePath of filePaths) {
      const value = this.parseFile(filePath);
      if (value.type === 'object') {
        for (const [key, child] of value.entries) {
          merged.set(key, child);
        }
      }
    }

    this.logger.debug('parse_files_merged', { files: filePaths.length, keys: merged.size });
    return object(merged);
  }

  /**
   * Checks that source text and every file it includes conform to the grammar,
   * without building a tree or reading the environment.
   *
   * @param input - CFG++ source text.
   * @throws CfgppSyntaxError at the first violation.
   * @throws IncludeError or IoError if an included file cannot be resolved or read.
   */
  validateSyntax(input: string): void {
    this.run(input, { depth: 0, chain: [] }, true);
  }

  private run(text: string, frame: SourceFrame, syntaxOnly: boolean): Value {
    const context: BuildContext = {
      options: this.options,
      env: this.env,
      logger: this.logger,
      syntaxOnly,
      parseIncluded: (file, nested) => this.run(readSource(file).text, nested, syntaxOnly),
    };

    try {
      return new SourceBuilder(tokenize(text), context, frame).parseTop();
    } catch (error) {
      if (error instanceof CfgppSyntaxError && error.file === undefined && frame.file !== undefined) {
        throw error.inFile(frame.file);
      }
      throw error;
    }
  }
}

/**
 * Parses CFG++ source text.
 *
 * @param input - Source text.
 * @param config - Parser configuration.
 * @returns The value tree.
 */
export function parse(input: string, config: ParserConfig = {}): Value {
  return new Parser(config).parse(input);
}

/**
 * Reads and parses a CFG++ file.
 *
 * @param filePath - Path of the file.
 * @param config - Parser configuration.
 * @returns The value tree.
 */
export function parseFile(filePath: string, config: ParserConfig = {}): Value {
  return new Parser(config).parseFile(filePath);
}

/**
 * Parses several CFG++ files into one merged object.
 *
 * @param filePaths - Files in merge order.
 * @param config - Parser configuration.
 */
export function parseFiles(filePaths: readonly string[], config: ParserConfig = {}): ObjectValue {
  return new Parser(config).parseFiles(filePaths);
}

/**
 * Checks CFG++ source text and its includes against the grammar.
 *
 * @param input - Source text.
 * @param config - Parser configuration.
 * @throws CfgppSyntaxError at the first violation.
 */
export function validateSyntax(input: string, config: ParserConfig = {}): void {
  new Parser(config).validateSyntax(input);
}
