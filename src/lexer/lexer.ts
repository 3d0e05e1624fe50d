/**
 * Scanner for CFG++ source text.
 *
 * Turns text into a position-tracked token stream ending in a single `eof`
 * token. Comments are dropped unless explicitly requested; whitespace is
 * skipped before every token and never materialized.
 *
 * @packageDocumentation
 */

import { CfgppSyntaxError } from '../errors/index.js';
import type { Token, TokenKind } from './types.js';

/** Single-character tokens that need no lookahead. */
const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['{', 'lbrace'],
  ['}', 'rbrace'],
  ['[', 'lbracket'],
  [']', 'rbracket'],
  ['(', 'lparen'],
  [')', 'rparen'],
  ['=', 'equals'],
  [';', 'semicolon'],
  [',', 'comma'],
  ['.', 'dot'],
  ['+', 'plus'],
  ['-', 'minus'],
  ['*', 'star'],
]);

/** Identifier texts with a dedicated token kind. */
const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['true', 'boolean'],
  ['false', 'boolean'],
  ['null', 'null'],
  ['enum', 'enum'],
]);

const DIRECTIVES: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['@include', 'include'],
  ['@import', 'import'],
]);

const STRING_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['\\', '\\'],
  ['"', '"'],
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function isWhitespace(ch: string): boolean {
  return /\s/u.test(ch);
}

/** Number of bytes the code point occupies in UTF-8. */
function utf8Length(ch: string): number {
  const codePoint = ch.codePointAt(0) ?? 0;
  if (codePoint < 0x80) {
    return 1;
  }
  if (codePoint < 0x800) {
    return 2;
  }
  if (codePoint < 0x10000) {
    return 3;
  }
  return 4;
}

/**
 * Options for {@link Lexer}.
 */
export interface LexerOptions {
  /**
   * Keep `comment` tokens in the output stream.
   * @defaultValue false
   */
  readonly keepComments?: boolean;
}

/**
 * Single-pass scanner over one input text.
 *
 * @example
 * ```typescript
 * const tokens = new Lexer('port = 5432;').tokenize();
 * // identifier(port) equals(=) integer(5432) semicolon(;) eof()
 * ```
 */
export class Lexer {
  private readonly chars: readonly string[];
  private readonly keepComments: boolean;
  private index = 0;
  private offset = 0;
  private line = 1;
  private column = 1;

  /**
   * Creates a new Lexer.
   *
   * @param input - Source text to scan.
   * @param options - Scanner options.
   */
  constructor(input: string, options: LexerOptions = {}) {
    // Iterate by code point so columns and offsets never split a surrogate pair.
    this.chars = Array.from(input);
    this.keepComments = options.keepComments ?? false;
  }

  /**
   * Scans the whole input.
   *
   * @returns Tokens in source order, ending with one `eof` token.
   * @throws CfgppSyntaxError at the first lexical error.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      this.skipWhitespace();
      if (this.peek() === undefined) {
        break;
      }
      const token = this.nextToken();
      if (token.kind === 'comment' && !this.keepComments) {
        continue;
      }
      tokens.push(token);
    }

    tokens.push(this.makeToken('eof', '', this.line, this.column, this.offset));
    return tokens;
  }

  private nextToken(): Token {
    const line = this.line;
    const column = this.column;
    const offset = this.offset;
    const ch = this.advance();

    const single = SINGLE_CHAR_TOKENS.get(ch);
    if (single !== undefined) {
      return this.makeToken(single, ch, line, column, offset);
    }

    if (ch === '/') {
      if (this.peek() === '/') {
        this.advance();
        return this.readLineComment(line, column, offset);
      }
      return this.makeToken('slash', ch, line, column, offset);
    }

    if (ch === ':') {
      if (this.peek() === ':') {
        this.advance();
        return this.makeToken('namespace', '::', line, column, offset);
      }
      return this.makeToken('colon', ch, line, column, offset);
    }

    if (ch === '"') {
      return this.readString(line, column, offset);
    }

    if (ch === '$') {
      if (this.peek() === '{') {
        return this.readEnvVar(line, column, offset);
      }
      throw new CfgppSyntaxError("Unexpected character '$'", line, column);
    }

    if (ch === '@') {
      return this.readDirective(line, column, offset);
    }

    if (isDigit(ch)) {
      return this.readNumber(ch, line, column, offset);
    }

    if (isIdentifierStart(ch)) {
      return this.readIdentifier(ch, line, column, offset);
    }

    throw new CfgppSyntaxError(`Unexpected character '${ch}'`, line, column);
  }

  private readString(line: number, column: number, offset: number): Token {
    let value = '';
    let escaped = false;

    for (let ch = this.peek(); ch !== undefined; ch = this.peek()) {
      this.advance();

      if (escaped) {
        // Unknown escapes are kept verbatim, backslash included.
        value += STRING_ESCAPES.get(ch) ?? `\\${ch}`;
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        return this.makeToken('string', value, line, column, offset);
      } else {
        value += ch;
      }
    }

    throw new CfgppSyntaxError('Unterminated string', line, column);
  }

  private readEnvVar(line: number, column: number, offset: number): Token {
    this.advance();
    let value = '${';
    let depth = 1;

    for (let ch = this.peek(); ch !== undefined; ch = this.peek()) {
      this.advance();
      value += ch;

      if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          return this.makeToken('envvar', value, line, column, offset);
        }
      }
    }

    throw new CfgppSyntaxError('Unterminated environment variable', line, column);
  }

  private readDirective(line: number, column: number, offset: number): Token {
    let value = '@';
    for (let ch = this.peek(); ch !== undefined && isIdentifierPart(ch); ch = this.peek()) {
      value += this.advance();
    }

    const kind = DIRECTIVES.get(value);
    if (kind === undefined) {
      throw new CfgppSyntaxError(`Unknown directive '${value}'`, line, column);
    }
    return this.makeToken(kind, value, line, column, offset);
  }

  private readNumber(first: string, line: number, column: number, offset: number): Token {
    let value = first;
    let sawDot = false;
    let sawExponent = false;

    for (let ch = this.peek(); ch !== undefined; ch = this.peek()) {
      if (isDigit(ch)) {
        value += this.advance();
      } else if (ch === '.' && !sawDot && !sawExponent) {
        sawDot = true;
        value += this.advance();
      } else if ((ch === 'e' || ch === 'E') && !sawExponent) {
        sawExponent = true;
        value += this.advance();
        const sign = this.peek();
        if (sign === '+' || sign === '-') {
          value += this.advance();
        }
      } else {
        break;
      }
    }

    const kind: TokenKind = sawDot || sawExponent ? 'double' : 'integer';
    return this.makeToken(kind, value, line, column, offset);
  }

  private readIdentifier(first: string, line: number, column: number, offset: number): Token {
    let value = first;
    for (let ch = this.peek(); ch !== undefined && isIdentifierPart(ch); ch = this.peek()) {
      value += this.advance();
    }
    return this.makeToken(KEYWORDS.get(value) ?? 'identifier', value, line, column, offset);
  }

  private readLineComment(line: number, column: number, offset: number): Token {
    let value = '//';
    for (let ch = this.peek(); ch !== undefined && ch !== '\n'; ch = this.peek()) {
      value += this.advance();
    }
    return this.makeToken('comment', value, line, column, offset);
  }

  private skipWhitespace(): void {
    for (let ch = this.peek(); ch !== undefined && isWhitespace(ch); ch = this.peek()) {
      this.advance();
    }
  }

  private peek(): string | undefined {
    return this.chars[this.index];
  }

  private advance(): string {
    const ch = this.chars[this.index];
    if (ch === undefined) {
      throw new CfgppSyntaxError('Unexpected end of input', this.line, this.column);
    }
    this.index += 1;
    this.offset += utf8Length(ch);
    if (ch === '\n') {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return ch;
  }

  private makeToken(
    kind: TokenKind,
    lexeme: string,
    line: number,
    column: number,
    offset: number
  ): Token {
    return { kind, lexeme, line, column, offset };
  }
}

/**
 * Scans CFG++ text into the token stream consumed by the parser.
 *
 * @param input - Source text.
 * @returns Tokens without comments, ending with `eof`.
 * @throws CfgppSyntaxError at the first lexical error.
 */
export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}

/**
 * Scans CFG++ text keeping comment tokens, for tooling that needs them.
 *
 * @param input - Source text.
 * @returns Tokens including comments, ending with `eof`.
 */
export function tokenizeAll(input: string): Token[] {
  return new Lexer(input, { keepComments: true }).tokenize();
}
