/**
 * Token types for the CFG++ scanner.
 *
 * @packageDocumentation
 */

/**
 * Every token kind the scanner can produce.
 */
export const TOKEN_KINDS = [
  // Literals
  'string',
  'integer',
  'double',
  'boolean',
  'null',
  'identifier',

  // Keywords
  'enum',
  'include',
  'import',

  // Punctuation
  'lbrace',
  'rbrace',
  'lbracket',
  'rbracket',
  'lparen',
  'rparen',
  'equals',
  'semicolon',
  'comma',
  'dot',
  'colon',

  // Operators
  'plus',
  'minus',
  'star',
  'slash',

  // Special
  'envvar',
  'namespace',
  'comment',
  'whitespace',
  'eof',
] as const;

/**
 * Kind of a scanned token.
 */
export type TokenKind = (typeof TOKEN_KINDS)[number];

/**
 * A scanned token with its source position.
 */
export interface Token {
  /** Token kind. */
  readonly kind: TokenKind;
  /**
   * Token text. For string tokens this is the unescaped content without the
   * surrounding quotes; env-var tokens keep their `${` and `}` delimiters.
   */
  readonly lexeme: string;
  /** 1-based line of the first character. */
  readonly line: number;
  /** 1-based column of the first character. */
  readonly column: number;
  /** 0-based UTF-8 byte offset of the first character in the input. */
  readonly offset: number;
}

/**
 * Renders a token as `kind(lexeme) at line:column`.
 *
 * @param token - The token to render.
 * @returns Display text for diagnostics.
 */
export function formatToken(token: Token): string {
  return `${token.kind}(${token.lexeme}) at ${String(token.line)}:${String(token.column)}`;
}
