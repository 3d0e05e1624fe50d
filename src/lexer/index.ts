/**
 * Lexer module: CFG++ text to token stream.
 *
 * @packageDocumentation
 */

export { Lexer, tokenize, tokenizeAll } from './lexer.js';
export type { LexerOptions } from './lexer.js';
export { TOKEN_KINDS, formatToken } from './types.js';
export type { Token, TokenKind } from './types.js';
