/**
 * Token types for the chat template lexer
 */

export const TokenType = {
  // Content
  TEXT: 'TEXT', // Literal text between tags

  // Delimiters
  BLOCK_START: 'BLOCK_START', // {%
  BLOCK_END: 'BLOCK_END', // %}
  VAR_START: 'VAR_START', // {{
  VAR_END: 'VAR_END', // }}

  // Keywords
  IF: 'IF',
  ELIF: 'ELIF',
  ELSE: 'ELSE',
  ENDIF: 'ENDIF',
  FOR: 'FOR',
  IN: 'IN',
  ENDFOR: 'ENDFOR',
  AND: 'AND',
  OR: 'OR',
  TRUE: 'TRUE',
  FALSE: 'FALSE',

  // Symbols
  EQ: 'EQ', // ==
  PLUS: 'PLUS', // +
  DOT: 'DOT', // .
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )

  // Data
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING', // 'text' or "text", value holds the unescaped string

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Reserved words recognized inside tags
 */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['if', TokenType.IF],
  ['elif', TokenType.ELIF],
  ['else', TokenType.ELSE],
  ['endif', TokenType.ENDIF],
  ['for', TokenType.FOR],
  ['in', TokenType.IN],
  ['endfor', TokenType.ENDFOR],
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
]);

/**
 * Single-character symbols recognized inside tags
 */
export const SYMBOLS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['+', TokenType.PLUS],
  ['.', TokenType.DOT],
  ['[', TokenType.LBRACKET],
  [']', TokenType.RBRACKET],
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
]);

/**
 * Human-readable spelling of a token type, used in parser error messages
 */
export function describeTokenType(type: TokenType): string {
  switch (type) {
    case TokenType.TEXT:
      return 'text';
    case TokenType.BLOCK_START:
      return "'{%'";
    case TokenType.BLOCK_END:
      return "'%}'";
    case TokenType.VAR_START:
      return "'{{'";
    case TokenType.VAR_END:
      return "'}}'";
    case TokenType.EQ:
      return "'=='";
    case TokenType.PLUS:
      return "'+'";
    case TokenType.DOT:
      return "'.'";
    case TokenType.LBRACKET:
      return "'['";
    case TokenType.RBRACKET:
      return "']'";
    case TokenType.LPAREN:
      return "'('";
    case TokenType.RPAREN:
      return "')'";
    case TokenType.IDENTIFIER:
      return 'identifier';
    case TokenType.STRING:
      return 'string literal';
    case TokenType.EOF:
      return 'end of input';
    default:
      return `'${type.toLowerCase()}'`;
  }
}
