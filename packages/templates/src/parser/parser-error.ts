import { TemplateError } from '../errors.js';
import type { Token } from '../lexer/token.js';
import { TokenType, describeTokenType } from '../lexer/token-types.js';

/**
 * Error thrown by the parser when encountering invalid syntax
 * Includes position information and a description of the offending token
 */
export class ParserError extends TemplateError {
  readonly stage = 'parse' as const;
  /** Description of the token the parser stopped at */
  readonly found: string;

  constructor(message: string, token: Token) {
    super(message, token.loc.start);
    this.found = ParserError.describeToken(token);
  }

  /**
   * Create a ParserError for a missing token or construct
   */
  static expected(expected: string, token: Token): ParserError {
    return new ParserError(
      `Expected ${expected}, but got ${ParserError.describeToken(token)}`,
      token,
    );
  }

  /**
   * Describe a token for an error message, including its lexeme where useful
   */
  static describeToken(token: Token): string {
    switch (token.type) {
      case TokenType.IDENTIFIER:
        return `identifier '${token.value}'`;
      case TokenType.STRING:
        return `string literal ${JSON.stringify(token.value)}`;
      case TokenType.TEXT: {
        const preview = token.value.length > 20 ? `${token.value.slice(0, 20)}...` : token.value;
        return `text ${JSON.stringify(preview)}`;
      }
      default:
        return describeTokenType(token.type);
    }
  }
}
