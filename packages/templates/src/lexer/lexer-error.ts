import { TemplateError } from '../errors.js';
import type { Position } from './token.js';

/**
 * Error thrown by the lexer when it cannot continue scanning
 * (an unterminated string literal inside a tag)
 */
export class LexerError extends TemplateError {
  readonly stage = 'lex' as const;

  constructor(message: string, position: Position) {
    super(message, position);
  }
}
