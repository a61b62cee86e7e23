/**
 * Error types for templates
 *
 * Every failure raised while tokenizing, parsing or rendering extends
 * TemplateError, so callers can report which stage failed.
 */

import type { Position } from './lexer/token.js';

/**
 * Pipeline stage that raised the error
 */
export type TemplateErrorStage = 'lex' | 'parse' | 'render';

/**
 * Base class for template errors
 */
export abstract class TemplateError extends Error {
  /** Stage of the pipeline that failed */
  abstract readonly stage: TemplateErrorStage;
  /** Message without the position prefix */
  readonly detail: string;
  /** Line number (1-based), 0 when unknown */
  readonly line: number;
  /** Column number (0-based) */
  readonly column: number;
  /** Character index (0-based) */
  readonly index: number;

  constructor(message: string, position: Position | null) {
    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    super(
      position
        ? `Error at line ${position.line}, column ${position.column + 1}: ${message}`
        : message,
    );
    this.name = this.constructor.name;
    this.detail = message;
    this.line = position?.line ?? 0;
    this.column = position?.column ?? 0;
    this.index = position?.index ?? 0;
  }
}

/**
 * Check whether an unknown thrown value is a TemplateError
 */
export function isTemplateError(error: unknown): error is TemplateError {
  return error instanceof TemplateError;
}
