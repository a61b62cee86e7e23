import { TemplateError } from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';

/**
 * What went wrong while rendering
 */
export type RenderErrorCode =
  | 'attribute_on_non_mapping' // x.name where x is not a mapping
  | 'missing_key' // mapping has no such key
  | 'index_out_of_range' // list[n] past the end
  | 'non_integer_index' // list['abc']
  | 'invalid_index' // any other object/index combination
  | 'unsupported_operand' // + on anything but two strings
  | 'unrenderable_value' // {{ list }} or {{ mapping }}
  | 'not_iterable'; // for-loop over a string, boolean or mapping

/**
 * Error thrown by the interpreter on a type-incompatible operation
 */
export class RenderError extends TemplateError {
  readonly stage = 'render' as const;
  readonly code: RenderErrorCode;

  constructor(code: RenderErrorCode, message: string, loc: SourceLocation | null) {
    super(message, loc?.start ?? null);
    this.code = code;
  }
}
