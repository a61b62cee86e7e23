/**
 * @chatplate/templates - Main API
 *
 * Renders the Jinja-style subset used by model `chat_template` strings:
 * text, {{ expressions }}, {% for %} over a variable and {% if %}/{% elif %}/{% else %}.
 * Rendering is synchronous and never evaluates code.
 */

import type { Logger } from '@chatplate/logger';
import { RenderContext, type ChatMessage } from './context/render-context.js';
import { isTemplateError } from './errors.js';
import { Interpreter } from './interpreter/interpreter.js';
import { Lexer } from './lexer/lexer.js';
import type { Token } from './lexer/token.js';
import type { Program } from './parser/ast-nodes.js';
import { Parser } from './parser/parser.js';
import { toValue, type Scope, type Value } from './runtime/value.js';

/**
 * Compiled template that can be rendered multiple times with different contexts.
 */
export interface CompiledTemplate {
  /** The parsed template */
  readonly ast: Program;

  /**
   * Render the compiled template.
   *
   * @param data - Base scope, or plain data converted with toValue()
   */
  render(data: Scope | Record<string, unknown>): string;
}

/**
 * Options for chat template rendering.
 */
export interface RenderOptions {
  /**
   * Receives `template_rendered` (debug) on success and
   * `template_render_failed` before an error is rethrown.
   */
  logger?: Logger;
  /**
   * Level of `template_render_failed`. Callers that report the rethrown
   * error themselves pass `'debug'` so it is not printed twice.
   * @default 'warn'
   */
  failureLevel?: 'warn' | 'debug';
}

/**
 * Parse a template string into the AST
 *
 * @throws {LexerError} On an unterminated string literal
 * @throws {ParserError} On malformed template syntax
 */
export function parse(template: string): Program {
  const parser = new Parser(new Lexer());
  parser.setInput(template);
  return parser.parse();
}

/**
 * Compile a template string into a reusable compiled template.
 *
 * @example
 * ```typescript
 * const compiled = compile('{{ greeting }}, {{ name }}!');
 * compiled.render({ greeting: 'Hello', name: 'Alice' }); // 'Hello, Alice!'
 * ```
 */
export function compile(template: string): CompiledTemplate {
  const ast = parse(template);
  const interpreter = new Interpreter(ast);

  return {
    ast,
    render(data: Scope | Record<string, unknown>): string {
      return interpreter.evaluate(data instanceof Map ? data : toScope(data));
    },
  };
}

/**
 * Render a template string against plain data in one step.
 *
 * @example
 * ```typescript
 * render("{% if user %}Hi {{ user['name'] }}{% endif %}", { user: { name: 'Bob' } });
 * // 'Hi Bob'
 * ```
 */
export function render(template: string, data: Scope | Record<string, unknown>): string {
  return compile(template).render(data);
}

/**
 * Render a chat template against a message list.
 *
 * @param context - Variables and flags; defaults to RenderContext.withDefaults()
 *   (`eos_token` = `</s>`, `add_generation_prompt` = true)
 *
 * @example
 * ```typescript
 * renderChatTemplate(
 *   '{% for message in messages %}{{ message.role }}: {{ message.content }}\n{% endfor %}',
 *   [{ role: 'user', content: 'Hello' }],
 * );
 * // 'user: Hello\n'
 * ```
 */
export function renderChatTemplate(
  template: string,
  messages: readonly ChatMessage[],
  context: RenderContext = RenderContext.withDefaults(),
  options: RenderOptions = {},
): string {
  const { logger, failureLevel = 'warn' } = options;

  try {
    const output = compile(template).render(context.toScope(messages));
    logger?.debug('template_rendered', {
      messages: messages.length,
      output_length: output.length,
    });
    return output;
  } catch (error) {
    if (logger) {
      logger[failureLevel]('template_render_failed', {
        stage: isTemplateError(error) ? error.stage : 'unknown',
        message: error instanceof Error ? error.message : String(error),
      });
    }
    throw error;
  }
}

/**
 * Tokenize a template (useful for debugging templates)
 */
export function tokenize(template: string): Token[] {
  return new Lexer().tokenize(template);
}

function toScope(data: Record<string, unknown>): Scope {
  return new Map<string, Value>(Object.entries(data).map(([key, value]) => [key, toValue(value)]));
}

export { RenderContext, DEFAULT_EOS_TOKEN } from './context/render-context.js';
export type { ChatMessage } from './context/render-context.js';
export { TemplateError, isTemplateError } from './errors.js';
export type { TemplateErrorStage } from './errors.js';
export { Interpreter } from './interpreter/interpreter.js';
export { RenderError } from './interpreter/render-error.js';
export type { RenderErrorCode } from './interpreter/render-error.js';
export { ScopeStack } from './interpreter/scope-stack.js';
export { Lexer, LexerMode } from './lexer/lexer.js';
export { LexerError } from './lexer/lexer-error.js';
export type { Position, SourceLocation, Token } from './lexer/token.js';
export { TokenType } from './lexer/token-types.js';
export type * from './parser/ast-nodes.js';
export { Parser } from './parser/parser.js';
export { ParserError } from './parser/parser-error.js';
export {
  NULL_VALUE,
  booleanValue,
  fromValue,
  isTruthy,
  listValue,
  mappingValue,
  stringValue,
  toValue,
  valuesEqual,
} from './runtime/value.js';
export type { Scope, Value, ValueKind } from './runtime/value.js';
