/**
 * Render Context
 *
 * Builds the base scope for a chat template render: the message list plus
 * named string variables (special tokens) and boolean flags.
 */

import {
  booleanValue,
  listValue,
  mappingValue,
  stringValue,
  type Scope,
  type Value,
} from '../runtime/value.js';

/**
 * A single chat message
 */
export interface ChatMessage {
  role: string;
  content: string;
}

export const DEFAULT_EOS_TOKEN = '</s>';

/**
 * Named variables and flags injected alongside `messages`.
 *
 * @example
 * ```typescript
 * const context = new RenderContext()
 *   .setVar('eos_token', '<|endoftext|>')
 *   .setFlag('add_generation_prompt', false);
 * ```
 */
export class RenderContext {
  private vars: Map<string, string> = new Map();
  private flags: Map<string, boolean> = new Map();

  /**
   * Context most chat templates expect: `eos_token` set to `</s>` and
   * `add_generation_prompt` enabled
   */
  static withDefaults(): RenderContext {
    return new RenderContext()
      .setVar('eos_token', DEFAULT_EOS_TOKEN)
      .setFlag('add_generation_prompt', true);
  }

  /**
   * Bind a string variable. A flag with the same name is replaced.
   */
  setVar(name: string, value: string): this {
    this.flags.delete(name);
    this.vars.set(name, value);
    return this;
  }

  /**
   * Bind a boolean flag. A variable with the same name is replaced.
   */
  setFlag(name: string, value: boolean): this {
    this.vars.delete(name);
    this.flags.set(name, value);
    return this;
  }

  getVar(name: string): string | undefined {
    return this.vars.get(name);
  }

  getFlag(name: string): boolean | undefined {
    return this.flags.get(name);
  }

  /**
   * Base scope for a render. `messages` is bound last, so it always refers
   * to the message list even if a variable of that name was set.
   */
  toScope(messages: readonly ChatMessage[]): Scope {
    const scope: Scope = new Map<string, Value>();

    for (const [name, value] of this.vars) {
      scope.set(name, stringValue(value));
    }
    for (const [name, value] of this.flags) {
      scope.set(name, booleanValue(value));
    }

    scope.set(
      'messages',
      listValue(
        messages.map((message) =>
          mappingValue([
            ['role', stringValue(message.role)],
            ['content', stringValue(message.content)],
          ]),
        ),
      ),
    );

    return scope;
  }
}
