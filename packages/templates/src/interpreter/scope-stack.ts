/**
 * Scope Stack
 *
 * Lexical scopes for template evaluation. The base scope holds the render
 * context; each for-loop iteration pushes one scope and pops it afterwards.
 */

import { NULL_VALUE, type Scope, type Value } from '../runtime/value.js';

/**
 * Stack of variable scopes, innermost last.
 *
 * @example
 * ```typescript
 * const stack = new ScopeStack(new Map([['name', stringValue('root')]]));
 * stack.push(new Map([['name', stringValue('inner')]]));
 * stack.lookup('name'); // inner
 * stack.pop();
 * stack.lookup('name'); // root
 * ```
 */
export class ScopeStack {
  private scopes: Scope[] = [];

  constructor(base?: Scope) {
    if (base) {
      this.scopes.push(base);
    }
  }

  /**
   * Add a new innermost scope
   */
  push(scope: Scope): void {
    this.scopes.push(scope);
  }

  /**
   * Remove and return the innermost scope, or undefined if the stack is empty
   */
  pop(): Scope | undefined {
    return this.scopes.pop();
  }

  /**
   * Resolve a name from the innermost scope outwards.
   * Unbound names resolve to null rather than failing.
   */
  lookup(name: string): Value {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const value = this.scopes[i].get(name);
      if (value !== undefined) {
        return value;
      }
    }
    return NULL_VALUE;
  }

  /**
   * Run `callback` with `scope` pushed, popping it again even if the callback throws
   */
  withScope<T>(scope: Scope, callback: () => T): T {
    this.push(scope);
    try {
      return callback();
    } finally {
      this.pop();
    }
  }

  size(): number {
    return this.scopes.length;
  }
}
