import { describe, expect, it } from 'vitest';
import { ScopeStack } from '../../src/interpreter/scope-stack.js';
import { NULL_VALUE, stringValue, type Scope } from '../../src/runtime/value.js';

describe('ScopeStack', () => {
  const base: Scope = new Map([
    ['name', stringValue('root')],
    ['other', stringValue('kept')],
  ]);

  it('should resolve names from the innermost scope outwards', () => {
    const stack = new ScopeStack(base);
    stack.push(new Map([['name', stringValue('inner')]]));

    expect(stack.lookup('name')).toEqual(stringValue('inner'));
    expect(stack.lookup('other')).toEqual(stringValue('kept'));
  });

  it('should resolve unbound names to null', () => {
    expect(new ScopeStack(base).lookup('missing')).toBe(NULL_VALUE);
    expect(new ScopeStack().lookup('anything')).toBe(NULL_VALUE);
  });

  it('should restore outer bindings on pop', () => {
    const stack = new ScopeStack(base);
    const inner: Scope = new Map([['name', stringValue('inner')]]);
    stack.push(inner);

    expect(stack.pop()).toBe(inner);
    expect(stack.lookup('name')).toEqual(stringValue('root'));
    expect(stack.size()).toBe(1);
  });

  it('should return undefined when popping an empty stack', () => {
    expect(new ScopeStack().pop()).toBeUndefined();
  });

  it('should pop the scope after withScope returns', () => {
    const stack = new ScopeStack(base);

    const result = stack.withScope(new Map([['name', stringValue('inner')]]), () =>
      stack.lookup('name'),
    );

    expect(result).toEqual(stringValue('inner'));
    expect(stack.size()).toBe(1);
  });

  it('should pop the scope when the callback throws', () => {
    const stack = new ScopeStack(base);

    expect(() =>
      stack.withScope(new Map(), () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(stack.size()).toBe(1);
  });
});
