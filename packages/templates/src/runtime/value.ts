/**
 * Runtime Values
 *
 * The interpreter's dynamic type. Every operation switches over `kind`
 * exhaustively, so a new kind fails to compile until each site handles it.
 */

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface BooleanValue {
  kind: 'boolean';
  value: boolean;
}

export interface ListValue {
  kind: 'list';
  items: Value[];
}

export interface MappingValue {
  kind: 'mapping';
  entries: Map<string, Value>;
}

export interface NullValue {
  kind: 'null';
}

export type Value = StringValue | BooleanValue | ListValue | MappingValue | NullValue;

export type ValueKind = Value['kind'];

/**
 * A scope: one layer of name to value bindings
 */
export type Scope = Map<string, Value>;

export const NULL_VALUE: NullValue = { kind: 'null' };

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function booleanValue(value: boolean): BooleanValue {
  return { kind: 'boolean', value };
}

export function listValue(items: Value[]): ListValue {
  return { kind: 'list', items };
}

export function mappingValue(entries: Iterable<readonly [string, Value]>): MappingValue {
  return { kind: 'mapping', entries: new Map(entries) };
}

/**
 * Compile-time exhaustiveness check for switches over discriminated unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Convert plain data into a runtime value.
 *
 * - strings and booleans map directly
 * - numbers become their decimal string (there is no numeric type)
 * - null and undefined become null
 * - arrays become lists, Maps and plain objects become mappings
 *   (own enumerable properties only)
 *
 * @throws {TypeError} For functions, symbols and bigints
 *
 * @example
 * ```typescript
 * toValue({ role: 'user', content: 'Hi' });
 * // { kind: 'mapping', entries: Map { 'role' => ..., 'content' => ... } }
 * ```
 */
export function toValue(input: unknown): Value {
  if (input === null || input === undefined) {
    return NULL_VALUE;
  }

  if (typeof input === 'string') {
    return stringValue(input);
  }
  if (typeof input === 'boolean') {
    return booleanValue(input);
  }
  if (typeof input === 'number') {
    return stringValue(String(input));
  }
  if (typeof input !== 'object') {
    throw new TypeError(`Cannot convert ${typeof input} to a template value`);
  }

  if (Array.isArray(input)) {
    return listValue(input.map((item: unknown) => toValue(item)));
  }

  if (input instanceof Map) {
    const entries: Array<[string, Value]> = [];
    for (const [key, item] of input) {
      entries.push([String(key), toValue(item)]);
    }
    return mappingValue(entries);
  }

  return mappingValue(
    Object.entries(input).map(([key, item]): [string, Value] => [key, toValue(item)]),
  );
}

/**
 * Convert a runtime value back into plain data
 */
export function fromValue(value: Value): unknown {
  switch (value.kind) {
    case 'string':
    case 'boolean':
      return value.value;
    case 'list':
      return value.items.map(fromValue);
    case 'mapping':
      return Object.fromEntries([...value.entries].map(([key, item]) => [key, fromValue(item)]));
    case 'null':
      return null;
    default:
      return assertNever(value);
  }
}

/**
 * Truthiness used by conditions and the boolean operators:
 * booleans are themselves, strings, lists and mappings are truthy when
 * non-empty, null is always falsy
 */
export function isTruthy(value: Value): boolean {
  switch (value.kind) {
    case 'boolean':
      return value.value;
    case 'string':
      return value.value.length > 0;
    case 'list':
      return value.items.length > 0;
    case 'mapping':
      return value.entries.size > 0;
    case 'null':
      return false;
    default:
      return assertNever(value);
  }
}

/**
 * Structural equality: kinds must match, then contents are compared
 * recursively. Mapping key order is irrelevant.
 */
export function valuesEqual(left: Value, right: Value): boolean {
  switch (left.kind) {
    case 'string':
    case 'boolean':
      return right.kind === left.kind && right.value === left.value;
    case 'list':
      return (
        right.kind === 'list' &&
        right.items.length === left.items.length &&
        left.items.every((item, i) => valuesEqual(item, right.items[i]))
      );
    case 'mapping': {
      if (right.kind !== 'mapping' || right.entries.size !== left.entries.size) {
        return false;
      }
      for (const [key, item] of left.entries) {
        const other = right.entries.get(key);
        if (other === undefined || !valuesEqual(item, other)) {
          return false;
        }
      }
      return true;
    }
    case 'null':
      return right.kind === 'null';
    default:
      return assertNever(left);
  }
}

/**
 * Short description of a value for error messages
 */
export function describeValue(value: Value): string {
  switch (value.kind) {
    case 'string':
      return `string ${JSON.stringify(value.value)}`;
    case 'boolean':
      return `boolean ${value.value}`;
    case 'list':
      return `list of ${value.items.length}`;
    case 'mapping':
      return `mapping with ${value.entries.size} keys`;
    case 'null':
      return 'null';
    default:
      return assertNever(value);
  }
}
