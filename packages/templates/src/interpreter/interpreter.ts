/**
 * Template Interpreter
 *
 * Tree-walking interpreter that renders a parsed Program against a scope stack.
 */

import type {
  Attribute,
  Binary,
  Expression,
  For,
  If,
  Index,
  Output,
  Program,
  Statement,
} from '../parser/ast-nodes.js';
import {
  assertNever,
  booleanValue,
  describeValue,
  isTruthy,
  mappingValue,
  stringValue,
  valuesEqual,
  type Scope,
  type Value,
} from '../runtime/value.js';
import { RenderError } from './render-error.js';
import { ScopeStack } from './scope-stack.js';

// Optional leading +, then decimal digits
const LIST_INDEX = /^\+?[0-9]+$/;

/**
 * Template interpreter that evaluates AST nodes.
 *
 * Each call to evaluate() builds a fresh scope stack seeded with the given
 * base scope, so one Interpreter can render the same Program many times.
 */
export class Interpreter {
  private ast: Program;
  private scopes: ScopeStack = new ScopeStack();

  /**
   * Creates a new interpreter for the given AST.
   */
  constructor(ast: Program) {
    this.ast = ast;
  }

  /**
   * Render the program.
   *
   * @param base - Bindings visible to the whole template (messages, variables, flags)
   * @throws {RenderError} On the first type-incompatible operation
   */
  evaluate(base: Scope): string {
    this.scopes = new ScopeStack(base);
    return this.renderStatements(this.ast.body);
  }

  private renderStatements(statements: Statement[]): string {
    let output = '';
    for (const statement of statements) {
      output += this.renderStatement(statement);
    }
    return output;
  }

  private renderStatement(statement: Statement): string {
    switch (statement.type) {
      case 'Text':
        return statement.value;
      case 'Output':
        return this.renderOutput(statement);
      case 'For':
        return this.renderFor(statement);
      case 'If':
        return this.renderIf(statement);
      default:
        return assertNever(statement);
    }
  }

  /**
   * {{ expr }} - strings verbatim, booleans spelled out, null as nothing
   */
  private renderOutput(node: Output): string {
    const value = this.evaluateExpression(node.expression);

    switch (value.kind) {
      case 'string':
        return value.value;
      case 'boolean':
        return value.value ? 'true' : 'false';
      case 'null':
        return '';
      case 'list':
      case 'mapping':
        throw new RenderError(
          'unrenderable_value',
          `Cannot render ${describeValue(value)} directly; access an element or attribute`,
          node.loc,
        );
      default:
        return assertNever(value);
    }
  }

  /**
   * {% for target in iterable %} - one pushed scope per element holding the
   * target binding and the loop metadata mapping
   */
  private renderFor(node: For): string {
    const iterable = this.scopes.lookup(node.iterable);

    // A missing collection renders nothing
    if (iterable.kind === 'null') {
      return '';
    }
    if (iterable.kind !== 'list') {
      throw new RenderError(
        'not_iterable',
        `Cannot iterate over '${node.iterable}': expected a list, got ${describeValue(iterable)}`,
        node.loc,
      );
    }

    const length = iterable.items.length;
    let output = '';

    iterable.items.forEach((item, position) => {
      const scope: Scope = new Map([
        [node.target, item],
        ['loop', this.createLoopMetadata(position, length)],
      ]);
      output += this.scopes.withScope(scope, () => this.renderStatements(node.body));
    });

    return output;
  }

  /**
   * The `loop` binding: first/last flags plus 1-based index, 0-based index0
   * and length, all as strings since there is no numeric type
   */
  private createLoopMetadata(position: number, length: number): Value {
    return mappingValue([
      ['first', booleanValue(position === 0)],
      ['last', booleanValue(position === length - 1)],
      ['index', stringValue(String(position + 1))],
      ['index0', stringValue(String(position))],
      ['length', stringValue(String(length))],
    ]);
  }

  /**
   * {% if %} - the first truthy branch wins; no new scope
   */
  private renderIf(node: If): string {
    for (const branch of node.branches) {
      if (isTruthy(this.evaluateExpression(branch.condition))) {
        return this.renderStatements(branch.body);
      }
    }

    if (node.alternate) {
      return this.renderStatements(node.alternate);
    }
    return '';
  }

  // Expressions

  evaluateExpression(expr: Expression): Value {
    switch (expr.type) {
      case 'StringLiteral':
        return stringValue(expr.value);
      case 'BooleanLiteral':
        return booleanValue(expr.value);
      case 'Variable':
        return this.scopes.lookup(expr.name);
      case 'Attribute':
        return this.evaluateAttribute(expr);
      case 'Index':
        return this.evaluateIndex(expr);
      case 'Binary':
        return this.evaluateBinary(expr);
      default:
        return assertNever(expr);
    }
  }

  private evaluateAttribute(expr: Attribute): Value {
    const object = this.evaluateExpression(expr.object);

    if (object.kind !== 'mapping') {
      throw new RenderError(
        'attribute_on_non_mapping',
        `Cannot read attribute '${expr.name}' of ${describeValue(object)}`,
        expr.loc,
      );
    }

    return this.getKey(object.entries, expr.name, expr);
  }

  private evaluateIndex(expr: Index): Value {
    const object = this.evaluateExpression(expr.object);
    const property = this.evaluateExpression(expr.property);

    if (object.kind === 'mapping' && property.kind === 'string') {
      return this.getKey(object.entries, property.value, expr);
    }

    if (object.kind === 'list' && property.kind === 'string') {
      if (!LIST_INDEX.test(property.value)) {
        throw new RenderError(
          'non_integer_index',
          `List index must be a non-negative integer, got ${JSON.stringify(property.value)}`,
          expr.loc,
        );
      }

      const position = Number(property.value);
      if (position >= object.items.length) {
        throw new RenderError(
          'index_out_of_range',
          `Index ${property.value} out of range for list of ${object.items.length}`,
          expr.loc,
        );
      }
      return object.items[position];
    }

    throw new RenderError(
      'invalid_index',
      `Cannot index ${describeValue(object)} with ${describeValue(property)}`,
      expr.loc,
    );
  }

  private getKey(entries: Map<string, Value>, key: string, expr: Attribute | Index): Value {
    const value = entries.get(key);
    if (value === undefined) {
      throw new RenderError('missing_key', `Key '${key}' not found`, expr.loc);
    }
    return value;
  }

  /**
   * Both operands are always evaluated first; `and`/`or` do not short-circuit,
   * so an error on either side surfaces
   */
  private evaluateBinary(expr: Binary): Value {
    const left = this.evaluateExpression(expr.left);
    const right = this.evaluateExpression(expr.right);

    switch (expr.operator) {
      case '==':
        return booleanValue(valuesEqual(left, right));
      case '+':
        if (left.kind === 'string' && right.kind === 'string') {
          return stringValue(left.value + right.value);
        }
        throw new RenderError(
          'unsupported_operand',
          `Operator '+' only supports strings, got ${describeValue(left)} and ${describeValue(right)}`,
          expr.loc,
        );
      case 'and':
        return booleanValue(isTruthy(left) && isTruthy(right));
      case 'or':
        return booleanValue(isTruthy(left) || isTruthy(right));
      default:
        return assertNever(expr.operator);
    }
  }
}
