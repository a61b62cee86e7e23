/**
 * AST Node Types for the chat template parser
 *
 * Pure data: the parser builds these once and the interpreter only reads them.
 */

import type { SourceLocation } from '../lexer/token.js';

/**
 * Base interface for all AST nodes
 */
export interface Node {
  type: string; // Node type discriminator
  loc: SourceLocation | null; // Position information (null for synthetic nodes)
}

/**
 * StringLiteral - 'text' or "text"
 */
export interface StringLiteral extends Node {
  type: 'StringLiteral';
  value: string; // Unescaped string value
}

/**
 * BooleanLiteral - true or false
 */
export interface BooleanLiteral extends Node {
  type: 'BooleanLiteral';
  value: boolean;
}

/**
 * Variable - bare name resolved through the scope stack
 */
export interface Variable extends Node {
  type: 'Variable';
  name: string;
}

/**
 * Attribute - object.name
 */
export interface Attribute extends Node {
  type: 'Attribute';
  object: Expression;
  name: string;
}

/**
 * Index - object[property]
 */
export interface Index extends Node {
  type: 'Index';
  object: Expression;
  property: Expression;
}

export type BinaryOperator = '==' | '+' | 'and' | 'or';

/**
 * Binary - left op right
 */
export interface Binary extends Node {
  type: 'Binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

/**
 * Expression - union of all expression types
 */
export type Expression = StringLiteral | BooleanLiteral | Variable | Attribute | Index | Binary;

/**
 * Text - literal template text, rendered verbatim
 */
export interface Text extends Node {
  type: 'Text';
  value: string;
}

/**
 * Output - {{ expression }}
 */
export interface Output extends Node {
  type: 'Output';
  expression: Expression;
}

/**
 * For - {% for target in iterable %} body {% endfor %}
 */
export interface For extends Node {
  type: 'For';
  target: string; // Loop variable name
  iterable: string; // Bare variable name, not an expression
  body: Statement[];
}

/**
 * One `if` or `elif` arm
 */
export interface Branch {
  condition: Expression;
  body: Statement[];
}

/**
 * If - {% if %} ... {% elif %} ... {% else %} ... {% endif %}
 */
export interface If extends Node {
  type: 'If';
  branches: Branch[]; // The if arm first, then each elif in order
  alternate: Statement[] | null; // else body
}

/**
 * Statement - union of all statement types
 */
export type Statement = Text | Output | For | If;

/**
 * Program node - root of the AST
 */
export interface Program extends Node {
  type: 'Program';
  body: Statement[];
}
