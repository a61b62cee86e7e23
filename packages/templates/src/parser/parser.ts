import type { Lexer } from '../lexer/lexer.js';
import type { SourceLocation, Token } from '../lexer/token.js';
import { TokenType } from '../lexer/token-types.js';
import type {
  Binary,
  BinaryOperator,
  Branch,
  Expression,
  For,
  If,
  Output,
  Program,
  Statement,
  Text,
} from './ast-nodes.js';
import { ParserError } from './parser-error.js';

/**
 * Keywords that close the enclosing block when they follow `{%`
 */
const BLOCK_TERMINATORS: ReadonlySet<TokenType> = new Set<TokenType>([
  TokenType.ELIF,
  TokenType.ELSE,
  TokenType.ENDFOR,
  TokenType.ENDIF,
]);

/**
 * Recursive descent parser for chat templates
 *
 * Tokens are pulled from the lexer on demand into a small lookahead buffer;
 * two tokens of lookahead tell `{% for %}`, `{% if %}` and the block
 * terminators apart.
 *
 * Expression precedence (lowest to highest):
 * 1. or
 * 2. and
 * 3. == (equality)
 * 4. + (string concatenation, left-associative)
 * 5. Primary (literals, variables, grouping) with . and [] suffixes
 */
export class Parser {
  private lexer: Lexer;
  private lookahead: Token[] = [];
  private previous: Token | null = null;

  /**
   * Initialize parser with lexer instance
   *
   * @throws {Error} If lexer is not provided
   */
  constructor(lexer: Lexer) {
    if (!lexer) {
      throw new Error('Parser requires a lexer instance');
    }
    this.lexer = lexer;
  }

  getLexer(): Lexer {
    return this.lexer;
  }

  /**
   * Point the lexer at a new template and clear any buffered tokens
   */
  setInput(template: string): void {
    this.lexer.setInput(template);
    this.lookahead = [];
    this.previous = null;
  }

  /**
   * Parse the whole template
   *
   * @throws {ParserError} On malformed input, including a block terminator
   *   with no open block
   * @throws {LexerError} On an unterminated string literal
   */
  parse(): Program {
    const startToken = this.peek();
    const body = this.parseStatements();

    const next = this.peek();
    if (next.type !== TokenType.EOF) {
      // Only a terminator tag can stop the top-level sequence early
      const keyword = this.peek(1);
      throw new ParserError(
        `Unexpected ${ParserError.describeToken(keyword)}: no open block to close`,
        keyword,
      );
    }

    return {
      type: 'Program',
      body,
      loc: this.makeLoc(startToken, next),
    };
  }

  // Token navigation

  /**
   * Look ahead at a token without consuming it
   *
   * @param offset - 0 for the next token, 1 for the one after
   */
  peek(offset: number = 0): Token {
    while (this.lookahead.length <= offset) {
      this.lookahead.push(this.lexer.lex());
    }
    return this.lookahead[offset];
  }

  /**
   * Consume and return the next token
   */
  advance(): Token {
    const token = this.peek();
    this.lookahead.shift();
    this.previous = token;
    return token;
  }

  private check(type: TokenType, offset: number = 0): boolean {
    return this.peek(offset).type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  /**
   * Consume a token of the given type or fail
   *
   * @param expected - Description of the construct for the error message
   */
  private expect(type: TokenType, expected: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw ParserError.expected(expected, token);
    }
    return this.advance();
  }

  private lastToken(fallback: Token): Token {
    return this.previous ?? fallback;
  }

  private makeLoc(start: Token, end: Token): SourceLocation {
    return {
      start: start.loc.start,
      end: end.loc.end,
    };
  }

  /**
   * True when the next two tokens are `{%` followed by elif/else/endfor/endif
   */
  private atBlockTerminator(): boolean {
    return this.check(TokenType.BLOCK_START) && BLOCK_TERMINATORS.has(this.peek(1).type);
  }

  // Statements

  /**
   * Parse statements until end of input or a block terminator
   * (which is left unconsumed for the enclosing construct)
   */
  private parseStatements(): Statement[] {
    const body: Statement[] = [];

    while (!this.check(TokenType.EOF) && !this.atBlockTerminator()) {
      const token = this.peek();

      switch (token.type) {
        case TokenType.TEXT:
          body.push(this.parseText());
          break;
        case TokenType.VAR_START:
          body.push(this.parseOutput());
          break;
        case TokenType.BLOCK_START:
          body.push(this.parseBlock());
          break;
        default:
          throw ParserError.expected("text, '{{' or '{%'", token);
      }
    }

    return body;
  }

  private parseText(): Text {
    const token = this.advance();
    return {
      type: 'Text',
      value: token.value,
      loc: token.loc,
    };
  }

  /**
   * {{ expression }}
   */
  private parseOutput(): Output {
    const startToken = this.advance(); // {{
    const expression = this.parseExpression();
    const endToken = this.expect(TokenType.VAR_END, "'}}'");

    return {
      type: 'Output',
      expression,
      loc: this.makeLoc(startToken, endToken),
    };
  }

  /**
   * {% for ... %} or {% if ... %}
   */
  private parseBlock(): Statement {
    const startToken = this.advance(); // {%
    const keyword = this.peek();

    if (keyword.type === TokenType.FOR) {
      return this.parseFor(startToken);
    }
    if (keyword.type === TokenType.IF) {
      return this.parseIf(startToken);
    }

    throw ParserError.expected("'for' or 'if' after '{%'", keyword);
  }

  /**
   * {% for target in iterable %} body {% endfor %}
   */
  private parseFor(startToken: Token): For {
    this.expect(TokenType.FOR, "'for'");
    const target = this.expect(TokenType.IDENTIFIER, 'loop variable name');
    this.expect(TokenType.IN, "'in'");
    const iterable = this.expect(TokenType.IDENTIFIER, 'iterable variable name');
    this.expect(TokenType.BLOCK_END, "'%}'");

    const body = this.parseStatements();

    this.expect(TokenType.BLOCK_START, "'{% endfor %}'");
    this.expect(TokenType.ENDFOR, "'endfor'");
    const endToken = this.expect(TokenType.BLOCK_END, "'%}'");

    return {
      type: 'For',
      target: target.value,
      iterable: iterable.value,
      body,
      loc: this.makeLoc(startToken, endToken),
    };
  }

  /**
   * {% if cond %} body [{% elif cond %} body]* [{% else %} body] {% endif %}
   */
  private parseIf(startToken: Token): If {
    this.expect(TokenType.IF, "'if'");
    const branches: Branch[] = [this.parseBranch()];
    let alternate: Statement[] | null = null;

    while (true) {
      const keyword = this.check(TokenType.BLOCK_START) ? this.peek(1) : this.peek();

      if (keyword.type === TokenType.ELIF) {
        this.advance(); // {%
        this.advance(); // elif
        branches.push(this.parseBranch());
        continue;
      }

      if (keyword.type === TokenType.ELSE) {
        this.advance(); // {%
        this.advance(); // else
        this.expect(TokenType.BLOCK_END, "'%}'");
        alternate = this.parseStatements();
        this.expect(TokenType.BLOCK_START, "'{% endif %}'");
        this.expect(TokenType.ENDIF, "'endif'");
        break;
      }

      if (keyword.type === TokenType.ENDIF) {
        this.advance(); // {%
        this.advance(); // endif
        break;
      }

      throw ParserError.expected("'elif', 'else' or 'endif'", keyword);
    }

    const endToken = this.expect(TokenType.BLOCK_END, "'%}'");

    return {
      type: 'If',
      branches,
      alternate,
      loc: this.makeLoc(startToken, endToken),
    };
  }

  /**
   * Condition, `%}` and body of an if/elif arm
   */
  private parseBranch(): Branch {
    const condition = this.parseExpression();
    this.expect(TokenType.BLOCK_END, "'%}'");
    const body = this.parseStatements();
    return { condition, body };
  }

  // Expressions - precedence climbing

  parseExpression(): Expression {
    return this.parseOr();
  }

  private parseOr(): Expression {
    return this.parseBinary(TokenType.OR, 'or', () => this.parseAnd());
  }

  private parseAnd(): Expression {
    return this.parseBinary(TokenType.AND, 'and', () => this.parseEquality());
  }

  private parseEquality(): Expression {
    return this.parseBinary(TokenType.EQ, '==', () => this.parseAdditive());
  }

  private parseAdditive(): Expression {
    return this.parseBinary(TokenType.PLUS, '+', () => this.parsePostfix());
  }

  /**
   * Left-associative chain of one binary operator over the next tier
   */
  private parseBinary(
    type: TokenType,
    operator: BinaryOperator,
    operand: () => Expression,
  ): Expression {
    const startToken = this.peek();
    let left = operand();

    while (this.match(type)) {
      const right = operand();
      const node: Binary = {
        type: 'Binary',
        operator,
        left,
        right,
        loc: this.makeLoc(startToken, this.lastToken(startToken)),
      };
      left = node;
    }

    return left;
  }

  /**
   * Primary followed by any number of `.name` / `[expr]` suffixes
   */
  private parsePostfix(): Expression {
    const startToken = this.peek();
    let expr = this.parsePrimary();

    while (true) {
      if (this.match(TokenType.DOT)) {
        const name = this.expect(TokenType.IDENTIFIER, "attribute name after '.'");
        expr = {
          type: 'Attribute',
          object: expr,
          name: name.value,
          loc: this.makeLoc(startToken, name),
        };
      } else if (this.match(TokenType.LBRACKET)) {
        const property = this.parseExpression();
        const endToken = this.expect(TokenType.RBRACKET, "']'");
        expr = {
          type: 'Index',
          object: expr,
          property,
          loc: this.makeLoc(startToken, endToken),
        };
      } else {
        break;
      }
    }

    return expr;
  }

  private parsePrimary(): Expression {
    const token = this.peek();

    switch (token.type) {
      case TokenType.STRING:
        this.advance();
        return { type: 'StringLiteral', value: token.value, loc: token.loc };
      case TokenType.TRUE:
      case TokenType.FALSE:
        this.advance();
        return { type: 'BooleanLiteral', value: token.type === TokenType.TRUE, loc: token.loc };
      case TokenType.IDENTIFIER:
        this.advance();
        return { type: 'Variable', name: token.value, loc: token.loc };
      case TokenType.LPAREN: {
        this.advance();
        const expr = this.parseExpression();
        this.expect(TokenType.RPAREN, "')'");
        return expr;
      }
      default:
        throw ParserError.expected('an expression', token);
    }
  }
}
