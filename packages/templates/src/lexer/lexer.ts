import { LexerError } from './lexer-error.js';
import type { Position, Token } from './token.js';
import { KEYWORDS, SYMBOLS, TokenType } from './token-types.js';

/**
 * Lexer modes
 */
export const LexerMode = {
  TEXT: 'text', // Scanning literal text between tags
  TAG: 'tag', // Inside {% ... %} or {{ ... }}
} as const;

export type LexerMode = (typeof LexerMode)[keyof typeof LexerMode];

const BLOCK_OPEN = '{%';
const VAR_OPEN = '{{';

/**
 * Lexer for chat templates
 *
 * Produces tokens lazily, one per call to lex(). The lexer state is the
 * input, a cursor (index plus line/column for error positions) and the
 * current mode, so fork() can hand out an independent copy that replays the
 * remaining tokens.
 */
export class Lexer {
  private input: string = '';
  private index: number = 0;
  private line: number = 1;
  private column: number = 0;
  private mode: LexerMode = LexerMode.TEXT;
  private tabWidth: number = 4; // Number of columns a tab counts as

  /**
   * Initialize lexer with template string
   */
  setInput(template: string): void {
    this.input = template;
    this.index = 0;
    this.line = 1;
    this.column = 0;
    this.mode = LexerMode.TEXT;
  }

  /**
   * Create an independent lexer positioned at the same cursor and mode
   */
  fork(): Lexer {
    const copy = new Lexer();
    copy.input = this.input;
    copy.index = this.index;
    copy.line = this.line;
    copy.column = this.column;
    copy.mode = this.mode;
    copy.tabWidth = this.tabWidth;
    return copy;
  }

  getMode(): LexerMode {
    return this.mode;
  }

  /**
   * Extract next token from input
   * Returns EOF token when end of input is reached (on every further call too)
   *
   * @throws {LexerError} On an unterminated string literal
   */
  lex(): Token {
    if (this.mode === LexerMode.TEXT) {
      return this.scanText();
    }
    return this.scanTagToken();
  }

  /**
   * Text mode: emit everything up to the nearest tag opener as one TEXT token,
   * or the opener itself when the cursor sits on one
   */
  private scanText(): Token {
    if (this.isEOF()) {
      return this.createEOFToken();
    }

    if (this.match(BLOCK_OPEN)) {
      this.mode = LexerMode.TAG;
      return this.scanDelimiter(TokenType.BLOCK_START, BLOCK_OPEN);
    }
    if (this.match(VAR_OPEN)) {
      this.mode = LexerMode.TAG;
      return this.scanDelimiter(TokenType.VAR_START, VAR_OPEN);
    }

    const start = this.getPosition();
    const end = this.findNextOpener();
    const value = this.input.slice(this.index, end);
    this.consumeChars(end - this.index);
    return this.createToken(TokenType.TEXT, value, start);
  }

  /**
   * Index of the nearest `{%` or `{{` at or after the cursor, or the input length
   */
  private findNextOpener(): number {
    const block = this.input.indexOf(BLOCK_OPEN, this.index);
    const variable = this.input.indexOf(VAR_OPEN, this.index);

    if (block === -1 && variable === -1) {
      return this.input.length;
    }
    if (block === -1) {
      return variable;
    }
    if (variable === -1) {
      return block;
    }
    return Math.min(block, variable);
  }

  /**
   * Tag mode: scan one token inside {% ... %} or {{ ... }}
   */
  private scanTagToken(): Token {
    while (true) {
      this.skipWhitespace();

      if (this.isEOF()) {
        return this.createEOFToken();
      }

      if (this.match('%}')) {
        this.mode = LexerMode.TEXT;
        const token = this.scanDelimiter(TokenType.BLOCK_END, '%}');
        this.trimLineTerminator();
        return token;
      }

      if (this.match('}}')) {
        this.mode = LexerMode.TEXT;
        return this.scanDelimiter(TokenType.VAR_END, '}}');
      }

      if (this.match('==')) {
        return this.scanDelimiter(TokenType.EQ, '==');
      }

      const char = this.peek();
      const symbol = SYMBOLS.get(char);
      if (symbol) {
        return this.scanDelimiter(symbol, char);
      }

      if (char === '"' || char === "'") {
        return this.scanString();
      }

      const codePoint = this.peekCodePoint();
      if (this.isIdentifierStart(codePoint)) {
        return this.scanIdentifier();
      }

      // Unknown character inside a tag - skip it and keep scanning
      this.advance();
    }
  }

  /**
   * Trim-blocks: drop a single line terminator right after `%}`
   */
  private trimLineTerminator(): void {
    if (this.match('\n')) {
      this.advance();
    } else if (this.match('\r\n')) {
      this.consumeChars(2);
    }
  }

  private skipWhitespace(): void {
    while (!this.isEOF() && this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  /**
   * Scan a string literal ("text" or 'text')
   * Escapes: \n and \t map to newline and tab, any other escaped character
   * stands for itself (\\ → \, \' → ')
   */
  private scanString(): Token {
    const start = this.getPosition();
    const quote = this.advance(); // Consume opening quote
    let value = '';

    while (!this.isEOF()) {
      const char = this.advance();

      if (char === quote) {
        return this.createToken(TokenType.STRING, value, start);
      }

      if (char !== '\\') {
        value += char;
        continue;
      }

      if (this.isEOF()) {
        break;
      }

      const escaped = this.advance();
      if (escaped === 'n') {
        value += '\n';
      } else if (escaped === 't') {
        value += '\t';
      } else {
        value += escaped;
      }
    }

    throw new LexerError(`Unterminated string literal: expected closing ${quote}`, start);
  }

  /**
   * Scan an identifier or keyword
   * Identifiers start with a letter or _ and continue with letters, digits or _
   */
  private scanIdentifier(): Token {
    const start = this.getPosition();
    let value = '';

    while (!this.isEOF() && this.isIdentifierPart(this.peekCodePoint())) {
      const char = String.fromCodePoint(this.peekCodePoint());
      this.consumeChars(char.length);
      value += char;
    }

    const keyword = KEYWORDS.get(value);
    return this.createToken(keyword ?? TokenType.IDENTIFIER, value, start);
  }

  /**
   * Scan a fixed delimiter or symbol
   */
  private scanDelimiter(type: TokenType, delimiter: string): Token {
    const start = this.getPosition();
    this.consumeChars(delimiter.length);
    return this.createToken(type, delimiter, start);
  }

  private createToken(type: TokenType, value: string, start: Position): Token {
    return {
      type,
      value,
      loc: {
        start,
        end: this.getPosition(),
      },
    };
  }

  private createEOFToken(): Token {
    const pos = this.getPosition();
    return {
      type: TokenType.EOF,
      value: '',
      loc: {
        start: pos,
        end: pos,
      },
    };
  }

  private consumeChars(count: number): void {
    for (let i = 0; i < count; i++) {
      this.advance();
    }
  }

  /**
   * Look ahead at next character without consuming it
   */
  peek(): string {
    if (this.isEOF()) {
      return '';
    }
    return this.input[this.index];
  }

  /**
   * Full code point at the cursor (identifiers may use astral letters)
   */
  private peekCodePoint(): number {
    return this.input.codePointAt(this.index) ?? -1;
  }

  /**
   * Consume and return next character
   * - Newlines increment line and reset column to 0
   * - Tabs advance column by tabWidth
   * - Other characters advance column by 1
   */
  advance(): string {
    if (this.isEOF()) {
      return '';
    }

    const char = this.input[this.index];
    this.index++;

    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else if (char === '\t') {
      this.column += this.tabWidth;
    } else {
      this.column++;
    }

    return char;
  }

  /**
   * Check if next characters match the given string
   */
  match(str: string): boolean {
    return this.input.startsWith(str, this.index);
  }

  isEOF(): boolean {
    return this.index >= this.input.length;
  }

  private isWhitespace(char: string): boolean {
    return /\s/u.test(char);
  }

  private isIdentifierStart(codePoint: number): boolean {
    if (codePoint < 0) {
      return false;
    }
    const char = String.fromCodePoint(codePoint);
    return char === '_' || /\p{Alphabetic}/u.test(char);
  }

  private isIdentifierPart(codePoint: number): boolean {
    if (codePoint < 0) {
      return false;
    }
    const char = String.fromCodePoint(codePoint);
    return this.isIdentifierStart(codePoint) || /\p{N}/u.test(char);
  }

  private getPosition(): Position {
    return {
      line: this.line,
      column: this.column,
      index: this.index,
    };
  }

  /**
   * Convenience method to tokenize an entire template string
   * @returns Array of all tokens including the EOF token
   */
  tokenize(template: string): Token[] {
    this.setInput(template);
    const tokens: Token[] = [];

    let token = this.lex();
    while (token.type !== TokenType.EOF) {
      tokens.push(token);
      token = this.lex();
    }
    tokens.push(token);

    return tokens;
  }
}
