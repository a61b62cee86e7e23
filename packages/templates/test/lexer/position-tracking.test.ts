import { beforeEach, describe, expect, it } from 'vitest';
import { Lexer } from '../../src/lexer/lexer.js';
import { TokenType } from '../../src/lexer/token-types.js';

describe('Lexer - position tracking', () => {
  let lexer: Lexer;

  beforeEach(() => {
    lexer = new Lexer();
  });

  it('should start at line 1, column 0', () => {
    const token = lexer.tokenize('Hello')[0];

    expect(token.loc.start).toEqual({ line: 1, column: 0, index: 0 });
    expect(token.loc.end).toEqual({ line: 1, column: 5, index: 5 });
  });

  it('should move to the next line after a newline', () => {
    const tokens = lexer.tokenize('Hi\n{{ x }}');

    expect(tokens[0].loc.end).toEqual({ line: 2, column: 0, index: 3 });
    expect(tokens[1].type).toBe(TokenType.VAR_START);
    expect(tokens[1].loc.start).toEqual({ line: 2, column: 0, index: 3 });
    expect(tokens[2].loc.start).toEqual({ line: 2, column: 3, index: 6 });
  });

  it('should count a tab as four columns', () => {
    const tokens = lexer.tokenize('\t{{ x }}');

    expect(tokens[1].loc.start).toEqual({ line: 1, column: 4, index: 1 });
  });

  it('should span lines in multi-line text', () => {
    const token = lexer.tokenize('Line 1\nLine 2\nLine 3')[0];

    expect(token.loc.start.line).toBe(1);
    expect(token.loc.end.line).toBe(3);
  });

  it('should place EOF at the end of input', () => {
    const tokens = lexer.tokenize('ab');
    const eof = tokens[tokens.length - 1];

    expect(eof.type).toBe(TokenType.EOF);
    expect(eof.loc.start).toEqual({ line: 1, column: 2, index: 2 });
    expect(eof.loc.end).toEqual(eof.loc.start);
  });
});
