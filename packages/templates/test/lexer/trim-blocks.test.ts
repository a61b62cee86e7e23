import { beforeEach, describe, expect, it } from 'vitest';
import { Lexer } from '../../src/lexer/lexer.js';
import { TokenType } from '../../src/lexer/token-types.js';

describe('Lexer - trimming after statement tags', () => {
  let lexer: Lexer;

  beforeEach(() => {
    lexer = new Lexer();
  });

  function textValues(template: string): string[] {
    return lexer
      .tokenize(template)
      .filter((t) => t.type === TokenType.TEXT)
      .map((t) => t.value);
  }

  it('should drop one newline after %}', () => {
    expect(textValues('{% if x %}\nA')).toEqual(['A']);
  });

  it('should drop one CRLF after %}', () => {
    expect(textValues('{% if x %}\r\nA')).toEqual(['A']);
  });

  it('should drop only the first of several newlines', () => {
    expect(textValues('{% if x %}\n\nA')).toEqual(['\nA']);
  });

  it('should keep spaces before the newline', () => {
    expect(textValues('{% if x %} \nA')).toEqual([' \nA']);
  });

  it('should not trim after }}', () => {
    expect(textValues('{{ x }}\nA')).toEqual(['\nA']);
  });

  it('should not trim before {%', () => {
    expect(textValues('A\n{% if x %}')).toEqual(['A\n']);
  });

  it('should end the BLOCK_END location before the dropped newline', () => {
    const tokens = lexer.tokenize('{% if x %}\nA');
    const blockEnd = tokens[3];
    const text = tokens[4];

    expect(blockEnd.type).toBe(TokenType.BLOCK_END);
    expect(blockEnd.loc.start.index).toBe(8);
    expect(blockEnd.loc.end.index).toBe(10);
    expect(text.loc.start).toEqual({ line: 2, column: 0, index: 11 });
  });
});
