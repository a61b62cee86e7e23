import { beforeEach, describe, expect, it } from 'vitest';
import { Lexer } from '../../src/lexer/lexer.js';
import type { Expression, Output, Program } from '../../src/parser/ast-nodes.js';
import { Parser } from '../../src/parser/parser.js';

describe('Parser', () => {
  let parser: Parser;

  beforeEach(() => {
    parser = new Parser(new Lexer());
  });

  function parse(template: string): Program {
    parser.setInput(template);
    return parser.parse();
  }

  function parseExpression(source: string): Expression {
    const program = parse(`{{ ${source} }}`);
    const output = program.body[0];
    if (output.type !== 'Output') {
      throw new Error(`Expected an Output statement, got ${output.type}`);
    }
    return output.expression;
  }

  describe('construction', () => {
    it('should expose the lexer it was given', () => {
      const lexer = new Lexer();
      expect(new Parser(lexer).getLexer()).toBe(lexer);
    });

    it('should reuse one parser across inputs', () => {
      expect(parse('a').body).toHaveLength(1);
      expect(parse('{{ a }}{{ b }}').body).toHaveLength(2);
    });
  });

  describe('statements', () => {
    it('should parse an empty template to an empty program', () => {
      const program = parse('');

      expect(program.type).toBe('Program');
      expect(program.body).toEqual([]);
    });

    it('should parse text and output statements', () => {
      const program = parse('Hi {{ name }}!');

      expect(program.body).toMatchObject([
        { type: 'Text', value: 'Hi ' },
        { type: 'Output', expression: { type: 'Variable', name: 'name' } },
        { type: 'Text', value: '!' },
      ]);
    });

    it('should record the source span of an output statement', () => {
      const output = parse('ab{{ x }}').body[1];

      expect(output.loc?.start.index).toBe(2);
      expect(output.loc?.end.index).toBe(9);
    });

    it('should parse a for loop', () => {
      const program = parse('{% for m in messages %}{{ m.role }}{% endfor %}');

      expect(program.body).toMatchObject([
        {
          type: 'For',
          target: 'm',
          iterable: 'messages',
          body: [
            {
              type: 'Output',
              expression: {
                type: 'Attribute',
                object: { type: 'Variable', name: 'm' },
                name: 'role',
              },
            },
          ],
        },
      ]);
    });

    it('should parse if with elif and else', () => {
      const program = parse('{% if a %}A{% elif b %}B{% elif c %}C{% else %}D{% endif %}');

      expect(program.body).toMatchObject([
        {
          type: 'If',
          branches: [
            { condition: { type: 'Variable', name: 'a' }, body: [{ type: 'Text', value: 'A' }] },
            { condition: { type: 'Variable', name: 'b' }, body: [{ type: 'Text', value: 'B' }] },
            { condition: { type: 'Variable', name: 'c' }, body: [{ type: 'Text', value: 'C' }] },
          ],
          alternate: [{ type: 'Text', value: 'D' }],
        },
      ]);
    });

    it('should leave alternate null without else', () => {
      const statement = parse('{% if a %}A{% endif %}').body[0];

      expect(statement.type).toBe('If');
      expect(statement).toMatchObject({ alternate: null });
    });

    it('should allow empty bodies', () => {
      expect(parse('{% if a %}{% else %}{% endif %}').body).toMatchObject([
        { type: 'If', branches: [{ body: [] }], alternate: [] },
      ]);
      expect(parse('{% for x in xs %}{% endfor %}').body).toMatchObject([
        { type: 'For', body: [] },
      ]);
    });

    it('should nest blocks', () => {
      const program = parse(
        '{% for m in messages %}{% if m.role == "user" %}U{% endif %}{% endfor %}',
      );

      expect(program.body).toMatchObject([
        {
          type: 'For',
          body: [{ type: 'If', branches: [{ body: [{ type: 'Text', value: 'U' }] }] }],
        },
      ]);
    });

    it('should not include the trimmed newline in the following text', () => {
      const program = parse('{% if a %}\nA\n{% endif %}\n');

      expect(program.body).toMatchObject([
        { type: 'If', branches: [{ body: [{ type: 'Text', value: 'A\n' }] }] },
      ]);
      expect(program.body).toHaveLength(1);
    });
  });

  describe('expressions', () => {
    it('should parse literals', () => {
      expect(parseExpression('"hi"')).toMatchObject({ type: 'StringLiteral', value: 'hi' });
      expect(parseExpression('true')).toMatchObject({ type: 'BooleanLiteral', value: true });
      expect(parseExpression('false')).toMatchObject({ type: 'BooleanLiteral', value: false });
    });

    it('should chain attribute and index access left to right', () => {
      expect(parseExpression("a.b['c'].d")).toMatchObject({
        type: 'Attribute',
        name: 'd',
        object: {
          type: 'Index',
          property: { type: 'StringLiteral', value: 'c' },
          object: {
            type: 'Attribute',
            name: 'b',
            object: { type: 'Variable', name: 'a' },
          },
        },
      });
    });

    it('should accept any expression as an index', () => {
      expect(parseExpression('messages[loop.index0]')).toMatchObject({
        type: 'Index',
        object: { type: 'Variable', name: 'messages' },
        property: { type: 'Attribute', name: 'index0' },
      });
    });

    it('should bind or < and < == < +', () => {
      expect(parseExpression('a or b and c == d + e')).toMatchObject({
        type: 'Binary',
        operator: 'or',
        left: { type: 'Variable', name: 'a' },
        right: {
          type: 'Binary',
          operator: 'and',
          left: { type: 'Variable', name: 'b' },
          right: {
            type: 'Binary',
            operator: '==',
            left: { type: 'Variable', name: 'c' },
            right: {
              type: 'Binary',
              operator: '+',
              left: { type: 'Variable', name: 'd' },
              right: { type: 'Variable', name: 'e' },
            },
          },
        },
      });
    });

    it('should associate + to the left', () => {
      expect(parseExpression('a + b + c')).toMatchObject({
        type: 'Binary',
        operator: '+',
        left: {
          type: 'Binary',
          operator: '+',
          left: { type: 'Variable', name: 'a' },
          right: { type: 'Variable', name: 'b' },
        },
        right: { type: 'Variable', name: 'c' },
      });
    });

    it('should let parentheses override precedence', () => {
      expect(parseExpression('(a or b) and c')).toMatchObject({
        type: 'Binary',
        operator: 'and',
        left: { type: 'Binary', operator: 'or' },
        right: { type: 'Variable', name: 'c' },
      });
    });

    it('should parse postfix access after a parenthesized expression', () => {
      expect(parseExpression('(a).b')).toMatchObject({
        type: 'Attribute',
        name: 'b',
        object: { type: 'Variable', name: 'a' },
      });
    });
  });

  it('should produce output statements whose expression is typed', () => {
    const output: Output | undefined = parse('{{ x }}').body.find(
      (s): s is Output => s.type === 'Output',
    );
    expect(output?.expression).toMatchObject({ type: 'Variable', name: 'x' });
  });
});
