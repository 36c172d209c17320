import { RecordModelSchema } from '../schema/record';
import {
  QueryLexicalError,
  QueryParseError,
  QuerySemanticError,
  QuerySyntaxError
} from './errors';
import { DEFAULT_MAX_NESTING_DEPTH, QueryParser } from './parser';
import { ILogger } from './types';

const model = new RecordModelSchema({
  id: 'users.id',
  name: 'users.name',
  email: 'users.email',
  age: 'users.age'
});

function nest(depth: number): string {
  let expression = 'eq(id,1)';
  for (let level = 0; level < depth; level++) {
    expression = `and(${expression},eq(id,1))`;
  }
  return expression;
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}

describe('QueryParser', () => {
  let parser: QueryParser;

  beforeEach(() => {
    parser = new QueryParser();
  });

  describe('parseFilter', () => {
    it('should parse a binary comparison', () => {
      expect(parser.parseFilter('eq(name,"John")', model)).toEqual({
        type: 'comparison',
        column: { name: 'name', column: 'users.name' },
        operator: 'eq',
        value: 'John'
      });
    });

    it.each([
      ['gt(age,18)', 'gt', 18],
      ['ge(age,18.5)', 'ge', 18.5],
      ['lt(age,-1)', 'lt', -1],
      ['le(age,0)', 'le', 0],
      ['like(name,"J%")', 'like', 'J%'],
      ['eq(email,null)', 'eq', null],
      ['eq(name,true)', 'eq', true],
      ['lt(age,9007199254740991)', 'lt', 9007199254740991],
      ['gt(age,-9007199254740991)', 'gt', -9007199254740991],
      ['eq(age,1.5e3)', 'eq', 1500]
    ])('should decode %s', (expression, operator, value) => {
      expect(parser.parseFilter(expression, model)).toMatchObject({
        type: 'comparison',
        operator,
        value
      });
    });

    it('should parse membership lists', () => {
      expect(parser.parseFilter('in(id,[1,2,3])', model)).toEqual({
        type: 'comparison',
        column: { name: 'id', column: 'users.id' },
        operator: 'in',
        value: [1, 2, 3]
      });
    });

    it('should parse nested compounds in source order', () => {
      const filter = parser.parseFilter(
        'or(and(eq(id,1),eq(name,"a")),eq(id,2),like(email,"%@example.com"))',
        model
      );

      expect(filter).toEqual({
        type: 'compound',
        operator: 'or',
        children: [
          {
            type: 'compound',
            operator: 'and',
            children: [
              { type: 'comparison', column: { name: 'id', column: 'users.id' }, operator: 'eq', value: 1 },
              { type: 'comparison', column: { name: 'name', column: 'users.name' }, operator: 'eq', value: 'a' }
            ]
          },
          { type: 'comparison', column: { name: 'id', column: 'users.id' }, operator: 'eq', value: 2 },
          {
            type: 'comparison',
            column: { name: 'email', column: 'users.email' },
            operator: 'like',
            value: '%@example.com'
          }
        ]
      });
    });

    it('should segment mixed and/or nesting by parenthesis depth', () => {
      const filter = parser.parseFilter('and(or(eq(id,1),eq(id,2)),or(eq(age,3),eq(age,4)))', model);

      expect(filter?.type).toBe('compound');
      if (filter?.type !== 'compound') {
        return;
      }
      expect(filter.children).toHaveLength(2);
      expect(filter.children.map(child => child.type === 'compound' && child.operator)).toEqual([
        'or',
        'or'
      ]);
    });

    it('should keep commas and parentheses inside quoted values', () => {
      const filter = parser.parseFilter('and(eq(name,"a,b)"),eq(email,"(x)"))', model);

      expect(filter).toMatchObject({
        type: 'compound',
        children: [{ value: 'a,b)' }, { value: '(x)' }]
      });
    });

    it('should tolerate whitespace between tokens', () => {
      expect(parser.parseFilter(' and( gt(id, 1) , lt( id ,5) ) ', model)).toEqual(
        parser.parseFilter('and(gt(id,1),lt(id,5))', model)
      );
    });

    it('should ignore whitespace inside unquoted literals', () => {
      expect(parser.parseFilter('eq(na me, 1 0)', model)).toEqual(
        parser.parseFilter('eq(name,10)', model)
      );
      expect(parser.parseFilter('eq(name, " J o " )', model)).toMatchObject({ value: ' J o ' });
    });

    it('should return null for blank input', () => {
      expect(parser.parseFilter('', model)).toBeNull();
      expect(parser.parseFilter('   ', model)).toBeNull();
    });

    it('should freeze every node and value list', () => {
      const filter = parser.parseFilter('and(in(id,[1,2]),eq(name,"a"))', model);

      expect(Object.isFrozen(filter)).toBe(true);
      if (filter?.type !== 'compound') {
        throw new Error('Expected a compound filter');
      }
      expect(Object.isFrozen(filter.children)).toBe(true);

      const [membership] = filter.children;
      expect(Object.isFrozen(membership)).toBe(true);
      if (membership.type !== 'comparison') {
        throw new Error('Expected a comparison');
      }
      expect(Object.isFrozen(membership.value)).toBe(true);
      expect(Object.isFrozen(membership.column)).toBe(true);
    });

    it('should reject a sort at the top level', () => {
      expect(() => parser.parseFilter('asc(name)', model)).toThrow(
        new QuerySemanticError('Sort operation asc cannot be used as a filter.')
      );
    });

    it('should reject a sort inside a compound', () => {
      expect(() => parser.parseFilter('and(eq(id,1),desc(id))', model)).toThrow(
        'Sort operation desc cannot be used as a filter.'
      );
    });
  });

  describe('syntax errors', () => {
    it('should report an unknown operator with its position', () => {
      const error = captureError(() => parser.parseFilter('foo(id,1)', model));

      expect(error).toBeInstanceOf(QuerySyntaxError);
      expect(error).toMatchObject({ token: 'foo', position: 0, expression: 'foo(id,1)' });
      expect(error).toHaveProperty('message', 'Unexpected token "foo" at position 0 in "foo(id,1)"');
    });

    it('should report a missing closing parenthesis at end of input', () => {
      const error = captureError(() => parser.parseFilter('eq(id,1', model));

      expect(error).toBeInstanceOf(QuerySyntaxError);
      expect(error).toMatchObject({ token: 'end of input', position: 7 });
    });

    it('should report trailing input after a complete expression', () => {
      const error = captureError(() => parser.parseFilter('eq(id,1))', model));

      expect(error).toBeInstanceOf(QuerySyntaxError);
      expect(error).toMatchObject({ token: ')', position: 8 });
    });

    it('should report an operator used as an argument', () => {
      const error = captureError(() => parser.parseFilter('eq(eq(id,1),2)', model));

      expect(error).toBeInstanceOf(QuerySyntaxError);
      expect(error).toMatchObject({ token: 'eq', position: 3 });
    });

    it('should report an unterminated quote as a lexical error', () => {
      const error = captureError(() => parser.parseFilter('eq(name,"abc', model));

      expect(error).toBeInstanceOf(QueryLexicalError);
      expect(error).toHaveProperty(
        'message',
        'Unterminated quoted value starting at position 8 in "eq(name,"abc"'
      );
    });
  });

  describe('semantic errors', () => {
    it.each([
      ['eq(id)', 'Binary operation eq requires two arguments.'],
      ['eq(id,1,2)', 'Binary operation eq requires two arguments.'],
      ['eq(,1)', 'Binary operation eq first argument is empty.'],
      ['gt(id,)', 'Binary operation gt second argument is empty.'],
      ['eq(id,abc)', 'Operation eq value abc is not a valid literal.'],
      ['eq(id,[1,2])', 'Binary operation eq requires a string, number, boolean or null value.'],
      ['in(id,[])', 'Operation in requires a non-empty list of scalar values, got [].'],
      ['in(id,1)', 'Operation in requires a non-empty list of scalar values, got 1.'],
      ['in(id,"a")', 'Operation in requires a non-empty list of scalar values, got "a".'],
      ['and(eq(id,1))', 'and operation takes at least two arguments.'],
      ['or()', 'or operation takes at least two arguments.'],
      ['and(eq(id,1),)', 'and operation has an empty argument.'],
      ['eq(password,"x")', 'Resource model does not contain password attribute.'],
      [
        'eq(id,9007199254740993)',
        'Operation eq value 9007199254740993 is outside the exactly representable number range.'
      ],
      ['gt(age,1e999)', 'Operation gt value 1e999 is outside the exactly representable number range.'],
      ['lt(age,-1e999)', 'Operation lt value -1e999 is outside the exactly representable number range.'],
      [
        'in(id,[1, 1e999])',
        'Operation in value [1,1e999] is outside the exactly representable number range.'
      ]
    ])('%s', (expression, message) => {
      const error = captureError(() => parser.parseFilter(expression, model));

      expect(error).toBeInstanceOf(QuerySemanticError);
      expect(error).toHaveProperty('message', message);
    });

    it('should carry the operator and field on an unknown attribute', () => {
      const error = captureError(() => parser.parseFilter('like(password,"x")', model));

      expect(error).toMatchObject({
        operator: 'like',
        field: 'password',
        expression: 'like(password,"x")'
      });
    });

    it('should bound compound nesting', () => {
      const nested = nest(DEFAULT_MAX_NESTING_DEPTH + 1);
      const error = captureError(() => parser.parseFilter(nested, model));

      expect(error).toBeInstanceOf(QuerySemanticError);
      expect(error).toHaveProperty(
        'message',
        `Expression nests deeper than ${DEFAULT_MAX_NESTING_DEPTH} levels.`
      );
      expect(parser.parseFilter(nest(DEFAULT_MAX_NESTING_DEPTH), model)).toMatchObject({
        type: 'compound'
      });
    });

    it('should make every parse error a QueryParseError', () => {
      expect(captureError(() => parser.parseFilter('eq(id)', model))).toBeInstanceOf(QueryParseError);
      expect(captureError(() => parser.parseFilter('eq(id', model))).toBeInstanceOf(QueryParseError);
    });
  });

  describe('parseSort', () => {
    it('should return sort keys in input order', () => {
      expect(parser.parseSort(['desc(age)', 'asc(name)'], model)).toEqual([
        { type: 'sort', column: { name: 'age', column: 'users.age' }, direction: 'desc' },
        { type: 'sort', column: { name: 'name', column: 'users.name' }, direction: 'asc' }
      ]);
    });

    it('should return an empty list for no expressions', () => {
      expect(parser.parseSort([], model)).toEqual([]);
    });

    it('should reject filter operators', () => {
      expect(() => parser.parseSort(['eq(id,1)'], model)).toThrow(
        'Operation eq cannot be used as a sort expression.'
      );
    });

    it('should reject blank entries and extra arguments', () => {
      expect(() => parser.parseSort([' '], model)).toThrow('Sort expression is empty.');
      expect(() => parser.parseSort(['asc(id,name)'], model)).toThrow(
        'Sort operation asc takes exactly one argument.'
      );
      expect(() => parser.parseSort(['desc()'], model)).toThrow('Sort operation desc argument is empty.');
    });

    it('should reject unknown attributes', () => {
      expect(() => parser.parseSort(['asc(password)'], model)).toThrow(
        'Resource model does not contain password attribute.'
      );
    });
  });

  describe('parse', () => {
    it('should run the engine over pre-tokenized input', () => {
      const tokens = parser.tokenize('asc(id)');

      expect(parser.parse(tokens, model, 'asc(id)')).toEqual({
        type: 'sort',
        column: { name: 'id', column: 'users.id' },
        direction: 'asc'
      });
    });
  });

  describe('validate', () => {
    it('should return true for valid expressions', () => {
      expect(parser.validate('and(gt(age,18),like(name,"J%"))', model)).toBe(true);
      expect(parser.validate('', model)).toBe(true);
    });

    it('should return false for invalid expressions', () => {
      expect(parser.validate('eq(id', model)).toBe(false);
      expect(parser.validate('eq(unknown,1)', model)).toBe(false);
      expect(parser.validate('eq(name,"abc', model)).toBe(false);
    });

    it('should return false for very deep nesting', () => {
      expect(parser.validate(nest(1000), model)).toBe(false);
    });
  });

  describe('options', () => {
    it('should lowercase attributes when case-insensitive', () => {
      const insensitive = new QueryParser({ caseInsensitiveFields: true });

      expect(insensitive.parseFilter('eq(NAME,"a")', model)).toMatchObject({
        column: { name: 'name', column: 'users.name' }
      });
      expect(() => parser.parseFilter('eq(NAME,"a")', model)).toThrow(
        'Resource model does not contain NAME attribute.'
      );
    });

    it('should apply field mappings before resolving', () => {
      const mapped = new QueryParser({ fieldMappings: { user_name: 'name' } });

      expect(mapped.parseFilter('eq(user_name,"a")', model)).toMatchObject({
        column: { name: 'name', column: 'users.name' }
      });
    });

    it('should not map attribute names through object prototype keys', () => {
      const prototypeKeys = new RecordModelSchema({ id: 'users.id', toString: 'users.to_string' });
      const mapped = new QueryParser({ fieldMappings: { uid: 'id' } });

      expect(mapped.parseFilter('eq(toString,"a")', prototypeKeys)).toMatchObject({
        column: { name: 'toString', column: 'users.to_string' }
      });
      expect(() => mapped.parseFilter('eq(constructor,1)', prototypeKeys)).toThrow(
        'Resource model does not contain constructor attribute.'
      );
      expect(() => parser.parseFilter('eq(__proto__,1)', prototypeKeys)).toThrow(
        'Resource model does not contain __proto__ attribute.'
      );
    });

    it('should take a custom nesting limit', () => {
      const shallow = new QueryParser({ maxNestingDepth: 2 });

      expect(shallow.validate(nest(2), model)).toBe(true);
      expect(() => shallow.parseFilter(nest(3), model)).toThrow(
        'Expression nests deeper than 2 levels.'
      );
    });

    it('should send token and derivation traces to the logger', () => {
      const logger: ILogger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn()
      };
      const traced = new QueryParser({ logger });

      traced.parseFilter('eq(id,1)', model);

      expect(logger.debug).toHaveBeenCalledWith('tokens', {
        expression: 'eq(id,1)',
        tokens: ['eq', '(', 'id', ',', '1', ')', '$']
      });
      expect(logger.debug).toHaveBeenCalledWith('derivation', {
        expression: 'eq(id,1)',
        steps: [
          'expression -> operator:eq',
          'arguments -> literal',
          'more -> ,',
          'arguments -> literal',
          'more -> )'
        ]
      });
    });
  });

  it('should give the same result when one parser is shared', () => {
    const expressions = ['eq(id,1)', 'and(gt(age,1),lt(age,9))', 'in(name,["a","b"])'];
    const first = expressions.map(expression => parser.parseFilter(expression, model));
    const second = expressions.map(expression => parser.parseFilter(expression, model));

    expect(second).toEqual(first);
    second.forEach((filter, index) => expect(filter).not.toBe(first[index]));
  });
});
