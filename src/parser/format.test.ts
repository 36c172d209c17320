import { RecordModelSchema } from '../schema/record';
import { formatFilter, formatQueryNode, formatSort } from './format';
import { QueryParser } from './parser';

describe('format', () => {
  const parser = new QueryParser();
  const model = new RecordModelSchema({
    id: 'id',
    name: 'name',
    tags: 'tags'
  });

  it('should render the canonical form of a filter', () => {
    const filter = parser.parseFilter(' and( gt(id, 1) , or(like(name,"J%"), in(tags, ["a", "b"])) ) ', model);

    expect(filter && formatFilter(filter)).toBe('and(gt(id,1),or(like(name,"J%"),in(tags,["a","b"])))');
  });

  it('should render sort keys in order', () => {
    const sort = parser.parseSort(['desc(id)', 'asc( name )'], model);

    expect(formatSort(sort)).toEqual(['desc(id)', 'asc(name)']);
  });

  it('should escape quotes and keep null values', () => {
    const filter = parser.parseFilter('and(eq(name,"say \\"hi\\""),eq(tags,null))', model);

    expect(filter && formatQueryNode(filter)).toBe('and(eq(name,"say \\"hi\\""),eq(tags,null))');
  });

  it.each([
    'eq(name,"John")',
    'and(ge(id,1.5),le(id,10))',
    'or(and(eq(id,1),eq(name,"a,b")),in(id,[1,2,3]))',
    'eq(name,false)'
  ])('should parse back to an equal tree: %s', expression => {
    const filter = parser.parseFilter(expression, model);
    if (!filter) {
      throw new Error('Expected a filter');
    }

    expect(parser.parseFilter(formatFilter(filter), model)).toEqual(filter);
  });
});
