import { QuerySemanticError } from './errors';
import type { IOperatorContext } from './registry';
import { splitTopLevel } from './scanner';
import type { CompoundOperator, ICompoundNode } from './types';

/**
 * Split the raw argument of an `and`/`or` into its top-level
 * sub-expressions, in source order.
 *
 * Splitting counts parenthesis depth rather than matching operator names,
 * so `and(or(eq(a,1),eq(b,2)),eq(c,3))` yields two segments whatever order
 * the operators appear in.
 */
export function segmentCompoundArgument(raw: string): string[] {
  if (raw.trim() === '') {
    return [];
  }
  return splitTopLevel(raw);
}

/**
 * Check that a compound argument splits into at least two non-blank
 * sub-expressions and return them
 * @throws {QuerySemanticError} Otherwise
 */
export function checkCompoundSegments(
  operator: CompoundOperator,
  raw: string,
  expression?: string
): string[] {
  const segments = segmentCompoundArgument(raw);

  if (segments.length < 2) {
    throw new QuerySemanticError(`${operator} operation takes at least two arguments.`, {
      operator,
      expression
    });
  }
  if (segments.some(segment => segment === '')) {
    throw new QuerySemanticError(`${operator} operation has an empty argument.`, {
      operator,
      expression
    });
  }

  return segments;
}

/**
 * Parse each sub-expression of a compound argument and assemble the node
 */
export function resolveCompound<TColumn>(
  operator: CompoundOperator,
  raw: string,
  context: IOperatorContext<TColumn>
): ICompoundNode<TColumn> {
  const segments = checkCompoundSegments(operator, raw, context.expression);
  const children = segments.map(segment => context.parseFilter(segment));

  const node: ICompoundNode<TColumn> = {
    type: 'compound',
    operator,
    children: Object.freeze(children)
  };
  return Object.freeze(node);
}
