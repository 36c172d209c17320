/**
 * Built-in operators of the resource query grammar
 */

import { checkCompoundSegments, resolveCompound } from './compound';
import { QuerySemanticError } from './errors';
import { ARGUMENT_LIST, GrammarEntry } from './grammar';
import { IOperatorContext, IOperatorDescriptor, OperatorKind, OperatorRegistry } from './registry';
import {
  ComparisonOperator,
  CompoundOperator,
  IComparisonNode,
  ICompoundNode,
  ISortNode,
  QueryValue,
  ScalarValue,
  SortDirection
} from './types';

export type BinaryOperator = Exclude<ComparisonOperator, 'in'>;

export const BINARY_OPERATORS: ReadonlyArray<BinaryOperator> = ['eq', 'gt', 'ge', 'lt', 'le', 'like'];

export function isScalar(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Narrow a comparison value to its list form
 */
export function isListValue(value: QueryValue): value is ReadonlyArray<ScalarValue> {
  return Array.isArray(value);
}

/**
 * Decode a raw literal the way JSON does
 * @throws {QuerySemanticError} If the literal is not valid JSON, or holds a
 * number JSON decoding would round
 */
export function decodeLiteral(raw: string, operator: string, expression?: string): unknown {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new QuerySemanticError(`Operation ${operator} value ${raw} is not a valid literal.`, {
      operator,
      expression
    });
  }

  const numbers: unknown[] = Array.isArray(value) ? value : [value];
  if (numbers.some(item => typeof item === 'number' && !isExactNumber(item))) {
    throw new QuerySemanticError(
      `Operation ${operator} value ${raw} is outside the exactly representable number range.`,
      { operator, expression }
    );
  }
  return value;
}

/**
 * Finite, and a safe integer when integral
 */
function isExactNumber(value: number): boolean {
  return Number.isFinite(value) && (!Number.isInteger(value) || Number.isSafeInteger(value));
}

/**
 * Shared shape of operators taking `column, value`
 */
abstract class ColumnValueOperator<TOperator extends ComparisonOperator> implements IOperatorDescriptor {
  public readonly kind: OperatorKind = 'comparison';
  public readonly minArity = 2;
  public readonly grammar: ReadonlyArray<GrammarEntry> = ARGUMENT_LIST;

  constructor(public readonly token: TOperator) {}

  public validate<TColumn>(args: ReadonlyArray<string>, context: IOperatorContext<TColumn>): void {
    const { expression } = context;
    const operator = this.token;

    if (args.length !== this.minArity) {
      throw new QuerySemanticError(`Binary operation ${operator} requires two arguments.`, {
        operator,
        expression
      });
    }
    if (!args[0]) {
      throw new QuerySemanticError(`Binary operation ${operator} first argument is empty.`, {
        operator,
        expression
      });
    }
    if (!args[1]) {
      throw new QuerySemanticError(`Binary operation ${operator} second argument is empty.`, {
        operator,
        field: args[0],
        expression
      });
    }

    context.resolveColumn(args[0], operator);
    this.decodeValue(args[1], expression);
  }

  public build<TColumn>(args: ReadonlyArray<string>, context: IOperatorContext<TColumn>): IComparisonNode<TColumn> {
    const value = this.decodeValue(args[1], context.expression);

    const node: IComparisonNode<TColumn> = {
      type: 'comparison',
      column: context.resolveColumn(args[0], this.token),
      operator: this.token,
      value: Array.isArray(value) ? Object.freeze([...value]) : value
    };
    return Object.freeze(node);
  }

  protected abstract decodeValue(raw: string, expression: string): ScalarValue | ScalarValue[];
}

/**
 * eq, gt, ge, lt, le and like: the value must decode to a scalar
 */
export class BinaryOperatorDescriptor extends ColumnValueOperator<BinaryOperator> {
  protected decodeValue(raw: string, expression: string): ScalarValue {
    const value = decodeLiteral(raw, this.token, expression);

    if (!isScalar(value)) {
      throw new QuerySemanticError(
        `Binary operation ${this.token} requires a string, number, boolean or null value.`,
        { operator: this.token, expression }
      );
    }
    return value;
  }
}

/**
 * in: the value must decode to a non-empty list of scalars
 */
export class MembershipOperatorDescriptor extends ColumnValueOperator<'in'> {
  constructor() {
    super('in');
  }

  protected decodeValue(raw: string, expression: string): ScalarValue[] {
    const value = decodeLiteral(raw, this.token, expression);

    if (!Array.isArray(value) || value.length === 0 || !value.every(isScalar)) {
      throw new QuerySemanticError(
        `Operation ${this.token} requires a non-empty list of scalar values, got ${raw}.`,
        { operator: this.token, expression }
      );
    }
    return value;
  }
}

/**
 * and / or: the single raw argument holds two or more sub-expressions
 */
export class CompoundOperatorDescriptor implements IOperatorDescriptor {
  public readonly kind: OperatorKind = 'compound';
  public readonly minArity = 2;
  public readonly grammar: ReadonlyArray<GrammarEntry> = ARGUMENT_LIST;

  constructor(public readonly token: CompoundOperator) {}

  public validate<TColumn>(args: ReadonlyArray<string>, context: IOperatorContext<TColumn>): void {
    checkCompoundSegments(this.token, args.join(','), context.expression);
  }

  public build<TColumn>(args: ReadonlyArray<string>, context: IOperatorContext<TColumn>): ICompoundNode<TColumn> {
    return resolveCompound(this.token, args.join(','), context);
  }
}

/**
 * asc / desc: one column, direction fixed by the operator
 */
export class SortOperatorDescriptor implements IOperatorDescriptor {
  public readonly kind: OperatorKind = 'sort';
  public readonly minArity = 1;
  public readonly grammar: ReadonlyArray<GrammarEntry> = ARGUMENT_LIST;

  constructor(public readonly token: SortDirection) {}

  public validate<TColumn>(args: ReadonlyArray<string>, context: IOperatorContext<TColumn>): void {
    const operator = this.token;

    if (args.length !== this.minArity) {
      throw new QuerySemanticError(`Sort operation ${operator} takes exactly one argument.`, {
        operator,
        expression: context.expression
      });
    }
    if (!args[0]) {
      throw new QuerySemanticError(`Sort operation ${operator} argument is empty.`, {
        operator,
        expression: context.expression
      });
    }

    context.resolveColumn(args[0], operator);
  }

  public build<TColumn>(args: ReadonlyArray<string>, context: IOperatorContext<TColumn>): ISortNode<TColumn> {
    const node: ISortNode<TColumn> = {
      type: 'sort',
      column: context.resolveColumn(args[0], this.token),
      direction: this.token
    };
    return Object.freeze(node);
  }
}

/**
 * Create a registry holding the built-in operators, in precedence order:
 * binary comparisons, membership, compound, sort. The result is frozen.
 */
export function createDefaultRegistry(): OperatorRegistry {
  const registry = new OperatorRegistry();

  for (const token of BINARY_OPERATORS) {
    registry.register(new BinaryOperatorDescriptor(token));
  }
  registry.register(new MembershipOperatorDescriptor());
  registry.register(new CompoundOperatorDescriptor('and'));
  registry.register(new CompoundOperatorDescriptor('or'));
  registry.register(new SortOperatorDescriptor('asc'));
  registry.register(new SortOperatorDescriptor('desc'));

  return registry.freeze();
}

/**
 * Process-wide registry of the built-in operators
 */
export const DEFAULT_OPERATOR_REGISTRY: OperatorRegistry = createDefaultRegistry();
