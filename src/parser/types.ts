/**
 * Core AST and token types for the resource query parser
 */

import type { OperatorRegistry } from './registry';

/**
 * Comparison operators produced by binary and membership operations
 */
export type ComparisonOperator =
  | 'eq'
  | 'gt'
  | 'ge'
  | 'lt'
  | 'le'
  | 'like'
  | 'in';

/**
 * Logical operators combining two or more filters
 */
export type CompoundOperator = 'and' | 'or';

/**
 * Represents a sort direction
 */
export type SortDirection = 'asc' | 'desc';

/**
 * A decoded scalar literal
 */
export type ScalarValue = string | number | boolean | null;

/**
 * Represents a value that can be used in a comparison
 */
export type QueryValue = ScalarValue | ReadonlyArray<ScalarValue>;

/**
 * Resolved handle to a model attribute.
 *
 * `name` is the attribute as it was matched against the model schema,
 * `column` is whatever the schema handed back for it.
 */
export interface IColumnRef<TColumn = unknown> {
  readonly name: string;
  readonly column: TColumn;
}

/**
 * Represents a comparison node in the AST
 */
export interface IComparisonNode<TColumn = unknown> {
  readonly type: 'comparison';
  readonly column: IColumnRef<TColumn>;
  readonly operator: ComparisonOperator;
  readonly value: QueryValue;
}

/**
 * Represents an AND/OR node in the AST. Always has at least two children.
 */
export interface ICompoundNode<TColumn = unknown> {
  readonly type: 'compound';
  readonly operator: CompoundOperator;
  readonly children: ReadonlyArray<FilterNode<TColumn>>;
}

/**
 * Represents a single sort key
 */
export interface ISortNode<TColumn = unknown> {
  readonly type: 'sort';
  readonly column: IColumnRef<TColumn>;
  readonly direction: SortDirection;
}

/**
 * Any node usable as a filter
 */
export type FilterNode<TColumn = unknown> =
  | IComparisonNode<TColumn>
  | ICompoundNode<TColumn>;

/**
 * Any node the grammar engine can produce
 */
export type QueryNode<TColumn = unknown> =
  | FilterNode<TColumn>
  | ISortNode<TColumn>;

/**
 * Capability used to resolve attribute names to column handles.
 * Returns undefined when the model has no such attribute.
 */
export interface IModelSchema<TColumn = unknown> {
  resolve(attribute: string): TColumn | undefined;
}

/**
 * Lexical units produced by the tokenizer
 */
export type StructuralSymbol = '(' | ')' | ',';

export interface ISymbolToken {
  readonly kind: 'symbol';
  readonly value: StructuralSymbol;
  readonly position: number;
}

export interface IOperatorToken {
  readonly kind: 'operator';
  readonly value: string;
  readonly position: number;
}

export interface ILiteralToken {
  readonly kind: 'literal';
  readonly value: string;
  readonly position: number;
  /**
   * Set when a double quote opened inside the literal was never closed
   */
  readonly unterminated?: boolean;
}

export interface IEndToken {
  readonly kind: 'end';
  readonly value: '$';
  readonly position: number;
}

export type Token = ISymbolToken | IOperatorToken | ILiteralToken | IEndToken;

/**
 * Minimal logger contract accepted by the parser
 */
export interface ILogger {
  debug(message: string, payload?: unknown): void;
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
}

/**
 * Configuration options for the parser
 */
export interface IParserOptions {
  /**
   * Operator registry to parse against. Defaults to the built-in operators.
   */
  registry?: OperatorRegistry;

  /**
   * Whether to lowercase attribute names before resolving them
   */
  caseInsensitiveFields?: boolean;

  /**
   * Custom attribute name mappings, applied after case normalization
   */
  fieldMappings?: Record<string, string>;

  /**
   * Deepest `and`/`or` nesting accepted; deeper input is a semantic error
   */
  maxNestingDepth?: number;

  /**
   * Logger receiving parser traces
   */
  logger?: ILogger;
}

/**
 * Interface for the query parser
 */
export interface IQueryParser {
  /**
   * Parse a filter expression into an AST
   * @returns null for a blank expression
   * @throws {QueryParseError} If the expression is invalid
   */
  parseFilter<TColumn>(
    expression: string,
    model: IModelSchema<TColumn>
  ): FilterNode<TColumn> | null;

  /**
   * Parse an ordered list of sort expressions
   * @throws {QueryParseError} If any expression is invalid
   */
  parseSort<TColumn>(
    expressions: ReadonlyArray<string>,
    model: IModelSchema<TColumn>
  ): ISortNode<TColumn>[];

  /**
   * Check a filter expression without returning the AST
   */
  validate<TColumn>(expression: string, model: IModelSchema<TColumn>): boolean;
}
