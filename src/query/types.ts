import type {
  ComparisonOperator,
  FilterNode,
  IModelSchema,
  IQueryParser,
  ISortNode,
  ScalarValue,
  SortDirection
} from '../parser/types';

/**
 * Represents a field in a query
 */
export type QueryField<T> = keyof T & string;

/**
 * Value accepted by an operator: a list for `in`, a scalar for the rest
 */
export type OperatorValue<TOperator extends ComparisonOperator> = TOperator extends 'in'
  ? ReadonlyArray<ScalarValue>
  : ScalarValue;

/**
 * Interface for a query builder
 */
export interface IQueryBuilder<T> {
  /**
   * Replace the filter with a single comparison
   */
  where<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IQueryBuilder<T>;

  /**
   * Combine the current filter with a comparison using `and`
   */
  andWhere<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IQueryBuilder<T>;

  /**
   * Combine the current filter with a comparison using `or`
   */
  orWhere<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IQueryBuilder<T>;

  /**
   * Add a sort key after the existing ones
   */
  orderBy(field: QueryField<T>, direction?: SortDirection): IQueryBuilder<T>;

  /**
   * The filter as a grammar expression, or '' when no filter was set
   */
  toFilterString(): string;

  /**
   * The sort keys as grammar expressions, primary key first
   */
  toSortStrings(): string[];

  /**
   * Parse the built filter against a model
   */
  getFilter<TColumn>(model: IModelSchema<TColumn>, parser?: IQueryParser): FilterNode<TColumn> | null;

  /**
   * Parse the built sort keys against a model
   */
  getSort<TColumn>(model: IModelSchema<TColumn>, parser?: IQueryParser): ISortNode<TColumn>[];
}
