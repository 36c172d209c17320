import { formatFilter, formatSort } from '../parser/format';
import { QueryParser } from '../parser/parser';
import {
  ComparisonOperator,
  CompoundOperator,
  FilterNode,
  IComparisonNode,
  IModelSchema,
  IQueryParser,
  ISortNode,
  SortDirection
} from '../parser/types';
import { IQueryBuilder, OperatorValue, QueryField } from './types';

/**
 * Fluent builder producing filter and sort expressions in the query grammar.
 *
 * Field names are checked against `T` at compile time only; the strings it
 * produces still go through the parser and the model schema.
 *
 * @example
 * ```typescript
 * interface User { id: number; name: string }
 *
 * const query = new QueryBuilder<User>()
 *   .where('id', 'gt', 1)
 *   .andWhere('name', 'like', 'J%')
 *   .orderBy('name');
 *
 * query.toFilterString(); // and(gt(id,1),like(name,"J%"))
 * query.toSortStrings();  // ['asc(name)']
 * ```
 */
export class QueryBuilder<T> implements IQueryBuilder<T> {
  private filter: FilterNode<string> | null = null;
  private sort: ISortNode<string>[] = [];

  public where<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IQueryBuilder<T> {
    this.filter = this.buildComparison(field, operator, value);
    return this;
  }

  public andWhere<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IQueryBuilder<T> {
    return this.combine('and', this.buildComparison(field, operator, value));
  }

  public orWhere<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IQueryBuilder<T> {
    return this.combine('or', this.buildComparison(field, operator, value));
  }

  public orderBy(field: QueryField<T>, direction: SortDirection = 'asc'): IQueryBuilder<T> {
    this.sort.push({
      type: 'sort',
      column: { name: field, column: field },
      direction
    });
    return this;
  }

  public toFilterString(): string {
    return this.filter ? formatFilter(this.filter) : '';
  }

  public toSortStrings(): string[] {
    return formatSort(this.sort);
  }

  public getFilter<TColumn>(
    model: IModelSchema<TColumn>,
    parser: IQueryParser = new QueryParser()
  ): FilterNode<TColumn> | null {
    return parser.parseFilter(this.toFilterString(), model);
  }

  public getSort<TColumn>(
    model: IModelSchema<TColumn>,
    parser: IQueryParser = new QueryParser()
  ): ISortNode<TColumn>[] {
    return parser.parseSort(this.toSortStrings(), model);
  }

  /**
   * Repeated calls with the same operator extend one node instead of nesting
   */
  private combine(operator: CompoundOperator, next: FilterNode<string>): IQueryBuilder<T> {
    const current = this.filter;

    if (!current) {
      this.filter = next;
    } else if (current.type === 'compound' && current.operator === operator) {
      this.filter = { ...current, children: [...current.children, next] };
    } else {
      this.filter = { type: 'compound', operator, children: [current, next] };
    }
    return this;
  }

  private buildComparison<TOperator extends ComparisonOperator>(
    field: QueryField<T>,
    operator: TOperator,
    value: OperatorValue<TOperator>
  ): IComparisonNode<string> {
    return {
      type: 'comparison',
      column: { name: field, column: field },
      operator,
      value
    };
  }
}
