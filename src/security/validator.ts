import { isListValue } from '../parser/operators';
import { FilterNode, ISortNode, QueryValue } from '../parser/types';
import { DEFAULT_SECURITY_OPTIONS, ISecurityOptions } from './types';

/**
 * Error thrown when a query violates security constraints
 *
 * @example
 * ```typescript
 * try {
 *   validator.validateFilter(filter);
 * } catch (error) {
 *   if (error instanceof QuerySecurityError) {
 *     res.status(400).json({ error: error.message });
 *   }
 * }
 * ```
 */
export class QuerySecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuerySecurityError';
  }
}

/**
 * Validates parsed filters and sort keys against security constraints
 *
 * @example
 * ```typescript
 * const validator = new QuerySecurityValidator({ denyFields: ['password'], maxQueryDepth: 3 });
 *
 * validator.validateExpression(req.query.filter);
 * const filter = parser.parseFilter(req.query.filter, model);
 * if (filter) {
 *   validator.validateFilter(filter);
 * }
 * ```
 */
export class QuerySecurityValidator {
  private options: Required<ISecurityOptions>;

  /**
   * @param options - Limits to apply over DEFAULT_SECURITY_OPTIONS
   */
  constructor(options: ISecurityOptions = {}) {
    this.options = {
      ...DEFAULT_SECURITY_OPTIONS,
      ...options
    };
  }

  /**
   * Check a raw expression before it is parsed
   * @throws {QuerySecurityError} If the expression is too long
   */
  public validateExpression(expression: string): void {
    if (expression.length > this.options.maxExpressionLength) {
      throw new QuerySecurityError(
        `Query expression exceeds maximum length of ${this.options.maxExpressionLength} characters`
      );
    }
  }

  /**
   * Check a parsed filter
   * @throws {QuerySecurityError} If the filter violates any constraint
   */
  public validateFilter(filter: FilterNode): void {
    const fields = new Set<string>();
    this.collectFields(filter, fields);
    this.validateFields(fields);

    this.validateQueryDepth(filter, 0);
    this.validateClauseCount(filter);
    this.validateValues(filter);
  }

  /**
   * Check parsed sort keys
   * @throws {QuerySecurityError} If the sort keys violate any constraint
   */
  public validateSort(sort: ReadonlyArray<ISortNode>): void {
    if (sort.length > this.options.maxSortKeys) {
      throw new QuerySecurityError(
        `Query exceeds maximum of ${this.options.maxSortKeys} sort keys`
      );
    }

    this.validateFields(new Set(sort.map(node => node.column.name)));
  }

  /**
   * Validate that fields are allowed and not denied
   */
  private validateFields(fields: Set<string>): void {
    const allowedFields = new Set(this.options.allowedFields);
    const deniedFields = new Set(this.options.denyFields);

    for (const field of fields) {
      // Same message for every field so responses cannot be used to enumerate attributes
      if (
        deniedFields.has(field) ||
        (allowedFields.size > 0 && !allowedFields.has(field))
      ) {
        throw new QuerySecurityError('Invalid query parameters');
      }
    }
  }

  private validateQueryDepth(filter: FilterNode, currentDepth: number): void {
    if (currentDepth > this.options.maxQueryDepth) {
      throw new QuerySecurityError(
        `Query exceeds maximum depth of ${this.options.maxQueryDepth}`
      );
    }

    if (filter.type === 'compound') {
      for (const child of filter.children) {
        this.validateQueryDepth(child, currentDepth + 1);
      }
    }
  }

  private validateClauseCount(filter: FilterNode): void {
    const count = this.countClauses(filter);
    if (count > this.options.maxClauseCount) {
      throw new QuerySecurityError(
        `Query exceeds maximum clause count of ${this.options.maxClauseCount} (found ${count})`
      );
    }
  }

  /**
   * Number of comparisons in a filter
   */
  private countClauses(filter: FilterNode): number {
    if (filter.type === 'comparison') {
      return 1;
    }

    return filter.children.reduce((count, child) => count + this.countClauses(child), 0);
  }

  private validateValues(filter: FilterNode): void {
    if (filter.type === 'compound') {
      filter.children.forEach(child => this.validateValues(child));
      return;
    }

    const { value } = filter;
    if (isListValue(value)) {
      if (value.length > this.options.maxArrayLength) {
        throw new QuerySecurityError(
          `Array values cannot exceed ${this.options.maxArrayLength} items`
        );
      }
      value.forEach(item => this.validateValueLength(item));
      return;
    }

    this.validateValueLength(value);
  }

  private validateValueLength(value: QueryValue): void {
    if (typeof value === 'string' && value.length > this.options.maxValueLength) {
      throw new QuerySecurityError(
        `Query contains a string value that exceeds maximum length of ${this.options.maxValueLength} characters`
      );
    }
  }

  private collectFields(filter: FilterNode, fields: Set<string>): void {
    if (filter.type === 'comparison') {
      fields.add(filter.column.name);
      return;
    }

    filter.children.forEach(child => this.collectFields(child, fields));
  }
}
