/**
 * restfilter - filter and sort expressions for REST resources
 *
 * Parses expressions such as `and(gt(id,1),like(name,"J%"))` and
 * `desc(createdAt)` into an immutable AST resolved against a model schema,
 * and hands that AST to a query builder such as Drizzle ORM.
 */

import { QueryParser } from './parser/parser';
import { FilterNode, IModelSchema, IParserOptions, IQueryParser, ISortNode } from './parser/types';
import { QueryBuilder } from './query/builder';
import { ISecurityOptions } from './security/types';
import { QuerySecurityValidator } from './security/validator';

/**
 * Create a new QueryBuilder instance
 */
export function createQueryBuilder<T>(): QueryBuilder<T> {
  return new QueryBuilder<T>();
}

/**
 * Create a new QueryParser instance
 */
export function createQueryParser(options?: IParserOptions): QueryParser {
  return new QueryParser(options);
}

/**
 * Options for binding a parser and security limits to one resource model
 */
export interface IResourceQueryOptions<TColumn> {
  /**
   * Model the expressions are resolved against
   */
  model: IModelSchema<TColumn>;

  /**
   * Parser to use. Defaults to a parser over the built-in operators.
   */
  parser?: IQueryParser;

  /**
   * Security limits applied to every parsed expression
   */
  security?: ISecurityOptions;
}

/**
 * Parse-then-validate entry points for one resource
 */
export interface IResourceQuery<TColumn> {
  /**
   * @returns null for a blank expression
   * @throws {QueryParseError} If the expression does not parse
   * @throws {QuerySecurityError} If the filter breaks a security limit
   */
  filter(expression: string): FilterNode<TColumn> | null;

  /**
   * @throws {QueryParseError} If an expression does not parse
   * @throws {QuerySecurityError} If the sort keys break a security limit
   */
  sort(expressions: ReadonlyArray<string>): ISortNode<TColumn>[];
}

/**
 * Create the query entry points for a resource
 *
 * @example
 * ```typescript
 * const users = createResourceQuery({
 *   model: new DrizzleModelSchema(usersTable),
 *   security: { denyFields: ['password'], maxQueryDepth: 3 }
 * });
 *
 * const filter = users.filter(String(req.query.filter ?? ''));
 * const sort = users.sort([String(req.query.sort ?? 'asc(id)')]);
 * ```
 */
export function createResourceQuery<TColumn>(
  options: IResourceQueryOptions<TColumn>
): IResourceQuery<TColumn> {
  const { model } = options;
  const parser = options.parser ?? createQueryParser();
  const securityValidator = new QuerySecurityValidator(options.security);

  return {
    filter: (expression: string): FilterNode<TColumn> | null => {
      securityValidator.validateExpression(expression);

      const filter = parser.parseFilter(expression, model);
      if (filter) {
        securityValidator.validateFilter(filter);
      }
      return filter;
    },
    sort: (expressions: ReadonlyArray<string>): ISortNode<TColumn>[] => {
      expressions.forEach(expression => securityValidator.validateExpression(expression));

      const sort = parser.parseSort(expressions, model);
      securityValidator.validateSort(sort);
      return sort;
    }
  };
}

// Export all public APIs
export * from './parser';
export * from './schema';
export * from './query';
export * from './security';
export * from './translators';
export * from './adapters';
export { ConsoleLogger, LogSink } from './utils/logger';
export { IDebugConfig, LogFormat, LogLevel, loadDebugConfig } from './config/debug';
