/**
 * Adapter Types
 *
 * Adapters connect parsed filters and sort keys to external systems or
 * libraries like Drizzle ORM.
 */

import { FilterNode, IModelSchema, ISortNode } from '../parser/types';

/**
 * What to fetch: the parsed filter, sort keys in precedence order, and paging
 */
export interface IQueryRequest<TColumn = unknown> {
  /**
   * Filter to apply; null or absent means no constraint
   */
  filter?: FilterNode<TColumn> | null;

  /**
   * Sort keys, primary key first
   */
  sort?: ReadonlyArray<ISortNode<TColumn>>;

  /**
   * Maximum number of records to return
   */
  limit?: number;

  /**
   * Number of records to skip
   */
  offset?: number;
}

/**
 * Interface for a query adapter
 */
export interface IAdapter<TOptions, TColumn = unknown> {
  /**
   * Initialize the adapter with options
   *
   * @param options Adapter-specific options
   */
  initialize(options: TOptions): void;

  /**
   * Model schema for a table, to parse expressions against
   */
  getModel(tableName: string): IModelSchema<TColumn>;

  /**
   * Execute a query request and return results
   *
   * @param tableName The table/collection name to query
   * @param request The parsed filter, sort keys and paging
   * @returns The query results
   */
  execute<T = unknown>(tableName: string, request: IQueryRequest<TColumn>): Promise<T[]>;

  /**
   * Check if a filter can be executed by this adapter
   */
  canExecute(filter: FilterNode<TColumn>): boolean;
}
