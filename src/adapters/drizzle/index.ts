/**
 * Drizzle ORM Adapter
 *
 * Runs parsed filters and sort keys against a Drizzle ORM database.
 */

import { AnyColumn, SQL, Table } from 'drizzle-orm';
import { FilterNode } from '../../parser/types';
import { DrizzleModelSchema } from '../../schema/drizzle';
import { DrizzleTranslator } from '../../translators/drizzle';
import { IAdapter, IQueryRequest } from '../types';

/**
 * Type for Drizzle ORM database instance
 */
export interface IDrizzleDatabase {
  select: () => { from: (table: Table) => IDrizzleQueryBuilder };
}

/**
 * Type for Drizzle query builder
 */
export interface IDrizzleQueryBuilder {
  where: (condition: SQL) => IDrizzleQueryBuilder;
  orderBy: (...clauses: SQL[]) => IDrizzleQueryBuilder;
  limit: (limit: number) => IDrizzleQueryBuilder;
  offset: (offset: number) => IDrizzleQueryBuilder;
  // Drizzle builders are thenables
  then<TResult1 = unknown[], TResult2 = never>(
    onfulfilled?: ((value: unknown[]) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2>;
}

/**
 * Options specific to the Drizzle adapter
 */
export interface IDrizzleAdapterOptions {
  /**
   * The Drizzle ORM database instance
   */
  db: IDrizzleDatabase;

  /**
   * Drizzle table definitions keyed by resource name
   */
  schema: Record<string, Table>;
}

/**
 * Error thrown when adapter operations fail
 */
export class DrizzleAdapterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DrizzleAdapterError';
  }
}

/**
 * Adapter for Drizzle ORM
 */
export class DrizzleAdapter implements IAdapter<IDrizzleAdapterOptions, AnyColumn> {
  private db?: IDrizzleDatabase;
  private readonly models = new Map<string, DrizzleModelSchema>();
  private readonly translator = new DrizzleTranslator();

  /**
   * Initialize the adapter with options
   */
  public initialize(options: IDrizzleAdapterOptions): void {
    this.db = options.db;
    this.models.clear();

    for (const [name, table] of Object.entries(options.schema)) {
      this.models.set(name, new DrizzleModelSchema(table));
    }
  }

  /**
   * Model schema for one of the configured tables
   */
  public getModel(tableName: string): DrizzleModelSchema {
    const model = this.models.get(tableName);

    if (!model) {
      throw new DrizzleAdapterError(`Table ${tableName} not found in schema`);
    }
    return model;
  }

  /**
   * Execute a request: where, then orderBy in sort-key order, then paging
   */
  public async execute<TResult = unknown>(
    tableName: string,
    request: IQueryRequest<AnyColumn> = {}
  ): Promise<TResult[]> {
    const db = this.ensureInitialized();
    const { table } = this.getModel(tableName);

    try {
      let query = db.select().from(table);

      if (request.filter) {
        query = query.where(this.translator.translate(request.filter));
      }

      if (request.sort && request.sort.length > 0) {
        query = query.orderBy(...request.sort.map(sort => this.translator.translateSort(sort)));
      }

      if (request.limit !== undefined) {
        query = query.limit(request.limit);
      }

      if (request.offset !== undefined) {
        query = query.offset(request.offset);
      }

      const result = await query;
      return result as TResult[];
    } catch (error) {
      throw new DrizzleAdapterError(
        `Failed to execute query: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Check if a filter can be executed by this adapter
   */
  public canExecute(filter: FilterNode<AnyColumn>): boolean {
    return this.db !== undefined && this.translator.canTranslate(filter);
  }

  /**
   * Ensure the adapter is initialized
   */
  private ensureInitialized(): IDrizzleDatabase {
    if (!this.db) {
      throw new DrizzleAdapterError('Adapter has not been initialized');
    }
    return this.db;
  }
}
