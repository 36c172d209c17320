/**
 * Drizzle ORM Translator
 *
 * Converts parsed filter and sort nodes into Drizzle ORM conditions and
 * ordering clauses for use with Drizzle's query builder.
 */

import {
  AnyColumn,
  SQL,
  and,
  asc,
  desc,
  eq,
  gt,
  gte,
  inArray,
  isNull,
  like,
  lt,
  lte,
  or
} from 'drizzle-orm';
import { isListValue } from '../../parser/operators';
import { FilterNode, IComparisonNode, ICompoundNode, ISortNode } from '../../parser/types';
import { ITranslator } from '../types';

/**
 * Error thrown when translation fails
 */
export class DrizzleTranslationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DrizzleTranslationError';
  }
}

/**
 * Translates filter and sort nodes whose columns are Drizzle columns
 */
export class DrizzleTranslator implements ITranslator<AnyColumn, SQL, SQL> {
  /**
   * Translate a filter to a Drizzle ORM condition
   */
  public translate(filter: FilterNode<AnyColumn>): SQL {
    try {
      return this.translateFilter(filter);
    } catch (error) {
      throw new DrizzleTranslationError(
        `Failed to translate filter: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Translate a sort key to a Drizzle ORM ordering clause
   */
  public translateSort(sort: ISortNode<AnyColumn>): SQL {
    return sort.direction === 'asc' ? asc(sort.column.column) : desc(sort.column.column);
  }

  /**
   * Check if a filter can be translated to Drizzle ORM
   */
  public canTranslate(filter: FilterNode<AnyColumn>): boolean {
    try {
      this.translateFilter(filter);
      return true;
    } catch {
      return false;
    }
  }

  private translateFilter(filter: FilterNode<AnyColumn>): SQL {
    switch (filter.type) {
      case 'comparison':
        return this.translateComparison(filter);
      case 'compound':
        return this.translateCompound(filter);
    }
  }

  /**
   * Translate a comparison node to a Drizzle ORM condition
   */
  private translateComparison(node: IComparisonNode<AnyColumn>): SQL {
    const { operator, value } = node;
    const column = node.column.column;
    const field = node.column.name;

    if (operator === 'in') {
      if (!isListValue(value)) {
        throw new DrizzleTranslationError(`IN operator on ${field} requires an array value`);
      }
      return inArray(column, [...value]);
    }

    if (isListValue(value)) {
      throw new DrizzleTranslationError(`${operator} operator on ${field} requires a scalar value`);
    }

    if (value === null) {
      if (operator === 'eq') {
        return isNull(column);
      }
      throw new DrizzleTranslationError(`${operator} operator on ${field} cannot compare with null`);
    }

    switch (operator) {
      case 'eq':
        return eq(column, value);
      case 'gt':
        return gt(column, value);
      case 'ge':
        return gte(column, value);
      case 'lt':
        return lt(column, value);
      case 'le':
        return lte(column, value);
      case 'like':
        if (typeof value !== 'string') {
          throw new DrizzleTranslationError(`LIKE operator on ${field} requires a string value`);
        }
        return like(column, value);
    }
  }

  /**
   * Translate an AND/OR node to a Drizzle ORM condition
   */
  private translateCompound(node: ICompoundNode<AnyColumn>): SQL {
    const conditions = node.children.map(child => this.translateFilter(child));
    const combined = node.operator === 'and' ? and(...conditions) : or(...conditions);

    if (!combined) {
      throw new DrizzleTranslationError(`${node.operator} operator requires at least two operands`);
    }
    return combined;
  }
}
