/**
 * Translator Types
 *
 * Translators are the query-builder side of the parser: they turn a parsed
 * filter or sort node into whatever a data source understands.
 */

import { FilterNode, ISortNode } from '../parser/types';

/**
 * Interface for a query translator
 */
export interface ITranslator<TColumn = unknown, TConstraint = unknown, TOrdering = unknown> {
  /**
   * Translate a filter into a query constraint
   *
   * @param filter The parsed filter to translate
   * @returns The translated constraint in the target format
   */
  translate(filter: FilterNode<TColumn>): TConstraint;

  /**
   * Translate one sort key into an ordering clause
   */
  translateSort(sort: ISortNode<TColumn>): TOrdering;

  /**
   * Check if a filter can be translated
   *
   * @param filter The filter to check
   * @returns true if the filter can be translated, false otherwise
   */
  canTranslate(filter: FilterNode<TColumn>): boolean;
}
