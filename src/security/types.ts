/**
 * Security configuration types
 *
 * Limits applied to parsed filters before they reach a data source, so
 * that client-supplied expressions cannot exhaust resources or reach
 * protected attributes.
 */

/**
 * @interface ISecurityOptions
 * @description Security limits for client-supplied filter expressions
 *
 * @example
 * ```typescript
 * const securityOptions: ISecurityOptions = {
 *   allowedFields: ['id', 'name', 'createdAt'],
 *   denyFields: ['password'],
 *   maxQueryDepth: 5,
 *   maxClauseCount: 20
 * };
 * ```
 */
export interface ISecurityOptions {
  /**
   * Attributes that may be filtered or sorted on.
   * If empty, every attribute the model resolves is allowed.
   */
  allowedFields?: string[];

  /**
   * Attributes that may never be filtered or sorted on, even when listed
   * in allowedFields
   */
  denyFields?: string[];

  /**
   * Maximum nesting depth of and/or nodes
   *
   * @default 10
   */
  maxQueryDepth?: number;

  /**
   * Maximum number of comparisons in one filter
   *
   * @default 50
   */
  maxClauseCount?: number;

  /**
   * Maximum length of a string value
   *
   * @default 1000
   */
  maxValueLength?: number;

  /**
   * Maximum number of items in an `in` list
   *
   * @default 100
   */
  maxArrayLength?: number;

  /**
   * Maximum length of a raw expression string, checked before parsing
   *
   * @default 4096
   */
  maxExpressionLength?: number;

  /**
   * Maximum number of sort keys
   *
   * @default 10
   */
  maxSortKeys?: number;
}

/**
 * Default security configuration values
 *
 * @example
 * ```typescript
 * const securityOptions = {
 *   ...DEFAULT_SECURITY_OPTIONS,
 *   maxClauseCount: 10
 * };
 * ```
 */
export const DEFAULT_SECURITY_OPTIONS: Required<ISecurityOptions> = {
  allowedFields: [], // Empty means every model attribute
  denyFields: [],

  maxQueryDepth: 10,
  maxClauseCount: 50,

  maxValueLength: 1000,
  maxArrayLength: 100,

  maxExpressionLength: 4096,
  maxSortKeys: 10
};
