import { logger as defaultLogger } from '../utils/logger';
import { QueryParseError, QuerySemanticError } from './errors';
import { GrammarEngine } from './grammar';
import { tokenize } from './lexer';
import { DEFAULT_OPERATOR_REGISTRY } from './operators';
import { IOperatorContext, OperatorRegistry } from './registry';
import {
  FilterNode,
  IColumnRef,
  ILogger,
  IModelSchema,
  IParserOptions,
  IQueryParser,
  ISortNode,
  QueryNode,
  Token
} from './types';

/**
 * Compound nesting accepted when no `maxNestingDepth` is given
 */
export const DEFAULT_MAX_NESTING_DEPTH = 32;

/**
 * Parser for resource filter and sort expressions.
 *
 * The parser itself holds no per-parse state: every call allocates its own
 * parse state, so one instance may serve any number of callers.
 *
 * @example
 * ```typescript
 * const parser = new QueryParser();
 * const model = new RecordModelSchema({ id: usersTable.id, name: usersTable.name });
 *
 * parser.parseFilter('and(gt(id,1),like(name,"J%"))', model);
 * parser.parseSort(['asc(name)', 'desc(id)'], model);
 * ```
 */
export class QueryParser implements IQueryParser {
  private readonly options: Required<
    Pick<IParserOptions, 'caseInsensitiveFields' | 'maxNestingDepth'>
  >;
  private readonly fieldMappings: ReadonlyMap<string, string>;
  private readonly registry: OperatorRegistry;
  private readonly engine: GrammarEngine;
  private readonly logger: ILogger;

  constructor(options: IParserOptions = {}) {
    this.options = {
      caseInsensitiveFields: options.caseInsensitiveFields ?? false,
      maxNestingDepth: options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH
    };
    this.fieldMappings = new Map(Object.entries(options.fieldMappings ?? {}));
    this.registry = options.registry ?? DEFAULT_OPERATOR_REGISTRY;
    this.logger = options.logger ?? defaultLogger;
    this.engine = new GrammarEngine(this.registry, this.logger);
  }

  /**
   * Parse a filter expression. Blank input means "no filter" and yields null.
   */
  public parseFilter<TColumn>(
    expression: string,
    model: IModelSchema<TColumn>
  ): FilterNode<TColumn> | null {
    if (expression.trim() === '') {
      return null;
    }

    return this.parseFilterExpression(expression, model, 0);
  }

  /**
   * Parse sort expressions in order; the first one is the primary key
   */
  public parseSort<TColumn>(
    expressions: ReadonlyArray<string>,
    model: IModelSchema<TColumn>
  ): ISortNode<TColumn>[] {
    return expressions.map(expression => {
      if (expression.trim() === '') {
        throw new QuerySemanticError('Sort expression is empty.', { expression });
      }

      const node = this.parseExpression(expression, model, 0);
      if (node.type !== 'sort') {
        throw new QuerySemanticError(
          `Operation ${node.operator} cannot be used as a sort expression.`,
          { operator: node.operator, expression }
        );
      }
      return node;
    });
  }

  /**
   * Run the grammar engine over an already tokenized expression
   */
  public parse<TColumn>(
    tokens: ReadonlyArray<Token>,
    model: IModelSchema<TColumn>,
    expression = ''
  ): QueryNode<TColumn> {
    return this.engine.run(tokens, this.createContext(model, expression, 0));
  }

  /**
   * Tokenize an expression against this parser's operators
   */
  public tokenize(expression: string): Token[] {
    return tokenize(expression, this.registry);
  }

  /**
   * Check a filter expression. Only parse failures turn into false.
   */
  public validate<TColumn>(expression: string, model: IModelSchema<TColumn>): boolean {
    try {
      this.parseFilter(expression, model);
      return true;
    } catch (error) {
      if (error instanceof QueryParseError) {
        return false;
      }
      throw error;
    }
  }

  private parseExpression<TColumn>(
    expression: string,
    model: IModelSchema<TColumn>,
    depth: number
  ): QueryNode<TColumn> {
    const tokens = this.tokenize(expression);
    this.logger.debug('tokens', {
      expression,
      tokens: tokens.map(token => token.value)
    });

    return this.engine.run(tokens, this.createContext(model, expression, depth));
  }

  /**
   * Compound children go through here too, each with its own parse state,
   * one nesting level below their parent
   */
  private parseFilterExpression<TColumn>(
    expression: string,
    model: IModelSchema<TColumn>,
    depth: number
  ): FilterNode<TColumn> {
    if (depth > this.options.maxNestingDepth) {
      throw new QuerySemanticError(
        `Expression nests deeper than ${this.options.maxNestingDepth} levels.`,
        { expression }
      );
    }

    const node = this.parseExpression(expression, model, depth);

    if (node.type === 'sort') {
      throw new QuerySemanticError(
        `Sort operation ${node.direction} cannot be used as a filter.`,
        { operator: node.direction, expression }
      );
    }
    return node;
  }

  private createContext<TColumn>(
    model: IModelSchema<TColumn>,
    expression: string,
    depth: number
  ): IOperatorContext<TColumn> {
    return {
      model,
      expression,
      resolveColumn: (name: string, operator: string): IColumnRef<TColumn> =>
        this.resolveColumn(model, name, operator, expression),
      parseFilter: (subExpression: string): FilterNode<TColumn> =>
        this.parseFilterExpression(subExpression, model, depth + 1)
    };
  }

  private resolveColumn<TColumn>(
    model: IModelSchema<TColumn>,
    name: string,
    operator: string,
    expression: string
  ): IColumnRef<TColumn> {
    const field = this.normalizeFieldName(name);
    const column = model.resolve(field);

    if (column === undefined) {
      throw new QuerySemanticError(`Resource model does not contain ${field} attribute.`, {
        operator,
        field,
        expression
      });
    }

    return Object.freeze({ name: field, column });
  }

  /**
   * Normalize a field name based on parser options
   */
  private normalizeFieldName(field: string): string {
    const normalizedField = this.options.caseInsensitiveFields
      ? field.toLowerCase()
      : field;

    return this.fieldMappings.get(normalizedField) ?? normalizedField;
  }
}
