/**
 * Error thrown when query parsing fails
 */
export class QueryParseError extends Error {
  /**
   * The expression being parsed, when known
   */
  public readonly expression?: string;

  constructor(message: string, expression?: string) {
    super(message);
    this.name = 'QueryParseError';
    this.expression = expression;
  }
}

/**
 * Error thrown when the tokenizer could not recover a literal, e.g. a
 * quoted value that is never closed
 */
export class QueryLexicalError extends QueryParseError {
  constructor(message: string, expression?: string) {
    super(message, expression);
    this.name = 'QueryLexicalError';
  }
}

/**
 * Error thrown when the token stream does not match the grammar
 */
export class QuerySyntaxError extends QueryParseError {
  public readonly token: string;
  public readonly position: number;

  constructor(token: string, position: number, expression?: string) {
    super(
      expression === undefined
        ? `Unexpected token "${token}" at position ${position}`
        : `Unexpected token "${token}" at position ${position} in "${expression}"`,
      expression
    );
    this.name = 'QuerySyntaxError';
    this.token = token;
    this.position = position;
  }
}

/**
 * Context attached to a semantic error
 */
export interface ISemanticErrorContext {
  operator?: string;
  field?: string;
  expression?: string;
}

/**
 * Error thrown when a well-formed expression cannot be applied to the model:
 * unknown attributes, wrong arity, empty or invalid arguments
 */
export class QuerySemanticError extends QueryParseError {
  public readonly operator?: string;
  public readonly field?: string;

  constructor(message: string, context: ISemanticErrorContext = {}) {
    super(message, context.expression);
    this.name = 'QuerySemanticError';
    this.operator = context.operator;
    this.field = context.field;
  }
}

/**
 * Error thrown while configuring an operator registry
 */
export class OperatorRegistrationError extends QuerySemanticError {
  constructor(message: string, operator: string) {
    super(message, { operator });
    this.name = 'OperatorRegistrationError';
  }
}
