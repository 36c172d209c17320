import { OperatorRegistrationError } from './errors';
import type { GrammarEntry } from './grammar';
import type { FilterNode, IColumnRef, IModelSchema, QueryNode } from './types';

/**
 * What kind of node an operator builds
 */
export type OperatorKind = 'comparison' | 'compound' | 'sort';

/**
 * Services the parser hands to an operator while it validates and builds
 */
export interface IOperatorContext<TColumn = unknown> {
  /**
   * The model the expression is parsed against
   */
  readonly model: IModelSchema<TColumn>;

  /**
   * The complete expression being parsed
   */
  readonly expression: string;

  /**
   * Resolve an attribute on the model.
   * @throws {QuerySemanticError} If the model has no such attribute
   */
  resolveColumn(name: string, operator: string): IColumnRef<TColumn>;

  /**
   * Parse a nested filter expression with a fresh parse state
   */
  parseFilter(expression: string): FilterNode<TColumn>;
}

/**
 * Declarative description of one grammar operator
 */
export interface IOperatorDescriptor {
  /**
   * Keyword written before the opening parenthesis
   */
  readonly token: string;

  readonly kind: OperatorKind;

  /**
   * Number of arguments the operator needs
   */
  readonly minArity: number;

  /**
   * Entries that follow the operator keyword, e.g. `( arg , arg close`
   */
  readonly grammar: ReadonlyArray<GrammarEntry>;

  /**
   * Check the accumulated arguments against the model
   * @throws {QuerySemanticError} If they cannot form a node
   */
  validate<TColumn>(
    args: ReadonlyArray<string>,
    context: IOperatorContext<TColumn>
  ): void;

  /**
   * Build the node for arguments that passed validation
   */
  build<TColumn>(
    args: ReadonlyArray<string>,
    context: IOperatorContext<TColumn>
  ): QueryNode<TColumn>;
}

/**
 * Set of operators a parser recognises.
 *
 * Registration order is kept and drives the order of the grammar table.
 * Once frozen the registry rejects further registrations.
 */
export class OperatorRegistry {
  private readonly descriptors = new Map<string, IOperatorDescriptor>();
  private longestToken = 0;
  private frozen = false;

  /**
   * Register an operator
   * @throws {OperatorRegistrationError} On a duplicate token or a frozen registry
   */
  public register(descriptor: IOperatorDescriptor): this {
    const { token } = descriptor;

    if (this.frozen) {
      throw new OperatorRegistrationError(
        `Cannot register operator ${token}: registry is frozen.`,
        token
      );
    }
    if (!/^[a-z][a-z0-9_]*$/i.test(token)) {
      throw new OperatorRegistrationError(
        `Operator token "${token}" must be a word.`,
        token
      );
    }
    if (this.descriptors.has(token)) {
      throw new OperatorRegistrationError(
        `Operator ${token} is already registered.`,
        token
      );
    }

    this.descriptors.set(token, descriptor);
    this.longestToken = Math.max(this.longestToken, token.length);
    return this;
  }

  public resolve(token: string): IOperatorDescriptor | undefined {
    return this.descriptors.get(token);
  }

  public has(token: string): boolean {
    return this.descriptors.has(token);
  }

  /**
   * Registered tokens in registration order
   */
  public tokens(): string[] {
    return [...this.descriptors.keys()];
  }

  public descriptorsInOrder(): IOperatorDescriptor[] {
    return [...this.descriptors.values()];
  }

  /**
   * Length of the longest registered token; longer words are never operators
   */
  public get maxTokenLength(): number {
    return this.longestToken;
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }
}
