/**
 * Table-driven LL(1) engine for the resource query grammar.
 *
 * The grammar is fixed apart from the operator keywords:
 *
 *   expression := <operator> "(" arguments
 *   arguments  := literal more | more
 *   more       := "," arguments | ")"
 *
 * Each registered operator contributes one `expression` production whose
 * right-hand side is its keyword followed by its own grammar. An argument
 * slot that holds no literal records an empty argument, so arity and blank
 * arguments are reported by the operator rather than by the engine.
 */

import { QueryLexicalError, QuerySyntaxError } from './errors';
import type {
  IOperatorContext,
  IOperatorDescriptor,
  OperatorRegistry
} from './registry';
import type { ILogger, QueryNode, StructuralSymbol, Token } from './types';

export type RuleName = 'expression' | 'arguments' | 'more';

/**
 * What a terminal matches in the token stream
 */
export type TerminalSymbol =
  | { kind: 'symbol'; value: StructuralSymbol }
  | { kind: 'operator'; value: string }
  | { kind: 'literal' }
  | { kind: 'end' };

export type GrammarEntry =
  | { kind: 'terminal'; symbol: TerminalSymbol }
  | { kind: 'rule'; rule: RuleName };

export type SemanticAction =
  | { type: 'open'; descriptor: IOperatorDescriptor }
  | { type: 'argument' }
  | { type: 'empty-argument' }
  | { type: 'none' }
  | { type: 'build' };

export interface IProduction {
  readonly rule: RuleName;
  readonly input: string;
  readonly action: SemanticAction;
  readonly rhs: ReadonlyArray<GrammarEntry>;
}

export const terminal = (symbol: TerminalSymbol): GrammarEntry => ({
  kind: 'terminal',
  symbol
});

export const rule = (name: RuleName): GrammarEntry => ({ kind: 'rule', rule: name });

/**
 * `( arguments`: the grammar every built-in operator contributes
 */
export const ARGUMENT_LIST: ReadonlyArray<GrammarEntry> = [
  terminal({ kind: 'symbol', value: '(' }),
  rule('arguments')
];

/**
 * Key used to look a token up in the transition table. Literals match the
 * argument slot whatever their text.
 */
export function inputKey(token: Token): string {
  switch (token.kind) {
    case 'operator':
      return `operator:${token.value}`;
    case 'literal':
      return 'literal';
    case 'end':
      return '$';
    default:
      return token.value;
  }
}

function matchesTerminal(symbol: TerminalSymbol, token: Token): boolean {
  if (symbol.kind !== token.kind) {
    return false;
  }
  if (symbol.kind === 'symbol' || symbol.kind === 'operator') {
    return symbol.value === token.value;
  }
  return true;
}

function describeToken(token: Token): string {
  return token.kind === 'end' ? 'end of input' : token.value;
}

/**
 * Transition table keyed by (rule, input)
 */
export class TransitionTable {
  private readonly productions = new Map<RuleName, Map<string, IProduction>>();

  constructor(registry: OperatorRegistry) {
    for (const descriptor of registry.descriptorsInOrder()) {
      this.add({
        rule: 'expression',
        input: `operator:${descriptor.token}`,
        action: { type: 'open', descriptor },
        rhs: [
          terminal({ kind: 'operator', value: descriptor.token }),
          ...descriptor.grammar
        ]
      });
    }

    this.add({
      rule: 'arguments',
      input: 'literal',
      action: { type: 'argument' },
      rhs: [terminal({ kind: 'literal' }), rule('more')]
    });
    for (const input of [',', ')']) {
      this.add({
        rule: 'arguments',
        input,
        action: { type: 'empty-argument' },
        rhs: [rule('more')]
      });
    }

    this.add({
      rule: 'more',
      input: ',',
      action: { type: 'none' },
      rhs: [terminal({ kind: 'symbol', value: ',' }), rule('arguments')]
    });
    this.add({
      rule: 'more',
      input: ')',
      action: { type: 'build' },
      rhs: [terminal({ kind: 'symbol', value: ')' })]
    });
  }

  public lookup(name: RuleName, token: Token): IProduction | undefined {
    return this.productions.get(name)?.get(inputKey(token));
  }

  private add(production: IProduction): void {
    const row = this.productions.get(production.rule) ?? new Map<string, IProduction>();
    row.set(production.input, production);
    this.productions.set(production.rule, row);
  }
}

/**
 * Operator whose arguments are still being collected
 */
class OperatorBuilder {
  private readonly args: string[] = [];

  constructor(public readonly descriptor: IOperatorDescriptor) {}

  public addArgument(argument: string): void {
    this.args.push(argument.trim());
  }

  public build<TColumn>(context: IOperatorContext<TColumn>): QueryNode<TColumn> {
    this.descriptor.validate(this.args, context);
    return this.descriptor.build(this.args, context);
  }
}

/**
 * Scratch state for a single parse. Never shared between parses.
 */
export class ParseState<TColumn> {
  public readonly stack: GrammarEntry[] = [
    terminal({ kind: 'end' }),
    rule('expression')
  ];
  public readonly builders: OperatorBuilder[] = [];
  public readonly derivation: IProduction[] = [];
  public readonly built: QueryNode<TColumn>[] = [];
  public position = 0;

  constructor(public readonly tokens: ReadonlyArray<Token>) {}

  public get current(): Token {
    const token = this.tokens[this.position];
    if (token) {
      return token;
    }
    const last = this.tokens[this.tokens.length - 1];
    return { kind: 'end', value: '$', position: last ? last.position : 0 };
  }
}

/**
 * Drives a token stream through the transition table
 */
export class GrammarEngine {
  private readonly table: TransitionTable;

  /**
   * Building an engine closes the registry: the table is derived once
   * and later registrations would never reach it.
   */
  constructor(registry: OperatorRegistry, private readonly logger?: ILogger) {
    registry.freeze();
    this.table = new TransitionTable(registry);
  }

  /**
   * Run the engine and return the node built by the last semantic action
   * @throws {QuerySyntaxError} On a token the grammar does not allow
   * @throws {QueryLexicalError} On an unterminated literal
   */
  public run<TColumn>(
    tokens: ReadonlyArray<Token>,
    context: IOperatorContext<TColumn>
  ): QueryNode<TColumn> {
    const state = new ParseState<TColumn>(tokens);
    const { expression } = context;

    let entry = state.stack.pop();
    while (entry) {
      const token = state.current;

      if (entry.kind === 'terminal') {
        if (!matchesTerminal(entry.symbol, token)) {
          throw new QuerySyntaxError(describeToken(token), token.position, expression);
        }
        if (token.kind === 'literal' && token.unterminated) {
          throw new QueryLexicalError(
            `Unterminated quoted value starting at position ${token.position} in "${expression}"`,
            expression
          );
        }
        state.position++;
      } else {
        const production = this.table.lookup(entry.rule, token);
        if (!production) {
          throw new QuerySyntaxError(describeToken(token), token.position, expression);
        }

        state.derivation.push(production);
        this.execute(production.action, state, token, context);

        for (let index = production.rhs.length - 1; index >= 0; index--) {
          state.stack.push(production.rhs[index]);
        }
      }

      entry = state.stack.pop();
    }

    if (state.position < state.tokens.length) {
      const extra = state.tokens[state.position];
      throw new QuerySyntaxError(describeToken(extra), extra.position, expression);
    }

    this.logger?.debug('derivation', {
      expression,
      steps: state.derivation.map(step => `${step.rule} -> ${step.input}`)
    });

    const result = state.built[state.built.length - 1];
    if (!result) {
      throw new QuerySyntaxError(describeToken(state.current), state.current.position, expression);
    }
    return result;
  }

  private execute<TColumn>(
    action: SemanticAction,
    state: ParseState<TColumn>,
    token: Token,
    context: IOperatorContext<TColumn>
  ): void {
    switch (action.type) {
      case 'open':
        state.builders.push(new OperatorBuilder(action.descriptor));
        return;
      case 'argument':
      case 'empty-argument': {
        const builder = state.builders[state.builders.length - 1];
        if (builder) {
          builder.addArgument(action.type === 'argument' ? token.value : '');
        }
        return;
      }
      case 'none':
        return;
      case 'build': {
        const builder = state.builders.pop();
        if (builder) {
          state.built.push(builder.build(context));
        }
        return;
      }
    }
  }
}
