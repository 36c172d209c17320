import type { OperatorRegistry } from './registry';
import { findClosingParen, scanLiteral, stripUnquotedWhitespace } from './scanner';
import type { StructuralSymbol, Token } from './types';

const WHITESPACE = /\s/;

function isStructural(char: string): char is StructuralSymbol {
  return char === '(' || char === ')' || char === ',';
}

function isOperatorWord(text: string, registry: OperatorRegistry): boolean {
  return text.length <= registry.maxTokenLength && registry.has(text);
}

/**
 * Turn an expression into tokens.
 *
 * Never throws: anything that is neither whitespace nor structure ends up
 * in a literal, with whitespace outside quotes removed, and an unclosed quote is flagged on its literal token for
 * the grammar engine to report. The arguments of a compound operator are
 * kept as one raw literal so the compound resolver can split them.
 */
export function tokenize(expression: string, registry: OperatorRegistry): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < expression.length) {
    const char = expression[index];

    if (WHITESPACE.test(char)) {
      index++;
      continue;
    }

    if (isStructural(char)) {
      tokens.push({ kind: 'symbol', value: char, position: index });
      index++;
      continue;
    }

    const scan = scanLiteral(expression, index);
    const text = stripUnquotedWhitespace(expression.slice(index, scan.end));

    if (
      !scan.unterminated &&
      expression[scan.end] === '(' &&
      isOperatorWord(text, registry)
    ) {
      tokens.push({ kind: 'operator', value: text, position: index });
      tokens.push({ kind: 'symbol', value: '(', position: scan.end });
      index = scan.end + 1;

      if (registry.resolve(text)?.kind === 'compound') {
        index = pushCompoundArgument(expression, index, tokens);
      }
      continue;
    }

    tokens.push(
      scan.unterminated
        ? { kind: 'literal', value: text, position: index, unterminated: true }
        : { kind: 'literal', value: text, position: index }
    );
    index = scan.end;
  }

  tokens.push({ kind: 'end', value: '$', position: expression.length });
  return tokens;
}

/**
 * Emit everything up to the matching `)` as a single literal followed by
 * the `)`. Without a matching `)` the rest of the input is the literal.
 */
function pushCompoundArgument(expression: string, start: number, tokens: Token[]): number {
  const close = findClosingParen(expression, start);

  if (close === -1) {
    tokens.push({ kind: 'literal', value: expression.slice(start).trim(), position: start });
    return expression.length;
  }

  tokens.push({ kind: 'literal', value: expression.slice(start, close).trim(), position: start });
  tokens.push({ kind: 'symbol', value: ')', position: close });
  return close + 1;
}
