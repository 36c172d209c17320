/**
 * Character-level scanning shared by the tokenizer and the compound resolver.
 *
 * All scans honour double-quoted text (with backslash escapes) and `[...]`
 * sequences: parentheses and commas inside either never count as structure.
 */

export interface ILiteralScan {
  /**
   * Index of the delimiter that ended the scan, or the input length
   */
  end: number;

  /**
   * True when the input ended inside a quoted string
   */
  unterminated: boolean;
}

const STRUCTURAL = new Set(['(', ')', ',']);
const WHITESPACE = /\s/;

/**
 * Tracks quote and bracket nesting while walking an expression
 */
class NestingTracker {
  private inQuote = false;
  private escaped = false;
  private brackets = 0;

  /**
   * Feed one character. Returns true when the character sits at top level,
   * outside any quote or bracket.
   */
  public step(char: string): boolean {
    if (this.inQuote) {
      if (this.escaped) {
        this.escaped = false;
      } else if (char === '\\') {
        this.escaped = true;
      } else if (char === '"') {
        this.inQuote = false;
      }
      return false;
    }

    if (char === '"') {
      this.inQuote = true;
      return false;
    }
    if (char === '[') {
      this.brackets++;
      return false;
    }
    if (char === ']') {
      this.brackets = Math.max(0, this.brackets - 1);
      return false;
    }

    return this.brackets === 0;
  }

  public get quoted(): boolean {
    return this.inQuote;
  }
}

/**
 * Scan a literal starting at `start` up to the next top-level `(`, `)` or `,`
 */
export function scanLiteral(expression: string, start: number): ILiteralScan {
  const tracker = new NestingTracker();

  for (let index = start; index < expression.length; index++) {
    const char = expression[index];
    if (tracker.step(char) && STRUCTURAL.has(char)) {
      return { end: index, unterminated: false };
    }
  }

  return { end: expression.length, unterminated: tracker.quoted };
}

/**
 * Drop whitespace that sits outside double-quoted text; quoted text is kept
 * verbatim
 */
export function stripUnquotedWhitespace(text: string): string {
  const tracker = new NestingTracker();
  let result = '';

  for (const char of text) {
    tracker.step(char);
    if (!tracker.quoted && WHITESPACE.test(char)) {
      continue;
    }
    result += char;
  }

  return result;
}

/**
 * Find the `)` closing a group whose `(` sits just before `start`.
 * Returns -1 when the group is never closed.
 */
export function findClosingParen(expression: string, start: number): number {
  const tracker = new NestingTracker();
  let depth = 1;

  for (let index = start; index < expression.length; index++) {
    const char = expression[index];
    if (!tracker.step(char)) {
      continue;
    }
    if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
}

/**
 * Split text on commas at parenthesis depth zero
 */
export function splitTopLevel(text: string): string[] {
  const tracker = new NestingTracker();
  const parts: string[] = [];
  let depth = 0;
  let segmentStart = 0;

  for (let index = 0; index < text.length; index++) {
    const char = text[index];
    if (!tracker.step(char)) {
      continue;
    }
    if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      parts.push(text.slice(segmentStart, index));
      segmentStart = index + 1;
    }
  }

  parts.push(text.slice(segmentStart));
  return parts.map(part => part.trim());
}
