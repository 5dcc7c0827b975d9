import { PredicateConfigError } from '../core/errors.js';
import type { KeywordShape, Matcher } from '../core/types.js';

export interface MatcherOptions {
  /** Take the pattern as the whole value instead of searching for it anywhere. */
  strict: boolean;
  shape?: KeywordShape;
}

/**
 * Single compilation point for query patterns. Number keywords get a numeric
 * comparison; everything else a regular expression anchored to the whole
 * candidate, with `.*` on both sides unless `strict` is set.
 */
export function compileMatcher(raw: string, options: MatcherOptions): Matcher {
  if (options.shape?.type === 'number') return compileNumberMatcher(raw);
  return compileRegexMatcher(raw, options.strict);
}

export function compileRegexMatcher(raw: string, strict: boolean): Matcher {
  const body = strict ? `(?:${raw})` : `.*(?:${raw}).*`;
  const source = `^${body}$`;
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PredicateConfigError({ message: `Invalid pattern "${raw}": ${detail}`, raw: error });
  }
  return { source, test: (value) => regex.test(value) };
}

type Comparison = '==' | '!=' | '<' | '<=' | '>' | '>=';

// Longest operators first so "<=" is not read as "<".
const OPERATORS: readonly Comparison[] = ['==', '!=', '<=', '>=', '<', '>'];

export function compileNumberMatcher(raw: string): Matcher {
  const expr = raw.trim();

  if (expr.includes(',')) {
    const bounds = expr.split(',');
    if (bounds.length !== 2) {
      throw new PredicateConfigError({ message: `Expected a range "a,b" without spaces, got "${raw}"` });
    }
    const [a, b] = bounds.map((bound) => requireInteger(bound, raw));
    if (a === undefined || b === undefined) {
      throw new PredicateConfigError({ message: `Expected a range "a,b" without spaces, got "${raw}"` });
    }
    if (a === b) return comparisonMatcher(raw, '==', a);
    const low = a < b ? a : b;
    const high = a < b ? b : a;
    return {
      source: `[${low},${high})`,
      test: (value) => {
        const n = parseInteger(value);
        return n !== undefined && n >= low && n < high;
      }
    };
  }

  if (parseInteger(expr) !== undefined) {
    return comparisonMatcher(raw, '==', requireInteger(expr, raw));
  }

  const operator = OPERATORS.find((op) => expr.startsWith(op));
  if (!operator) {
    throw new PredicateConfigError({ message: `Unknown operator in "${raw}" (expected ==, !=, <, <=, >, >= or a,b)` });
  }
  return comparisonMatcher(raw, operator, requireInteger(expr.slice(operator.length), raw));
}

/**
 * Integers with optional sign, read the way init reads them: `0x`, `0o` and
 * `0b` prefixes, and a leading `0` for octal (`010` is 8).
 */
export function parseInteger(text: string): number | undefined {
  const match = /^([+-]?)(0x[0-9a-f]+|0o[0-7]+|0b[01]+|0[0-7]+|[1-9]\d*|0)$/i.exec(text.trim());
  if (!match) return undefined;
  const [, sign, digits = ''] = match;
  const magnitude = /^0[0-7]+$/.test(digits) ? Number.parseInt(digits, 8) : Number(digits.toLowerCase());
  if (!Number.isSafeInteger(magnitude)) return undefined;
  return sign === '-' ? -magnitude : magnitude;
}

function requireInteger(text: string, raw: string): number {
  const value = parseInteger(text);
  if (value === undefined) {
    throw new PredicateConfigError({ message: `Expected a number in "${raw}", got "${text}"` });
  }
  return value;
}

function comparisonMatcher(raw: string, operator: Comparison, operand: number): Matcher {
  return {
    source: `${operator}${operand}`,
    test: (value) => {
      const n = parseInteger(value);
      if (n === undefined) return false;
      switch (operator) {
        case '==':
          return n === operand;
        case '!=':
          return n !== operand;
        case '<':
          return n < operand;
        case '<=':
          return n <= operand;
        case '>':
          return n > operand;
        case '>=':
          return n >= operand;
        default:
          throw new PredicateConfigError({ message: `Unsupported comparison in "${raw}"` });
      }
    }
  };
}
