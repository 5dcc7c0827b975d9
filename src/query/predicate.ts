import { PredicateConfigError } from '../core/errors.js';
import {
  ARGS_KEYWORD,
  type FlagPredicate,
  type PatternPredicate,
  type Polarity,
  type Predicate,
  type Query,
  type SectionKind
} from '../core/types.js';
import { keywordShape } from '../grammar/vocabulary.js';
import { compileMatcher } from './matcher.js';

export interface QueryOptions {
  section: SectionKind;
  strict?: boolean;
  tidy?: boolean;
  /** keyword -> patterns that must each be matched by some line */
  match?: Record<string, readonly string[]>;
  /** keyword -> patterns no line may match */
  exclude?: Record<string, readonly string[]>;
  /** boolean keyword -> required presence; a keyword listed twice with both values is rejected */
  flags?: Record<string, boolean | readonly boolean[]>;
  /** Accept keywords missing from the vocabulary; they are matched as free-form patterns. */
  allowUnknownKeywords?: boolean;
}

export function compilePredicate(
  kind: SectionKind,
  keyword: string,
  raw: string,
  polarity: Polarity,
  strict: boolean
): PatternPredicate {
  const shape = keywordShape(kind, keyword);
  if (shape?.type === 'boolean') {
    throw new PredicateConfigError({
      message: `"${keyword}" is a boolean keyword of ${kind} sections and takes no pattern`
    });
  }
  return {
    type: 'pattern',
    keyword,
    raw,
    polarity,
    matcher: compileMatcher(raw, { strict, shape })
  };
}

export function buildQuery(options: QueryOptions): Query {
  const kind = options.section;
  const strict = options.strict ?? false;
  const predicates: Predicate[] = [];

  const checkKeyword = (keyword: string) => {
    if (options.allowUnknownKeywords || keywordShape(kind, keyword)) return;
    throw new PredicateConfigError({ message: `Unknown keyword "${keyword}" for ${kind} sections` });
  };

  const addPatterns = (entries: Record<string, readonly string[]> | undefined, polarity: Polarity) => {
    for (const [keyword, patterns] of Object.entries(entries ?? {})) {
      checkKeyword(keyword);
      if (keyword === ARGS_KEYWORD && patterns.length > 1) {
        throw new PredicateConfigError({
          message: `"${ARGS_KEYWORD}" accepts a single ${polarity === 'require-match' ? 'match' : 'exclude'} pattern`
        });
      }
      for (const raw of patterns) {
        predicates.push(compilePredicate(kind, keyword, raw, polarity, strict));
      }
    }
  };

  addPatterns(options.match, 'require-match');
  addPatterns(options.exclude, 'require-no-match');

  for (const [keyword, requested] of Object.entries(options.flags ?? {})) {
    checkKeyword(keyword);
    predicates.push(compileFlag(kind, keyword, typeof requested === 'boolean' ? [requested] : requested));
  }

  return { kind, predicates, strict, tidy: options.tidy ?? false };
}

function compileFlag(kind: SectionKind, keyword: string, requested: readonly boolean[]): FlagPredicate {
  const shape = keywordShape(kind, keyword);
  if (shape && shape.type !== 'boolean') {
    throw new PredicateConfigError({ message: `"${keyword}" is not a boolean keyword of ${kind} sections` });
  }
  const values = new Set(requested);
  if (values.size !== 1) {
    throw new PredicateConfigError({
      message: values.size === 0 ? `No value given for "${keyword}"` : `"${keyword}" cannot be required both present and absent`
    });
  }
  return { type: 'flag', keyword, mode: values.has(true) ? 'must-be-true' : 'must-be-false' };
}
