import {
  ARGS_KEYWORD,
  type KeywordLine,
  type MatchedLine,
  type Predicate,
  type Query,
  type Section,
  type SectionMatch
} from '../core/types.js';

/**
 * Matches one section against a query. Every predicate is checked on its own:
 * two patterns on the same keyword may be satisfied by different lines.
 */
export function evaluate(section: Section, query: Query): SectionMatch | undefined {
  if (section.kind !== query.kind) return undefined;

  const contributing = new Set<KeywordLine>();
  for (const predicate of query.predicates) {
    const lines = satisfiedBy(section, predicate);
    if (!lines) return undefined;
    for (const line of lines) contributing.add(line);
  }

  const header: MatchedLine = { keyword: ARGS_KEYWORD, value: section.args, lineNumber: section.headerLine };
  const body = [...contributing]
    .map((line): MatchedLine => ({ keyword: line.name, value: line.value, lineNumber: line.lineNumber }))
    .sort(byLineNumber);
  return { section, matchedLines: [header, ...body] };
}

/** Matches in input order: sections are expected in file order, then line order. */
export function search(sections: readonly Section[], query: Query): SectionMatch[] {
  const found: SectionMatch[] = [];
  for (const section of sections) {
    const match = evaluate(section, query);
    if (match) found.push(match);
  }
  return found;
}

/** Lines that satisfy `predicate`, or undefined when it rejects the section. */
function satisfiedBy(section: Section, predicate: Predicate): KeywordLine[] | undefined {
  if (predicate.type === 'flag') {
    const present = section.keywordLines.filter((line) => line.name === predicate.keyword);
    if (predicate.mode === 'must-be-true') return present.length > 0 ? present : undefined;
    return present.length > 0 ? undefined : [];
  }

  const required = predicate.polarity === 'require-match';
  if (predicate.keyword === ARGS_KEYWORD) {
    return predicate.matcher.test(section.args) === required ? [] : undefined;
  }

  const hits = section.keywordLines.filter(
    (line) => line.name === predicate.keyword && predicate.matcher.test(line.value)
  );
  if (required) return hits.length > 0 ? hits : undefined;
  return hits.length > 0 ? undefined : [];
}

function byLineNumber(a: MatchedLine, b: MatchedLine): number {
  if (a.lineNumber === undefined) return b.lineNumber === undefined ? 0 : 1;
  if (b.lineNumber === undefined) return -1;
  return a.lineNumber - b.lineNumber;
}
