export type SectionKind = 'on' | 'service' | 'import';

export const SECTION_KINDS: readonly SectionKind[] = ['on', 'service', 'import'];

/** Name of the pseudo keyword that addresses a section's header arguments. */
export const ARGS_KEYWORD = 'args';

export interface SourceFile {
  readonly path: string;
  readonly lines: readonly string[];
}

export interface KeywordLine {
  readonly name: string;
  readonly value: string;
  /** 1-based; undefined when the entry was injected from the default table. */
  readonly lineNumber?: number;
}

export interface Section {
  readonly kind: SectionKind;
  readonly args: string;
  readonly headerLine: number;
  readonly keywordLines: readonly KeywordLine[];
  readonly source: SourceFile;
}

export type KeywordShape =
  | { type: 'pattern'; repeatable: boolean; default?: string }
  | { type: 'number'; default?: string }
  | { type: 'boolean' };

export type Polarity = 'require-match' | 'require-no-match';
export type FlagMode = 'must-be-true' | 'must-be-false';

export interface Matcher {
  readonly source: string;
  test(value: string): boolean;
}

export interface PatternPredicate {
  readonly type: 'pattern';
  readonly keyword: string;
  readonly raw: string;
  readonly polarity: Polarity;
  readonly matcher: Matcher;
}

export interface FlagPredicate {
  readonly type: 'flag';
  readonly keyword: string;
  readonly mode: FlagMode;
}

export type Predicate = PatternPredicate | FlagPredicate;

export interface Query {
  readonly kind: SectionKind;
  readonly predicates: readonly Predicate[];
  readonly strict: boolean;
  readonly tidy: boolean;
}

export interface MatchedLine {
  readonly keyword: string;
  readonly value: string;
  /** undefined for a defaulted keyword: no physical line, the default applies. */
  readonly lineNumber?: number;
}

export interface SectionMatch {
  readonly section: Section;
  readonly matchedLines: readonly MatchedLine[];
}

export interface AssertCase {
  readonly name: string;
  readonly description: string;
  readonly query: Query;
}

export interface WhitelistEntry {
  readonly test: string;
  readonly file: string;
  readonly section: number;
  readonly keyword: string;
  readonly line: number | null;
}

export interface CaseFailure {
  readonly case: AssertCase;
  readonly match: SectionMatch;
  readonly units: readonly WhitelistEntry[];
}

export interface VerifyReport {
  readonly ok: boolean;
  readonly failures: readonly CaseFailure[];
}
