export * from './core/types.js';
export * from './core/errors.js';
export { canonicalDigest, canonicalizeJson } from './core/canonicalize.js';
export { loadEnvConfig, type EnvConfig } from './core/config.js';
export { createJsonLogger, noopLogger, type LogContext, type Logger, type LoggerOptions, type LogLevel } from './observability/logger.js';

export {
  defaultValues,
  isSectionKind,
  keywordNames,
  keywordShape,
  keywordTable,
  TRIGGER_COMMAND,
  type KeywordTable
} from './grammar/vocabulary.js';
export { readSourceFile, sourceFileFromText } from './grammar/source.js';
export {
  applyDefaults,
  parse,
  parseSources,
  type ParsedSources,
  type ParseFailure,
  type ParseOptions
} from './grammar/parser.js';

export { compileMatcher, compileNumberMatcher, compileRegexMatcher, parseInteger, type MatcherOptions } from './query/matcher.js';
export { buildQuery, compilePredicate, type QueryOptions } from './query/predicate.js';
export { evaluate, search } from './query/evaluate.js';

export {
  assertSuiteSchema,
  fingerprintCases,
  loadCaseFiles,
  loadCases,
  parseSuite,
  type AssertSuiteDocument,
  type AssertTestDocument,
  type LoadCasesOptions
} from './verify/suite.js';
export {
  emptyWhitelist,
  identityUnits,
  parseWhitelist,
  readWhitelist,
  serializeWhitelist,
  Whitelist,
  whitelistKey,
  WHITELIST_VERSION,
  type WhitelistDocument
} from './verify/whitelist.js';
export { generateWhitelist, run, type VerifyOptions } from './verify/verifier.js';

export {
  formatError,
  formatFailures,
  formatHeader,
  formatMatch,
  formatSection,
  formatSections,
  type RenderOptions,
  type SectionRenderOptions
} from './render/text.js';
