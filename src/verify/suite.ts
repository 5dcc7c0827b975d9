import { readFile } from 'node:fs/promises';
import { Ajv, type ErrorObject } from 'ajv';
import { canonicalDigest } from '../core/canonicalize.js';
import { PredicateConfigError, RcqueryError, SpecFormatError } from '../core/errors.js';
import { SECTION_KINDS, type AssertCase, type SectionKind } from '../core/types.js';
import { keywordShape } from '../grammar/vocabulary.js';
import { noopLogger, type Logger } from '../observability/logger.js';
import { buildQuery } from '../query/predicate.js';

type PatternList = string | string[];

export interface AssertTestDocument {
  name: string;
  description?: string;
  section: SectionKind;
  strict?: boolean;
  match?: Record<string, PatternList>;
  exclude?: Record<string, PatternList>;
  flags?: Record<string, boolean>;
}

export interface AssertSuiteDocument {
  tests: AssertTestDocument[];
}

// JSON.parse keeps "__proto__" as an own key; copying it into a plain object would set the prototype.
const keywordNameSchema = { not: { const: '__proto__' } };

const patternMapSchema = {
  type: 'object',
  propertyNames: keywordNameSchema,
  additionalProperties: {
    anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' }, minItems: 1 }]
  }
};

export const assertSuiteSchema = {
  type: 'object',
  properties: {
    tests: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          section: { type: 'string', enum: [...SECTION_KINDS] },
          strict: { type: 'boolean' },
          match: patternMapSchema,
          exclude: patternMapSchema,
          flags: { type: 'object', propertyNames: keywordNameSchema, additionalProperties: { type: 'boolean' } }
        },
        required: ['name', 'section']
      }
    }
  },
  required: ['tests']
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true, strict: false });
const validateSuite = ajv.compile<AssertSuiteDocument>(assertSuiteSchema);

export interface LoadCasesOptions {
  origin?: string;
  logger?: Logger;
}

export function parseSuite(text: string, options: LoadCasesOptions = {}): AssertCase[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SpecFormatError({ message: `Assert suite is not valid JSON: ${detail}`, file: options.origin, raw: error });
  }
  return loadCases(document, options);
}

/**
 * Validates an assert suite and compiles each test into a query. Keywords the
 * vocabulary does not know are kept (and logged) so newer suites still load.
 */
export function loadCases(document: unknown, options: LoadCasesOptions = {}): AssertCase[] {
  const logger = options.logger ?? noopLogger;
  if (!validateSuite(document)) {
    throw new SpecFormatError({
      message: `Malformed assert suite: ${formatErrors(validateSuite.errors).join('; ')}`,
      file: options.origin
    });
  }

  const seen = new Set<string>();
  return document.tests.map((test) => {
    if (seen.has(test.name)) {
      throw new SpecFormatError({ message: `Duplicate test name "${test.name}"`, file: options.origin });
    }
    seen.add(test.name);

    const match = toPatternLists(test.match);
    const exclude = toPatternLists(test.exclude);
    for (const keyword of [...Object.keys(match), ...Object.keys(exclude), ...Object.keys(test.flags ?? {})]) {
      if (!keywordShape(test.section, keyword)) {
        logger.warn('unknown keyword in assert test', { file: options.origin, test: test.name, keyword });
      }
    }

    try {
      const query = buildQuery({
        section: test.section,
        strict: test.strict,
        match,
        exclude,
        flags: test.flags,
        allowUnknownKeywords: true
      });
      return { name: test.name, description: test.description ?? test.name, query };
    } catch (error) {
      if (!(error instanceof PredicateConfigError)) throw error;
      throw new PredicateConfigError({
        message: `Test "${test.name}": ${error.message}`,
        file: options.origin,
        raw: error
      });
    }
  });
}

export async function loadCaseFiles(paths: readonly string[], logger: Logger = noopLogger): Promise<AssertCase[]> {
  const cases: AssertCase[] = [];
  for (const path of paths) {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new RcqueryError({ code: 'IO_ERROR', message: `Unable to read file: ${detail}`, file: path, raw: error });
    }
    const loaded = parseSuite(text, { origin: path, logger });
    const clash = loaded.find((test) => cases.some((existing) => existing.name === test.name));
    if (clash) {
      throw new SpecFormatError({ message: `Duplicate test name "${clash.name}"`, file: path });
    }
    cases.push(...loaded);
  }
  return cases;
}

/** Stable digest of what the cases search for; recorded in generated whitelists. */
export function fingerprintCases(cases: readonly AssertCase[]): string {
  return canonicalDigest(
    cases.map((test) => ({
      name: test.name,
      section: test.query.kind,
      strict: test.query.strict,
      predicates: test.query.predicates.map((predicate) =>
        predicate.type === 'flag'
          ? { keyword: predicate.keyword, mode: predicate.mode }
          : { keyword: predicate.keyword, polarity: predicate.polarity, raw: predicate.raw }
      )
    }))
  );
}

function toPatternLists(entries: Record<string, PatternList> | undefined): Record<string, string[]> {
  const lists: Record<string, string[]> = {};
  for (const [keyword, patterns] of Object.entries(entries ?? {})) {
    lists[keyword] = typeof patterns === 'string' ? [patterns] : patterns;
  }
  return lists;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) return ['invalid document'];
  return errors.map((err) => {
    const path = err.instancePath && err.instancePath.length > 0 ? err.instancePath : '/';
    const message = err.message ?? 'invalid';
    return `${path} ${message}`.trim();
  });
}
