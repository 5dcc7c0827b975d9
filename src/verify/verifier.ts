import type { AssertCase, CaseFailure, Section, VerifyReport, WhitelistEntry } from '../core/types.js';
import { noopLogger, type Logger } from '../observability/logger.js';
import { search } from '../query/evaluate.js';
import {
  identityUnits,
  whitelistKey,
  WHITELIST_VERSION,
  type Whitelist,
  type WhitelistDocument
} from './whitelist.js';

export interface VerifyOptions {
  logger?: Logger;
}

/**
 * Runs every case over every section. A match is dropped only when each of its
 * identity units is whitelisted; otherwise it fails with the units left over.
 */
export function run(
  cases: readonly AssertCase[],
  sections: readonly Section[],
  whitelist: Whitelist,
  options: VerifyOptions = {}
): VerifyReport {
  const logger = options.logger ?? noopLogger;
  const failures: CaseFailure[] = [];

  for (const test of cases) {
    const matches = search(sections, test.query);
    let suppressed = 0;
    for (const match of matches) {
      const units = identityUnits(test.name, match).filter((unit) => !whitelist.has(unit));
      if (units.length === 0) {
        suppressed += 1;
        continue;
      }
      failures.push({ case: test, match, units });
    }
    logger.debug('assert case evaluated', { test: test.name, matches: matches.length, suppressed });
  }

  return { ok: failures.length === 0, failures };
}

/** Every identity unit of every match, ignoring any existing whitelist. */
export function generateWhitelist(
  cases: readonly AssertCase[],
  sections: readonly Section[],
  suite?: string
): WhitelistDocument {
  const seen = new Set<string>();
  const entries: WhitelistEntry[] = [];
  for (const test of cases) {
    for (const match of search(sections, test.query)) {
      for (const unit of identityUnits(test.name, match)) {
        const key = whitelistKey(unit);
        if (seen.has(key)) continue;
        seen.add(key);
        entries.push(unit);
      }
    }
  }
  return {
    version: WHITELIST_VERSION,
    suite,
    entries: entries.map((entry) => ({ ...entry }))
  };
}
