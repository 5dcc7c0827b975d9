import { describe, expect, it, vi } from 'vitest';
import { PredicateConfigError, SpecFormatError } from '../src/core/errors.js';
import { noopLogger, type Logger } from '../src/observability/logger.js';
import { fingerprintCases, loadCaseFiles, loadCases, parseSuite } from '../src/verify/suite.js';
import { fixturePath } from './fixtures/fixture-utils.js';

describe('loadCases', () => {
  it('compiles each test into a named query', () => {
    const cases = loadCases({
      tests: [
        {
          name: 'critical-root',
          description: 'Critical services must not run as root',
          section: 'service',
          flags: { critical: true },
          match: { user: 'root' },
          exclude: { args: ['^ueventd'] }
        }
      ]
    });
    expect(cases).toHaveLength(1);
    expect(cases[0]?.name).toBe('critical-root');
    expect(cases[0]?.description).toBe('Critical services must not run as root');
    expect(cases[0]?.query.kind).toBe('service');
    expect(cases[0]?.query.strict).toBe(false);
    expect(
      cases[0]?.query.predicates.map((predicate) =>
        predicate.type === 'flag' ? `${predicate.keyword}:${predicate.mode}` : `${predicate.keyword}:${predicate.polarity}`
      )
    ).toEqual(['user:require-match', 'args:require-no-match', 'critical:must-be-true']);
  });

  it('uses the name when no description is given', () => {
    const [test] = loadCases({ tests: [{ name: 'dirs', section: 'on', match: { command: ['mkdir'] } }] });
    expect(test?.description).toBe('dirs');
  });

  it('ignores unknown properties', () => {
    const cases = loadCases({ version: 2, tests: [{ name: 'x', section: 'import', owner: 'platform' }] });
    expect(cases).toHaveLength(1);
  });

  it('keeps keywords it does not know and warns about them', () => {
    const warn = vi.fn();
    const logger: Logger = { ...noopLogger, warn };
    const [test] = loadCases(
      { tests: [{ name: 'future', section: 'service', match: { restart_period: ['^5$'] } }] },
      { origin: 'suite.json', logger }
    );
    expect(test?.query.predicates).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith('unknown keyword in assert test', {
      file: 'suite.json',
      test: 'future',
      keyword: 'restart_period'
    });
  });

  it('rejects documents that do not follow the schema', () => {
    expect(() => loadCases({})).toThrow(SpecFormatError);
    expect(() => loadCases({ tests: [{ name: 'x', section: 'task' }] })).toThrow(/Malformed assert suite/);
    expect(() => loadCases({ tests: [{ name: 'x', section: 'on', match: { command: 3 } }] })).toThrow(SpecFormatError);
    expect(() => loadCases({ tests: [{ name: 'x', section: 'on', flags: { critical: 'yes' } }] })).toThrow(SpecFormatError);
  });

  it('rejects __proto__ as a keyword name', () => {
    const text = (map: string) => `{"tests":[{"name":"x","section":"on",${map}}]}`;
    expect(() => parseSuite(text('"match":{"__proto__":["x"],"command":["mkdir"]}'))).toThrow(SpecFormatError);
    expect(() => parseSuite(text('"exclude":{"__proto__":"x"}'))).toThrow(/Malformed assert suite/);
    expect(() => parseSuite(text('"flags":{"__proto__":true}'))).toThrow(SpecFormatError);
    expect(parseSuite(text('"match":{"command":["mkdir"]}'))[0]?.query.predicates).toHaveLength(1);
  });

  it('rejects duplicate test names', () => {
    expect(() =>
      loadCases({
        tests: [
          { name: 'x', section: 'on' },
          { name: 'x', section: 'service' }
        ]
      })
    ).toThrow('Duplicate test name "x"');
  });

  it('reports bad patterns with the test name', () => {
    expect(() => loadCases({ tests: [{ name: 'broken', section: 'on', match: { command: ['('] } }] })).toThrow(
      PredicateConfigError
    );
    expect(() => loadCases({ tests: [{ name: 'broken', section: 'on', match: { command: ['('] } }] })).toThrow(
      /^Test "broken": Invalid pattern/
    );
  });
});

describe('parseSuite', () => {
  it('rejects invalid JSON', () => {
    expect(() => parseSuite('{ tests: ', { origin: 'broken.json' })).toThrow(SpecFormatError);
  });
});

describe('loadCaseFiles', () => {
  it('reads suites from disk', async () => {
    const cases = await loadCaseFiles([fixturePath('asserts.json')]);
    expect(cases.map((test) => test.name)).toEqual(['world-writable-sockets', 'critical-root', 'world-writable-dirs']);
  });

  it('rejects the same test name across files', async () => {
    const path = fixturePath('asserts.json');
    await expect(loadCaseFiles([path, path])).rejects.toThrow('Duplicate test name "world-writable-sockets"');
  });

  it('reports missing files as IO errors', async () => {
    await expect(loadCaseFiles([fixturePath('missing.json')])).rejects.toMatchObject({ code: 'IO_ERROR' });
  });
});

describe('fingerprintCases', () => {
  it('changes only when what the cases search for changes', () => {
    const base = { tests: [{ name: 'x', section: 'on', match: { command: ['mkdir'] } }] };
    const same = { tests: [{ name: 'x', section: 'on', description: 'other words', match: { command: 'mkdir' } }] };
    const changed = { tests: [{ name: 'x', section: 'on', match: { command: ['chmod'] } }] };
    expect(fingerprintCases(loadCases(base))).toBe(fingerprintCases(loadCases(same)));
    expect(fingerprintCases(loadCases(base))).not.toBe(fingerprintCases(loadCases(changed)));
    expect(fingerprintCases(loadCases(base))).toMatch(/^sha256:[0-9a-f]{64}$/);
  });
});
