import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EXIT_ERROR, EXIT_FAILED, EXIT_OK, main } from '../src/cli/run.js';
import { noopLogger, type Logger } from '../src/observability/logger.js';
import { captureStream, fixturePath } from './fixtures/fixture-utils.js';

const rc = fixturePath('init.sample.rc');
const asserts = fixturePath('asserts.json');

async function invoke(argv: string[], logger: Logger = noopLogger) {
  const stdout = captureStream();
  const stderr = captureStream();
  const code = await main(argv, { stdout: stdout.stream, stderr: stderr.stream, env: {}, logger });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
}

describe('rcquery search', () => {
  it('prints each matching section', async () => {
    const result = await invoke(['search', rc, '--section', 'on', '--args', 'property:foo\\.bar']);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toBe(`${rc}:\n28:\ton property:foo.bar=*\n\t\tcommand: mkdir /foo/bar 0777 system system\n\n`);
    expect(result.stderr).toBe('');
  });

  it('prints only matched lines with --tidy', async () => {
    const result = await invoke(['search', rc, '--section', 'service', '--user', 'root', '--critical', '--tidy', '--lineno']);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toBe(
      `${rc}:\n31:\tservice adbd /sbin/adbd --root_seclabel=u:r:su:s0\n32:\t\tcritical\n-:\t\tuser: root\n\n`
    );
  });

  it('counts matches', async () => {
    const result = await invoke(['search', rc, '--section', 'service', '--count']);
    expect(result.stdout).toBe('4\n');
  });

  it('exits 1 when nothing matches', async () => {
    const result = await invoke(['search', rc, '--section', 'on', '--command', 'reboot']);
    expect(result.code).toBe(EXIT_FAILED);
    expect(result.stdout).toBe('');
  });

  it('exits 2 on usage errors', async () => {
    const result = await invoke(['search', rc, '--section', 'on', '--user', 'root']);
    expect(result.code).toBe(EXIT_ERROR);
    expect(result.stderr.startsWith('Unknown option for on sections: --user\n\nrcquery\n')).toBe(true);
  });

  it('exits 2 on a malformed pattern before reading files', async () => {
    const result = await invoke(['search', fixturePath('missing.rc'), '--section', 'on', '--command', '(']);
    expect(result.code).toBe(EXIT_ERROR);
    expect(result.stderr).toMatch(/^error: Invalid pattern "\("/);
  });

  it('keeps searching the other files when one cannot be read', async () => {
    const missing = fixturePath('missing.rc');
    const result = await invoke(['search', missing, rc, '--section', 'service', '--count']);
    expect(result.code).toBe(EXIT_ERROR);
    expect(result.stdout).toBe('4\n');
    expect(result.stderr.startsWith(`error: ${missing}: Unable to read file: `)).toBe(true);
  });
});

describe('rcquery logging', () => {
  it('tags log entries with the command and the file', async () => {
    const missing = fixturePath('missing.rc');
    const stdout = captureStream();
    const stderr = captureStream();
    const code = await main(['search', missing, '--section', 'on', '--count'], {
      stdout: stdout.stream,
      stderr: stderr.stream,
      env: { RCQUERY_LOG_LEVEL: 'debug' }
    });
    expect(code).toBe(EXIT_ERROR);

    const entries = stderr
      .text()
      .split('\n')
      .filter((line) => line.startsWith('{'))
      .map((line): unknown => JSON.parse(line));
    expect(entries).toContainEqual(
      expect.objectContaining({
        level: 'debug',
        message: 'source skipped',
        command: 'search',
        file: missing,
        error: expect.objectContaining({ name: 'RcqueryError', code: 'IO_ERROR', file: missing })
      })
    );
    expect(entries).toContainEqual(
      expect.objectContaining({ level: 'info', message: 'search finished', command: 'search', matches: 0 })
    );
  });
});

describe('rcquery print', () => {
  it('prints every section in file order', async () => {
    const result = await invoke(['print', rc]);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout.startsWith(`${rc}:\n3:\timport /init.\${ro.hardware}.rc\n\n${rc}:\n4:\timport `)).toBe(true);
    expect(result.stdout.endsWith('\t\twritepid /dev/cpuset/system-background/tasks\n')).toBe(true);
  });

  it('reports parse errors with their location', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'rcquery-'));
    try {
      const broken = path.join(dir, 'broken.rc');
      await writeFile(broken, 'service a /bin/a\n    user root\n    user system\n', 'utf8');
      const result = await invoke(['print', broken]);
      expect(result.code).toBe(EXIT_ERROR);
      expect(result.stderr).toBe(`error: ${broken}:3: Keyword "user" may appear only once per service (first on line 2)\n`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('rcquery verify', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'rcquery-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports failing tests on stderr', async () => {
    const result = await invoke(['verify', rc, '--assert', asserts]);
    expect(result.code).toBe(EXIT_FAILED);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe(
      [
        'Failed test(No world writable sockets):',
        `${rc}:`,
        '31:\tservice adbd /sbin/adbd --root_seclabel=u:r:su:s0',
        '\t\targs(31): adbd /sbin/adbd --root_seclabel=u:r:su:s0',
        '\t\tsocket(33): adbd stream 0666 system system',
        'Failed test(Critical services must not run as root):',
        `${rc}:`,
        '31:\tservice adbd /sbin/adbd --root_seclabel=u:r:su:s0',
        '\t\targs(31): adbd /sbin/adbd --root_seclabel=u:r:su:s0',
        '\t\tcritical(32)',
        '\t\tuser(default): root',
        'Failed test(world-writable-dirs):',
        `${rc}:`,
        '28:\ton property:foo.bar=*',
        '\t\targs(28): property:foo.bar=*',
        '\t\tcommand(29): mkdir /foo/bar 0777 system system',
        ''
      ].join('\n')
    );
  });

  it('passes against a whitelist it generated', async () => {
    const out = path.join(dir, 'whitelist.json');
    const generated = await invoke(['verify', rc, '--assert', asserts, '--gen', '--out', out]);
    expect(generated.code).toBe(EXIT_OK);
    expect(generated.stdout).toBe('');

    const document: unknown = JSON.parse(await readFile(out, 'utf8'));
    expect(document).toMatchObject({ version: 1, suite: expect.stringMatching(/^sha256:/) });

    const verified = await invoke(['verify', rc, '--assert', asserts, '--whitelist', out]);
    expect(verified).toEqual({ code: EXIT_OK, stdout: '', stderr: '' });
  });

  it('writes the generated whitelist to stdout without --out', async () => {
    const result = await invoke(['verify', rc, '--assert', asserts, '--gen']);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout.endsWith('}\n')).toBe(true);
    expect(JSON.parse(result.stdout)).toMatchObject({ version: 1 });
  });

  it('warns when the whitelist came from another suite', async () => {
    const whitelist = path.join(dir, 'whitelist.json');
    await writeFile(whitelist, JSON.stringify({ version: 1, suite: 'sha256:other', entries: [] }), 'utf8');
    const warn = vi.fn();
    const logger: Logger = { ...noopLogger, warn, child: () => logger };
    const result = await invoke(['verify', rc, '--assert', asserts, '--whitelist', whitelist], logger);
    expect(result.code).toBe(EXIT_FAILED);
    expect(warn).toHaveBeenCalledWith('whitelist was generated from a different assert suite', { whitelist });
  });

  it('exits 2 on a malformed assert suite', async () => {
    const suite = path.join(dir, 'suite.json');
    await writeFile(suite, JSON.stringify({ tests: [{ name: 'x' }] }), 'utf8');
    const result = await invoke(['verify', rc, '--assert', suite]);
    expect(result.code).toBe(EXIT_ERROR);
    expect(result.stderr.startsWith(`error: ${suite}: Malformed assert suite: `)).toBe(true);
  });
});

describe('rcquery', () => {
  it('prints the package version', async () => {
    const result = await invoke(['--version']);
    expect(result).toEqual({ code: EXIT_OK, stdout: '0.1.0\n', stderr: '' });
  });

  it('prints usage for help', async () => {
    const result = await invoke([]);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout.startsWith('rcquery\n\nUsage:\n')).toBe(true);
  });
});
