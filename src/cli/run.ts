import { writeFile } from 'node:fs/promises';
import { loadEnvConfig } from '../core/config.js';
import { RcqueryError, toRcqueryError } from '../core/errors.js';
import { readRcqueryPackageVersion } from '../core/package.js';
import type { Section, SourceFile } from '../core/types.js';
import { parseSources } from '../grammar/parser.js';
import { readSourceFile } from '../grammar/source.js';
import { createJsonLogger, type Logger } from '../observability/logger.js';
import { search } from '../query/evaluate.js';
import { buildQuery } from '../query/predicate.js';
import { formatError, formatFailures, formatMatch, formatSections } from '../render/text.js';
import { fingerprintCases, loadCaseFiles } from '../verify/suite.js';
import { run as runVerify, generateWhitelist } from '../verify/verifier.js';
import { emptyWhitelist, readWhitelist, serializeWhitelist } from '../verify/whitelist.js';
import {
  parseRcqueryArgs,
  type PrintCommand,
  type RcqueryCommand,
  type SearchCommand,
  type VerifyCommand
} from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_ERROR = 2;

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

interface LoadedSources {
  sections: Section[];
  failed: boolean;
}

export async function main(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseRcqueryArgs(argv);
  switch (parsed.kind) {
    case 'help':
      io.stdout.write(parsed.message);
      return parsed.exitCode;
    case 'version':
      io.stdout.write(`${await readRcqueryPackageVersion()}\n`);
      return parsed.exitCode;
    case 'error':
      io.stderr.write(`${parsed.message}\n`);
      return parsed.exitCode;
    case 'run':
      return runRcquery(parsed.config, io);
  }
}

export async function runRcquery(command: RcqueryCommand, io: CliIo): Promise<number> {
  try {
    const root = io.logger ?? createJsonLogger({ level: loadEnvConfig(io.env).logLevel, stream: io.stderr });
    const logger = root.child({ command: command.command });
    switch (command.command) {
      case 'print':
        return await runPrint(command, io, logger);
      case 'search':
        return await runSearch(command, io, logger);
      case 'verify':
        return await runVerifyCommand(command, io, logger);
    }
  } catch (error) {
    if (!(error instanceof RcqueryError)) throw error;
    io.stderr.write(formatError(error));
    return EXIT_ERROR;
  }
}

async function runPrint(command: PrintCommand, io: CliIo, logger: Logger): Promise<number> {
  const loaded = await loadSources(command.files, io, logger);
  const text = formatSections(loaded.sections, { lineNumbers: command.lineNumbers });
  if (text) io.stdout.write(text);
  return loaded.failed ? EXIT_ERROR : EXIT_OK;
}

async function runSearch(command: SearchCommand, io: CliIo, logger: Logger): Promise<number> {
  // A malformed query fails the whole invocation before any file is read.
  const query = buildQuery(command.query);
  const loaded = await loadSources(command.files, io, logger);
  const matches = search(loaded.sections, query);
  logger.info('search finished', { section: query.kind, matches: matches.length });

  if (command.count) {
    io.stdout.write(`${matches.length}\n`);
  } else {
    for (const match of matches) {
      io.stdout.write(`${formatMatch(match, { lineNumbers: command.lineNumbers, tidy: query.tidy })}\n`);
    }
  }

  if (loaded.failed) return EXIT_ERROR;
  return matches.length > 0 ? EXIT_OK : EXIT_FAILED;
}

async function runVerifyCommand(command: VerifyCommand, io: CliIo, logger: Logger): Promise<number> {
  const cases = await loadCaseFiles(command.asserts, logger);
  const suite = fingerprintCases(cases);
  const loaded = await loadSources(command.files, io, logger);

  if (command.gen) {
    const document = generateWhitelist(cases, loaded.sections, suite);
    const text = serializeWhitelist(document);
    if (command.out) {
      await writeOutput(command.out, text);
      logger.info('whitelist written', { file: command.out, entries: document.entries.length });
    } else {
      io.stdout.write(text);
    }
    return loaded.failed ? EXIT_ERROR : EXIT_OK;
  }

  const whitelist = command.whitelist ? await readWhitelist(command.whitelist) : emptyWhitelist();
  if (whitelist.suite && whitelist.suite !== suite) {
    logger.warn('whitelist was generated from a different assert suite', { whitelist: command.whitelist });
  }

  const report = runVerify(cases, loaded.sections, whitelist, { logger });
  io.stderr.write(formatFailures(report));
  logger.info('verify finished', { cases: cases.length, failures: report.failures.length });

  if (loaded.failed) return EXIT_ERROR;
  return report.ok ? EXIT_OK : EXIT_FAILED;
}

/** Reads and parses each file on its own; one bad file does not stop the rest. */
async function loadSources(paths: readonly string[], io: CliIo, logger: Logger): Promise<LoadedSources> {
  const files: SourceFile[] = [];
  let failed = false;
  for (const path of paths) {
    const fileLogger = logger.child({ file: path });
    try {
      const file = await readSourceFile(path);
      fileLogger.debug('source read', { lines: file.lines.length });
      files.push(file);
    } catch (error) {
      if (!(error instanceof RcqueryError)) throw error;
      io.stderr.write(formatError(error));
      fileLogger.debug('source skipped', { error });
      failed = true;
    }
  }

  const parsed = parseSources(files, { logger });
  for (const failure of parsed.failures) {
    io.stderr.write(formatError(failure.error));
    logger.child({ file: failure.file.path }).debug('source skipped', { error: failure.error });
  }
  return { sections: parsed.sections, failed: failed || parsed.failures.length > 0 };
}

async function writeOutput(path: string, text: string): Promise<void> {
  try {
    await writeFile(path, text, 'utf8');
  } catch (error) {
    throw toRcqueryError(error, { code: 'IO_ERROR', file: path });
  }
}
