import { GrammarError, RcqueryError, UnknownSectionError } from '../core/errors.js';
import type { KeywordLine, Section, SectionKind, SourceFile } from '../core/types.js';
import { noopLogger, type Logger } from '../observability/logger.js';
import { defaultValues, isSectionKind, keywordShape, TRIGGER_COMMAND } from './vocabulary.js';

export interface ParseOptions {
  logger?: Logger;
}

export interface ParseFailure {
  file: SourceFile;
  error: RcqueryError;
}

export interface ParsedSources {
  sections: Section[];
  failures: ParseFailure[];
}

interface LogicalLine {
  text: string;
  lineNumber: number;
  indented: boolean;
}

interface OpenSection {
  kind: SectionKind;
  args: string;
  headerLine: number;
  keywordLines: KeywordLine[];
}

export function parse(file: SourceFile, options: ParseOptions = {}): Section[] {
  const logger = options.logger ?? noopLogger;
  const sections: Section[] = [];
  let current: OpenSection | undefined;

  for (const line of logicalLines(file)) {
    const tokens = line.text.split(/\s+/);
    const head = tokens[0] ?? '';

    if (!line.indented) {
      if (!isSectionKind(head)) {
        throw new UnknownSectionError({
          message: `Unknown section keyword "${head}"`,
          file: file.path,
          line: line.lineNumber
        });
      }
      if (current) sections.push(closeSection(current, file));
      current = { kind: head, args: tokens.slice(1).join(' '), headerLine: line.lineNumber, keywordLines: [] };
      continue;
    }

    if (!current) {
      throw new GrammarError({
        message: 'Indented line outside of any section',
        file: file.path,
        line: line.lineNumber
      });
    }

    switch (current.kind) {
      case 'import':
        throw new GrammarError({
          message: 'import sections take no keyword lines',
          file: file.path,
          line: line.lineNumber
        });
      case 'on':
        current.keywordLines.push({ name: TRIGGER_COMMAND, value: line.text, lineNumber: line.lineNumber });
        break;
      case 'service':
        pushServiceKeyword(current, head, tokens.slice(1).join(' '), line.lineNumber, file, logger);
        break;
      default:
        assertNever(current.kind);
    }
  }

  if (current) sections.push(closeSection(current, file));
  logger.debug('parsed source file', { file: file.path, sections: sections.length });
  return sections;
}

/**
 * Parses every file independently. A file that fails to parse is reported in
 * `failures` and contributes no sections; the others are unaffected.
 */
export function parseSources(files: readonly SourceFile[], options: ParseOptions = {}): ParsedSources {
  const sections: Section[] = [];
  const failures: ParseFailure[] = [];
  for (const file of files) {
    try {
      sections.push(...parse(file, options));
    } catch (error) {
      if (!(error instanceof RcqueryError)) throw error;
      failures.push({ file, error });
    }
  }
  return { sections, failures };
}

/**
 * Returns `section` with one synthesized line per defaulted keyword the source
 * did not set. The input is left untouched.
 */
export function applyDefaults(section: Section): Section {
  const missing = defaultValues(section.kind).filter(
    ([name]) => !section.keywordLines.some((line) => line.name === name)
  );
  if (missing.length === 0) return section;
  const injected = missing.map(([name, value]): KeywordLine => Object.freeze({ name, value }));
  return Object.freeze({
    ...section,
    keywordLines: Object.freeze([...section.keywordLines, ...injected])
  });
}

function pushServiceKeyword(
  section: OpenSection,
  name: string,
  value: string,
  lineNumber: number,
  file: SourceFile,
  logger: Logger
): void {
  const shape = keywordShape('service', name);
  if (!shape) {
    logger.warn('unknown service keyword', { file: file.path, line: lineNumber, keyword: name });
  } else if (!(shape.type === 'pattern' && shape.repeatable)) {
    const previous = section.keywordLines.find((line) => line.name === name);
    if (previous) {
      throw new GrammarError({
        message: `Keyword "${name}" may appear only once per service (first on line ${previous.lineNumber ?? '?'})`,
        file: file.path,
        line: lineNumber
      });
    }
  }
  section.keywordLines.push({ name, value, lineNumber });
}

function closeSection(open: OpenSection, source: SourceFile): Section {
  const section: Section = Object.freeze({
    kind: open.kind,
    args: open.args,
    headerLine: open.headerLine,
    keywordLines: Object.freeze(open.keywordLines.map((line) => Object.freeze(line))),
    source
  });
  return applyDefaults(section);
}

function logicalLines(file: SourceFile): LogicalLine[] {
  const result: LogicalLine[] = [];
  let pending: { parts: string[]; lineNumber: number; indented: boolean } | undefined;

  file.lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const text = raw.trim();
    if (text.length === 0 || text.startsWith('#') || text.startsWith('{{')) return;

    const folded = text.endsWith('\\');
    const part = folded ? text.slice(0, -1).trim() : text;
    if (!pending) pending = { parts: [], lineNumber, indented: /^\s/.test(raw) };
    if (part.length > 0) pending.parts.push(part);
    if (folded) return;

    result.push({ text: pending.parts.join(' '), lineNumber: pending.lineNumber, indented: pending.indented });
    pending = undefined;
  });

  // An unterminated fold at end of file still ends the logical line.
  if (pending && pending.parts.length > 0) {
    result.push({ text: pending.parts.join(' '), lineNumber: pending.lineNumber, indented: pending.indented });
  }
  return result;
}

function assertNever(value: never): never {
  throw new RcqueryError({ code: 'INTERNAL', message: `Unhandled section kind: ${String(value)}` });
}
