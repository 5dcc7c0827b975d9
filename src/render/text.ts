import type { RcqueryError } from '../core/errors.js';
import { ARGS_KEYWORD, type CaseFailure, type MatchedLine, type Section, type SectionMatch, type VerifyReport } from '../core/types.js';

export interface RenderOptions {
  lineNumbers?: boolean;
}

export interface SectionRenderOptions extends RenderOptions {
  /** Restrict the body to these lines (tidy output). */
  only?: readonly MatchedLine[];
}

export function formatHeader(section: Section): string {
  const header = section.args ? `${section.kind} ${section.args}` : section.kind;
  return `${section.source.path}:\n${section.headerLine}:\t${header}`;
}

export function formatSection(section: Section, options: SectionRenderOptions = {}): string {
  const lines = options.only
    ? options.only.filter((line) => line.lineNumber !== section.headerLine || line.keyword !== ARGS_KEYWORD)
    : section.keywordLines
        .filter((line) => line.lineNumber !== undefined)
        .map((line) => ({ keyword: line.name, value: line.value, lineNumber: line.lineNumber }));

  const body = lines.map((line) => formatLine(line, options.lineNumbers ?? false));
  return [formatHeader(section), ...body].join('\n') + '\n';
}

export function formatMatch(match: SectionMatch, options: RenderOptions & { tidy?: boolean } = {}): string {
  return formatSection(match.section, {
    lineNumbers: options.lineNumbers,
    only: options.tidy ? match.matchedLines : undefined
  });
}

/** Sections in the order given, separated by blank lines. */
export function formatSections(sections: readonly Section[], options: RenderOptions = {}): string {
  return sections.map((section) => formatSection(section, options)).join('\n');
}

export function formatFailures(report: VerifyReport): string {
  const out: string[] = [];
  let current: string | undefined;
  for (const failure of report.failures) {
    if (failure.case.name !== current) {
      current = failure.case.name;
      out.push(`Failed test(${failure.case.description}):`);
    }
    out.push(formatHeader(failure.match.section));
    for (const line of unmatchedLines(failure)) {
      const label = `${line.keyword}(${line.lineNumber ?? 'default'})`;
      out.push(`\t\t${line.value === '' ? label : `${label}: ${line.value}`}`);
    }
  }
  return out.length > 0 ? `${out.join('\n')}\n` : '';
}

export function formatError(error: RcqueryError): string {
  return `error: ${error.describe()}\n`;
}

function unmatchedLines(failure: CaseFailure): MatchedLine[] {
  return failure.match.matchedLines.filter((line) =>
    failure.units.some((unit) => unit.keyword === line.keyword && unit.line === (line.lineNumber ?? null))
  );
}

function formatLine(line: MatchedLine, lineNumbers: boolean): string {
  const prefix = lineNumbers ? `${line.lineNumber ?? '-'}:` : '';
  const text = line.value === '' ? line.keyword : `${line.keyword}: ${line.value}`;
  return `${prefix}\t\t${text}`;
}
