import { ARGS_KEYWORD, SECTION_KINDS, type SectionKind } from '../core/types.js';
import { isSectionKind, keywordNames, keywordShape } from '../grammar/vocabulary.js';
import type { QueryOptions } from '../query/predicate.js';

export interface PrintCommand {
  command: 'print';
  files: string[];
  lineNumbers: boolean;
}

export interface SearchCommand {
  command: 'search';
  files: string[];
  query: QueryOptions;
  lineNumbers: boolean;
  count: boolean;
}

export interface VerifyCommand {
  command: 'verify';
  files: string[];
  asserts: string[];
  whitelist?: string;
  gen: boolean;
  out?: string;
}

export type RcqueryCommand = PrintCommand | SearchCommand | VerifyCommand;

export type RcqueryCliParseResult =
  | { kind: 'help'; message: string; exitCode: 0 }
  | { kind: 'version'; exitCode: 0 }
  | { kind: 'error'; message: string; exitCode: 2 }
  | { kind: 'run'; config: RcqueryCommand };

interface OptionToken {
  name: string;
  inline?: string;
}

/**
 * Splits argv into options and positional files. `--name=value` and
 * `--name value` are both accepted; everything after `--` is a file.
 */
class ArgCursor {
  readonly files: string[] = [];
  private readonly pending: string[];

  constructor(argv: readonly string[]) {
    this.pending = [...argv];
  }

  next(): OptionToken | undefined {
    while (this.pending.length > 0) {
      const token = this.pending.shift() ?? '';
      if (token === '--') {
        this.files.push(...this.pending.splice(0));
        return undefined;
      }
      if (!token.startsWith('--')) {
        this.files.push(token);
        continue;
      }
      const eq = token.indexOf('=');
      return eq === -1 ? { name: token.slice(2) } : { name: token.slice(2, eq), inline: token.slice(eq + 1) };
    }
    return undefined;
  }

  value(option: OptionToken): string | undefined {
    if (option.inline !== undefined) return option.inline;
    const value = this.pending[0];
    if (value === undefined || value === '--') return undefined;
    this.pending.shift();
    return value;
  }
}

export function parseRcqueryArgs(argv: string[]): RcqueryCliParseResult {
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    return { kind: 'help', message: rcqueryUsage(), exitCode: 0 };
  }
  if (command === '--version') return { kind: 'version', exitCode: 0 };
  if (rest.includes('--help') || rest.includes('-h')) {
    return { kind: 'help', message: rcqueryUsage(), exitCode: 0 };
  }

  switch (command) {
    case 'print':
      return parsePrint(rest);
    case 'search':
      return parseSearch(rest);
    case 'verify':
      return parseVerify(rest);
    default:
      return usageError(`Unknown command: ${command}`);
  }
}

function parsePrint(argv: string[]): RcqueryCliParseResult {
  const cursor = new ArgCursor(argv);
  let lineNumbers = false;
  for (let option = cursor.next(); option; option = cursor.next()) {
    if (option.name === 'lineno' && option.inline === undefined) {
      lineNumbers = true;
      continue;
    }
    return usageError(`Unknown option for print: --${option.name}`);
  }
  if (cursor.files.length === 0) return usageError('Missing input files');
  return { kind: 'run', config: { command: 'print', files: cursor.files, lineNumbers } };
}

function parseSearch(argv: string[]): RcqueryCliParseResult {
  const section = findSection(argv);
  if (!section.ok) return usageError(section.error);
  const kind = section.value;

  const match: Record<string, string[]> = {};
  const exclude: Record<string, string[]> = {};
  const flags: Record<string, boolean[]> = {};
  const toggles = { strict: false, tidy: false, lineno: false, count: false };

  const cursor = new ArgCursor(argv);
  for (let option = cursor.next(); option; option = cursor.next()) {
    const { name } = option;

    if (name === 'section') {
      cursor.value(option);
      continue;
    }
    if (name === 'strict' || name === 'tidy' || name === 'lineno' || name === 'count') {
      if (option.inline !== undefined) return usageError(`--${name} takes no value`);
      toggles[name] = true;
      continue;
    }

    const target = resolveKeywordOption(kind, name);
    if (!target) return usageError(`Unknown option for ${kind} sections: --${name}`);

    if (target.boolean) {
      if (option.inline !== undefined) return usageError(`--${name} takes no value`);
      (flags[target.keyword] ??= []).push(!target.negated);
      continue;
    }

    const value = cursor.value(option);
    if (value === undefined) return usageError(`Missing value for --${name}`);
    const bucket = target.negated ? exclude : match;
    (bucket[target.keyword] ??= []).push(value);
  }

  if (cursor.files.length === 0) return usageError('Missing input files');

  return {
    kind: 'run',
    config: {
      command: 'search',
      files: cursor.files,
      query: { section: kind, strict: toggles.strict, tidy: toggles.tidy, match, exclude, flags },
      lineNumbers: toggles.lineno,
      count: toggles.count
    }
  };
}

function parseVerify(argv: string[]): RcqueryCliParseResult {
  const cursor = new ArgCursor(argv);
  const asserts: string[] = [];
  let whitelist: string | undefined;
  let out: string | undefined;
  let gen = false;

  for (let option = cursor.next(); option; option = cursor.next()) {
    switch (option.name) {
      case 'gen':
        if (option.inline !== undefined) return usageError('--gen takes no value');
        gen = true;
        break;
      case 'assert':
      case 'whitelist':
      case 'out': {
        const value = cursor.value(option);
        if (value === undefined) return usageError(`Missing value for --${option.name}`);
        if (option.name === 'assert') asserts.push(value);
        else if (option.name === 'whitelist') whitelist = value;
        else out = value;
        break;
      }
      default:
        return usageError(`Unknown option for verify: --${option.name}`);
    }
  }

  if (asserts.length === 0) return usageError('Missing required: --assert');
  if (out !== undefined && !gen) return usageError('--out is only valid with --gen');
  if (cursor.files.length === 0) return usageError('Missing input files');

  return { kind: 'run', config: { command: 'verify', files: cursor.files, asserts, whitelist, gen, out } };
}

function findSection(argv: string[]): { ok: true; value: SectionKind } | { ok: false; error: string } {
  const cursor = new ArgCursor(argv);
  let raw: string | undefined;
  for (let option = cursor.next(); option; option = cursor.next()) {
    if (option.name !== 'section') {
      // Skip this option's value, if it has one, so it is not read as a file.
      if (option.inline === undefined && takesValue(option.name)) cursor.value(option);
      continue;
    }
    raw = cursor.value(option);
  }
  if (raw === undefined) return { ok: false, error: 'Missing required: --section' };
  if (!isSectionKind(raw)) {
    return { ok: false, error: `Invalid --section: ${raw} (expected ${SECTION_KINDS.join('|')})` };
  }
  return { ok: true, value: raw };
}

// Before --section is known, assume any keyword-looking option carries a pattern
// unless it is boolean in every section kind that defines it.
function takesValue(name: string): boolean {
  if (name === 'strict' || name === 'tidy' || name === 'lineno' || name === 'count') return false;
  const keyword = name.startsWith('not') && !isKnownKeyword(name) ? name.slice(3) : name;
  return !SECTION_KINDS.some((kind) => keywordShape(kind, keyword)?.type === 'boolean');
}

function isKnownKeyword(name: string): boolean {
  return SECTION_KINDS.some((kind) => keywordShape(kind, name) !== undefined);
}

function resolveKeywordOption(
  kind: SectionKind,
  name: string
): { keyword: string; negated: boolean; boolean: boolean } | undefined {
  const direct = keywordShape(kind, name);
  if (direct) return { keyword: name, negated: false, boolean: direct.type === 'boolean' };
  if (!name.startsWith('not')) return undefined;
  const keyword = name.slice(3);
  const negated = keywordShape(kind, keyword);
  if (!negated) return undefined;
  return { keyword, negated: true, boolean: negated.type === 'boolean' };
}

function usageError(message: string): RcqueryCliParseResult {
  return { kind: 'error', message: `${message}\n\n${rcqueryUsage()}`, exitCode: 2 };
}

function keywordHelp(kind: SectionKind): string {
  const options = keywordNames(kind).map((name) => {
    const shape = keywordShape(kind, name);
    if (shape?.type === 'boolean') return `--${name} | --not${name}`;
    if (name === ARGS_KEYWORD) return `--${name} <re> | --not${name} <re>`;
    return `--${name} <${shape?.type === 'number' ? 'expr' : 're'}> | --not${name} <…>`;
  });
  return `  ${kind}: ${options.join(', ')}`;
}

export function rcqueryUsage(): string {
  return [
    'rcquery',
    '',
    'Usage:',
    '  rcquery print <files...> [--lineno]',
    '  rcquery search <files...> --section <on|service|import> [options] [keyword options]',
    '  rcquery verify <files...> --assert <suite.json>... [--whitelist <file>] [--gen [--out <file>]]',
    '',
    'Search options:',
    '  --strict                 Match patterns against the whole value (default: anywhere in it)',
    '  --tidy                   Print only the lines that matched',
    '  --lineno                 Print line numbers',
    '  --count                  Print the number of matching sections',
    '',
    'Keyword options (repeat a pattern option to require every pattern):',
    ...SECTION_KINDS.map(keywordHelp),
    '',
    'Number expressions: N, ==N, !=N, <N, <=N, >N, >=N, or a range a,b',
    '',
    'Verify options:',
    '  --assert <file>          Assert suite (JSON); repeatable',
    '  --whitelist <file>       Accepted matches to ignore',
    '  --gen                    Emit every current match as a whitelist',
    '  --out <file>             Write the generated whitelist to a file (default: stdout)',
    '',
    'Environment:',
    '  RCQUERY_LOG_LEVEL        debug|info|warn|error (default: warn)',
    ''
  ].join('\n');
}
