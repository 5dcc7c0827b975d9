import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { canonicalizeJson } from '../core/canonicalize.js';
import { RcqueryError, SpecFormatError } from '../core/errors.js';
import type { SectionMatch, WhitelistEntry } from '../core/types.js';

export const WHITELIST_VERSION = 1;

const entrySchema = z.object({
  test: z.string().min(1),
  file: z.string().min(1),
  section: z.number().int().positive(),
  keyword: z.string().min(1),
  line: z.number().int().positive().nullable()
});

const documentSchema = z.object({
  version: z.literal(WHITELIST_VERSION),
  suite: z.string().optional(),
  entries: z.array(entrySchema)
});

export type WhitelistDocument = z.infer<typeof documentSchema>;

/** Read-only set of accepted identity units. */
export class Whitelist {
  private readonly keys: ReadonlySet<string>;

  constructor(
    readonly entries: readonly WhitelistEntry[],
    readonly suite?: string
  ) {
    this.keys = new Set(entries.map(whitelistKey));
  }

  get size(): number {
    return this.keys.size;
  }

  has(entry: WhitelistEntry): boolean {
    return this.keys.has(whitelistKey(entry));
  }
}

export function emptyWhitelist(): Whitelist {
  return new Whitelist([]);
}

export function whitelistKey(entry: WhitelistEntry): string {
  return canonicalizeJson({
    test: entry.test,
    file: entry.file,
    section: entry.section,
    keyword: entry.keyword,
    line: entry.line
  });
}

/**
 * Identity units of a match for one test: one per matched line, the header
 * included. A defaulted line has no line number and is keyed with `null`.
 */
export function identityUnits(test: string, match: SectionMatch): WhitelistEntry[] {
  return match.matchedLines.map((line) => ({
    test,
    file: match.section.source.path,
    section: match.section.headerLine,
    keyword: line.keyword,
    line: line.lineNumber ?? null
  }));
}

export function parseWhitelist(text: string, origin?: string): Whitelist {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SpecFormatError({ message: `Whitelist is not valid JSON: ${detail}`, file: origin, raw: error });
  }
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `/${issue.path.join('/')} ${issue.message}`);
    throw new SpecFormatError({ message: `Malformed whitelist: ${issues.join('; ')}`, file: origin });
  }
  return new Whitelist(parsed.data.entries, parsed.data.suite);
}

export async function readWhitelist(path: string): Promise<Whitelist> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new RcqueryError({ code: 'IO_ERROR', message: `Unable to read file: ${detail}`, file: path, raw: error });
  }
  return parseWhitelist(text, path);
}

export function serializeWhitelist(document: WhitelistDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
