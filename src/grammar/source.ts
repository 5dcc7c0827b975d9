import { readFile } from 'node:fs/promises';
import { RcqueryError } from '../core/errors.js';
import type { SourceFile } from '../core/types.js';

export function sourceFileFromText(path: string, text: string): SourceFile {
  // A byte-order mark would read as indentation on the first line.
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const lines = body.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  // A trailing newline does not open another line.
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return Object.freeze({ path, lines: Object.freeze(lines) });
}

export async function readSourceFile(path: string): Promise<SourceFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new RcqueryError({ code: 'IO_ERROR', message: `Unable to read file: ${detail}`, file: path, raw: error });
  }
  return sourceFileFromText(path, text);
}
