import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

export function resolveRcqueryPackageRoot(): string {
  const start = path.dirname(fileURLToPath(import.meta.url));
  let dir = start;
  while (true) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}

/** Version from `package.json`; `'unknown'` when it cannot be read. */
export async function readRcqueryPackageVersion(root: string = resolveRcqueryPackageRoot()): Promise<string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path.join(root, 'package.json'), 'utf8'));
  } catch {
    return 'unknown';
  }
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return 'unknown';
}
