import { createHash } from 'node:crypto';

// Deterministic JSON: whitelist identity keys and assert suite fingerprints
// compare these strings, so key order must never leak through.

export function canonicalizeJson(value: unknown): string {
  return serialize(value);
}

/** `sha256:<hex>` of the canonical form of `value`. */
export function canonicalDigest(value: unknown): string {
  const hash = createHash('sha256');
  hash.update(canonicalizeJson(value));
  return `sha256:${hash.digest('hex')}`;
}

function serialize(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError('Cannot canonicalize non-finite number');
    }
    // JSON.stringify handles -0 as 0.
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'bigint') {
    throw new TypeError('Cannot canonicalize bigint');
  }
  if (Array.isArray(value)) {
    return `[${value.map(serialize).join(',')}]`;
  }
  if (typeof value === 'object') {
    const parts: string[] = [];
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (entry === undefined || typeof entry === 'function' || typeof entry === 'symbol') continue;
      parts.push(`${JSON.stringify(key)}:${serialize(entry)}`);
    }
    return `{${parts.join(',')}}`;
  }
  // undefined, function, symbol are not valid JSON.
  return 'null';
}
