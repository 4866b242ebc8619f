import { createHash } from 'node:crypto';

/**
 * Compute SHA-256 hex hash of a string.
 */
export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf-8').digest('hex');
}

/**
 * Canonicalize a JSON-serializable value to a deterministic string.
 * Keys are sorted recursively; no whitespace.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}
