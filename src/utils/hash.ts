/**
 * Hashing utilities for report content verification
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = canonicalize(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * Key-order independent hash of a JSON-serializable value.
 */
export function contentHash(value: unknown): string {
  return sha256(JSON.stringify(canonicalize(value)));
}
