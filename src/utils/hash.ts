/**
 * Hashing utilities for scan ids and cache keys
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function sha256Short(input: string, length: number = 12): string {
  return sha256(input).substring(0, length);
}

/**
 * JSON encoding with object keys sorted at every depth, so equal values
 * always hash the same.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function hashObjectShort(obj: unknown, length: number = 12): string {
  return sha256Short(stableStringify(obj), length);
}
