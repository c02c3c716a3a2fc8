import crypto from 'crypto';
import type { JsonValue } from '../types.js';

/**
 * Canonical JSON stringifier with deterministic key ordering.
 *
 * - Recursively sort object keys
 * - Preserve array order
 * - Drop undefined members
 * - No whitespace variation
 */
export function canonicalStringify(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return 'null';

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    const items = value.map(item => canonicalStringify(item));
    return `[${items.join(',')}]`;
  }

  const pairs = Object.keys(value)
    .sort()
    .filter(key => value[key] !== undefined)
    .map(key => `${JSON.stringify(key)}:${canonicalStringify(value[key])}`);
  return `{${pairs.join(',')}}`;
}

export function sha256Hex(text: string): string {
  return crypto
    .createHash('sha256')
    .update(text, 'utf8')
    .digest('hex');
}

/**
 * Digest of the canonical form of a keyed structure.
 */
export function hashValue(value: JsonValue): string {
  return sha256Hex(canonicalStringify(value));
}
