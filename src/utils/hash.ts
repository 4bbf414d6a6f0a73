/**
 * Deterministic serialisation and content hashing.
 */

import { createHash } from 'node:crypto';

/**
 * JSON with object keys in insertion order and no whitespace. Arrays keep
 * their order. Undefined members are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value) ?? 'null';
}

export function contentHash(...parts: unknown[]): string {
  return createHash('sha256').update(canonicalJson(parts)).digest('hex');
}
