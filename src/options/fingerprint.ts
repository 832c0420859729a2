/**
 * Value fingerprint of an options record.
 *
 * Workers rebuild the record from the same inputs as the main process; the
 * fingerprint lets both sides confirm they hold value-equivalent records. It
 * is not a persistence format and carries no version.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import { FrozenMap, FrozenSet } from '../utils/frozen-collections.js';
import type { Options } from './types.js';

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Converts a value to a JSON-safe structure whose serialisation does not
 * depend on insertion order of maps, sets or object keys. Arrays keep their
 * order, since pattern lists are order-sensitive.
 */
function toCanonical(value: unknown): Canonical {
  if (value === undefined) {
    return { $undefined: true };
  }
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : { $number: String(value) };
  }
  if (value instanceof RegExp) {
    return { $regexp: `/${value.source}/${value.flags}` };
  }
  if (value instanceof FrozenMap) {
    const entries: [string, Canonical][] = [];
    for (const [key, item] of value) {
      entries.push([String(key), toCanonical(item)]);
    }
    entries.sort(([a], [b]) => compareKeys(a, b));
    return { $map: entries };
  }
  if (value instanceof FrozenSet) {
    const members: string[] = [];
    for (const member of value) {
      members.push(String(member));
    }
    members.sort(compareKeys);
    return { $set: members };
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toCanonical(item));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort(compareKeys)) {
      result[key] = toCanonical(Reflect.get(value, key));
    }
    return result;
  }
  return String(value);
}

/**
 * Encodes a record canonically. Exposed for diagnostics when two
 * fingerprints differ.
 */
export function canonicalEncoding(options: Options): string {
  return JSON.stringify(toCanonical(options));
}

/**
 * Computes the SHA-256 hex digest of the canonical encoding.
 *
 * @example
 * ```typescript
 * const main = optionsFingerprint(options);
 * // in a worker, after rebuilding from the same input:
 * if (optionsFingerprint(workerOptions) !== main) {
 *   throw new Error('worker options diverged');
 * }
 * ```
 */
export function optionsFingerprint(options: Options): string {
  return createHash('sha256').update(canonicalEncoding(options), 'utf8').digest('hex');
}
