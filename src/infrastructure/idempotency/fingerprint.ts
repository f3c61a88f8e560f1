import { createHash } from 'node:crypto';
import type { IMessage } from '../../domain/messages';

/**
 * Fields that identify a request rather than describe it.
 */
const EXCLUDED_FIELDS = new Set(['metadata', 'idempotencyKey', 'idempotencyTtl', '__resultType']);

/**
 * Deterministic JSON: object keys sorted, `undefined` and functions
 * dropped, dates as ISO strings, bigints as decimal strings.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value, new WeakSet())) ?? 'null';
}

/**
 * SHA-256 (hex) of the canonical JSON of a message's own fields.
 */
export function fingerprintMessage(message: IMessage): string {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(message)) {
    if (!EXCLUDED_FIELDS.has(key)) {
      fields[key] = value;
    }
  }
  return createHash('sha256').update(canonicalJson(fields)).digest('hex');
}

function normalize(value: unknown, seen: WeakSet<object>): unknown {
  switch (typeof value) {
    case 'bigint':
      return value.toString();
    case 'function':
    case 'symbol':
    case 'undefined':
      return undefined;
    case 'object':
      break;
    default:
      return value;
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (seen.has(value)) {
    throw new TypeError('Cannot fingerprint a circular structure');
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => normalize(item, seen) ?? null);
    }
    if (value instanceof Map) {
      return normalize(Object.fromEntries(value), seen);
    }
    if (value instanceof Set) {
      return normalize([...value], seen);
    }

    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      const normalized = normalize(entry, seen);
      if (normalized !== undefined) {
        out[key] = normalized;
      }
    }
    return out;
  } finally {
    seen.delete(value);
  }
}
