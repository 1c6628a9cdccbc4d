import { createHash } from 'node:crypto';

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * JSON encoding with object keys sorted at every level, so equal values always encode to the
 * same bytes. `undefined` members are dropped, which makes `{ a: undefined }` equal to `{}`.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(stableClone(value)) ?? 'null';
}

function stableClone(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(stableClone);
  if (typeof value !== 'object') return value;
  const out: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [k, v] of entries) out[k] = stableClone(v);
  return out;
}

export function hashValue(value: unknown): string {
  return sha256(stableStringify(value));
}
