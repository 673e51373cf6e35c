/**
 * JSON Value Utilities
 *
 * Decode untyped parser output into the JsonValue variant and read it back.
 */

import type { JsonValue, PlainJson } from '../types/json';

/**
 * Decode an unknown value. Returns null for anything JSON cannot represent
 * (undefined, functions, symbols, bigint, non-finite numbers, cycles).
 */
export function toJsonValue(input: unknown): JsonValue | null {
  return decode(input, new Set());
}

function decode(input: unknown, seen: Set<object>): JsonValue | null {
  if (input === null) return { kind: 'null' };

  if (typeof input === 'boolean') return { kind: 'bool', value: input };
  if (typeof input === 'number') {
    return Number.isFinite(input) ? { kind: 'number', value: input } : null;
  }
  if (typeof input === 'string') return { kind: 'string', value: input };
  if (typeof input !== 'object') return null;

  if (seen.has(input)) return null;
  seen.add(input);

  try {
    if (Array.isArray(input)) {
      const items: JsonValue[] = [];
      for (const item of input) {
        const decoded = decode(item, seen);
        if (!decoded) return null;
        items.push(decoded);
      }
      return { kind: 'array', items };
    }

    // fromEntries defines own properties, so a "__proto__" key survives
    const pairs: [string, JsonValue][] = [];
    for (const [key, value] of Object.entries(input)) {
      const decoded = decode(value, seen);
      if (!decoded) return null;
      pairs.push([key, decoded]);
    }
    return { kind: 'object', entries: Object.fromEntries(pairs) };
  } finally {
    seen.delete(input);
  }
}

/**
 * Parse JSON text into a JsonValue (null if the text is not valid JSON)
 */
export function parseJsonValue(text: string): JsonValue | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return toJsonValue(parsed);
}

/**
 * Convert a JsonValue back into plain JS values
 */
export function fromJsonValue(value: JsonValue): PlainJson {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map(fromJsonValue);
    case 'object':
      return Object.fromEntries(
        Object.entries(value.entries).map(([key, entry]): [string, PlainJson] => [
          key,
          fromJsonValue(entry),
        ])
      );
  }
}

/**
 * Read a string field from a JSON object value
 */
export function getStringField(value: JsonValue | null, field: string): string | null {
  if (value?.kind !== 'object') return null;
  if (!Object.hasOwn(value.entries, field)) return null;
  const entry = value.entries[field];
  return entry?.kind === 'string' ? entry.value : null;
}
