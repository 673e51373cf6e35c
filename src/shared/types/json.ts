/**
 * JSON Value Types
 *
 * Tagged variant for dynamic JSON payloads (server error bodies, job metadata).
 * Decoded values never fall back to an untyped container.
 */

export type JsonValue =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'array'; items: JsonValue[] }
  | { kind: 'object'; entries: Record<string, JsonValue> };

export type JsonKind = JsonValue['kind'];

/** Plain JS shape a JsonValue converts back into */
export type PlainJson =
  | null
  | boolean
  | number
  | string
  | PlainJson[]
  | { [key: string]: PlainJson };
