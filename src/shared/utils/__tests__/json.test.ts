/**
 * JSON Value Utility Tests
 */

import { fromJsonValue, getStringField, parseJsonValue, toJsonValue } from '../json';

describe('JSON value utilities', () => {
  describe('toJsonValue', () => {
    it('should tag scalars', () => {
      expect(toJsonValue(null)).toEqual({ kind: 'null' });
      expect(toJsonValue(true)).toEqual({ kind: 'bool', value: true });
      expect(toJsonValue(42.5)).toEqual({ kind: 'number', value: 42.5 });
      expect(toJsonValue('hello')).toEqual({ kind: 'string', value: 'hello' });
    });

    it('should decode nested arrays and objects', () => {
      expect(toJsonValue({ detail: 'Invalid credentials', codes: [1, null] })).toEqual({
        kind: 'object',
        entries: {
          detail: { kind: 'string', value: 'Invalid credentials' },
          codes: {
            kind: 'array',
            items: [{ kind: 'number', value: 1 }, { kind: 'null' }],
          },
        },
      });
    });

    it('should reject values JSON cannot represent', () => {
      expect(toJsonValue(undefined)).toBeNull();
      expect(toJsonValue(Number.NaN)).toBeNull();
      expect(toJsonValue(Infinity)).toBeNull();
      expect(toJsonValue(() => 1)).toBeNull();
      expect(toJsonValue({ nested: { value: BigInt(1) } })).toBeNull();
    });

    it('should reject cycles but accept repeated references', () => {
      const cyclic: { self?: unknown } = {};
      cyclic.self = cyclic;
      expect(toJsonValue(cyclic)).toBeNull();

      const shared = { id: 'a' };
      const value = toJsonValue([shared, shared]);
      expect(value?.kind).toBe('array');
    });
  });

  describe('parseJsonValue', () => {
    it('should return null for invalid JSON', () => {
      expect(parseJsonValue('<html>502 Bad Gateway</html>')).toBeNull();
      expect(parseJsonValue('')).toBeNull();
    });

    it('should parse valid JSON text', () => {
      expect(parseJsonValue('["a"]')).toEqual({
        kind: 'array',
        items: [{ kind: 'string', value: 'a' }],
      });
    });
  });

  describe('fromJsonValue', () => {
    it('should convert back to plain values', () => {
      const plain = { user: { id: 'u1', verified: false }, scores: [1, 2], note: null };
      const value = toJsonValue(plain);
      expect(value).not.toBeNull();
      if (value) expect(fromJsonValue(value)).toEqual(plain);
    });

    it('should keep a "__proto__" key as an ordinary field', () => {
      const value = parseJsonValue('{"__proto__":{"a":1},"b":2}');
      expect(value?.kind === 'object' && Object.keys(value.entries)).toEqual(['__proto__', 'b']);
      if (!value) return;

      const plain = fromJsonValue(value);

      expect(JSON.stringify(plain)).toBe('{"__proto__":{"a":1},"b":2}');
      expect(plain !== null && typeof plain === 'object' && Object.keys(plain)).toEqual([
        '__proto__',
        'b',
      ]);
      expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
    });
  });

  describe('getStringField', () => {
    it('should read a string field from an object', () => {
      expect(getStringField(parseJsonValue('{"detail":"Email already registered"}'), 'detail')).toBe(
        'Email already registered'
      );
    });

    it('should return null for missing, non-string or non-object input', () => {
      expect(getStringField(parseJsonValue('{"message":"x"}'), 'detail')).toBeNull();
      expect(getStringField(parseJsonValue('{"detail":[{"msg":"bad"}]}'), 'detail')).toBeNull();
      expect(getStringField(parseJsonValue('"detail"'), 'detail')).toBeNull();
      expect(getStringField(null, 'detail')).toBeNull();
    });

    it('should ignore inherited properties', () => {
      expect(getStringField(parseJsonValue('{}'), 'toString')).toBeNull();
    });
  });
});
