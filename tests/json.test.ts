import { describe, expect, test } from 'vitest';
import {
  AmbiguousSumTagError,
  MalformedJsonError,
  MalformedMessageError,
} from '../src/lib/errors';
import { fragmentOf, parseJson, stringifyJson } from '../src/lib/json';
import { bytesToBase64, JsonReader } from '../src/lib/json_reader';

describe('stringifyJson', () => {
  test('writes bigints as integer literals', () => {
    expect(stringifyJson({ quanta: 18446744073709551615n })).toBe(
      '{"quanta":18446744073709551615}'
    );
  });

  test('keeps key insertion order and nests arrays', () => {
    expect(stringifyJson({ b: [true, null, 'x'], a: 1.5 })).toBe(
      '{"b":[true,null,"x"],"a":1.5}'
    );
  });

  test('rejects non-finite numbers', () => {
    expect(() => stringifyJson(Number.NaN)).toThrow(RangeError);
  });
});

describe('parseJson', () => {
  test('parses valid text', () => {
    expect(parseJson('{"a":[1,"b"]}')).toEqual({ a: [1, 'b'] });
  });

  test('turns syntax errors into MalformedJsonError carrying the text', () => {
    try {
      parseJson('{"a":');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedJsonError);
      if (e instanceof MalformedJsonError) {
        expect(e.fragment).toBe('{"a":');
        expect(e.name).toBe('MalformedJsonError');
      }
    }
  });

  test('long fragments are cut', () => {
    const text = 'x'.repeat(200);
    expect(fragmentOf(text)).toBe(`${'x'.repeat(120)}…`);
    expect(fragmentOf('short')).toBe('short');
  });
});

describe('JsonReader', () => {
  test('shape errors name the path of the value', () => {
    const reader = new JsonReader({ a: { b: 'x' } });
    expect(() => reader.field('a').field('b').asNumber()).toThrow(
      new MalformedMessageError('$.a.b', 'a number', '"x"')
    );
    expect(() => reader.field('a').field('b').asNumber()).toThrow(
      'Expected a number at $.a.b, got "x"'
    );
  });

  test('missing required fields are shape errors', () => {
    const reader = new JsonReader({ a: {} });
    expect(() => reader.field('a').field('c')).toThrow(
      'Expected a value at $.a.c, got nothing'
    );
  });

  test('optional fields may be missing or null', () => {
    const reader = new JsonReader({ a: null });
    expect(reader.optionalField('a')).toBeUndefined();
    expect(reader.optionalField('b')).toBeUndefined();
  });

  test('array items carry their index in the path', () => {
    const items = new JsonReader([1, 'two']).asArray();
    expect(items.map(i => i.path)).toEqual(['$[0]', '$[1]']);
    expect(() => items[1].asU32()).toThrow('Expected a number at $[1], got "two"');
  });

  test('asU32 rejects fractions and out-of-range numbers', () => {
    expect(new JsonReader(4294967295).asU32()).toBe(4294967295);
    expect(() => new JsonReader(4294967296).asU32()).toThrow(
      'Expected a u32 at $, got 4294967296'
    );
    expect(() => new JsonReader(1.5).asU32()).toThrow('Expected a u32 at $, got 1.5');
  });

  test('asBigInt accepts numbers and decimal strings', () => {
    expect(new JsonReader(42).asBigInt()).toBe(42n);
    expect(new JsonReader('12345678901234567890').asBigInt()).toBe(
      12345678901234567890n
    );
    expect(() => new JsonReader('12x').asBigInt()).toThrow(
      'Expected an integer at $, got "12x"'
    );
  });

  test('asU64 rejects negative values', () => {
    expect(() => new JsonReader(-1).asU64()).toThrow('Expected a u64 at $, got -1');
  });

  test('bytes are read from base64 or a u8 array', () => {
    expect(new JsonReader('AQID').asBytes()).toEqual(new Uint8Array([1, 2, 3]));
    expect(new JsonReader([1, 2, 3]).asBytes()).toEqual(new Uint8Array([1, 2, 3]));
    expect(bytesToBase64(new Uint8Array([1, 2, 3]))).toBe('AQID');
  });

  test('asTagged splits a single-key object', () => {
    const [tag, payload] = new JsonReader({ Failed: 'boom' }).asTagged();
    expect(tag).toBe('Failed');
    expect(payload.path).toBe('$.Failed');
    expect(payload.asString()).toBe('boom');
  });

  test('asTagged rejects zero or several keys', () => {
    expect(() => new JsonReader({ a: 1, b: 2 }).asTagged()).toThrow(
      new AmbiguousSumTagError(['a', 'b'])
    );
    expect(() => new JsonReader({ a: 1, b: 2 }).asTagged()).toThrow(
      'Sum value at $ must have exactly one tag, found 2: a, b'
    );
    expect(() => new JsonReader({}).asTagged()).toThrow(
      'Sum value at $ must have exactly one tag, found 0'
    );
  });

  test('asOption reads option sums, null and bare values', () => {
    const readNumber = (r: JsonReader) => r.asNumber();
    expect(new JsonReader({ none: [] }).asOption(readNumber)).toBeUndefined();
    expect(new JsonReader({ some: 5 }).asOption(readNumber)).toBe(5);
    expect(new JsonReader(null).asOption(readNumber)).toBeUndefined();
    expect(new JsonReader(7).asOption(readNumber)).toBe(7);
  });
});
