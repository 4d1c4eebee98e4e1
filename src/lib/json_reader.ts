import { fromByteArray, toByteArray } from 'base64-js';
import { AmbiguousSumTagError, MalformedMessageError } from './errors';
import {
  fragmentOf,
  isJsonObject,
  parseJson,
  stringifyJson,
  type JsonObject,
  type JsonValue,
} from './json';

const U32_MAX = 0xffff_ffff;

/**
 * A cursor over a parsed JSON document that remembers where it is, so that
 * every shape error names the path of the offending value
 * (e.g. `$.SubscribeApplied.query_id.id`).
 */
export class JsonReader {
  readonly value: JsonValue;
  readonly path: string;

  constructor(value: JsonValue, path: string = '$') {
    this.value = value;
    this.path = path;
  }

  static parse(text: string): JsonReader {
    return new JsonReader(parseJson(text));
  }

  #error(expected: string): MalformedMessageError {
    return new MalformedMessageError(
      this.path,
      expected,
      fragmentOf(stringifyJson(this.value))
    );
  }

  asObject(): JsonObject {
    if (!isJsonObject(this.value)) throw this.#error('an object');
    return this.value;
  }

  keys(): string[] {
    return Object.keys(this.asObject());
  }

  /** A required field. A missing field is a shape error. */
  field(name: string): JsonReader {
    const obj = this.asObject();
    if (!Object.prototype.hasOwnProperty.call(obj, name)) {
      throw new MalformedMessageError(`${this.path}.${name}`, 'a value', 'nothing');
    }
    return new JsonReader(obj[name], `${this.path}.${name}`);
  }

  /** A field that may be missing or `null`. */
  optionalField(name: string): JsonReader | undefined {
    const obj = this.asObject();
    const value = obj[name];
    if (value === undefined || value === null) return undefined;
    return new JsonReader(value, `${this.path}.${name}`);
  }

  asArray(): JsonReader[] {
    const value = this.value;
    if (!Array.isArray(value)) throw this.#error('an array');
    return value.map((item, i) => new JsonReader(item, `${this.path}[${i}]`));
  }

  asString(): string {
    if (typeof this.value !== 'string') throw this.#error('a string');
    return this.value;
  }

  asBool(): boolean {
    if (typeof this.value !== 'boolean') throw this.#error('a boolean');
    return this.value;
  }

  asNumber(): number {
    if (typeof this.value !== 'number') throw this.#error('a number');
    return this.value;
  }

  asU8(): number {
    const n = this.asNumber();
    if (!Number.isInteger(n) || n < 0 || n > 0xff) throw this.#error('a u8');
    return n;
  }

  asU32(): number {
    const n = this.asNumber();
    if (!Number.isInteger(n) || n < 0 || n > U32_MAX) throw this.#error('a u32');
    return n;
  }

  /**
   * A 64-bit (or wider) integer. Accepts an integral JSON number or a decimal
   * string, since writers differ on how they put large integers on the wire.
   */
  asBigInt(): bigint {
    const value = this.value;
    if (typeof value === 'number' && Number.isInteger(value)) {
      return BigInt(value);
    }
    if (typeof value === 'bigint') return value;
    if (typeof value === 'string' && /^-?\d+$/.test(value)) {
      return BigInt(value);
    }
    throw this.#error('an integer');
  }

  asU64(): bigint {
    const n = this.asBigInt();
    if (n < 0n || n > 0xffff_ffff_ffff_ffffn) throw this.#error('a u64');
    return n;
  }

  /**
   * Bytes are base64 on the JSON wire; an array of u8 is accepted too.
   */
  asBytes(): Uint8Array {
    const value = this.value;
    if (typeof value === 'string') {
      try {
        return toByteArray(value);
      } catch {
        throw this.#error('base64 bytes');
      }
    }
    if (Array.isArray(value)) {
      return Uint8Array.from(this.asArray().map(r => r.asU8()));
    }
    throw this.#error('bytes');
  }

  /**
   * Split a single-key object into its tag and payload. This is how every
   * sum-shaped value is written on the wire.
   */
  asTagged(): [tag: string, payload: JsonReader] {
    const obj = this.asObject();
    const keys = Object.keys(obj);
    if (keys.length !== 1) {
      throw new AmbiguousSumTagError(keys, this.path);
    }
    const tag = keys[0];
    return [tag, new JsonReader(obj[tag], `${this.path}.${tag}`)];
  }

  /**
   * An optional value, written either bare (with `null` for none) or as an
   * option sum `{"some": x}` / `{"none": []}`.
   */
  asOption<T>(read: (reader: JsonReader) => T): T | undefined {
    const value = this.value;
    if (value === null) return undefined;
    if (isJsonObject(value)) {
      const keys = Object.keys(value);
      if (keys.length === 1 && keys[0] === 'none') return undefined;
      if (keys.length === 1 && keys[0] === 'some') {
        return read(new JsonReader(value.some, `${this.path}.some`));
      }
    }
    return read(this);
  }
}

export function bytesToBase64(bytes: Uint8Array): string {
  return fromByteArray(bytes);
}
