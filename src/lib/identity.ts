import { MalformedMessageError } from './errors';
import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';
import { bigIntToHexString, hexStringToBigInt } from './util';

const IDENTITY_BYTES = 32;

/**
 * A unique identifier for a user connected to a database.
 *
 * On the JSON wire it is `{"__identity__": "0x…"}`, a 256-bit integer in hex.
 */
export class Identity {
  __identity__: bigint;

  /**
   * Creates a new `Identity`.
   *
   * `data` can be a hexadecimal string or a `bigint`.
   */
  constructor(data: string | bigint) {
    this.__identity__ =
      typeof data === 'string' ? hexStringToBigInt(data, IDENTITY_BYTES) : data;
  }

  static fromJson(json: JsonValue): Identity {
    return Identity.fromReader(new JsonReader(json));
  }

  static fromReader(reader: JsonReader): Identity {
    const field = reader.field('__identity__');
    if (typeof field.value === 'string') {
      try {
        return new Identity(field.value);
      } catch {
        throw new MalformedMessageError(field.path, 'a hex identity', field.value);
      }
    }
    return new Identity(field.asBigInt());
  }

  toJson(): JsonObject {
    return { __identity__: `0x${this.toHexString()}` };
  }

  /**
   * Compare two identities for equality.
   */
  isEqual(other: Identity): boolean {
    return this.__identity__ === other.__identity__;
  }

  /**
   * Print the identity as a hexadecimal string.
   */
  toHexString(): string {
    return bigIntToHexString(this.__identity__, IDENTITY_BYTES);
  }

  /**
   * Parse an Identity from a hexadecimal string.
   */
  static fromString(str: string): Identity {
    return new Identity(str);
  }

  /**
   * Zero identity (0x0000000000000000000000000000000000000000000000000000000000000000)
   */
  static zero(): Identity {
    return new Identity(0n);
  }

  toString(): string {
    return this.toHexString();
  }
}
