import { MalformedMessageError } from './errors';
import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';
import { bigIntToHexString, hexStringToBigInt } from './util';

const CONNECTION_ID_BYTES = 16;

/**
 * A unique identifier for a client connected to a database.
 */
export class ConnectionId {
  __connection_id__: bigint;

  /**
   * Creates a new `ConnectionId`.
   */
  constructor(data: bigint) {
    this.__connection_id__ = data;
  }

  /**
   * Reads `{"__connection_id__": n}`. The server writes the 128-bit value as
   * a number; a decimal or `0x` hex string is accepted as well.
   */
  static fromReader(reader: JsonReader): ConnectionId {
    const field = reader.field('__connection_id__');
    const value = field.value;
    if (typeof value === 'string' && value.startsWith('0x')) {
      try {
        return ConnectionId.fromString(value);
      } catch {
        throw new MalformedMessageError(field.path, 'a 128-bit connection id', value);
      }
    }
    return new ConnectionId(field.asBigInt());
  }

  static fromJson(json: JsonValue): ConnectionId {
    return ConnectionId.fromReader(new JsonReader(json));
  }

  toJson(): JsonObject {
    return { __connection_id__: this.__connection_id__ };
  }

  isZero(): boolean {
    return this.__connection_id__ === 0n;
  }

  static nullIfZero(addr: ConnectionId): ConnectionId | null {
    return addr.isZero() ? null : addr;
  }

  /**
   * Compare two connection IDs for equality.
   */
  isEqual(other: ConnectionId): boolean {
    return this.__connection_id__ === other.__connection_id__;
  }

  /**
   * Print the connection ID as a hexadecimal string.
   */
  toHexString(): string {
    return bigIntToHexString(this.__connection_id__, CONNECTION_ID_BYTES);
  }

  /**
   * Parse a connection ID from a hexadecimal string.
   */
  static fromString(str: string): ConnectionId {
    return new ConnectionId(hexStringToBigInt(str, CONNECTION_ID_BYTES));
  }

  toString(): string {
    return this.toHexString();
  }
}
