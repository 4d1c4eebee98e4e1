import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';

/**
 * A point in time, represented as a number of microseconds since the Unix epoch.
 */
export class Timestamp {
  __timestamp_micros_since_unix_epoch__: bigint;

  get microsSinceUnixEpoch(): bigint {
    return this.__timestamp_micros_since_unix_epoch__;
  }

  constructor(micros: bigint) {
    this.__timestamp_micros_since_unix_epoch__ = micros;
  }

  static fromReader(reader: JsonReader): Timestamp {
    return new Timestamp(
      reader.field('__timestamp_micros_since_unix_epoch__').asBigInt()
    );
  }

  static fromJson(json: JsonValue): Timestamp {
    return Timestamp.fromReader(new JsonReader(json));
  }

  toJson(): JsonObject {
    return {
      __timestamp_micros_since_unix_epoch__:
        this.__timestamp_micros_since_unix_epoch__,
    };
  }
}
