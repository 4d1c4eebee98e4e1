import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';

/**
 * A difference between two points in time, represented as a number of microseconds.
 */
export class TimeDuration {
  __time_duration_micros__: bigint;

  private static MICROS_PER_MILLIS: bigint = 1000n;

  get micros(): bigint {
    return this.__time_duration_micros__;
  }

  get millis(): number {
    return Number(this.micros / TimeDuration.MICROS_PER_MILLIS);
  }

  constructor(micros: bigint) {
    this.__time_duration_micros__ = micros;
  }

  static fromMillis(millis: number): TimeDuration {
    return new TimeDuration(BigInt(millis) * TimeDuration.MICROS_PER_MILLIS);
  }

  static fromReader(reader: JsonReader): TimeDuration {
    return new TimeDuration(reader.field('__time_duration_micros__').asBigInt());
  }

  static fromJson(json: JsonValue): TimeDuration {
    return TimeDuration.fromReader(new JsonReader(json));
  }

  toJson(): JsonObject {
    return { __time_duration_micros__: this.__time_duration_micros__ };
  }

  /** Signed seconds with six fractional digits, e.g. `+1.500000`. */
  toString(): string {
    const micros = this.micros;
    const sign = micros < 0 ? '-' : '+';
    const pos = micros < 0 ? -micros : micros;
    const secs = pos / 1_000_000n;
    const microsRemaining = pos % 1_000_000n;
    return `${sign}${secs}.${String(microsRemaining).padStart(6, '0')}`;
  }
}
