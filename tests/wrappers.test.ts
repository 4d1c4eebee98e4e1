import { describe, expect, test } from 'vitest';
import { ConnectionId } from '../src/lib/connection_id';
import { MalformedMessageError } from '../src/lib/errors';
import { Identity } from '../src/lib/identity';
import { TimeDuration } from '../src/lib/time_duration';
import { Timestamp } from '../src/lib/timestamp';

describe('Identity', () => {
  test('is written as a 0x-prefixed 64-digit hex string', () => {
    expect(new Identity(0xb0bn).toJson()).toEqual({
      __identity__:
        '0x0000000000000000000000000000000000000000000000000000000000000b0b',
    });
  });

  test('reads hex strings and integers', () => {
    expect(Identity.fromJson({ __identity__: '0xb0b' }).isEqual(new Identity(0xb0bn))).toBe(
      true
    );
    expect(Identity.fromJson({ __identity__: 42 }).__identity__).toBe(42n);
  });

  test('rejects malformed hex', () => {
    expect(() => Identity.fromJson({ __identity__: '0xzz' })).toThrow(MalformedMessageError);
    expect(() => Identity.fromJson({ __identity__: '0xzz' })).toThrow(
      'Expected a hex identity at $.__identity__, got 0xzz'
    );
  });

  test('hex strings longer than 32 bytes are rejected', () => {
    expect(() => Identity.fromString('1'.repeat(65))).toThrow(RangeError);
  });

  test('zero is all zeroes', () => {
    expect(Identity.zero().toHexString()).toBe('0'.repeat(64));
  });
});

describe('ConnectionId', () => {
  test('is written as a bare integer', () => {
    expect(new ConnectionId(0x2an).toJson()).toEqual({ __connection_id__: 42n });
  });

  test('reads numbers, decimal strings and hex strings', () => {
    expect(ConnectionId.fromJson({ __connection_id__: 42 }).__connection_id__).toBe(42n);
    expect(
      ConnectionId.fromJson({ __connection_id__: '340282366920938463463374607431768211455' })
        .__connection_id__
    ).toBe(2n ** 128n - 1n);
    expect(ConnectionId.fromJson({ __connection_id__: '0x2a' }).__connection_id__).toBe(
      42n
    );
  });

  test('prints as 32 hex digits', () => {
    expect(new ConnectionId(0x2an).toHexString()).toBe('0000000000000000000000000000002a');
  });

  test('nullIfZero drops the zero id', () => {
    expect(ConnectionId.nullIfZero(new ConnectionId(0n))).toBeNull();
    const id = new ConnectionId(1n);
    expect(ConnectionId.nullIfZero(id)).toBe(id);
  });
});

describe('Timestamp', () => {
  test('is written as micros since the epoch', () => {
    expect(new Timestamp(1_700_000_000_000_000n).toJson()).toEqual({
      __timestamp_micros_since_unix_epoch__: 1_700_000_000_000_000n,
    });
    expect(
      Timestamp.fromJson({ __timestamp_micros_since_unix_epoch__: 5 }).microsSinceUnixEpoch
    ).toBe(5n);
  });

  test('reads micros beyond the safe integer range from strings', () => {
    expect(
      Timestamp.fromJson({ __timestamp_micros_since_unix_epoch__: '9007199254740993' })
        .microsSinceUnixEpoch
    ).toBe(9007199254740993n);
  });
});

describe('TimeDuration', () => {
  test('converts from milliseconds', () => {
    const duration = TimeDuration.fromMillis(1500);
    expect(duration.micros).toBe(1_500_000n);
    expect(duration.millis).toBe(1500);
  });

  test('prints signed seconds', () => {
    expect(new TimeDuration(1_500_000n).toString()).toBe('+1.500000');
    expect(new TimeDuration(-250n).toString()).toBe('-0.000250');
  });

  test('is written as micros', () => {
    expect(new TimeDuration(250n).toJson()).toEqual({ __time_duration_micros__: 250n });
    expect(TimeDuration.fromJson({ __time_duration_micros__: 250 }).micros).toBe(250n);
  });
});
