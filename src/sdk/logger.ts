import { ConnectionId } from '../lib/connection_id';
import { Identity } from '../lib/identity';
import { TimeDuration } from '../lib/time_duration';
import { Timestamp } from '../lib/timestamp';
import { uint8ArrayToHexString } from '../lib/util';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const LogLevelIdentifierIcon: Record<LogLevel, string> = {
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🐛',
  trace: '🔍',
};

let globalLogLevel: LogLevel = 'info';

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

export function isLogLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] <= LOG_LEVEL_ORDER[globalLogLevel];
}

/**
 * Log `message` at `level` if the global threshold lets it through. A
 * function message is only evaluated when it will be printed.
 */
export const clientLogger = (
  level: LogLevel,
  message: string | (() => string)
): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const text = typeof message === 'function' ? message() : message;
  console.log(`${LogLevelIdentifierIcon[level]} ${level.toUpperCase()} ${text}`);
};

const MAX_INLINE_ITEMS = 16;
const SUMMARY_HEAD_ITEMS = 10;
const REDACTED_KEYS = new Set([
  'token',
  'authtoken',
  'authorization',
  'accesstoken',
  'refreshtoken',
]);

type Loggable =
  | null
  | boolean
  | number
  | string
  | Loggable[]
  | { [key: string]: Loggable };

function toLoggable(value: unknown, seen: WeakSet<object>): Loggable {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return value;
    case 'bigint':
      return value.toString();
    case 'function':
    case 'symbol':
      return String(value);
  }
  if (typeof value !== 'object') return String(value);
  if (value instanceof Identity || value instanceof ConnectionId) {
    return value.toHexString();
  }
  if (value instanceof TimeDuration) return value.toString();
  if (value instanceof Timestamp) return value.microsSinceUnixEpoch.toString();
  if (value instanceof Uint8Array) {
    if (value.length <= MAX_INLINE_ITEMS) {
      return `0x${uint8ArrayToHexString(value)}`;
    }
    return `Uint8Array(len=${value.length}, head=0x${uint8ArrayToHexString(
      value.subarray(0, SUMMARY_HEAD_ITEMS)
    )})`;
  }
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (seen.has(value)) return '[Circular]';
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      if (items.length <= MAX_INLINE_ITEMS) {
        return items.map(item => toLoggable(item, seen));
      }
      const head = JSON.stringify(
        items.slice(0, SUMMARY_HEAD_ITEMS).map(item => toLoggable(item, seen))
      );
      return `Array(len=${items.length}, head=${head})`;
    }
    if (value instanceof Map) {
      return toLoggable([...value.entries()], seen);
    }
    const out: { [key: string]: Loggable } = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = REDACTED_KEYS.has(key.toLowerCase())
        ? '[REDACTED]'
        : toLoggable(Reflect.get(value, key), seen);
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * Render a value for a log line: keys sorted, bigints as decimal strings,
 * identities as hex, long arrays and byte arrays summarized, credentials
 * redacted.
 */
export function stringify(value: unknown): string {
  return JSON.stringify(toLoggable(value, new WeakSet()));
}
