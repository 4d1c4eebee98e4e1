import { MalformedJsonError } from './errors';

/**
 * A JSON value as it appears on the wire.
 *
 * `bigint` is allowed on the writing side only, so that 64-bit integers are
 * written as bare integer literals instead of being rounded through `number`.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// How much of a malformed frame we keep on the error.
const FRAGMENT_LIMIT = 120;

export function fragmentOf(text: string): string {
  return text.length <= FRAGMENT_LIMIT
    ? text
    : `${text.slice(0, FRAGMENT_LIMIT)}…`;
}

/**
 * Parse JSON text, turning a syntax error into a {@link MalformedJsonError}
 * that carries the offending text.
 */
export function parseJson(text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new MalformedJsonError(reason, fragmentOf(text));
  }
}

/**
 * Serialize a {@link JsonValue}. Unlike `JSON.stringify`, bigints are written
 * as integer literals and object keys keep their insertion order.
 */
export function stringifyJson(value: JsonValue): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return value.toString();
    case 'number':
      if (!Number.isFinite(value)) {
        throw new RangeError(`Cannot write non-finite number ${value} as JSON`);
      }
      return JSON.stringify(value);
    case 'string':
      return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(stringifyJson).join(',')}]`;
  }
  const fields = Object.entries(value).map(
    ([key, field]) => `${JSON.stringify(key)}:${stringifyJson(field)}`
  );
  return `{${fields.join(',')}}`;
}
