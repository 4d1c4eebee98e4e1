/**
 * Base class for errors raised while decoding data received from the wire or
 * from a schema document. A decode error concerns one frame or document only;
 * it never closes a connection by itself.
 */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
  }
  get name(): string {
    return 'DecodeError';
  }
}

/**
 * The input was not valid JSON.
 */
export class MalformedJsonError extends DecodeError {
  readonly fragment: string;

  constructor(reason: string, fragment: string) {
    super(`Malformed JSON (${reason}): ${fragment}`);
    this.fragment = fragment;
  }
  get name(): string {
    return 'MalformedJsonError';
  }
}

/**
 * A sum value on the wire must be an object with exactly one key.
 */
export class AmbiguousSumTagError extends DecodeError {
  readonly keys: string[];
  readonly path: string;

  constructor(keys: string[], path = '$') {
    super(
      `Sum value at ${path} must have exactly one tag, found ${keys.length}` +
        (keys.length > 0 ? `: ${keys.join(', ')}` : '')
    );
    this.keys = keys;
    this.path = path;
  }
  get name(): string {
    return 'AmbiguousSumTagError';
  }
}

/**
 * The top-level key of a message envelope names no known variant.
 */
export class UnknownMessageVariantError extends DecodeError {
  readonly variant: string;

  constructor(variant: string, direction: 'client' | 'server') {
    super(`Unknown ${direction} message variant: ${variant}`);
    this.variant = variant;
  }
  get name(): string {
    return 'UnknownMessageVariantError';
  }
}

/**
 * A message or document is valid JSON but does not have the expected shape.
 */
export class MalformedMessageError extends DecodeError {
  readonly path: string;

  constructor(path: string, expected: string, fragment?: string) {
    super(
      `Expected ${expected} at ${path}` +
        (fragment !== undefined ? `, got ${fragment}` : '')
    );
    this.path = path;
  }
  get name(): string {
    return 'MalformedMessageError';
  }
}

/**
 * A value does not conform to the algebraic type it was decoded or encoded
 * against.
 */
export class TypeMismatchError extends DecodeError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.path = path;
  }
  get name(): string {
    return 'TypeMismatchError';
  }
}

/**
 * The type is part of the type model but has no value encoding yet.
 */
export class UnsupportedTypeError extends DecodeError {
  constructor(typeName: string) {
    super(`${typeName} values are not supported`);
  }
  get name(): string {
    return 'UnsupportedTypeError';
  }
}

/**
 * Base class for calls that are rejected because of how the API was used,
 * before anything reaches the network.
 */
export class ProtocolMisuseError extends Error {
  constructor(message: string) {
    super(message);
  }
  get name(): string {
    return 'ProtocolMisuseError';
  }
}

export class UnsupportedProtocolError extends ProtocolMisuseError {
  readonly protocol: string;

  constructor(protocol: string) {
    super(`Unsupported sub-protocol: ${protocol}`);
    this.protocol = protocol;
  }
  get name(): string {
    return 'UnsupportedProtocolError';
  }
}

export class NotConnectedError extends ProtocolMisuseError {
  constructor(state: string) {
    super(`Connection is not open (state: ${state})`);
  }
  get name(): string {
    return 'NotConnectedError';
  }
}

export class MissingCredentialError extends ProtocolMisuseError {
  constructor(operation: string) {
    super(`An authentication token is required for ${operation}`);
  }
  get name(): string {
    return 'MissingCredentialError';
  }
}

export class WrongMessageVariantError extends ProtocolMisuseError {
  constructor(expected: string, actual: string) {
    super(`Expected a ${expected} message, got ${actual}`);
  }
  get name(): string {
    return 'WrongMessageVariantError';
  }
}

/**
 * Base class for failures of the underlying transport. These are terminal for
 * the connection they occur on.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
  get name(): string {
    return 'TransportError';
  }
}

/**
 * The server refused the WebSocket handshake, or the socket failed before it
 * opened.
 */
export class HandshakeError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
  get name(): string {
    return 'HandshakeError';
  }
}

export class ConnectionClosedError extends TransportError {
  readonly code?: number;
  readonly reason?: string;

  constructor(code?: number, reason?: string, options?: { cause?: unknown }) {
    super(
      'Connection closed' +
        (code !== undefined ? ` (code ${code}${reason ? `: ${reason}` : ''})` : ''),
      options
    );
    this.code = code;
    this.reason = reason;
  }
  get name(): string {
    return 'ConnectionClosedError';
  }
}

/**
 * A non-success response from one of the HTTP endpoints.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, url: string) {
    super(`Unexpected status code ${status} from ${url}: ${body}`);
    this.status = status;
    this.body = body;
  }
  get name(): string {
    return 'HttpError';
  }
}

/**
 * The server rejected a subscription. Delivered as an application-level
 * failure of one query, not as a transport fault.
 */
export class SubscriptionFailedError extends Error {
  readonly requestId?: number;
  readonly queryId?: number;
  readonly tableId?: number;

  constructor(
    message: string,
    ids: { requestId?: number; queryId?: number; tableId?: number } = {}
  ) {
    super(message);
    this.requestId = ids.requestId;
    this.queryId = ids.queryId;
    this.tableId = ids.tableId;
  }
  get name(): string {
    return 'SubscriptionFailedError';
  }
}

export class RequestTimeoutError extends Error {
  readonly key: string;

  constructor(key: string, timeoutMs: number) {
    super(`No response for ${key} after ${timeoutMs}ms`);
    this.key = key;
  }
  get name(): string {
    return 'RequestTimeoutError';
  }
}
