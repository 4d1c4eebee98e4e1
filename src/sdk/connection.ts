import {
  ConnectionClosedError,
  DecodeError,
  HandshakeError,
  NotConnectedError,
  UnsupportedProtocolError,
} from '../lib/errors';
import { fragmentOf } from '../lib/json';
import { ClientMessage } from './client_api/client_message';
import { parseServerMessage, type ServerMessage } from './client_api/server_message';
import { CallReducerFlags, JSON_PROTOCOL } from './client_api/types';
import { EventEmitter } from './event_emitter';
import { clientLogger } from './logger';
import {
  WebsocketJsonAdapter,
  type CloseInfo,
  type CreateWebSocketFn,
  type TransportErrorInfo,
  type WebsocketAdapter,
} from './websocket_adapter';

export type ConnectionState =
  | 'Disconnected'
  | 'Connecting'
  | 'Open'
  | 'Closing'
  | 'Closed';

export type ConnectionOptions = {
  /** Base URI of the server: `http(s)://` or `ws(s)://`. */
  uri: string | URL;
  nameOrIdentity: string;
  /** Sub-protocol to negotiate. Defaults to {@link JSON_PROTOCOL}. */
  protocol?: string;
  token?: string;
  /** Aborting unblocks pending receives and tears the connection down. */
  signal?: AbortSignal;
  /** How long `close` waits for the server's close frame. */
  closeGraceMs?: number;
  createWebSocket?: CreateWebSocketFn;
};

export const DEFAULT_CLOSE_GRACE_MS = 100;

/**
 * Close codes the client sends. A WebSocket `close()` takes 1000 or a code
 * in 3000-4999 and throws for anything else, so failures use the
 * application range.
 */
export const CloseCode = {
  Normal: 1000,
  ProtocolMismatch: 4002,
  TransportFailure: 4011,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

/** Query that subscribes to every public table. */
export const SUBSCRIBE_ALL_QUERY = 'SELECT * FROM *';

type Inbound =
  | { ok: true; message: ServerMessage }
  | { ok: false; error: DecodeError };

type Waiter = {
  resolve: (message: ServerMessage) => void;
  reject: (error: unknown) => void;
};

type ConnectionEvents = {
  stateChange: [state: ConnectionState, previous: ConnectionState];
};

/**
 * Turn the configured URI into the `ws(s)://` base the socket connects to.
 */
export function toWsBaseUrl(uri: string | URL): URL {
  // We use .toString() here because a URL instance is not always accepted
  // where a string is.
  const url = new URL(uri.toString());
  if (!/^wss?:/.test(url.protocol)) {
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  }
  return url;
}

const noop = (): void => {};

/**
 * A single realtime session with a database over a WebSocket.
 *
 * Outbound messages are written one at a time in call order. Inbound frames
 * are decoded as they arrive and buffered until {@link Connection.receive}
 * picks them up, so nothing is lost between two receives. A frame that does
 * not decode is reported to the receiver in its place and the connection
 * stays open; a transport failure or close is terminal.
 */
export class Connection {
  #state: ConnectionState = 'Disconnected';
  #protocol: string;
  #signal?: AbortSignal;
  #closeGraceMs: number;
  #ws?: WebsocketAdapter;

  #inbox: Inbound[] = [];
  #waiters: Waiter[] = [];
  #terminal?: Error;
  #writeChain: Promise<void> = Promise.resolve();
  #closing?: Promise<void>;
  #closed: Promise<void>;
  #markClosed: () => void = noop;
  #failHandshake?: (error: unknown) => void;
  #emitter = new EventEmitter<ConnectionEvents>();

  private constructor(options: ConnectionOptions, protocol: string) {
    this.#protocol = protocol;
    this.#signal = options.signal;
    this.#closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    this.#closed = new Promise(resolve => {
      this.#markClosed = resolve;
    });
  }

  /**
   * Open a connection. Resolves once the server has accepted the handshake
   * with the requested sub-protocol.
   */
  static async connect(options: ConnectionOptions): Promise<Connection> {
    const protocol = options.protocol ?? JSON_PROTOCOL;
    if (protocol !== JSON_PROTOCOL) {
      throw new UnsupportedProtocolError(protocol);
    }
    options.signal?.throwIfAborted();
    const connection = new Connection(options, protocol);
    await connection.#open(options);
    return connection;
  }

  get state(): ConnectionState {
    return this.#state;
  }

  get protocol(): string {
    return this.#protocol;
  }

  /** Settles once the connection has reached `Closed`. */
  get closed(): Promise<void> {
    return this.#closed;
  }

  onStateChange(
    callback: (state: ConnectionState, previous: ConnectionState) => void
  ): void {
    this.#emitter.on('stateChange', callback);
  }

  removeOnStateChange(
    callback: (state: ConnectionState, previous: ConnectionState) => void
  ): void {
    this.#emitter.off('stateChange', callback);
  }

  async #open({
    uri,
    nameOrIdentity,
    token,
    createWebSocket,
  }: ConnectionOptions): Promise<void> {
    const url = toWsBaseUrl(uri);
    this.#signal?.addEventListener('abort', this.#onAbort, { once: true });
    this.#setState('Connecting');
    clientLogger('info', () => `Connecting to ${url.toString()} (${nameOrIdentity})`);

    const createWS = createWebSocket ?? WebsocketJsonAdapter.createWebSocketFn;
    let ws: WebsocketAdapter;
    try {
      ws = await createWS({
        url,
        wsProtocol: this.#protocol,
        nameOrAddress: nameOrIdentity,
        authToken: token,
      });
    } catch (e) {
      this.#terminate(new ConnectionClosedError(undefined, undefined, { cause: e }));
      clientLogger('error', () => `Could not open a WebSocket: ${String(e)}`);
      throw new HandshakeError('Could not open a WebSocket', { cause: e });
    }
    this.#ws = ws;

    const signal = this.#signal;
    if (signal?.aborted) {
      this.#closeSocket(CloseCode.Normal, '');
      this.#terminate(new ConnectionClosedError(1000, 'aborted'));
      throw signal.reason;
    }

    await new Promise<void>((resolve, reject) => {
      this.#failHandshake = (error: unknown) => {
        this.#failHandshake = undefined;
        this.#terminate(new ConnectionClosedError(undefined, undefined, { cause: error }));
        reject(error);
      };
      ws.onmessage = msg => this.#handleMessage(msg.data);
      ws.onerror = err => {
        if (this.#state === 'Connecting') {
          this.#failHandshake?.(new HandshakeError(err.message, { cause: err.error }));
        } else {
          this.#handleTransportError(err);
        }
      };
      ws.onclose = ev => {
        if (this.#state === 'Connecting') {
          this.#failHandshake?.(
            new HandshakeError(
              `Connection closed during handshake (code ${ev.code}${ev.reason ? `: ${ev.reason}` : ''})`
            )
          );
        } else {
          this.#handleClose(ev);
        }
      };
      ws.onopen = () => {
        if (ws.protocol !== this.#protocol) {
          this.#failHandshake?.(
            new HandshakeError(
              `Server selected sub-protocol "${ws.protocol}", expected "${this.#protocol}"`
            )
          );
          this.#closeSocket(CloseCode.ProtocolMismatch, 'unsupported sub-protocol');
          return;
        }
        this.#failHandshake = undefined;
        this.#setState('Open');
        resolve();
      };
    });
  }

  /**
   * Send a message. Rejects with {@link NotConnectedError} unless the
   * connection is open, and with {@link ConnectionClosedError} if the
   * transport fails while writing.
   */
  send(message: ClientMessage): Promise<void> {
    const ws = this.#ws;
    if (this.#state !== 'Open' || !ws) {
      return Promise.reject(new NotConnectedError(this.#state));
    }
    let text: string;
    try {
      text = ClientMessage.serialize(message);
    } catch (e) {
      return Promise.reject(e);
    }
    const write = this.#writeChain.then(() => {
      if (this.#state !== 'Open') {
        throw this.#terminal ?? new NotConnectedError(this.#state);
      }
      clientLogger('trace', () => `Sending frame: ${fragmentOf(text)}`);
      try {
        ws.send(text);
      } catch (e) {
        clientLogger('error', () => `WebSocket write failed: ${String(e)}`);
        const error = new ConnectionClosedError(undefined, undefined, { cause: e });
        this.#terminate(error);
        this.#closeSocket(CloseCode.TransportFailure, 'write failed');
        throw error;
      }
    });
    // Failures are reported to the sender through `write`; the chain itself
    // only orders the writes.
    this.#writeChain = write.then(noop, noop);
    return write;
  }

  /**
   * The next message from the server, in arrival order.
   *
   * Rejects with the decode error of a frame that could not be decoded (the
   * following frames are still delivered), with a {@link ConnectionClosedError}
   * once the connection is closed and every buffered message has been
   * received, or with the abort reason once the signal fires.
   */
  receive(): Promise<ServerMessage> {
    if (this.#signal?.aborted) {
      return Promise.reject(this.#signal.reason);
    }
    const next = this.#inbox.shift();
    if (next) {
      return next.ok ? Promise.resolve(next.message) : Promise.reject(next.error);
    }
    if (this.#terminal) {
      return Promise.reject(this.#terminal);
    }
    return new Promise((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
    });
  }

  /**
   * Close gracefully: send a normal close frame, then wait up to `graceMs`
   * for the server to close its side before tearing the connection down.
   * Calling it again returns the same pending close.
   */
  close({ graceMs = this.#closeGraceMs }: { graceMs?: number } = {}): Promise<void> {
    if (this.#state === 'Closed') {
      return Promise.resolve();
    }
    if (!this.#closing) {
      this.#closing = this.#gracefulClose(graceMs);
    }
    return this.#closing;
  }

  /**
   * Close without waiting for the server.
   */
  abort(): void {
    if (this.#state === 'Closed') {
      return;
    }
    clientLogger('debug', 'Aborting connection');
    this.#terminate(new ConnectionClosedError(1000, 'aborted by client'));
    this.#closeSocket(CloseCode.Normal, '');
  }

  async #gracefulClose(graceMs: number): Promise<void> {
    this.#setState('Closing');
    this.#closeSocket(CloseCode.Normal, '');
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>(resolve => {
      timer = setTimeout(resolve, graceMs);
    });
    await Promise.race([this.#closed, grace]);
    clearTimeout(timer);
    this.#terminate(new ConnectionClosedError(1000, 'closed by client'));
  }

  // Convenience senders, one per client message variant.

  callReducer(
    reducer: string,
    args: string,
    requestId: number,
    flags: CallReducerFlags = CallReducerFlags.FullUpdate
  ): Promise<void> {
    return this.send(ClientMessage.CallReducer({ reducer, args, requestId, flags }));
  }

  subscribe(queryStrings: string[], requestId: number): Promise<void> {
    return this.send(ClientMessage.Subscribe({ queryStrings, requestId }));
  }

  subscribeAll(requestId: number): Promise<void> {
    return this.subscribe([SUBSCRIBE_ALL_QUERY], requestId);
  }

  subscribeSingle(query: string, requestId: number, queryId: number): Promise<void> {
    return this.send(
      ClientMessage.SubscribeSingle({ query, requestId, queryId: { id: queryId } })
    );
  }

  subscribeMulti(
    queryStrings: string[],
    requestId: number,
    queryId: number
  ): Promise<void> {
    return this.send(
      ClientMessage.SubscribeMulti({ queryStrings, requestId, queryId: { id: queryId } })
    );
  }

  unsubscribe(requestId: number, queryId: number): Promise<void> {
    return this.send(ClientMessage.Unsubscribe({ requestId, queryId: { id: queryId } }));
  }

  unsubscribeMulti(requestId: number, queryId: number): Promise<void> {
    return this.send(
      ClientMessage.UnsubscribeMulti({ requestId, queryId: { id: queryId } })
    );
  }

  oneOffQuery(messageId: Uint8Array, queryString: string): Promise<void> {
    return this.send(ClientMessage.OneOffQuery({ messageId, queryString }));
  }

  #setState(state: ConnectionState): void {
    const previous = this.#state;
    if (previous === state) {
      return;
    }
    this.#state = state;
    clientLogger('debug', () => `Connection state ${previous} -> ${state}`);
    this.#emitter.emit('stateChange', state, previous);
  }

  #handleMessage(data: string): void {
    if (this.#state !== 'Open' && this.#state !== 'Closing') {
      return;
    }
    clientLogger('trace', () => `Received frame: ${fragmentOf(data)}`);
    let inbound: Inbound;
    try {
      inbound = { ok: true, message: parseServerMessage(data) };
    } catch (e) {
      if (!(e instanceof DecodeError)) {
        throw e;
      }
      clientLogger('warn', () => `Could not decode a server frame: ${e.message}`);
      inbound = { ok: false, error: e };
    }
    const waiter = this.#waiters.shift();
    if (!waiter) {
      this.#inbox.push(inbound);
    } else if (inbound.ok) {
      waiter.resolve(inbound.message);
    } else {
      waiter.reject(inbound.error);
    }
  }

  #handleTransportError(err: TransportErrorInfo): void {
    clientLogger('error', () => `WebSocket error: ${err.message}`);
    this.#terminate(new ConnectionClosedError(undefined, err.message, { cause: err.error }));
    this.#closeSocket(CloseCode.TransportFailure, '');
  }

  // Runs inside socket event handlers, where a throw would escape to the
  // process. The connection is already terminal when this fails.
  #closeSocket(code: CloseCode, reason: string): void {
    try {
      this.#ws?.close(code, reason);
    } catch (e) {
      clientLogger('warn', () => `Could not close the WebSocket: ${String(e)}`);
    }
  }

  #handleClose(ev: CloseInfo): void {
    clientLogger('debug', () => `WebSocket closed (code ${ev.code})`);
    this.#terminate(new ConnectionClosedError(ev.code, ev.reason));
  }

  #onAbort = (): void => {
    const reason: unknown = this.#signal?.reason;
    if (this.#failHandshake) {
      this.#failHandshake(reason);
      this.#closeSocket(CloseCode.Normal, '');
      return;
    }
    this.#waiters.splice(0).forEach(waiter => waiter.reject(reason));
    this.abort();
  };

  #terminate(error: Error): void {
    if (this.#state === 'Closed') {
      return;
    }
    this.#terminal = error;
    this.#setState('Closed');
    this.#signal?.removeEventListener('abort', this.#onAbort);
    this.#waiters.splice(0).forEach(waiter => waiter.reject(error));
    this.#markClosed();
  }
}
