import { parseClientMessage, type ClientMessage } from './client_api/client_message';
import { ServerMessage } from './client_api/server_message';
import type {
  CloseInfo,
  CreateWebSocketArgs,
  TransportErrorInfo,
  WebsocketAdapter,
} from './websocket_adapter';

/** What a WebSocket throws for a close code it does not accept. */
export class InvalidAccessError extends Error {
  get name(): string {
    return 'InvalidAccessError';
  }
}

/**
 * An in-process stand-in for a server socket. It records what the client
 * sends and lets a test drive the server side: accept or refuse the
 * handshake, push frames and close.
 */
class WebsocketTestAdapter implements WebsocketAdapter {
  #onclose?: (ev: CloseInfo) => void;
  #onopen?: () => void;
  #onmessage?: (msg: { data: string }) => void;
  #onerror?: (err: TransportErrorInfo) => void;
  // Handshake outcomes requested before the client finished installing its
  // handlers; replayed once `onopen` is set.
  #pending: Array<() => void> = [];

  protocol = '';
  sentFrames: string[] = [];
  outgoingMessages: ClientMessage[] = [];
  closed = false;
  closeCode?: number;
  createArgs?: CreateWebSocketArgs;
  /** When set, `send` throws this error. */
  sendError?: Error;
  /** Whether the simulated peer answers a client close with its own close. */
  acknowledgeClose = true;

  set onclose(handler: (ev: CloseInfo) => void) {
    this.#onclose = handler;
  }
  set onopen(handler: () => void) {
    this.#onopen = handler;
    const pending = this.#pending;
    this.#pending = [];
    pending.forEach(action => action());
  }
  set onmessage(handler: (msg: { data: string }) => void) {
    this.#onmessage = handler;
  }
  set onerror(handler: (err: TransportErrorInfo) => void) {
    this.#onerror = handler;
  }

  send(message: string): void {
    if (this.sendError) {
      throw this.sendError;
    }
    this.sentFrames.push(message);
    this.outgoingMessages.push(parseClientMessage(message));
  }

  close(code: number = 1000, reason: string = ''): void {
    // Browser and undici sockets refuse every other code.
    if (code !== 1000 && (code < 3000 || code > 4999)) {
      throw new InvalidAccessError('invalid code');
    }
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeCode = code;
    if (this.acknowledgeClose) {
      this.#onclose?.({ code, reason, wasClean: true });
    }
  }

  acceptConnection(protocol?: string): void {
    this.#whenReady(() => {
      this.protocol = protocol ?? this.createArgs?.wsProtocol ?? '';
      this.#onopen?.();
    });
  }

  rejectConnection(code: number = 1006, reason: string = 'handshake refused'): void {
    this.#whenReady(() => {
      this.closed = true;
      this.#onerror?.({ message: reason });
      this.#onclose?.({ code, reason, wasClean: false });
    });
  }

  sendToClient(message: ServerMessage | string): void {
    const data =
      typeof message === 'string' ? message : ServerMessage.serialize(message);
    this.#onmessage?.({ data });
  }

  /** The server closes the socket. */
  closeFromServer(code: number = 1000, reason: string = ''): void {
    this.closed = true;
    this.#onclose?.({ code, reason, wasClean: code === 1000 });
  }

  /** The transport fails without a close handshake. */
  failTransport(message: string = 'connection reset'): void {
    this.#onerror?.({ message });
  }

  async createWebSocketFn(args: CreateWebSocketArgs): Promise<WebsocketTestAdapter> {
    this.createArgs = args;
    return this;
  }

  #whenReady(action: () => void): void {
    if (this.#onopen) {
      action();
    } else {
      this.#pending.push(action);
    }
  }
}

export type { WebsocketTestAdapter };
export default WebsocketTestAdapter;
