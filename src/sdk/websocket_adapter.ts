import type { WebSocket as UndiciWebSocket } from 'undici';
import { HttpApi } from './http_api';
import { resolveWS } from './ws';

export type CloseInfo = {
  code: number;
  reason: string;
  wasClean: boolean;
};

export type TransportErrorInfo = {
  message: string;
  error?: unknown;
};

/**
 * The transport a {@link Connection} runs over: a socket carrying JSON text
 * frames. Handlers are installed by the connection, `onopen` last.
 */
export interface WebsocketAdapter {
  /** The sub-protocol the server agreed to. Meaningful once open. */
  readonly protocol: string;

  send(msg: string): void;
  close(code?: number, reason?: string): void;

  set onclose(handler: (ev: CloseInfo) => void);
  set onopen(handler: () => void);
  set onmessage(handler: (msg: { data: string }) => void);
  set onerror(handler: (err: TransportErrorInfo) => void);
}

export type CreateWebSocketArgs = {
  /** Base `ws(s)://` URL of the server. */
  url: URL;
  wsProtocol: string;
  nameOrAddress: string;
  authToken?: string;
};

export type CreateWebSocketFn = (
  args: CreateWebSocketArgs
) => Promise<WebsocketAdapter>;

/**
 * The realtime endpoint of a database, beneath `url`.
 */
export function databaseSubscribeUrl(url: URL, nameOrAddress: string): URL {
  const base = new URL(url.toString());
  if (!base.pathname.endsWith('/')) base.pathname = `${base.pathname}/`;
  return new URL(`v1/database/${encodeURIComponent(nameOrAddress)}/subscribe`, base);
}

const textDecoder = new TextDecoder();

function frameToText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data instanceof ArrayBuffer) return textDecoder.decode(new Uint8Array(data));
  if (ArrayBuffer.isView(data)) {
    return textDecoder.decode(
      new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
    );
  }
  return String(data);
}

/**
 * {@link WebsocketAdapter} over undici's WebSocket.
 */
export class WebsocketJsonAdapter implements WebsocketAdapter {
  set onclose(handler: (ev: CloseInfo) => void) {
    this.#ws.onclose = ev => {
      handler({ code: ev.code, reason: ev.reason, wasClean: ev.wasClean });
    };
  }
  set onopen(handler: () => void) {
    this.#ws.onopen = () => handler();
  }
  set onmessage(handler: (msg: { data: string }) => void) {
    this.#ws.onmessage = ev => {
      handler({ data: frameToText(ev.data) });
    };
  }
  set onerror(handler: (err: TransportErrorInfo) => void) {
    this.#ws.onerror = ev => {
      handler({ message: `WebSocket ${ev.type}`, error: ev });
    };
  }

  #ws: UndiciWebSocket;

  constructor(ws: UndiciWebSocket) {
    ws.binaryType = 'arraybuffer';
    this.#ws = ws;
  }

  get protocol(): string {
    return this.#ws.protocol;
  }

  send(msg: string): void {
    this.#ws.send(msg);
  }

  close(code?: number, reason?: string): void {
    this.#ws.close(code, reason);
  }

  static async createWebSocketFn({
    url,
    nameOrAddress,
    wsProtocol,
    authToken,
  }: CreateWebSocketArgs): Promise<WebsocketJsonAdapter> {
    const WS = await resolveWS();

    // We swap our original token to a shorter-lived token
    // to avoid sending the original via query params.
    let temporaryAuthToken: string | undefined = undefined;
    if (authToken) {
      temporaryAuthToken = await new HttpApi({
        uri: url,
        token: authToken,
      }).createWebSocketToken();
    }

    const databaseUrl = databaseSubscribeUrl(url, nameOrAddress);
    if (temporaryAuthToken) {
      databaseUrl.searchParams.set('token', temporaryAuthToken);
    }

    const ws = new WS(databaseUrl.toString(), wsProtocol);

    return new WebsocketJsonAdapter(ws);
  }
}
