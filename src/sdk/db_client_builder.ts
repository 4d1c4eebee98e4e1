import type { Identity } from '../lib/identity';
import type { RawModuleDef } from '../lib/schema';
import { JSON_PROTOCOL } from './client_api/types';
import { DbClient, type DbClientEvents } from './db_client';
import { EventEmitter } from './event_emitter';
import { clientLogger } from './logger';
import { WebsocketJsonAdapter, type CreateWebSocketFn } from './websocket_adapter';

/**
 * Assembles the options of a {@link DbClient} and connects it.
 */
export class DbClientBuilder {
  #uri?: URL;
  #nameOrIdentity?: string;
  #token?: string;
  #protocol: string = JSON_PROTOCOL;
  #closeGraceMs?: number;
  #signal?: AbortSignal;
  #requestTimeoutMs?: number;
  #moduleDef?: RawModuleDef;
  #emitter = new EventEmitter<DbClientEvents>();
  #createWSFn: CreateWebSocketFn = WebsocketJsonAdapter.createWebSocketFn;

  /**
   * The base URI of the server, `http(s)://` or `ws(s)://`.
   */
  withUri(uri: string | URL): DbClientBuilder {
    this.#uri = new URL(uri.toString());
    return this;
  }

  /**
   * The name or hex identity of the database to connect to.
   */
  withDatabaseName(nameOrIdentity: string): DbClientBuilder {
    this.#nameOrIdentity = nameOrIdentity;
    return this;
  }

  withToken(token?: string): DbClientBuilder {
    this.#token = token;
    return this;
  }

  /**
   * The sub-protocol to negotiate. Only {@link JSON_PROTOCOL} is supported;
   * anything else fails when `build` is called.
   */
  withProtocol(protocol: string): DbClientBuilder {
    this.#protocol = protocol;
    return this;
  }

  withCloseGrace(closeGraceMs: number): DbClientBuilder {
    this.#closeGraceMs = closeGraceMs;
    return this;
  }

  withSignal(signal: AbortSignal): DbClientBuilder {
    this.#signal = signal;
    return this;
  }

  withRequestTimeout(requestTimeoutMs: number): DbClientBuilder {
    this.#requestTimeoutMs = requestTimeoutMs;
    return this;
  }

  withModuleDef(moduleDef: RawModuleDef): DbClientBuilder {
    this.#moduleDef = moduleDef;
    return this;
  }

  withWSFn(createWSFn: CreateWebSocketFn): DbClientBuilder {
    this.#createWSFn = createWSFn;
    return this;
  }

  onConnect(
    callback: (client: DbClient, identity: Identity, token: string) => void
  ): DbClientBuilder {
    this.#emitter.on('connect', callback);
    return this;
  }

  onConnectError(
    callback: (client: DbClient | undefined, error: unknown) => void
  ): DbClientBuilder {
    this.#emitter.on('connectError', callback);
    return this;
  }

  onDisconnect(callback: (client: DbClient, error?: unknown) => void): DbClientBuilder {
    this.#emitter.on('disconnect', callback);
    return this;
  }

  /**
   * Connect. Resolves once the socket is open; `onConnect` fires when the
   * server has sent the session's identity.
   */
  async build(): Promise<DbClient> {
    if (!this.#uri) {
      throw new Error('URI is required to connect');
    }
    if (!this.#nameOrIdentity) {
      throw new Error('Database name or identity is required to connect');
    }
    try {
      return await DbClient.connect(
        {
          uri: this.#uri,
          nameOrIdentity: this.#nameOrIdentity,
          token: this.#token,
          protocol: this.#protocol,
          signal: this.#signal,
          closeGraceMs: this.#closeGraceMs,
          createWebSocket: this.#createWSFn,
          moduleDef: this.#moduleDef,
          requestTimeoutMs: this.#requestTimeoutMs,
        },
        this.#emitter
      );
    } catch (e) {
      clientLogger('error', 'Error connecting to the database');
      this.#emitter.emit('connectError', undefined, e);
      throw e;
    }
  }
}
