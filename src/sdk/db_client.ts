import type { ConnectionId } from '../lib/connection_id';
import {
  DecodeError,
  NotConnectedError,
  SubscriptionFailedError,
} from '../lib/errors';
import type { Identity } from '../lib/identity';
import { encodeReducerArgs } from '../lib/reducer_args';
import { ModuleDef, type RawModuleDef } from '../lib/schema';
import type { TimeDuration } from '../lib/time_duration';
import type { Timestamp } from '../lib/timestamp';
import { ServerMessage } from './client_api/server_message';
import {
  CallReducerFlags,
  type EnergyQuanta,
  type OneOffQueryResponse,
  type TransactionUpdate,
  type UpdateStatus,
} from './client_api/types';
import { ClientCache } from './client_cache';
import { Connection, type ConnectionOptions } from './connection';
import { EventEmitter } from './event_emitter';
import { IdAllocator } from './id_allocator';
import { clientLogger, stringify } from './logger';
import { messageKey, PendingRequests, requestKey } from './pending_requests';
import { SubscriptionHandle } from './subscription_handle';

export type DbClientOptions = ConnectionOptions & {
  /** Lets the cache decode rows and reducer arguments against their types. */
  moduleDef?: RawModuleDef;
  /** Applied to every request the client waits on. */
  requestTimeoutMs?: number;
};

/**
 * A reducer run as the server reported it. `error` is set when the
 * transaction failed, in which case nothing in the cache changed.
 */
export type ReducerEvent = {
  reducerName: string;
  reducerId: number;
  /** JSON text of the arguments. */
  args: string;
  requestId: number;
  status: UpdateStatus;
  error?: string;
  callerIdentity: Identity;
  callerConnectionId: ConnectionId | null;
  timestamp: Timestamp;
  energyQuantaUsed: EnergyQuanta;
  totalHostExecutionDuration: TimeDuration;
};

export type ReducerEventCallback = (client: DbClient, event: ReducerEvent) => void;

export type DbClientEvents = {
  connect: [client: DbClient, identity: Identity, token: string];
  connectError: [client: DbClient | undefined, error: unknown];
  disconnect: [client: DbClient, error?: unknown];
  error: [client: DbClient, error: unknown];
  message: [client: DbClient, message: ServerMessage];
};

function toReducerEvent(tx: TransactionUpdate): ReducerEvent {
  const { reducerCall, status } = tx;
  return {
    reducerName: reducerCall.reducerName,
    reducerId: reducerCall.reducerId,
    args: reducerCall.args,
    requestId: reducerCall.requestId,
    status,
    error:
      status.tag === 'Failed'
        ? status.value
        : status.tag === 'OutOfEnergy'
          ? 'out of energy'
          : undefined,
    callerIdentity: tx.callerIdentity,
    callerConnectionId: tx.callerConnectionId.isZero() ? null : tx.callerConnectionId,
    timestamp: tx.timestamp,
    energyQuantaUsed: tx.energyQuantaUsed,
    totalHostExecutionDuration: tx.totalHostExecutionDuration,
  };
}

/**
 * A session with one database: owns the connection, runs the receive loop,
 * keeps the client cache and correlates replies with the requests that
 * caused them.
 *
 * @example
 *
 * ```ts
 * const client = await new DbClientBuilder()
 *   .withUri('ws://localhost:3000')
 *   .withDatabaseName('quickstart-chat')
 *   .onConnect((client, identity) => console.log('connected as', identity.toHexString()))
 *   .build();
 * const users = await client.subscribe(['SELECT * FROM user']);
 * ```
 */
export class DbClient {
  /** Set from the server's `IdentityToken` once the session is up. */
  identity?: Identity;
  token?: string;
  connectionId?: ConnectionId;

  readonly cache: ClientCache;

  #connection: Connection;
  #moduleDef?: RawModuleDef;
  #requestTimeoutMs?: number;
  #ids = new IdAllocator();
  #pending = new PendingRequests();
  #subscriptions = new Map<number, SubscriptionHandle>();
  // Pending subscribe requests by query id. A subscription error may name
  // only the query.
  #subscribeRequests = new Map<number, string>();
  #emitter: EventEmitter<DbClientEvents>;
  #reducerEmitter = new EventEmitter<Record<string, [DbClient, ReducerEvent]>>();
  #loop: Promise<void>;

  private constructor(
    connection: Connection,
    options: DbClientOptions,
    emitter: EventEmitter<DbClientEvents>
  ) {
    this.#connection = connection;
    this.#moduleDef = options.moduleDef;
    this.#requestTimeoutMs = options.requestTimeoutMs;
    this.#emitter = emitter;
    this.token = options.token;
    this.cache = new ClientCache(options.moduleDef);
    this.#loop = this.#run().catch((e: unknown) => {
      clientLogger('error', () => `Receive loop stopped: ${String(e)}`);
      this.#connection.abort();
      this.#handleDisconnect(e);
    });
  }

  /**
   * Connect and start receiving. Listeners on `emitter` see the session's
   * events from the first message on.
   */
  static async connect(
    options: DbClientOptions,
    emitter: EventEmitter<DbClientEvents> = new EventEmitter()
  ): Promise<DbClient> {
    const connection = await Connection.connect(options);
    return new DbClient(connection, options, emitter);
  }

  get connection(): Connection {
    return this.#connection;
  }

  isActive(): boolean {
    return this.#connection.state === 'Open';
  }

  /** Subscriptions that are pending or applied. */
  get subscriptions(): SubscriptionHandle[] {
    return [...this.#subscriptions.values()];
  }

  /**
   * Subscribe to a set of queries as one unit. Resolves with the handle
   * once the server has applied the queries and their rows are in the
   * cache; rejects with a {@link SubscriptionFailedError} if it refuses.
   */
  async subscribe(queries: string[]): Promise<SubscriptionHandle> {
    return this.#subscribe(queries, true);
  }

  /**
   * Subscribe to one query on its own.
   */
  async subscribeSingle(query: string): Promise<SubscriptionHandle> {
    return this.#subscribe([query], false);
  }

  async #subscribe(queries: string[], multi: boolean): Promise<SubscriptionHandle> {
    const requestId = this.#ids.nextRequestId();
    const queryId = this.#ids.nextQueryId();
    const handle = new SubscriptionHandle(queryId, queries, multi, h =>
      this.#unsubscribe(h)
    );
    this.#subscriptions.set(queryId, handle);
    const key = requestKey(requestId);
    const reply = this.#pending.register(key, { timeoutMs: this.#requestTimeoutMs });
    this.#subscribeRequests.set(queryId, key);
    try {
      if (multi) {
        await this.#connection.subscribeMulti(queries, requestId, queryId);
      } else {
        await this.#connection.subscribeSingle(queries[0], requestId, queryId);
      }
    } catch (e) {
      this.#pending.reject(key, e);
    }
    try {
      await reply;
    } catch (e) {
      if (this.#subscriptions.get(queryId) === handle) {
        this.#subscriptions.delete(queryId);
      }
      throw e;
    } finally {
      if (this.#subscribeRequests.get(queryId) === key) {
        this.#subscribeRequests.delete(queryId);
      }
    }
    return handle;
  }

  async #unsubscribe(handle: SubscriptionHandle): Promise<void> {
    if (this.#subscriptions.get(handle.queryId) !== handle) {
      return;
    }
    const requestId = this.#ids.nextRequestId();
    if (handle.multi) {
      await this.#connection.unsubscribeMulti(requestId, handle.queryId);
    } else {
      await this.#connection.unsubscribe(requestId, handle.queryId);
    }
  }

  /**
   * Call a reducer. `args` is either the JSON text of the argument array or
   * the arguments themselves, encoded against the reducer's parameters when
   * the module definition names it.
   *
   * With `FullUpdate` this resolves with the reducer's outcome once the
   * server reports it, failed runs included. With `NoSuccessNotify` it
   * resolves with `undefined` as soon as the call is written.
   */
  async callReducer(
    reducerName: string,
    args: string | readonly unknown[],
    flags: CallReducerFlags = CallReducerFlags.FullUpdate
  ): Promise<ReducerEvent | undefined> {
    const argsText = typeof args === 'string' ? args : this.#encodeArgs(reducerName, args);
    const requestId = this.#ids.nextRequestId();
    if (flags === CallReducerFlags.NoSuccessNotify) {
      await this.#connection.callReducer(reducerName, argsText, requestId, flags);
      return undefined;
    }
    const key = requestKey(requestId);
    const reply = this.#pending.register(key, { timeoutMs: this.#requestTimeoutMs });
    try {
      await this.#connection.callReducer(reducerName, argsText, requestId, flags);
    } catch (e) {
      this.#pending.reject(key, e);
    }
    return toReducerEvent(ServerMessage.expect(await reply, 'TransactionUpdate'));
  }

  /**
   * Run a query once, outside of any subscription.
   */
  async oneOffQuery(queryString: string): Promise<OneOffQueryResponse> {
    const messageId = this.#ids.nextMessageId();
    const key = messageKey(messageId);
    const reply = this.#pending.register(key, { timeoutMs: this.#requestTimeoutMs });
    try {
      await this.#connection.oneOffQuery(messageId, queryString);
    } catch (e) {
      this.#pending.reject(key, e);
    }
    return ServerMessage.expect(await reply, 'OneOffQueryResponse');
  }

  /**
   * Close the session gracefully. Resolves once the receive loop has
   * finished and `disconnect` has been emitted.
   */
  async disconnect(): Promise<void> {
    await this.#connection.close();
    await this.#loop;
  }

  onReducer(reducerName: string, callback: ReducerEventCallback): void {
    this.#reducerEmitter.on(reducerName, callback);
  }

  removeOnReducer(reducerName: string, callback: ReducerEventCallback): void {
    this.#reducerEmitter.off(reducerName, callback);
  }

  on<K extends keyof DbClientEvents>(
    event: K,
    callback: (...args: DbClientEvents[K]) => void
  ): void {
    this.#emitter.on(event, callback);
  }

  off<K extends keyof DbClientEvents>(
    event: K,
    callback: (...args: DbClientEvents[K]) => void
  ): void {
    this.#emitter.off(event, callback);
  }

  #encodeArgs(reducerName: string, args: readonly unknown[]): string {
    const reducer = this.#moduleDef && ModuleDef.reducer(this.#moduleDef, reducerName);
    return encodeReducerArgs(args, reducer?.params, this.#moduleDef?.typespace);
  }

  async #run(): Promise<void> {
    for (;;) {
      let message: ServerMessage;
      try {
        message = await this.#connection.receive();
      } catch (e) {
        if (e instanceof DecodeError) {
          this.#emitter.emit('error', this, e);
          continue;
        }
        this.#handleDisconnect(e);
        return;
      }
      try {
        this.#processMessage(message);
      } catch (e) {
        clientLogger('error', () => `Failed to process ${message.tag}: ${String(e)}`);
        this.#emitter.emit('error', this, e);
      }
      if (message.tag !== 'TransactionUpdate' || this.#isOwnTransaction(message.value)) {
        this.#pending.settle(message);
      }
      try {
        this.#emitter.emit('message', this, message);
      } catch (e) {
        this.#emitter.emit('error', this, e);
      }
    }
  }

  #processMessage(message: ServerMessage): void {
    clientLogger('debug', () => `Processing ${message.tag}`);
    switch (message.tag) {
      case 'IdentityToken': {
        const { identity, token, connectionId } = message.value;
        this.identity = identity;
        if (!this.token && token) {
          this.token = token;
        }
        this.connectionId = connectionId;
        this.#emitter.emit('connect', this, identity, this.token ?? token);
        break;
      }
      case 'InitialSubscription':
      case 'TransactionUpdateLight':
        this.cache.applyMessage(message);
        break;
      case 'TransactionUpdate': {
        const event = toReducerEvent(message.value);
        if (event.error !== undefined) {
          clientLogger('debug', () => `Reducer ${event.reducerName} failed: ${event.error}`);
        }
        this.cache.applyMessage(message);
        this.#reducerEmitter.emit(event.reducerName, this, event);
        break;
      }
      case 'SubscribeApplied':
      case 'SubscribeMultiApplied': {
        const queryId = message.value.queryId.id;
        const handle = this.#subscriptions.get(queryId);
        if (!handle) {
          clientLogger('error', `Received ${message.tag} for unknown queryId ${queryId}.`);
          // Rows of a subscription we do not know are not cached.
          break;
        }
        this.cache.applyMessage(message);
        handle.markApplied();
        break;
      }
      case 'UnsubscribeApplied':
      case 'UnsubscribeMultiApplied': {
        const queryId = message.value.queryId.id;
        const handle = this.#subscriptions.get(queryId);
        if (!handle) {
          clientLogger('error', `Received ${message.tag} for unknown queryId ${queryId}.`);
          break;
        }
        this.cache.applyMessage(message);
        this.#subscriptions.delete(queryId);
        handle.markEnded();
        break;
      }
      case 'SubscriptionError': {
        const { error, requestId, queryId, tableId } = message.value;
        const failure = new SubscriptionFailedError(error, { requestId, queryId, tableId });
        if (queryId !== undefined) {
          const handle = this.#subscriptions.get(queryId);
          this.#subscriptions.delete(queryId);
          this.#failSubscribeRequest(queryId, failure);
          handle?.markFailed(failure);
        } else {
          clientLogger('error', () => `Subscription error without a queryId: ${error}`);
          // Every subscription may be affected.
          const handles = [...this.#subscriptions.values()];
          this.#subscriptions.clear();
          for (const handle of handles) {
            this.#failSubscribeRequest(handle.queryId, failure);
            handle.markFailed(failure);
          }
        }
        break;
      }
      case 'OneOffQueryResponse':
        break;
    }
  }

  #failSubscribeRequest(queryId: number, failure: SubscriptionFailedError): void {
    const key = this.#subscribeRequests.get(queryId);
    if (key !== undefined) {
      this.#subscribeRequests.delete(queryId);
      this.#pending.reject(key, failure);
    }
  }

  // Transactions of other clients carry their request ids, not ours.
  #isOwnTransaction(tx: TransactionUpdate): boolean {
    return this.connectionId === undefined || this.connectionId.isEqual(tx.callerConnectionId);
  }

  #handleDisconnect(error: unknown): void {
    clientLogger('info', () => `Disconnected: ${stringify(error)}`);
    const pendingError =
      error instanceof Error ? error : new NotConnectedError(this.#connection.state);
    this.#pending.rejectAll(pendingError);
    for (const handle of this.#subscriptions.values()) {
      handle.markEnded();
    }
    this.#subscriptions.clear();
    this.#emitter.emit('disconnect', this, error);
  }
}
