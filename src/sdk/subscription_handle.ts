import type { SubscriptionFailedError } from '../lib/errors';
import { EventEmitter } from './event_emitter';

export type SubscriptionStatus = 'pending' | 'active' | 'ended' | 'failed';

type SubscriptionEvents = {
  applied: [handle: SubscriptionHandle];
  error: [handle: SubscriptionHandle, error: SubscriptionFailedError];
  end: [handle: SubscriptionHandle];
};

/**
 * One subscribed query set, named by its query id for its whole life.
 */
export class SubscriptionHandle {
  readonly queryId: number;
  readonly queries: readonly string[];
  /** Whether the queries were sent as a `SubscribeMulti`. */
  readonly multi: boolean;

  #status: SubscriptionStatus = 'pending';
  #emitter = new EventEmitter<SubscriptionEvents>();
  #unsubscribe: (handle: SubscriptionHandle) => Promise<void>;

  constructor(
    queryId: number,
    queries: readonly string[],
    multi: boolean,
    unsubscribe: (handle: SubscriptionHandle) => Promise<void>
  ) {
    this.queryId = queryId;
    this.queries = queries;
    this.multi = multi;
    this.#unsubscribe = unsubscribe;
  }

  get status(): SubscriptionStatus {
    return this.#status;
  }

  isActive(): boolean {
    return this.#status === 'active';
  }

  isEnded(): boolean {
    return this.#status === 'ended' || this.#status === 'failed';
  }

  onApplied(cb: (handle: SubscriptionHandle) => void): SubscriptionHandle {
    this.#emitter.on('applied', cb);
    return this;
  }

  onError(
    cb: (handle: SubscriptionHandle, error: SubscriptionFailedError) => void
  ): SubscriptionHandle {
    this.#emitter.on('error', cb);
    return this;
  }

  onEnd(cb: (handle: SubscriptionHandle) => void): SubscriptionHandle {
    this.#emitter.on('end', cb);
    return this;
  }

  /**
   * Ask the server to drop these queries. Resolves once the request is
   * written; `onEnd` fires when the server confirms.
   */
  unsubscribe(): Promise<void> {
    return this.#unsubscribe(this);
  }

  markApplied(): void {
    this.#status = 'active';
    this.#emitter.emit('applied', this);
  }

  markEnded(): void {
    this.#status = 'ended';
    this.#emitter.emit('end', this);
  }

  markFailed(error: SubscriptionFailedError): void {
    this.#status = 'failed';
    this.#emitter.emit('error', this, error);
  }
}
