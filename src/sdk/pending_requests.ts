import {
  ProtocolMisuseError,
  RequestTimeoutError,
  SubscriptionFailedError,
} from '../lib/errors';
import { bytesToBase64 } from '../lib/json_reader';
import type { ServerMessage } from './client_api/server_message';
import { clientLogger } from './logger';

type Slot = {
  resolve: (message: ServerMessage) => void;
  reject: (error: unknown) => void;
  timer?: ReturnType<typeof setTimeout>;
};

export type RegisterOptions = {
  /** Reject with {@link RequestTimeoutError} if nothing arrives in time. */
  timeoutMs?: number;
};

export function requestKey(requestId: number): string {
  return `request:${requestId}`;
}

export function messageKey(messageId: Uint8Array): string {
  return `message:${bytesToBase64(messageId)}`;
}

/**
 * The correlation key a server message answers, if any. `IdentityToken` and
 * subscription errors without a request id answer nothing.
 */
export function correlationKey(message: ServerMessage): string | undefined {
  switch (message.tag) {
    case 'InitialSubscription':
    case 'TransactionUpdateLight':
    case 'SubscribeApplied':
    case 'UnsubscribeApplied':
    case 'SubscribeMultiApplied':
    case 'UnsubscribeMultiApplied':
      return requestKey(message.value.requestId);
    case 'TransactionUpdate':
      return requestKey(message.value.reducerCall.requestId);
    case 'OneOffQueryResponse':
      return messageKey(message.value.messageId);
    case 'SubscriptionError':
      return message.value.requestId === undefined
        ? undefined
        : requestKey(message.value.requestId);
    case 'IdentityToken':
      return undefined;
  }
}

/**
 * Single-fulfillment slots keyed by request id or one-off message id, filled
 * from the receive loop as the answering messages arrive.
 */
export class PendingRequests {
  #slots = new Map<string, Slot>();

  get size(): number {
    return this.#slots.size;
  }

  has(key: string): boolean {
    return this.#slots.has(key);
  }

  /**
   * Wait for the message answering `key`. Registering a key that is still
   * pending throws.
   */
  register(key: string, { timeoutMs }: RegisterOptions = {}): Promise<ServerMessage> {
    if (this.#slots.has(key)) {
      throw new ProtocolMisuseError(`A request is already pending for ${key}`);
    }
    return new Promise<ServerMessage>((resolve, reject) => {
      const slot: Slot = { resolve, reject };
      if (timeoutMs !== undefined) {
        slot.timer = setTimeout(() => {
          if (this.#slots.get(key) === slot) {
            this.#slots.delete(key);
            clientLogger('warn', `Request ${key} timed out after ${timeoutMs}ms`);
            reject(new RequestTimeoutError(key, timeoutMs));
          }
        }, timeoutMs);
      }
      this.#slots.set(key, slot);
    });
  }

  /**
   * Fulfill the slot `message` answers. A `SubscriptionError` rejects it
   * with a {@link SubscriptionFailedError}. Returns whether a slot was
   * waiting.
   */
  settle(message: ServerMessage): boolean {
    const key = correlationKey(message);
    if (key === undefined) {
      return false;
    }
    const slot = this.#take(key);
    if (!slot) {
      return false;
    }
    if (message.tag === 'SubscriptionError') {
      const { error, requestId, queryId, tableId } = message.value;
      slot.reject(new SubscriptionFailedError(error, { requestId, queryId, tableId }));
    } else {
      slot.resolve(message);
    }
    return true;
  }

  /**
   * Reject `key` with `error`, e.g. when sending its request failed.
   */
  reject(key: string, error: unknown): boolean {
    const slot = this.#take(key);
    slot?.reject(error);
    return slot !== undefined;
  }

  rejectAll(error: unknown): void {
    const slots = [...this.#slots.keys()].map(key => this.#take(key));
    for (const slot of slots) {
      slot?.reject(error);
    }
  }

  #take(key: string): Slot | undefined {
    const slot = this.#slots.get(key);
    if (slot) {
      this.#slots.delete(key);
      clearTimeout(slot.timer);
    }
    return slot;
  }
}
