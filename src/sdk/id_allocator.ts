const U32_MAX = 0xffff_ffff;

/**
 * Hands out the request ids and query ids a session stamps on its messages.
 * Both counters start at 0 and wrap around after `u32::MAX`.
 */
export class IdAllocator {
  #requestId: number;
  #queryId: number;

  constructor({ requestId = 0, queryId = 0 }: { requestId?: number; queryId?: number } = {}) {
    this.#requestId = requestId;
    this.#queryId = queryId;
  }

  nextRequestId = (): number => {
    const requestId = this.#requestId;
    this.#requestId = requestId === U32_MAX ? 0 : requestId + 1;
    return requestId;
  };

  nextQueryId = (): number => {
    const queryId = this.#queryId;
    this.#queryId = queryId === U32_MAX ? 0 : queryId + 1;
    return queryId;
  };

  /**
   * A fresh 16 byte id for a one-off query, derived from the request counter.
   */
  nextMessageId = (): Uint8Array => {
    const messageId = new Uint8Array(16);
    new DataView(messageId.buffer).setUint32(0, this.nextRequestId());
    return messageId;
  };
}
