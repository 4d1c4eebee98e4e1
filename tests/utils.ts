import { readFileSync } from 'node:fs';
import { ConnectionId } from '../src/lib/connection_id';
import { Identity } from '../src/lib/identity';
import type { JsonValue } from '../src/lib/json';
import { TimeDuration } from '../src/lib/time_duration';
import { Timestamp } from '../src/lib/timestamp';
import { ServerMessage } from '../src/sdk/client_api/server_message';
import type { TableUpdate, UpdateStatus } from '../src/sdk/client_api/types';

export const anIdentity = Identity.fromString(
  '0000000000000000000000000000000000000000000000000000000000000069'
);
export const bobIdentity = Identity.fromString(
  '0000000000000000000000000000000000000000000000000000000000000b0b'
);
export const aConnectionId = new ConnectionId(0x2an);
export const bobConnectionId = new ConnectionId(0xb0bn);

export class Deferred<T> {
  #isResolved: boolean = false;
  #isRejected: boolean = false;
  #resolve: (value: T | PromiseLike<T>) => void = () => {};
  #reject: (reason?: unknown) => void = () => {};
  promise: Promise<T>;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.#resolve = resolve;
      this.#reject = reject;
    });
  }

  get isResolved(): boolean {
    return this.#isResolved;
  }

  get isRejected(): boolean {
    return this.#isRejected;
  }

  resolve(value: T): void {
    if (!this.#isResolved && !this.#isRejected) {
      this.#isResolved = true;
      this.#resolve(value);
    }
  }

  reject(reason?: unknown): void {
    if (!this.#isResolved && !this.#isRejected) {
      this.#isRejected = true;
      this.#reject(reason);
    }
  }
}

/** Let pending promise callbacks and timers of 0ms run. */
export function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

export function readFixture(name: string): JsonValue {
  const text = readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

export function tableUpdate(
  tableName: string,
  { inserts = [], deletes = [] }: { inserts?: string[]; deletes?: string[] },
  tableId: number = 4096
): TableUpdate {
  return {
    tableId,
    tableName,
    numRows: inserts.length + deletes.length,
    updates: [{ inserts, deletes }],
  };
}

export function identityToken(token: string = 'test-token'): ServerMessage {
  return ServerMessage.IdentityToken({
    identity: anIdentity,
    token,
    connectionId: aConnectionId,
  });
}

export function transactionUpdate({
  reducerName,
  requestId,
  status,
  args = '[]',
  callerIdentity = anIdentity,
  callerConnectionId = aConnectionId,
}: {
  reducerName: string;
  requestId: number;
  status: UpdateStatus;
  args?: string;
  callerIdentity?: Identity;
  callerConnectionId?: ConnectionId;
}): ServerMessage {
  return ServerMessage.TransactionUpdate({
    status,
    timestamp: new Timestamp(1_700_000_000_000_000n),
    callerIdentity,
    callerConnectionId,
    reducerCall: { reducerName, reducerId: 3, args, requestId },
    energyQuantaUsed: { quanta: 120n },
    totalHostExecutionDuration: new TimeDuration(250n),
  });
}
