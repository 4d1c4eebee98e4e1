import type { ConnectionId } from '../../lib/connection_id';
import type { Identity } from '../../lib/identity';
import type { TimeDuration } from '../../lib/time_duration';
import type { Timestamp } from '../../lib/timestamp';

/** The sub-protocol this client speaks: JSON text frames. */
export const JSON_PROTOCOL = 'v1.json.spacetimedb';
/** The binary sub-protocol. Known, but not implemented by this client. */
export const BSATN_PROTOCOL = 'v1.bsatn.spacetimedb';

export type Protocol = typeof JSON_PROTOCOL | typeof BSATN_PROTOCOL;

export const CallReducerFlags = {
  /** The caller receives the full transaction update. */
  FullUpdate: 0,
  /** No update is sent back when the call succeeds. */
  NoSuccessNotify: 1,
} as const;

export type CallReducerFlags =
  (typeof CallReducerFlags)[keyof typeof CallReducerFlags];

/** A client-chosen id naming a subscription for its whole life. */
export type QueryId = { id: number };

// Client payloads

export type CallReducer = {
  reducer: string;
  /** JSON text of the positional argument array. */
  args: string;
  requestId: number;
  flags: CallReducerFlags;
};

export type Subscribe = {
  queryStrings: string[];
  requestId: number;
};

export type OneOffQuery = {
  messageId: Uint8Array;
  queryString: string;
};

export type SubscribeSingle = {
  query: string;
  requestId: number;
  queryId: QueryId;
};

export type SubscribeMulti = {
  queryStrings: string[];
  requestId: number;
  queryId: QueryId;
};

export type Unsubscribe = {
  requestId: number;
  queryId: QueryId;
};

export type UnsubscribeMulti = {
  requestId: number;
  queryId: QueryId;
};

// Server payloads

/**
 * One batch of row changes. Each row is the JSON text of the row value.
 */
export type TableUpdateEntry = {
  inserts: string[];
  deletes: string[];
};

export type TableUpdate = {
  tableId: number;
  tableName: string;
  numRows: number;
  updates: TableUpdateEntry[];
};

export type DatabaseUpdate = {
  tables: TableUpdate[];
};

export type UpdateStatus =
  | { tag: 'Committed'; value: DatabaseUpdate }
  | { tag: 'Failed'; value: string }
  | { tag: 'OutOfEnergy' };

export type ReducerCallInfo = {
  reducerName: string;
  reducerId: number;
  /** JSON text of the arguments the reducer was called with. */
  args: string;
  requestId: number;
};

export type EnergyQuanta = {
  quanta: bigint;
};

export type InitialSubscription = {
  databaseUpdate: DatabaseUpdate;
  requestId: number;
  totalHostExecutionDuration: TimeDuration;
};

export type TransactionUpdate = {
  status: UpdateStatus;
  timestamp: Timestamp;
  callerIdentity: Identity;
  callerConnectionId: ConnectionId;
  reducerCall: ReducerCallInfo;
  energyQuantaUsed: EnergyQuanta;
  totalHostExecutionDuration: TimeDuration;
};

export type TransactionUpdateLight = {
  requestId: number;
  update: DatabaseUpdate;
};

export type IdentityToken = {
  identity: Identity;
  token: string;
  connectionId: ConnectionId;
};

export type OneOffTable = {
  tableName: string;
  rows: string[];
};

export type OneOffQueryResponse = {
  messageId: Uint8Array;
  error?: string;
  tables: OneOffTable[];
  totalHostExecutionDuration: TimeDuration;
};

export type SubscribeRows = {
  tableId: number;
  tableName: string;
  tableRows: TableUpdate;
};

export type SubscribeApplied = {
  requestId: number;
  totalHostExecutionDurationMicros: bigint;
  queryId: QueryId;
  rows: SubscribeRows;
};

export type UnsubscribeApplied = {
  requestId: number;
  totalHostExecutionDurationMicros: bigint;
  queryId: QueryId;
  rows: SubscribeRows;
};

/**
 * A failed subscription. The ids are absent when the failure cannot be tied
 * to a single request or query; `tableId` is present only for failures in a
 * specific table's evaluation.
 */
export type SubscriptionError = {
  totalHostExecutionDurationMicros: bigint;
  requestId?: number;
  queryId?: number;
  tableId?: number;
  error: string;
};

export type SubscribeMultiApplied = {
  requestId: number;
  totalHostExecutionDurationMicros: bigint;
  queryId: QueryId;
  update: DatabaseUpdate;
};

export type UnsubscribeMultiApplied = {
  requestId: number;
  totalHostExecutionDurationMicros: bigint;
  queryId: QueryId;
  update: DatabaseUpdate;
};
