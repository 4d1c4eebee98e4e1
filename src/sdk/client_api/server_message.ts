import { ConnectionId } from '../../lib/connection_id';
import {
  MalformedMessageError,
  UnknownMessageVariantError,
  WrongMessageVariantError,
} from '../../lib/errors';
import { Identity } from '../../lib/identity';
import {
  isJsonObject,
  parseJson,
  stringifyJson,
  type JsonObject,
  type JsonValue,
} from '../../lib/json';
import { bytesToBase64, JsonReader } from '../../lib/json_reader';
import { TimeDuration } from '../../lib/time_duration';
import { Timestamp } from '../../lib/timestamp';
import type {
  DatabaseUpdate,
  IdentityToken,
  InitialSubscription,
  OneOffQueryResponse,
  OneOffTable,
  QueryId,
  ReducerCallInfo,
  SubscribeApplied,
  SubscribeMultiApplied,
  SubscribeRows,
  SubscriptionError,
  TableUpdate,
  TableUpdateEntry,
  TransactionUpdate,
  TransactionUpdateLight,
  UnsubscribeApplied,
  UnsubscribeMultiApplied,
  UpdateStatus,
} from './types';

/**
 * Every message a server can send, tagged by its variant name.
 */
export type ServerMessage =
  | { tag: 'InitialSubscription'; value: InitialSubscription }
  | { tag: 'TransactionUpdate'; value: TransactionUpdate }
  | { tag: 'TransactionUpdateLight'; value: TransactionUpdateLight }
  | { tag: 'IdentityToken'; value: IdentityToken }
  | { tag: 'OneOffQueryResponse'; value: OneOffQueryResponse }
  | { tag: 'SubscribeApplied'; value: SubscribeApplied }
  | { tag: 'UnsubscribeApplied'; value: UnsubscribeApplied }
  | { tag: 'SubscriptionError'; value: SubscriptionError }
  | { tag: 'SubscribeMultiApplied'; value: SubscribeMultiApplied }
  | { tag: 'UnsubscribeMultiApplied'; value: UnsubscribeMultiApplied };

export type ServerMessageTag = ServerMessage['tag'];

export type ServerMessageOf<T extends ServerMessageTag> = Extract<
  ServerMessage,
  { tag: T }
>;

export const SERVER_MESSAGE_TAGS: readonly ServerMessageTag[] = [
  'InitialSubscription',
  'TransactionUpdate',
  'TransactionUpdateLight',
  'IdentityToken',
  'OneOffQueryResponse',
  'SubscribeApplied',
  'UnsubscribeApplied',
  'SubscriptionError',
  'SubscribeMultiApplied',
  'UnsubscribeMultiApplied',
];

// Decoding

/** Rows are carried as JSON text; a row sent as a JSON value is re-encoded. */
function readRow(reader: JsonReader): string {
  const value = reader.value;
  return typeof value === 'string' ? value : stringifyJson(value);
}

function readRows(reader: JsonReader | undefined): string[] {
  return reader ? reader.asArray().map(readRow) : [];
}

function readTableUpdateEntry(reader: JsonReader): TableUpdateEntry {
  // Older servers wrap each entry as `{"Uncompressed": {...}}`.
  let entry = reader;
  if (isJsonObject(reader.value)) {
    const keys = Object.keys(reader.value);
    if (keys.length === 1 && keys[0] === 'Uncompressed') {
      entry = reader.field('Uncompressed');
    } else if (keys.length === 1 && (keys[0] === 'Brotli' || keys[0] === 'Gzip')) {
      throw new MalformedMessageError(reader.path, 'an uncompressed table update', keys[0]);
    }
  }
  return {
    inserts: readRows(entry.optionalField('inserts')),
    deletes: readRows(entry.optionalField('deletes')),
  };
}

function readTableUpdate(reader: JsonReader): TableUpdate {
  return {
    tableId: reader.field('table_id').asU32(),
    tableName: reader.field('table_name').asString(),
    numRows: Number(reader.field('num_rows').asU64()),
    updates: reader.optionalField('updates')?.asArray().map(readTableUpdateEntry) ?? [],
  };
}

function readDatabaseUpdate(reader: JsonReader): DatabaseUpdate {
  return {
    tables: reader.field('tables').asArray().map(readTableUpdate),
  };
}

function readQueryId(reader: JsonReader): QueryId {
  return { id: reader.field('id').asU32() };
}

function readUpdateStatus(reader: JsonReader): UpdateStatus {
  const [tag, payload] = reader.asTagged();
  switch (tag) {
    case 'Committed':
      return { tag: 'Committed', value: readDatabaseUpdate(payload) };
    case 'Failed':
      return { tag: 'Failed', value: payload.asString() };
    case 'OutOfEnergy':
      return { tag: 'OutOfEnergy' };
    default:
      throw new UnknownMessageVariantError(`UpdateStatus.${tag}`, 'server');
  }
}

function readReducerCall(reader: JsonReader): ReducerCallInfo {
  return {
    reducerName: reader.field('reducer_name').asString(),
    reducerId: reader.field('reducer_id').asU32(),
    args: readRow(reader.field('args')),
    requestId: reader.field('request_id').asU32(),
  };
}

function readSubscribeRows(reader: JsonReader): SubscribeRows {
  return {
    tableId: reader.field('table_id').asU32(),
    tableName: reader.field('table_name').asString(),
    tableRows: readTableUpdate(reader.field('table_rows')),
  };
}

function readOneOffTable(reader: JsonReader): OneOffTable {
  return {
    tableName: reader.field('table_name').asString(),
    rows: readRows(reader.field('rows')),
  };
}

function readOptionalU32(reader: JsonReader, name: string): number | undefined {
  return reader.optionalField(name)?.asOption(r => r.asU32());
}

function readAppliedHeader(reader: JsonReader): {
  requestId: number;
  totalHostExecutionDurationMicros: bigint;
  queryId: QueryId;
} {
  return {
    requestId: reader.field('request_id').asU32(),
    totalHostExecutionDurationMicros: reader
      .field('total_host_execution_duration_micros')
      .asU64(),
    queryId: readQueryId(reader.field('query_id')),
  };
}

// Encoding

function tableUpdateEntryToJson(entry: TableUpdateEntry): JsonObject {
  return { inserts: entry.inserts, deletes: entry.deletes };
}

function tableUpdateToJson(update: TableUpdate): JsonObject {
  return {
    table_id: update.tableId,
    table_name: update.tableName,
    num_rows: update.numRows,
    updates: update.updates.map(tableUpdateEntryToJson),
  };
}

function databaseUpdateToJson(update: DatabaseUpdate): JsonObject {
  return { tables: update.tables.map(tableUpdateToJson) };
}

function updateStatusToJson(status: UpdateStatus): JsonObject {
  switch (status.tag) {
    case 'Committed':
      return { Committed: databaseUpdateToJson(status.value) };
    case 'Failed':
      return { Failed: status.value };
    case 'OutOfEnergy':
      return { OutOfEnergy: [] };
  }
}

function subscribeRowsToJson(rows: SubscribeRows): JsonObject {
  return {
    table_id: rows.tableId,
    table_name: rows.tableName,
    table_rows: tableUpdateToJson(rows.tableRows),
  };
}

function appliedHeaderToJson(value: {
  requestId: number;
  totalHostExecutionDurationMicros: bigint;
  queryId: QueryId;
}): JsonObject {
  return {
    request_id: value.requestId,
    total_host_execution_duration_micros: value.totalHostExecutionDurationMicros,
    query_id: { id: value.queryId.id },
  };
}

function payloadToJson(message: ServerMessage): JsonObject {
  switch (message.tag) {
    case 'InitialSubscription':
      return {
        database_update: databaseUpdateToJson(message.value.databaseUpdate),
        request_id: message.value.requestId,
        total_host_execution_duration: message.value.totalHostExecutionDuration.toJson(),
      };
    case 'TransactionUpdate': {
      const v = message.value;
      return {
        status: updateStatusToJson(v.status),
        timestamp: v.timestamp.toJson(),
        caller_identity: v.callerIdentity.toJson(),
        caller_connection_id: v.callerConnectionId.toJson(),
        reducer_call: {
          reducer_name: v.reducerCall.reducerName,
          reducer_id: v.reducerCall.reducerId,
          args: v.reducerCall.args,
          request_id: v.reducerCall.requestId,
        },
        energy_quanta_used: { quanta: v.energyQuantaUsed.quanta },
        total_host_execution_duration: v.totalHostExecutionDuration.toJson(),
      };
    }
    case 'TransactionUpdateLight':
      return {
        request_id: message.value.requestId,
        update: databaseUpdateToJson(message.value.update),
      };
    case 'IdentityToken':
      return {
        identity: message.value.identity.toJson(),
        token: message.value.token,
        connection_id: message.value.connectionId.toJson(),
      };
    case 'OneOffQueryResponse': {
      const v = message.value;
      const json: JsonObject = { message_id: bytesToBase64(v.messageId) };
      if (v.error !== undefined) json.error = v.error;
      json.tables = v.tables.map(t => ({ table_name: t.tableName, rows: t.rows }));
      json.total_host_execution_duration = v.totalHostExecutionDuration.toJson();
      return json;
    }
    case 'SubscribeApplied':
    case 'UnsubscribeApplied':
      return {
        ...appliedHeaderToJson(message.value),
        rows: subscribeRowsToJson(message.value.rows),
      };
    case 'SubscriptionError': {
      const v = message.value;
      const json: JsonObject = {
        total_host_execution_duration_micros: v.totalHostExecutionDurationMicros,
      };
      if (v.requestId !== undefined) json.request_id = v.requestId;
      if (v.queryId !== undefined) json.query_id = v.queryId;
      if (v.tableId !== undefined) json.table_id = v.tableId;
      json.error = v.error;
      return json;
    }
    case 'SubscribeMultiApplied':
    case 'UnsubscribeMultiApplied':
      return {
        ...appliedHeaderToJson(message.value),
        update: databaseUpdateToJson(message.value.update),
      };
  }
}

function isTag<T extends ServerMessageTag>(
  message: ServerMessage,
  tag: T
): message is ServerMessageOf<T> {
  return message.tag === tag;
}

export const ServerMessage = {
  InitialSubscription: (value: InitialSubscription): ServerMessage => ({
    tag: 'InitialSubscription',
    value,
  }),
  TransactionUpdate: (value: TransactionUpdate): ServerMessage => ({
    tag: 'TransactionUpdate',
    value,
  }),
  TransactionUpdateLight: (value: TransactionUpdateLight): ServerMessage => ({
    tag: 'TransactionUpdateLight',
    value,
  }),
  IdentityToken: (value: IdentityToken): ServerMessage => ({
    tag: 'IdentityToken',
    value,
  }),
  OneOffQueryResponse: (value: OneOffQueryResponse): ServerMessage => ({
    tag: 'OneOffQueryResponse',
    value,
  }),
  SubscribeApplied: (value: SubscribeApplied): ServerMessage => ({
    tag: 'SubscribeApplied',
    value,
  }),
  UnsubscribeApplied: (value: UnsubscribeApplied): ServerMessage => ({
    tag: 'UnsubscribeApplied',
    value,
  }),
  SubscriptionError: (value: SubscriptionError): ServerMessage => ({
    tag: 'SubscriptionError',
    value,
  }),
  SubscribeMultiApplied: (value: SubscribeMultiApplied): ServerMessage => ({
    tag: 'SubscribeMultiApplied',
    value,
  }),
  UnsubscribeMultiApplied: (value: UnsubscribeMultiApplied): ServerMessage => ({
    tag: 'UnsubscribeMultiApplied',
    value,
  }),

  toJson(message: ServerMessage): JsonObject {
    return { [message.tag]: payloadToJson(message) };
  },

  fromJson(json: JsonValue): ServerMessage {
    return ServerMessage.fromReader(new JsonReader(json));
  },

  fromReader(reader: JsonReader): ServerMessage {
    const [tag, p] = reader.asTagged();
    switch (tag) {
      case 'InitialSubscription':
        return ServerMessage.InitialSubscription({
          databaseUpdate: readDatabaseUpdate(p.field('database_update')),
          requestId: p.field('request_id').asU32(),
          totalHostExecutionDuration: TimeDuration.fromReader(
            p.field('total_host_execution_duration')
          ),
        });
      case 'TransactionUpdate':
        return ServerMessage.TransactionUpdate({
          status: readUpdateStatus(p.field('status')),
          timestamp: Timestamp.fromReader(p.field('timestamp')),
          callerIdentity: Identity.fromReader(p.field('caller_identity')),
          callerConnectionId: ConnectionId.fromReader(p.field('caller_connection_id')),
          reducerCall: readReducerCall(p.field('reducer_call')),
          energyQuantaUsed: {
            quanta: p.field('energy_quanta_used').field('quanta').asBigInt(),
          },
          totalHostExecutionDuration: TimeDuration.fromReader(
            p.field('total_host_execution_duration')
          ),
        });
      case 'TransactionUpdateLight':
        return ServerMessage.TransactionUpdateLight({
          requestId: p.field('request_id').asU32(),
          update: readDatabaseUpdate(p.field('update')),
        });
      case 'IdentityToken':
        return ServerMessage.IdentityToken({
          identity: Identity.fromReader(p.field('identity')),
          token: p.field('token').asString(),
          connectionId: ConnectionId.fromReader(p.field('connection_id')),
        });
      case 'OneOffQueryResponse':
        return ServerMessage.OneOffQueryResponse({
          messageId: p.field('message_id').asBytes(),
          error: p.optionalField('error')?.asOption(r => r.asString()),
          tables: p.field('tables').asArray().map(readOneOffTable),
          totalHostExecutionDuration: TimeDuration.fromReader(
            p.field('total_host_execution_duration')
          ),
        });
      case 'SubscribeApplied':
        return ServerMessage.SubscribeApplied({
          ...readAppliedHeader(p),
          rows: readSubscribeRows(p.field('rows')),
        });
      case 'UnsubscribeApplied':
        return ServerMessage.UnsubscribeApplied({
          ...readAppliedHeader(p),
          rows: readSubscribeRows(p.field('rows')),
        });
      case 'SubscriptionError':
        return ServerMessage.SubscriptionError({
          totalHostExecutionDurationMicros: p
            .field('total_host_execution_duration_micros')
            .asU64(),
          requestId: readOptionalU32(p, 'request_id'),
          queryId: readOptionalU32(p, 'query_id'),
          tableId: readOptionalU32(p, 'table_id'),
          error: p.field('error').asString(),
        });
      case 'SubscribeMultiApplied':
        return ServerMessage.SubscribeMultiApplied({
          ...readAppliedHeader(p),
          update: readDatabaseUpdate(p.field('update')),
        });
      case 'UnsubscribeMultiApplied':
        return ServerMessage.UnsubscribeMultiApplied({
          ...readAppliedHeader(p),
          update: readDatabaseUpdate(p.field('update')),
        });
      default:
        throw new UnknownMessageVariantError(tag, 'server');
    }
  },

  serialize(message: ServerMessage): string {
    return stringifyJson(ServerMessage.toJson(message));
  },

  deserialize(text: string): ServerMessage {
    return ServerMessage.fromJson(parseJson(text));
  },

  /**
   * The payload of `message` if it is a `tag` message, otherwise `undefined`.
   */
  as<T extends ServerMessageTag>(
    message: ServerMessage,
    tag: T
  ): ServerMessageOf<T>['value'] | undefined {
    return isTag(message, tag) ? message.value : undefined;
  },

  /**
   * The payload of `message`, which must be a `tag` message.
   */
  expect<T extends ServerMessageTag>(
    message: ServerMessage,
    tag: T
  ): ServerMessageOf<T>['value'] {
    if (!isTag(message, tag)) {
      throw new WrongMessageVariantError(tag, message.tag);
    }
    return message.value;
  },

  asInitialSubscription(message: ServerMessage): InitialSubscription | undefined {
    return ServerMessage.as(message, 'InitialSubscription');
  },
  asTransactionUpdate(message: ServerMessage): TransactionUpdate | undefined {
    return ServerMessage.as(message, 'TransactionUpdate');
  },
  asTransactionUpdateLight(message: ServerMessage): TransactionUpdateLight | undefined {
    return ServerMessage.as(message, 'TransactionUpdateLight');
  },
  asIdentityToken(message: ServerMessage): IdentityToken | undefined {
    return ServerMessage.as(message, 'IdentityToken');
  },
  asOneOffQueryResponse(message: ServerMessage): OneOffQueryResponse | undefined {
    return ServerMessage.as(message, 'OneOffQueryResponse');
  },
  asSubscribeApplied(message: ServerMessage): SubscribeApplied | undefined {
    return ServerMessage.as(message, 'SubscribeApplied');
  },
  asUnsubscribeApplied(message: ServerMessage): UnsubscribeApplied | undefined {
    return ServerMessage.as(message, 'UnsubscribeApplied');
  },
  asSubscriptionError(message: ServerMessage): SubscriptionError | undefined {
    return ServerMessage.as(message, 'SubscriptionError');
  },
  asSubscribeMultiApplied(message: ServerMessage): SubscribeMultiApplied | undefined {
    return ServerMessage.as(message, 'SubscribeMultiApplied');
  },
  asUnsubscribeMultiApplied(
    message: ServerMessage
  ): UnsubscribeMultiApplied | undefined {
    return ServerMessage.as(message, 'UnsubscribeMultiApplied');
  },
};

/**
 * Decode one server frame. Fails with a decode error for malformed JSON, an
 * unknown variant or a payload of the wrong shape; the error concerns this
 * frame only.
 */
export function parseServerMessage(text: string): ServerMessage {
  return ServerMessage.deserialize(text);
}
