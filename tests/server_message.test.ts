import { describe, expect, test } from 'vitest';
import {
  MalformedJsonError,
  MalformedMessageError,
  UnknownMessageVariantError,
  WrongMessageVariantError,
} from '../src/lib/errors';
import { TimeDuration } from '../src/lib/time_duration';
import {
  SERVER_MESSAGE_TAGS,
  ServerMessage,
  type ServerMessageTag,
  parseServerMessage,
} from '../src/sdk/client_api';
import {
  aConnectionId,
  anIdentity,
  identityToken,
  tableUpdate,
  transactionUpdate,
} from './utils';

const IDENTITY_HEX = '0x0000000000000000000000000000000000000000000000000000000000000069';

const personInsert = JSON.stringify({
  table_id: 4096,
  table_name: 'person',
  num_rows: 1,
  updates: [{ inserts: ['[1,"alice"]'], deletes: [] }],
});

describe('parseServerMessage', () => {
  test('IdentityToken', () => {
    const message = parseServerMessage(
      `{"IdentityToken":{"identity":{"__identity__":"${IDENTITY_HEX}"},"token":"test-token","connection_id":{"__connection_id__":42}}}`
    );
    const value = ServerMessage.expect(message, 'IdentityToken');
    expect(value.identity.isEqual(anIdentity)).toBe(true);
    expect(value.token).toBe('test-token');
    expect(value.connectionId.isEqual(aConnectionId)).toBe(true);
  });

  test('InitialSubscription', () => {
    const message = parseServerMessage(
      `{"InitialSubscription":{"database_update":{"tables":[${personInsert}]},"request_id":3,"total_host_execution_duration":{"__time_duration_micros__":250}}}`
    );
    expect(message).toEqual(
      ServerMessage.InitialSubscription({
        databaseUpdate: { tables: [tableUpdate('person', { inserts: ['[1,"alice"]'] })] },
        requestId: 3,
        totalHostExecutionDuration: new TimeDuration(250n),
      })
    );
  });

  test('TransactionUpdate with each status', () => {
    const text = (status: string) =>
      `{"TransactionUpdate":{"status":${status},` +
      '"timestamp":{"__timestamp_micros_since_unix_epoch__":1700000000000000},' +
      `"caller_identity":{"__identity__":"${IDENTITY_HEX}"},` +
      '"caller_connection_id":{"__connection_id__":42},' +
      '"reducer_call":{"reducer_name":"add","reducer_id":3,"args":"[]","request_id":7},' +
      '"energy_quanta_used":{"quanta":120},' +
      '"total_host_execution_duration":{"__time_duration_micros__":250}}}';

    expect(parseServerMessage(text('{"Failed":"boom"}'))).toEqual(
      transactionUpdate({
        reducerName: 'add',
        requestId: 7,
        status: { tag: 'Failed', value: 'boom' },
      })
    );
    expect(parseServerMessage(text('{"OutOfEnergy":[]}'))).toEqual(
      transactionUpdate({ reducerName: 'add', requestId: 7, status: { tag: 'OutOfEnergy' } })
    );
    expect(
      parseServerMessage(text(`{"Committed":{"tables":[${personInsert}]}}`))
    ).toEqual(
      transactionUpdate({
        reducerName: 'add',
        requestId: 7,
        status: {
          tag: 'Committed',
          value: { tables: [tableUpdate('person', { inserts: ['[1,"alice"]'] })] },
        },
      })
    );
  });

  test('TransactionUpdate with an unknown status', () => {
    const text =
      '{"TransactionUpdate":{"status":{"Weird":[]}}}';
    expect(() => parseServerMessage(text)).toThrow(
      'Unknown server message variant: UpdateStatus.Weird'
    );
  });

  test('TransactionUpdateLight', () => {
    const message = parseServerMessage(
      `{"TransactionUpdateLight":{"request_id":9,"update":{"tables":[${personInsert}]}}}`
    );
    expect(ServerMessage.asTransactionUpdateLight(message)).toEqual({
      requestId: 9,
      update: { tables: [tableUpdate('person', { inserts: ['[1,"alice"]'] })] },
    });
  });

  test('OneOffQueryResponse', () => {
    const message = parseServerMessage(
      '{"OneOffQueryResponse":{"message_id":"AQID","error":{"none":[]},' +
        '"tables":[{"table_name":"person","rows":["[1,\\"alice\\"]"]}],' +
        '"total_host_execution_duration":{"__time_duration_micros__":10}}}'
    );
    expect(ServerMessage.asOneOffQueryResponse(message)).toEqual({
      messageId: new Uint8Array([1, 2, 3]),
      error: undefined,
      tables: [{ tableName: 'person', rows: ['[1,"alice"]'] }],
      totalHostExecutionDuration: new TimeDuration(10n),
    });
  });

  test('OneOffQueryResponse with an error', () => {
    const message = parseServerMessage(
      '{"OneOffQueryResponse":{"message_id":"AQID","error":{"some":"no such table"},' +
        '"tables":[],"total_host_execution_duration":{"__time_duration_micros__":10}}}'
    );
    expect(ServerMessage.expect(message, 'OneOffQueryResponse').error).toBe('no such table');
  });

  test('SubscribeApplied and UnsubscribeApplied', () => {
    const body =
      '{"request_id":1,"total_host_execution_duration_micros":55,"query_id":{"id":2},' +
      `"rows":{"table_id":4096,"table_name":"person","table_rows":${personInsert}}}`;
    const expected = {
      requestId: 1,
      totalHostExecutionDurationMicros: 55n,
      queryId: { id: 2 },
      rows: {
        tableId: 4096,
        tableName: 'person',
        tableRows: tableUpdate('person', { inserts: ['[1,"alice"]'] }),
      },
    };
    expect(
      ServerMessage.asSubscribeApplied(parseServerMessage(`{"SubscribeApplied":${body}}`))
    ).toEqual(expected);
    expect(
      ServerMessage.asUnsubscribeApplied(parseServerMessage(`{"UnsubscribeApplied":${body}}`))
    ).toEqual(expected);
  });

  test('SubscribeMultiApplied and UnsubscribeMultiApplied', () => {
    const body =
      '{"request_id":1,"total_host_execution_duration_micros":55,"query_id":{"id":2},' +
      `"update":{"tables":[${personInsert}]}}`;
    const expected = {
      requestId: 1,
      totalHostExecutionDurationMicros: 55n,
      queryId: { id: 2 },
      update: { tables: [tableUpdate('person', { inserts: ['[1,"alice"]'] })] },
    };
    expect(
      ServerMessage.asSubscribeMultiApplied(
        parseServerMessage(`{"SubscribeMultiApplied":${body}}`)
      )
    ).toEqual(expected);
    expect(
      ServerMessage.asUnsubscribeMultiApplied(
        parseServerMessage(`{"UnsubscribeMultiApplied":${body}}`)
      )
    ).toEqual(expected);
  });

  test('SubscriptionError with and without ids', () => {
    const withIds = parseServerMessage(
      '{"SubscriptionError":{"total_host_execution_duration_micros":0,' +
        '"request_id":{"some":4},"query_id":5,"table_id":null,"error":"bad query"}}'
    );
    expect(ServerMessage.asSubscriptionError(withIds)).toEqual({
      totalHostExecutionDurationMicros: 0n,
      requestId: 4,
      queryId: 5,
      tableId: undefined,
      error: 'bad query',
    });

    const withoutIds = parseServerMessage(
      '{"SubscriptionError":{"total_host_execution_duration_micros":0,"error":"lagging"}}'
    );
    const value = ServerMessage.expect(withoutIds, 'SubscriptionError');
    expect(value.requestId).toBeUndefined();
    expect(value.queryId).toBeUndefined();
  });

  test('rows sent as JSON values are kept as JSON text', () => {
    const message = parseServerMessage(
      '{"TransactionUpdateLight":{"request_id":1,"update":{"tables":[' +
        '{"table_id":1,"table_name":"t","num_rows":1,"updates":[{"inserts":[[1,"a"]]}]}]}}}'
    );
    const { update } = ServerMessage.expect(message, 'TransactionUpdateLight');
    expect(update.tables[0].updates[0]).toEqual({ inserts: ['[1,"a"]'], deletes: [] });
  });

  test('entries wrapped as Uncompressed are unwrapped', () => {
    const message = parseServerMessage(
      '{"TransactionUpdateLight":{"request_id":1,"update":{"tables":[' +
        '{"table_id":1,"table_name":"t","num_rows":2,' +
        '"updates":[{"Uncompressed":{"inserts":["[2]"],"deletes":["[1]"]}}]}]}}}'
    );
    const { update } = ServerMessage.expect(message, 'TransactionUpdateLight');
    expect(update.tables[0].updates).toEqual([{ inserts: ['[2]'], deletes: ['[1]'] }]);
  });

  test('compressed entries are refused', () => {
    const text =
      '{"TransactionUpdateLight":{"request_id":1,"update":{"tables":[' +
      '{"table_id":1,"table_name":"t","num_rows":0,"updates":[{"Brotli":"AAAA"}]}]}}}';
    expect(() => parseServerMessage(text)).toThrow(MalformedMessageError);
    expect(() => parseServerMessage(text)).toThrow(
      'Expected an uncompressed table update at ' +
        '$.TransactionUpdateLight.update.tables[0].updates[0], got Brotli'
    );
  });

  test('rejects unknown variants', () => {
    expect(() => parseServerMessage('{"Bogus":{}}')).toThrow(UnknownMessageVariantError);
    expect(() => parseServerMessage('{"Bogus":{}}')).toThrow(
      'Unknown server message variant: Bogus'
    );
  });

  test('rejects payloads of the wrong shape', () => {
    expect(() =>
      parseServerMessage('{"TransactionUpdateLight":{"request_id":"one"}}')
    ).toThrow(MalformedMessageError);
    expect(() =>
      parseServerMessage('{"TransactionUpdateLight":{"request_id":"one"}}')
    ).toThrow('Expected a number at $.TransactionUpdateLight.request_id, got "one"');
  });

  test('rejects malformed JSON', () => {
    expect(() => parseServerMessage('{"IdentityToken"')).toThrow(MalformedJsonError);
  });
});

describe('ServerMessage.serialize', () => {
  test('writes snake_case keys', () => {
    expect(
      ServerMessage.serialize(
        ServerMessage.TransactionUpdateLight({
          requestId: 9,
          update: { tables: [tableUpdate('person', { deletes: ['[1]'] }, 7)] },
        })
      )
    ).toBe(
      '{"TransactionUpdateLight":{"request_id":9,"update":{"tables":[' +
        '{"table_id":7,"table_name":"person","num_rows":1,"updates":[{"inserts":[],"deletes":["[1]"]}]}]}}}'
    );
  });

  test('omits absent subscription error ids', () => {
    expect(
      ServerMessage.serialize(
        ServerMessage.SubscriptionError({
          totalHostExecutionDurationMicros: 0n,
          requestId: 5,
          error: 'bad',
        })
      )
    ).toBe(
      '{"SubscriptionError":{"total_host_execution_duration_micros":0,"request_id":5,"error":"bad"}}'
    );
  });

  test('writes one-off message ids as base64', () => {
    expect(
      ServerMessage.serialize(
        ServerMessage.OneOffQueryResponse({
          messageId: new Uint8Array([1, 2, 3]),
          tables: [{ tableName: 'person', rows: ['[1]'] }],
          totalHostExecutionDuration: new TimeDuration(10n),
        })
      )
    ).toBe(
      '{"OneOffQueryResponse":{"message_id":"AQID","tables":[{"table_name":"person","rows":["[1]"]}],' +
        '"total_host_execution_duration":{"__time_duration_micros__":10}}}'
    );
  });

  test('reads back what it writes', () => {
    const message = transactionUpdate({
      reducerName: 'add',
      requestId: 7,
      status: {
        tag: 'Committed',
        value: { tables: [tableUpdate('person', { inserts: ['[1,"alice"]'] })] },
      },
    });
    expect(parseServerMessage(ServerMessage.serialize(message))).toEqual(message);
    expect(parseServerMessage(ServerMessage.serialize(identityToken()))).toEqual(
      identityToken()
    );
  });
});

describe('ServerMessage accessors', () => {
  test('as returns the payload only for the matching variant', () => {
    const message = identityToken();
    expect(ServerMessage.asIdentityToken(message)?.token).toBe('test-token');
    expect(ServerMessage.asTransactionUpdate(message)).toBeUndefined();
    expect(ServerMessage.asInitialSubscription(message)).toBeUndefined();
  });

  test('expect throws for another variant', () => {
    expect(() => ServerMessage.expect(identityToken(), 'TransactionUpdate')).toThrow(
      WrongMessageVariantError
    );
    expect(() => ServerMessage.expect(identityToken(), 'TransactionUpdate')).toThrow(
      'Expected a TransactionUpdate message, got IdentityToken'
    );
  });

  test('lists every variant', () => {
    expect(SERVER_MESSAGE_TAGS).toHaveLength(10);
  });

  const applied = {
    requestId: 1,
    totalHostExecutionDurationMicros: 5n,
    queryId: { id: 2 },
  };
  const rows = {
    tableId: 4096,
    tableName: 'person',
    tableRows: tableUpdate('person', { inserts: ['[1,"alice"]'] }),
  };
  const oneOfEach: ServerMessage[] = [
    ServerMessage.InitialSubscription({
      databaseUpdate: { tables: [] },
      requestId: 1,
      totalHostExecutionDuration: new TimeDuration(5n),
    }),
    transactionUpdate({ reducerName: 'add', requestId: 1, status: { tag: 'OutOfEnergy' } }),
    ServerMessage.TransactionUpdateLight({ requestId: 1, update: { tables: [] } }),
    identityToken(),
    ServerMessage.OneOffQueryResponse({
      messageId: new Uint8Array([7]),
      tables: [],
      totalHostExecutionDuration: new TimeDuration(5n),
    }),
    ServerMessage.SubscribeApplied({ ...applied, rows }),
    ServerMessage.UnsubscribeApplied({ ...applied, rows }),
    ServerMessage.SubscriptionError({ totalHostExecutionDurationMicros: 5n, error: 'bad' }),
    ServerMessage.SubscribeMultiApplied({ ...applied, update: { tables: [] } }),
    ServerMessage.UnsubscribeMultiApplied({ ...applied, update: { tables: [] } }),
  ];
  const accessors: Record<ServerMessageTag, (message: ServerMessage) => unknown> = {
    InitialSubscription: ServerMessage.asInitialSubscription,
    TransactionUpdate: ServerMessage.asTransactionUpdate,
    TransactionUpdateLight: ServerMessage.asTransactionUpdateLight,
    IdentityToken: ServerMessage.asIdentityToken,
    OneOffQueryResponse: ServerMessage.asOneOffQueryResponse,
    SubscribeApplied: ServerMessage.asSubscribeApplied,
    UnsubscribeApplied: ServerMessage.asUnsubscribeApplied,
    SubscriptionError: ServerMessage.asSubscriptionError,
    SubscribeMultiApplied: ServerMessage.asSubscribeMultiApplied,
    UnsubscribeMultiApplied: ServerMessage.asUnsubscribeMultiApplied,
  };

  test.each(SERVER_MESSAGE_TAGS.map((tag, i): [ServerMessageTag, number] => [tag, i]))(
    'a parsed %s frame matches its own accessor and no other',
    (tag, i) => {
      const message = parseServerMessage(ServerMessage.serialize(oneOfEach[i]));
      expect(message.tag).toBe(tag);

      const matching = SERVER_MESSAGE_TAGS.filter(
        other => accessors[other](message) !== undefined
      );
      expect(matching).toEqual([tag]);
      expect(ServerMessage.as(message, tag)).toEqual(message.value);
    }
  );
});
