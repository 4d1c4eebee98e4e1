import { afterEach, describe, expect, test, vi } from 'vitest';
import { AlgebraicValue, BuiltinValue, ProductValue } from '../src/lib/algebraic_value';
import { AmbiguousSumTagError, TypeMismatchError } from '../src/lib/errors';
import { ModuleDef } from '../src/lib/schema';
import { TimeDuration } from '../src/lib/time_duration';
import { ServerMessage } from '../src/sdk/client_api/server_message';
import type { TableUpdate } from '../src/sdk/client_api/types';
import { ClientCache, type UpdateCause } from '../src/sdk/client_cache';
import { readFixture, tableUpdate, transactionUpdate } from './utils';

function initialSubscription(...tables: TableUpdate[]): ServerMessage {
  return ServerMessage.InitialSubscription({
    databaseUpdate: { tables },
    requestId: 0,
    totalHostExecutionDuration: new TimeDuration(0n),
  });
}

function multiApplied(
  tag: 'SubscribeMultiApplied' | 'UnsubscribeMultiApplied',
  queryId: number,
  ...tables: TableUpdate[]
): ServerMessage {
  const value = {
    requestId: queryId,
    totalHostExecutionDurationMicros: 0n,
    queryId: { id: queryId },
    update: { tables },
  };
  return tag === 'SubscribeMultiApplied'
    ? ServerMessage.SubscribeMultiApplied(value)
    : ServerMessage.UnsubscribeMultiApplied(value);
}

const alice = '[1,"alice"]';
const bob = '[2,"bob"]';

function person(id: number, name: string): AlgebraicValue {
  return new ProductValue([new BuiltinValue(id), new BuiltinValue(name)]);
}

describe('ClientCache', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('an initial subscription fills the tables and runs insert callbacks', () => {
    const cache = new ClientCache();
    const table = cache.getOrCreateTable('person');
    const inserted: [AlgebraicValue, UpdateCause][] = [];
    table.onInsert((row, cause) => inserted.push([row, cause]));

    expect(
      cache.applyMessage(initialSubscription(tableUpdate('person', { inserts: [alice, bob] })))
    ).toBe(true);

    expect(table.count()).toBe(2);
    expect([...table]).toEqual([person(1, 'alice'), person(2, 'bob')]);
    expect(inserted).toEqual([
      [person(1, 'alice'), { tag: 'SubscribeApplied' }],
      [person(2, 'bob'), { tag: 'SubscribeApplied' }],
    ]);
  });

  test('rows held by two subscriptions are counted, not duplicated', () => {
    const cache = new ClientCache();
    const table = cache.getOrCreateTable('person');
    const onInsert = vi.fn();
    const onDelete = vi.fn();
    table.onInsert(onInsert);
    table.onDelete(onDelete);

    cache.applyMessage(
      multiApplied('SubscribeMultiApplied', 1, tableUpdate('person', { inserts: [alice] }))
    );
    cache.applyMessage(
      multiApplied('SubscribeMultiApplied', 2, tableUpdate('person', { inserts: [alice] }))
    );
    expect(table.count()).toBe(1);
    expect(table.refCount(alice)).toBe(2);
    expect(onInsert).toHaveBeenCalledTimes(1);
    expect(onInsert).toHaveBeenCalledWith(person(1, 'alice'), {
      tag: 'SubscribeApplied',
      queryId: 1,
    });

    cache.applyMessage(
      multiApplied('UnsubscribeMultiApplied', 1, tableUpdate('person', { deletes: [alice] }))
    );
    expect(table.refCount(alice)).toBe(1);
    expect(onDelete).not.toHaveBeenCalled();

    cache.applyMessage(
      multiApplied('UnsubscribeMultiApplied', 2, tableUpdate('person', { deletes: [alice] }))
    );
    expect(table.count()).toBe(0);
    expect(onDelete).toHaveBeenCalledTimes(1);
    expect(onDelete).toHaveBeenCalledWith(person(1, 'alice'), {
      tag: 'UnsubscribeApplied',
      queryId: 2,
    });
  });

  test('deletes are applied before inserts, callbacks after both', () => {
    const cache = new ClientCache();
    cache.applyMessage(initialSubscription(tableUpdate('person', { inserts: [alice] })));
    const table = cache.getOrCreateTable('person');
    const events: string[] = [];
    table.onDelete(row => events.push(`delete ${AlgebraicValue.serialize(row)} (${table.count()})`));
    table.onInsert(row => events.push(`insert ${AlgebraicValue.serialize(row)} (${table.count()})`));

    const applied = cache.applyMessage(
      transactionUpdate({
        reducerName: 'rename',
        requestId: 1,
        status: {
          tag: 'Committed',
          value: {
            tables: [tableUpdate('person', { deletes: [alice], inserts: ['[1,"alicia"]'] })],
          },
        },
      })
    );

    expect(applied).toBe(true);
    expect(events).toEqual(['delete [1,"alice"] (1)', 'insert [1,"alicia"] (1)']);
    expect([...table]).toEqual([person(1, 'alicia')]);
  });

  test('a row deleted and reinserted in one update stays present', () => {
    const cache = new ClientCache();
    cache.applyMessage(initialSubscription(tableUpdate('person', { inserts: [alice] })));

    cache.applyMessage(
      ServerMessage.TransactionUpdateLight({
        requestId: 1,
        update: { tables: [tableUpdate('person', { deletes: [alice], inserts: [alice] })] },
      })
    );

    expect(cache.getTable('person')?.refCount(alice)).toBe(1);
  });

  test('transaction callbacks name the reducer', () => {
    const cache = new ClientCache();
    const onInsert = vi.fn();
    cache.getOrCreateTable('person').onInsert(onInsert);

    cache.applyMessage(
      transactionUpdate({
        reducerName: 'add',
        requestId: 1,
        status: {
          tag: 'Committed',
          value: { tables: [tableUpdate('person', { inserts: [bob] })] },
        },
      })
    );

    expect(onInsert).toHaveBeenCalledWith(person(2, 'bob'), {
      tag: 'Transaction',
      reducerName: 'add',
    });
  });

  test('a failed transaction leaves the cache as it was', () => {
    const cache = new ClientCache();
    cache.applyMessage(initialSubscription(tableUpdate('person', { inserts: [alice] })));

    expect(
      cache.applyMessage(
        transactionUpdate({
          reducerName: 'add',
          requestId: 1,
          status: { tag: 'Failed', value: 'name taken' },
        })
      )
    ).toBe(false);
    expect(cache.tableNames).toEqual(['person']);
    expect(cache.getTable('person')?.count()).toBe(1);
  });

  test('a row that does not decode leaves every table untouched', () => {
    const cache = new ClientCache();

    expect(() =>
      cache.applyMessage(
        initialSubscription(
          tableUpdate('person', { inserts: [alice] }),
          tableUpdate('message', { inserts: ['{}'] })
        )
      )
    ).toThrow(AmbiguousSumTagError);
    expect(cache.tableNames).toEqual([]);
  });

  test('deleting a row that is not present is ignored', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const cache = new ClientCache();
    const onDelete = vi.fn();
    cache.getOrCreateTable('person').onDelete(onDelete);

    cache.applyMessage(
      ServerMessage.TransactionUpdateLight({
        requestId: 1,
        update: { tables: [tableUpdate('person', { deletes: [bob] })] },
      })
    );

    expect(onDelete).not.toHaveBeenCalled();
    expect(cache.getTable('person')?.count()).toBe(0);
  });

  test('removed callbacks are not called', () => {
    const cache = new ClientCache();
    const onInsert = vi.fn();
    const table = cache.getOrCreateTable('person');
    table.onInsert(onInsert);
    table.removeOnInsert(onInsert);

    cache.applyMessage(initialSubscription(tableUpdate('person', { inserts: [alice] })));

    expect(onInsert).not.toHaveBeenCalled();
  });

  test('messages without rows do not touch the cache', () => {
    const cache = new ClientCache();
    expect(
      cache.applyMessage(
        ServerMessage.SubscriptionError({
          totalHostExecutionDurationMicros: 0n,
          error: 'bad query',
        })
      )
    ).toBe(false);
    expect(cache.tableNames).toEqual([]);
  });

  test('rows of tables in the module definition are decoded against their type', () => {
    const cache = new ClientCache(ModuleDef.fromJson(readFixture('module_def.json')));

    cache.applyMessage(
      initialSubscription(tableUpdate('person', { inserts: ['["7","carol",{"some":"caz"}]'] }))
    );

    expect([...(cache.getTable('person') ?? [])]).toEqual([
      new ProductValue([
        new BuiltinValue(7n),
        new BuiltinValue('carol'),
        AlgebraicValue.some(new BuiltinValue('caz')),
      ]),
    ]);
    expect(() => cache.decodeRow('person', '[1,"carol"]')).toThrow(TypeMismatchError);
    expect(cache.decodeRow('elsewhere', '[1]')).toEqual(
      new ProductValue([new BuiltinValue(1)])
    );
  });
});
