import { AlgebraicType } from '../lib/algebraic_type';
import { AlgebraicValue } from '../lib/algebraic_value';
import { ModuleDef, type RawModuleDef } from '../lib/schema';
import type { ServerMessage } from './client_api/server_message';
import type { DatabaseUpdate, TableUpdate } from './client_api/types';
import { EventEmitter } from './event_emitter';
import { clientLogger } from './logger';

/**
 * What caused rows to enter or leave the cache.
 */
export type UpdateCause =
  | { tag: 'SubscribeApplied'; queryId?: number }
  | { tag: 'UnsubscribeApplied'; queryId: number }
  | { tag: 'Transaction'; reducerName?: string };

export type RowCallback = (row: AlgebraicValue, cause: UpdateCause) => void;

export type PendingCallback = {
  type: 'insert' | 'delete';
  table: string;
  cb: () => void;
};

type TableEvents = {
  insert: [row: AlgebraicValue, cause: UpdateCause];
  delete: [row: AlgebraicValue, cause: UpdateCause];
};

// A decoded table update, ready to apply without failing halfway.
export type PreparedEntry = {
  deletes: string[];
  inserts: [rowId: string, row: AlgebraicValue][];
};

/**
 * The cached rows of one table. Rows are keyed by their JSON text and
 * reference counted, since overlapping subscriptions can each deliver the
 * same row.
 */
export class TableCache {
  readonly name: string;
  #rows = new Map<string, [AlgebraicValue, number]>();
  #emitter = new EventEmitter<TableEvents>();

  constructor(name: string) {
    this.name = name;
  }

  count(): number {
    return this.#rows.size;
  }

  /**
   * How many times the row with this JSON text is held, 0 if absent.
   */
  refCount(rowId: string): number {
    return this.#rows.get(rowId)?.[1] ?? 0;
  }

  *iter(): IterableIterator<AlgebraicValue> {
    for (const [row] of this.#rows.values()) {
      yield row;
    }
  }

  [Symbol.iterator](): IterableIterator<AlgebraicValue> {
    return this.iter();
  }

  onInsert(cb: RowCallback): void {
    this.#emitter.on('insert', cb);
  }

  removeOnInsert(cb: RowCallback): void {
    this.#emitter.off('insert', cb);
  }

  onDelete(cb: RowCallback): void {
    this.#emitter.on('delete', cb);
  }

  removeOnDelete(cb: RowCallback): void {
    this.#emitter.off('delete', cb);
  }

  applyEntries(entries: PreparedEntry[], cause: UpdateCause): PendingCallback[] {
    const pendingCallbacks: PendingCallback[] = [];
    for (const entry of entries) {
      for (const rowId of entry.deletes) {
        const maybeCb = this.delete(rowId, cause);
        if (maybeCb) {
          pendingCallbacks.push(maybeCb);
        }
      }
      for (const [rowId, row] of entry.inserts) {
        const maybeCb = this.insert(rowId, row, cause);
        if (maybeCb) {
          pendingCallbacks.push(maybeCb);
        }
      }
    }
    return pendingCallbacks;
  }

  insert(
    rowId: string,
    row: AlgebraicValue,
    cause: UpdateCause,
    count: number = 1
  ): PendingCallback | undefined {
    const previousCount = this.refCount(rowId);
    const stored = this.#rows.get(rowId)?.[0] ?? row;
    this.#rows.set(rowId, [stored, previousCount + count]);
    if (previousCount === 0) {
      return {
        type: 'insert',
        table: this.name,
        cb: () => {
          this.#emitter.emit('insert', stored, cause);
        },
      };
    }
    // Another subscription already holds this row.
    return undefined;
  }

  delete(rowId: string, cause: UpdateCause, count: number = 1): PendingCallback | undefined {
    const entry = this.#rows.get(rowId);
    if (!entry) {
      clientLogger('warn', () => `Deleting a row that was not present in table ${this.name}`);
      return undefined;
    }
    const [row, previousCount] = entry;
    if (previousCount <= count) {
      this.#rows.delete(rowId);
      return {
        type: 'delete',
        table: this.name,
        cb: () => {
          this.#emitter.emit('delete', row, cause);
        },
      };
    }
    this.#rows.set(rowId, [row, previousCount - count]);
    return undefined;
  }
}

/**
 * A materialized view of the subscribed rows, fed by snapshots and deltas.
 *
 * With a module definition, rows of the tables it describes are decoded
 * against their row type; every other row is decoded untyped.
 */
export class ClientCache {
  #tables = new Map<string, TableCache>();
  #moduleDef?: RawModuleDef;

  constructor(moduleDef?: RawModuleDef) {
    this.#moduleDef = moduleDef;
  }

  get tableNames(): string[] {
    return [...this.#tables.keys()];
  }

  getTable(name: string): TableCache | undefined {
    return this.#tables.get(name);
  }

  getOrCreateTable(name: string): TableCache {
    let table = this.#tables.get(name);
    if (!table) {
      table = new TableCache(name);
      this.#tables.set(name, table);
    }
    return table;
  }

  /**
   * Apply the row changes `message` carries, if any. A failed transaction
   * carries none and leaves the cache as it was. Returns whether the cache
   * was updated.
   */
  applyMessage(message: ServerMessage): boolean {
    switch (message.tag) {
      case 'InitialSubscription':
        this.applyDatabaseUpdate(message.value.databaseUpdate, { tag: 'SubscribeApplied' });
        return true;
      case 'TransactionUpdate': {
        const { status, reducerCall } = message.value;
        if (status.tag !== 'Committed') {
          return false;
        }
        this.applyDatabaseUpdate(status.value, {
          tag: 'Transaction',
          reducerName: reducerCall.reducerName,
        });
        return true;
      }
      case 'TransactionUpdateLight':
        this.applyDatabaseUpdate(message.value.update, { tag: 'Transaction' });
        return true;
      case 'SubscribeApplied':
        this.applyDatabaseUpdate(
          { tables: [message.value.rows.tableRows] },
          { tag: 'SubscribeApplied', queryId: message.value.queryId.id }
        );
        return true;
      case 'UnsubscribeApplied':
        this.applyDatabaseUpdate(
          { tables: [message.value.rows.tableRows] },
          { tag: 'UnsubscribeApplied', queryId: message.value.queryId.id }
        );
        return true;
      case 'SubscribeMultiApplied':
        this.applyDatabaseUpdate(message.value.update, {
          tag: 'SubscribeApplied',
          queryId: message.value.queryId.id,
        });
        return true;
      case 'UnsubscribeMultiApplied':
        this.applyDatabaseUpdate(message.value.update, {
          tag: 'UnsubscribeApplied',
          queryId: message.value.queryId.id,
        });
        return true;
      case 'IdentityToken':
      case 'OneOffQueryResponse':
      case 'SubscriptionError':
        return false;
    }
  }

  /**
   * Apply every table's changes, then run the insert and delete callbacks.
   * All rows are decoded before anything changes, so a row that does not
   * decode leaves the cache untouched.
   */
  applyDatabaseUpdate(update: DatabaseUpdate, cause: UpdateCause): void {
    const prepared = update.tables.map(
      (tableUpdate): [string, PreparedEntry[]] => [
        tableUpdate.tableName,
        this.#prepare(tableUpdate),
      ]
    );
    const pendingCallbacks = prepared.flatMap(([tableName, entries]) =>
      this.getOrCreateTable(tableName).applyEntries(entries, cause)
    );
    clientLogger(
      'debug',
      () => `Applied update to ${prepared.length} table(s), ${pendingCallbacks.length} callback(s)`
    );
    for (const callback of pendingCallbacks) {
      callback.cb();
    }
  }

  /**
   * Decode one row of `tableName`.
   */
  decodeRow(tableName: string, rowText: string): AlgebraicValue {
    const rowType = this.#moduleDef && ModuleDef.rowType(this.#moduleDef, tableName);
    if (this.#moduleDef && rowType) {
      return AlgebraicValue.deserializeTyped(
        rowText,
        AlgebraicType.Product(rowType),
        this.#moduleDef.typespace
      );
    }
    return AlgebraicValue.deserialize(rowText);
  }

  #prepare(tableUpdate: TableUpdate): PreparedEntry[] {
    return tableUpdate.updates.map(entry => ({
      deletes: entry.deletes,
      inserts: entry.inserts.map((rowText): [string, AlgebraicValue] => [
        rowText,
        this.decodeRow(tableUpdate.tableName, rowText),
      ]),
    }));
  }
}
