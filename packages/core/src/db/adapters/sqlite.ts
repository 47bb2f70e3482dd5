/**
 * SQLite backend on better-sqlite3.
 * The driver is synchronous, so queries are iterated in batches and the
 * stream gives the event loop a turn between them; that is where a cancel
 * request is noticed.
 */

import Database from 'better-sqlite3';
import { setImmediate as nextTurn } from 'node:timers/promises';
import {
  CatalogError,
  QueryError,
  cancelledError,
  catalogError,
  connectionError,
  errorMessage,
  queryError,
} from '../../errors.js';
import { decodeSqlite } from '../codec/sqlite.js';
import { Lane } from '../lane.js';
import { leadingKeyword, quoteIdent } from '../sql-check.js';
import type {
  Backend,
  ColumnDescriptor,
  ConnectOptions,
  ConnectionProfile,
  Credentials,
  DatabaseRef,
  ExecuteOptions,
  QueryEvent,
  QueryHandle,
  Row,
  RunningQuery,
  SchemaRef,
  Session,
  TableRef,
} from '../types.js';

interface DatabaseListRow {
  seq: number;
  name: string;
  file: string;
}

interface MasterRow {
  name: string;
  type: string;
}

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

export function mapSqliteCatalogError(err: unknown): CatalogError {
  if (err instanceof CatalogError) return err;
  const message = errorMessage(err);
  if (/no such table|unknown database/i.test(message)) return catalogError('not_found', message);
  if (/not authorized/i.test(message)) return catalogError('permission_denied', message);
  return catalogError('failed', message);
}

export function mapSqliteQueryError(err: unknown): QueryError {
  if (err instanceof QueryError) return err;
  const message = errorMessage(err);
  if (/syntax error|incomplete input/i.test(message)) return queryError('syntax', message);
  if (/interrupted/i.test(message)) return cancelledError();
  return queryError('runtime', message);
}

function guardQuery<T>(task: () => T): T {
  try {
    return task();
  } catch (err) {
    throw mapSqliteQueryError(err);
  }
}

export class SqliteSession implements Session {
  private readonly lane = new Lane();
  private readonly pending = new Set<number>();
  private readonly cancelRequested = new Set<number>();
  private readonly iterators = new Set<IterableIterator<unknown>>();
  private nextHandleId = 1;
  private closed = false;

  constructor(
    readonly profile: ConnectionProfile,
    private readonly db: Database.Database,
  ) {}

  listDatabases(): Promise<DatabaseRef[]> {
    return this.catalog(() =>
      this.db
        .prepare<[], DatabaseListRow>('PRAGMA database_list')
        .all()
        .map((row) => ({ name: row.name })),
    );
  }

  /** SQLite has no schemas inside a database; each database is its own single schema. */
  async listSchemas(database: DatabaseRef): Promise<SchemaRef[]> {
    const known = await this.listDatabases();
    if (!known.some((entry) => entry.name === database.name)) {
      throw catalogError('not_found', `unknown database ${database.name}`);
    }
    return [{ database: database.name, name: database.name, owner: null }];
  }

  listTables(schema: SchemaRef): Promise<TableRef[]> {
    return this.catalog(() =>
      this.db
        .prepare<[], MasterRow>(
          `SELECT name, type
           FROM ${quoteIdent(schema.database)}.sqlite_master
           WHERE type IN ('table', 'view')
             AND name NOT LIKE 'sqlite_%'
           ORDER BY name`,
        )
        .all()
        .map(
          (row): TableRef => ({
            database: schema.database,
            schema: schema.name,
            name: row.name,
            kind: row.type === 'view' ? 'view' : 'table',
            sizeLabel: null,
          }),
        ),
    );
  }

  listColumns(table: TableRef): Promise<ColumnDescriptor[]> {
    return this.catalog(() => {
      const rows = this.db
        .prepare<[], TableInfoRow>(`PRAGMA ${quoteIdent(table.database)}.table_info(${quoteIdent(table.name)})`)
        .all();
      if (rows.length === 0) {
        throw catalogError('not_found', `no such table: ${table.database}.${table.name}`);
      }
      return rows.map((row) => ({
        name: row.name,
        nativeType: row.type || 'ANY',
        nullable: row.notnull === 0 && row.pk === 0,
        ordinal: row.cid + 1,
        defaultValue: row.dflt_value,
        isPrimaryKey: row.pk > 0,
        description: null,
      }));
    });
  }

  tablePreviewSql(table: TableRef, limit: number): string {
    return `SELECT * FROM ${quoteIdent(table.database)}.${quoteIdent(table.name)} LIMIT ${limit}`;
  }

  executeQuery(sql: string, options: ExecuteOptions): RunningQuery {
    const handle: QueryHandle = { id: this.nextHandleId++ };
    this.pending.add(handle.id);
    return { handle, events: this.stream(handle, sql, options.batchSize) };
  }

  async cancel(handle: QueryHandle): Promise<boolean> {
    if (!this.pending.has(handle.id)) return false;
    this.cancelRequested.add(handle.id);
    return true;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    // An open iterator keeps the connection busy and close() would refuse.
    for (const iterator of this.iterators) {
      iterator.return?.();
    }
    this.iterators.clear();
    this.db.close();
  }

  private catalog<T>(task: () => T): Promise<T> {
    return this.lane.run(async () => {
      if (this.closed) throw catalogError('failed', 'Session is closed.');
      try {
        return task();
      } catch (err) {
        throw mapSqliteCatalogError(err);
      }
    });
  }

  private checkpoint(handle: QueryHandle): void {
    if (this.closed) throw queryError('runtime', 'Session is closed.');
    if (this.cancelRequested.has(handle.id)) throw cancelledError();
  }

  private async *stream(handle: QueryHandle, sql: string, batchSize: number): AsyncGenerator<QueryEvent> {
    const release = await this.lane.acquire();
    let iterator: IterableIterator<unknown> | null = null;
    try {
      this.checkpoint(handle);
      const stmt = guardQuery(() => this.db.prepare(sql));

      if (!stmt.reader) {
        const info = guardQuery(() => stmt.run());
        yield { type: 'complete', command: leadingKeyword(sql) || 'EXECUTE', rowsAffected: Number(info.changes) };
        return;
      }

      stmt.safeIntegers(true);
      stmt.raw(true);
      const definitions = stmt.columns();
      const columns: ColumnDescriptor[] = definitions.map((definition, index) => ({
        name: definition.name,
        nativeType: definition.type ?? '',
        nullable: true,
        ordinal: index + 1,
      }));
      yield { type: 'columns', columns };

      const opened = guardQuery(() => stmt.iterate());
      iterator = opened;
      this.iterators.add(opened);

      for (;;) {
        const batch: Row[] = [];
        while (batch.length < batchSize) {
          const next = guardQuery(() => opened.next());
          if (next.done) break;
          const cells: unknown[] = Array.isArray(next.value) ? next.value : [];
          batch.push(definitions.map((definition, index) => decodeSqlite(definition.type, cells[index])));
        }
        if (batch.length > 0) {
          yield { type: 'rows', rows: batch };
        }
        if (batch.length < batchSize) break;
        await nextTurn();
        this.checkpoint(handle);
      }
      yield { type: 'complete', command: leadingKeyword(sql) || 'SELECT', rowsAffected: null };
    } finally {
      if (iterator) {
        iterator.return?.();
        this.iterators.delete(iterator);
      }
      this.pending.delete(handle.id);
      this.cancelRequested.delete(handle.id);
      release();
    }
  }
}

export class SqliteBackend implements Backend {
  readonly kind = 'sqlite';
  readonly requiresCredentials = false;

  async connect(profile: ConnectionProfile, _credentials: Credentials, options: ConnectOptions): Promise<Session> {
    const filePath = profile.filePath?.trim();
    if (!filePath) {
      throw connectionError('rejected', `Profile "${profile.name}" has no SQLite file path.`);
    }
    let db: Database.Database;
    try {
      db = new Database(filePath, { fileMustExist: true, timeout: options.timeoutMs });
    } catch (err) {
      throw connectionError('rejected', `Cannot open ${filePath}: ${errorMessage(err)}`, { filePath });
    }
    return new SqliteSession(profile, db);
  }
}
