/**
 * Postgres backend.
 * Uses the `pg` driver with every column requested as raw text; the codec
 * decodes by type OID. Row-returning statements stream through a
 * server-side cursor.
 */

import pg from 'pg';
import {
  CatalogError,
  ConnectionError,
  QueryError,
  cancelledError,
  catalogError,
  connectionError,
  errorCode,
  errorMessage,
  queryError,
} from '../../errors.js';
import { decodePg, knownPgOids, pgTypeName } from '../codec/postgres.js';
import { Lane } from '../lane.js';
import { quoteIdent, returnsRows, stripTrailingSemicolons } from '../sql-check.js';
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

const { Client } = pg;

export interface PgConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  connectionTimeoutMillis: number;
}

export interface PgField {
  name: string;
  dataTypeID: number;
}

export interface PgResult {
  fields: PgField[];
  /** Row mode "array": one entry per field */
  rows: unknown[][];
  command: string;
  rowCount: number | null;
}

/** The slice of pg.Client this backend needs; tests substitute their own */
export interface PgClientLike {
  connect(): Promise<void>;
  query(text: string, values?: unknown[]): Promise<PgResult>;
  end(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type PgClientFactory = (config: PgConnectionConfig) => PgClientLike;

export interface PostgresBackendOptions {
  clientFactory?: PgClientFactory;
  /** Non-fatal cleanup problems (a close that failed, a cancel that could not be sent) */
  onWarning?: (message: string) => void;
}

const CANCEL_CONNECT_TIMEOUT_MS = 5_000;

const AUTH_CODES = new Set(['28P01', '28000']);
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'ECONNRESET']);
const NOT_FOUND_CODES = new Set(['3D000', '42P01', '3F000']);

function rawText(value: string): string {
  return value;
}

/**
 * Default factory: a real pg.Client that hands back every registered type
 * as the text the server sent.
 */
export function createPgClient(config: PgConnectionConfig): PgClientLike {
  const client = new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });
  for (const oid of knownPgOids()) {
    client.setTypeParser(oid, rawText);
  }

  return {
    connect: () => client.connect(),
    async query(text, values = []) {
      const result = await client.query({ text, values, rowMode: 'array' });
      return {
        fields: result.fields.map((field) => ({ name: field.name, dataTypeID: field.dataTypeID })),
        rows: result.rows,
        command: result.command,
        rowCount: result.rowCount,
      };
    },
    end: () => client.end(),
    on: (event, listener) => client.on(event, listener),
  };
}

export function mapConnectError(err: unknown): ConnectionError {
  if (err instanceof ConnectionError) return err;
  const code = errorCode(err);
  const message = errorMessage(err);
  if (code && AUTH_CODES.has(code)) {
    return connectionError('auth_failed', `Authentication failed: ${message}`, { code });
  }
  if (code && NETWORK_CODES.has(code)) {
    return connectionError('network_unreachable', `Server unreachable: ${message}`, { code });
  }
  if (/timeout/i.test(message)) {
    return connectionError('timeout', `Connection timed out: ${message}`);
  }
  return connectionError('rejected', message, code ? { code } : undefined);
}

export function mapCatalogError(err: unknown): CatalogError {
  if (err instanceof CatalogError) return err;
  const code = errorCode(err);
  const message = errorMessage(err);
  if (code === '42501') return catalogError('permission_denied', message, { code });
  if (code && NOT_FOUND_CODES.has(code)) return catalogError('not_found', message, { code });
  return catalogError('failed', message, code ? { code } : undefined);
}

export function mapQueryError(err: unknown): QueryError {
  if (err instanceof QueryError) return err;
  const code = errorCode(err);
  const message = errorMessage(err);
  if (code === '42601') return queryError('syntax', message, { code });
  if (code === '57014') return cancelledError();
  return queryError('runtime', message, code ? { code } : undefined);
}

function text(row: unknown[], index: number): string | null {
  const value = row[index];
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : String(value);
}

function describeFields(fields: PgField[]): ColumnDescriptor[] {
  return fields.map((field, index) => ({
    name: field.name,
    nativeType: pgTypeName(field.dataTypeID),
    nullable: true,
    ordinal: index + 1,
  }));
}

function decodeRows(fields: PgField[], rows: unknown[][]): Row[] {
  return rows.map((row) => fields.map((field, index) => decodePg(field.dataTypeID, text(row, index))));
}

interface Connection {
  client: PgClientLike;
  database: string;
  pid: number;
  broken: Error | null;
}

export class PostgresSession implements Session {
  private readonly lane = new Lane();
  private readonly secondary = new Map<string, Promise<Connection>>();
  private readonly pending = new Set<number>();
  private readonly cancelRequested = new Set<number>();
  private active: { id: number; pid: number } | null = null;
  private nextHandleId = 1;
  private closed = false;

  private constructor(
    readonly profile: ConnectionProfile,
    private readonly config: PgConnectionConfig,
    private readonly primary: Connection,
    private readonly factory: PgClientFactory,
    private readonly warn: (message: string) => void,
  ) {}

  static async open(
    profile: ConnectionProfile,
    config: PgConnectionConfig,
    factory: PgClientFactory,
    warn: (message: string) => void,
  ): Promise<PostgresSession> {
    const primary = await openConnection(factory, config);
    return new PostgresSession(profile, config, primary, factory, warn);
  }

  async listDatabases(): Promise<DatabaseRef[]> {
    const result = await this.catalog(
      this.config.database,
      `SELECT datname
       FROM pg_database
       WHERE NOT datistemplate AND datallowconn
       ORDER BY datname`,
    );
    return result.rows.flatMap((row) => {
      const name = text(row, 0);
      return name === null ? [] : [{ name }];
    });
  }

  async listSchemas(database: DatabaseRef): Promise<SchemaRef[]> {
    const result = await this.catalog(
      database.name,
      `SELECT schema_name, schema_owner
       FROM information_schema.schemata
       WHERE schema_name NOT IN ('information_schema', 'pg_catalog', 'pg_toast')
         AND schema_name NOT LIKE 'pg_temp_%'
         AND schema_name NOT LIKE 'pg_toast_temp_%'
       ORDER BY schema_name`,
    );
    return result.rows.flatMap((row) => {
      const name = text(row, 0);
      return name === null ? [] : [{ database: database.name, name, owner: text(row, 1) }];
    });
  }

  async listTables(schema: SchemaRef): Promise<TableRef[]> {
    const result = await this.catalog(
      schema.database,
      `SELECT t.table_name,
              t.table_type,
              pg_size_pretty(pg_total_relation_size(format('%I.%I', t.table_schema, t.table_name)::regclass))
       FROM information_schema.tables t
       WHERE t.table_schema = $1
       ORDER BY t.table_name`,
      [schema.name],
    );
    return result.rows.flatMap((row): TableRef[] => {
      const name = text(row, 0);
      if (name === null) return [];
      return [
        {
          database: schema.database,
          schema: schema.name,
          name,
          kind: text(row, 1) === 'VIEW' ? 'view' : 'table',
          sizeLabel: text(row, 2),
        },
      ];
    });
  }

  async listColumns(table: TableRef): Promise<ColumnDescriptor[]> {
    const result = await this.catalog(
      table.database,
      `SELECT c.column_name,
              (SELECT format_type(a.atttypid, a.atttypmod)
               FROM pg_attribute a
               WHERE a.attrelid = format('%I.%I', c.table_schema, c.table_name)::regclass
                 AND a.attname = c.column_name) AS data_type,
              c.is_nullable,
              c.ordinal_position,
              c.column_default,
              EXISTS (
                SELECT 1
                FROM information_schema.table_constraints tc
                JOIN information_schema.key_column_usage ku
                  ON tc.constraint_name = ku.constraint_name
                 AND tc.table_schema = ku.table_schema
                 AND tc.table_name = ku.table_name
                WHERE tc.constraint_type = 'PRIMARY KEY'
                  AND tc.table_schema = c.table_schema
                  AND tc.table_name = c.table_name
                  AND ku.column_name = c.column_name
              ) AS is_pk,
              col_description(format('%I.%I', c.table_schema, c.table_name)::regclass, c.ordinal_position::int)
       FROM information_schema.columns c
       WHERE c.table_schema = $1 AND c.table_name = $2
       ORDER BY c.ordinal_position`,
      [table.schema, table.name],
    );
    if (result.rows.length === 0) {
      throw catalogError('not_found', `Table ${table.schema}.${table.name} not found or has no visible columns.`);
    }
    return result.rows.flatMap((row, index): ColumnDescriptor[] => {
      const name = text(row, 0);
      if (name === null) return [];
      return [
        {
          name,
          nativeType: text(row, 1) ?? 'unknown',
          nullable: text(row, 2) === 'YES',
          ordinal: Number(text(row, 3) ?? index + 1),
          defaultValue: text(row, 4),
          isPrimaryKey: text(row, 5) === 't',
          description: text(row, 6),
        },
      ];
    });
  }

  tablePreviewSql(table: TableRef, limit: number): string {
    return `SELECT * FROM ${quoteIdent(table.schema)}.${quoteIdent(table.name)} LIMIT ${limit}`;
  }

  executeQuery(sql: string, options: ExecuteOptions): RunningQuery {
    const handle: QueryHandle = { id: this.nextHandleId++ };
    this.pending.add(handle.id);
    return { handle, events: this.stream(handle, sql, options) };
  }

  async cancel(handle: QueryHandle): Promise<boolean> {
    if (!this.pending.has(handle.id)) return false;
    this.cancelRequested.add(handle.id);
    const active = this.active;
    if (!active || active.id !== handle.id) {
      // Still queued: the stream stops before it starts.
      return true;
    }

    const client = this.factory({ ...this.config, connectionTimeoutMillis: CANCEL_CONNECT_TIMEOUT_MS });
    client.on('error', (err) => this.warn(`Cancel connection error: ${err.message}`));
    try {
      await client.connect();
    } catch (err) {
      this.warn(`Could not open a connection to cancel the query: ${errorMessage(err)}`);
      return false;
    }
    try {
      await client.query('SELECT pg_cancel_backend($1)', [active.pid]);
      return true;
    } catch (err) {
      this.warn(`Cancel request failed: ${errorMessage(err)}`);
      return false;
    } finally {
      await this.endClient(client);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending.clear();
    this.cancelRequested.clear();

    const connections = [this.primary];
    for (const opening of this.secondary.values()) {
      try {
        connections.push(await opening);
      } catch (err) {
        this.warn(`Secondary connection never opened: ${errorMessage(err)}`);
      }
    }
    this.secondary.clear();
    await Promise.all(connections.map((connection) => this.endClient(connection.client)));
  }

  private async endClient(client: PgClientLike): Promise<void> {
    try {
      await client.end();
    } catch (err) {
      this.warn(`Error while closing connection: ${errorMessage(err)}`);
    }
  }

  private connectionFor(database: string | undefined): Promise<Connection> {
    if (database === undefined || database === this.config.database) {
      return Promise.resolve(this.primary);
    }
    const existing = this.secondary.get(database);
    if (existing) return existing;
    const opening = openConnection(this.factory, { ...this.config, database });
    this.secondary.set(database, opening);
    // A failed open is retried on the next call instead of being cached.
    void opening.catch(() => this.secondary.delete(database));
    return opening;
  }

  private async catalog(database: string, sql: string, values: unknown[] = []): Promise<PgResult> {
    if (this.closed) throw catalogError('failed', 'Session is closed.');
    let connection: Connection;
    try {
      connection = await this.connectionFor(database);
    } catch (err) {
      throw mapCatalogError(err);
    }
    return this.lane.run(async () => {
      if (connection.broken) {
        throw catalogError('failed', `Connection lost: ${connection.broken.message}`);
      }
      try {
        return await connection.client.query(sql, values);
      } catch (err) {
        throw mapCatalogError(err);
      }
    });
  }

  private async *stream(handle: QueryHandle, sql: string, options: ExecuteOptions): AsyncGenerator<QueryEvent> {
    const release = await this.lane.acquire();
    try {
      if (this.closed) throw queryError('runtime', 'Session is closed.');
      if (this.cancelRequested.has(handle.id)) throw cancelledError();

      let connection: Connection;
      try {
        connection = await this.connectionFor(options.database);
      } catch (err) {
        throw mapQueryError(err);
      }
      if (connection.broken) {
        throw queryError('runtime', `Connection lost: ${connection.broken.message}`);
      }

      this.active = { id: handle.id, pid: connection.pid };
      const streamed = returnsRows(sql) && (yield* this.streamCursor(connection, handle, sql, options.batchSize));
      if (!streamed) {
        if (this.cancelRequested.has(handle.id)) throw cancelledError();
        const result = await run(connection, sql);
        if (result.fields.length > 0) {
          yield { type: 'columns', columns: describeFields(result.fields) };
          yield { type: 'rows', rows: decodeRows(result.fields, result.rows) };
        }
        yield {
          type: 'complete',
          command: result.command,
          rowsAffected: result.fields.length > 0 ? null : result.rowCount,
        };
      }
    } finally {
      this.active = null;
      this.pending.delete(handle.id);
      this.cancelRequested.delete(handle.id);
      release();
    }
  }

  /** Resolves false, after rolling back, when the server will not hold the statement in a cursor */
  private async *streamCursor(
    connection: Connection,
    handle: QueryHandle,
    sql: string,
    batchSize: number,
  ): AsyncGenerator<QueryEvent, boolean> {
    const cursor = `quarry_cursor_${handle.id}`;
    let committed = false;
    await run(connection, 'BEGIN');
    try {
      try {
        await run(connection, `DECLARE ${cursor} NO SCROLL CURSOR FOR ${stripTrailingSemicolons(sql)}`);
      } catch (err) {
        if (refusedAsCursor(err)) return false;
        throw err;
      }
      let described = false;
      for (;;) {
        if (this.cancelRequested.has(handle.id)) throw cancelledError();
        const batch = await run(connection, `FETCH FORWARD ${batchSize} FROM ${cursor}`);
        if (!described) {
          described = true;
          yield { type: 'columns', columns: describeFields(batch.fields) };
        }
        if (batch.rows.length > 0) {
          yield { type: 'rows', rows: decodeRows(batch.fields, batch.rows) };
        }
        if (batch.rows.length < batchSize) break;
      }
      await run(connection, `CLOSE ${cursor}`);
      await run(connection, 'COMMIT');
      committed = true;
      yield { type: 'complete', command: 'SELECT', rowsAffected: null };
      return true;
    } finally {
      if (!committed) await this.rollback(connection);
    }
  }

  private async rollback(connection: Connection): Promise<void> {
    if (connection.broken || this.closed) return;
    try {
      await connection.client.query('ROLLBACK');
    } catch (err) {
      connection.broken = err instanceof Error ? err : new Error(String(err));
      this.warn(`Rollback failed, connection marked unusable: ${errorMessage(err)}`);
    }
  }
}

// Data-modifying WITH (0A000) and SELECT ... INTO are valid statements a cursor cannot hold.
function refusedAsCursor(err: unknown): boolean {
  if (!(err instanceof QueryError)) return false;
  return errorCode(err.details) === '0A000' || /SELECT \.\.\. INTO is not allowed/.test(err.message);
}

async function run(connection: Connection, sql: string): Promise<PgResult> {
  try {
    return await connection.client.query(sql);
  } catch (err) {
    throw mapQueryError(err);
  }
}

async function openConnection(factory: PgClientFactory, config: PgConnectionConfig): Promise<Connection> {
  const client = factory(config);
  const connection: Connection = { client, database: config.database, pid: 0, broken: null };
  client.on('error', (err) => {
    connection.broken = err;
  });
  try {
    await client.connect();
  } catch (err) {
    throw mapConnectError(err);
  }
  try {
    const result = await client.query('SELECT pg_backend_pid()');
    const first = result.rows[0];
    connection.pid = Number(first ? text(first, 0) : 0);
  } catch (err) {
    const failure = mapConnectError(err);
    try {
      await client.end();
    } catch (endErr) {
      throw connectionError(failure.kind, `${failure.message} (close also failed: ${errorMessage(endErr)})`, failure.details);
    }
    throw failure;
  }
  return connection;
}

export function toPgConfig(profile: ConnectionProfile, credentials: Credentials, timeoutMs: number): PgConnectionConfig {
  if (!profile.host) {
    throw connectionError('rejected', `Profile "${profile.name}" has no host.`);
  }
  if (!profile.user) {
    throw connectionError('rejected', `Profile "${profile.name}" has no user.`);
  }
  return {
    host: profile.host,
    port: profile.port ?? 5432,
    database: profile.database ?? profile.user,
    user: profile.user,
    password: credentials.secret,
    ssl: profile.ssl,
    connectionTimeoutMillis: timeoutMs,
  };
}

export class PostgresBackend implements Backend {
  readonly kind = 'postgres';
  readonly requiresCredentials = true;
  private readonly factory: PgClientFactory;
  private readonly warn: (message: string) => void;

  constructor(options: PostgresBackendOptions = {}) {
    this.factory = options.clientFactory ?? createPgClient;
    this.warn = options.onWarning ?? (() => {});
  }

  async connect(profile: ConnectionProfile, credentials: Credentials, options: ConnectOptions): Promise<Session> {
    const config = toPgConfig(profile, credentials, options.timeoutMs);
    return PostgresSession.open(profile, config, this.factory, this.warn);
  }
}
