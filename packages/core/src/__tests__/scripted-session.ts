/**
 * Session double for executor and navigation tests. Catalog answers and
 * query results are scripted; any call can be held open until a test
 * releases it.
 */

import { cancelledError, catalogError } from '../errors.js';
import type {
  Backend,
  ColumnDescriptor,
  ConnectionProfile,
  DatabaseRef,
  ExecuteOptions,
  QueryEvent,
  QueryHandle,
  Row,
  RunningQuery,
  SchemaRef,
  Session,
  TableRef,
} from '../db/types.js';

export interface ScriptedResult {
  columns: ColumnDescriptor[];
  rows: Row[];
  command?: string;
  rowsAffected?: number | null;
}

export interface Catalog {
  databases: string[];
  /** database → schema names */
  schemas: Record<string, string[]>;
  /** "db.schema" → table names */
  tables: Record<string, string[]>;
  /** "db.schema.table" → columns */
  columns: Record<string, ColumnDescriptor[]>;
}

export interface Gate {
  release(): void;
  /** Resolves once a call has reached the gate */
  reached: Promise<void>;
}

interface GateState {
  opened: Promise<void>;
  arrive(): void;
}

export function column(name: string, ordinal: number, extra: Partial<ColumnDescriptor> = {}): ColumnDescriptor {
  return { name, nativeType: 'text', nullable: true, ordinal, ...extra };
}

export class ScriptedSession implements Session {
  readonly calls: string[] = [];
  readonly executed: { sql: string; options: ExecuteOptions }[] = [];
  readonly cancelled: number[] = [];
  readonly queries = new Map<string, ScriptedResult | Error>();
  /** Handles whose event stream was closed, whether finished or not */
  readonly finished: number[] = [];
  closed = false;
  private readonly gates = new Map<string, GateState>();
  private readonly aborts = new Map<number, () => void>();
  private nextHandleId = 1;

  constructor(
    readonly profile: ConnectionProfile,
    private catalog: Catalog,
  ) {}

  /** Hold the next call with this label, e.g. "listSchemas:main" or "query:SELECT 1" */
  hold(label: string): Gate {
    let release = (): void => {};
    let arrive = (): void => {};
    const opened = new Promise<void>((resolve) => {
      release = resolve;
    });
    const reached = new Promise<void>((resolve) => {
      arrive = resolve;
    });
    this.gates.set(label, { opened, arrive });
    return { release, reached };
  }

  setCatalog(catalog: Catalog): void {
    this.catalog = catalog;
  }

  async listDatabases(): Promise<DatabaseRef[]> {
    await this.enter('listDatabases');
    return this.catalog.databases.map((name) => ({ name }));
  }

  async listSchemas(database: DatabaseRef): Promise<SchemaRef[]> {
    await this.enter(`listSchemas:${database.name}`);
    const names = this.catalog.schemas[database.name];
    if (!names) throw catalogError('not_found', `database ${database.name} not found`);
    return names.map((name) => ({ database: database.name, name, owner: null }));
  }

  async listTables(schema: SchemaRef): Promise<TableRef[]> {
    await this.enter(`listTables:${schema.database}.${schema.name}`);
    const names = this.catalog.tables[`${schema.database}.${schema.name}`] ?? [];
    return names.map((name) => ({ database: schema.database, schema: schema.name, name, kind: 'table', sizeLabel: null }));
  }

  async listColumns(table: TableRef): Promise<ColumnDescriptor[]> {
    await this.enter(`listColumns:${table.database}.${table.schema}.${table.name}`);
    const columns = this.catalog.columns[`${table.database}.${table.schema}.${table.name}`];
    if (!columns) throw catalogError('not_found', `table ${table.name} not found`);
    return columns;
  }

  tablePreviewSql(table: TableRef, limit: number): string {
    return `SELECT * FROM "${table.schema}"."${table.name}" LIMIT ${limit}`;
  }

  executeQuery(sql: string, options: ExecuteOptions): RunningQuery {
    const handle: QueryHandle = { id: this.nextHandleId++ };
    this.executed.push({ sql, options });
    return { handle, events: this.stream(handle, sql, options.batchSize) };
  }

  async cancel(handle: QueryHandle): Promise<boolean> {
    this.cancelled.push(handle.id);
    const abort = this.aborts.get(handle.id);
    if (!abort) return false;
    abort();
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async enter(label: string, interrupted?: Promise<void>): Promise<void> {
    this.calls.push(label);
    const gate = this.gates.get(label);
    if (!gate) return;
    this.gates.delete(label);
    gate.arrive();
    await (interrupted ? Promise.race([gate.opened, interrupted]) : gate.opened);
  }

  private async *stream(handle: QueryHandle, sql: string, batchSize: number): AsyncGenerator<QueryEvent> {
    let aborted = false;
    const interrupted = new Promise<void>((resolve) => {
      this.aborts.set(handle.id, () => {
        aborted = true;
        resolve();
      });
    });
    try {
      await this.enter(`query:${sql}`, interrupted);
      if (aborted) throw cancelledError();
      const scripted = this.queries.get(sql);
      if (scripted === undefined) throw new Error(`no script for ${sql}`);
      if (scripted instanceof Error) throw scripted;

      if (scripted.columns.length > 0) {
        yield { type: 'columns', columns: scripted.columns };
        for (let start = 0; start < scripted.rows.length; start += batchSize) {
          if (aborted) throw cancelledError();
          yield { type: 'rows', rows: scripted.rows.slice(start, start + batchSize) };
        }
      }
      yield { type: 'complete', command: scripted.command ?? 'SELECT', rowsAffected: scripted.rowsAffected ?? null };
    } finally {
      this.aborts.delete(handle.id);
      this.finished.push(handle.id);
    }
  }
}

/** Backend handing out prepared sessions in order; a connect can be held open */
export class ScriptedBackend implements Backend {
  readonly kind = 'postgres';
  readonly requiresCredentials: boolean;
  readonly connects: ConnectionProfile[] = [];
  private readonly pending: (() => Promise<Session>)[] = [];

  constructor(requiresCredentials = false) {
    this.requiresCredentials = requiresCredentials;
  }

  /** Queue the outcome of the next connect */
  next(outcome: () => Promise<Session>): void {
    this.pending.push(outcome);
  }

  async connect(profile: ConnectionProfile): Promise<Session> {
    this.connects.push(profile);
    const outcome = this.pending.shift();
    if (!outcome) throw new Error(`unexpected connect to ${profile.name}`);
    return outcome();
  }
}
