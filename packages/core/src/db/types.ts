/**
 * Database abstraction types for Quarry.
 * Each backend (Postgres, SQLite) implements Backend and hands out Sessions.
 */

import type { Value } from './value.js';

export type BackendKind = 'postgres' | 'sqlite';

export type EnvironmentTag = 'dev' | 'staging' | 'prod';

export type CredentialPolicy = 'store' | 'prompt-always' | 'never-save';

export const BACKEND_KINDS: readonly BackendKind[] = ['postgres', 'sqlite'];
export const ENVIRONMENT_TAGS: readonly EnvironmentTag[] = ['dev', 'staging', 'prod'];
export const CREDENTIAL_POLICIES: readonly CredentialPolicy[] = ['store', 'prompt-always', 'never-save'];

export interface ConnectionProfile {
  readonly id: string;
  readonly name: string;
  readonly backendKind: BackendKind;
  readonly host: string | null;
  readonly port: number | null;
  readonly database: string | null;
  /** Path for file-based DBs like SQLite */
  readonly filePath: string | null;
  readonly user: string | null;
  readonly ssl: boolean;
  /** Display label only */
  readonly environment: EnvironmentTag;
  readonly credentialPolicy: CredentialPolicy;
}

export interface Credentials {
  /** Empty when the backend needs no secret */
  readonly secret: string;
}

export interface ColumnDescriptor {
  name: string;
  nativeType: string;
  nullable: boolean;
  /** 1-based */
  ordinal: number;
  defaultValue?: string | null;
  isPrimaryKey?: boolean;
  description?: string | null;
}

export type Row = Value[];

export interface QueryResult {
  columns: ColumnDescriptor[];
  rows: Row[];
  command: string;
  /** Set for statements that return no row set */
  rowsAffected: number | null;
  truncated: boolean;
  durationMs: number;
}

export interface DatabaseRef {
  name: string;
}

export interface SchemaRef {
  database: string;
  name: string;
  owner: string | null;
}

export interface TableRef {
  database: string;
  schema: string;
  name: string;
  kind: 'table' | 'view';
  /** Human readable size where the backend reports one */
  sizeLabel: string | null;
}

export type QueryEvent =
  | { type: 'columns'; columns: ColumnDescriptor[] }
  | { type: 'rows'; rows: Row[] }
  | { type: 'complete'; command: string; rowsAffected: number | null };

export interface QueryHandle {
  readonly id: number;
}

export interface RunningQuery {
  readonly handle: QueryHandle;
  readonly events: AsyncIterable<QueryEvent>;
}

export interface ConnectOptions {
  /** Connection establishment timeout in milliseconds */
  timeoutMs: number;
}

export interface ExecuteOptions {
  batchSize: number;
  /** Run against this database of the server instead of the profile's own */
  database?: string;
}

/**
 * An open connection bound to one profile.
 * Owned by exactly one caller; close() ends everything scoped to it.
 */
export interface Session {
  readonly profile: ConnectionProfile;

  listDatabases(): Promise<DatabaseRef[]>;
  listSchemas(database: DatabaseRef): Promise<SchemaRef[]>;
  listTables(schema: SchemaRef): Promise<TableRef[]>;
  listColumns(table: TableRef): Promise<ColumnDescriptor[]>;

  /** Start a statement; rows arrive decoded, in batches of at most batchSize */
  executeQuery(sql: string, options: ExecuteOptions): RunningQuery;

  /** SQL that previews a table's rows, quoted for this backend */
  tablePreviewSql(table: TableRef, limit: number): string;

  /** Ask the backend to stop a running statement. Resolves false if nothing was delivered. */
  cancel(handle: QueryHandle): Promise<boolean>;

  close(): Promise<void>;
}

/**
 * Backend adapter interface. Each supported DB engine implements this.
 */
export interface Backend {
  readonly kind: BackendKind;
  /** False for engines that never take a secret (SQLite files) */
  readonly requiresCredentials: boolean;

  connect(profile: ConnectionProfile, credentials: Credentials, options: ConnectOptions): Promise<Session>;
}
