/**
 * @quarry/core — barrel export
 *
 * Engine shared by the CLI: backends, value codecs, credential resolution,
 * query execution and the navigation state machine.
 */

// Database types
export type {
  BackendKind,
  EnvironmentTag,
  CredentialPolicy,
  ConnectionProfile,
  Credentials,
  ColumnDescriptor,
  Row,
  QueryResult,
  DatabaseRef,
  SchemaRef,
  TableRef,
  QueryEvent,
  QueryHandle,
  RunningQuery,
  ConnectOptions,
  ExecuteOptions,
  Session,
  Backend,
} from './db/types.js';
export { BACKEND_KINDS, ENVIRONMENT_TAGS, CREDENTIAL_POLICIES } from './db/types.js';

// Values
export type { Value, ValueKind, JsonValue } from './db/value.js';
export { NULL, renderValue, valueToJson, valueKey, isNull } from './db/value.js';

// Codecs
export { decodePg, pgTypeName, decodeBytea } from './db/codec/postgres.js';
export { parsePgArray } from './db/codec/pg-array.js';
export type { PgArrayElement } from './db/codec/pg-array.js';
export { decodeSqlite } from './db/codec/sqlite.js';

// Engine defaults
export { ENGINE_DEFAULTS, resolveSettings } from './db/defaults.js';
export type { EngineSettings } from './db/defaults.js';

// Backends
export { BackendRegistry, createDefaultRegistry } from './db/backend.js';
export type { DefaultBackendOptions } from './db/backend.js';
export { PostgresBackend, createPgClient } from './db/adapters/postgres.js';
export type { PgClientLike, PgClientFactory, PgConnectionConfig, PostgresBackendOptions } from './db/adapters/postgres.js';
export { SqliteBackend } from './db/adapters/sqlite.js';
export { connectProfile } from './db/connect.js';
export type { ConnectDeps } from './db/connect.js';

// Errors
export {
  ConnectionError,
  CatalogError,
  QueryError,
  CredentialError,
  NavigationError,
  describeError,
  errorMessage,
  isCancelled,
  isEngineError,
} from './errors.js';
export type { EngineError, ErrorBanner, ErrorSource } from './errors.js';

// Credentials
export { CredentialResolver } from './credentials/resolver.js';
export type { CredentialPrompt, CredentialState, PromptRequest, PromptReason, Resolution } from './credentials/resolver.js';

// Query execution
export { QueryExecutor } from './query/executor.js';
export type { RunOptions } from './query/executor.js';

// Navigation
export { NavigationStateMachine } from './nav/machine.js';
export type { NavigatorDeps } from './nav/machine.js';
export type {
  Intent,
  EnterTarget,
  ViewState,
  ListViewState,
  NavSnapshot,
  LoadingState,
  ProfileSource,
} from './nav/types.js';
export { listEntries, visibleIndexes, selectedItemIndex } from './nav/list.js';

// Profiles
export { validateProfile, isBackendKind, isEnvironmentTag, isCredentialPolicy } from './profiles/validate.js';
export type { ProfileInput, ValidationIssue } from './profiles/validate.js';
export { parseProfileRecords, ProfileImportError } from './profiles/schema.js';

// Local storage
export { LocalStore, defaultDbPath, toConnectionProfile } from './storage/sqlite.js';
export type { StoredProfile } from './storage/sqlite.js';

// Secret storage
export type { SecretStore } from './secrets/types.js';
export { NoopSecretStore } from './secrets/noop.js';
export { MemorySecretStore } from './secrets/memory.js';
