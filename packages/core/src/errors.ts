/**
 * Error taxonomy for the engine.
 * Every backend, codec and credential failure is one of these by the time
 * it reaches the navigation layer.
 */

export type ConnectionErrorKind = 'timeout' | 'auth_failed' | 'network_unreachable' | 'unsupported' | 'rejected';
export type CatalogErrorKind = 'permission_denied' | 'not_found' | 'failed';
export type QueryErrorKind = 'syntax' | 'runtime' | 'cancelled';
export type CredentialErrorKind = 'store_unavailable' | 'prompt_cancelled' | 'invalid_credential';
export type NavigationErrorKind = 'not_connected' | 'invalid_intent' | 'not_found';

export type ErrorSource = 'connection' | 'catalog' | 'query' | 'credential' | 'navigation' | 'internal';

export class ConnectionError extends Error {
  readonly source = 'connection';
  readonly kind: ConnectionErrorKind;
  readonly details?: unknown;

  constructor(kind: ConnectionErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'ConnectionError';
    this.kind = kind;
    this.details = details;
  }
}

export class CatalogError extends Error {
  readonly source = 'catalog';
  readonly kind: CatalogErrorKind;
  readonly details?: unknown;

  constructor(kind: CatalogErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'CatalogError';
    this.kind = kind;
    this.details = details;
  }
}

export class QueryError extends Error {
  readonly source = 'query';
  readonly kind: QueryErrorKind;
  readonly details?: unknown;

  constructor(kind: QueryErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'QueryError';
    this.kind = kind;
    this.details = details;
  }
}

export class CredentialError extends Error {
  readonly source = 'credential';
  readonly kind: CredentialErrorKind;
  readonly details?: unknown;

  constructor(kind: CredentialErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'CredentialError';
    this.kind = kind;
    this.details = details;
  }
}

/** An intent that makes no sense in the current view */
export class NavigationError extends Error {
  readonly source = 'navigation';
  readonly kind: NavigationErrorKind;
  readonly details?: unknown;

  constructor(kind: NavigationErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'NavigationError';
    this.kind = kind;
    this.details = details;
  }
}

export type EngineError = ConnectionError | CatalogError | QueryError | CredentialError | NavigationError;

export function connectionError(kind: ConnectionErrorKind, message: string, details?: unknown): ConnectionError {
  return new ConnectionError(kind, message, details);
}

export function catalogError(kind: CatalogErrorKind, message: string, details?: unknown): CatalogError {
  return new CatalogError(kind, message, details);
}

export function queryError(kind: QueryErrorKind, message: string, details?: unknown): QueryError {
  return new QueryError(kind, message, details);
}

export function cancelledError(): QueryError {
  return new QueryError('cancelled', 'Query cancelled.');
}

export function isEngineError(error: unknown): error is EngineError {
  return (
    error instanceof ConnectionError ||
    error instanceof CatalogError ||
    error instanceof QueryError ||
    error instanceof CredentialError ||
    error instanceof NavigationError
  );
}

export function isCancelled(error: unknown): boolean {
  return error instanceof QueryError && error.kind === 'cancelled';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Driver error code: a SQLSTATE from pg, SQLITE_* from better-sqlite3, or a Node errno name */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface ErrorBanner {
  source: ErrorSource;
  /** e.g. "auth_failed", "syntax" */
  code: string;
  message: string;
  dismissible: true;
}

export function describeError(error: unknown): ErrorBanner {
  if (isEngineError(error)) {
    return { source: error.source, code: error.kind, message: error.message, dismissible: true };
  }
  return { source: 'internal', code: 'internal', message: errorMessage(error), dismissible: true };
}
