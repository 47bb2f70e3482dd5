import { describeError, isEngineError } from '@quarry/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'PROFILE_NOT_FOUND'
  | 'PROFILE_EXISTS'
  | 'PROFILE_INVALID'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'QUERY_CANCELLED'
  | 'CREDENTIAL_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'CliError';
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

/** Map an engine failure onto the CLI's codes; anything else passes through */
export function fromEngineError(error: unknown): unknown {
  if (!isEngineError(error)) return error;
  const banner = describeError(error);
  switch (banner.source) {
    case 'connection':
      return runtimeError(banner.message, 'DB_CONN_FAILED', { kind: banner.code, details: error.details });
    case 'credential':
      return runtimeError(banner.message, 'CREDENTIAL_FAILED', { kind: banner.code });
    case 'query':
      return runtimeError(banner.message, banner.code === 'cancelled' ? 'QUERY_CANCELLED' : 'DB_QUERY_FAILED', {
        kind: banner.code,
        details: error.details,
      });
    default:
      return runtimeError(banner.message, 'DB_QUERY_FAILED', { kind: banner.code, details: error.details });
  }
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError && error.kind === 'usage') return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}
