/**
 * Backend dispatch.
 * Picks the adapter for a profile's backend kind once, at connect time.
 */

import { connectionError } from '../errors.js';
import { PostgresBackend, type PostgresBackendOptions } from './adapters/postgres.js';
import { SqliteBackend } from './adapters/sqlite.js';
import type { Backend, BackendKind, ConnectionProfile } from './types.js';

export class BackendRegistry {
  private readonly backends = new Map<BackendKind, Backend>();

  constructor(backends: Backend[] = []) {
    for (const backend of backends) {
      this.register(backend);
    }
  }

  register(backend: Backend): this {
    this.backends.set(backend.kind, backend);
    return this;
  }

  /** Throws ConnectionError "unsupported" when no adapter handles the profile's kind */
  forProfile(profile: ConnectionProfile): Backend {
    const backend = this.backends.get(profile.backendKind);
    if (!backend) {
      throw connectionError('unsupported', `Unsupported backend: ${profile.backendKind}`, {
        backendKind: profile.backendKind,
      });
    }
    return backend;
  }

  kinds(): BackendKind[] {
    return [...this.backends.keys()];
  }
}

export interface DefaultBackendOptions {
  postgres?: PostgresBackendOptions;
}

export function createDefaultRegistry(options: DefaultBackendOptions = {}): BackendRegistry {
  return new BackendRegistry([new PostgresBackend(options.postgres), new SqliteBackend()]);
}
