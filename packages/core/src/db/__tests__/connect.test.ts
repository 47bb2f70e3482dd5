import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { connectProfile } from '../connect.js';
import { BackendRegistry } from '../backend.js';
import { PostgresBackend } from '../adapters/postgres.js';
import { CredentialResolver, type CredentialPrompt } from '../../credentials/resolver.js';
import { MemorySecretStore } from '../../secrets/memory.js';
import type { Backend, ConnectionProfile, Session } from '../types.js';
import { fixtureServer, pgError } from './fake-pg.js';

const profile: ConnectionProfile = {
  id: 'p-1',
  name: 'fixture',
  backendKind: 'postgres',
  host: '127.0.0.1',
  port: 5432,
  database: 'quarry_test',
  filePath: null,
  user: 'quarry',
  ssl: false,
  environment: 'dev',
  credentialPolicy: 'store',
};

const prompt: CredentialPrompt = {
  ask: async () => 'test-secret',
};

describe('connectProfile', () => {
  it('stores a prompted secret only after the server accepts it', async () => {
    const server = fixtureServer();
    const store = new MemorySecretStore();
    const registry = new BackendRegistry([new PostgresBackend({ clientFactory: server.factory })]);
    const resolver = new CredentialResolver({ store, prompt });

    const session = await connectProfile(profile, { registry, resolver }, { timeoutMs: 1000 });
    assert.equal(session.profile, profile);
    assert.equal(server.configs[0].password, 'test-secret');
    assert.equal(await store.get('p-1'), 'test-secret');
    await session.close();
  });

  it('reports rejected credentials and keeps them out of the store', async () => {
    const server = fixtureServer();
    server.connectError = pgError('28P01', 'password authentication failed for user "quarry"');
    const store = new MemorySecretStore();
    const registry = new BackendRegistry([new PostgresBackend({ clientFactory: server.factory })]);
    const resolver = new CredentialResolver({ store, prompt });

    await assert.rejects(connectProfile(profile, { registry, resolver }, { timeoutMs: 1000 }), {
      name: 'CredentialError',
      kind: 'invalid_credential',
    });
    assert.equal(store.has('p-1'), false);
    assert.equal(resolver.state, 'failed');
  });

  it('refuses a backend kind with no adapter', async () => {
    const resolver = new CredentialResolver({ store: new MemorySecretStore(), prompt });
    await assert.rejects(
      connectProfile(profile, { registry: new BackendRegistry(), resolver }, { timeoutMs: 1000 }),
      { name: 'ConnectionError', kind: 'unsupported', message: 'Unsupported backend: postgres' },
    );
  });

  it('times out and closes a session that arrives late', async () => {
    let closed = false;
    let deliver = (_session: Session): void => {};
    const late: Session = {
      profile,
      listDatabases: async () => [],
      listSchemas: async () => [],
      listTables: async () => [],
      listColumns: async () => [],
      executeQuery: () => {
        throw new Error('not used');
      },
      tablePreviewSql: () => '',
      cancel: async () => false,
      close: async () => {
        closed = true;
      },
    };
    const slow: Backend = {
      kind: 'postgres',
      requiresCredentials: true,
      connect: () =>
        new Promise<Session>((resolve) => {
          deliver = resolve;
        }),
    };
    const resolver = new CredentialResolver({ store: new MemorySecretStore(), prompt });

    await assert.rejects(
      connectProfile(profile, { registry: new BackendRegistry([slow]), resolver }, { timeoutMs: 20 }),
      { kind: 'timeout', message: 'Connection not established within 20 ms.' },
    );
    deliver(late);
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(closed, true);
  });
});
