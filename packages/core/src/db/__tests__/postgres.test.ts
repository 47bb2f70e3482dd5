import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PostgresBackend, mapQueryError, toPgConfig } from '../adapters/postgres.js';
import type { ConnectionProfile, QueryEvent, Session } from '../types.js';
import { OID, fixtureServer, pgError, type FakePgServer } from './fake-pg.js';

function profile(overrides: Partial<ConnectionProfile> = {}): ConnectionProfile {
  return {
    id: 'p-1',
    name: 'fixture',
    backendKind: 'postgres',
    host: '127.0.0.1',
    port: 55432,
    database: 'quarry_test',
    filePath: null,
    user: 'quarry',
    ssl: false,
    environment: 'dev',
    credentialPolicy: 'prompt-always',
    ...overrides,
  };
}

async function open(server: FakePgServer, warnings: string[] = []): Promise<Session> {
  const backend = new PostgresBackend({
    clientFactory: server.factory,
    onWarning: (message) => warnings.push(message),
  });
  return backend.connect(profile(), { secret: 'test-secret' }, { timeoutMs: 1000 });
}

async function collect(events: AsyncIterable<QueryEvent>): Promise<QueryEvent[]> {
  const out: QueryEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('PostgresBackend catalog', () => {
  it('passes profile fields and the secret to the driver', async () => {
    const server = fixtureServer();
    await open(server);
    assert.deepEqual(server.configs[0], {
      host: '127.0.0.1',
      port: 55432,
      database: 'quarry_test',
      user: 'quarry',
      password: 'test-secret',
      ssl: false,
      connectionTimeoutMillis: 1000,
    });
  });

  it('lists databases, schemas and tables', async () => {
    const session = await open(fixtureServer());

    assert.deepEqual(await session.listDatabases(), [{ name: 'analytics' }, { name: 'quarry_test' }]);
    assert.deepEqual(
      (await session.listSchemas({ name: 'quarry_test' })).map((schema) => schema.name),
      ['edge_cases', 'public', 'test_schema'],
    );

    const tables = await session.listTables({ database: 'quarry_test', name: 'test_schema', owner: 'quarry' });
    assert.deepEqual(tables, [
      { database: 'quarry_test', schema: 'test_schema', name: 'customers', kind: 'table', sizeLabel: '8192 bytes' },
      { database: 'quarry_test', schema: 'test_schema', name: 'order_summary', kind: 'view', sizeLabel: '0 bytes' },
      { database: 'quarry_test', schema: 'test_schema', name: 'orders', kind: 'table', sizeLabel: '16 kB' },
    ]);
  });

  it('describes columns with keys, defaults and comments', async () => {
    const session = await open(fixtureServer());
    const columns = await session.listColumns({
      database: 'quarry_test',
      schema: 'test_schema',
      name: 'orders',
      kind: 'table',
      sizeLabel: null,
    });

    assert.deepEqual(
      columns.map((column) => column.name),
      ['id', 'order_date', 'customer_id', 'total_amount', 'status', 'notes'],
    );
    assert.deepEqual(columns[0], {
      name: 'id',
      nativeType: 'integer',
      nullable: false,
      ordinal: 1,
      defaultValue: "nextval('test_schema.orders_id_seq'::regclass)",
      isPrimaryKey: true,
      description: null,
    });
    assert.equal(columns[1].nullable, true);
    assert.equal(columns[3].description, 'Order total in dollars');
  });

  it('reports declared types for array and sized columns', async () => {
    const session = await open(fixtureServer());
    const columns = await session.listColumns({
      database: 'quarry_test',
      schema: 'edge_cases',
      name: 'array_test',
      kind: 'table',
      sizeLabel: null,
    });
    assert.deepEqual(
      columns.map((column) => column.nativeType),
      ['integer', 'text[]', 'character varying(8)'],
    );
  });

  it('reports a missing table as not found', async () => {
    const session = await open(fixtureServer());
    await assert.rejects(
      session.listColumns({ database: 'quarry_test', schema: 'test_schema', name: 'missing', kind: 'table', sizeLabel: null }),
      { name: 'CatalogError', kind: 'not_found' },
    );
  });

  it('opens a second connection for another database', async () => {
    const server = fixtureServer();
    const session = await open(server);
    const schemas = await session.listSchemas({ name: 'analytics' });

    assert.deepEqual(schemas, [{ database: 'analytics', name: 'public', owner: 'pg_database_owner' }]);
    assert.deepEqual(
      server.configs.map((config) => config.database),
      ['quarry_test', 'analytics'],
    );
  });

  it('fails catalog calls once the connection drops', async () => {
    const server = fixtureServer();
    const session = await open(server);
    server.clients[0].emitError(new Error('Connection terminated unexpectedly'));

    await assert.rejects(session.listDatabases(), {
      name: 'CatalogError',
      kind: 'failed',
      message: 'Connection lost: Connection terminated unexpectedly',
    });
  });
});

describe('PostgresBackend connect errors', () => {
  it('classifies a bad password as auth_failed', async () => {
    const server = fixtureServer();
    server.connectError = pgError('28P01', 'password authentication failed for user "quarry"');
    await assert.rejects(open(server), {
      name: 'ConnectionError',
      kind: 'auth_failed',
      message: 'Authentication failed: password authentication failed for user "quarry"',
    });
  });

  it('classifies a refused socket as network_unreachable', async () => {
    const server = fixtureServer();
    server.connectError = pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:55432');
    await assert.rejects(open(server), { kind: 'network_unreachable' });
  });

  it('rejects a profile without a host before dialing', () => {
    assert.throws(() => toPgConfig(profile({ host: null }), { secret: '' }, 1000), {
      kind: 'rejected',
      message: 'Profile "fixture" has no host.',
    });
  });

  it('defaults the port and database', () => {
    const config = toPgConfig(profile({ port: null, database: null }), { secret: '' }, 1000);
    assert.equal(config.port, 5432);
    assert.equal(config.database, 'quarry');
  });
});

describe('PostgresBackend queries', () => {
  it('streams a select through a cursor in batches', async () => {
    const server = fixtureServer();
    const session = await open(server);
    const sql = session.tablePreviewSql(
      { database: 'quarry_test', schema: 'test_schema', name: 'orders', kind: 'table', sizeLabel: null },
      100,
    );
    assert.equal(sql, 'SELECT * FROM "test_schema"."orders" LIMIT 100');

    const events = await collect(session.executeQuery(sql, { batchSize: 3 }).events);
    assert.deepEqual(
      events.map((event) => (event.type === 'rows' ? event.rows.length : event.type)),
      ['columns', 3, 3, 1, 'complete'],
    );
    assert.deepEqual(events[events.length - 1], { type: 'complete', command: 'SELECT', rowsAffected: null });
    assert.deepEqual(server.sqlLog().slice(1), [
      'BEGIN',
      'DECLARE quarry_cursor_1 NO SCROLL CURSOR FOR SELECT * FROM "test_schema"."orders" LIMIT 100',
      'FETCH FORWARD 3 FROM quarry_cursor_1',
      'FETCH FORWARD 3 FROM quarry_cursor_1',
      'FETCH FORWARD 3 FROM quarry_cursor_1',
      'CLOSE quarry_cursor_1',
      'COMMIT',
    ]);
  });

  it('decodes cells by column type', async () => {
    const session = await open(fixtureServer());
    const events = await collect(
      session.executeQuery('SELECT * FROM "test_schema"."orders" LIMIT 100;', { batchSize: 10 }).events,
    );
    const columns = events[0];
    assert.equal(columns.type, 'columns');
    if (columns.type !== 'columns') return;
    assert.deepEqual(
      columns.columns.map((column) => column.nativeType),
      ['int4', 'date', 'int4', 'numeric', 'varchar', 'text'],
    );

    const batch = events[1];
    assert.equal(batch.type, 'rows');
    if (batch.type !== 'rows') return;
    assert.deepEqual(batch.rows[0], [
      { kind: 'int64', value: 1n },
      { kind: 'date', iso: '2024-01-15' },
      { kind: 'int64', value: 1n },
      { kind: 'decimal', digits: '100.50' },
      { kind: 'text', value: 'shipped' },
      { kind: 'null' },
    ]);
    assert.deepEqual(batch.rows[5][1], { kind: 'null' });
  });

  it('keeps an all-NULL row apart from its key', async () => {
    const session = await open(fixtureServer());
    const events = await collect(
      session.executeQuery('SELECT * FROM "edge_cases"."null_test"', { batchSize: 10 }).events,
    );
    const batch = events[1];
    assert.equal(batch.type, 'rows');
    if (batch.type !== 'rows') return;
    assert.deepEqual(batch.rows[0][4], { kind: 'timestamptz', iso: '2024-01-15T10:30:00+00:00', hasTimezone: true });
    assert.deepEqual(batch.rows[1], [
      { kind: 'int64', value: 2n },
      { kind: 'null' },
      { kind: 'null' },
      { kind: 'null' },
      { kind: 'null' },
      { kind: 'null' },
    ]);
  });

  it('runs writes without a cursor and reports the affected count', async () => {
    const server = fixtureServer();
    const sql = "UPDATE test_schema.orders SET status = 'archived' WHERE id < 4";
    server.statements.set(sql, { fields: [], rows: [], command: 'UPDATE', rowCount: 3 });
    const session = await open(server);

    const events = await collect(session.executeQuery(sql, { batchSize: 10 }).events);
    assert.deepEqual(events, [{ type: 'complete', command: 'UPDATE', rowsAffected: 3 }]);
    assert.equal(server.sqlLog().includes('BEGIN'), false);
  });

  it('runs a data-modifying WITH directly when the cursor is refused', async () => {
    const server = fixtureServer();
    const sql = 'WITH gone AS (DELETE FROM test_schema.orders WHERE id = 5 RETURNING id) SELECT id FROM gone';
    server.cursorRefusals.set(
      sql,
      pgError('0A000', 'DECLARE CURSOR must not contain data-modifying statements in WITH'),
    );
    server.statements.set(sql, { fields: [{ name: 'id', dataTypeID: OID.int4 }], rows: [['5']], command: 'SELECT', rowCount: 1 });
    const session = await open(server);

    const events = await collect(session.executeQuery(sql, { batchSize: 10 }).events);
    assert.deepEqual(events, [
      { type: 'columns', columns: [{ name: 'id', nativeType: 'int4', nullable: true, ordinal: 1 }] },
      { type: 'rows', rows: [[{ kind: 'int64', value: 5n }]] },
      { type: 'complete', command: 'SELECT', rowsAffected: null },
    ]);
    assert.deepEqual(server.sqlLog().slice(-4), ['BEGIN', `DECLARE quarry_cursor_1 NO SCROLL CURSOR FOR ${sql}`, 'ROLLBACK', sql]);
  });

  it('runs SELECT ... INTO directly when the cursor is refused', async () => {
    const server = fixtureServer();
    const sql = 'SELECT * INTO test_schema.orders_copy FROM test_schema.orders';
    server.cursorRefusals.set(sql, pgError('42601', 'SELECT ... INTO is not allowed here'));
    server.statements.set(sql, { fields: [], rows: [], command: 'SELECT', rowCount: 7 });
    const session = await open(server);

    const events = await collect(session.executeQuery(sql, { batchSize: 10 }).events);
    assert.deepEqual(events, [{ type: 'complete', command: 'SELECT', rowsAffected: 7 }]);
  });

  it('routes a query to another database on request', async () => {
    const server = fixtureServer();
    const session = await open(server);
    const events = await collect(
      session.executeQuery('SELECT * FROM "public"."events"', { batchSize: 10, database: 'analytics' }).events,
    );
    const batch = events[1];
    assert.equal(batch.type, 'rows');
    if (batch.type !== 'rows') return;
    assert.deepEqual(batch.rows, [[{ kind: 'int64', value: 10n }], [{ kind: 'int64', value: 11n }]]);
    assert.ok(server.log.some((entry) => entry.database === 'analytics' && entry.sql === 'COMMIT'));
  });

  it('rolls back and reports a syntax error', async () => {
    const server = fixtureServer();
    const session = await open(server);
    await assert.rejects(collect(session.executeQuery('SELECT FROM WHERE', { batchSize: 10 }).events), {
      name: 'QueryError',
      kind: 'syntax',
    });
    assert.deepEqual(server.sqlLog().slice(-2), ['DECLARE quarry_cursor_1 NO SCROLL CURSOR FOR SELECT FROM WHERE', 'ROLLBACK']);
  });

  it('marks the connection unusable when a rollback fails', async () => {
    const server = fixtureServer();
    server.failures.set('ROLLBACK', new Error('server closed the connection unexpectedly'));
    const warnings: string[] = [];
    const session = await open(server, warnings);

    await assert.rejects(collect(session.executeQuery('SELECT oops', { batchSize: 10 }).events), { kind: 'syntax' });
    assert.deepEqual(warnings, [
      'Rollback failed, connection marked unusable: server closed the connection unexpectedly',
    ]);
    await assert.rejects(collect(session.executeQuery('SELECT 1', { batchSize: 10 }).events), {
      kind: 'runtime',
      message: 'Connection lost: server closed the connection unexpectedly',
    });
  });
});

describe('PostgresBackend cancel', () => {
  it('cancels a query that has not started', async () => {
    const server = fixtureServer();
    const session = await open(server);
    const running = session.executeQuery('SELECT * FROM "test_schema"."orders"', { batchSize: 2 });

    assert.equal(await session.cancel(running.handle), true);
    await assert.rejects(collect(running.events), { kind: 'cancelled', message: 'Query cancelled.' });
    assert.equal(server.sqlLog().includes('SELECT pg_cancel_backend($1)'), false);
  });

  it('sends pg_cancel_backend for the running backend and rolls back', async () => {
    const server = fixtureServer();
    const session = await open(server);
    const running = session.executeQuery('SELECT * FROM "test_schema"."orders"', { batchSize: 2 });
    const iterator = running.events[Symbol.asyncIterator]();

    assert.equal((await iterator.next()).value?.type, 'columns');
    assert.equal((await iterator.next()).value?.type, 'rows');

    let arrive = (): void => {};
    const arrived = new Promise<void>((resolve) => {
      arrive = resolve;
    });
    let releaseFetch = (): void => {};
    const gate = new Promise<void>((resolve) => {
      releaseFetch = resolve;
    });
    server.beforeFetch = async () => {
      arrive();
      await gate;
    };

    const pending = iterator.next();
    await arrived;
    assert.equal(await session.cancel(running.handle), true);
    releaseFetch();

    await assert.rejects(pending, { kind: 'cancelled' });
    const cancelEntry = server.log.find((entry) => entry.sql === 'SELECT pg_cancel_backend($1)');
    assert.ok(cancelEntry);
    assert.notEqual(cancelEntry.pid, server.clients[0].pid);
    assert.equal(server.configs[1].connectionTimeoutMillis, 5000);
    assert.equal(server.clients[1].ended, true);
    assert.equal(server.sqlLog().at(-1), 'ROLLBACK');
  });

  it('returns false for a handle that is not running', async () => {
    const session = await open(fixtureServer());
    assert.equal(await session.cancel({ id: 42 }), false);
  });
});

describe('PostgresBackend close', () => {
  it('ends every connection it opened', async () => {
    const server = fixtureServer();
    const session = await open(server);
    await session.listSchemas({ name: 'analytics' });
    await session.close();

    assert.deepEqual(
      server.clients.map((client) => client.ended),
      [true, true],
    );
  });
});

describe('mapQueryError', () => {
  it('maps SQLSTATE codes to query error kinds', () => {
    assert.equal(mapQueryError(pgError('42601', 'syntax error')).kind, 'syntax');
    assert.equal(mapQueryError(pgError('57014', 'canceling statement')).kind, 'cancelled');
    assert.equal(mapQueryError(pgError('22012', 'division by zero')).kind, 'runtime');
  });
});
