import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { ColumnDescriptor, ConnectionProfile, NavSnapshot, QueryResult } from '@quarry/core';
import { renderResultTable, renderSnapshot, resultToCsv, resultToJson, summarizeResult } from '../render.js';

function column(name: string, ordinal: number, nativeType = 'text'): ColumnDescriptor {
  return { name, nativeType, nullable: true, ordinal };
}

function profile(id: string, name: string, backendKind: 'postgres' | 'sqlite', environment: 'dev' | 'prod'): ConnectionProfile {
  return {
    id,
    name,
    backendKind,
    host: null,
    port: null,
    database: null,
    filePath: null,
    user: null,
    ssl: false,
    environment,
    credentialPolicy: 'prompt-always',
  };
}

const USERS: QueryResult = {
  columns: [column('id', 1, 'int4'), column('name', 2)],
  rows: [
    [
      { kind: 'int64', value: 1n },
      { kind: 'text', value: 'Ada' },
    ],
    [{ kind: 'int64', value: 2n }, { kind: 'null' }],
  ],
  command: 'SELECT',
  rowsAffected: null,
  truncated: false,
  durationMs: 12.4,
};

const ALPHA = profile('p-1', 'alpha', 'postgres', 'dev');

describe('result rendering', () => {
  it('summarizes row sets and writes', () => {
    assert.equal(summarizeResult(USERS), '2 rows in 12 ms');
    assert.equal(
      summarizeResult({ columns: [], rows: [], command: 'UPDATE', rowsAffected: 1, truncated: false, durationMs: 3 }),
      'UPDATE, 1 row affected (3 ms)',
    );
    assert.equal(summarizeResult({ ...USERS, rows: [USERS.rows[0]], truncated: true, durationMs: 0.2 }), '1 row (truncated) in 0 ms');
  });

  it('renders a table with NULL cells', () => {
    assert.deepEqual(renderResultTable(USERS).split('\n'), [
      'id | name',
      '---+-----',
      '1  | Ada',
      '2  | NULL',
      '2 rows in 12 ms',
    ]);
  });

  it('writes CSV with quoting and empty NULLs', () => {
    const csv = resultToCsv({
      ...USERS,
      columns: [column('id', 1), column('note', 2)],
      rows: [
        [
          { kind: 'int64', value: 1n },
          { kind: 'text', value: 'a,b' },
        ],
        [{ kind: 'int64', value: 2n }, { kind: 'null' }],
        [
          { kind: 'int64', value: 3n },
          { kind: 'text', value: 'say "hi"' },
        ],
      ],
    });
    assert.equal(csv, 'id,note\n1,"a,b"\n2,\n3,"say ""hi"""\n');
  });

  it('keeps exact digits in JSON', () => {
    const json = resultToJson({
      ...USERS,
      columns: [column('id', 1, 'int8'), column('total', 2, 'numeric')],
      rows: [
        [
          { kind: 'int64', value: 9007199254740993n },
          { kind: 'decimal', digits: '100.50' },
        ],
      ],
    });
    assert.deepEqual(json, {
      columns: [
        { name: 'id', type: 'int8' },
        { name: 'total', type: 'numeric' },
      ],
      rows: [['9007199254740993', '100.50']],
      rowCount: 1,
      command: 'SELECT',
      rowsAffected: null,
      truncated: false,
      durationMs: 12,
    });
  });
});

describe('renderSnapshot', () => {
  it('marks the selected connection', () => {
    const snapshot: NavSnapshot = {
      view: {
        kind: 'connection_list',
        items: [ALPHA, profile('p-2', 'beta', 'sqlite', 'prod')],
        selected: 1,
        filter: '',
      },
      loading: null,
      error: null,
      depth: 0,
      profile: null,
    };
    assert.equal(
      renderSnapshot(snapshot),
      ['not connected > Connections', '  1. alpha (postgres, dev)', '> 2. beta (sqlite, prod)'].join('\n'),
    );
  });

  it('shows the filter, loading label and error banner', () => {
    const schema = { database: 'app', name: 'public', owner: null };
    const snapshot: NavSnapshot = {
      view: {
        kind: 'table_list',
        schema,
        items: [
          { database: 'app', schema: 'public', name: 'users', kind: 'table', sizeLabel: '16 kB' },
          { database: 'app', schema: 'public', name: 'user_roles', kind: 'view', sizeLabel: null },
          { database: 'app', schema: 'public', name: 'orders', kind: 'table', sizeLabel: '8192 bytes' },
        ],
        selected: 0,
        filter: 'USER',
      },
      loading: { seq: 3, label: 'Loading tables', rowsFetched: 0 },
      error: { source: 'catalog', code: 'failed', message: 'boom', dismissible: true },
      depth: 3,
      profile: ALPHA,
    };
    assert.equal(
      renderSnapshot(snapshot),
      [
        'alpha [dev] > Tables in app.public',
        'Filter: USER (2 of 3)',
        '> 1. users (table, 16 kB)',
        '  2. user_roles (view)',
        '... Loading tables',
        '! catalog/failed: boom',
      ].join('\n'),
    );
  });

  it('renders browsed rows as a table', () => {
    const snapshot: NavSnapshot = {
      view: {
        kind: 'row_browser',
        table: { database: 'app', schema: 'public', name: 'users', kind: 'table', sizeLabel: null },
        columns: USERS.columns,
        keyColumns: [0],
        truncated: true,
        items: USERS.rows,
        selected: 1,
        filter: '',
      },
      loading: null,
      error: null,
      depth: 5,
      profile: ALPHA,
    };
    assert.equal(
      renderSnapshot(snapshot),
      [
        'alpha [dev] > Rows of public.users',
        '#  | id | name',
        '---+----+-----',
        ' 1 | 1  | Ada',
        '>2 | 2  | NULL',
        '2 rows (truncated)',
      ].join('\n'),
    );
  });

  it('shows an empty editor and query progress', () => {
    const snapshot: NavSnapshot = {
      view: { kind: 'query_editor', text: '' },
      loading: { seq: 7, label: 'Running query', rowsFetched: 1000 },
      error: null,
      depth: 2,
      profile: ALPHA,
    };
    assert.equal(renderSnapshot(snapshot), ['alpha [dev] > Query editor', '(empty query)', '... Running query (1000 rows)'].join('\n'));
  });
});
