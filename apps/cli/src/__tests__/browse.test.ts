import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import {
  BackendRegistry,
  CredentialResolver,
  MemorySecretStore,
  NavigationStateMachine,
  type ConnectionProfile,
  type ViewState,
} from '@quarry/core';
import { BROWSE_HELP, parseBrowseCommand, runBrowse } from '../browse.js';

const ALPHA: ConnectionProfile = {
  id: 'p-1',
  name: 'alpha',
  backendKind: 'sqlite',
  host: null,
  port: null,
  database: null,
  filePath: '/tmp/alpha.db',
  user: null,
  ssl: false,
  environment: 'dev',
  credentialPolicy: 'prompt-always',
};

const BETA: ConnectionProfile = { ...ALPHA, id: 'p-2', name: 'beta' };

const CONNECTIONS: ViewState = { kind: 'connection_list', items: [ALPHA, BETA], selected: 0, filter: '' };
const DATABASES: ViewState = { kind: 'database_list', items: [{ name: 'main' }], selected: 0, filter: '' };
const TABLES: ViewState = {
  kind: 'table_list',
  schema: { database: 'main', name: 'main', owner: null },
  items: [],
  selected: 0,
  filter: '',
};
const EDITOR: ViewState = { kind: 'query_editor', text: '' };
const RESULT: ViewState = {
  kind: 'result_view',
  sql: 'SELECT 1',
  columns: [],
  keyColumns: [],
  command: 'SELECT',
  rowsAffected: null,
  truncated: false,
  durationMs: 1,
  items: [],
  selected: 0,
  filter: '',
};

describe('parseBrowseCommand', () => {
  it('selects and opens by number in catalog lists', () => {
    assert.deepEqual(parseBrowseCommand('3', DATABASES), {
      type: 'intents',
      intents: [
        { type: 'select', index: 2 },
        { type: 'enter', target: { type: 'selection' } },
      ],
    });
  });

  it('only selects by number among rows', () => {
    assert.deepEqual(parseBrowseCommand('2', RESULT), { type: 'intents', intents: [{ type: 'select', index: 1 }] });
  });

  it('opens the selection on an empty line', () => {
    assert.deepEqual(parseBrowseCommand('', TABLES), {
      type: 'intents',
      intents: [{ type: 'enter', target: { type: 'selection' } }],
    });
    assert.deepEqual(parseBrowseCommand('  ', RESULT), { type: 'print' });
  });

  it('opens connections by profile name', () => {
    assert.deepEqual(parseBrowseCommand('open beta', CONNECTIONS), {
      type: 'intents',
      intents: [{ type: 'enter', target: { type: 'connection', profileId: 'p-2' } }],
    });
    assert.deepEqual(parseBrowseCommand('open nobody', CONNECTIONS), {
      type: 'invalid',
      message: 'No connection named "nobody".',
    });
  });

  it('opens catalog entries by name', () => {
    assert.deepEqual(parseBrowseCommand('open orders', TABLES), {
      type: 'intents',
      intents: [{ type: 'enter', target: { type: 'table', name: 'orders' } }],
    });
    assert.deepEqual(parseBrowseCommand('open x', RESULT), { type: 'invalid', message: 'Nothing to open by name here.' });
  });

  it('filters with a leading slash', () => {
    assert.deepEqual(parseBrowseCommand('/ord', TABLES), { type: 'intents', intents: [{ type: 'filter', query: 'ord' }] });
    assert.deepEqual(parseBrowseCommand('/', TABLES), { type: 'intents', intents: [{ type: 'filter', query: '' }] });
  });

  it('opens the editor and runs SQL', () => {
    assert.deepEqual(parseBrowseCommand('sql SELECT 1', TABLES), {
      type: 'intents',
      intents: [{ type: 'enter', target: { type: 'query_editor', text: 'SELECT 1' } }, { type: 'run_query' }],
    });
    assert.deepEqual(parseBrowseCommand('run', RESULT), {
      type: 'intents',
      intents: [{ type: 'run_query', text: undefined }],
    });
  });

  it('treats editor lines as SQL', () => {
    assert.deepEqual(parseBrowseCommand('SELECT * FROM orders', EDITOR), {
      type: 'intents',
      intents: [{ type: 'edit_query', text: 'SELECT * FROM orders' }, { type: 'run_query' }],
    });
    assert.deepEqual(parseBrowseCommand('back', EDITOR), { type: 'intents', intents: [{ type: 'back' }] });
  });

  it('rejects unknown words', () => {
    assert.deepEqual(parseBrowseCommand('frobnicate', DATABASES), {
      type: 'invalid',
      message: 'Unknown command "frobnicate". Type "help" for the list.',
    });
    assert.deepEqual(parseBrowseCommand('select x', DATABASES), { type: 'invalid', message: 'Usage: select <n>' });
    assert.deepEqual(parseBrowseCommand('QUIT', DATABASES), { type: 'quit' });
  });
});

async function waitFor(check: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !check(); i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
  assert.ok(check(), 'condition not reached');
}

describe('runBrowse', () => {
  it('prints snapshots and help until quit', async () => {
    const machine = new NavigationStateMachine({
      profiles: { listProfiles: async () => [ALPHA] },
      registry: new BackendRegistry(),
      resolver: new CredentialResolver({ store: new MemorySecretStore(), prompt: { ask: async () => null } }),
    });
    await machine.start();

    const input = new PassThrough();
    const printed: string[] = [];
    const done = runBrowse(machine, { input, output: new PassThrough(), print: (text) => printed.push(text) });

    input.write('help\n');
    input.write('open nobody\n');
    await waitFor(() => printed.length === 3);
    input.write('/alp\n');
    await waitFor(() => printed.length === 4);
    input.write('quit\n');
    await done;
    await machine.close();

    assert.deepEqual(printed, [
      'not connected > Connections\n> 1. alpha (sqlite, dev)',
      BROWSE_HELP,
      'No connection named "nobody".',
      'not connected > Connections\nFilter: alp (1 of 1)\n> 1. alpha (sqlite, dev)',
    ]);
  });
});
