import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { validateProfile } from '../validate.js';
import { ProfileImportError, parseProfileRecords } from '../schema.js';

describe('validateProfile', () => {
  it('accepts a complete postgres profile', () => {
    assert.deepEqual(
      validateProfile({ name: 'warehouse', backendKind: 'postgres', host: 'db', user: 'reader', database: 'app', port: 5432 }),
      [],
    );
  });

  it('lists every missing postgres field', () => {
    assert.deepEqual(validateProfile({ name: 'warehouse', backendKind: 'postgres', host: ' ' }), [
      { field: 'host', message: 'Host is required for postgres.' },
      { field: 'user', message: 'User is required for postgres.' },
      { field: 'database', message: 'Database is required for postgres.' },
    ]);
  });

  it('checks the port range', () => {
    const issues = validateProfile({
      name: 'warehouse',
      backendKind: 'postgres',
      host: 'db',
      user: 'reader',
      database: 'app',
      port: 70000,
    });
    assert.deepEqual(issues, [{ field: 'port', message: 'Port must be an integer between 1 and 65535.' }]);
  });

  it('requires a file path for sqlite', () => {
    assert.deepEqual(validateProfile({ name: 'local', backendKind: 'sqlite' }), [
      { field: 'filePath', message: 'File path is required for sqlite.' },
    ]);
  });

  it('rejects names with spaces', () => {
    assert.deepEqual(validateProfile({ name: 'my db', backendKind: 'sqlite', filePath: '/tmp/a.db' }), [
      { field: 'name', message: 'Name may only contain letters, digits, "_", "-" and ".".' },
    ]);
  });
});

describe('parseProfileRecords', () => {
  it('returns valid records unchanged', () => {
    const records = [
      { name: 'local', backendKind: 'sqlite', filePath: '/tmp/local.db', environment: 'dev' },
      { name: 'warehouse', backendKind: 'postgres', host: 'db', user: 'reader', database: 'app', credentialPolicy: 'store' },
    ];
    assert.deepEqual(parseProfileRecords(records), records);
  });

  it('reports schema violations with their location', () => {
    assert.throws(
      () => parseProfileRecords({ name: 'local' }),
      (err: unknown) => {
        assert.ok(err instanceof ProfileImportError);
        assert.equal(err.message, 'Profile file does not match the expected format.');
        assert.deepEqual(err.problems, ['/ must be array']);
        return true;
      },
    );
    assert.throws(
      () => parseProfileRecords([{ name: 'local', backendKind: 'mysql', filePath: '/tmp/a.db' }]),
      (err: unknown) => {
        assert.ok(err instanceof ProfileImportError);
        assert.deepEqual(err.problems, ['/0/backendKind must be equal to one of the allowed values']);
        return true;
      },
    );
  });

  it('reports field rules and duplicate names per record', () => {
    assert.throws(
      () =>
        parseProfileRecords([
          { name: 'local', backendKind: 'sqlite', filePath: '/tmp/a.db' },
          { name: 'local', backendKind: 'sqlite' },
        ]),
      (err: unknown) => {
        assert.ok(err instanceof ProfileImportError);
        assert.equal(err.message, 'Some profiles are invalid.');
        assert.deepEqual(err.problems, [
          '/1/filePath File path is required for sqlite.',
          '/1/name duplicates "local".',
        ]);
        return true;
      },
    );
  });
});
