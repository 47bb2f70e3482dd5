#!/usr/bin/env node

/**
 * Quarry CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  CredentialResolver,
  ENGINE_DEFAULTS,
  LocalStore,
  MemorySecretStore,
  NavigationStateMachine,
  NoopSecretStore,
  ProfileImportError,
  QueryExecutor,
  connectProfile,
  createDefaultRegistry,
  defaultDbPath,
  parseProfileRecords,
  resolveSettings,
  toConnectionProfile,
  type ConnectionProfile,
  type EngineSettings,
  type ProfileInput,
  type SecretStore,
  type Session,
} from '@quarry/core';
import { normalizeArgv, parsePositiveInt } from './argv.js';
import { runBrowse } from './browse.js';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, fromEngineError, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printDebug,
  printError,
  printHuman,
  printHumanTable,
  printJson,
  printVerbose,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { profileInputFromFlags, profilePatchFromFlags, profileTarget, type ProfileFlags } from './profile-input.js';
import { RESULT_FORMATS, isResultFormat, renderResultTable, resultToCsv, resultToJson } from './render.js';
import { passwordPrompt } from './util/password.js';

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

function openStore(): LocalStore {
  const store = new LocalStore(defaultDbPath());
  store.migrate();
  return store;
}

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

function getProfileForCommand(store: LocalStore, nameOpt?: string): ConnectionProfile {
  const profileName = nameOpt ?? store.getActiveProfile();
  if (!profileName) {
    throw usageError('No profile specified and no active profile set.');
  }
  const stored = store.getProfileByName(profileName);
  if (!stored) {
    throw usageError(`Profile "${profileName}" not found.`, 'PROFILE_NOT_FOUND');
  }
  return toConnectionProfile(stored);
}

interface EngineFlags {
  maxRows?: string;
  batchSize?: string;
  connectTimeoutMs?: string;
}

function withEngineFlags(cmd: Command): Command {
  return cmd
    .option('--max-rows <n>', `Rows kept per result (default ${ENGINE_DEFAULTS.maxRows})`)
    .option('--batch-size <n>', `Rows fetched per round trip (default ${ENGINE_DEFAULTS.batchSize})`)
    .option('--connect-timeout-ms <n>', `Connection timeout (default ${ENGINE_DEFAULTS.connectTimeoutMs})`);
}

function engineSettings(flags: EngineFlags): EngineSettings {
  const overrides: Partial<EngineSettings> = {};
  const maxRows = parsePositiveInt('--max-rows', flags.maxRows);
  const batchSize = parsePositiveInt('--batch-size', flags.batchSize);
  const connectTimeoutMs = parsePositiveInt('--connect-timeout-ms', flags.connectTimeoutMs);
  if (maxRows !== undefined) overrides.maxRows = maxRows;
  if (batchSize !== undefined) overrides.batchSize = batchSize;
  if (connectTimeoutMs !== undefined) overrides.connectTimeoutMs = connectTimeoutMs;
  return resolveSettings(overrides);
}

function createResolver(output: OutputOptions, store: SecretStore = new NoopSecretStore()): CredentialResolver {
  return new CredentialResolver({
    store,
    prompt: passwordPrompt(),
    onWarning: (message) => printWarning(message, output),
  });
}

async function openSession(profile: ConnectionProfile, settings: EngineSettings, output: OutputOptions): Promise<Session> {
  printVerbose(`Connecting to ${profile.name} (${profileTarget(profile)})...`, output);
  printDebug(`credential policy ${profile.credentialPolicy}, connect timeout ${settings.connectTimeoutMs} ms`, output);
  try {
    return await connectProfile(
      profile,
      {
        registry: createDefaultRegistry(),
        resolver: createResolver(output),
        onWarning: (message) => printWarning(message, output),
      },
      { timeoutMs: settings.connectTimeoutMs },
    );
  } catch (error: unknown) {
    throw fromEngineError(error);
  }
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function withProfileFieldFlags(cmd: Command): Command {
  return cmd
    .option('--host <host>', 'Database host (postgres)')
    .option('--port <port>', 'Database port (postgres, default 5432)')
    .option('--database <database>', 'Database name (postgres)')
    .option('--user <user>', 'Database user (postgres)')
    .option('--file <path>', 'Database file (sqlite)')
    .option('--env <env>', 'Environment label (dev|staging|prod)')
    .option('--credential-policy <policy>', 'Password handling (store|prompt-always|never-save)');
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('quarry')
  .description('Quarry — browse and query Postgres and SQLite from the terminal')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, profiles
  Query:    run, browse
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment and local state')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeMajor = parseInt(nodeVersion.slice(1), 10);
          const nodeOk = nodeMajor >= 20;
          const dbPath = defaultDbPath();
          const dataDir = dirname(dbPath);
          const dataDirExisted = existsSync(dataDir);

          const store = openStore();
          let profileCount: number;
          let activeProfile: string | null;
          try {
            profileCount = store.listStoredProfiles().length;
            activeProfile = store.getActiveProfile();
          } finally {
            store.close();
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            paths: { dataDir, dataDirExisted, dbPath, fromEnv: Boolean(process.env.QUARRY_HOME?.trim()) },
            passwordFromEnv: Boolean(process.env.QUARRY_PASSWORD),
            backends: createDefaultRegistry().kinds(),
            profiles: { count: profileCount, active: activeProfile },
            engineDefaults: { ...ENGINE_DEFAULTS },
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('Quarry Doctor', output);
          printHuman('=============', output);
          printHuman('', output);
          printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`Data dir:   ${dataDir} ${dataDirExisted ? '(exists)' : '(created)'}`, output);
          printHuman(`DB path:    ${dbPath}`, output);
          printHuman(`Password:   ${payload.passwordFromEnv ? 'QUARRY_PASSWORD set' : 'prompted on connect'}`, output);
          printHuman(`Backends:   ${payload.backends.join(', ')}`, output);
          printHuman(`Profiles:   ${profileCount}${activeProfile ? ` (active: ${activeProfile})` : ''}`, output);
          printHuman('', output);
          printHuman('Engine defaults:', output);
          printHuman(`  Batch size:       ${ENGINE_DEFAULTS.batchSize}`, output);
          printHuman(`  Max rows:         ${ENGINE_DEFAULTS.maxRows}`, output);
          printHuman(`  Connect timeout:  ${ENGINE_DEFAULTS.connectTimeoutMs}ms`, output);
          printHuman(`  Preview rows:     ${ENGINE_DEFAULTS.previewRowLimit}`, output);
        });
      }),
  ),
  ['quarry doctor', 'quarry doctor --json'],
);

// ── profiles ─────────────────────────────────────────────────────────

const profiles = program.command('profiles').description('Manage database connection profiles');

withExamples(
  withOutputFlags(
    withProfileFieldFlags(
      profiles
        .command('add')
        .description('Add a new connection profile')
        .requiredOption('--name <name>', 'Profile name')
        .requiredOption('--backend <backend>', 'Backend (postgres|sqlite)')
        .option('--ssl', 'Enable SSL (postgres)', false),
    ).action(async function (this: Command, opts: ProfileFlags) {
      await runCommand(this, async (output) => {
        const input = profileInputFromFlags(opts);
        const store = openStore();
        try {
          if (store.getProfileByName(input.name)) {
            throw usageError(`Profile "${input.name}" already exists.`, 'PROFILE_EXISTS');
          }
          store.createProfile(input);

          const becameActive = !store.getActiveProfile();
          if (becameActive) {
            store.setActiveProfile(input.name);
          }

          printCommandSuccess(
            { name: input.name, backend: input.backendKind, active: becameActive },
            output,
            becameActive ? `Profile "${input.name}" created and set as active.` : `Profile "${input.name}" created.`,
          );
        } finally {
          store.close();
        }
      });
    }),
  ),
  [
    'quarry profiles add --name local --backend postgres --host localhost --database app --user app',
    'quarry profiles add --name scratch --backend sqlite --file ./scratch.db',
    'quarry profiles add --name live --backend postgres --host db.internal --database app --user ro --env prod --credential-policy never-save',
  ],
);

withExamples(
  withOutputFlags(
    withProfileFieldFlags(
      profiles
        .command('edit')
        .description('Change fields of an existing profile')
        .argument('<name>', 'Profile name')
        .option('--ssl', 'Enable SSL (postgres)')
        .option('--no-ssl', 'Disable SSL (postgres)'),
    ).action(async function (this: Command, name: string, opts: ProfileFlags) {
      await runCommand(this, async (output) => {
        const store = openStore();
        try {
          const current = getProfileForCommand(store, name);
          const patch = profilePatchFromFlags(current, opts);
          store.updateProfile(name, patch);
          printCommandSuccess({ name, changed: Object.keys(patch) }, output, `Profile "${name}" updated.`);
        } finally {
          store.close();
        }
      });
    }),
  ),
  ['quarry profiles edit local --port 5433', 'quarry profiles edit live --env staging --no-ssl'],
);

withExamples(
  withOutputFlags(
    profiles
      .command('list')
      .description('List all profiles')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const store = openStore();
          try {
            const all = store.listStoredProfiles().map(toConnectionProfile);
            const active = store.getActiveProfile();

            if (output.json) {
              printCommandSuccess(
                all.map((profile) => ({ ...profile, active: profile.name === active })),
                output,
              );
              return;
            }

            if (all.length === 0) {
              printHuman('No profiles configured. Use "quarry profiles add" to create one.', output);
              return;
            }

            printHumanTable(
              ['', 'name', 'backend', 'target', 'env', 'credentials'],
              all.map((profile) => [
                profile.name === active ? '*' : '',
                profile.name,
                profile.backendKind,
                profileTarget(profile),
                profile.environment,
                profile.credentialPolicy,
              ]),
              output,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['quarry profiles list', 'quarry profiles list --json'],
);

withExamples(
  withOutputFlags(
    profiles
      .command('use')
      .description('Set the active profile')
      .argument('<name>', 'Profile name')
      .action(async function (this: Command, name: string) {
        await runCommand(this, async (output) => {
          const store = openStore();
          try {
            if (!store.getProfileByName(name)) {
              throw usageError(`Profile "${name}" not found.`, 'PROFILE_NOT_FOUND');
            }
            store.setActiveProfile(name);
            printCommandSuccess({ active: name }, output, `Active profile set to "${name}".`);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['quarry profiles use local'],
);

withExamples(
  withOutputFlags(
    profiles
      .command('remove')
      .description('Remove a profile')
      .argument('<name>', 'Profile name')
      .action(async function (this: Command, name: string) {
        await runCommand(this, async (output) => {
          const store = openStore();
          try {
            if (!store.deleteProfile(name)) {
              throw usageError(`Profile "${name}" not found.`, 'PROFILE_NOT_FOUND');
            }
            printCommandSuccess({ removed: name }, output, `Profile "${name}" removed.`);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['quarry profiles remove scratch'],
);

withExamples(
  withOutputFlags(
    withEngineFlags(
      profiles
        .command('test')
        .description('Connect with a profile and list its databases')
        .argument('[name]', 'Profile name (defaults to active)'),
    ).action(async function (this: Command, name: string | undefined, opts: EngineFlags) {
      await runCommand(this, async (output) => {
        const settings = engineSettings(opts);
        const store = openStore();
        let profile: ConnectionProfile;
        try {
          profile = getProfileForCommand(store, name);
        } finally {
          store.close();
        }

        const started = performance.now();
        const session = await openSession(profile, settings, output);
        try {
          const databases = await session.listDatabases();
          const elapsedMs = Math.round(performance.now() - started);
          printCommandSuccess(
            { name: profile.name, databases: databases.map((db) => db.name), elapsedMs },
            output,
            `Connected to "${profile.name}" in ${elapsedMs}ms; ${databases.length} database(s): ${databases
              .map((db) => db.name)
              .join(', ')}`,
          );
        } catch (error: unknown) {
          throw fromEngineError(error);
        } finally {
          await session.close();
        }
      });
    }),
  ),
  ['quarry profiles test', 'quarry profiles test local --connect-timeout-ms 3000'],
);

withExamples(
  withOutputFlags(
    profiles
      .command('import')
      .description('Import profiles from a JSON file')
      .argument('<file>', 'JSON file holding an array of profiles')
      .action(async function (this: Command, file: string) {
        await runCommand(this, async (output) => {
          let data: unknown;
          try {
            data = JSON.parse(readFileSync(file, 'utf-8'));
          } catch (error: unknown) {
            throw usageError(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
          }

          let records: ProfileInput[];
          try {
            records = parseProfileRecords(data);
          } catch (error: unknown) {
            if (error instanceof ProfileImportError) {
              throw usageError(`${error.message}\n  ${error.problems.join('\n  ')}`, 'PROFILE_INVALID', {
                problems: error.problems,
              });
            }
            throw error;
          }

          const store = openStore();
          try {
            const taken = records.filter((record) => store.getProfileByName(record.name)).map((record) => record.name);
            if (taken.length > 0) {
              throw usageError(`Profiles already exist: ${taken.join(', ')}.`, 'PROFILE_EXISTS', { names: taken });
            }
            for (const record of records) {
              store.createProfile(record);
            }
            if (!store.getActiveProfile() && records.length > 0) {
              store.setActiveProfile(records[0].name);
            }
            const names = records.map((record) => record.name);
            printCommandSuccess({ imported: names }, output, `Imported ${names.length} profile(s): ${names.join(', ')}`);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['quarry profiles import ./profiles.json'],
);

// ── run ──────────────────────────────────────────────────────────────

interface RunFlags extends EngineFlags {
  sql?: string;
  profile?: string;
  database?: string;
  format: string;
}

withExamples(
  withOutputFlags(
    withEngineFlags(
      program
        .command('run')
        .description('Execute a SQL statement and print the result')
        .option('--sql <sql>', 'SQL statement to execute (or pipe it on stdin)')
        .option('--profile <name>', 'Profile name (defaults to active)')
        .option('--database <name>', 'Run against another database on the same server')
        .option('--format <format>', `Output format (${RESULT_FORMATS.join('|')})`, 'table'),
    ).action(async function (this: Command, opts: RunFlags) {
      await runCommand(this, async (output) => {
        if (!isResultFormat(opts.format)) {
          throw usageError(`Invalid --format "${opts.format}". Expected one of: ${RESULT_FORMATS.join(', ')}.`);
        }
        const format = opts.format;
        let sql = opts.sql ?? '';
        if (!sql) {
          if (process.stdin.isTTY) {
            throw usageError('Provide SQL via --sql or pipe SQL via stdin.');
          }
          sql = await readStdin();
        }
        if (!sql.trim()) {
          throw usageError('Empty SQL statement.');
        }

        const settings = engineSettings(opts);
        const store = openStore();
        let profile: ConnectionProfile;
        try {
          profile = getProfileForCommand(store, opts.profile);
        } finally {
          store.close();
        }

        const session = await openSession(profile, settings, output);
        const controller = new AbortController();
        const onSigint = (): void => {
          printWarning('Cancelling query...', output);
          controller.abort();
        };
        process.on('SIGINT', onSigint);
        try {
          const result = await new QueryExecutor(settings).run(session, sql, {
            signal: controller.signal,
            database: opts.database,
            onProgress: (rows) => printVerbose(`${rows} rows fetched`, output),
          });

          printDebug(
            `${result.command || 'statement'} finished in ${Math.round(result.durationMs)} ms (batch size ${settings.batchSize}, max rows ${settings.maxRows})`,
            output,
          );
          if (result.truncated) {
            printWarning(`Result capped at ${settings.maxRows} rows; raise --max-rows to see more.`, output);
          }
          if (output.json) {
            printCommandSuccess(resultToJson(result), output);
          } else if (format === 'json') {
            printJson(resultToJson(result));
          } else if (format === 'csv') {
            process.stdout.write(resultToCsv(result));
          } else {
            printHuman(renderResultTable(result), output);
          }
        } catch (error: unknown) {
          throw fromEngineError(error);
        } finally {
          process.removeListener('SIGINT', onSigint);
          await session.close();
        }
      });
    }),
  ),
  [
    'quarry run --sql "SELECT * FROM users LIMIT 10"',
    'quarry run --sql "SELECT count(*) FROM events" --database analytics --format json',
    'cat report.sql | quarry run --format csv > report.csv',
  ],
);

// ── browse ───────────────────────────────────────────────────────────

interface BrowseFlags extends EngineFlags {
  profile?: string;
}

withExamples(
  withOutputFlags(
    withEngineFlags(
      program
        .command('browse')
        .description('Browse databases, schemas, tables and rows interactively')
        .option('--profile <name>', 'Connect to this profile right away'),
    ).action(async function (this: Command, opts: BrowseFlags) {
      await runCommand(this, async (output) => {
        if (!process.stdin.isTTY) {
          throw usageError('browse needs an interactive terminal.');
        }
        const settings = engineSettings(opts);
        const store = openStore();
        try {
          const warn = (message: string): void => printWarning(message, output);
          const machine = new NavigationStateMachine({
            profiles: store,
            registry: createDefaultRegistry(),
            // Passwords saved by the "store" policy last until the process exits.
            resolver: createResolver(output, new MemorySecretStore()),
            settings,
            onWarning: warn,
          });
          await machine.start();

          if (opts.profile) {
            const target = getProfileForCommand(store, opts.profile);
            await machine.dispatch({ type: 'enter', target: { type: 'connection', profileId: target.id } });
          }

          try {
            await runBrowse(machine, {
              input: process.stdin,
              output: process.stdout,
              print: (text) => console.log(text),
            });
          } finally {
            await machine.close();
          }
        } finally {
          store.close();
        }
      });
    }),
  ),
  ['quarry browse', 'quarry browse --profile local --max-rows 1000'],
);

// ── Main ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
