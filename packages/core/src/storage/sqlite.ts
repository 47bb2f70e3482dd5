/**
 * Local state store using better-sqlite3.
 * Stores connection profiles and settings.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { ConnectionProfile } from '../db/types.js';
import {
  isBackendKind,
  isCredentialPolicy,
  isEnvironmentTag,
  type ProfileInput,
} from '../profiles/validate.js';
import type { ProfileSource } from '../nav/types.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: profiles
  `CREATE TABLE IF NOT EXISTS profiles (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    backend_kind TEXT NOT NULL,
    host TEXT,
    port INTEGER,
    database TEXT,
    file_path TEXT,
    "user" TEXT,
    ssl INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 2: settings (key-value)
  `CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  )`,

  // 3: environment tag and credential policy
  `ALTER TABLE profiles ADD COLUMN environment TEXT NOT NULL DEFAULT 'dev'`,
  `ALTER TABLE profiles ADD COLUMN credential_policy TEXT NOT NULL DEFAULT 'prompt-always'`,
];

// ── Profile type ─────────────────────────────────────────────────────

export interface StoredProfile {
  id: string;
  name: string;
  backend_kind: string;
  host: string | null;
  port: number | null;
  database: string | null;
  file_path: string | null;
  user: string | null;
  ssl: number;
  environment: string;
  credential_policy: string;
  created_at: string;
}

/** Row → engine profile. An unknown environment reads as prod, an unknown policy as prompt-always. */
export function toConnectionProfile(stored: StoredProfile): ConnectionProfile {
  if (!isBackendKind(stored.backend_kind)) {
    throw new Error(`Profile "${stored.name}" has unknown backend "${stored.backend_kind}".`);
  }
  return {
    id: stored.id,
    name: stored.name,
    backendKind: stored.backend_kind,
    host: stored.host,
    port: stored.port,
    database: stored.database,
    filePath: stored.file_path,
    user: stored.user,
    ssl: stored.ssl === 1,
    environment: isEnvironmentTag(stored.environment) ? stored.environment : 'prod',
    credentialPolicy: isCredentialPolicy(stored.credential_policy) ? stored.credential_policy : 'prompt-always',
  };
}

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.QUARRY_HOME?.trim();
  return home ? join(home, 'quarry.db') : join(homedir(), '.quarry', 'quarry.db');
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore implements ProfileSource {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]); // ensure migrations table exists

    const applied = this.db.prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version').all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  // ── Profile repository ───────────────────────────────────────────

  createProfile(profile: ProfileInput): StoredProfile {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO profiles (id, name, backend_kind, host, port, database, file_path, "user", ssl, environment, credential_policy)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        profile.name,
        profile.backendKind,
        profile.host ?? null,
        profile.port ?? null,
        profile.database ?? null,
        profile.filePath ?? null,
        profile.user ?? null,
        profile.ssl ? 1 : 0,
        profile.environment ?? 'dev',
        profile.credentialPolicy ?? 'prompt-always',
      );

    const created = this.getProfileById(id);
    if (!created) throw new Error(`Profile "${profile.name}" was not saved.`);
    return created;
  }

  /** Change the given fields; name and backend stay as they are */
  updateProfile(name: string, patch: Partial<Omit<ProfileInput, 'name' | 'backendKind'>>): boolean {
    const assignments: Array<[string, string | number | null | undefined]> = [
      ['host', patch.host],
      ['port', patch.port],
      ['database', patch.database],
      ['file_path', patch.filePath],
      ['"user"', patch.user],
      ['ssl', patch.ssl === undefined ? undefined : patch.ssl ? 1 : 0],
      ['environment', patch.environment],
      ['credential_policy', patch.credentialPolicy],
    ];
    const parts: string[] = [];
    const values: Array<string | number | null> = [];
    for (const [column, value] of assignments) {
      if (value === undefined) continue;
      parts.push(`${column} = ?`);
      values.push(value);
    }

    if (parts.length === 0) return false;

    values.push(name);
    const result = this.db.prepare(`UPDATE profiles SET ${parts.join(', ')} WHERE name = ?`).run(...values);
    return result.changes > 0;
  }

  listStoredProfiles(): StoredProfile[] {
    return this.db.prepare<[], StoredProfile>('SELECT * FROM profiles ORDER BY name').all();
  }

  /** ProfileSource for the navigator */
  async listProfiles(): Promise<ConnectionProfile[]> {
    return this.listStoredProfiles().map(toConnectionProfile);
  }

  getProfileByName(name: string): StoredProfile | undefined {
    return this.db.prepare<[string], StoredProfile>('SELECT * FROM profiles WHERE name = ?').get(name);
  }

  getProfileById(id: string): StoredProfile | undefined {
    return this.db.prepare<[string], StoredProfile>('SELECT * FROM profiles WHERE id = ?').get(id);
  }

  deleteProfile(name: string): boolean {
    const result = this.db.prepare('DELETE FROM profiles WHERE name = ?').run(name);
    // Clear active profile if it was this one
    const active = this.getActiveProfile();
    if (active === name) {
      this.db.prepare("DELETE FROM settings WHERE key = 'active_profile'").run();
    }
    return result.changes > 0;
  }

  // ── Active profile (settings) ────────────────────────────────────

  setActiveProfile(name: string): void {
    this.db.prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run('active_profile', name);
  }

  getActiveProfile(): string | null {
    const row = this.db
      .prepare<[], { value: string | null }>("SELECT value FROM settings WHERE key = 'active_profile'")
      .get();
    return row?.value ?? null;
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
