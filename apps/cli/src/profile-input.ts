/**
 * Profile flags from `profiles add` and `profiles edit`, checked and
 * turned into store input.
 */

import { resolve } from 'node:path';
import {
  BACKEND_KINDS,
  CREDENTIAL_POLICIES,
  ENVIRONMENT_TAGS,
  isBackendKind,
  isCredentialPolicy,
  isEnvironmentTag,
  validateProfile,
  type ConnectionProfile,
  type CredentialPolicy,
  type EnvironmentTag,
  type ProfileInput,
} from '@quarry/core';
import { parsePort } from './argv.js';
import { usageError } from './errors.js';

export interface ProfileFlags {
  name?: string;
  backend?: string;
  host?: string;
  port?: string;
  database?: string;
  file?: string;
  user?: string;
  ssl?: boolean;
  env?: string;
  credentialPolicy?: string;
}

export type ProfilePatch = Partial<Omit<ProfileInput, 'name' | 'backendKind'>>;

export const DEFAULT_PG_PORT = 5432;

function environmentFlag(raw: string | undefined): EnvironmentTag | undefined {
  if (raw === undefined) return undefined;
  if (!isEnvironmentTag(raw)) {
    throw usageError(`Invalid --env "${raw}". Expected one of: ${ENVIRONMENT_TAGS.join(', ')}.`);
  }
  return raw;
}

function policyFlag(raw: string | undefined): CredentialPolicy | undefined {
  if (raw === undefined) return undefined;
  if (!isCredentialPolicy(raw)) {
    throw usageError(`Invalid --credential-policy "${raw}". Expected one of: ${CREDENTIAL_POLICIES.join(', ')}.`);
  }
  return raw;
}

function assertValid(input: ProfileInput): ProfileInput {
  const issues = validateProfile(input);
  if (issues.length > 0) {
    throw usageError(issues.map((issue) => issue.message).join(' '), 'PROFILE_INVALID', { issues });
  }
  return input;
}

export function profileInputFromFlags(flags: ProfileFlags): ProfileInput {
  const backend = flags.backend;
  if (!isBackendKind(backend)) {
    throw usageError(`Invalid --backend "${backend ?? ''}". Expected one of: ${BACKEND_KINDS.join(', ')}.`);
  }
  const port = parsePort(flags.port);
  return assertValid({
    name: flags.name ?? '',
    backendKind: backend,
    host: flags.host ?? null,
    port: backend === 'postgres' ? port ?? DEFAULT_PG_PORT : null,
    database: flags.database ?? null,
    filePath: flags.file ? resolve(flags.file) : null,
    user: flags.user ?? null,
    ssl: flags.ssl ?? false,
    environment: environmentFlag(flags.env) ?? 'dev',
    credentialPolicy: policyFlag(flags.credentialPolicy) ?? 'prompt-always',
  });
}

/** Only the flags that were given; the merged profile must still be valid */
export function profilePatchFromFlags(current: ConnectionProfile, flags: ProfileFlags): ProfilePatch {
  const patch: ProfilePatch = {};
  if (flags.host !== undefined) patch.host = flags.host;
  if (flags.port !== undefined) patch.port = parsePort(flags.port);
  if (flags.database !== undefined) patch.database = flags.database;
  if (flags.file !== undefined) patch.filePath = resolve(flags.file);
  if (flags.user !== undefined) patch.user = flags.user;
  if (flags.ssl !== undefined) patch.ssl = flags.ssl;
  const environment = environmentFlag(flags.env);
  if (environment !== undefined) patch.environment = environment;
  const credentialPolicy = policyFlag(flags.credentialPolicy);
  if (credentialPolicy !== undefined) patch.credentialPolicy = credentialPolicy;

  if (Object.keys(patch).length === 0) {
    throw usageError('Nothing to change. Pass at least one field flag.');
  }
  assertValid({
    name: current.name,
    backendKind: current.backendKind,
    host: current.host,
    port: current.port,
    database: current.database,
    filePath: current.filePath,
    user: current.user,
    ssl: current.ssl,
    environment: current.environment,
    credentialPolicy: current.credentialPolicy,
    ...patch,
  });
  return patch;
}

/** One-line description of where a profile points */
export function profileTarget(profile: ConnectionProfile): string {
  if (profile.backendKind === 'sqlite') return profile.filePath ?? '';
  const user = profile.user ? `${profile.user}@` : '';
  const port = profile.port ?? DEFAULT_PG_PORT;
  return `${user}${profile.host ?? ''}:${port}/${profile.database ?? ''}`;
}
