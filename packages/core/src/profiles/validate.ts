/**
 * Profile field rules shared by the CLI and the import path.
 */

import {
  BACKEND_KINDS,
  CREDENTIAL_POLICIES,
  ENVIRONMENT_TAGS,
  type BackendKind,
  type CredentialPolicy,
  type EnvironmentTag,
} from '../db/types.js';

export interface ProfileInput {
  name: string;
  backendKind: BackendKind;
  host?: string | null;
  port?: number | null;
  database?: string | null;
  /** SQLite only */
  filePath?: string | null;
  user?: string | null;
  ssl?: boolean;
  environment?: EnvironmentTag;
  credentialPolicy?: CredentialPolicy;
}

export interface ValidationIssue {
  field: keyof ProfileInput;
  message: string;
}

export function isBackendKind(value: unknown): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

export function isEnvironmentTag(value: unknown): value is EnvironmentTag {
  return ENVIRONMENT_TAGS.some((tag) => tag === value);
}

export function isCredentialPolicy(value: unknown): value is CredentialPolicy {
  return CREDENTIAL_POLICIES.some((policy) => policy === value);
}

function blank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}

/** Empty list when the profile can be saved */
export function validateProfile(input: ProfileInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (blank(input.name)) {
    issues.push({ field: 'name', message: 'Name is required.' });
  } else if (!/^[\w.-]+$/.test(input.name)) {
    issues.push({ field: 'name', message: 'Name may only contain letters, digits, "_", "-" and ".".' });
  }

  if (!isBackendKind(input.backendKind)) {
    issues.push({ field: 'backendKind', message: `Backend must be one of: ${BACKEND_KINDS.join(', ')}.` });
    return issues;
  }

  if (input.backendKind === 'postgres') {
    if (blank(input.host)) issues.push({ field: 'host', message: 'Host is required for postgres.' });
    if (blank(input.user)) issues.push({ field: 'user', message: 'User is required for postgres.' });
    if (blank(input.database)) issues.push({ field: 'database', message: 'Database is required for postgres.' });
    if (input.port !== undefined && input.port !== null) {
      if (!Number.isInteger(input.port) || input.port < 1 || input.port > 65535) {
        issues.push({ field: 'port', message: 'Port must be an integer between 1 and 65535.' });
      }
    }
  } else if (blank(input.filePath)) {
    issues.push({ field: 'filePath', message: 'File path is required for sqlite.' });
  }

  if (input.environment !== undefined && !isEnvironmentTag(input.environment)) {
    issues.push({ field: 'environment', message: `Environment must be one of: ${ENVIRONMENT_TAGS.join(', ')}.` });
  }
  if (input.credentialPolicy !== undefined && !isCredentialPolicy(input.credentialPolicy)) {
    issues.push({
      field: 'credentialPolicy',
      message: `Credential policy must be one of: ${CREDENTIAL_POLICIES.join(', ')}.`,
    });
  }
  return issues;
}
