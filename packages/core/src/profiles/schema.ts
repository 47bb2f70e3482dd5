/**
 * JSON schema for profile import files: an array of profile records.
 * Plain object schema, compiled with the record type as the guard.
 */

import _Ajv from 'ajv';
import { BACKEND_KINDS, CREDENTIAL_POLICIES, ENVIRONMENT_TAGS } from '../db/types.js';
import { validateProfile, type ProfileInput } from './validate.js';

const Ajv = _Ajv.default;

export const profileRecordsSchema = {
  type: 'array' as const,
  items: {
    type: 'object' as const,
    properties: {
      name: { type: 'string' as const, minLength: 1 },
      backendKind: { type: 'string' as const, enum: [...BACKEND_KINDS] },
      host: { type: ['string', 'null'] as const },
      port: { type: ['integer', 'null'] as const, minimum: 1, maximum: 65535 },
      database: { type: ['string', 'null'] as const },
      filePath: { type: ['string', 'null'] as const },
      user: { type: ['string', 'null'] as const },
      ssl: { type: 'boolean' as const },
      environment: { type: 'string' as const, enum: [...ENVIRONMENT_TAGS] },
      credentialPolicy: { type: 'string' as const, enum: [...CREDENTIAL_POLICIES] },
    },
    required: ['name', 'backendKind'] as const,
    additionalProperties: false,
  },
};

const ajv = new Ajv({ allErrors: true });
const validateRecords = ajv.compile<ProfileInput[]>(profileRecordsSchema);

export class ProfileImportError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[]) {
    super(message);
    this.name = 'ProfileImportError';
    this.problems = problems;
  }
}

/**
 * Check parsed JSON against the schema, then each record against the
 * field rules. Throws ProfileImportError listing every problem found.
 */
export function parseProfileRecords(data: unknown): ProfileInput[] {
  if (!validateRecords(data)) {
    const problems = (validateRecords.errors ?? []).map(
      (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`,
    );
    throw new ProfileImportError('Profile file does not match the expected format.', problems);
  }

  const problems: string[] = [];
  const names = new Set<string>();
  data.forEach((record, index) => {
    for (const issue of validateProfile(record)) {
      problems.push(`/${index}/${issue.field} ${issue.message}`);
    }
    if (names.has(record.name)) {
      problems.push(`/${index}/name duplicates "${record.name}".`);
    }
    names.add(record.name);
  });
  if (problems.length > 0) {
    throw new ProfileImportError('Some profiles are invalid.', problems);
  }
  return data;
}
