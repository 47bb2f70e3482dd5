/**
 * Secret storage interface.
 * Implementations: NoopSecretStore (CLI, secrets come from env or prompt),
 * MemorySecretStore (kept for the life of the process).
 * Any method may throw when the platform store is unavailable.
 */

export interface SecretStore {
  /** Store the secret for a profile */
  set(profileId: string, secret: string): Promise<void>;
  /** Retrieve a stored secret, or null if not found */
  get(profileId: string): Promise<string | null>;
  /** Delete a stored secret; deleting a missing one is not an error */
  delete(profileId: string): Promise<void>;
}
