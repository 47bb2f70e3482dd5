import type { SecretStore } from './types.js';

/** Secrets held in a Map for the lifetime of the process. */
export class MemorySecretStore implements SecretStore {
  private readonly secrets = new Map<string, string>();

  async set(profileId: string, secret: string): Promise<void> {
    this.secrets.set(profileId, secret);
  }

  async get(profileId: string): Promise<string | null> {
    return this.secrets.get(profileId) ?? null;
  }

  async delete(profileId: string): Promise<void> {
    this.secrets.delete(profileId);
  }

  has(profileId: string): boolean {
    return this.secrets.has(profileId);
  }
}
