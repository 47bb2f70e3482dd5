/**
 * Credential resolution for one connect attempt.
 * The profile's policy decides whether the secret store is consulted and
 * whether a prompted secret is kept afterwards.
 */

import { CredentialError, errorMessage, type ConnectionError } from '../errors.js';
import type { SecretStore } from '../secrets/types.js';
import type { ConnectionProfile, Credentials } from '../db/types.js';

export type CredentialState =
  | 'not_resolved'
  | 'resolved_from_store'
  | 'resolved_from_prompt'
  | 'not_required'
  | 'failed';

export type PromptReason = 'missing' | 'policy' | 'store_unavailable';

export interface PromptRequest {
  profile: ConnectionProfile;
  reason: PromptReason;
}

export interface CredentialPrompt {
  /** Resolves null when the user cancels */
  ask(request: PromptRequest): Promise<string | null>;
}

export interface Resolution {
  state: 'resolved_from_store' | 'resolved_from_prompt' | 'not_required';
  credentials: Credentials;
}

export interface ResolveOptions {
  /** False for backends that never take a secret */
  required: boolean;
}

export interface CredentialResolverOptions {
  store: SecretStore;
  prompt: CredentialPrompt;
  onWarning?: (message: string) => void;
}

export class CredentialResolver {
  private readonly store: SecretStore;
  private readonly prompt: CredentialPrompt;
  private readonly warn: (message: string) => void;
  private current: CredentialState = 'not_resolved';

  constructor(options: CredentialResolverOptions) {
    this.store = options.store;
    this.prompt = options.prompt;
    this.warn = options.onWarning ?? (() => {});
  }

  get state(): CredentialState {
    return this.current;
  }

  async resolve(profile: ConnectionProfile, options: ResolveOptions): Promise<Resolution> {
    this.current = 'not_resolved';
    if (!options.required) {
      return this.settle({ state: 'not_required', credentials: { secret: '' } });
    }

    let reason: PromptReason = 'policy';
    if (profile.credentialPolicy === 'store') {
      reason = 'missing';
      try {
        const stored = await this.store.get(profile.id);
        if (stored !== null) {
          return this.settle({ state: 'resolved_from_store', credentials: { secret: stored } });
        }
      } catch (err) {
        reason = 'store_unavailable';
        this.warn(`Secret store unavailable (${errorMessage(err)}); asking for the password instead.`);
      }
    }

    let secret: string | null;
    try {
      secret = await this.prompt.ask({ profile, reason });
    } catch (err) {
      this.current = 'failed';
      throw err;
    }
    if (secret === null) {
      this.current = 'failed';
      throw new CredentialError('prompt_cancelled', `Password entry cancelled for "${profile.name}".`);
    }
    return this.settle({ state: 'resolved_from_prompt', credentials: { secret } });
  }

  /**
   * Apply the persistence policy after the backend accepted the secret.
   * Store failures are reported as warnings; the session stays open.
   */
  async commit(profile: ConnectionProfile, resolution: Resolution): Promise<void> {
    switch (profile.credentialPolicy) {
      case 'store':
        if (resolution.state !== 'resolved_from_prompt') return;
        try {
          await this.store.set(profile.id, resolution.credentials.secret);
        } catch (err) {
          this.warn(`Could not save the password for "${profile.name}": ${errorMessage(err)}`);
        }
        return;
      case 'never-save':
        if (resolution.state === 'not_required') return;
        try {
          await this.store.delete(profile.id);
        } catch (err) {
          this.warn(`Could not clear the stored password for "${profile.name}": ${errorMessage(err)}`);
        }
        return;
      case 'prompt-always':
        return;
    }
  }

  /**
   * The backend refused the secret. Never retried automatically; a refused
   * stored secret is dropped so the next attempt prompts again.
   */
  async reject(profile: ConnectionProfile, resolution: Resolution, cause: ConnectionError): Promise<CredentialError> {
    this.current = 'failed';
    if (resolution.state === 'resolved_from_store') {
      try {
        await this.store.delete(profile.id);
      } catch (err) {
        this.warn(`Could not clear the rejected password for "${profile.name}": ${errorMessage(err)}`);
      }
    }
    return new CredentialError('invalid_credential', `Credentials for "${profile.name}" were rejected: ${cause.message}`, {
      connectionKind: cause.kind,
    });
  }

  private settle(resolution: Resolution): Resolution {
    this.current = resolution.state;
    return resolution;
  }
}
