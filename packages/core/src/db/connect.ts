/**
 * Open a session for a profile: resolve credentials, then connect, then
 * apply the credential policy. Strictly in that order.
 */

import { ConnectionError, connectionError, errorMessage } from '../errors.js';
import type { CredentialResolver } from '../credentials/resolver.js';
import type { BackendRegistry } from './backend.js';
import type { ConnectionProfile, Session } from './types.js';

export interface ConnectDeps {
  registry: BackendRegistry;
  resolver: CredentialResolver;
  onWarning?: (message: string) => void;
}

export interface ConnectProfileOptions {
  timeoutMs: number;
}

export async function connectProfile(
  profile: ConnectionProfile,
  deps: ConnectDeps,
  options: ConnectProfileOptions,
): Promise<Session> {
  const warn = deps.onWarning ?? (() => {});
  const backend = deps.registry.forProfile(profile);
  const resolution = await deps.resolver.resolve(profile, { required: backend.requiresCredentials });

  let session: Session;
  try {
    session = await within(
      backend.connect(profile, resolution.credentials, { timeoutMs: options.timeoutMs }),
      options.timeoutMs,
      warn,
    );
  } catch (err) {
    if (err instanceof ConnectionError && err.kind === 'auth_failed') {
      throw await deps.resolver.reject(profile, resolution, err);
    }
    throw err;
  }

  await deps.resolver.commit(profile, resolution);
  return session;
}

/**
 * Bound connection establishment. A session that shows up after the
 * deadline is closed straight away.
 */
function within(connecting: Promise<Session>, timeoutMs: number, warn: (message: string) => void): Promise<Session> {
  return new Promise<Session>((resolve, reject) => {
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      reject(connectionError('timeout', `Connection not established within ${timeoutMs} ms.`, { timeoutMs }));
    }, timeoutMs);

    connecting.then(
      (session) => {
        if (!expired) {
          clearTimeout(timer);
          resolve(session);
          return;
        }
        session.close().catch((err: unknown) => warn(`Closing a late connection failed: ${errorMessage(err)}`));
      },
      (err: unknown) => {
        if (!expired) {
          clearTimeout(timer);
          reject(err);
          return;
        }
        warn(`Connection attempt failed after the timeout: ${errorMessage(err)}`);
      },
    );
  });
}
