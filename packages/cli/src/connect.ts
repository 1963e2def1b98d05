import {
  AuthenticationError,
  type CredentialProvider,
  type FetchFn,
  type Prompter,
} from '@pve-forge/shared';
import { type ProxmoxAuth, login } from '@pve-forge/pve';
import { resolveCredentials } from './credentials/resolve.js';
import type { Logger } from './logger.js';

export const DEFAULT_API_USER = 'root@pam';

export interface ConnectOptions {
  server: string;
  endpoint: string;
  username?: string;
  password?: string;
  /** Store a prompted password */
  cache: boolean;
  token?: { id: string; secret: string };
}

export interface ConnectDeps {
  credentials: CredentialProvider;
  prompter: Prompter;
  logger: Logger;
  fetchFn: FetchFn;
}

/**
 * Authenticate against the API: token when configured, otherwise a
 * password ticket. A rejected password is dropped from the cache.
 */
export async function authenticate(options: ConnectOptions, deps: ConnectDeps): Promise<ProxmoxAuth> {
  if (options.token) {
    deps.logger.debug({ tokenId: options.token.id }, 'Using API token');
    return { kind: 'token', tokenId: options.token.id, tokenSecret: options.token.secret };
  }

  const resolved = await resolveCredentials(
    {
      host: options.server,
      ...(options.username !== undefined ? { username: options.username } : {}),
      ...(options.password !== undefined ? { password: options.password } : {}),
      askUsername: false,
      usernameLabel: 'Proxmox user',
      passwordLabel: `Proxmox password for ${options.server}`,
      cache: options.cache,
    },
    deps,
  );
  const username = resolved.username ?? DEFAULT_API_USER;

  try {
    const auth = await login(options.endpoint, username, resolved.password, deps.fetchFn);
    deps.logger.debug({ server: options.server, username }, 'Logged in');
    return auth;
  } catch (err: unknown) {
    if (err instanceof AuthenticationError) {
      await deps.credentials.invalidate(options.server);
    }
    throw err;
  }
}
