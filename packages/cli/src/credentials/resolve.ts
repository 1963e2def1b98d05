import type { CredentialProvider, Prompter } from '@pve-forge/shared';
import type { Logger } from '../logger.js';

export interface CredentialRequest {
  /** Cache key, the host the credentials belong to */
  host: string;
  username?: string;
  password?: string;
  /** Prompt for a username when none is given or cached */
  askUsername: boolean;
  usernameLabel: string;
  passwordLabel: string;
  /** Persist prompted values */
  cache: boolean;
}

export interface ResolvedCredentials {
  username?: string;
  password: string;
  /** True when any value came from the operator rather than args or cache */
  prompted: boolean;
}

export interface CredentialDeps {
  credentials: CredentialProvider;
  prompter: Prompter;
  logger: Logger;
}

/** Turn a `_placeholder_` token into a prompt label, e.g. `_ci_user_` -> `Ci User` */
export function placeholderLabel(token: string): string {
  return token
    .replace(/^_+|_+$/g, '')
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function isPlaceholder(value: string): boolean {
  return value.length > 2 && value.startsWith('_') && value.endsWith('_');
}

/**
 * Resolve credentials from explicit values, then the cache, then the operator.
 * Prompted values are stored when caching is enabled.
 */
export async function resolveCredentials(
  request: CredentialRequest,
  deps: CredentialDeps,
): Promise<ResolvedCredentials> {
  const { host } = request;
  const cached =
    request.username !== undefined && request.password !== undefined
      ? undefined
      : await deps.credentials.lookup(host);

  let prompted = false;
  let username = request.username ?? cached?.username;
  if (username === undefined && request.askUsername) {
    username = await deps.prompter.text(`Please enter ${request.usernameLabel}:`);
    prompted = true;
  }

  let password = request.password ?? cached?.password;
  if (password === undefined) {
    password = await deps.prompter.secret(`Please enter ${request.passwordLabel}:`);
    prompted = true;
  } else if (request.password === undefined) {
    deps.logger.debug({ host }, 'Using cached credentials');
  }

  if (prompted && request.cache) {
    await deps.credentials.store(host, { ...(username !== undefined ? { username } : {}), password });
  }

  return { ...(username !== undefined ? { username } : {}), password, prompted };
}
