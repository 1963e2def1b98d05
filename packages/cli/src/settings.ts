import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError, DEFAULT_API_PORT } from '@pve-forge/shared';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface Settings {
  /** YAML file caching per-host credentials */
  credentialsFile: string;
  /** Optional YAML document overlaying the built-in VM defaults */
  defaultsFile: string;
  apiPort: number;
  /** API token used instead of a password login when both parts are set */
  token?: { id: string; secret: string };
  /** Storage type scanned for `auto-thin` disk placement */
  storageType: string;
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Settings {
  const apiPort = env.PVE_FORGE_API_PORT ? Number(env.PVE_FORGE_API_PORT) : DEFAULT_API_PORT;
  if (!Number.isInteger(apiPort) || apiPort < 1 || apiPort > 65535) {
    throw new ConfigurationError('PVE_FORGE_API_PORT must be between 1 and 65535.');
  }

  const tokenId = env.PVE_FORGE_TOKEN_ID || undefined;
  const tokenSecret = env.PVE_FORGE_TOKEN_SECRET || undefined;
  if ((tokenId === undefined) !== (tokenSecret === undefined)) {
    throw new ConfigurationError(
      'PVE_FORGE_TOKEN_ID and PVE_FORGE_TOKEN_SECRET must be set together.',
    );
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of ${LOG_LEVELS.join(', ')}.`,
    );
  }

  return {
    credentialsFile:
      env.PVE_FORGE_CREDENTIALS || join(homedir(), '.pve-forge', 'credentials.yaml'),
    defaultsFile: resolve(cwd, env.PVE_FORGE_DEFAULTS || 'default_vm_options.yaml'),
    apiPort,
    ...(tokenId !== undefined && tokenSecret !== undefined
      ? { token: { id: tokenId, secret: tokenSecret } }
      : {}),
    storageType: env.PVE_FORGE_STORAGE_TYPE || 'lvmthin',
    logLevel,
  };
}
