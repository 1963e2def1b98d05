import { readFile } from 'node:fs/promises';
import { ConfigurationError, type FetchFn, type VmOptions } from '@pve-forge/shared';

export interface SshKeySources {
  readFile?: (path: string) => Promise<string>;
  fetchFn?: FetchFn;
}

async function readKeyFile(path: string, read: (path: string) => Promise<string>): Promise<string> {
  try {
    return await read(path);
  } catch (err: unknown) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') throw new ConfigurationError(`Could not find sshkeys file: ${path}`);
    if (code === 'EACCES') throw new ConfigurationError(`Could not open sshkeys file: ${path}`);
    throw new ConfigurationError(`Could not read sshkeys file: ${path}`);
  }
}

async function fetchKeys(url: string, fetchFn: FetchFn): Promise<string> {
  let res: Response;
  try {
    res = await fetchFn(url);
  } catch {
    throw new ConfigurationError(`Could not load sshkeys from url: ${url}`);
  }
  if (!res.ok) {
    throw new ConfigurationError(`Could not load sshkeys from url: ${url} (${res.status})`);
  }
  return res.text();
}

/**
 * Resolve `sshkeys` (literal keys, an absolute key file path or an http(s) URL)
 * and URI-encode the result for the API.
 */
export async function encodeSshKeys(value: string, sources: SshKeySources = {}): Promise<string> {
  let keys = value;
  if (value.startsWith('/')) {
    keys = await readKeyFile(value, sources.readFile ?? ((p) => readFile(p, 'utf-8')));
    if (!keys.trim()) throw new ConfigurationError(`There is no key in file: ${value}`);
  } else if (/^https?:\/\//.test(value)) {
    keys = await fetchKeys(value, sources.fetchFn ?? globalThis.fetch.bind(globalThis));
    if (!keys.trim()) throw new ConfigurationError(`There is no key at url: ${value}`);
  }
  return encodeURIComponent(keys.trim());
}

/** Options with `sshkeys` (when present) resolved and encoded */
export async function withEncodedSshKeys(options: VmOptions, sources: SshKeySources = {}): Promise<VmOptions> {
  if (typeof options.sshkeys !== 'string') return options;
  return { ...options, sshkeys: await encodeSshKeys(options.sshkeys, sources) };
}
