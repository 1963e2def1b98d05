import type { FetchFn } from '@pve-forge/shared';
import { Agent, fetch as undiciFetch } from 'undici';

/**
 * Build a fetch function for the Proxmox API.
 * Fresh installs serve a self-signed certificate; with `insecure` set,
 * an undici Agent that skips certificate validation is used as dispatcher.
 * Node.js native fetch ignores https.Agent, hence undici.
 */
export function buildTlsFetch(insecure: boolean): FetchFn {
  if (insecure) {
    const agent = new Agent({
      connect: { rejectUnauthorized: false },
    });
    return ((input: string | URL | Request, init?: RequestInit) =>
      undiciFetch(input, {
        ...init,
        dispatcher: agent,
      } as Parameters<typeof undiciFetch>[1])) as FetchFn;
  }
  return globalThis.fetch.bind(globalThis);
}
