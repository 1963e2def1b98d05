import type { CredentialRecord } from '../schemas/credentials.js';

/** Function that executes a command and returns stdout */
export type ExecFn = (command: string, args: string[]) => Promise<string>;

/** Injectable fetch function for testing */
export type FetchFn = typeof globalThis.fetch;

/** Shell access to the target host */
export interface RemoteExec {
  /** Run a shell command remotely; rejects with RemoteOperationError on non-zero exit */
  run(command: string): Promise<string>;
}

/** Cached per-host credentials */
export interface CredentialProvider {
  lookup(host: string): Promise<CredentialRecord | undefined>;
  store(host: string, record: CredentialRecord): Promise<void>;
  invalidate(host: string): Promise<void>;
}

/** Interactive operator input */
export interface Prompter {
  confirm(question: string): Promise<boolean>;
  text(question: string): Promise<string>;
  secret(question: string): Promise<string>;
}
