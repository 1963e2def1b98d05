import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { type ExecFn, type RemoteExec, RemoteOperationError } from '@pve-forge/shared';
import type { Logger } from '../logger.js';
import { scrubString } from './scrubber.js';

const execFileAsync = promisify(execFile);

/** Default exec function that shells out to real commands */
async function defaultExec(command: string, args: string[]): Promise<string> {
  // Downloads and conversions run for minutes; no timeout here
  const { stdout } = await execFileAsync(command, args, {
    maxBuffer: 10 * 1024 * 1024,
  });
  return stdout;
}

/** Quote a value for a POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface SshTarget {
  host: string;
  port: number;
  user: string;
}

function exitCodeOf(err: unknown): number | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

/** Runs shell commands on the target host through the local ssh client */
export class SshRemoteExec implements RemoteExec {
  private target: SshTarget;
  private logger: Logger;
  private exec: ExecFn;

  constructor(target: SshTarget, logger: Logger, exec?: ExecFn) {
    this.target = target;
    this.logger = logger;
    this.exec = exec ?? defaultExec;
  }

  async run(command: string): Promise<string> {
    const { host, port, user } = this.target;
    const scrubbed = scrubString(command);
    this.logger.debug({ host, command: scrubbed }, 'Running remote command');

    let stdout: string;
    try {
      stdout = await this.exec('ssh', ['-p', String(port), `${user}@${host}`, command]);
    } catch (err: unknown) {
      const exitCode = exitCodeOf(err);
      throw new RemoteOperationError(
        `Remote command failed${exitCode !== undefined ? ` (exit ${exitCode})` : ''}: ${scrubbed}`,
        exitCode !== undefined ? { exitCode } : {},
      );
    }

    const output = stdout.trim();
    if (output) this.logger.debug({ host, output: scrubString(output) }, 'Remote command output');
    return stdout;
  }
}
