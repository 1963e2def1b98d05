import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  ConfigurationError,
  CredentialFile,
  type CredentialProvider,
  type CredentialRecord,
} from '@pve-forge/shared';
import YAML from 'yaml';
import type { Logger } from '../logger.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Per-host credentials persisted as a YAML mapping, readable by the owner only.
 * The file is read on every call; concurrent writers may lose updates.
 */
export class FileCredentialStore implements CredentialProvider {
  private filePath: string;
  private logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  private async read(): Promise<CredentialFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return {};
      throw new ConfigurationError(`Could not read credentials file at ${this.filePath}`);
    }

    let doc: unknown;
    try {
      doc = YAML.parse(raw);
    } catch {
      throw new ConfigurationError(`Credentials file is not valid YAML: ${this.filePath}`);
    }
    if (doc == null) return {};

    const parsed = CredentialFile.safeParse(doc);
    if (!parsed.success) {
      throw new ConfigurationError(`Credentials file is corrupted: ${this.filePath}`);
    }
    return parsed.data;
  }

  private async write(data: CredentialFile): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true, mode: 0o700 });
    await writeFile(this.filePath, YAML.stringify(data), { mode: 0o600 });
    // mode only applies on creation
    await chmod(this.filePath, 0o600);
  }

  async lookup(host: string): Promise<CredentialRecord | undefined> {
    const data = await this.read();
    return data[host];
  }

  async store(host: string, record: CredentialRecord): Promise<void> {
    const data = await this.read();
    data[host] = { ...data[host], ...record };
    await this.write(data);
    this.logger.debug({ host, file: this.filePath }, 'Stored credentials');
  }

  async invalidate(host: string): Promise<void> {
    const data = await this.read();
    if (!(host in data)) return;
    delete data[host];
    await this.write(data);
    this.logger.info({ host }, 'Removed cached credentials');
  }
}

/** In-process credential cache with no persistence */
export class MemoryCredentialStore implements CredentialProvider {
  readonly records = new Map<string, CredentialRecord>();

  constructor(initial: Record<string, CredentialRecord> = {}) {
    for (const [host, record] of Object.entries(initial)) {
      this.records.set(host, record);
    }
  }

  async lookup(host: string): Promise<CredentialRecord | undefined> {
    return this.records.get(host);
  }

  async store(host: string, record: CredentialRecord): Promise<void> {
    this.records.set(host, { ...this.records.get(host), ...record });
  }

  async invalidate(host: string): Promise<void> {
    this.records.delete(host);
  }
}
