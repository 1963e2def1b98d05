import { readFile } from 'node:fs/promises';
import {
  ConfigurationError,
  PRIMARY_DISK_SLOT,
  VmOptionValue,
  VmOptions,
} from '@pve-forge/shared';
import YAML from 'yaml';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import { PRESETS } from './presets.js';

/** Baseline applied to every VM before presets and config files */
export const BUILTIN_DEFAULTS: VmOptions = {
  cores: 1,
  memory: 1024,
  ostype: 'l26',
  scsihw: 'virtio-scsi-pci',
  serial0: 'socket',
  vga: 'serial0',
};

/** Raw key/value document as read from a YAML or JSON file */
export const ConfigDocument = z.record(VmOptionValue);
export type ConfigDocument = z.infer<typeof ConfigDocument>;

export interface DiskSpec {
  storage: string;
  sizeGiB: number;
  /** Disk options after the size, including the leading comma */
  suffix: string;
}

export interface VmOptionOverrides {
  id?: number;
  image?: string;
}

export interface BuildVmOptionsInput {
  defaults: VmOptions;
  presetName?: string;
  fileConfig: ConfigDocument;
  overrides: VmOptionOverrides;
}

export interface BuiltVmOptions {
  options: VmOptions;
  id?: number;
  image?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

async function readDocument(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  // JSON is a subset of YAML 1.2
  return YAML.parse(raw);
}

/** Load a VM config file (YAML or JSON) */
export async function loadVmConfig(filePath: string): Promise<ConfigDocument> {
  let doc: unknown;
  try {
    doc = await readDocument(filePath);
  } catch {
    throw new ConfigurationError(`Could not load config ${filePath}`);
  }
  if (doc == null) {
    throw new ConfigurationError(`Could not load config ${filePath}`);
  }

  const parsed = ConfigDocument.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Built-in defaults overlaid by the optional defaults document.
 * A missing document is not an error.
 */
export async function loadDefaults(filePath: string, logger: Logger): Promise<VmOptions> {
  let doc: unknown;
  try {
    doc = await readDocument(filePath);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.debug({ file: filePath }, 'No defaults file, using built-in defaults');
      return { ...BUILTIN_DEFAULTS };
    }
    throw new ConfigurationError(`Could not load defaults ${filePath}`);
  }
  if (doc == null) return { ...BUILTIN_DEFAULTS };

  const parsed = VmOptions.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid defaults ${filePath}: ${formatIssues(parsed.error)}`);
  }
  logger.debug({ file: filePath }, 'Loaded VM defaults');
  return { ...BUILTIN_DEFAULTS, ...parsed.data };
}

function extractId(value: VmOptionValue | undefined): number | undefined {
  if (value === undefined) return undefined;
  const id = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof id !== 'number' || !Number.isInteger(id) || id < 1) {
    throw new ConfigurationError(`Config "id" must be a positive integer, got ${String(value)}`);
  }
  return id;
}

function extractImage(value: VmOptionValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigurationError('Config "image" must be a path or URL');
  }
  return value;
}

/**
 * Merge defaults < preset < config file into the options sent on create.
 * `id` and `image` are pulled out of the config file; explicit overrides win.
 */
export function buildVmOptions(input: BuildVmOptionsInput, logger: Logger): BuiltVmOptions {
  const { id: fileId, image: fileImage, ...fileOptions } = input.fileConfig;

  let preset: VmOptions = {};
  if (input.presetName !== undefined) {
    const found = PRESETS[input.presetName];
    if (found) {
      preset = found;
    } else {
      logger.warn({ preset: input.presetName }, `Preset ${input.presetName} not found. Ignoring`);
    }
  }

  const parsed = VmOptions.safeParse({ ...input.defaults, ...preset, ...fileOptions });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid VM options: ${formatIssues(parsed.error)}`);
  }
  if (parsed.data[PRIMARY_DISK_SLOT] === undefined) {
    throw new ConfigurationError('Your config has no disk specified');
  }

  const id = input.overrides.id ?? extractId(fileId);
  const image = input.overrides.image ?? extractImage(fileImage);
  return {
    options: parsed.data,
    ...(id !== undefined ? { id } : {}),
    ...(image !== undefined ? { image } : {}),
  };
}

const DISK_SPEC_RE = /^([^:,]+):(\d+)(,.*)?$/;

/** Split `<storage>:<sizeGiB>[,opts]` */
export function parseDiskSpec(slot: string, value: string): DiskSpec {
  const match = DISK_SPEC_RE.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new ConfigurationError(
      `Invalid disk definition for "${slot}": "${value}" (expected <storage>:<size>)`,
    );
  }
  return { storage: match[1], sizeGiB: Number(match[2]), suffix: match[3] ?? '' };
}

export function formatDiskSpec(spec: DiskSpec): string {
  return `${spec.storage}:${spec.sizeGiB}${spec.suffix}`;
}

/** Base name of a config path without directory or extension, lower-cased */
export function configBaseName(filePath: string): string {
  const file = filePath.split(/[\\/]/).pop() ?? filePath;
  const dot = file.lastIndexOf('.');
  return (dot > 0 ? file.slice(0, dot) : file).toLowerCase();
}
