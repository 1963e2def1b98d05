import {
  type ClusterVm,
  ConfigurationError,
  DEFAULT_TEMPLATE_BASE_ID,
  DEFAULT_VM_BASE_ID,
  IdentityConflictError,
  TEMPLATE_NAME_SUFFIX,
} from '@pve-forge/shared';
import { configBaseName } from '../config/vm-options.js';
import type { Logger } from '../logger.js';

export interface IdentityRequest {
  name: string;
  id?: number;
  baseId?: number;
  template: boolean;
  replace: boolean;
}

export interface VmIdentity {
  id: number;
  name: string;
  isTemplate: boolean;
  replace: boolean;
  /** The guest being replaced, when there is one */
  existing?: ClusterVm;
}

/**
 * First free id past `base`, walking upward or (for templates) downward.
 */
export function allocateId(inUse: Iterable<number>, base: number, descending: boolean): number {
  const step = descending ? -1 : 1;
  const ids = [...new Set(inUse)].sort((a, b) => (descending ? b - a : a - b));

  let candidate = base + step;
  for (const id of ids) {
    if (id === candidate) candidate += step;
  }
  if (candidate < 1) {
    throw new ConfigurationError(`No free VM ID below ${base}`);
  }
  return candidate;
}

export function vmDisplayName(configPath?: string, name?: string): string {
  if (name) return name;
  if (configPath) return configBaseName(configPath);
  throw new ConfigurationError('A VM name or a config file is required');
}

export function resolveIdentity(
  vms: ClusterVm[],
  request: IdentityRequest,
  logger: Logger,
): VmIdentity {
  const name = request.template ? `${request.name}${TEMPLATE_NAME_SUFFIX}` : request.name;
  const byName = vms.find((vm) => vm.type === 'qemu' && vm.name === name);
  const byId = request.id !== undefined ? vms.find((vm) => vm.vmid === request.id) : undefined;
  const base: VmIdentity = { id: 0, name, isTemplate: request.template, replace: false };

  if (request.replace) {
    const existing = byId ?? byName;
    if (existing) {
      if (existing.type !== 'qemu') {
        throw new IdentityConflictError(
          `ID ${existing.vmid} belongs to a container and cannot be replaced.`,
          existing.vmid,
        );
      }
      logger.info({ vmid: existing.vmid, node: existing.node }, `Replacing VM: ${existing.name} (id: ${existing.vmid})`);
      return { ...base, id: existing.vmid, replace: true, existing };
    }
  } else {
    if (byId) {
      throw new IdentityConflictError(
        `VM with ID ${byId.vmid} already exists. Please specify --replace to replace it.`,
        byId.vmid,
      );
    }
    if (byName) {
      logger.warn({ vmid: byName.vmid }, `Another VM with the same name (id: ${byName.vmid}) already exists!`);
    }
  }

  if (request.id !== undefined) {
    return { ...base, id: request.id };
  }

  const descending = request.template;
  const baseId = request.baseId ?? (descending ? DEFAULT_TEMPLATE_BASE_ID : DEFAULT_VM_BASE_ID);
  const id = allocateId(
    vms.map((vm) => vm.vmid),
    baseId,
    descending,
  );
  logger.debug({ id, baseId, descending }, 'Allocated VM ID');
  return { ...base, id };
}
