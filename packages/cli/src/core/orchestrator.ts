import {
  type ClusterApi,
  type CredentialProvider,
  DISK_POLL_ATTEMPTS,
  DISK_POLL_INTERVAL_MS,
  type FetchFn,
  PRIMARY_DISK_SLOT,
  PollTimeoutError,
  type Prompter,
  ProvisionError,
  type RemoteExec,
  RemoteOperationError,
  STOP_POLL_ATTEMPTS,
  STOP_POLL_INTERVAL_MS,
  type SleepFn,
  TASK_POLL_ATTEMPTS,
  TASK_POLL_INTERVAL_MS,
  type TaskStatus,
  type VmOptions,
  poll,
} from '@pve-forge/shared';
import type { Logger } from '../logger.js';
import { shellQuote } from '../runtime/remote-exec.js';
import type { VmIdentity } from './identity.js';
import { acquireImage } from './image.js';

export type ProvisionState =
  | 'planned'
  | 'destroyed'
  | 'created'
  | 'disk-located'
  | 'image-attached'
  | 'finalized';

export type Finalization = 'template' | 'started' | 'none';

export interface ProvisionPlan {
  /** Node the VM is created on */
  node: string;
  identity: VmIdentity;
  /** Options with storage placeholders resolved and `sshkeys` encoded */
  options: VmOptions;
  image?: string;
  autostart: boolean;
  /** Remove a downloaded image after conversion */
  cleanup: boolean;
  cacheCredentials: boolean;
}

export interface DiskVolume {
  slotKey: string;
  volumeId: string;
  path: string;
}

export interface ProvisionResult {
  vmid: number;
  name: string;
  node: string;
  disk: DiskVolume;
  /** Credential-free reference of the attached image */
  image?: string;
  finalization: Finalization;
  transitions: ProvisionState[];
}

export interface OrchestratorDeps {
  cluster: ClusterApi;
  remote: RemoteExec;
  credentials: CredentialProvider;
  prompter: Prompter;
  logger: Logger;
  fetchFn: FetchFn;
  sleep?: SleepFn;
  newId?: () => string;
}

/**
 * Drives one VM through destroy (when replacing), create, disk lookup,
 * image conversion and finalization. Every remote call is awaited in turn.
 */
export class Provisioner {
  private deps: OrchestratorDeps;
  private state: ProvisionState = 'planned';
  private transitions: ProvisionState[] = ['planned'];

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  get currentState(): ProvisionState {
    return this.state;
  }

  private transition(next: ProvisionState): void {
    this.state = next;
    this.transitions.push(next);
    this.deps.logger.debug({ state: next }, 'Provisioning state changed');
  }

  async run(plan: ProvisionPlan): Promise<ProvisionResult> {
    if (this.state !== 'planned') {
      throw new ProvisionError(`Provisioner already used (state: ${this.state})`);
    }

    if (plan.identity.replace) {
      await this.destroyExisting(plan);
      this.transition('destroyed');
    }

    await this.create(plan);
    this.transition('created');

    const disk = await this.locateDisk(plan);
    this.transition('disk-located');

    let image: string | undefined;
    if (plan.image) {
      image = await this.attachImage(plan, plan.image, disk);
      this.transition('image-attached');
    } else {
      this.deps.logger.warn('No image provided. Creating an empty VM');
    }

    const finalization = await this.finalize(plan);
    this.transition('finalized');

    return {
      vmid: plan.identity.id,
      name: plan.identity.name,
      node: plan.node,
      disk,
      ...(image !== undefined ? { image } : {}),
      finalization,
      transitions: [...this.transitions],
    };
  }

  private async waitForTask(node: string, upid: string, action: string): Promise<TaskStatus> {
    const { cluster, sleep } = this.deps;
    const result = await poll(
      async () => {
        const task = await cluster.getTaskStatus(node, upid);
        return task.status === 'stopped' ? task : undefined;
      },
      { attempts: TASK_POLL_ATTEMPTS, intervalMs: TASK_POLL_INTERVAL_MS, sleep },
    );
    if (result.status === 'timeout') {
      throw new PollTimeoutError(`${action} did not finish after ${result.attempts} checks`, result.attempts);
    }
    if (result.value.exitStatus !== 'OK') {
      throw new RemoteOperationError(`${action} failed: ${result.value.exitStatus ?? 'unknown status'}`, {
        exitStatus: result.value.exitStatus,
      });
    }
    return result.value;
  }

  private async destroyExisting(plan: ProvisionPlan): Promise<void> {
    const { cluster, logger, sleep } = this.deps;
    const { id } = plan.identity;
    const node = plan.identity.existing?.node ?? plan.node;

    const stopped = await poll(
      async (attempt) => {
        const status = await cluster.getVmStatus(node, id);
        if (status.status !== 'running') return status.status;
        logger.info({ vmid: id, attempt }, attempt === 1 ? `Stopping VM ${id}` : `Waiting for VM ${id} to stop`);
        await cluster.stopVm(node, id);
        return undefined;
      },
      { attempts: STOP_POLL_ATTEMPTS, intervalMs: STOP_POLL_INTERVAL_MS, sleep },
    );
    if (stopped.status === 'timeout') {
      logger.warn({ vmid: id, attempts: stopped.attempts }, `VM ${id} did not stop; deleting anyway`);
    }

    logger.info({ vmid: id, node }, `Deleting VM ${id}`);
    const upid = await cluster.deleteVm(node, id);
    await this.waitForTask(node, upid, `Deleting VM ${id}`);
  }

  private async create(plan: ProvisionPlan): Promise<void> {
    const { cluster, logger } = this.deps;
    const { id, name } = plan.identity;
    const { cpu, ...rest } = plan.options;
    const options: VmOptions = cpu === '' ? rest : plan.options;

    logger.info({ vmid: id, node: plan.node }, `Creating VM ${name} (id: ${id})`);
    const upid = await cluster.createVm(plan.node, id, name, options);
    await this.waitForTask(plan.node, upid, `Creating VM ${id}`);
  }

  private async locateDisk(plan: ProvisionPlan): Promise<DiskVolume> {
    const { cluster, logger, sleep } = this.deps;
    const { id } = plan.identity;

    const found = await poll(
      async () => {
        const config = await cluster.getVmConfig(plan.node, id);
        const disk = config[PRIMARY_DISK_SLOT];
        if (typeof disk !== 'string') return undefined;
        const volumeId = disk.split(',', 1)[0] ?? '';
        const path = await cluster.getVolumePath(plan.node, volumeId);
        return path ? { slotKey: PRIMARY_DISK_SLOT, volumeId, path } : undefined;
      },
      { attempts: DISK_POLL_ATTEMPTS, intervalMs: DISK_POLL_INTERVAL_MS, sleep },
    );
    if (found.status === 'timeout') {
      throw new PollTimeoutError('Could not find disk definition.', found.attempts);
    }

    logger.debug({ ...found.value, attempts: found.attempts }, 'Located primary disk');
    return found.value;
  }

  private async attachImage(plan: ProvisionPlan, imageRef: string, disk: DiskVolume): Promise<string> {
    const { cluster, remote, logger } = this.deps;
    const image = await acquireImage(imageRef, { ...this.deps, cacheCredentials: plan.cacheCredentials });

    try {
      logger.info({ image: image.displayRef, disk: disk.path }, 'Converting image onto the VM disk');
      await remote.run(`qemu-img convert -O raw ${shellQuote(image.path)} -S 4096 ${shellQuote(disk.path)}`);
      await cluster.setVmConfig(plan.node, plan.identity.id, {
        description: `Created based on ${image.displayRef}`,
      });
    } finally {
      if (image.stagingDir) {
        if (plan.cleanup) {
          await image.cleanup();
        } else {
          logger.info({ dir: image.stagingDir }, 'Keeping downloaded image');
        }
      }
    }
    return image.displayRef;
  }

  private async finalize(plan: ProvisionPlan): Promise<Finalization> {
    const { cluster, logger } = this.deps;
    const { id } = plan.identity;

    if (plan.identity.isTemplate) {
      if (plan.autostart) logger.warn('Templates cannot be started; ignoring --autostart');
      const status = await cluster.getVmStatus(plan.node, id);
      const config = await cluster.getVmConfig(plan.node, id);
      const previous = typeof config.description === 'string' && config.description ? `\n${config.description}` : '';
      await cluster.setVmConfig(plan.node, id, { description: `Branched off ${status.name}${previous}` });
      logger.info({ vmid: id }, `Converting VM ${id} to template`);
      await cluster.convertToTemplate(plan.node, id);
      return 'template';
    }

    if (plan.autostart) {
      logger.info({ vmid: id }, `Starting VM ${id}`);
      const upid = await cluster.startVm(plan.node, id);
      await this.waitForTask(plan.node, upid, `Starting VM ${id}`);
      return 'started';
    }

    return 'none';
  }
}
