import {
  type ClusterApi,
  type ClusterVm,
  type Prompter,
  type RemoteExec,
  RemoteOperationError,
  type StorageInfo,
  type TaskStatus,
  type VmConfig,
  type VmStatus,
} from '@pve-forge/shared';
import { vi } from 'vitest';

interface FakeVm {
  vm: ClusterVm;
  config: VmConfig;
}

/**
 * In-memory cluster. Tasks finish immediately; mutating calls are
 * recorded in `calls` as `<method> <vmid>`.
 */
export class FakeCluster implements ClusterApi {
  readonly calls: string[] = [];
  readonly guests = new Map<number, FakeVm>();
  readonly volumePaths = new Map<string, string>();
  nodes = ['pve01'];
  storages: StorageInfo[] = [];
  /** Exit status reported by the create task */
  createExitStatus = 'OK';
  /** Config reads that still miss the primary disk after create */
  diskHiddenReads = 0;
  /** Stop requests a running VM ignores before halting */
  stopsIgnored = 0;
  private tasks = new Map<string, TaskStatus>();
  private taskSeq = 0;

  addVm(vm: Partial<ClusterVm> & { vmid: number; name: string }, config: VmConfig = {}): ClusterVm {
    const full: ClusterVm = { type: 'qemu', node: 'pve01', status: 'stopped', template: false, ...vm };
    this.guests.set(full.vmid, { vm: full, config: { name: full.name, ...config } });
    return full;
  }

  private guest(vmid: number): FakeVm {
    const found = this.guests.get(vmid);
    if (!found) throw new RemoteOperationError(`Configuration file for VM ${vmid} does not exist`, { status: 500 });
    return found;
  }

  private task(exitStatus = 'OK'): string {
    const upid = `UPID:fake:${++this.taskSeq}`;
    this.tasks.set(upid, { upid, status: 'stopped', exitStatus });
    return upid;
  }

  async listNodes(): Promise<string[]> {
    return [...this.nodes];
  }

  async listVms(): Promise<ClusterVm[]> {
    return [...this.guests.values()].map((g) => ({ ...g.vm }));
  }

  async getVmStatus(_node: string, vmid: number): Promise<VmStatus> {
    const { vm } = this.guest(vmid);
    return { vmid, name: vm.name, status: vm.status };
  }

  async getVmConfig(_node: string, vmid: number): Promise<VmConfig> {
    const { config } = this.guest(vmid);
    if (this.diskHiddenReads > 0) {
      this.diskHiddenReads--;
      const { scsi0: _hidden, ...rest } = config;
      return rest;
    }
    return { ...config };
  }

  async setVmConfig(_node: string, vmid: number, values: VmConfig): Promise<void> {
    this.calls.push(`setVmConfig ${vmid}`);
    Object.assign(this.guest(vmid).config, values);
  }

  async createVm(node: string, vmid: number, name: string, options: VmConfig): Promise<string> {
    this.calls.push(`createVm ${vmid}`);
    const config: VmConfig = { ...options, name };
    for (const [key, value] of Object.entries(options)) {
      if (!/^scsi\d+$/.test(key) || typeof value !== 'string') continue;
      const [spec = '', ...diskOptions] = value.split(',');
      const [storage = '', size = ''] = spec.split(':');
      const volumeId = `${storage}:vm-${vmid}-disk-${key.slice(4)}`;
      config[key] = [volumeId, ...diskOptions, `size=${size}G`].join(',');
      this.volumePaths.set(volumeId, `/dev/${storage}/vm-${vmid}-disk-${key.slice(4)}`);
    }
    this.guests.set(vmid, {
      vm: { vmid, type: 'qemu', name, node, status: 'stopped', template: false },
      config,
    });
    return this.task(this.createExitStatus);
  }

  async getTaskStatus(_node: string, upid: string): Promise<TaskStatus> {
    const task = this.tasks.get(upid);
    if (!task) throw new RemoteOperationError(`No such task ${upid}`, { status: 500 });
    return task;
  }

  async startVm(_node: string, vmid: number): Promise<string> {
    this.calls.push(`startVm ${vmid}`);
    this.guest(vmid).vm.status = 'running';
    return this.task();
  }

  async stopVm(_node: string, vmid: number): Promise<string> {
    this.calls.push(`stopVm ${vmid}`);
    const { vm } = this.guest(vmid);
    if (this.stopsIgnored > 0) {
      this.stopsIgnored--;
    } else {
      vm.status = 'stopped';
    }
    return this.task();
  }

  async deleteVm(_node: string, vmid: number): Promise<string> {
    this.calls.push(`deleteVm ${vmid}`);
    const { vm } = this.guest(vmid);
    if (vm.status === 'running') return this.task(`VM ${vmid} is running`);
    this.guests.delete(vmid);
    return this.task();
  }

  async convertToTemplate(_node: string, vmid: number): Promise<void> {
    this.calls.push(`convertToTemplate ${vmid}`);
    this.guest(vmid).vm.template = true;
  }

  async listStorages(_node: string, type?: string): Promise<StorageInfo[]> {
    return this.storages.filter((s) => type === undefined || s.type === type);
  }

  async getVolumePath(_node: string, volumeId: string): Promise<string | undefined> {
    return this.volumePaths.get(volumeId);
  }
}

/** Records commands; answers through `respond` */
export class FakeRemoteExec implements RemoteExec {
  readonly commands: string[] = [];
  respond: (command: string) => string = () => '';

  async run(command: string): Promise<string> {
    this.commands.push(command);
    return this.respond(command);
  }
}

export function createMockPrompter(answers: { confirm?: boolean; text?: string; secret?: string } = {}): Prompter {
  return {
    confirm: vi.fn().mockResolvedValue(answers.confirm ?? true),
    text: vi.fn().mockResolvedValue(answers.text ?? 'typed-user'),
    secret: vi.fn().mockResolvedValue(answers.secret ?? 'typed-secret'),
  };
}

/** Sleep that returns immediately and records the requested delays */
export function createFakeSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
