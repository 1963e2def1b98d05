import type { VmOptionValue } from '../schemas/vm-options.js';
import type { TaskState, VmPowerState } from './common.js';

/** A guest as listed by the cluster resource index */
export interface ClusterVm {
  vmid: number;
  type: 'qemu' | 'lxc';
  name: string;
  node: string;
  status: VmPowerState;
  template: boolean;
}

export interface VmStatus {
  vmid: number;
  name: string;
  status: VmPowerState;
}

export interface TaskStatus {
  upid: string;
  status: TaskState;
  /** Set once the task has stopped; "OK" on success */
  exitStatus?: string;
}

export interface StorageInfo {
  storage: string;
  type: string;
  /** Free bytes reported by the node */
  avail: number;
  total: number;
  active: boolean;
  enabled: boolean;
  content: string[];
}

export type VmConfig = Record<string, VmOptionValue>;

/** Remote cluster management API consumed by the provisioning core */
export interface ClusterApi {
  listNodes(): Promise<string[]>;
  /** Every guest (qemu and lxc) in the cluster, across nodes */
  listVms(): Promise<ClusterVm[]>;
  getVmStatus(node: string, vmid: number): Promise<VmStatus>;
  getVmConfig(node: string, vmid: number): Promise<VmConfig>;
  setVmConfig(node: string, vmid: number, values: VmConfig): Promise<void>;
  /** Returns the UPID of the creation task */
  createVm(node: string, vmid: number, name: string, options: VmConfig): Promise<string>;
  getTaskStatus(node: string, upid: string): Promise<TaskStatus>;
  startVm(node: string, vmid: number): Promise<string>;
  stopVm(node: string, vmid: number): Promise<string>;
  /** Returns the UPID of the destroy task */
  deleteVm(node: string, vmid: number): Promise<string>;
  convertToTemplate(node: string, vmid: number): Promise<void>;
  listStorages(node: string, type?: string): Promise<StorageInfo[]>;
  /** Filesystem path of a volume, undefined while the volume is not visible yet */
  getVolumePath(node: string, volumeId: string): Promise<string | undefined>;
}
