import {
  type ClusterApi,
  type ClusterVm,
  type FetchFn,
  RemoteOperationError,
  type StorageInfo,
  TaskState,
  type TaskStatus,
  type VmConfig,
  VmOptionValue,
  VmPowerState,
  type VmStatus,
} from '@pve-forge/shared';
import { z } from 'zod';
import { type HttpMethod, type ProxmoxAuth, buildAuthHeaders } from './auth.js';

export interface ProxmoxClientConfig {
  /** Base URL, e.g. https://pve01.lab:8006 */
  endpoint: string;
  auth: ProxmoxAuth;
  fetchFn?: FetchFn;
}

// --- Response payloads ---

const NodesResponse = z.object({
  data: z.array(z.object({ node: z.string() })),
});

const ResourcesResponse = z.object({
  data: z.array(
    z.object({
      vmid: z.number().optional(),
      name: z.string().optional(),
      node: z.string().optional(),
      type: z.string().optional(),
      status: z.string().optional(),
      template: z.number().optional(),
    }),
  ),
});

const VmStatusResponse = z.object({
  data: z.object({
    vmid: z.union([z.number(), z.string()]).optional(),
    name: z.string().optional(),
    status: z.string().optional(),
  }),
});

const VmConfigResponse = z.object({ data: z.record(VmOptionValue) });

const UpidResponse = z.object({ data: z.string() });

const TaskStatusResponse = z.object({
  data: z.object({
    upid: z.string().optional(),
    status: TaskState,
    exitstatus: z.string().optional(),
  }),
});

const StoragesResponse = z.object({
  data: z.array(
    z.object({
      storage: z.string(),
      type: z.string().optional(),
      avail: z.number().optional(),
      total: z.number().optional(),
      active: z.number().optional(),
      enabled: z.number().optional(),
      content: z.string().optional(),
    }),
  ),
});

const VolumeResponse = z.object({
  data: z.object({ path: z.string().optional() }).passthrough(),
});

// --- REST helpers ---

export function proxmoxUrl(endpoint: string, path: string, params?: Record<string, string>): string {
  const base = `${endpoint.replace(/\/$/, '')}/api2/json${path}`;
  const url = new URL(base);
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

/** Form-encode a field map the way the API expects (booleans as 1/0) */
export function encodeForm(values: VmConfig): string {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(values)) {
    form.set(key, typeof value === 'boolean' ? (value ? '1' : '0') : String(value));
  }
  return form.toString();
}

function toPowerState(status: string | undefined): VmPowerState {
  const parsed = VmPowerState.safeParse(status);
  return parsed.success ? parsed.data : 'unknown';
}

async function describeFailure(res: Response): Promise<string> {
  const base = `Proxmox API returned ${res.status}: ${res.statusText}`;
  let text: string;
  try {
    text = await res.text();
  } catch {
    return base;
  }
  try {
    const body = z
      .object({ errors: z.record(z.string()).optional() })
      .safeParse(JSON.parse(text));
    if (body.success && body.data.errors) {
      const details = Object.entries(body.data.errors)
        .map(([field, message]) => `${field}: ${message.trim()}`)
        .join('; ');
      return `${base} (${details})`;
    }
  } catch {
    // Body is not JSON; the status line is all we have
  }
  return base;
}

/**
 * Proxmox VE REST client.
 * Every call is a single awaited round trip; there is no internal retry.
 */
export class ProxmoxClient implements ClusterApi {
  private endpoint: string;
  private auth: ProxmoxAuth;
  private fetchFn: FetchFn;

  constructor(config: ProxmoxClientConfig) {
    this.endpoint = config.endpoint;
    this.auth = config.auth;
    this.fetchFn = config.fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { params?: Record<string, string>; form?: VmConfig } = {},
  ): Promise<T> {
    const url = proxmoxUrl(this.endpoint, path, options.params);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...buildAuthHeaders(this.auth, method),
    };
    let body: string | undefined;
    if (options.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = encodeForm(options.form);
    }

    const res = await this.fetchFn(url, { method, headers, body });
    if (!res.ok) {
      throw new RemoteOperationError(await describeFailure(res), { status: res.status });
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new RemoteOperationError(`Unexpected Proxmox API response for ${method} ${path}`);
    }
    return parsed.data;
  }

  private vmPath(node: string, vmid: number, suffix = ''): string {
    return `/nodes/${encodeURIComponent(node)}/qemu/${vmid}${suffix}`;
  }

  async listNodes(): Promise<string[]> {
    const res = await this.request('GET', '/nodes', NodesResponse);
    return res.data.map((n) => n.node);
  }

  async listVms(): Promise<ClusterVm[]> {
    const res = await this.request('GET', '/cluster/resources', ResourcesResponse, {
      params: { type: 'vm' },
    });
    const vms: ClusterVm[] = [];
    for (const r of res.data) {
      if (r.vmid == null || !r.node) continue;
      vms.push({
        vmid: r.vmid,
        type: r.type === 'lxc' ? 'lxc' : 'qemu',
        name: r.name ?? '',
        node: r.node,
        status: toPowerState(r.status),
        template: r.template === 1,
      });
    }
    return vms;
  }

  async getVmStatus(node: string, vmid: number): Promise<VmStatus> {
    const res = await this.request('GET', this.vmPath(node, vmid, '/status/current'), VmStatusResponse);
    return {
      vmid,
      name: res.data.name ?? '',
      status: toPowerState(res.data.status),
    };
  }

  async getVmConfig(node: string, vmid: number): Promise<VmConfig> {
    const res = await this.request('GET', this.vmPath(node, vmid, '/config'), VmConfigResponse);
    return res.data;
  }

  async setVmConfig(node: string, vmid: number, values: VmConfig): Promise<void> {
    await this.request('PUT', this.vmPath(node, vmid, '/config'), z.unknown(), { form: values });
  }

  async createVm(node: string, vmid: number, name: string, options: VmConfig): Promise<string> {
    const res = await this.request('POST', `/nodes/${encodeURIComponent(node)}/qemu`, UpidResponse, {
      form: { ...options, vmid, name },
    });
    return res.data;
  }

  async getTaskStatus(node: string, upid: string): Promise<TaskStatus> {
    const res = await this.request(
      'GET',
      `/nodes/${encodeURIComponent(node)}/tasks/${encodeURIComponent(upid)}/status`,
      TaskStatusResponse,
    );
    return {
      upid: res.data.upid ?? upid,
      status: res.data.status,
      ...(res.data.exitstatus !== undefined ? { exitStatus: res.data.exitstatus } : {}),
    };
  }

  async startVm(node: string, vmid: number): Promise<string> {
    const res = await this.request('POST', this.vmPath(node, vmid, '/status/start'), UpidResponse);
    return res.data;
  }

  async stopVm(node: string, vmid: number): Promise<string> {
    const res = await this.request('POST', this.vmPath(node, vmid, '/status/stop'), UpidResponse);
    return res.data;
  }

  async deleteVm(node: string, vmid: number): Promise<string> {
    const res = await this.request('DELETE', this.vmPath(node, vmid), UpidResponse);
    return res.data;
  }

  async convertToTemplate(node: string, vmid: number): Promise<void> {
    await this.request('POST', this.vmPath(node, vmid, '/template'), z.unknown());
  }

  async listStorages(node: string, type?: string): Promise<StorageInfo[]> {
    const res = await this.request(
      'GET',
      `/nodes/${encodeURIComponent(node)}/storage`,
      StoragesResponse,
      type ? { params: { type } } : {},
    );
    return res.data.map((s) => ({
      storage: s.storage,
      type: s.type ?? 'unknown',
      avail: s.avail ?? 0,
      total: s.total ?? 0,
      active: s.active !== 0,
      enabled: s.enabled !== 0,
      content: s.content ? s.content.split(',') : [],
    }));
  }

  /**
   * Resolve `storage:volume` to its path on the node.
   * 404/500 mean the volume is not registered yet and yield undefined.
   */
  async getVolumePath(node: string, volumeId: string): Promise<string | undefined> {
    const storage = volumeId.split(':')[0];
    if (!storage || !volumeId.includes(':')) {
      throw new RemoteOperationError(`Invalid volume identifier: ${volumeId}`);
    }

    try {
      const res = await this.request(
        'GET',
        `/nodes/${encodeURIComponent(node)}/storage/${encodeURIComponent(storage)}/content/${encodeURIComponent(volumeId)}`,
        VolumeResponse,
      );
      return res.data.path;
    } catch (err: unknown) {
      if (err instanceof RemoteOperationError && (err.status === 404 || err.status === 500)) {
        return undefined;
      }
      throw err;
    }
  }
}
