import { z } from 'zod';

export const VmPowerState = z.enum(['running', 'stopped', 'paused', 'unknown']);
export type VmPowerState = z.infer<typeof VmPowerState>;

export const TaskState = z.enum(['running', 'stopped']);
export type TaskState = z.infer<typeof TaskState>;

/** Storage placeholder resolved to a concrete thin pool at provisioning time */
export const AUTO_THIN_STORAGE = 'auto-thin';

/** Default base for VM ID allocation (ascending) */
export const DEFAULT_VM_BASE_ID = 100;

/** Default base for template ID allocation (descending) */
export const DEFAULT_TEMPLATE_BASE_ID = 2000;

/** Suffix appended to the VM name when building a template */
export const TEMPLATE_NAME_SUFFIX = '-template';

/** Primary disk slot that receives the converted image */
export const PRIMARY_DISK_SLOT = 'scsi0';

/** Stop-confirmation polling: 1 request per second, at most 30 times */
export const STOP_POLL_ATTEMPTS = 30;
export const STOP_POLL_INTERVAL_MS = 1_000;

/** Disk-volume polling after creation */
export const DISK_POLL_ATTEMPTS = 10;
export const DISK_POLL_INTERVAL_MS = 1_000;

/** Task completion polling (create/delete) */
export const TASK_POLL_ATTEMPTS = 600;
export const TASK_POLL_INTERVAL_MS = 1_000;

/** Default Proxmox API port */
export const DEFAULT_API_PORT = 8006;

/** Default SSH port for remote commands */
export const DEFAULT_SSH_PORT = 22;

export const BYTES_PER_GIB = 2 ** 30;
