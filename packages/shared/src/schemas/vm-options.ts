import { z } from 'zod';

/** Scalar accepted by the Proxmox API for a VM config field */
export const VmOptionValue = z.union([z.string(), z.number(), z.boolean()]);
export type VmOptionValue = z.infer<typeof VmOptionValue>;

const DISK_SLOT_RE = /^scsi\d+$/;

/** Disk slot keys are `scsi<N>`; `scsihw` and friends are not disks */
export function isDiskSlot(key: string): boolean {
  return DISK_SLOT_RE.test(key);
}

/** Fields with a known shape. Anything else passes through as a scalar. */
export const KnownVmFields = z.object({
  cores: z.number().int().positive(),
  sockets: z.number().int().positive(),
  memory: z.number().int().positive(),
  cpu: z.string(),
  ostype: z.string(),
  scsihw: z.string(),
  serial0: z.string(),
  vga: z.string(),
  net0: z.string(),
  ide2: z.string(),
  boot: z.string(),
  agent: z.union([z.string(), z.number()]),
  onboot: z.union([z.boolean(), z.number()]),
  ciuser: z.string(),
  cipassword: z.string(),
  ipconfig0: z.string(),
  sshkeys: z.string(),
  description: z.string(),
  tags: z.string(),
}).partial();

/** VM creation options keyed by Proxmox API field name */
export const VmOptions = z.record(VmOptionValue).superRefine((options, ctx) => {
  const known = KnownVmFields.safeParse(options);
  if (!known.success) {
    for (const issue of known.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
    }
  }
  for (const [key, value] of Object.entries(options)) {
    if (isDiskSlot(key) && typeof value !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: 'Disk slot must be "<storage>:<size>"',
      });
    }
  }
});
export type VmOptions = z.infer<typeof VmOptions>;
