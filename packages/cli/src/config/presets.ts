import type { VmOptions } from '@pve-forge/shared';

/** Named resource profiles layered between defaults and the VM config file */
export const PRESETS: Readonly<Record<string, VmOptions>> = {
  debian: {
    cores: 1,
    cpu: '',
    memory: 512,
  },
  performance: {
    cores: 4,
    cpu: 'host',
    memory: 4096,
  },
};

export function presetNames(): string[] {
  return Object.keys(PRESETS);
}
