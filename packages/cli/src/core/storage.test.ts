import { BYTES_PER_GIB, CapacityError, type StorageInfo } from '@pve-forge/shared';
import { describe, expect, it } from 'vitest';
import { captureLogger } from '../testing/logger.js';
import { buildStorageCatalog, resolvePlaceholders } from './storage.js';

const GiB = BYTES_PER_GIB;

function storage(name: string, availGiB: number, overrides: Partial<StorageInfo> = {}): StorageInfo {
  return {
    storage: name,
    type: 'lvmthin',
    avail: availGiB * GiB,
    total: 500 * GiB,
    active: true,
    enabled: true,
    content: ['images'],
    ...overrides,
  };
}

describe('buildStorageCatalog', () => {
  it('keeps active and enabled storages in listing order', () => {
    const catalog = buildStorageCatalog([
      storage('thin-b', 20),
      storage('offline', 900, { active: false }),
      storage('disabled', 900, { enabled: false }),
      storage('thin-a', 10),
    ]);
    expect([...catalog]).toEqual([
      ['thin-b', 20 * GiB],
      ['thin-a', 10 * GiB],
    ]);
  });
});

describe('resolvePlaceholders', () => {
  it('places a disk on the first storage with room and charges it', () => {
    const { logger, messages } = captureLogger();
    const catalog = new Map([
      ['thin-a', 10 * GiB],
      ['thin-b', 100 * GiB],
    ]);

    const options = resolvePlaceholders({ cores: 2, scsi0: 'auto-thin:32,discard=on' }, catalog, logger);

    expect(options).toEqual({ cores: 2, scsi0: 'thin-b:32,discard=on' });
    expect(catalog.get('thin-b')).toBe(68 * GiB);
    expect(catalog.get('thin-a')).toBe(10 * GiB);
    expect(messages('warn')).toEqual([]);
  });

  it('warns when more than one storage qualifies', () => {
    const { logger, messages } = captureLogger();
    const catalog = new Map([
      ['thin-a', 50 * GiB],
      ['thin-b', 100 * GiB],
    ]);

    const options = resolvePlaceholders({ scsi0: 'auto-thin:32' }, catalog, logger);

    expect(options.scsi0).toBe('thin-a:32');
    expect(messages('warn')).toEqual([
      'Found more than 1 suitable storages for disk "scsi0". Using storage thin-a.',
    ]);
  });

  it('accounts for earlier placements within the same run', () => {
    const { logger } = captureLogger();
    const catalog = new Map([
      ['thin-a', 40 * GiB],
      ['thin-b', 40 * GiB],
    ]);

    const options = resolvePlaceholders({ scsi0: 'auto-thin:32', scsi1: 'auto-thin:32' }, catalog, logger);

    expect(options).toEqual({ scsi0: 'thin-a:32', scsi1: 'thin-b:32' });
    expect([...catalog.values()]).toEqual([8 * GiB, 8 * GiB]);
  });

  it('leaves literal storages and non-disk keys alone', () => {
    const { logger } = captureLogger();
    const input = { scsi0: 'local-lvm:8', scsihw: 'virtio-scsi-pci', ide2: 'auto-thin:cloudinit' };
    expect(resolvePlaceholders(input, new Map(), logger)).toEqual(input);
  });

  it('raises CapacityError naming the slot when nothing fits', () => {
    const { logger } = captureLogger();
    const catalog = new Map([['thin-a', 10 * GiB]]);
    const input = { scsi0: 'auto-thin:8', scsi1: 'auto-thin:16' };

    let error: unknown;
    try {
      resolvePlaceholders(input, catalog, logger);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(CapacityError);
    expect(error).toMatchObject({
      slot: 'scsi1',
      message: 'Could not find suitable storage for disk "scsi1". Stopping here.',
    });
    expect(input.scsi0).toBe('auto-thin:8');
  });
});
