import {
  AUTO_THIN_STORAGE,
  BYTES_PER_GIB,
  CapacityError,
  type StorageInfo,
  type VmOptions,
  isDiskSlot,
} from '@pve-forge/shared';
import { formatDiskSpec, parseDiskSpec } from '../config/vm-options.js';
import type { Logger } from '../logger.js';

/** Storage name -> remaining bytes, in the order the node listed them */
export type StorageCatalog = Map<string, number>;

/** Snapshot the usable storages of a node */
export function buildStorageCatalog(storages: StorageInfo[]): StorageCatalog {
  const catalog: StorageCatalog = new Map();
  for (const s of storages) {
    if (s.active && s.enabled) catalog.set(s.storage, s.avail);
  }
  return catalog;
}

function storageRef(value: string): string {
  return value.split(':', 1)[0] ?? '';
}

/**
 * Rewrite every `auto-thin` disk slot to a concrete storage.
 * First fit in catalog order; the catalog is charged for each placement.
 */
export function resolvePlaceholders(
  options: VmOptions,
  catalog: StorageCatalog,
  logger: Logger,
): VmOptions {
  const resolved: VmOptions = { ...options };

  for (const [slot, value] of Object.entries(options)) {
    if (!isDiskSlot(slot) || typeof value !== 'string') continue;
    if (storageRef(value) !== AUTO_THIN_STORAGE) continue;

    const disk = parseDiskSpec(slot, value);
    const required = disk.sizeGiB * BYTES_PER_GIB;
    const candidates = [...catalog].filter(([, avail]) => avail >= required);
    const first = candidates[0];
    if (!first) {
      throw new CapacityError(`Could not find suitable storage for disk "${slot}". Stopping here.`, slot);
    }

    const [selected, avail] = first;
    if (candidates.length > 1) {
      logger.warn(
        { slot, candidates: candidates.map(([name]) => name) },
        `Found more than 1 suitable storages for disk "${slot}". Using storage ${selected}.`,
      );
    }
    catalog.set(selected, avail - required);
    resolved[slot] = formatDiskSpec({ ...disk, storage: selected });
    logger.debug({ slot, storage: selected, bytes: required }, 'Placed disk');
  }

  return resolved;
}
