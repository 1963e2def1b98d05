import { type ClusterVm, ConfigurationError, IdentityConflictError } from '@pve-forge/shared';
import { describe, expect, it } from 'vitest';
import { captureLogger } from '../testing/logger.js';
import { allocateId, resolveIdentity, vmDisplayName } from './identity.js';

function vm(vmid: number, name: string, overrides: Partial<ClusterVm> = {}): ClusterVm {
  return { vmid, type: 'qemu', name, node: 'pve01', status: 'running', template: false, ...overrides };
}

const cluster: ClusterVm[] = [
  vm(101, 'web01'),
  vm(102, 'web02'),
  vm(104, 'db01', { node: 'pve02', status: 'stopped' }),
  vm(1999, 'debian-template', { template: true, status: 'stopped' }),
  vm(103, 'dns', { type: 'lxc' }),
];

describe('allocateId', () => {
  it('returns the smallest free id above the base', () => {
    expect(allocateId([101, 102, 103, 104], 100, false)).toBe(105);
    expect(allocateId([102, 103], 100, false)).toBe(101);
  });

  it('ignores the order and duplicates of the in-use ids', () => {
    expect(allocateId([103, 101, 102, 101], 100, false)).toBe(104);
  });

  it('walks downward for templates', () => {
    expect(allocateId([1999, 1998, 1996], 2000, true)).toBe(1997);
    expect(allocateId([2001, 150], 2000, true)).toBe(1999);
  });

  it('never returns an id that is in use', () => {
    const inUse = [101, 102, 104, 105, 106];
    expect(inUse).not.toContain(allocateId(inUse, 100, false));
    expect(allocateId(inUse, 100, false)).toBe(103);
  });

  it('fails when a descending walk runs out of ids', () => {
    expect(() => allocateId([1], 2, true)).toThrow('No free VM ID below 2');
  });
});

describe('vmDisplayName', () => {
  it('prefers the explicit name', () => {
    expect(vmDisplayName('vms/web01.yaml', 'frontend')).toBe('frontend');
  });

  it('derives the name from the config file', () => {
    expect(vmDisplayName('vms/Web01.yaml')).toBe('web01');
  });

  it('requires a name or config', () => {
    expect(() => vmDisplayName()).toThrow(ConfigurationError);
  });
});

describe('resolveIdentity', () => {
  it('allocates a fresh id for a new VM', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'app01', template: false, replace: false }, logger);
    expect(identity).toEqual({ id: 105, name: 'app01', isTemplate: false, replace: false });
  });

  it('counts container ids as in use', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(
      [vm(101, 'a'), vm(102, 'c', { type: 'lxc' })],
      { name: 'b', template: false, replace: false },
      logger,
    );
    expect(identity.id).toBe(103);
  });

  it('suffixes template names and allocates downward', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'ubuntu', template: true, replace: false }, logger);
    expect(identity).toEqual({ id: 1998, name: 'ubuntu-template', isTemplate: true, replace: false });
  });

  it('honours a custom base id', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(
      cluster,
      { name: 'app01', baseId: 500, template: false, replace: false },
      logger,
    );
    expect(identity.id).toBe(501);
  });

  it('uses a free explicit id as given', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'app01', id: 300, template: false, replace: false }, logger);
    expect(identity).toEqual({ id: 300, name: 'app01', isTemplate: false, replace: false });
  });

  it('rejects an explicit id in use without replace', () => {
    const { logger } = captureLogger();
    let error: unknown;
    try {
      resolveIdentity(cluster, { name: 'app01', id: 102, template: false, replace: false }, logger);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(IdentityConflictError);
    expect(error).toMatchObject({
      vmid: 102,
      message: 'VM with ID 102 already exists. Please specify --replace to replace it.',
    });
  });

  it('only warns about a duplicate name', () => {
    const { logger, messages } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'web01', template: false, replace: false }, logger);
    expect(identity).toEqual({ id: 105, name: 'web01', isTemplate: false, replace: false });
    expect(messages('warn')).toEqual(['Another VM with the same name (id: 101) already exists!']);
  });

  it('replaces by name and reuses the id', () => {
    const { logger, messages } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'db01', template: false, replace: true }, logger);
    expect(identity).toEqual({
      id: 104,
      name: 'db01',
      isTemplate: false,
      replace: true,
      existing: cluster[2],
    });
    expect(messages('info')).toEqual(['Replacing VM: db01 (id: 104)']);
  });

  it('gives replace by id and by name the same outcome', () => {
    const { logger } = captureLogger();
    const byId = resolveIdentity(cluster, { name: 'db01', id: 104, template: false, replace: true }, logger);
    const byName = resolveIdentity(cluster, { name: 'db01', template: false, replace: true }, logger);
    expect(byId).toEqual(byName);
  });

  it('prefers the explicit id over the name when replacing', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'db01', id: 102, template: false, replace: true }, logger);
    expect(identity.id).toBe(102);
    expect(identity.existing?.name).toBe('web02');
  });

  it('replaces a template by its suffixed name', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'debian', template: true, replace: true }, logger);
    expect(identity).toMatchObject({ id: 1999, name: 'debian-template', isTemplate: true, replace: true });
  });

  it('creates normally with replace when nothing matches', () => {
    const { logger } = captureLogger();
    const identity = resolveIdentity(cluster, { name: 'fresh', template: false, replace: true }, logger);
    expect(identity).toEqual({ id: 105, name: 'fresh', isTemplate: false, replace: false });
  });

  it('refuses to replace a container', () => {
    const { logger } = captureLogger();
    expect(() =>
      resolveIdentity(cluster, { name: 'x', id: 103, template: false, replace: true }, logger),
    ).toThrow('ID 103 belongs to a container and cannot be replaced.');
  });
});
