import { type ClusterApi, ConfigurationError, type VmOptions } from '@pve-forge/shared';
import { withEncodedSshKeys } from '../config/ssh-keys.js';
import { scrubField } from '../runtime/scrubber.js';
import { type VmIdentity, resolveIdentity } from './identity.js';
import { type OrchestratorDeps, type ProvisionResult, Provisioner } from './orchestrator.js';
import { buildStorageCatalog, resolvePlaceholders } from './storage.js';

export interface ProvisionRequest {
  name: string;
  /** Merged options, storage placeholders not yet resolved */
  options: VmOptions;
  id?: number;
  baseId?: number;
  image?: string;
  node?: string;
  template: boolean;
  autostart: boolean;
  replace: boolean;
  cleanup: boolean;
  cacheCredentials: boolean;
  assumeYes: boolean;
  /** Storage type considered for `auto-thin` disks */
  storageType: string;
}

export interface WorkflowDeps extends OrchestratorDeps {
  /** Operator-facing output */
  print: (line: string) => void;
  /** Reads an `sshkeys` file; defaults to the local filesystem */
  readFile?: (path: string) => Promise<string>;
}

export type ProvisionOutcome =
  | { status: 'aborted'; identity: VmIdentity }
  | { status: 'provisioned'; identity: VmIdentity; result: ProvisionResult };

/** The requested node, or the first one the cluster lists */
export async function selectNode(cluster: ClusterApi, requested?: string): Promise<string> {
  const nodes = await cluster.listNodes();
  if (requested !== undefined) {
    if (!nodes.includes(requested)) {
      throw new ConfigurationError(`Node ${requested} is not part of the cluster (${nodes.join(', ')})`);
    }
    return requested;
  }
  const first = nodes[0];
  if (first === undefined) throw new ConfigurationError('The cluster reports no nodes');
  return first;
}

function describePlan(identity: VmIdentity, node: string, options: VmOptions): string[] {
  const lines = [
    `About to create a new ${identity.isTemplate ? 'template' : 'VM'}:`,
    `  • ID: ${identity.id}`,
    `  • Name: ${identity.name}`,
    `  • Node: ${node}`,
  ];
  if (identity.existing) {
    lines.push(`  • Replaces: ${identity.existing.name} on ${identity.existing.node}`);
  }
  lines.push('  • Options:');
  for (const [key, value] of Object.entries(options)) {
    lines.push(`      ${key}: ${scrubField(key, String(value))}`);
  }
  return lines;
}

/**
 * Resolve storage and identity, show the plan, ask for confirmation and
 * provision. Nothing on the cluster changes before the operator agrees.
 */
export async function runProvisioning(
  request: ProvisionRequest,
  deps: WorkflowDeps,
): Promise<ProvisionOutcome> {
  const { cluster, logger } = deps;

  // Key files and URLs are read before the cluster is touched
  const encoded = await withEncodedSshKeys(request.options, {
    fetchFn: deps.fetchFn,
    ...(deps.readFile ? { readFile: deps.readFile } : {}),
  });

  const node = await selectNode(cluster, request.node);
  const catalog = buildStorageCatalog(await cluster.listStorages(node, request.storageType));
  logger.debug({ node, storages: Object.fromEntries(catalog) }, 'Storage catalog');
  const placed = resolvePlaceholders(request.options, catalog, logger);
  const options = encoded.sshkeys === undefined ? placed : { ...placed, sshkeys: encoded.sshkeys };

  const identity = resolveIdentity(
    await cluster.listVms(),
    {
      name: request.name,
      template: request.template,
      replace: request.replace,
      ...(request.id !== undefined ? { id: request.id } : {}),
      ...(request.baseId !== undefined ? { baseId: request.baseId } : {}),
    },
    logger,
  );

  for (const line of describePlan(identity, node, placed)) deps.print(line);

  if (!request.assumeYes && !(await deps.prompter.confirm('Continue [yN]?'))) {
    logger.info({ vmid: identity.id }, 'Aborted by operator');
    return { status: 'aborted', identity };
  }

  const result = await new Provisioner(deps).run({
    node,
    identity,
    options,
    ...(request.image !== undefined ? { image: request.image } : {}),
    autostart: request.autostart,
    cleanup: request.cleanup,
    cacheCredentials: request.cacheCredentials,
  });
  return { status: 'provisioned', identity, result };
}
