#!/usr/bin/env tsx

import { ProxmoxClient, buildTlsFetch } from '@pve-forge/pve';
import { ConfigurationError, ProvisionError } from '@pve-forge/shared';
import { USAGE, parseArgs } from './args.js';
import { type ConfigDocument, buildVmOptions, loadDefaults, loadVmConfig } from './config/vm-options.js';
import { authenticate } from './connect.js';
import { vmDisplayName } from './core/identity.js';
import { runProvisioning } from './core/workflow.js';
import { FileCredentialStore } from './credentials/store.js';
import { createLogger } from './logger.js';
import { SshRemoteExec } from './runtime/remote-exec.js';
import { scrubData } from './runtime/scrubber.js';
import { loadSettings } from './settings.js';
import { createInkPrompter } from './tui/prompter.js';
import { VERSION } from './version.js';

const argv = process.argv.slice(2);

async function main(): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.version) {
    console.log(VERSION);
    return 0;
  }
  if (!args.server) throw new ConfigurationError('--server is required');

  const settings = loadSettings();
  const logger = createLogger(args.debug ? 'debug' : settings.logLevel);
  const fetchFn = buildTlsFetch(args.insecure);
  const credentials = new FileCredentialStore(settings.credentialsFile, logger);
  const prompter = createInkPrompter();

  const defaults = await loadDefaults(settings.defaultsFile, logger);
  let fileConfig: ConfigDocument = {};
  if (args.config) {
    fileConfig = await loadVmConfig(args.config);
  } else {
    logger.warn('No config file specified. Using defaults');
  }
  const built = buildVmOptions(
    {
      defaults,
      presetName: args.preset,
      fileConfig,
      overrides: { id: args.id, image: args.image },
    },
    logger,
  );
  const name = vmDisplayName(args.config, args.name);
  logger.debug({ options: scrubData(built.options) }, 'VM options');

  const endpoint = `https://${args.server}:${settings.apiPort}`;
  const auth = await authenticate(
    {
      server: args.server,
      endpoint,
      username: args.username,
      password: args.password,
      cache: args.passwordCache,
      token: settings.token,
    },
    { credentials, prompter, logger, fetchFn },
  );

  const outcome = await runProvisioning(
    {
      name,
      options: built.options,
      id: built.id,
      baseId: args.baseId,
      image: built.image,
      node: args.node,
      template: args.template,
      autostart: args.autostart,
      replace: args.replace,
      cleanup: args.cleanup,
      cacheCredentials: args.passwordCache,
      assumeYes: args.assumeYes,
      storageType: settings.storageType,
    },
    {
      cluster: new ProxmoxClient({ endpoint, auth, fetchFn }),
      remote: new SshRemoteExec({ host: args.server, port: args.sshPort, user: args.sshUser }, logger),
      credentials,
      prompter,
      logger,
      fetchFn,
      print: (line) => console.log(line),
    },
  );

  if (outcome.status === 'aborted') return 0;

  const { result } = outcome;
  const kind = result.finalization === 'template' ? 'Template' : 'VM';
  logger.info({ vmid: result.vmid, node: result.node }, `${kind} ${result.name} (id: ${result.vmid}) is ready`);
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    if (argv.includes('--debug') && err instanceof Error && err.stack) {
      console.error(err.stack);
    } else if (!(err instanceof ProvisionError)) {
      console.error('Re-run with --debug for the stack trace.');
    }
    process.exit(1);
  },
);
