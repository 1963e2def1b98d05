import { ConfigurationError, DEFAULT_SSH_PORT } from '@pve-forge/shared';

export interface CliArgs {
  name?: string;
  server?: string;
  username?: string;
  password?: string;
  node?: string;
  sshPort: number;
  sshUser: string;
  config?: string;
  image?: string;
  preset?: string;
  baseId?: number;
  id?: number;
  template: boolean;
  autostart: boolean;
  replace: boolean;
  cleanup: boolean;
  passwordCache: boolean;
  insecure: boolean;
  assumeYes: boolean;
  debug: boolean;
  help: boolean;
  version: boolean;
}

const VALUE_FLAGS: Record<string, string> = {
  '--server': '--server',
  '-s': '--server',
  '--username': '--username',
  '-u': '--username',
  '--password': '--password',
  '-p': '--password',
  '--node': '--node',
  '--ssh-port': '--ssh-port',
  '--ssh-user': '--ssh-user',
  '--config': '--config',
  '-c': '--config',
  '--image': '--image',
  '-i': '--image',
  '--preset': '--preset',
  '--base-id': '--base-id',
  '--id': '--id',
};

const BOOLEAN_FLAGS: Record<string, string> = {
  '--template': '--template',
  '-t': '--template',
  '--autostart': '--autostart',
  '--replace': '--replace',
  '--no-cleanup': '--no-cleanup',
  '--no-password-cache': '--no-password-cache',
  '--insecure': '--insecure',
  '-k': '--insecure',
  '--assumeyes': '--assumeyes',
  '-y': '--assumeyes',
  '--debug': '--debug',
  '--help': '--help',
  '-h': '--help',
  '--version': '--version',
  '-v': '--version',
};

export const USAGE = `Usage: pve-forge [name] --server <host> [options]

Provision a VM (or template) on a Proxmox VE cluster.

Connection:
  -s, --server <host>      Proxmox host (API and SSH)
  -u, --username <user>    API user (default: root@pam)
  -p, --password <pw>      API password (prompted and cached when omitted)
      --node <node>        Node to create the VM on (default: first node)
      --ssh-port <port>    SSH port (default: 22)
      --ssh-user <user>    SSH user (default: root)
  -k, --insecure           Accept self-signed API certificates
      --no-password-cache  Do not store prompted credentials

VM:
  -c, --config <file>      VM options file (YAML or JSON)
  -i, --image <ref>        Disk image: host path or http(s) URL
      --preset <name>      Resource preset (debian, performance)
      --id <id>            VM ID to use
      --base-id <id>       Start of the ID search
  -t, --template           Create a template instead of a VM
      --autostart          Start the VM when done
      --replace            Replace an existing VM with the same name or ID
      --no-cleanup         Keep the downloaded image on the host

General:
  -y, --assumeyes          Do not ask for confirmation
      --debug              Verbose logging
  -v, --version            Print the version
  -h, --help               Show this help`;

function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

/** Parse argv (without the node and script entries) */
export function parseArgs(argv: string[]): CliArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const raw = eq > 0 ? arg.slice(0, eq) : arg;

    const valueFlag = VALUE_FLAGS[raw];
    if (valueFlag) {
      const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
      if (value === undefined) throw new ConfigurationError(`${raw} requires a value`);
      values.set(valueFlag, value);
      continue;
    }

    const booleanFlag = BOOLEAN_FLAGS[raw];
    if (booleanFlag) {
      flags.add(booleanFlag);
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new ConfigurationError(`Unknown flag: ${arg}`);
    }
    positionals.push(arg);
  }

  if (positionals.length > 1) {
    throw new ConfigurationError(`Unexpected argument: ${positionals[1]}`);
  }

  const getArg = (flag: string): string | undefined => values.get(flag);
  const hasFlag = (flag: string): boolean => flags.has(flag);
  const intArg = (flag: string): number | undefined => {
    const value = getArg(flag);
    return value === undefined ? undefined : parsePositiveInt(flag, value);
  };

  const parsed: CliArgs = {
    name: positionals[0],
    server: getArg('--server'),
    username: getArg('--username'),
    password: getArg('--password'),
    node: getArg('--node'),
    sshPort: intArg('--ssh-port') ?? DEFAULT_SSH_PORT,
    sshUser: getArg('--ssh-user') ?? 'root',
    config: getArg('--config'),
    image: getArg('--image'),
    preset: getArg('--preset'),
    baseId: intArg('--base-id'),
    id: intArg('--id'),
    template: hasFlag('--template'),
    autostart: hasFlag('--autostart'),
    replace: hasFlag('--replace'),
    cleanup: !hasFlag('--no-cleanup'),
    passwordCache: !hasFlag('--no-password-cache'),
    insecure: hasFlag('--insecure'),
    assumeYes: hasFlag('--assumeyes'),
    debug: hasFlag('--debug'),
    help: hasFlag('--help'),
    version: hasFlag('--version'),
  };

  if (parsed.sshPort > 65535) {
    throw new ConfigurationError('--ssh-port must be between 1 and 65535');
  }
  if (!parsed.help && !parsed.version && !parsed.server) {
    throw new ConfigurationError('--server is required');
  }
  return parsed;
}
