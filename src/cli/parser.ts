import { CliUsageError } from '../errors';

export const COMMANDS = ['resource-requests', 'missing-health-probes', 'readonly-root-filesystem'] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  namespaces: string[];
  allNamespaces: boolean;
  context?: string | undefined;
  // Milli-cores; only meaningful for resource-requests
  threshold?: bigint | undefined;
  noCheckHigher: boolean;
  help: boolean;
}

export const USAGE = `Usage: k8s-resource-audit <command> [options]

Commands:
  resource-requests          Compare container requests/limits with live usage
  missing-health-probes      List running pods without liveness or readiness probes
  readonly-root-filesystem   List containers without a read-only root filesystem

Options:
  --namespaces <ns[,ns]>     Namespaces to check (repeatable), defaults to the current one
  --all-namespaces           Check all namespaces
  -c, --context <name>       Kubeconfig context to use
  --threshold <millicores>   resource-requests: report containers whose unused cpu request exceeds this
  --no-check-higher          resource-requests: do not filter on unused cpu request
  -h, --help                 Show this help`;

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

function parseThreshold(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`--threshold expects a non-negative integer (milli-cores), got "${value}"`);
  }
  return BigInt(value);
}

function splitNamespaces(value: string): string[] {
  return value
    .split(',')
    .map(ns => ns.trim())
    .filter(ns => ns.length > 0);
}

// Reads the value of "--flag value" or "--flag=value" starting at args[i]
function readValue(args: string[], i: number, flag: string): { value: string; next: number } {
  const arg = args[i] ?? '';
  if (arg.startsWith(`${flag}=`)) {
    return { value: arg.slice(flag.length + 1), next: i + 1 };
  }
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return { value, next: i + 2 };
}

function matches(arg: string, ...flags: string[]): boolean {
  return flags.some(flag => arg === flag || arg.startsWith(`${flag}=`));
}

export function parseArgs(args: string[]): CliArgs {
  const result: Omit<CliArgs, 'command'> = {
    namespaces: [],
    allNamespaces: false,
    context: undefined,
    threshold: undefined,
    noCheckHigher: false,
    help: false
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i] ?? '';

    // Handle --help or -h
    if (arg === '--help' || arg === '-h') {
      result.help = true;
      i++;
      continue;
    }

    // Handle --namespaces (repeatable, comma separated)
    if (matches(arg, '--namespaces')) {
      const { value, next } = readValue(args, i, '--namespaces');
      result.namespaces.push(...splitNamespaces(value));
      i = next;
      continue;
    }

    // Handle --all-namespaces
    if (arg === '--all-namespaces') {
      result.allNamespaces = true;
      i++;
      continue;
    }

    // Handle --context or -c
    if (matches(arg, '--context', '-c')) {
      const flag = arg.startsWith('-c') && !arg.startsWith('--') ? '-c' : '--context';
      const { value, next } = readValue(args, i, flag);
      result.context = value;
      i = next;
      continue;
    }

    // Handle --threshold
    if (matches(arg, '--threshold')) {
      const { value, next } = readValue(args, i, '--threshold');
      result.threshold = parseThreshold(value);
      i = next;
      continue;
    }

    // Handle --no-check-higher
    if (arg === '--no-check-higher') {
      result.noCheckHigher = true;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }

    positionalArgs.push(arg);
    i++;
  }

  if (result.namespaces.length > 0 && result.allNamespaces) {
    throw new CliUsageError('--namespaces and --all-namespaces cannot be used together');
  }

  const [command, ...extra] = positionalArgs;
  if (command === undefined) {
    if (result.help) return { ...result, command: 'resource-requests' };
    throw new CliUsageError('Missing command');
  }
  if (!isCommand(command)) {
    throw new CliUsageError(`Unknown command: ${command}`);
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra[0]}`);
  }
  if (command !== 'resource-requests' && (result.threshold !== undefined || result.noCheckHigher)) {
    throw new CliUsageError(`--threshold and --no-check-higher only apply to resource-requests`);
  }

  return { ...result, command };
}
