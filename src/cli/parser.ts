import { z } from 'zod';
import {
  NAMESPACE_SORT_KEYS,
  NODE_SORT_KEYS,
  REPORT_KINDS,
  type MemoryDisplayUnit,
  type NamespaceSortKey,
  type NodeSortKey,
  type OutputFormat,
  type ReportKind
} from '../types/report';
import type { BareMemoryUnit, DaemonSetPolicy } from '../types/resources';
import { FatalConfigurationError } from '../utils/errors';

export interface CliArgs {
  report: ReportKind;
  namespace?: string | undefined;
  context?: string | undefined;
  skipSystem: boolean;
  exclude: string[];
  top: boolean;
  sortBy?: NamespaceSortKey | undefined;
  nodeSortBy?: NodeSortKey | undefined;
  memoryUnit?: MemoryDisplayUnit | undefined;
  concurrency?: number | undefined;
  daemonSetPolicy: DaemonSetPolicy;
  bareMemoryUnit?: BareMemoryUnit | undefined;
  labelSelector?: string | undefined;
  format: OutputFormat;
  help: boolean;
}

export const USAGE = `Usage: k8s-resource-ledger [namespaces|workloads|nodes] [options]

Reports:
  namespaces              requests, limits and usage of running pods per namespace (default)
  workloads               pod templates multiplied by replicas, per workload and namespace
  nodes                   memory and CPU committed by pod requests on each node

Options:
  -n, --namespace <name>  report on one namespace only
  -c, --context <name>    kubeconfig context (default: current context)
      --skip-system       skip namespaces with a system prefix (openshift-, kube-, default)
      --exclude <name>    skip a namespace; repeatable
      --no-top            do not read actual usage from the metrics API
      --sort <key>        namespaces/workloads: cpu-req, cpu-lim, mem-req, mem-lim, pods, name
                          nodes: name, allocatable, committed, free, utilization
      --memory-unit <u>   MiB or GiB
      --concurrency <n>   namespaces fetched at the same time (1-64)
      --daemonsets <p>    skip (default) or node-count
      --bare-memory <u>   unit of memory values without a suffix: mib or bytes
  -l, --selector <sel>    node label selector (nodes report)
      --format <f>        markdown (default) or json
  -h, --help              show this help`;

// Flags that take a value, as `--flag value` or `--flag=value`
const VALUE_FLAGS = {
  '--namespace': 'namespace',
  '-n': 'namespace',
  '--context': 'context',
  '-c': 'context',
  '--sort': 'sort',
  '--memory-unit': 'memoryUnit',
  '--concurrency': 'concurrency',
  '--daemonsets': 'daemonsets',
  '--bare-memory': 'bareMemory',
  '--selector': 'selector',
  '-l': 'selector',
  '--format': 'format'
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;
type ValueField = (typeof VALUE_FLAGS)[ValueFlag];

const FLAG_NAMES: Readonly<Record<string, string>> = {
  report: 'report',
  namespace: '--namespace',
  context: '--context',
  sort: '--sort',
  memoryUnit: '--memory-unit',
  concurrency: '--concurrency',
  daemonsets: '--daemonsets',
  bareMemory: '--bare-memory',
  selector: '--selector',
  format: '--format'
};

const cliSchema = z.object({
  report: z.enum(REPORT_KINDS).default('namespaces'),
  namespace: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
  sort: z.string().optional(),
  memoryUnit: z.enum(['MiB', 'GiB']).optional(),
  concurrency: z.coerce.number().int().min(1).max(64).optional(),
  daemonsets: z.enum(['skip', 'node-count']).default('skip'),
  bareMemory: z
    .enum(['mib', 'bytes'])
    .transform((unit): BareMemoryUnit => (unit === 'mib' ? 'mebibytes' : 'bytes'))
    .optional(),
  selector: z.string().min(1).optional(),
  format: z.enum(['markdown', 'json']).default('markdown')
});

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, flag);
}

// Only long flags take the `=` form; `-l app=web` keeps its value whole
function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq < 0) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

function invalid(error: z.ZodError): FatalConfigurationError {
  const details = error.issues.map(issue => {
    const field = issue.path[0];
    const name = typeof field === 'string' ? (FLAG_NAMES[field] ?? field) : String(field);
    return `${name}: ${issue.message}`;
  });
  return new FatalConfigurationError(`Invalid arguments: ${details.join('; ')}`);
}

function validateSort<T extends string>(keys: readonly T[], value: string): T {
  const key = keys.find(k => k === value);
  if (key === undefined) {
    throw new FatalConfigurationError(`Invalid arguments: --sort must be one of ${keys.join(', ')}, got "${value}"`);
  }
  return key;
}

export function parseArgs(args: string[]): CliArgs {
  const values: Partial<Record<ValueField, string>> = {};
  const exclude: string[] = [];
  const positionalArgs: string[] = [];
  let skipSystem = false;
  let top = true;
  let help = false;
  let i = 0;

  while (i < args.length) {
    const arg = args[i] ?? '';
    const [flag, inlineValue] = splitFlag(arg);

    // Handle --exclude, repeatable
    if (flag === '--exclude') {
      const value = inlineValue ?? args[i + 1];
      if (value === undefined) throw new FatalConfigurationError('Missing value for --exclude');
      exclude.push(value);
      i += inlineValue === undefined ? 2 : 1;
      continue;
    }

    // Handle every other flag with a value
    if (isValueFlag(flag)) {
      const value = inlineValue ?? args[i + 1];
      if (value === undefined) throw new FatalConfigurationError(`Missing value for ${flag}`);
      values[VALUE_FLAGS[flag]] = value;
      i += inlineValue === undefined ? 2 : 1;
      continue;
    }

    if (arg === '--skip-system') {
      skipSystem = true;
      i++;
      continue;
    }

    if (arg === '--no-top') {
      top = false;
      i++;
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      help = true;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new FatalConfigurationError(`Unknown option: ${arg}`);
    }

    // Collect positional arguments
    positionalArgs.push(arg);
    i++;
  }

  if (positionalArgs.length > 1) {
    throw new FatalConfigurationError(`Unexpected arguments: ${positionalArgs.slice(1).join(' ')}`);
  }

  // First positional argument is the report
  const parsed = cliSchema.safeParse({ ...values, report: positionalArgs[0] });
  if (!parsed.success) throw invalid(parsed.error);
  const opts = parsed.data;

  return {
    report: opts.report,
    namespace: opts.namespace,
    context: opts.context,
    skipSystem,
    exclude,
    top,
    ...(opts.sort !== undefined &&
      (opts.report === 'nodes'
        ? { nodeSortBy: validateSort(NODE_SORT_KEYS, opts.sort) }
        : { sortBy: validateSort(NAMESPACE_SORT_KEYS, opts.sort) })),
    memoryUnit: opts.memoryUnit,
    concurrency: opts.concurrency,
    daemonSetPolicy: opts.daemonsets,
    bareMemoryUnit: opts.bareMemory,
    labelSelector: opts.selector,
    format: opts.format,
    help
  };
}
