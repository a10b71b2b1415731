import { z } from 'zod';
import { FatalConfigurationError } from '../utils/errors';
import type { MemoryDisplayUnit } from '../types/report';

export interface AppConfig {
  context?: string | undefined;
  memoryUnit: MemoryDisplayUnit;
  concurrency: number;
  systemPrefixes: string[];
}

export const DEFAULT_SYSTEM_PREFIXES = ['openshift-', 'kube-', 'default'];

const envSchema = z.object({
  K8S_LEDGER_CONTEXT: z.string().optional(),
  K8S_LEDGER_MEMORY_UNIT: z.enum(['MiB', 'GiB']).default('GiB'),
  K8S_LEDGER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(1),
  K8S_LEDGER_SYSTEM_PREFIXES: z.string().optional()
});

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

// Empty variables count as unset, like `process.env.X || default`
function nonEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value) result[key] = value;
  }
  return result;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(nonEmpty(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new FatalConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const prefixes = vars.K8S_LEDGER_SYSTEM_PREFIXES ? splitList(vars.K8S_LEDGER_SYSTEM_PREFIXES) : [];

  return {
    context: vars.K8S_LEDGER_CONTEXT,
    memoryUnit: vars.K8S_LEDGER_MEMORY_UNIT,
    concurrency: vars.K8S_LEDGER_CONCURRENCY,
    systemPrefixes: prefixes.length > 0 ? prefixes : DEFAULT_SYSTEM_PREFIXES
  };
}
