import { getLogger } from '@fluidware-it/saddlebag';
import type { NodeUsageSample, PodUsageSample } from '../types/k8s';
import type { NamespaceTotals, NodeAccounting, UsageSummary } from '../types/resources';
import type { QuantityParser } from './quantityParser';

const logger = getLogger();

const METRICS_UNAVAILABLE = 'metrics not available';
const NO_VALID_SAMPLES = 'no parseable usage samples';

interface UsageLine {
  name: string;
  cpu: string;
  memory: string;
}

function summarize(lines: UsageLine[] | undefined, parser: QuantityParser): UsageSummary {
  if (lines === undefined) return { status: 'unavailable', reason: METRICS_UNAVAILABLE };

  let cpuM = 0;
  let memMib = 0;
  let sampleCount = 0;

  for (const line of lines) {
    const cpu = parser.tryCpu(line.cpu, `usage of ${line.name}`);
    const memory = parser.tryMemory(line.memory, `usage of ${line.name}`);
    if (cpu === undefined || memory === undefined) {
      logger.debug(`Skipping usage sample of ${line.name}: "${line.cpu}" / "${line.memory}"`);
      continue;
    }
    cpuM += cpu;
    memMib += memory;
    sampleCount++;
  }

  // Nothing readable is "could not measure", not "uses nothing"
  if (sampleCount === 0) return { status: 'unavailable', reason: NO_VALID_SAMPLES };
  return { status: 'available', cpuM, memMib, sampleCount };
}

export function summarizeUsage(samples: PodUsageSample[] | undefined, parser: QuantityParser): UsageSummary {
  return summarize(
    samples?.map(sample => ({ name: sample.podName, cpu: sample.cpu, memory: sample.memory })),
    parser
  );
}

export function summarizeNodeUsage(sample: NodeUsageSample | undefined, parser: QuantityParser): UsageSummary {
  return summarize(sample && [{ name: sample.nodeName, cpu: sample.cpu, memory: sample.memory }], parser);
}

// Errored namespaces keep their "not collected" usage: there is nothing to compare usage against
export function mergeUsage(totals: NamespaceTotals, usage: UsageSummary): NamespaceTotals {
  if (totals.error) return totals;
  return { ...totals, usage };
}

export function mergeNodeUsage(node: NodeAccounting, usage: UsageSummary): NodeAccounting {
  if (node.error) return node;
  return { ...node, usage };
}
