import { getLogger } from '@fluidware-it/saddlebag';
import type { ClusterDataSource } from '../cluster/clusterDataSource';
import { QuantityParser } from '../analysis/quantityParser';
import { extractWorkload, type ExtractOptions } from '../analysis/workloadExtractor';
import { aggregateWorkloads, failedNamespace, sumNamespaceTotals } from '../analysis/resourceAggregator';
import { mergeUsage, summarizeUsage } from '../analysis/usageMerger';
import {
  memoryDivisor,
  namespaceWarnings,
  parseFailureWarning,
  sortNamespaceTotals,
  sortWorkloads,
  toNamespaceRow,
  toNamespaceTotalRow,
  toWorkloadRow,
  workloadWarnings
} from '../analysis/reportModel';
import { WORKLOAD_KINDS, type WorkloadKind } from '../types/k8s';
import type { NamespaceSortKey, WorkloadReport } from '../types/report';
import type { BareMemoryUnit, DaemonSetPolicy, NamespaceTotals, WorkloadAccounting } from '../types/resources';
import { mapWithConcurrency } from '../utils/concurrency';
import {
  failureMessage,
  selectNamespaces,
  usageParser,
  withProgress,
  type CommonReportOptions,
  type NamespaceSelection,
  type ProgressEvent,
  type ReportParsers
} from './common';

const logger = getLogger();

export interface WorkloadReportOptions extends NamespaceSelection, CommonReportOptions {
  sortBy?: NamespaceSortKey | undefined;
  // Bare memory numbers in workload templates; MiB unless told otherwise
  bareMemoryUnit?: BareMemoryUnit | undefined;
  daemonSetPolicy?: DaemonSetPolicy | undefined;
  kinds?: readonly WorkloadKind[] | undefined;
  onProgress?: ((event: ProgressEvent) => void) | undefined;
}

interface NamespaceWorkloads {
  totals: NamespaceTotals;
  workloads: WorkloadAccounting[];
}

// The DaemonSet multiplier: every node, as a DaemonSet without a node selector runs everywhere
async function countNodes(source: ClusterDataSource): Promise<number | undefined> {
  try {
    const nodes = await source.listNodes();
    return nodes.length;
  } catch (e: unknown) {
    logger.warn(`Node count unknown, DaemonSets will not be counted: ${failureMessage(e, 'nodes')}`);
    return undefined;
  }
}

async function accountWorkloads(
  source: ClusterDataSource,
  namespace: string,
  parsers: ReportParsers,
  kinds: readonly WorkloadKind[],
  extractOptions: ExtractOptions,
  includeUsage: boolean
): Promise<NamespaceWorkloads> {
  let workloads: WorkloadAccounting[];
  try {
    const objects = await source.listWorkloads(namespace, kinds);
    workloads = objects.map(object => extractWorkload(object, parsers.spec, extractOptions));
  } catch (e: unknown) {
    const message = failureMessage(e, `workloads in ${namespace}`);
    logger.warn(`Namespace ${namespace} not counted: ${message}`);
    return { totals: failedNamespace(namespace, message), workloads: [] };
  }

  const totals = aggregateWorkloads(namespace, workloads);
  if (!includeUsage) return { totals, workloads };
  const samples = await source.topPods(namespace);
  return { totals: mergeUsage(totals, summarizeUsage(samples, parsers.usage)), workloads };
}

/**
 * Declared capacity per workload: the pod template of each controller multiplied by its
 * replica count, summed per namespace.
 */
export async function buildWorkloadReport(
  source: ClusterDataSource,
  options: WorkloadReportOptions = {}
): Promise<WorkloadReport> {
  const sortBy = options.sortBy ?? 'name';
  const memoryUnit = options.memoryUnit ?? 'GiB';
  const includeUsage = options.includeUsage ?? true;
  const kinds = options.kinds ?? WORKLOAD_KINDS;
  const daemonSetPolicy = options.daemonSetPolicy ?? 'skip';
  const parsers: ReportParsers = {
    spec: new QuantityParser(options.bareMemoryUnit ?? 'mebibytes'),
    usage: usageParser()
  };

  const namespaces = await selectNamespaces(source, options);
  const nodeCount =
    daemonSetPolicy === 'node-count' && kinds.includes('DaemonSet') ? await countNodes(source) : undefined;
  const extractOptions: ExtractOptions = { daemonSetPolicy, nodeCount };

  const unit = withProgress(namespaces.length, options.onProgress, namespace =>
    accountWorkloads(source, namespace, parsers, kinds, extractOptions, includeUsage)
  );
  const results = await mapWithConcurrency(namespaces, options.concurrency ?? 1, unit);
  const totals = results.map(result => result.totals);
  const workloads = sortWorkloads(
    results.flatMap(result => result.workloads),
    sortBy
  );

  const divisor = memoryDivisor(memoryUnit);
  const parseFailures = parsers.spec.failureCount + parsers.usage.failureCount;
  const sorted = sortNamespaceTotals(totals, sortBy);

  return {
    kind: 'workloads',
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    memoryUnit,
    sortBy,
    rows: sorted.map(row => toNamespaceRow(row, divisor)),
    grandTotal: toNamespaceTotalRow(sumNamespaceTotals(totals), divisor),
    workloads: workloads.map(workload => toWorkloadRow(workload, divisor)),
    warnings: [
      ...namespaceWarnings(sorted),
      ...workloadWarnings(workloads),
      ...parseFailureWarning(parseFailures)
    ],
    parseFailures
  };
}
