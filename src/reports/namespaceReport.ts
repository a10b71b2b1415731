import { getLogger } from '@fluidware-it/saddlebag';
import type { ClusterDataSource } from '../cluster/clusterDataSource';
import { QuantityParser } from '../analysis/quantityParser';
import { aggregatePods, failedNamespace, sumNamespaceTotals } from '../analysis/resourceAggregator';
import { mergeUsage, summarizeUsage } from '../analysis/usageMerger';
import {
  memoryDivisor,
  namespaceWarnings,
  parseFailureWarning,
  sortNamespaceTotals,
  toNamespaceRow,
  toNamespaceTotalRow
} from '../analysis/reportModel';
import type { NamespaceReport, NamespaceSortKey } from '../types/report';
import type { BareMemoryUnit, NamespaceTotals } from '../types/resources';
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

export interface NamespaceReportOptions extends NamespaceSelection, CommonReportOptions {
  sortBy?: NamespaceSortKey | undefined;
  // Bare memory numbers in pod specs; bytes unless told otherwise
  bareMemoryUnit?: BareMemoryUnit | undefined;
  onProgress?: ((event: ProgressEvent) => void) | undefined;
}

async function accountNamespace(
  source: ClusterDataSource,
  namespace: string,
  parsers: ReportParsers,
  includeUsage: boolean
): Promise<{ totals: NamespaceTotals }> {
  let totals: NamespaceTotals;
  try {
    // Running pods hold the scheduler's reservations right now
    const pods = await source.listPods({ namespace }, ['Running']);
    totals = aggregatePods(namespace, pods, parsers.spec);
  } catch (e: unknown) {
    const message = failureMessage(e, `pods in ${namespace}`);
    logger.warn(`Namespace ${namespace} not counted: ${message}`);
    return { totals: failedNamespace(namespace, message) };
  }

  if (!includeUsage) return { totals };
  const samples = await source.topPods(namespace);
  return { totals: mergeUsage(totals, summarizeUsage(samples, parsers.usage)) };
}

/**
 * Requests, limits and (optionally) actual usage of the running pods of every selected
 * namespace, with a cluster grand total.
 */
export async function buildNamespaceReport(
  source: ClusterDataSource,
  options: NamespaceReportOptions = {}
): Promise<NamespaceReport> {
  const sortBy = options.sortBy ?? 'cpu-req';
  const memoryUnit = options.memoryUnit ?? 'GiB';
  const includeUsage = options.includeUsage ?? true;
  const parsers: ReportParsers = {
    spec: new QuantityParser(options.bareMemoryUnit ?? 'bytes'),
    usage: usageParser()
  };

  const namespaces = await selectNamespaces(source, options);
  const unit = withProgress(namespaces.length, options.onProgress, namespace =>
    accountNamespace(source, namespace, parsers, includeUsage)
  );
  const results = await mapWithConcurrency(namespaces, options.concurrency ?? 1, unit);
  const totals = results.map(result => result.totals);

  const divisor = memoryDivisor(memoryUnit);
  const parseFailures = parsers.spec.failureCount + parsers.usage.failureCount;
  const sorted = sortNamespaceTotals(totals, sortBy);

  return {
    kind: 'namespaces',
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    memoryUnit,
    sortBy,
    rows: sorted.map(row => toNamespaceRow(row, divisor)),
    grandTotal: toNamespaceTotalRow(sumNamespaceTotals(totals), divisor),
    warnings: [...namespaceWarnings(sorted), ...parseFailureWarning(parseFailures)],
    parseFailures
  };
}
