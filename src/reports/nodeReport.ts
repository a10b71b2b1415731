import { getLogger } from '@fluidware-it/saddlebag';
import type { ClusterDataSource } from '../cluster/clusterDataSource';
import { QuantityParser } from '../analysis/quantityParser';
import { analyzeNodes, failedNodes } from '../analysis/nodeCapacityAnalyzer';
import { mergeNodeUsage, summarizeNodeUsage } from '../analysis/usageMerger';
import {
  memoryDivisor,
  nodeWarnings,
  parseFailureWarning,
  sortNodes,
  toNodeRow,
  toNodeTotalRow
} from '../analysis/reportModel';
import type { NodeObject, NodeUsageSample } from '../types/k8s';
import type { NodeReport, NodeSortKey } from '../types/report';
import type { BareMemoryUnit, NodeAccounting, NodeAnalysis } from '../types/resources';
import { failureMessage, usageParser, type CommonReportOptions } from './common';

const logger = getLogger();

export interface NodeReportOptions extends Omit<CommonReportOptions, 'concurrency'> {
  sortBy?: NodeSortKey | undefined;
  labelSelector?: string | undefined;
  bareMemoryUnit?: BareMemoryUnit | undefined;
}

async function analyzeCommitment(
  source: ClusterDataSource,
  nodes: NodeObject[],
  parser: QuantityParser
): Promise<NodeAnalysis> {
  try {
    const pods = await source.listPods('all', ['Running', 'Pending']);
    return analyzeNodes(nodes, pods, parser);
  } catch (e: unknown) {
    const message = failureMessage(e, 'pods in all namespaces');
    logger.warn(`Node commitment unknown: ${message}`);
    return { nodes: failedNodes(nodes, parser, message), unmatchedPods: [], unscheduledPodCount: 0 };
  }
}

async function withNodeUsage(
  source: ClusterDataSource,
  nodes: NodeAccounting[],
  parser: QuantityParser
): Promise<NodeAccounting[]> {
  const samples = await source.topNodes();
  const byNode = new Map<string, NodeUsageSample>();
  for (const sample of samples ?? []) byNode.set(sample.nodeName, sample);

  return nodes.map(node =>
    mergeNodeUsage(node, summarizeNodeUsage(byNode.get(node.nodeName), parser))
  );
}

/**
 * Memory and CPU committed on each node by the requests of the pods scheduled there, against
 * what the node can allocate.
 */
export async function buildNodeReport(source: ClusterDataSource, options: NodeReportOptions = {}): Promise<NodeReport> {
  const sortBy = options.sortBy ?? 'name';
  const memoryUnit = options.memoryUnit ?? 'GiB';
  const parser = new QuantityParser(options.bareMemoryUnit ?? 'mebibytes');
  const usage = usageParser();

  // Without the node list there is nothing to report on
  const nodeObjects = await source.listNodes(options.labelSelector);
  logger.info(`Nodes: ${nodeObjects.length} selected`);

  const analysis = await analyzeCommitment(source, nodeObjects, parser);
  const includeUsage = options.includeUsage ?? true;
  const nodes = includeUsage ? await withNodeUsage(source, analysis.nodes, usage) : analysis.nodes;

  const divisor = memoryDivisor(memoryUnit);
  const parseFailures = parser.failureCount + usage.failureCount;
  const sorted = sortNodes(nodes, sortBy);
  // With a label selector, pods on the nodes left out are expected and not worth a warning
  const unmatched = options.labelSelector ? [] : analysis.unmatchedPods;

  return {
    kind: 'nodes',
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    memoryUnit,
    sortBy,
    rows: sorted.map(node => toNodeRow(node, divisor)),
    grandTotal: toNodeTotalRow(nodes, divisor),
    warnings: [...nodeWarnings(sorted, unmatched), ...parseFailureWarning(parseFailures)],
    parseFailures,
    unmatchedPodCount: analysis.unmatchedPods.length,
    unscheduledPodCount: analysis.unscheduledPodCount
  };
}
