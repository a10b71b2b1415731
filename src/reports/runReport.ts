import type { CliArgs } from '../cli/parser';
import type { AppConfig } from '../config/config';
import type { ClusterDataSource } from '../cluster/clusterDataSource';
import type { AccountingReport } from '../types/report';
import type { ProgressEvent } from './common';
import { buildNamespaceReport } from './namespaceReport';
import { buildWorkloadReport } from './workloadReport';
import { buildNodeReport } from './nodeReport';

// Command line flags win over the environment configuration
export function runReport(
  args: CliArgs,
  config: AppConfig,
  source: ClusterDataSource,
  onProgress?: (event: ProgressEvent) => void
): Promise<AccountingReport> {
  const common = {
    memoryUnit: args.memoryUnit ?? config.memoryUnit,
    includeUsage: args.top,
    bareMemoryUnit: args.bareMemoryUnit
  };
  const selection = {
    namespace: args.namespace,
    skipSystem: args.skipSystem,
    systemPrefixes: config.systemPrefixes,
    exclude: args.exclude,
    concurrency: args.concurrency ?? config.concurrency,
    onProgress
  };

  switch (args.report) {
    case 'namespaces':
      return buildNamespaceReport(source, { ...common, ...selection, sortBy: args.sortBy });
    case 'workloads':
      return buildWorkloadReport(source, {
        ...common,
        ...selection,
        sortBy: args.sortBy,
        daemonSetPolicy: args.daemonSetPolicy
      });
    case 'nodes':
      return buildNodeReport(source, { ...common, sortBy: args.nodeSortBy, labelSelector: args.labelSelector });
  }
}
