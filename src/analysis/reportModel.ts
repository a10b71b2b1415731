import type {
  DisplayUsage,
  MemoryDisplayUnit,
  NamespaceRow,
  NamespaceSortKey,
  NamespaceTotalRow,
  NodeRow,
  NodeSortKey,
  NodeTotalRow,
  ReportWarning,
  WorkloadRow
} from '../types/report';
import { IssueSeverity } from '../types/report';
import type {
  GrandTotals,
  NamespaceTotals,
  NodeAccounting,
  UnmatchedPod,
  UsageSummary,
  WorkloadAccounting
} from '../types/resources';
import { percentOf } from './nodeCapacityAnalyzer';

// Conversion from the internal full-precision numbers to what a renderer shows.
// Aggregation never reads these values back.

export function memoryDivisor(unit: MemoryDisplayUnit): number {
  return unit === 'GiB' ? 1024 : 1;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function toDisplayUsage(usage: UsageSummary, divisor: number): DisplayUsage | undefined {
  switch (usage.status) {
    case 'available':
      return { available: true, cpuM: round2(usage.cpuM), mem: round2(usage.memMib / divisor) };
    case 'unavailable':
      return { available: false, reason: usage.reason };
    case 'not-collected':
      return undefined;
  }
}

export function toNamespaceRow(totals: NamespaceTotals, divisor: number): NamespaceRow {
  const usage = toDisplayUsage(totals.usage, divisor);
  return {
    namespace: totals.namespace,
    podCount: totals.podCount,
    podsWithoutRequests: totals.podsWithoutRequests,
    cpuRequestM: round2(totals.cpuRequestM),
    cpuLimitM: round2(totals.cpuLimitM),
    memRequest: round2(totals.memRequestMib / divisor),
    memLimit: round2(totals.memLimitMib / divisor),
    ...(usage && { usage }),
    ...(totals.error !== undefined && { error: totals.error })
  };
}

export function toNamespaceTotalRow(totals: GrandTotals, divisor: number): NamespaceTotalRow {
  const usage = toDisplayUsage(totals.usage, divisor);
  return {
    namespaceCount: totals.namespaceCount,
    errorCount: totals.errorCount,
    podCount: totals.podCount,
    podsWithoutRequests: totals.podsWithoutRequests,
    cpuRequestM: round2(totals.cpuRequestM),
    cpuLimitM: round2(totals.cpuLimitM),
    memRequest: round2(totals.memRequestMib / divisor),
    memLimit: round2(totals.memLimitMib / divisor),
    ...(usage && { usage })
  };
}

export function toWorkloadRow(workload: WorkloadAccounting, divisor: number): WorkloadRow {
  return {
    kind: workload.kind,
    name: workload.name,
    namespace: workload.namespace,
    declaredReplicas: workload.declaredReplicas,
    effectiveReplicas: workload.effectiveReplicas,
    status: workload.status,
    cpuRequestM: round2(workload.total.cpuRequestM),
    cpuLimitM: round2(workload.total.cpuLimitM),
    memRequest: round2(workload.total.memRequestMib / divisor),
    memLimit: round2(workload.total.memLimitMib / divisor),
    ...(workload.note !== undefined && { note: workload.note })
  };
}

export function toNodeRow(node: NodeAccounting, divisor: number): NodeRow {
  const usage = toDisplayUsage(node.usage, divisor);
  return {
    nodeName: node.nodeName,
    podCount: node.podCount,
    capacity: round2(node.capacityMib / divisor),
    allocatable: round2(node.allocatableMib / divisor),
    committed: round2(node.committedMib / divisor),
    freeReserve: round2(node.freeReserveMib / divisor),
    utilizationPct: round2(node.utilizationPct),
    allocatableCpuM: round2(node.allocatableCpuM),
    committedCpuM: round2(node.committedCpuM),
    cpuUtilizationPct: round2(node.cpuUtilizationPct),
    committedLimit: round2(node.committedLimitMib / divisor),
    memOvercommitPct: round2(node.memOvercommitPct),
    ...(usage && { usage }),
    ...(node.error !== undefined && { error: node.error })
  };
}

// Node grand total over error-free nodes; percentages are recomputed from the sums, not averaged
export function toNodeTotalRow(nodes: NodeAccounting[], divisor: number): NodeTotalRow {
  const valid = nodes.filter(node => !node.error);
  const sum = (pick: (node: NodeAccounting) => number): number => valid.reduce((acc, node) => acc + pick(node), 0);

  const allocatableMib = sum(n => n.allocatableMib);
  const committedMib = sum(n => n.committedMib);
  const allocatableCpuM = sum(n => n.allocatableCpuM);
  const committedCpuM = sum(n => n.committedCpuM);
  const committedLimitMib = sum(n => n.committedLimitMib);

  return {
    nodeCount: nodes.length,
    errorCount: nodes.length - valid.length,
    podCount: sum(n => n.podCount),
    capacity: round2(sum(n => n.capacityMib) / divisor),
    allocatable: round2(allocatableMib / divisor),
    committed: round2(committedMib / divisor),
    freeReserve: round2((allocatableMib - committedMib) / divisor),
    utilizationPct: round2(percentOf(committedMib, allocatableMib)),
    allocatableCpuM: round2(allocatableCpuM),
    committedCpuM: round2(committedCpuM),
    cpuUtilizationPct: round2(percentOf(committedCpuM, allocatableCpuM)),
    committedLimit: round2(committedLimitMib / divisor),
    memOvercommitPct: round2(percentOf(committedLimitMib, allocatableMib))
  };
}

const NAMESPACE_SORT_VALUES: Record<Exclude<NamespaceSortKey, 'name'>, (totals: NamespaceTotals) => number> = {
  'cpu-req': t => t.cpuRequestM,
  'cpu-lim': t => t.cpuLimitM,
  'mem-req': t => t.memRequestMib,
  'mem-lim': t => t.memLimitMib,
  pods: t => t.podCount
};

// Numeric keys sort descending; ties and the 'name' key sort by name, so arrival order never shows
export function sortNamespaceTotals(rows: NamespaceTotals[], sortBy: NamespaceSortKey): NamespaceTotals[] {
  const byName = (a: NamespaceTotals, b: NamespaceTotals): number => a.namespace.localeCompare(b.namespace);
  if (sortBy === 'name') return [...rows].sort(byName);
  const value = NAMESPACE_SORT_VALUES[sortBy];
  return [...rows].sort((a, b) => value(b) - value(a) || byName(a, b));
}

const WORKLOAD_SORT_VALUES: Record<Exclude<NamespaceSortKey, 'name'>, (workload: WorkloadAccounting) => number> = {
  'cpu-req': w => w.total.cpuRequestM,
  'cpu-lim': w => w.total.cpuLimitM,
  'mem-req': w => w.total.memRequestMib,
  'mem-lim': w => w.total.memLimitMib,
  pods: w => w.effectiveReplicas
};

function workloadIdentity(w: WorkloadAccounting): string {
  return `${w.namespace}/${w.kind}/${w.name}`;
}

export function sortWorkloads(workloads: WorkloadAccounting[], sortBy: NamespaceSortKey): WorkloadAccounting[] {
  const byIdentity = (a: WorkloadAccounting, b: WorkloadAccounting): number =>
    workloadIdentity(a).localeCompare(workloadIdentity(b));
  if (sortBy === 'name') return [...workloads].sort(byIdentity);
  const value = WORKLOAD_SORT_VALUES[sortBy];
  return [...workloads].sort((a, b) => value(b) - value(a) || byIdentity(a, b));
}

const NODE_SORT_VALUES: Record<Exclude<NodeSortKey, 'name'>, (node: NodeAccounting) => number> = {
  allocatable: n => n.allocatableMib,
  committed: n => n.committedMib,
  free: n => n.freeReserveMib,
  utilization: n => n.utilizationPct
};

export function sortNodes(nodes: NodeAccounting[], sortBy: NodeSortKey): NodeAccounting[] {
  const byName = (a: NodeAccounting, b: NodeAccounting): number => a.nodeName.localeCompare(b.nodeName);
  if (sortBy === 'name') return [...nodes].sort(byName);
  const value = NODE_SORT_VALUES[sortBy];
  return [...nodes].sort((a, b) => value(b) - value(a) || byName(a, b));
}

// Warnings

export function namespaceWarnings(rows: NamespaceTotals[]): ReportWarning[] {
  const warnings: ReportWarning[] = [];
  for (const row of rows) {
    const resource = { kind: 'Namespace' as const, name: row.namespace };
    if (row.error) {
      warnings.push({ severity: IssueSeverity.ERROR, resource, message: `Could not read namespace: ${row.error}` });
      continue;
    }
    if (row.podsWithoutRequests > 0) {
      warnings.push({
        severity: IssueSeverity.WARNING,
        resource,
        message: `${row.podsWithoutRequests} pod(s) without requests; totals are underestimated`
      });
    }
    if (row.usage.status === 'unavailable') {
      warnings.push({ severity: IssueSeverity.INFO, resource, message: `Actual usage N/A: ${row.usage.reason}` });
    }
  }
  return warnings;
}

export function workloadWarnings(workloads: WorkloadAccounting[]): ReportWarning[] {
  return workloads
    .filter(workload => workload.status !== 'counted')
    .map(workload => ({
      severity: IssueSeverity.INFO,
      resource: { kind: workload.kind, name: workload.name, namespace: workload.namespace },
      message:
        workload.status === 'skipped'
          ? `Not counted: ${workload.note ?? 'skipped'}`
          : `Listed but not counted: ${workload.declaredReplicas} replicas`
    }));
}

export function nodeWarnings(nodes: NodeAccounting[], unmatchedPods: UnmatchedPod[]): ReportWarning[] {
  const warnings: ReportWarning[] = [];
  for (const node of nodes) {
    const resource = { kind: 'Node' as const, name: node.nodeName };
    if (node.error) {
      warnings.push({ severity: IssueSeverity.ERROR, resource, message: `Commitment unknown: ${node.error}` });
    } else if (node.freeReserveMib < 0) {
      warnings.push({ severity: IssueSeverity.WARNING, resource, message: 'Memory requests exceed allocatable memory' });
    }
    if (node.usage.status === 'unavailable') {
      warnings.push({ severity: IssueSeverity.INFO, resource, message: `Actual usage N/A: ${node.usage.reason}` });
    }
  }
  for (const pod of unmatchedPods) {
    warnings.push({
      severity: IssueSeverity.INFO,
      resource: { kind: 'Pod', name: pod.podName, namespace: pod.namespace },
      message: `Assigned to node "${pod.nodeName}" which is not in the node list; not counted`
    });
  }
  return warnings;
}

export function parseFailureWarning(failureCount: number): ReportWarning[] {
  if (failureCount === 0) return [];
  return [
    {
      severity: IssueSeverity.WARNING,
      resource: { kind: 'Cluster', name: 'quantities' },
      message: `${failureCount} unparseable quantity value(s) counted as 0 or skipped`
    }
  ];
}
