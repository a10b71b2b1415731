import type { WorkloadStatus } from './resources';
import type { WorkloadKind } from './k8s';

export enum IssueSeverity {
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info'
}

export interface ResourceReference {
  kind: 'Cluster' | 'Namespace' | 'Node' | 'Pod' | WorkloadKind;
  name: string;
  namespace?: string | undefined;
}

export interface ReportWarning {
  severity: IssueSeverity;
  resource: ResourceReference;
  message: string;
}

export type MemoryDisplayUnit = 'MiB' | 'GiB';

export const REPORT_KINDS = ['namespaces', 'workloads', 'nodes'] as const;
export type ReportKind = (typeof REPORT_KINDS)[number];

export const NAMESPACE_SORT_KEYS = ['cpu-req', 'cpu-lim', 'mem-req', 'mem-lim', 'pods', 'name'] as const;
export type NamespaceSortKey = (typeof NAMESPACE_SORT_KEYS)[number];

export const NODE_SORT_KEYS = ['name', 'allocatable', 'committed', 'free', 'utilization'] as const;
export type NodeSortKey = (typeof NODE_SORT_KEYS)[number];

// Usage as displayed: memory already divided by the display divisor, everything rounded to two decimals
export type DisplayUsage = { available: true; cpuM: number; mem: number } | { available: false; reason: string };

export interface NamespaceRow {
  namespace: string;
  podCount: number;
  podsWithoutRequests: number;
  cpuRequestM: number;
  cpuLimitM: number;
  memRequest: number;
  memLimit: number;
  usage?: DisplayUsage | undefined;
  error?: string | undefined;
}

export interface NamespaceTotalRow {
  namespaceCount: number;
  errorCount: number;
  podCount: number;
  podsWithoutRequests: number;
  cpuRequestM: number;
  cpuLimitM: number;
  memRequest: number;
  memLimit: number;
  usage?: DisplayUsage | undefined;
}

export interface WorkloadRow {
  kind: WorkloadKind;
  name: string;
  namespace: string;
  declaredReplicas: number;
  effectiveReplicas: number;
  status: WorkloadStatus;
  cpuRequestM: number;
  cpuLimitM: number;
  memRequest: number;
  memLimit: number;
  note?: string | undefined;
}

export interface NodeRow {
  nodeName: string;
  podCount: number;
  capacity: number;
  allocatable: number;
  committed: number;
  freeReserve: number;
  utilizationPct: number;
  allocatableCpuM: number;
  committedCpuM: number;
  cpuUtilizationPct: number;
  committedLimit: number;
  memOvercommitPct: number;
  usage?: DisplayUsage | undefined;
  error?: string | undefined;
}

export interface NodeTotalRow {
  nodeCount: number;
  errorCount: number;
  podCount: number;
  capacity: number;
  allocatable: number;
  committed: number;
  freeReserve: number;
  utilizationPct: number;
  allocatableCpuM: number;
  committedCpuM: number;
  cpuUtilizationPct: number;
  committedLimit: number;
  memOvercommitPct: number;
}

export interface ClusterReport<TRow, TTotal> {
  kind: ReportKind;
  generatedAt: string;
  memoryUnit: MemoryDisplayUnit;
  sortBy: string;
  rows: TRow[];
  grandTotal: TTotal;
  warnings: ReportWarning[];
  parseFailures: number;
}

export type NamespaceReport = ClusterReport<NamespaceRow, NamespaceTotalRow> & { kind: 'namespaces' };

export interface WorkloadReport extends ClusterReport<NamespaceRow, NamespaceTotalRow> {
  kind: 'workloads';
  workloads: WorkloadRow[];
}

export type NodeReport = ClusterReport<NodeRow, NodeTotalRow> & {
  kind: 'nodes';
  unmatchedPodCount: number;
  unscheduledPodCount: number;
};

export type AccountingReport = NamespaceReport | WorkloadReport | NodeReport;

export type OutputFormat = 'markdown' | 'json';
