// Resource accounting types. CPU is always in millicores, memory in MiB.

import type { WorkloadKind } from './k8s';

// How a bare number (no unit suffix) is read as memory
export type BareMemoryUnit = 'mebibytes' | 'bytes';

export type DaemonSetPolicy = 'skip' | 'node-count';

export interface ContainerResourceSpec {
  name: string;
  cpuRequest?: number | undefined;
  memRequest?: number | undefined;
  cpuLimit?: number | undefined;
  memLimit?: number | undefined;
}

export interface ResourceTotals {
  cpuRequestM: number;
  cpuLimitM: number;
  memRequestMib: number;
  memLimitMib: number;
}

export interface PodResourceProfile extends ResourceTotals {
  hasAnyRequest: boolean;
  containerCount: number;
}

export type WorkloadStatus = 'counted' | 'zero-replicas' | 'skipped';

export interface WorkloadAccounting {
  kind: WorkloadKind;
  name: string;
  namespace: string;
  declaredReplicas: number;
  effectiveReplicas: number;
  perReplica: PodResourceProfile;
  total: ResourceTotals;
  status: WorkloadStatus;
  note?: string | undefined;
}

export type UsageSummary =
  | { status: 'available'; cpuM: number; memMib: number; sampleCount: number }
  | { status: 'unavailable'; reason: string }
  | { status: 'not-collected' };

export interface NamespaceTotals extends ResourceTotals {
  namespace: string;
  podCount: number;
  podsWithoutRequests: number;
  usage: UsageSummary;
  error?: string | undefined;
}

export interface GrandTotals extends ResourceTotals {
  namespaceCount: number;
  errorCount: number;
  podCount: number;
  podsWithoutRequests: number;
  usage: UsageSummary;
}

export interface NodeAccounting {
  nodeName: string;
  capacityMib: number;
  allocatableMib: number;
  committedMib: number;
  freeReserveMib: number;
  utilizationPct: number;
  allocatableCpuM: number;
  committedCpuM: number;
  cpuUtilizationPct: number;
  committedLimitMib: number;
  memOvercommitPct: number;
  podCount: number;
  usage: UsageSummary;
  error?: string | undefined;
}

export interface UnmatchedPod {
  podName: string;
  namespace: string;
  nodeName: string;
}

export interface NodeAnalysis {
  nodes: NodeAccounting[];
  unmatchedPods: UnmatchedPod[];
  unscheduledPodCount: number;
}
