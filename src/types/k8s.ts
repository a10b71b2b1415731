// Canonical shapes of the cluster objects the accounting engine reads.
// Raw API objects are decoded into these once, in utils/k8sDataFilter.

export type WorkloadKind = 'Deployment' | 'StatefulSet' | 'DeploymentConfig' | 'DaemonSet' | 'Pod';

export const WORKLOAD_KINDS: readonly WorkloadKind[] = ['Deployment', 'StatefulSet', 'DeploymentConfig', 'DaemonSet', 'Pod'];

export type PodPhase = 'Pending' | 'Running' | 'Succeeded' | 'Failed' | 'Unknown';

// Quantity strings keyed by resource name ("cpu", "memory", ...)
export type QuantityMap = Record<string, string>;

export interface OwnerReference {
  kind: string;
  name: string;
}

export interface ContainerObject {
  name: string;
  requests: QuantityMap;
  limits: QuantityMap;
}

export interface WorkloadObject {
  kind: WorkloadKind;
  name: string;
  namespace: string;
  replicas?: number | undefined;
  containers: ContainerObject[];
}

export interface PodObject {
  name: string;
  namespace: string;
  phase: string;
  nodeName?: string | undefined;
  ownerReferences: OwnerReference[];
  containers: ContainerObject[];
}

export interface NodeObject {
  name: string;
  capacity: QuantityMap;
  allocatable: QuantityMap;
}

// One line of a live-usage snapshot: a pod (one line per container) and its current consumption
export interface PodUsageSample {
  podName: string;
  cpu: string;
  memory: string;
}

export interface NodeUsageSample {
  nodeName: string;
  cpu: string;
  memory: string;
}

export type PodScope = { namespace: string } | 'all';
