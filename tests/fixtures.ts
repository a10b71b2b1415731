import { vi } from 'vitest';
import type { ClusterDataSource } from '../src/cluster/clusterDataSource';
import type {
  ContainerObject,
  NodeObject,
  PodObject,
  QuantityMap,
  WorkloadKind,
  WorkloadObject
} from '../src/types/k8s';

export function container(name: string, requests: QuantityMap = {}, limits: QuantityMap = {}): ContainerObject {
  return { name, requests, limits };
}

export function pod(name: string, overrides: Partial<PodObject> = {}): PodObject {
  return {
    name,
    namespace: 'team-a',
    phase: 'Running',
    ownerReferences: [],
    containers: [],
    ...overrides
  };
}

export function workload(
  kind: WorkloadKind,
  name: string,
  replicas: number | undefined,
  containers: ContainerObject[],
  namespace = 'team-a'
): WorkloadObject {
  return { kind, name, namespace, replicas, containers };
}

export function node(name: string, memory: string, cpu = '4', capacityMemory = memory): NodeObject {
  return {
    name,
    capacity: { memory: capacityMemory, cpu },
    allocatable: { memory, cpu }
  };
}

// A data source where every query succeeds with nothing, unless overridden
export function fakeSource(overrides: Partial<ClusterDataSource> = {}): ClusterDataSource {
  return {
    checkAccess: vi.fn(async () => 'v1.29.0'),
    listNamespaces: vi.fn(async () => []),
    readNamespace: vi.fn(async () => undefined),
    listWorkloads: vi.fn(async () => []),
    listPods: vi.fn(async () => []),
    listNodes: vi.fn(async () => []),
    topPods: vi.fn(async () => undefined),
    topNodes: vi.fn(async () => undefined),
    ...overrides
  };
}

export const FIXED_NOW = (): Date => new Date('2024-05-01T12:00:00.000Z');
