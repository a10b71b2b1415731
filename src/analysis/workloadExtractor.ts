import type { ContainerObject, WorkloadObject } from '../types/k8s';
import type {
  ContainerResourceSpec,
  DaemonSetPolicy,
  PodResourceProfile,
  ResourceTotals,
  WorkloadAccounting
} from '../types/resources';
import type { QuantityParser } from './quantityParser';

export interface ExtractOptions {
  daemonSetPolicy: DaemonSetPolicy;
  // Schedulable node count, used as the DaemonSet multiplier under the 'node-count' policy
  nodeCount?: number | undefined;
}

export const ZERO_TOTALS: Readonly<ResourceTotals> = Object.freeze({
  cpuRequestM: 0,
  cpuLimitM: 0,
  memRequestMib: 0,
  memLimitMib: 0
});

function optionalQuantity(
  value: string | undefined,
  parse: (value: string) => number
): number | undefined {
  return value ? parse(value) : undefined;
}

// Absent fields stay undefined: "not declared" and "declared as 0" are different things
export function readContainerSpec(container: ContainerObject, parser: QuantityParser, context: string): ContainerResourceSpec {
  const where = `${context}/${container.name}`;
  return {
    name: container.name,
    cpuRequest: optionalQuantity(container.requests.cpu, v => parser.cpu(v, where)),
    memRequest: optionalQuantity(container.requests.memory, v => parser.memory(v, where)),
    cpuLimit: optionalQuantity(container.limits.cpu, v => parser.cpu(v, where)),
    memLimit: optionalQuantity(container.limits.memory, v => parser.memory(v, where))
  };
}

export function buildPodProfile(containers: ContainerObject[], parser: QuantityParser, context: string): PodResourceProfile {
  const profile: PodResourceProfile = { ...ZERO_TOTALS, hasAnyRequest: false, containerCount: containers.length };

  for (const container of containers) {
    const spec = readContainerSpec(container, parser, context);
    if (spec.cpuRequest !== undefined || spec.memRequest !== undefined) {
      profile.hasAnyRequest = true;
    }
    profile.cpuRequestM += spec.cpuRequest ?? 0;
    profile.cpuLimitM += spec.cpuLimit ?? 0;
    profile.memRequestMib += spec.memRequest ?? 0;
    profile.memLimitMib += spec.memLimit ?? 0;
  }

  return profile;
}

export function scaleTotals(totals: ResourceTotals, factor: number): ResourceTotals {
  return {
    cpuRequestM: totals.cpuRequestM * factor,
    cpuLimitM: totals.cpuLimitM * factor,
    memRequestMib: totals.memRequestMib * factor,
    memLimitMib: totals.memLimitMib * factor
  };
}

export function addTotals(a: ResourceTotals, b: ResourceTotals): ResourceTotals {
  return {
    cpuRequestM: a.cpuRequestM + b.cpuRequestM,
    cpuLimitM: a.cpuLimitM + b.cpuLimitM,
    memRequestMib: a.memRequestMib + b.memRequestMib,
    memLimitMib: a.memLimitMib + b.memLimitMib
  };
}

function declaredReplicas(workload: WorkloadObject): number {
  if (workload.kind === 'Pod') return 1;
  return workload.replicas ?? 0;
}

function daemonSetMultiplier(options: ExtractOptions): { replicas: number } | { note: string } {
  if (options.daemonSetPolicy === 'node-count' && options.nodeCount !== undefined) {
    return { replicas: options.nodeCount };
  }
  if (options.daemonSetPolicy === 'node-count') {
    return { note: 'one pod per node, but the node count is unknown; not counted' };
  }
  return { note: 'one pod per node; multiplier is the node count, not counted' };
}

export function extractWorkload(
  workload: WorkloadObject,
  parser: QuantityParser,
  options: ExtractOptions
): WorkloadAccounting {
  const context = `${workload.namespace}/${workload.kind}/${workload.name}`;
  const perReplica = buildPodProfile(workload.containers, parser, context);
  const declared = declaredReplicas(workload);
  const base = {
    kind: workload.kind,
    name: workload.name,
    namespace: workload.namespace,
    declaredReplicas: declared,
    perReplica
  };

  if (workload.kind === 'DaemonSet') {
    const multiplier = daemonSetMultiplier(options);
    if ('note' in multiplier) {
      return { ...base, effectiveReplicas: 0, total: { ...ZERO_TOTALS }, status: 'skipped', note: multiplier.note };
    }
    if (multiplier.replicas <= 0) {
      return { ...base, effectiveReplicas: 0, total: { ...ZERO_TOTALS }, status: 'zero-replicas' };
    }
    return {
      ...base,
      effectiveReplicas: multiplier.replicas,
      total: scaleTotals(perReplica, multiplier.replicas),
      status: 'counted',
      // Every node counts; node selectors and taints can leave some without a pod
      note: `one pod per node, multiplied by ${multiplier.replicas} nodes (upper bound: node selectors and taints not applied)`
    };
  }

  if (declared <= 0) {
    return { ...base, effectiveReplicas: 0, total: { ...ZERO_TOTALS }, status: 'zero-replicas' };
  }

  return { ...base, effectiveReplicas: declared, total: scaleTotals(perReplica, declared), status: 'counted' };
}
