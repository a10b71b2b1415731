import type { NodeObject, PodObject } from '../types/k8s';
import type { NodeAccounting, NodeAnalysis, UnmatchedPod } from '../types/resources';
import type { QuantityParser } from './quantityParser';
import { buildPodProfile } from './workloadExtractor';

// Pods in these phases hold a node reservation; Succeeded/Failed pods released theirs
const COMMITTING_PHASES = ['Running', 'Pending'];

export function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

function initNode(node: NodeObject, parser: QuantityParser): NodeAccounting {
  const allocatableMib = parser.memory(node.allocatable.memory, `node ${node.name} allocatable`);
  return {
    nodeName: node.name,
    capacityMib: parser.memory(node.capacity.memory, `node ${node.name} capacity`),
    allocatableMib,
    committedMib: 0,
    freeReserveMib: allocatableMib,
    utilizationPct: 0,
    allocatableCpuM: parser.cpu(node.allocatable.cpu, `node ${node.name} allocatable`),
    committedCpuM: 0,
    cpuUtilizationPct: 0,
    committedLimitMib: 0,
    memOvercommitPct: 0,
    podCount: 0,
    usage: { status: 'not-collected' }
  };
}

// Free reserve is not clamped: a negative value means the node is over-committed
function derive(node: NodeAccounting): NodeAccounting {
  return {
    ...node,
    freeReserveMib: node.allocatableMib - node.committedMib,
    utilizationPct: percentOf(node.committedMib, node.allocatableMib),
    cpuUtilizationPct: percentOf(node.committedCpuM, node.allocatableCpuM),
    memOvercommitPct: percentOf(node.committedLimitMib, node.allocatableMib)
  };
}

export function analyzeNodes(nodes: NodeObject[], pods: PodObject[], parser: QuantityParser): NodeAnalysis {
  const byName = new Map<string, NodeAccounting>();
  for (const node of nodes) {
    byName.set(node.name, initNode(node, parser));
  }

  const unmatchedPods: UnmatchedPod[] = [];
  let unscheduledPodCount = 0;

  for (const pod of pods) {
    if (!COMMITTING_PHASES.includes(pod.phase)) continue;

    // Not scheduled yet: reserves nothing anywhere
    if (!pod.nodeName) {
      unscheduledPodCount++;
      continue;
    }

    const accounting = byName.get(pod.nodeName);
    if (!accounting) {
      unmatchedPods.push({ podName: pod.name, namespace: pod.namespace, nodeName: pod.nodeName });
      continue;
    }

    const profile = buildPodProfile(pod.containers, parser, `${pod.namespace}/${pod.name}`);
    accounting.committedMib += profile.memRequestMib;
    accounting.committedCpuM += profile.cpuRequestM;
    accounting.committedLimitMib += profile.memLimitMib;
    accounting.podCount++;
  }

  return {
    nodes: [...byName.values()].map(derive),
    unmatchedPods,
    unscheduledPodCount
  };
}

// Rows for nodes whose pods could not be listed: capacity is known, commitment is not
export function failedNodes(nodes: NodeObject[], parser: QuantityParser, error: string): NodeAccounting[] {
  return nodes.map(node => ({ ...initNode(node, parser), freeReserveMib: 0, error }));
}
