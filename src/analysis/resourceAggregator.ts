import type { PodObject } from '../types/k8s';
import type { GrandTotals, NamespaceTotals, UsageSummary, WorkloadAccounting } from '../types/resources';
import type { QuantityParser } from './quantityParser';
import { addTotals, buildPodProfile, ZERO_TOTALS } from './workloadExtractor';

const NOT_COLLECTED: UsageSummary = { status: 'not-collected' };

// Folds the pods of one namespace. Every pod counts once, whatever its container count.
export function aggregatePods(namespace: string, pods: PodObject[], parser: QuantityParser): NamespaceTotals {
  let totals = { ...ZERO_TOTALS };
  let podsWithoutRequests = 0;

  for (const pod of pods) {
    const profile = buildPodProfile(pod.containers, parser, `${pod.namespace}/${pod.name}`);
    totals = addTotals(totals, profile);
    // Only requests matter here: a pod with limits but no requests is still invisible to the scheduler
    if (!profile.hasAnyRequest) podsWithoutRequests++;
  }

  return { namespace, podCount: pods.length, podsWithoutRequests, ...totals, usage: NOT_COLLECTED };
}

// Folds workload accountings; skipped and zero-replica workloads are listed elsewhere but not summed
export function aggregateWorkloads(namespace: string, workloads: WorkloadAccounting[]): NamespaceTotals {
  let totals = { ...ZERO_TOTALS };
  let podCount = 0;
  let podsWithoutRequests = 0;

  for (const workload of workloads) {
    if (workload.status !== 'counted') continue;
    totals = addTotals(totals, workload.total);
    podCount += workload.effectiveReplicas;
    if (!workload.perReplica.hasAnyRequest) podsWithoutRequests += workload.effectiveReplicas;
  }

  return { namespace, podCount, podsWithoutRequests, ...totals, usage: NOT_COLLECTED };
}

export function failedNamespace(namespace: string, error: string): NamespaceTotals {
  return { namespace, podCount: 0, podsWithoutRequests: 0, ...ZERO_TOTALS, usage: NOT_COLLECTED, error };
}

function sumUsage(rows: NamespaceTotals[]): UsageSummary {
  let cpuM = 0;
  let memMib = 0;
  let sampleCount = 0;
  let available = false;
  let anyCollected = false;

  for (const row of rows) {
    if (row.usage.status !== 'not-collected') anyCollected = true;
    if (row.usage.status !== 'available') continue;
    available = true;
    cpuM += row.usage.cpuM;
    memMib += row.usage.memMib;
    sampleCount += row.usage.sampleCount;
  }

  if (available) return { status: 'available', cpuM, memMib, sampleCount };
  return anyCollected ? { status: 'unavailable', reason: 'no namespace reported usage' } : NOT_COLLECTED;
}

// Cluster grand total over the rows without errors. Errored rows only show up in the counts.
export function sumNamespaceTotals(rows: NamespaceTotals[]): GrandTotals {
  const valid = rows.filter(row => !row.error);
  let totals = { ...ZERO_TOTALS };
  let podCount = 0;
  let podsWithoutRequests = 0;

  for (const row of valid) {
    totals = addTotals(totals, row);
    podCount += row.podCount;
    podsWithoutRequests += row.podsWithoutRequests;
  }

  return {
    namespaceCount: rows.length,
    errorCount: rows.length - valid.length,
    podCount,
    podsWithoutRequests,
    ...totals,
    usage: sumUsage(valid)
  };
}
