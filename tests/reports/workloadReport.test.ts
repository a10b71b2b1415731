import { describe, it, expect, vi } from 'vitest';
import { buildWorkloadReport } from '../../src/reports/workloadReport';
import { IssueSeverity } from '../../src/types/report';
import { DataFetchError } from '../../src/utils/errors';
import { container, fakeSource, FIXED_NOW, node, workload } from '../fixtures';

const TEAM_A = [
  workload('Deployment', 'web', 3, [container('web', { cpu: '100m', memory: '128Mi' })]),
  workload('StatefulSet', 'db', 0, [container('db', { cpu: '1', memory: '4Gi' })]),
  workload('DaemonSet', 'agent', undefined, [container('agent', { cpu: '50m', memory: '64Mi' })]),
  workload('Pod', 'debug', 1, [container('debug')])
];

function clusterSource() {
  return fakeSource({
    listWorkloads: vi.fn(async (namespace: string) => (namespace === 'team-a' ? TEAM_A : [])),
    listNodes: vi.fn(async () => [node('worker-1', '16Gi'), node('worker-2', '16Gi')])
  });
}

describe('buildWorkloadReport', () => {
  it('should multiply templates by replicas and DaemonSets by the node count', async () => {
    const source = clusterSource();

    const report = await buildWorkloadReport(source, {
      namespace: 'team-a',
      daemonSetPolicy: 'node-count',
      memoryUnit: 'MiB',
      includeUsage: false,
      now: FIXED_NOW
    });

    expect(source.listNodes).toHaveBeenCalledTimes(1);
    expect(report.kind).toBe('workloads');
    expect(report.sortBy).toBe('name');
    expect(report.rows).toEqual([
      {
        namespace: 'team-a',
        podCount: 6,
        podsWithoutRequests: 1,
        cpuRequestM: 400,
        cpuLimitM: 0,
        memRequest: 512,
        memLimit: 0
      }
    ]);
    expect(report.workloads.map(w => [w.kind, w.name, w.status, w.effectiveReplicas, w.cpuRequestM])).toEqual([
      ['DaemonSet', 'agent', 'counted', 2, 100],
      ['Deployment', 'web', 'counted', 3, 300],
      ['Pod', 'debug', 'counted', 1, 0],
      ['StatefulSet', 'db', 'zero-replicas', 0, 0]
    ]);
    expect(report.workloads[0]?.note).toBe('one pod per node, multiplied by 2 nodes (upper bound: node selectors and taints not applied)');
    expect(report.warnings).toEqual([
      {
        severity: IssueSeverity.WARNING,
        resource: { kind: 'Namespace', name: 'team-a' },
        message: '1 pod(s) without requests; totals are underestimated'
      },
      {
        severity: IssueSeverity.INFO,
        resource: { kind: 'StatefulSet', name: 'db', namespace: 'team-a' },
        message: 'Listed but not counted: 0 replicas'
      }
    ]);
  });

  it('should skip DaemonSets by default without reading nodes', async () => {
    const source = clusterSource();

    const report = await buildWorkloadReport(source, { namespace: 'team-a', includeUsage: false });

    expect(source.listNodes).not.toHaveBeenCalled();
    expect(report.rows[0]?.cpuRequestM).toBe(300);
    expect(report.rows[0]?.podCount).toBe(4);
    expect(report.workloads.find(w => w.name === 'agent')?.status).toBe('skipped');
  });

  it('should fall back to skipping DaemonSets when nodes cannot be listed', async () => {
    const source = fakeSource({
      listWorkloads: vi.fn(async () => TEAM_A),
      listNodes: vi.fn(async () => {
        throw new DataFetchError('nodes is forbidden', 'nodes', 403);
      })
    });

    const report = await buildWorkloadReport(source, {
      namespace: 'team-a',
      daemonSetPolicy: 'node-count',
      includeUsage: false
    });

    const agent = report.workloads.find(w => w.name === 'agent');
    expect(agent?.status).toBe('skipped');
    expect(agent?.note).toBe('one pod per node, but the node count is unknown; not counted');
  });

  it('should record a failed namespace and keep the others', async () => {
    const source = fakeSource({
      listNamespaces: vi.fn(async () => ['team-a', 'team-b']),
      listWorkloads: vi.fn(async (namespace: string) => {
        if (namespace === 'team-b') throw new DataFetchError('forbidden', 'Deployment in team-b', 403);
        return TEAM_A;
      })
    });

    const report = await buildWorkloadReport(source, { includeUsage: false, sortBy: 'cpu-req' });

    expect(report.rows.map(row => [row.namespace, row.cpuRequestM, row.error])).toEqual([
      ['team-a', 300, undefined],
      ['team-b', 0, 'forbidden']
    ]);
    expect(report.grandTotal.errorCount).toBe(1);
    expect(report.grandTotal.cpuRequestM).toBe(300);
    expect(report.workloads.every(w => w.namespace === 'team-a')).toBe(true);
  });

  it('should pass the requested kinds to the data source', async () => {
    const source = clusterSource();

    await buildWorkloadReport(source, { namespace: 'team-a', kinds: ['Deployment'], includeUsage: false });

    expect(source.listWorkloads).toHaveBeenCalledWith('team-a', ['Deployment']);
  });

  it('should read metrics usage as bytes while templates keep MiB', async () => {
    const source = fakeSource({
      listWorkloads: vi.fn(async () => [workload('Deployment', 'web', 1, [container('web', { cpu: 'lots', memory: '256' })])]),
      topPods: vi.fn(async () => [
        { podName: 'web-1', cpu: '100m', memory: '1048576' },
        { podName: 'web-2', cpu: '5m', memory: '?' }
      ])
    });

    const report = await buildWorkloadReport(source, { namespace: 'team-a', memoryUnit: 'MiB' });

    expect(report.rows[0]?.memRequest).toBe(256);
    expect(report.rows[0]?.usage).toEqual({ available: true, cpuM: 100, mem: 1 });
    expect(report.parseFailures).toBe(2);
  });
});
