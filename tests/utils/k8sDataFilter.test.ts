import { describe, it, expect } from 'vitest';
import {
  filterNodeData,
  filterNodeMetrics,
  filterPodData,
  filterPodMetrics,
  filterWorkloadData,
  isDefined,
  listItems
} from '../../src/utils/k8sDataFilter';

describe('k8sDataFilter', () => {
  describe('filterPodData', () => {
    it('should extract the fields resource accounting needs', () => {
      const rawPod = {
        metadata: {
          name: 'web-7d9f-abcde',
          namespace: 'team-a',
          uid: 'abc-123-xyz',
          resourceVersion: '123456',
          labels: { app: 'web' },
          ownerReferences: [{ apiVersion: 'apps/v1', kind: 'ReplicaSet', name: 'web-7d9f', uid: 'rs-1' }]
        },
        spec: {
          nodeName: 'worker-1',
          initContainers: [{ name: 'migrate', resources: { requests: { cpu: '2', memory: '4Gi' } } }],
          containers: [
            {
              name: 'main',
              image: 'registry.example/web:1.0',
              resources: {
                requests: { cpu: '100m', memory: '128Mi' },
                limits: { cpu: '500m', memory: '512Mi' }
              }
            }
          ]
        },
        status: { phase: 'Running', podIP: '10.0.0.5' }
      };

      expect(filterPodData(rawPod)).toEqual({
        name: 'web-7d9f-abcde',
        namespace: 'team-a',
        phase: 'Running',
        nodeName: 'worker-1',
        ownerReferences: [{ kind: 'ReplicaSet', name: 'web-7d9f' }],
        containers: [
          {
            name: 'main',
            requests: { cpu: '100m', memory: '128Mi' },
            limits: { cpu: '500m', memory: '512Mi' }
          }
        ]
      });
    });

    it('should fill defaults for sparse pods', () => {
      const filtered = filterPodData({
        metadata: { name: 'bare' },
        spec: { containers: [{ name: 'main' }, { name: 'side', resources: { requests: null } }] }
      });

      expect(filtered).toEqual({
        name: 'bare',
        namespace: 'default',
        phase: 'Unknown',
        ownerReferences: [],
        containers: [
          { name: 'main', requests: {}, limits: {} },
          { name: 'side', requests: {}, limits: {} }
        ]
      });
      expect(filtered && 'nodeName' in filtered).toBe(false);
    });

    it('should turn numeric quantities into strings', () => {
      const filtered = filterPodData({
        metadata: { name: 'numeric' },
        spec: { containers: [{ name: 'main', resources: { requests: { cpu: 1, memory: 1048576 } } }] }
      });

      expect(filtered?.containers[0]?.requests).toEqual({ cpu: '1', memory: '1048576' });
    });

    it('should drop objects without a name', () => {
      expect(filterPodData({ metadata: {} })).toBeUndefined();
      expect(filterPodData('not a pod')).toBeUndefined();
    });
  });

  describe('filterWorkloadData', () => {
    it('should read replicas and the pod template', () => {
      const raw = {
        metadata: { name: 'web', namespace: 'team-a' },
        spec: {
          replicas: 3,
          template: {
            spec: {
              containers: [{ name: 'main', resources: { requests: { cpu: '250m' } } }]
            }
          }
        }
      };

      expect(filterWorkloadData(raw, 'Deployment', 'team-a')).toEqual({
        kind: 'Deployment',
        name: 'web',
        namespace: 'team-a',
        replicas: 3,
        containers: [{ name: 'main', requests: { cpu: '250m' }, limits: {} }]
      });
    });

    it('should leave absent replicas undefined and use the queried namespace', () => {
      const filtered = filterWorkloadData(
        { metadata: { name: 'legacy' }, spec: { replicas: null } },
        'DeploymentConfig',
        'team-b'
      );

      expect(filtered?.replicas).toBeUndefined();
      expect(filtered?.namespace).toBe('team-b');
      expect(filtered?.containers).toEqual([]);
    });

    it('should drop malformed workloads', () => {
      expect(filterWorkloadData({ metadata: { name: 'x' }, spec: { replicas: 'three' } }, 'Deployment', 'a')).toBeUndefined();
    });
  });

  describe('filterNodeData', () => {
    it('should read capacity and allocatable', () => {
      const raw = {
        metadata: { name: 'worker-1', labels: { 'node-role.kubernetes.io/worker': '' } },
        status: {
          capacity: { cpu: '4', memory: '16393220Ki', pods: '250' },
          allocatable: { cpu: '3500m', memory: '15241220Ki', pods: '250' }
        }
      };

      expect(filterNodeData(raw)).toEqual({
        name: 'worker-1',
        capacity: { cpu: '4', memory: '16393220Ki', pods: '250' },
        allocatable: { cpu: '3500m', memory: '15241220Ki', pods: '250' }
      });
    });

    it('should give empty maps to a node without status', () => {
      expect(filterNodeData({ metadata: { name: 'new' } })).toEqual({
        name: 'new',
        capacity: {},
        allocatable: {}
      });
    });
  });

  describe('metrics', () => {
    it('should give one sample per container', () => {
      const raw = {
        metadata: { name: 'web-1', namespace: 'team-a' },
        timestamp: '2024-05-01T12:00:00Z',
        containers: [
          { name: 'main', usage: { cpu: '12345678n', memory: '65536Ki' } },
          { name: 'proxy', usage: { cpu: '1m', memory: '8Mi' } }
        ]
      };

      expect(filterPodMetrics(raw)).toEqual([
        { podName: 'web-1', cpu: '12345678n', memory: '65536Ki' },
        { podName: 'web-1', cpu: '1m', memory: '8Mi' }
      ]);
      expect(filterPodMetrics({ metadata: { name: 'x' } })).toEqual([]);
    });

    it('should read node usage', () => {
      expect(filterNodeMetrics({ metadata: { name: 'worker-1' }, usage: { cpu: '1500m', memory: '6Gi' } })).toEqual({
        nodeName: 'worker-1',
        cpu: '1500m',
        memory: '6Gi'
      });
      expect(filterNodeMetrics({ metadata: { name: 'worker-1' } })).toBeUndefined();
    });
  });

  describe('helpers', () => {
    it('should read list items and tolerate other shapes', () => {
      expect(listItems({ items: [1, 2] })).toEqual([1, 2]);
      expect(listItems({ kind: 'Status' })).toEqual([]);
      expect(listItems(undefined)).toEqual([]);
    });

    it('should narrow away undefined', () => {
      expect([1, undefined, 2].filter(isDefined)).toEqual([1, 2]);
    });
  });
});
