import { describe, it, expect } from 'vitest';
import { QuantityParser } from '../../src/analysis/quantityParser';
import { analyzeNodes, failedNodes, percentOf } from '../../src/analysis/nodeCapacityAnalyzer';
import { container, node, pod } from '../fixtures';

const twoGi = [container('main', { cpu: '500m', memory: '2Gi' }, { memory: '4Gi' })];

describe('nodeCapacityAnalyzer', () => {
  describe('percentOf', () => {
    it('should be 0 when the whole is 0', () => {
      expect(percentOf(10, 0)).toBe(0);
      expect(percentOf(1, 4)).toBe(25);
    });
  });

  describe('analyzeNodes', () => {
    it('should derive commitment from the requests of the pods on a node', () => {
      const parser = new QuantityParser('mebibytes');
      const result = analyzeNodes(
        [node('worker-1', '16Gi')],
        [
          pod('a', { nodeName: 'worker-1', containers: twoGi }),
          pod('b', { nodeName: 'worker-1', containers: twoGi, namespace: 'team-b' })
        ],
        parser
      );

      expect(result.nodes).toEqual([
        {
          nodeName: 'worker-1',
          capacityMib: 16384,
          allocatableMib: 16384,
          committedMib: 4096,
          freeReserveMib: 12288,
          utilizationPct: 25,
          allocatableCpuM: 4000,
          committedCpuM: 1000,
          cpuUtilizationPct: 25,
          committedLimitMib: 8192,
          memOvercommitPct: 50,
          podCount: 2,
          usage: { status: 'not-collected' }
        }
      ]);
      expect(result.unmatchedPods).toEqual([]);
      expect(result.unscheduledPodCount).toBe(0);
    });

    it('should count Pending pods and ignore finished ones', () => {
      const parser = new QuantityParser('mebibytes');
      const result = analyzeNodes(
        [node('worker-1', '8Gi')],
        [
          pod('pending', { nodeName: 'worker-1', phase: 'Pending', containers: twoGi }),
          pod('done', { nodeName: 'worker-1', phase: 'Succeeded', containers: twoGi }),
          pod('crashed', { nodeName: 'worker-1', phase: 'Failed', containers: twoGi })
        ],
        parser
      );

      expect(result.nodes[0]?.podCount).toBe(1);
      expect(result.nodes[0]?.committedMib).toBe(2048);
    });

    it('should keep unscheduled and unmatched pods apart', () => {
      const parser = new QuantityParser('mebibytes');
      const result = analyzeNodes(
        [node('worker-1', '8Gi')],
        [
          pod('waiting', { phase: 'Pending', containers: twoGi }),
          pod('lost', { nodeName: 'worker-9', containers: twoGi })
        ],
        parser
      );

      expect(result.nodes[0]?.committedMib).toBe(0);
      expect(result.unscheduledPodCount).toBe(1);
      expect(result.unmatchedPods).toEqual([{ podName: 'lost', namespace: 'team-a', nodeName: 'worker-9' }]);
    });

    it('should let the free reserve go negative on an over-committed node', () => {
      const parser = new QuantityParser('mebibytes');
      const result = analyzeNodes(
        [node('small', '1Gi')],
        [pod('big', { nodeName: 'small', containers: twoGi })],
        parser
      );

      expect(result.nodes[0]?.freeReserveMib).toBe(-1024);
      expect(result.nodes[0]?.utilizationPct).toBe(200);
    });

    it('should report 0% for a node without allocatable resources', () => {
      const parser = new QuantityParser('mebibytes');
      const result = analyzeNodes(
        [node('cordoned', '0', '0')],
        [pod('a', { nodeName: 'cordoned', containers: twoGi })],
        parser
      );

      expect(result.nodes[0]?.utilizationPct).toBe(0);
      expect(result.nodes[0]?.cpuUtilizationPct).toBe(0);
      expect(result.nodes[0]?.memOvercommitPct).toBe(0);
      expect(result.nodes[0]?.freeReserveMib).toBe(-2048);
    });
  });

  describe('failedNodes', () => {
    it('should keep capacity and mark commitment as unknown', () => {
      const parser = new QuantityParser('mebibytes');
      const [row] = failedNodes([node('worker-1', '15Gi', '4', '16Gi')], parser, 'forbidden');

      expect(row?.capacityMib).toBe(16384);
      expect(row?.allocatableMib).toBe(15360);
      expect(row?.committedMib).toBe(0);
      expect(row?.freeReserveMib).toBe(0);
      expect(row?.error).toBe('forbidden');
    });
  });
});
