import { describe, it, expect } from 'vitest';
import { findBarePods, resolveOwner } from '../../src/utils/ownerResolver';
import { pod } from '../fixtures';

describe('ownerResolver', () => {
  describe('resolveOwner', () => {
    it('should return undefined for a pod without ownerReferences', () => {
      expect(resolveOwner(pod('debug'))).toBeUndefined();
    });

    it('should return the first owner', () => {
      const owned = pod('web-1', {
        ownerReferences: [
          { kind: 'ReplicaSet', name: 'web-7d9f' },
          { kind: 'Deployment', name: 'web' }
        ]
      });

      expect(resolveOwner(owned)).toEqual({ kind: 'ReplicaSet', name: 'web-7d9f' });
    });
  });

  describe('findBarePods', () => {
    it('should keep active pods without a controller', () => {
      const pods = [
        pod('debug'),
        pod('starting', { phase: 'Pending' }),
        pod('finished', { phase: 'Succeeded' }),
        pod('web-1', { ownerReferences: [{ kind: 'ReplicaSet', name: 'web-7d9f' }] }),
        pod('job-1', { ownerReferences: [{ kind: 'Job', name: 'nightly' }] })
      ];

      expect(findBarePods(pods).map(p => p.name)).toEqual(['debug', 'starting']);
    });
  });
});
