import { describe, it, expect } from 'vitest';
import { DataFetchError, extractK8sErrorMessage, getStatusCode, toDataFetchError } from '../../src/utils/errors';

describe('errors', () => {
  describe('extractK8sErrorMessage', () => {
    it('should read the message from a JSON body', () => {
      const error = { code: 403, body: '{"kind":"Status","message":"pods is forbidden"}' };

      expect(extractK8sErrorMessage(error, 'pods')).toBe('pods is forbidden');
    });

    it('should read the message from an object body on the response', () => {
      const error = { response: { body: { message: 'namespaces "x" not found' } } };

      expect(extractK8sErrorMessage(error, 'namespaces')).toBe('namespaces "x" not found');
    });

    it('should keep a body that is not JSON', () => {
      expect(extractK8sErrorMessage({ body: 'upstream connect error' }, 'pods')).toBe('upstream connect error');
    });

    it('should fall back to the error message and then to the context', () => {
      expect(extractK8sErrorMessage(new Error('connect ECONNREFUSED'), 'pods')).toBe('connect ECONNREFUSED');
      expect(extractK8sErrorMessage({}, 'pods in team-a')).toBe('Unknown error for pods in team-a');
      expect(extractK8sErrorMessage('timeout', 'pods')).toBe('timeout');
      expect(extractK8sErrorMessage(undefined, 'pods')).toBe('Unknown error for pods');
    });
  });

  describe('getStatusCode', () => {
    it('should find the status where each client version puts it', () => {
      expect(getStatusCode({ code: 404 })).toBe(404);
      expect(getStatusCode({ statusCode: 401 })).toBe(401);
      expect(getStatusCode({ response: { statusCode: 500 } })).toBe(500);
      expect(getStatusCode(new Error('boom'))).toBeUndefined();
    });
  });

  describe('toDataFetchError', () => {
    it('should wrap a client error with its resource and status', () => {
      const cause = { code: 403, body: '{"message":"forbidden"}' };

      const error = toDataFetchError(cause, 'pods in team-a');

      expect(error).toBeInstanceOf(DataFetchError);
      expect(error.message).toBe('forbidden');
      expect(error.resource).toBe('pods in team-a');
      expect(error.statusCode).toBe(403);
      expect(error.cause).toBe(cause);
    });

    it('should return a DataFetchError unchanged', () => {
      const error = new DataFetchError('nodes is forbidden', 'nodes', 403);

      expect(toDataFetchError(error, 'other')).toBe(error);
    });
  });
});
