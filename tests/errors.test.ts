import { describe, it, expect } from 'vitest';
import { PersistenceError, SyncError, TransportError, classifyStatus, errorMessage, toSyncError } from '../src/errors';
import { ERROR_CODE } from '../src/enums';

describe('Errors', () => {
  describe('classifyStatus', () => {
    it('should accept 2xx responses', () => {
      expect(classifyStatus(200)).toBe('ok');
      expect(classifyStatus(204)).toBe('ok');
    });

    it('should retry server errors, auth and throttling', () => {
      expect([500, 502, 503, 401, 403, 408, 429].map(classifyStatus)).toEqual(Array(7).fill('retryable'));
    });

    it('should reject other client errors', () => {
      expect([400, 404, 409, 422].map(classifyStatus)).toEqual(Array(4).fill('rejected'));
    });
  });

  describe('SyncError', () => {
    it('should carry code, retryability and cause', () => {
      const cause = new Error('disk full');
      const error = new PersistenceError('Failed to write sync log', cause);

      expect(error).toBeInstanceOf(SyncError);
      expect(error.name).toBe('PersistenceError');
      expect(error.code).toBe(ERROR_CODE.PERSISTENCE);
      expect(error.retryable).toBe(true);
      expect(error.cause).toBe(cause);
    });

    it('should flag timeouts on transport errors', () => {
      expect(new TransportError('timed out', undefined, true).timedOut).toBe(true);
      expect(new TransportError('refused').timedOut).toBe(false);
    });
  });

  describe('toSyncError', () => {
    it('should keep sync errors as they are', () => {
      const error = new TransportError('refused');

      expect(toSyncError(error)).toBe(error);
    });

    it('should wrap anything else', () => {
      const wrapped = toSyncError('plain failure', ERROR_CODE.DOWNLOAD_FAILED);

      expect(wrapped.message).toBe('plain failure');
      expect(wrapped.code).toBe(ERROR_CODE.DOWNLOAD_FAILED);
      expect(wrapped.cause).toBe('plain failure');
    });
  });

  it('should describe unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});
