/**
 * Error classes raised by the sync engine
 */

import { ERROR_CODE } from './enums';

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: ERROR_CODE = ERROR_CODE.UNKNOWN,
    public readonly retryable = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SyncError';
  }
}

/** The backing store could not be read or written */
export class PersistenceError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, ERROR_CODE.PERSISTENCE, true, cause);
    this.name = 'PersistenceError';
  }
}

/** Network failure or timeout; the request may never have reached the server */
export class TransportError extends SyncError {
  constructor(
    message: string,
    cause?: unknown,
    public readonly timedOut = false
  ) {
    super(message, ERROR_CODE.TRANSPORT, true, cause);
    this.name = 'TransportError';
  }
}

/** 5xx and throttling/auth statuses: the whole batch is retried later */
export class ServerError extends SyncError {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message, ERROR_CODE.SERVER_ERROR, true);
    this.name = 'ServerError';
  }
}

/** 4xx: the server refused the batch as invalid */
export class ServerRejection extends SyncError {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message, ERROR_CODE.SERVER_REJECTION, false);
    this.name = 'ServerRejection';
  }
}

export class PartialBatchFailure extends SyncError {
  constructor(
    message: string,
    public readonly failedIds: readonly string[]
  ) {
    super(message, ERROR_CODE.PARTIAL_BATCH_FAILURE, true);
    this.name = 'PartialBatchFailure';
  }
}

export class InvalidPayloadError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, ERROR_CODE.INVALID_PAYLOAD, false, cause);
    this.name = 'InvalidPayloadError';
  }
}

export class RecoveryExhausted extends SyncError {
  constructor(public readonly consecutiveFailures: number) {
    super(
      `Sync failed ${consecutiveFailures} consecutive times, entering recovery`,
      ERROR_CODE.RECOVERY_EXHAUSTED,
      true
    );
    this.name = 'RecoveryExhausted';
  }
}

export class ConfigurationError extends SyncError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, ERROR_CODE.CONFIGURATION, false);
    this.name = 'ConfigurationError';
  }
}

export class NotInitializedError extends SyncError {
  constructor(operation: string) {
    super(`SyncEngine must be initialized before calling ${operation}()`, ERROR_CODE.NOT_INITIALIZED);
    this.name = 'NotInitializedError';
  }
}

export type StatusClass = 'ok' | 'retryable' | 'rejected';

const RETRYABLE_CLIENT_STATUSES = new Set([401, 403, 408, 429]);

/**
 * Map an HTTP status onto how a batch should be treated
 */
export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return 'ok';
  if (status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status)) return 'retryable';
  if (status >= 400) return 'rejected';
  // 1xx/3xx reaching us means the transport did not follow through
  return 'retryable';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Wrap anything thrown into a SyncError, keeping existing ones
 */
export function toSyncError(error: unknown, fallbackCode: ERROR_CODE = ERROR_CODE.UNKNOWN): SyncError {
  if (error instanceof SyncError) return error;
  return new SyncError(errorMessage(error), fallbackCode, false, error);
}
