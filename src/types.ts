/**
 * Core types for the offline sync engine
 */

import type {
  BATCH_TYPE,
  CONNECTIVITY_TRANSPORT,
  CYCLE_OUTCOME,
  SYNC_OPERATION,
  SYNC_STATUS,
  SYNC_TRIGGER,
} from './enums';
import type { PartialBatchFailure } from './errors';

/** Epoch milliseconds */
export type Timestamp = number;

export type SyncLogId = string;

export type SyncPayload = Record<string, unknown>;

/**
 * A single recorded mutation awaiting (or done with) upload
 */
export interface SyncLogEntry {
  readonly id: SyncLogId;
  readonly entityType: string;
  readonly entityId: string;
  readonly operation: SYNC_OPERATION;
  /** JSON-serialized mutation data */
  readonly payload: string;
  readonly isFile: boolean;
  readonly synced: boolean;
  readonly retryCount: number;
  /** Refused by the server or unencodable; stays pending but is never dispatched again */
  readonly rejected: boolean;
  readonly lastError?: string;
  readonly createdAt: Timestamp;
  readonly lastAttemptAt?: Timestamp;
  readonly syncedAt?: Timestamp;
}

/**
 * Input accepted by the mutation logging operations
 */
export interface MutationInput {
  entityType: string;
  entityId: string;
  operation: SYNC_OPERATION;
  data: SyncPayload;
  isFile?: boolean;
}

export interface BatchMutationInput {
  entityType: string;
  operation: SYNC_OPERATION;
  items: ReadonlyArray<{ entityId: string; data: SyncPayload }>;
  isFile?: boolean;
}

/**
 * What the caller gets back from a logging call
 */
export interface MutationReceipt {
  id?: SyncLogId;
  /** Accepted by the engine (persisted or buffered) */
  queued: boolean;
  /** Durably written to the log */
  persisted: boolean;
  error?: string;
}

export interface SyncStatusSnapshot {
  readonly status: SYNC_STATUS;
  readonly message?: string;
  readonly lastSyncAt?: Timestamp;
  readonly pendingCount: number;
}

export interface ConnectivityStatus {
  connected: boolean;
  transport: CONNECTIVITY_TRANSPORT;
  /** 0..1 when the platform reports it */
  signalStrength?: number;
  networkName?: string;
}

export interface DownloadResult {
  success: boolean;
  message: string;
  itemsDownloaded: number;
  isIncremental: boolean;
  /** entityType -> ids removed on the server */
  deletedEntities?: Record<string, readonly string[]>;
  metadata?: Record<string, unknown>;
}

export interface LogStatistics {
  total: number;
  pending: number;
  synced: number;
  /** Pending entries with at least one failed attempt */
  failed: number;
  exhausted: number;
  rejected: number;
  files: number;
}

/**
 * Entry-level failure collected during a dispatch cycle
 */
export interface EntryFailure {
  entryId: SyncLogId;
  entityType: string;
  entityId: string;
  error: string;
  rejected: boolean;
}

export interface DispatchResult {
  outcome: CYCLE_OUTCOME;
  batches: number;
  synced: number;
  failed: number;
  rejected: number;
  /** Pending entries left out because they ran out of attempts */
  held: number;
  failures: EntryFailure[];
  /** Batches the server accepted only in part */
  partialBatches: PartialBatchFailure[];
  error?: Error;
}

export interface StrategyOutcome {
  strategy: string;
  success: boolean;
  message: string;
  itemsDownloaded: number;
  isIncremental: boolean;
  checkpointAdvanced: boolean;
  deletionsApplied: number;
  error?: string;
}

export interface RefreshResult {
  success: boolean;
  outcomes: StrategyOutcome[];
}

export interface CycleReport {
  trigger: SYNC_TRIGGER;
  outcome: CYCLE_OUTCOME;
  startedAt: Timestamp;
  finishedAt: Timestamp;
  dispatch?: DispatchResult;
  downloads?: RefreshResult;
  status: SYNC_STATUS;
  /** Why the cycle did not run */
  reason?: string;
}

export interface BatchInfo {
  type: BATCH_TYPE;
  size: number;
  entryIds: SyncLogId[];
}

export interface SyncErrorRecord {
  readonly id: string;
  readonly message: string;
  readonly code: string;
  readonly category: string;
  readonly entityType?: string;
  readonly entityId?: string;
  readonly metadata?: Record<string, unknown>;
  readonly timestamp: Timestamp;
  readonly sent: boolean;
}
