/**
 * Core interfaces for the sync engine collaborators
 */

import type {
  BatchInfo,
  BatchMutationInput,
  ConnectivityStatus,
  CycleReport,
  DownloadResult,
  MutationInput,
  MutationReceipt,
  StrategyOutcome,
  SyncLogEntry,
  SyncStatusSnapshot,
  Timestamp,
} from './types';
import type { SYNC_EVENT, SYNC_TRIGGER } from './enums';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Key-value storage adapter - implement this for any durable backend
 * (files, SQLite, platform preferences, etc.)
 */
export interface StorageAdapter {
  getString(key: string): MaybePromise<string | null>;
  setString(key: string, value: string): MaybePromise<void>;
  getBoolean(key: string): MaybePromise<boolean | null>;
  setBoolean(key: string, value: boolean): MaybePromise<void>;
  remove(key: string): MaybePromise<void>;
  keys(): MaybePromise<string[]>;

  // Cleanup
  close?(): MaybePromise<void>;
}

export interface TransportRequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  /** Milliseconds before the request is aborted */
  timeout?: number;
  signal?: AbortSignal;
}

export type ProgressCallback = (transferred: number, total: number) => void;

export interface TransferOptions extends TransportRequestOptions {
  onProgress?: ProgressCallback;
}

/**
 * Normalized response; data is the parsed JSON body, the text body, or null
 */
export interface TransportResponse {
  status: number;
  statusText?: string;
  data: unknown;
  headers: Record<string, string>;
}

export interface UploadFile {
  fieldName: string;
  fileName: string;
  contentType: string;
  content: Uint8Array;
}

export interface UploadRequest {
  files: UploadFile[];
  fields?: Record<string, string>;
}

/**
 * Network transport adapter - resolves with any HTTP status,
 * rejects with TransportError when no response was received
 */
export interface TransportAdapter {
  get(path: string, options?: TransportRequestOptions): Promise<TransportResponse>;
  post(path: string, body?: unknown, options?: TransportRequestOptions): Promise<TransportResponse>;
  put(path: string, body?: unknown, options?: TransportRequestOptions): Promise<TransportResponse>;
  patch(path: string, body?: unknown, options?: TransportRequestOptions): Promise<TransportResponse>;
  delete(path: string, options?: TransportRequestOptions): Promise<TransportResponse>;
  upload(path: string, request: UploadRequest, options?: TransferOptions): Promise<TransportResponse>;
  download(path: string, options?: TransferOptions): Promise<TransportResponse>;
}

/**
 * Reports network reachability and its changes
 */
export interface ConnectivityAdapter {
  getStatus(): Promise<ConnectivityStatus>;
  onChange(listener: (status: ConnectivityStatus) => void): () => void;
  close?(): MaybePromise<void>;
}

/**
 * Pluggable downloader for one entity family
 */
export interface DownloadStrategy {
  readonly name: string;
  /** Undefined checkpoint means a full download */
  downloadData(lastSyncTimestamp?: Timestamp): Promise<DownloadResult>;
}

/**
 * Removes locally cached entities the server reported as deleted
 */
export interface EntityRemover {
  removeEntities(entityType: string, ids: readonly string[]): Promise<void>;
}

export interface BackgroundTask {
  name: string;
  /** Milliseconds between runs */
  frequency: number;
  initialDelay: number;
  run(): Promise<void>;
}

/**
 * Platform hook for work that runs while the app is not in the foreground
 */
export interface BackgroundTaskRunner {
  register(task: BackgroundTask): MaybePromise<void>;
  cancel(name: string): MaybePromise<void>;
  isRegistered(name: string): MaybePromise<boolean>;
}

type MutationFields = Omit<MutationInput, 'operation'>;

/**
 * Entry point used by feature code to record mutations
 */
export interface MutationLogger {
  logCreate(input: MutationFields): Promise<MutationReceipt>;
  logUpdate(input: MutationFields): Promise<MutationReceipt>;
  logDelete(input: Omit<MutationFields, 'data'> & { data?: MutationInput['data'] }): Promise<MutationReceipt>;
  logCustomOperation(input: MutationInput): Promise<MutationReceipt>;
  logBatch(input: BatchMutationInput): Promise<MutationReceipt[]>;
}

/**
 * Event types for the sync engine
 */
export interface SyncEvents {
  // Status events
  [SYNC_EVENT.STATUS_CHANGED]: SyncStatusSnapshot;

  // Mutation log events
  [SYNC_EVENT.MUTATION_LOGGED]: { entry: SyncLogEntry; persisted: boolean };

  // Cycle events
  [SYNC_EVENT.CYCLE_STARTED]: { trigger: SYNC_TRIGGER };
  [SYNC_EVENT.CYCLE_COMPLETED]: CycleReport;
  [SYNC_EVENT.CYCLE_SKIPPED]: { trigger: SYNC_TRIGGER; reason: string };
  [SYNC_EVENT.BATCH_SENT]: BatchInfo;
  [SYNC_EVENT.BATCH_FAILED]: BatchInfo & { error: string };
  [SYNC_EVENT.RECOVERY_ENTERED]: { consecutiveFailures: number; retryAt: Timestamp };

  // Download events
  [SYNC_EVENT.DOWNLOAD_COMPLETED]: StrategyOutcome;
  [SYNC_EVENT.DOWNLOAD_FAILED]: StrategyOutcome;

  // Connection events
  [SYNC_EVENT.CONNECTION_ONLINE]: ConnectivityStatus;
  [SYNC_EVENT.CONNECTION_OFFLINE]: ConnectivityStatus;
}

export type SyncEventListener<K extends keyof SyncEvents> = (data: SyncEvents[K]) => unknown;

/**
 * Event emitter interface
 */
export interface EventEmitter {
  on<K extends keyof SyncEvents>(event: K, listener: SyncEventListener<K>): () => void;
  emit<K extends keyof SyncEvents>(event: K, data: SyncEvents[K]): void;
  off<K extends keyof SyncEvents>(event: K, listener: SyncEventListener<K>): void;
  removeAllListeners<K extends keyof SyncEvents>(event?: K): void;
}
