/**
 * Uploads pending log entries in ordered, size-bounded batches
 */

import { z } from 'zod';
import type { TransportAdapter, TransportResponse, UploadFile } from './interfaces';
import type { BatchInfo, DispatchResult, EntryFailure, SyncLogEntry, SyncLogId } from './types';
import { BATCH_TYPE, CYCLE_OUTCOME, SYNC_EVENT } from './enums';
import { DEFAULT_SYNC_CONFIG } from './config';
import {
  InvalidPayloadError,
  PartialBatchFailure,
  ServerError,
  ServerRejection,
  SyncError,
  TransportError,
  classifyStatus,
  errorMessage,
  toSyncError,
} from './errors';
import { SyncEventEmitter } from './event-emitter';
import { createLogger, type Logger } from './logger';
import { RetryPolicy } from './retry-policy';
import type { SyncLogStore } from './sync-log-store';
import { chunk, now, safeJsonParse, withTimeout } from './utils';

const batchFailureSchema = z.object({
  syncId: z.string().optional(),
  entityId: z.string().optional(),
  entityType: z.string().optional(),
  error: z.string().optional(),
  retryable: z.boolean().optional(),
});

const batchResponseSchema = z
  .object({
    failed: z.array(batchFailureSchema).default([]),
  })
  .passthrough();

type BatchFailure = z.infer<typeof batchFailureSchema>;

const filePayloadSchema = z
  .object({
    base64Content: z.string().min(1),
    mimeType: z.string().optional(),
    fileName: z.string().optional(),
  })
  .passthrough();

const DATA_URL_PREFIX = /^data:([^;,]+)?(?:;[^,]*)?,/;

const MIME_BY_EXTENSION: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  pdf: 'application/pdf',
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  txt: 'text/plain',
  json: 'application/json',
};

export interface BatchDispatcherOptions {
  store: SyncLogStore;
  transport: TransportAdapter;
  policy?: RetryPolicy;
  emitter?: SyncEventEmitter;
  logger?: Logger;
  maxDataBatchSize?: number;
  maxFileBatchSize?: number;
  dataEndpoint?: string;
  filesEndpoint?: string;
  uploadTimeout?: number;
  fileUploadTimeout?: number;
}

export interface DispatchOptions {
  /** Also send entries that ran out of attempts (recovery attempt) */
  includeExhausted?: boolean;
  /** Checked before each batch; false ends the cycle */
  shouldContinue?: () => boolean;
}

interface PreparedFile {
  entry: SyncLogEntry;
  file: UploadFile;
}

type BatchOutcome =
  | { kind: 'ok'; synced: number }
  | { kind: 'partial'; synced: number; failures: EntryFailure[]; error?: PartialBatchFailure }
  | { kind: 'rejected'; failures: EntryFailure[] }
  | { kind: 'outage'; error: SyncError; failures: EntryFailure[] };

export class BatchDispatcher {
  private active = false;
  private readonly policy: RetryPolicy;
  private readonly emitter: SyncEventEmitter;
  private readonly logger: Logger;
  private readonly limits: { data: number; files: number };
  private readonly endpoints: { data: string; files: string };
  private readonly timeouts: { upload: number; fileUpload: number };

  constructor(private readonly options: BatchDispatcherOptions) {
    this.policy = options.policy ?? new RetryPolicy();
    this.emitter = options.emitter ?? new SyncEventEmitter();
    this.logger = options.logger ?? createLogger('BatchDispatcher');
    this.limits = {
      data: options.maxDataBatchSize ?? DEFAULT_SYNC_CONFIG.maxDataBatchSize,
      files: options.maxFileBatchSize ?? DEFAULT_SYNC_CONFIG.maxFileBatchSize,
    };
    this.endpoints = {
      data: options.dataEndpoint ?? DEFAULT_SYNC_CONFIG.endpoints.data,
      files: options.filesEndpoint ?? DEFAULT_SYNC_CONFIG.endpoints.files,
    };
    this.timeouts = {
      upload: options.uploadTimeout ?? DEFAULT_SYNC_CONFIG.timeouts.upload,
      fileUpload: options.fileUploadTimeout ?? DEFAULT_SYNC_CONFIG.timeouts.fileUpload,
    };
  }

  get isRunning(): boolean {
    return this.active;
  }

  /**
   * One upload pass over the pending log. A call made while a pass is
   * running resolves immediately with a skipped result.
   */
  async runCycle(options: DispatchOptions = {}): Promise<DispatchResult> {
    const result: DispatchResult = {
      outcome: CYCLE_OUTCOME.COMPLETED,
      batches: 0,
      synced: 0,
      failed: 0,
      rejected: 0,
      held: 0,
      failures: [],
      partialBatches: [],
    };

    if (this.active) {
      this.logger.debug('Dispatch already in progress, skipping');
      return { ...result, outcome: CYCLE_OUTCOME.SKIPPED };
    }

    this.active = true;
    try {
      const pending = await this.options.store.listPending();
      const live = pending.filter(entry => !entry.rejected);
      const at = now();
      const eligible = options.includeExhausted === true ? live : live.filter(entry => this.policy.isDue(entry, at));
      result.held = live.length - eligible.length;

      const batches: Array<{ type: BATCH_TYPE; entries: SyncLogEntry[] }> = [
        ...chunk(
          eligible.filter(entry => entry.isFile),
          this.limits.files
        ).map(entries => ({ type: BATCH_TYPE.FILES, entries })),
        ...chunk(
          eligible.filter(entry => !entry.isFile),
          this.limits.data
        ).map(entries => ({ type: BATCH_TYPE.DATA, entries })),
      ];

      if (batches.length > 0) {
        this.logger.info(`Dispatching ${eligible.length} entr${eligible.length === 1 ? 'y' : 'ies'} in ${batches.length} batch(es)`);
      }

      for (const batch of batches) {
        if (options.shouldContinue && !options.shouldContinue()) {
          this.logger.info('Stop requested, ending cycle before next batch');
          result.outcome = CYCLE_OUTCOME.STOPPED;
          break;
        }

        const outcome =
          batch.type === BATCH_TYPE.FILES ? await this.sendFileBatch(batch.entries) : await this.sendDataBatch(batch.entries);
        result.batches++;
        this.accumulate(result, outcome);

        if (outcome.kind === 'outage') {
          result.outcome = CYCLE_OUTCOME.ABORTED;
          result.error = outcome.error;
          this.logger.warn(`Aborting cycle: ${outcome.error.message}`);
          break;
        }
        if (outcome.kind !== 'ok') {
          result.outcome = CYCLE_OUTCOME.PARTIAL;
        }
      }
    } catch (error) {
      result.outcome = CYCLE_OUTCOME.ABORTED;
      result.error = toSyncError(error);
      this.logger.error('Dispatch cycle failed', error);
    } finally {
      this.active = false;
    }

    return result;
  }

  private accumulate(result: DispatchResult, outcome: BatchOutcome): void {
    if (outcome.kind === 'ok' || outcome.kind === 'partial') {
      result.synced += outcome.synced;
    }
    if (outcome.kind === 'partial' && outcome.error) {
      result.partialBatches.push(outcome.error);
    }
    if (outcome.kind !== 'ok') {
      for (const failure of outcome.failures) {
        result.failures.push(failure);
        if (failure.rejected) result.rejected++;
        else result.failed++;
      }
    }
  }

  private async sendDataBatch(entries: SyncLogEntry[]): Promise<BatchOutcome> {
    const body = {
      type: BATCH_TYPE.DATA,
      logs: entries.map(entry => {
        const parsed = safeJsonParse(entry.payload);
        return {
          syncId: entry.id,
          entityType: entry.entityType,
          entityId: entry.entityId,
          operation: entry.operation,
          data: parsed.ok ? parsed.value : entry.payload,
          createdAt: new Date(entry.createdAt).toISOString(),
        };
      }),
      timestamp: new Date().toISOString(),
    };

    return this.deliver(BATCH_TYPE.DATA, entries, [], signal =>
      this.options.transport.post(this.endpoints.data, body, { timeout: this.timeouts.upload, signal })
    );
  }

  private async sendFileBatch(entries: SyncLogEntry[]): Promise<BatchOutcome> {
    const prepared: PreparedFile[] = [];
    const localFailures: EntryFailure[] = [];

    for (const entry of entries) {
      try {
        prepared.push({ entry, file: this.prepareFile(entry) });
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(`Rejecting file entry ${entry.id}: ${message}`);
        await this.options.store.markRejected(entry.id, message);
        localFailures.push(toFailure(entry, message, true));
      }
    }

    if (prepared.length === 0) {
      return { kind: 'rejected', failures: localFailures };
    }

    const sending = prepared.map(item => item.entry);
    const request = {
      files: prepared.map(item => item.file),
      fields: {
        fileIds: JSON.stringify(sending.map(entry => entry.entityId)),
        logs: JSON.stringify(
          prepared.map(({ entry, file }) => ({
            syncId: entry.id,
            entityType: entry.entityType,
            entityId: entry.entityId,
            operation: entry.operation,
            fileName: file.fileName,
            contentType: file.contentType,
            createdAt: new Date(entry.createdAt).toISOString(),
          }))
        ),
      },
    };

    return this.deliver(BATCH_TYPE.FILES, sending, localFailures, signal =>
      this.options.transport.upload(this.endpoints.files, request, { timeout: this.timeouts.fileUpload, signal })
    );
  }

  private prepareFile(entry: SyncLogEntry): UploadFile {
    const json = safeJsonParse(entry.payload);
    if (!json.ok) throw new InvalidPayloadError(`File payload is not JSON: ${json.error}`);

    const parsed = filePayloadSchema.safeParse(json.value);
    if (!parsed.success) throw new InvalidPayloadError('File payload has no base64Content');

    const { base64Content, mimeType, fileName } = parsed.data;
    const prefix = DATA_URL_PREFIX.exec(base64Content);
    const encoded = prefix ? base64Content.slice(prefix[0].length) : base64Content;
    const content = new Uint8Array(Buffer.from(encoded, 'base64'));
    if (content.byteLength === 0) throw new InvalidPayloadError('File payload decodes to zero bytes');

    const extension = fileName?.split('.').pop()?.toLowerCase();
    const contentType =
      mimeType ?? prefix?.[1] ?? (extension ? MIME_BY_EXTENSION[extension] : undefined) ?? 'application/octet-stream';

    return {
      fieldName: 'files',
      fileName: fileName ?? `${entry.entityId}${extensionFor(contentType)}`,
      contentType,
      content,
    };
  }

  private async deliver(
    type: BATCH_TYPE,
    entries: SyncLogEntry[],
    localFailures: EntryFailure[],
    send: (signal: AbortSignal) => Promise<TransportResponse>
  ): Promise<BatchOutcome> {
    const info: BatchInfo = { type, size: entries.length, entryIds: entries.map(entry => entry.id) };
    const timeout = type === BATCH_TYPE.FILES ? this.timeouts.fileUpload : this.timeouts.upload;

    let response: TransportResponse;
    try {
      response = await withTimeout(send, timeout, `${type} batch upload`);
    } catch (error) {
      const failure = error instanceof SyncError ? error : new TransportError(errorMessage(error), error);
      return this.failWholeBatch(info, entries, localFailures, failure);
    }

    const statusClass = classifyStatus(response.status);
    if (statusClass === 'retryable') {
      const failure = new ServerError(`Server responded ${response.status} to ${type} batch`, response.status);
      return this.failWholeBatch(info, entries, localFailures, failure);
    }

    if (statusClass === 'rejected') {
      const rejection = new ServerRejection(`Server rejected ${type} batch with ${response.status}`, response.status);
      const failures = [...localFailures];
      for (const entry of entries) {
        await this.options.store.markRejected(entry.id, rejection.message);
        failures.push(toFailure(entry, rejection.message, true));
      }
      this.emitter.emit(SYNC_EVENT.BATCH_FAILED, { ...info, error: rejection.message });
      this.logger.warn(rejection.message);
      return { kind: 'rejected', failures };
    }

    const reported = this.parseFailures(response.data);
    const matched = matchFailures(entries, reported);
    const succeededIds = entries.filter(entry => !matched.has(entry.id)).map(entry => entry.id);
    const synced = await this.options.store.markSyncedMany(succeededIds);

    if (matched.size === 0) {
      this.emitter.emit(SYNC_EVENT.BATCH_SENT, info);
      this.logger.debug(`${type} batch of ${entries.length} synced`);
      return localFailures.length === 0 ? { kind: 'ok', synced } : { kind: 'partial', synced, failures: localFailures };
    }

    const failures = [...localFailures];
    for (const entry of entries) {
      const failure = matched.get(entry.id);
      if (!failure) continue;
      const message = failure.error ?? 'Rejected by server';
      const rejected = failure.retryable === false;
      if (rejected) await this.options.store.markRejected(entry.id, message);
      else await this.options.store.incrementRetry(entry.id, message);
      failures.push(toFailure(entry, message, rejected));
    }

    const partial = new PartialBatchFailure(
      `${matched.size} of ${entries.length} entries in ${type} batch failed`,
      [...matched.keys()]
    );
    this.logger.warn(partial.message);
    this.emitter.emit(SYNC_EVENT.BATCH_SENT, info);
    return { kind: 'partial', synced, failures, error: partial };
  }

  private async failWholeBatch(
    info: BatchInfo,
    entries: SyncLogEntry[],
    localFailures: EntryFailure[],
    error: SyncError
  ): Promise<BatchOutcome> {
    const failures = [...localFailures];
    for (const entry of entries) {
      await this.options.store.incrementRetry(entry.id, error.message);
      failures.push(toFailure(entry, error.message, false));
    }
    this.emitter.emit(SYNC_EVENT.BATCH_FAILED, { ...info, error: error.message });
    return { kind: 'outage', error, failures };
  }

  private parseFailures(data: unknown): BatchFailure[] {
    if (data === null || data === undefined || typeof data !== 'object') return [];
    const parsed = batchResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn('Unrecognized batch response body, treating batch as accepted');
      return [];
    }
    return parsed.data.failed;
  }
}

function matchFailures(entries: readonly SyncLogEntry[], failures: readonly BatchFailure[]): Map<SyncLogId, BatchFailure> {
  const matched = new Map<SyncLogId, BatchFailure>();
  for (const failure of failures) {
    for (const entry of entries) {
      const hit =
        failure.syncId !== undefined
          ? entry.id === failure.syncId
          : failure.entityId !== undefined &&
            entry.entityId === failure.entityId &&
            (failure.entityType === undefined || entry.entityType === failure.entityType);
      if (hit) matched.set(entry.id, failure);
    }
  }
  return matched;
}

function toFailure(entry: SyncLogEntry, error: string, rejected: boolean): EntryFailure {
  return { entryId: entry.id, entityType: entry.entityType, entityId: entry.entityId, error, rejected };
}

function extensionFor(contentType: string): string {
  const match = Object.entries(MIME_BY_EXTENSION).find(([, mime]) => mime === contentType);
  return match ? `.${match[0]}` : '';
}
