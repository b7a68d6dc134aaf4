/**
 * Persistent journal of sync errors and the reporter that ships them
 */

import { z } from 'zod';
import type { StorageAdapter, TransportAdapter } from './interfaces';
import type { SyncErrorRecord } from './types';
import { ERROR_CODE } from './enums';
import { DEFAULT_SYNC_CONFIG, STORAGE_KEYS } from './config';
import { PersistenceError, SyncError, classifyStatus, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { Mutex, chunk, generateId, isPlainObject, now, sanitizeForLogging } from './utils';

const errorRecordSchema = z.object({
  id: z.string(),
  message: z.string(),
  code: z.string(),
  category: z.string(),
  entityType: z.string().optional(),
  entityId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  timestamp: z.number(),
  sent: z.boolean(),
});

const errorJournalSchema = z.array(errorRecordSchema);

export interface ErrorRecordInput {
  message: string;
  code?: string;
  category: string;
  entityType?: string;
  entityId?: string;
  metadata?: Record<string, unknown>;
}

export class SyncErrorJournal {
  private readonly lock = new Mutex();

  constructor(
    private readonly storage: StorageAdapter,
    private readonly maxRecords: number = DEFAULT_SYNC_CONFIG.errorReporting.maxRecords,
    private readonly logger: Logger = createLogger('SyncErrorJournal')
  ) {}

  /**
   * Append a record, dropping the oldest beyond maxRecords
   */
  async record(input: ErrorRecordInput): Promise<SyncErrorRecord> {
    const sanitized = input.metadata ? sanitizeForLogging(input.metadata) : undefined;
    const record: SyncErrorRecord = {
      id: generateId(),
      message: input.message,
      code: input.code ?? ERROR_CODE.UNKNOWN,
      category: input.category,
      timestamp: now(),
      sent: false,
      ...(input.entityType !== undefined ? { entityType: input.entityType } : {}),
      ...(input.entityId !== undefined ? { entityId: input.entityId } : {}),
      ...(isPlainObject(sanitized) ? { metadata: sanitized } : {}),
    };

    await this.lock.runExclusive(async () => {
      const records = await this.load();
      records.push(record);
      await this.save(records.slice(-this.maxRecords));
    });
    return record;
  }

  async recordError(error: unknown, category: string, context: Omit<ErrorRecordInput, 'message' | 'category' | 'code'> = {}): Promise<SyncErrorRecord> {
    return this.record({
      ...context,
      message: errorMessage(error),
      code: error instanceof SyncError ? error.code : ERROR_CODE.UNKNOWN,
      category,
    });
  }

  async list(): Promise<SyncErrorRecord[]> {
    return this.lock.runExclusive(() => this.load());
  }

  async listUnsent(): Promise<SyncErrorRecord[]> {
    const records = await this.list();
    return records.filter(record => !record.sent);
  }

  async markSent(ids: readonly string[]): Promise<void> {
    const wanted = new Set(ids);
    await this.lock.runExclusive(async () => {
      const records = await this.load();
      await this.save(records.map(record => (wanted.has(record.id) ? { ...record, sent: true } : record)));
    });
  }

  async clearSent(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const records = await this.load();
      const kept = records.filter(record => !record.sent);
      await this.save(kept);
      return records.length - kept.length;
    });
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(() => this.save([]));
  }

  private async load(): Promise<SyncErrorRecord[]> {
    let raw: string | null;
    try {
      raw = await this.storage.getString(STORAGE_KEYS.SYNC_ERRORS);
    } catch (error) {
      throw new PersistenceError(`Failed to read error journal: ${errorMessage(error)}`, error);
    }
    if (raw === null || raw === '') return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn('Error journal is not valid JSON, starting a new one');
      return [];
    }
    const parsed = errorJournalSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('Error journal failed validation, starting a new one');
      return [];
    }
    return parsed.data;
  }

  private async save(records: readonly SyncErrorRecord[]): Promise<void> {
    try {
      await this.storage.setString(STORAGE_KEYS.SYNC_ERRORS, JSON.stringify(records));
    } catch (error) {
      throw new PersistenceError(`Failed to write error journal: ${errorMessage(error)}`, error);
    }
  }
}

export interface ErrorReportResult {
  sent: number;
  failed: number;
}

export interface SyncErrorReporterOptions {
  journal: SyncErrorJournal;
  transport: TransportAdapter;
  endpoint?: string;
  batchSize?: number;
  timeout?: number;
  logger?: Logger;
}

/**
 * Ships unsent journal records to the error endpoint in batches
 */
export class SyncErrorReporter {
  private readonly logger: Logger;
  private reporting = false;

  constructor(private readonly options: SyncErrorReporterOptions) {
    this.logger = options.logger ?? createLogger('SyncErrorReporter');
  }

  async reportPending(): Promise<ErrorReportResult> {
    const result: ErrorReportResult = { sent: 0, failed: 0 };
    if (this.reporting) return result;

    this.reporting = true;
    try {
      const unsent = await this.options.journal.listUnsent();
      const batches = chunk(unsent, this.options.batchSize ?? DEFAULT_SYNC_CONFIG.errorReporting.batchSize);

      for (const batch of batches) {
        const delivered = await this.sendBatch(batch);
        if (!delivered) {
          result.failed += batch.length;
          continue;
        }
        await this.options.journal.markSent(batch.map(record => record.id));
        result.sent += batch.length;
      }
    } finally {
      this.reporting = false;
    }

    if (result.sent > 0 || result.failed > 0) {
      this.logger.info(`Error report: ${result.sent} sent, ${result.failed} failed`);
    }
    return result;
  }

  private async sendBatch(batch: readonly SyncErrorRecord[]): Promise<boolean> {
    const body = {
      timestamp: new Date().toISOString(),
      errors: batch.map(record => ({
        id: record.id,
        message: record.message,
        code: record.code,
        category: record.category,
        entityType: record.entityType,
        entityId: record.entityId,
        metadata: record.metadata,
        timestamp: new Date(record.timestamp).toISOString(),
      })),
    };

    try {
      const response = await this.options.transport.post(
        this.options.endpoint ?? DEFAULT_SYNC_CONFIG.endpoints.errors,
        body,
        { timeout: this.options.timeout ?? DEFAULT_SYNC_CONFIG.timeouts.upload }
      );
      if (classifyStatus(response.status) === 'ok') return true;
      this.logger.warn(`Error report rejected with ${response.status}`);
      return false;
    } catch (error) {
      this.logger.warn(`Error report failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
