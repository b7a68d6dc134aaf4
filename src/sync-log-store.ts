/**
 * Durable, ordered log of mutations awaiting upload
 */

import { z } from 'zod';
import type { StorageAdapter } from './interfaces';
import type { LogStatistics, MutationInput, SyncLogEntry, SyncLogId, Timestamp } from './types';
import { SYNC_OPERATION } from './enums';
import { STORAGE_KEYS } from './config';
import { InvalidPayloadError, PersistenceError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { Mutex, generateId, now } from './utils';
import { RetryPolicy } from './retry-policy';

const syncLogEntrySchema = z.object({
  id: z.string().min(1),
  entityType: z.string(),
  entityId: z.string(),
  operation: z.nativeEnum(SYNC_OPERATION),
  payload: z.string(),
  isFile: z.boolean(),
  synced: z.boolean(),
  retryCount: z.number().int().nonnegative(),
  rejected: z.boolean().default(false),
  lastError: z.string().optional(),
  createdAt: z.number(),
  lastAttemptAt: z.number().optional(),
  syncedAt: z.number().optional(),
});

const syncLogSchema = z.array(syncLogEntrySchema);

/**
 * Build a new pending entry. Throws InvalidPayloadError when data cannot be serialized.
 */
export function createSyncLogEntry(input: MutationInput, createdAt: Timestamp = now()): SyncLogEntry {
  let payload: string;
  try {
    payload = JSON.stringify(input.data);
  } catch (error) {
    throw new InvalidPayloadError(`Payload for ${input.entityType}/${input.entityId} is not serializable`, error);
  }
  if (typeof payload !== 'string') {
    throw new InvalidPayloadError(`Payload for ${input.entityType}/${input.entityId} is not serializable`);
  }

  return {
    id: generateId(),
    entityType: input.entityType,
    entityId: input.entityId,
    operation: input.operation,
    payload,
    isFile: input.isFile ?? false,
    synced: false,
    retryCount: 0,
    rejected: false,
    createdAt,
  };
}

export class SyncLogStore {
  private readonly lock = new Mutex();
  private readonly logger: Logger;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly policy: RetryPolicy = new RetryPolicy(),
    logger: Logger = createLogger('SyncLogStore')
  ) {
    this.logger = logger;
  }

  async append(entry: SyncLogEntry): Promise<SyncLogEntry> {
    await this.appendMany([entry]);
    return entry;
  }

  /**
   * Persist several entries in one write; all or none
   */
  async appendMany(entries: readonly SyncLogEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.mutate(log => {
      const existing = new Set(log.map(entry => entry.id));
      for (const entry of entries) {
        if (existing.has(entry.id)) {
          throw new PersistenceError(`Sync log already contains entry ${entry.id}`);
        }
        existing.add(entry.id);
      }
      return { log: [...log, ...entries], result: undefined };
    });
    this.logger.debug(`Appended ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`);
  }

  /**
   * Unsynced entries, oldest first; ties keep insertion order
   */
  async listPending(): Promise<SyncLogEntry[]> {
    const log = await this.read();
    return log.filter(entry => !entry.synced).sort((a, b) => a.createdAt - b.createdAt);
  }

  async listAll(): Promise<SyncLogEntry[]> {
    return this.read();
  }

  async listFailed(): Promise<SyncLogEntry[]> {
    const pending = await this.listPending();
    return pending.filter(entry => entry.retryCount > 0);
  }

  async get(id: SyncLogId): Promise<SyncLogEntry | undefined> {
    const log = await this.read();
    return log.find(entry => entry.id === id);
  }

  async countPending(): Promise<number> {
    const log = await this.read();
    return log.filter(entry => !entry.synced).length;
  }

  /**
   * Idempotent; resolves whether anything changed
   */
  async markSynced(id: SyncLogId, at: Timestamp = now()): Promise<boolean> {
    const changed = await this.markSyncedMany([id], at);
    return changed > 0;
  }

  async markSyncedMany(ids: readonly SyncLogId[], at: Timestamp = now()): Promise<number> {
    if (ids.length === 0) return 0;
    const wanted = new Set(ids);
    return this.mutate(log => {
      let changed = 0;
      const next = log.map(entry => {
        if (!wanted.has(entry.id) || entry.synced) return entry;
        changed++;
        return { ...entry, synced: true, syncedAt: at };
      });
      return { log: changed > 0 ? next : undefined, result: changed };
    });
  }

  async incrementRetry(id: SyncLogId, error: string, at: Timestamp = now()): Promise<SyncLogEntry | undefined> {
    return this.recordAttempt(id, error, at, false);
  }

  async markRejected(id: SyncLogId, error: string, at: Timestamp = now()): Promise<SyncLogEntry | undefined> {
    return this.recordAttempt(id, error, at, true);
  }

  /**
   * Retention sweep; pending entries are never removed here
   */
  async purgeSyncedOlderThan(cutoff: Timestamp): Promise<number> {
    return this.removeWhere(entry => entry.synced && (entry.syncedAt ?? entry.createdAt) < cutoff);
  }

  /**
   * Operator sweep of dead pending entries: rejected or out of attempts, created before cutoff
   */
  async purgeStalePending(cutoff: Timestamp): Promise<number> {
    return this.removeWhere(
      entry => !entry.synced && entry.createdAt < cutoff && (entry.rejected || this.policy.isExhausted(entry))
    );
  }

  async remove(id: SyncLogId): Promise<boolean> {
    const removed = await this.removeWhere(entry => entry.id === id);
    return removed > 0;
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.write([]);
    });
  }

  async getStatistics(): Promise<LogStatistics> {
    const log = await this.read();
    const stats: LogStatistics = { total: log.length, pending: 0, synced: 0, failed: 0, exhausted: 0, rejected: 0, files: 0 };
    for (const entry of log) {
      if (entry.synced) {
        stats.synced++;
        continue;
      }
      stats.pending++;
      if (entry.retryCount > 0) stats.failed++;
      if (entry.rejected) stats.rejected++;
      else if (this.policy.isExhausted(entry)) stats.exhausted++;
      if (entry.isFile) stats.files++;
    }
    return stats;
  }

  private async recordAttempt(
    id: SyncLogId,
    error: string,
    at: Timestamp,
    rejected: boolean
  ): Promise<SyncLogEntry | undefined> {
    return this.mutate<SyncLogEntry | undefined>(log => {
      const index = log.findIndex(entry => entry.id === id && !entry.synced);
      const entry = log[index];
      if (!entry) return { log: undefined, result: undefined };
      const updated: SyncLogEntry = {
        ...entry,
        retryCount: entry.retryCount + 1,
        lastAttemptAt: at,
        lastError: error,
        rejected: entry.rejected || rejected,
      };
      const next = [...log];
      next[index] = updated;
      return { log: next, result: updated };
    });
  }

  private async removeWhere(predicate: (entry: SyncLogEntry) => boolean): Promise<number> {
    return this.mutate(log => {
      const kept = log.filter(entry => !predicate(entry));
      const removed = log.length - kept.length;
      return { log: removed > 0 ? kept : undefined, result: removed };
    });
  }

  /**
   * Read-modify-write under the lock; an undefined log skips the write
   */
  private async mutate<R>(
    update: (log: SyncLogEntry[]) => { log: SyncLogEntry[] | undefined; result: R }
  ): Promise<R> {
    return this.lock.runExclusive(async () => {
      const current = await this.load();
      const { log, result } = update(current);
      if (log) await this.write(log);
      return result;
    });
  }

  private async read(): Promise<SyncLogEntry[]> {
    return this.lock.runExclusive(() => this.load());
  }

  private async load(): Promise<SyncLogEntry[]> {
    let raw: string | null;
    try {
      raw = await this.storage.getString(STORAGE_KEYS.SYNC_LOGS);
    } catch (error) {
      throw new PersistenceError(`Failed to read sync log: ${errorMessage(error)}`, error);
    }
    if (raw === null || raw === '') return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError('Sync log is not valid JSON', error);
    }

    const parsed = syncLogSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(`Sync log failed validation: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, parsed.error);
    }
    return parsed.data;
  }

  private async write(log: readonly SyncLogEntry[]): Promise<void> {
    try {
      await this.storage.setString(STORAGE_KEYS.SYNC_LOGS, JSON.stringify(log));
    } catch (error) {
      this.logger.error('Failed to write sync log', error);
      throw new PersistenceError(`Failed to write sync log: ${errorMessage(error)}`, error);
    }
  }
}
