/**
 * Runs download strategies and keeps their incremental checkpoints
 */

import type { DownloadStrategy, EntityRemover, StorageAdapter } from './interfaces';
import type { DownloadResult, RefreshResult, StrategyOutcome, Timestamp } from './types';
import { ERROR_CODE, SYNC_EVENT } from './enums';
import { DEFAULT_SYNC_CONFIG, STORAGE_KEYS } from './config';
import { PersistenceError, SyncError, errorMessage } from './errors';
import { SyncEventEmitter } from './event-emitter';
import { createLogger, type Logger } from './logger';
import { now, withTimeout } from './utils';

export function downloadSuccess(
  itemsDownloaded: number,
  options: {
    message?: string;
    isIncremental?: boolean;
    deletedEntities?: Record<string, readonly string[]>;
    metadata?: Record<string, unknown>;
  } = {}
): DownloadResult {
  const result: DownloadResult = {
    success: true,
    message: options.message ?? `Downloaded ${itemsDownloaded} item(s)`,
    itemsDownloaded,
    isIncremental: options.isIncremental ?? false,
  };
  if (options.deletedEntities) result.deletedEntities = options.deletedEntities;
  if (options.metadata) result.metadata = options.metadata;
  return result;
}

export function downloadFailure(message: string, metadata?: Record<string, unknown>): DownloadResult {
  const result: DownloadResult = { success: false, message, itemsDownloaded: 0, isIncremental: false };
  if (metadata) result.metadata = metadata;
  return result;
}

export interface DownloadCoordinatorOptions {
  storage: StorageAdapter;
  entityRemover?: EntityRemover;
  emitter?: SyncEventEmitter;
  logger?: Logger;
  downloadTimeout?: number;
  /** Older checkpoints are ignored and a full download runs */
  maxIncrementalSyncAge?: number;
}

export class DownloadCoordinator {
  private readonly emitter: SyncEventEmitter;
  private readonly logger: Logger;
  private readonly downloadTimeout: number;
  private readonly maxIncrementalSyncAge: number;

  constructor(private readonly options: DownloadCoordinatorOptions) {
    this.emitter = options.emitter ?? new SyncEventEmitter();
    this.logger = options.logger ?? createLogger('DownloadCoordinator');
    this.downloadTimeout = options.downloadTimeout ?? DEFAULT_SYNC_CONFIG.timeouts.download;
    this.maxIncrementalSyncAge = options.maxIncrementalSyncAge ?? DEFAULT_SYNC_CONFIG.maxIncrementalSyncAge;
  }

  /**
   * Run every strategy in order. A failing strategy never stops the others
   * and never advances its own checkpoint.
   */
  async refresh(strategies: readonly DownloadStrategy[]): Promise<RefreshResult> {
    const outcomes: StrategyOutcome[] = [];
    for (const strategy of strategies) {
      const outcome = await this.runStrategy(strategy);
      outcomes.push(outcome);
      this.emitter.emit(outcome.success ? SYNC_EVENT.DOWNLOAD_COMPLETED : SYNC_EVENT.DOWNLOAD_FAILED, outcome);
    }
    return { success: outcomes.every(outcome => outcome.success), outcomes };
  }

  async getCheckpoint(name: string): Promise<Timestamp | undefined> {
    let raw: string | null;
    try {
      raw = await this.options.storage.getString(checkpointKey(name));
    } catch (error) {
      throw new PersistenceError(`Failed to read checkpoint for ${name}: ${errorMessage(error)}`, error);
    }
    if (raw === null) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.logger.warn(`Ignoring unreadable checkpoint for ${name}`, raw);
      return undefined;
    }
    return value;
  }

  async clearCheckpoints(names: readonly string[]): Promise<void> {
    for (const name of names) {
      await this.options.storage.remove(checkpointKey(name));
    }
  }

  private async runStrategy(strategy: DownloadStrategy): Promise<StrategyOutcome> {
    const startedAt = now();
    const base: StrategyOutcome = {
      strategy: strategy.name,
      success: false,
      message: '',
      itemsDownloaded: 0,
      isIncremental: false,
      checkpointAdvanced: false,
      deletionsApplied: 0,
    };

    try {
      const checkpoint = await this.getCheckpoint(strategy.name);
      const since = checkpoint !== undefined && startedAt - checkpoint <= this.maxIncrementalSyncAge ? checkpoint : undefined;
      if (checkpoint !== undefined && since === undefined) {
        this.logger.info(`Checkpoint for ${strategy.name} is too old, running full download`);
      }

      const result = await withTimeout(() => strategy.downloadData(since), this.downloadTimeout, `${strategy.name} download`);
      const outcome: StrategyOutcome = {
        ...base,
        message: result.message,
        itemsDownloaded: result.itemsDownloaded,
        isIncremental: result.isIncremental,
      };

      if (!result.success) {
        this.logger.warn(`Download ${strategy.name} failed: ${result.message}`);
        return { ...outcome, error: result.message };
      }

      outcome.deletionsApplied = await this.applyDeletions(result.deletedEntities);

      try {
        await this.options.storage.setString(checkpointKey(strategy.name), String(startedAt));
      } catch (error) {
        throw new PersistenceError(`Failed to save checkpoint for ${strategy.name}: ${errorMessage(error)}`, error);
      }

      this.logger.info(`Download ${strategy.name}: ${result.itemsDownloaded} item(s)`);
      return { ...outcome, success: true, checkpointAdvanced: true };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Download ${strategy.name} failed`, error);
      return { ...base, message, error: message };
    }
  }

  private async applyDeletions(deleted: DownloadResult['deletedEntities']): Promise<number> {
    if (!deleted) return 0;
    const groups = Object.entries(deleted).filter(([, ids]) => ids.length > 0);
    if (groups.length === 0) return 0;

    const remover = this.options.entityRemover;
    if (!remover) {
      throw new SyncError('Server reported deletions but no entity remover is configured', ERROR_CODE.DOWNLOAD_FAILED);
    }

    let applied = 0;
    for (const [entityType, ids] of groups) {
      await remover.removeEntities(entityType, ids);
      applied += ids.length;
    }
    return applied;
  }
}

function checkpointKey(name: string): string {
  return `${STORAGE_KEYS.CHECKPOINT_PREFIX}${name}`;
}
