/**
 * Main SyncEngine class that wires the log, dispatcher, scheduler and
 * download coordinator together and exposes the public API
 */

import type {
  DownloadStrategy,
  MutationLogger,
  SyncEventListener,
  SyncEvents,
} from './interfaces';
import type {
  BatchMutationInput,
  ConnectivityStatus,
  CycleReport,
  DispatchResult,
  LogStatistics,
  MutationInput,
  MutationReceipt,
  RefreshResult,
  SyncErrorRecord,
  SyncLogEntry,
  SyncStatusSnapshot,
  Timestamp,
} from './types';
import { CONNECTIVITY_TRANSPORT, CYCLE_OUTCOME, SYNC_EVENT, SYNC_OPERATION, SYNC_STATUS, SYNC_TRIGGER } from './enums';
import { STORAGE_KEYS, resolveConfig, type ResolvedSyncConfig, type SyncEngineConfig } from './config';
import { ConfigurationError, NotInitializedError, RecoveryExhausted, errorMessage } from './errors';
import { SyncEventEmitter } from './event-emitter';
import { createLogger, type Logger } from './logger';
import { RetryPolicy } from './retry-policy';
import { SyncLogStore, createSyncLogEntry } from './sync-log-store';
import { SyncStatusMachine } from './status-machine';
import { BatchDispatcher } from './batch-dispatcher';
import { DownloadCoordinator } from './download-coordinator';
import { SyncScheduler } from './scheduler';
import { SyncErrorJournal, SyncErrorReporter, type ErrorReportResult } from './error-journal';
import { Mutex, now } from './utils';

interface EngineComponents {
  config: ResolvedSyncConfig;
  logger: Logger;
  policy: RetryPolicy;
  store: SyncLogStore;
  machine: SyncStatusMachine;
  dispatcher: BatchDispatcher;
  coordinator: DownloadCoordinator;
  scheduler: SyncScheduler<CycleReport>;
  journal: SyncErrorJournal;
  reporter: SyncErrorReporter;
}

type MutationFields = Omit<MutationInput, 'operation'>;

const INITIAL_SNAPSHOT: SyncStatusSnapshot = Object.freeze({ status: SYNC_STATUS.IDLE, pendingCount: 0 });

/**
 * Offline-first sync engine.
 *
 * @example
 * ```typescript
 * const engine = new SyncEngine();
 * await engine.initialize({ storage, transport, connectivity }, [ordersStrategy]);
 * await engine.logCreate({ entityType: 'order', entityId: 'o-1', data: { total: 10 } });
 * engine.onStatusChange(snapshot => render(snapshot));
 * ```
 */
export class SyncEngine implements MutationLogger {
  private readonly emitter: SyncEventEmitter;
  private readonly logLock = new Mutex();
  private components: EngineComponents | undefined;
  private strategies: DownloadStrategy[] = [];

  // Entries whose append failed; flushed ahead of new appends and at cycle start
  private buffered: SyncLogEntry[] = [];

  // State
  private connected = true;
  private offlineMode = false;
  private stopRequested = false;
  private inFlight: Promise<CycleReport> | undefined;
  // Scheduled trigger that arrived during a cycle; runs once after it
  private rerun: SYNC_TRIGGER | undefined;
  private unsubscribeConnectivity: (() => void) | undefined;

  constructor(logger: Logger = createLogger('SyncEngine')) {
    this.emitter = new SyncEventEmitter(logger.child('events'));
  }

  get isInitialized(): boolean {
    return this.components !== undefined;
  }

  /**
   * Validate configuration, wire components, take the connectivity
   * baseline and start foreground (and, if allowed, background) sync
   */
  async initialize(config: SyncEngineConfig, strategies: readonly DownloadStrategy[] = []): Promise<void> {
    if (this.components) {
      throw new ConfigurationError('SyncEngine is already initialized');
    }

    const resolved = resolveConfig(config);
    const seen = new Set<string>();
    for (const strategy of strategies) {
      if (seen.has(strategy.name)) {
        throw new ConfigurationError(`Duplicate download strategy name: ${strategy.name}`);
      }
      seen.add(strategy.name);
    }

    const logger = resolved.logger;
    const policy = new RetryPolicy(resolved.retry);
    const store = new SyncLogStore(resolved.storage, policy, logger.child('SyncLogStore'));
    const journal = new SyncErrorJournal(
      resolved.storage,
      resolved.errorReporting.maxRecords,
      logger.child('SyncErrorJournal')
    );

    const components: EngineComponents = {
      config: resolved,
      logger: logger.child('SyncEngine'),
      policy,
      store,
      machine: new SyncStatusMachine(this.emitter, policy, logger.child('SyncStatusMachine')),
      dispatcher: new BatchDispatcher({
        store,
        transport: resolved.transport,
        policy,
        emitter: this.emitter,
        logger: logger.child('BatchDispatcher'),
        maxDataBatchSize: resolved.maxDataBatchSize,
        maxFileBatchSize: resolved.maxFileBatchSize,
        dataEndpoint: resolved.endpoints.data,
        filesEndpoint: resolved.endpoints.files,
        uploadTimeout: resolved.timeouts.upload,
        fileUploadTimeout: resolved.timeouts.fileUpload,
      }),
      coordinator: new DownloadCoordinator({
        storage: resolved.storage,
        ...(resolved.entityRemover ? { entityRemover: resolved.entityRemover } : {}),
        emitter: this.emitter,
        logger: logger.child('DownloadCoordinator'),
        downloadTimeout: resolved.timeouts.download,
        maxIncrementalSyncAge: resolved.maxIncrementalSyncAge,
      }),
      scheduler: new SyncScheduler<CycleReport>({
        runCycle: trigger => this.runCycle(trigger),
        ...(resolved.backgroundRunner ? { backgroundRunner: resolved.backgroundRunner } : {}),
        logger: logger.child('SyncScheduler'),
        syncInterval: resolved.syncInterval,
        initialSyncDelay: resolved.initialSyncDelay,
        backgroundSyncInterval: resolved.backgroundSyncInterval,
        backgroundMinSpacing: resolved.backgroundMinSpacing,
        connectivityDebounce: resolved.connectivityDebounce,
      }),
      journal,
      reporter: new SyncErrorReporter({
        journal,
        transport: resolved.transport,
        endpoint: resolved.endpoints.errors,
        batchSize: resolved.errorReporting.batchSize,
        timeout: resolved.timeouts.upload,
        logger: logger.child('SyncErrorReporter'),
      }),
    };

    this.components = components;
    this.strategies = [...strategies];
    this.stopRequested = false;

    await this.flushBufferSafely();
    await this.refreshPendingCount();

    let baseline: ConnectivityStatus;
    try {
      baseline = await resolved.connectivity.getStatus();
    } catch (error) {
      components.logger.warn(`Connectivity check failed, assuming online: ${errorMessage(error)}`);
      baseline = { connected: true, transport: CONNECTIVITY_TRANSPORT.UNKNOWN };
    }
    this.applyConnectivity(baseline, true);
    this.unsubscribeConnectivity = resolved.connectivity.onChange(status => {
      this.applyConnectivity(status, false);
    });

    if (resolved.autoStart) {
      components.scheduler.startSync();
    }
    if (resolved.enableBackgroundSync && (await this.isBackgroundSyncEnabled())) {
      await components.scheduler.startBackgroundSync();
    }

    components.logger.info(`Initialized with ${strategies.length} download strateg${strategies.length === 1 ? 'y' : 'ies'}`);
  }

  /**
   * Stop timers, let the in-flight cycle finish its current batch, release collaborators
   */
  async shutdown(): Promise<void> {
    const components = this.components;
    if (!components) return;

    this.stopRequested = true;
    try {
      await components.scheduler.dispose();
    } catch (error) {
      components.logger.warn(`Failed to cancel background sync: ${errorMessage(error)}`);
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    this.unsubscribeConnectivity?.();
    this.unsubscribeConnectivity = undefined;

    await this.flushBufferSafely();
    if (this.buffered.length > 0) {
      components.logger.warn(`${this.buffered.length} buffered entr${this.buffered.length === 1 ? 'y' : 'ies'} could not be persisted before shutdown`);
    }

    try {
      await components.config.connectivity.close?.();
      await components.config.storage.close?.();
    } catch (error) {
      components.logger.warn(`Failed to close collaborators: ${errorMessage(error)}`);
    }

    this.emitter.removeAllListeners();
    this.components = undefined;
    components.logger.info('Shut down');
  }

  // Mutation logging

  logCreate(input: MutationFields): Promise<MutationReceipt> {
    return this.logMutation({ ...input, operation: SYNC_OPERATION.CREATE });
  }

  logUpdate(input: MutationFields): Promise<MutationReceipt> {
    return this.logMutation({ ...input, operation: SYNC_OPERATION.UPDATE });
  }

  logDelete(input: Omit<MutationFields, 'data'> & { data?: MutationInput['data'] }): Promise<MutationReceipt> {
    return this.logMutation({ ...input, data: input.data ?? {}, operation: SYNC_OPERATION.DELETE });
  }

  logCustomOperation(input: MutationInput): Promise<MutationReceipt> {
    return this.logMutation(input);
  }

  /**
   * Several mutations of one entity type, persisted in a single write
   */
  async logBatch(input: BatchMutationInput): Promise<MutationReceipt[]> {
    const receipts: Array<MutationReceipt | undefined> = [];
    const entries: SyncLogEntry[] = [];
    const positions: number[] = [];

    for (const item of input.items) {
      const built = this.buildEntry({
        entityType: input.entityType,
        entityId: item.entityId,
        operation: input.operation,
        data: item.data,
        isFile: input.isFile ?? false,
      });
      if ('error' in built) {
        receipts.push({ queued: false, persisted: false, error: built.error });
      } else {
        positions.push(receipts.length);
        receipts.push(undefined);
        entries.push(built.entry);
      }
    }

    const stored = await this.persistEntries(entries);
    positions.forEach((position, index) => {
      receipts[position] = stored[index];
    });
    return receipts.map(receipt => receipt ?? { queued: false, persisted: false, error: 'Not recorded' });
  }

  // Sync control

  startSync(): void {
    const { scheduler } = this.require('startSync');
    this.stopRequested = false;
    scheduler.startSync();
  }

  /**
   * Prevent new cycles; a running cycle ends after its current batch
   */
  stopSync(): void {
    const { scheduler, machine } = this.require('stopSync');
    scheduler.stopSync();
    if (this.inFlight) {
      this.stopRequested = true;
      return;
    }
    if (!machine.isOffline) {
      machine.transition(SYNC_STATUS.IDLE, { message: 'Synchronization paused' });
    }
  }

  async startBackgroundSync(): Promise<void> {
    const { config, scheduler } = this.require('startBackgroundSync');
    await config.storage.setBoolean(STORAGE_KEYS.BACKGROUND_SYNC_ENABLED, true);
    await scheduler.startBackgroundSync();
  }

  async stopBackgroundSync(): Promise<void> {
    const { config, scheduler } = this.require('stopBackgroundSync');
    await config.storage.setBoolean(STORAGE_KEYS.BACKGROUND_SYNC_ENABLED, false);
    await scheduler.stopBackgroundSync();
  }

  async isBackgroundSyncEnabled(): Promise<boolean> {
    const { config, logger } = this.require('isBackgroundSyncEnabled');
    try {
      const stored = await config.storage.getBoolean(STORAGE_KEYS.BACKGROUND_SYNC_ENABLED);
      return stored ?? true;
    } catch (error) {
      logger.warn(`Failed to read background sync preference: ${errorMessage(error)}`);
      return true;
    }
  }

  /**
   * Run a cycle now; resolves with a skipped report when one is already running
   */
  forceSync(): Promise<CycleReport> {
    const { scheduler } = this.require('forceSync');
    return scheduler.forceSync();
  }

  /**
   * Run the download strategies outside a cycle, after any in-flight cycle
   */
  async refreshDownloads(): Promise<RefreshResult> {
    const { coordinator } = this.require('refreshDownloads');
    if (this.inFlight) await this.inFlight;
    return coordinator.refresh(this.strategies);
  }

  // Observation

  getStatus(): SyncStatusSnapshot {
    return this.components?.machine.current ?? INITIAL_SNAPSHOT;
  }

  onStatusChange(listener: (snapshot: SyncStatusSnapshot) => unknown): () => void {
    return this.emitter.on(SYNC_EVENT.STATUS_CHANGED, listener);
  }

  on<K extends keyof SyncEvents>(event: K, listener: SyncEventListener<K>): () => void {
    return this.emitter.on(event, listener);
  }

  off<K extends keyof SyncEvents>(event: K, listener: SyncEventListener<K>): void {
    this.emitter.off(event, listener);
  }

  async getPendingCount(): Promise<number> {
    const { store } = this.require('getPendingCount');
    return (await store.countPending()) + this.buffered.length;
  }

  async getPendingEntries(): Promise<SyncLogEntry[]> {
    const { store } = this.require('getPendingEntries');
    return [...(await store.listPending()), ...this.buffered];
  }

  async getStatistics(): Promise<LogStatistics> {
    const { store } = this.require('getStatistics');
    const stats = await store.getStatistics();
    const bufferedFiles = this.buffered.filter(entry => entry.isFile).length;
    return {
      ...stats,
      total: stats.total + this.buffered.length,
      pending: stats.pending + this.buffered.length,
      files: stats.files + bufferedFiles,
    };
  }

  async getErrorRecords(): Promise<SyncErrorRecord[]> {
    return this.require('getErrorRecords').journal.list();
  }

  // Maintenance

  /**
   * Stop attempting cycles until exitOfflineMode(); mutations keep being logged
   */
  enterOfflineMode(): void {
    const { machine, scheduler, logger } = this.require('enterOfflineMode');
    this.offlineMode = true;
    scheduler.cancel('retry');
    machine.connectivityLost('Offline mode enabled');
    machine.markDegraded('Working offline');
    logger.info('Offline mode enabled');
  }

  exitOfflineMode(): void {
    const { machine, logger } = this.require('exitOfflineMode');
    this.offlineMode = false;
    if (this.connected) {
      machine.connectivityRestored('Offline mode disabled');
    }
    logger.info('Offline mode disabled');
  }

  canContinueWithoutSync(): boolean {
    return true;
  }

  /**
   * Drop rejected or exhausted entries older than the offline retention window
   */
  async clearStaleEntries(): Promise<number> {
    const { store, config, logger } = this.require('clearStaleEntries');
    const removed = await store.purgeStalePending(now() - config.offlineRetention);
    if (removed > 0) logger.info(`Cleared ${removed} stale entr${removed === 1 ? 'y' : 'ies'}`);
    await this.refreshPendingCount();
    return removed;
  }

  /**
   * Forget every entry, error record and checkpoint and return to idle
   */
  async resetSyncState(): Promise<void> {
    const { store, journal, coordinator, machine, scheduler, logger } = this.require('resetSyncState');
    const wasActive = scheduler.isForegroundActive;

    scheduler.stopSync();
    if (this.inFlight) {
      this.stopRequested = true;
      await this.inFlight;
    }

    await this.logLock.runExclusive(async () => {
      this.buffered = [];
      await store.clear();
    });
    await journal.clear();
    await coordinator.clearCheckpoints(this.strategies.map(strategy => strategy.name));

    machine.reset('Sync state reset', 0);
    if (!this.connected || this.offlineMode) {
      machine.connectivityLost();
    }
    if (wasActive) {
      this.startSync();
    }
    logger.info('Sync state reset');
  }

  async reportErrors(): Promise<ErrorReportResult> {
    return this.require('reportErrors').reporter.reportPending();
  }

  // Cycle

  private runCycle(trigger: SYNC_TRIGGER): Promise<CycleReport> {
    const components = this.components;
    if (!components) {
      return Promise.reject(new NotInitializedError('runCycle'));
    }
    if (this.inFlight) {
      if (RERUN_TRIGGERS.has(trigger)) {
        this.rerun = trigger;
        return Promise.resolve(this.skip(components, trigger, now(), 'Queued behind the cycle in progress'));
      }
      return Promise.resolve(this.skip(components, trigger, now(), 'A sync cycle is already in progress'));
    }
    const cycle = this.executeCycle(components, trigger).finally(() => {
      this.inFlight = undefined;
      this.runQueued(components);
    });
    this.inFlight = cycle;
    return cycle;
  }

  private runQueued(components: EngineComponents): void {
    const trigger = this.rerun;
    this.rerun = undefined;
    if (trigger === undefined || this.stopRequested || this.components !== components) return;
    if (!components.scheduler.isForegroundActive) return;
    components.logger.debug(`Running queued ${trigger} cycle`);
    void this.runCycle(trigger).catch((error: unknown) => {
      components.logger.error(`Queued ${trigger} cycle failed`, error);
    });
  }

  private async executeCycle(components: EngineComponents, trigger: SYNC_TRIGGER): Promise<CycleReport> {
    const { machine, dispatcher, coordinator, scheduler, logger, config } = components;
    const startedAt = now();

    if (this.offlineMode && trigger !== SYNC_TRIGGER.MANUAL) {
      return this.skip(components, trigger, startedAt, 'Offline mode is enabled');
    }
    if (!this.connected) return this.skip(components, trigger, startedAt, 'No network connection');
    if (machine.status === SYNC_STATUS.RECOVERY && trigger !== SYNC_TRIGGER.RECOVERY && trigger !== SYNC_TRIGGER.MANUAL) {
      return this.skip(components, trigger, startedAt, 'Waiting for recovery attempt');
    }
    if (config.isAuthenticated && !(await this.checkAuthenticated(components))) {
      machine.transition(SYNC_STATUS.IDLE, { message: 'Authentication required' });
      return this.skip(components, trigger, startedAt, 'Not authenticated');
    }

    this.stopRequested = false;
    if (this.offlineMode) {
      machine.transition(SYNC_STATUS.IDLE, { message: 'Manual sync while offline mode is enabled' });
    }
    if (!machine.beginCycle()) {
      return this.skip(components, trigger, startedAt, `Cannot start a cycle from ${machine.status}`);
    }

    scheduler.cancel('retry');
    if (trigger === SYNC_TRIGGER.RECOVERY || trigger === SYNC_TRIGGER.MANUAL) {
      scheduler.cancel('recovery');
    }
    this.emitter.emit(SYNC_EVENT.CYCLE_STARTED, { trigger });
    logger.debug(`Cycle started (${trigger})`);

    let dispatch: DispatchResult | undefined;
    let downloads: RefreshResult | undefined;
    let outcome: CYCLE_OUTCOME;

    try {
      await this.flushBufferSafely();

      dispatch = await dispatcher.runCycle({
        includeExhausted: trigger === SYNC_TRIGGER.RECOVERY,
        shouldContinue: () => this.mayContinue(trigger),
      });
      outcome = dispatch.outcome;

      const uploadsFinished = outcome === CYCLE_OUTCOME.COMPLETED || outcome === CYCLE_OUTCOME.PARTIAL;
      if (uploadsFinished && this.mayContinue(trigger) && this.strategies.length > 0) {
        downloads = await coordinator.refresh(this.strategies);
        if (!downloads.success && outcome === CYCLE_OUTCOME.COMPLETED) {
          outcome = CYCLE_OUTCOME.PARTIAL;
        }
      }

      await this.journalCycle(components, dispatch, downloads);

      const pending = await this.countPending(components);
      if (outcome === CYCLE_OUTCOME.STOPPED || outcome === CYCLE_OUTCOME.SKIPPED) {
        if (machine.isOffline) machine.updatePendingCount(pending);
        else machine.transition(SYNC_STATUS.IDLE, { message: 'Synchronization paused', pendingCount: pending });
      } else if (outcome === CYCLE_OUTCOME.COMPLETED) {
        machine.recordSuccess(pending);
        await this.purgeSynced(components);
      } else {
        await this.handleFailure(components, describeFailure(dispatch, downloads), pending);
      }
    } catch (error) {
      // Dispatcher and coordinator report their own failures; this is a last resort
      outcome = CYCLE_OUTCOME.ABORTED;
      logger.error('Sync cycle failed unexpectedly', error);
      await this.handleFailure(components, errorMessage(error), machine.current.pendingCount);
    }

    if (this.offlineMode) {
      machine.connectivityLost('Offline mode enabled');
      machine.markDegraded('Working offline');
    }

    const report: CycleReport = {
      trigger,
      outcome,
      startedAt,
      finishedAt: now(),
      status: machine.status,
      ...(dispatch ? { dispatch } : {}),
      ...(downloads ? { downloads } : {}),
    };
    logger.info(`Cycle ${outcome} (${trigger}): ${dispatch?.synced ?? 0} synced, ${dispatch?.failed ?? 0} failed, ${dispatch?.rejected ?? 0} rejected`);
    this.emitter.emit(SYNC_EVENT.CYCLE_COMPLETED, report);
    return report;
  }

  /**
   * Checked between batches: a stop request, a lost connection or offline
   * mode (outside a manual cycle) ends the cycle after the current batch
   */
  private mayContinue(trigger: SYNC_TRIGGER): boolean {
    if (this.stopRequested || !this.connected) return false;
    return !this.offlineMode || trigger === SYNC_TRIGGER.MANUAL;
  }

  private async handleFailure(components: EngineComponents, message: string, pending: number): Promise<void> {
    const { machine, scheduler, policy, config, journal, reporter, logger } = components;
    const status = machine.recordFailure(message, pending);

    if (status === SYNC_STATUS.RECOVERY) {
      const retryAt: Timestamp = now() + config.recoveryTimeout;
      scheduler.scheduleRecovery(config.recoveryTimeout);
      this.emitter.emit(SYNC_EVENT.RECOVERY_ENTERED, { consecutiveFailures: machine.failureCount, retryAt });
      try {
        await journal.recordError(new RecoveryExhausted(machine.failureCount), 'recovery');
      } catch (error) {
        logger.warn(`Failed to journal recovery entry: ${errorMessage(error)}`);
      }
    } else if (status === SYNC_STATUS.ERROR) {
      scheduler.scheduleRetry(policy.delayFor(machine.failureCount));
    }

    if (config.errorReporting.enabled && machine.failureCount >= policy.config.maxAttempts) {
      try {
        await reporter.reportPending();
      } catch (error) {
        logger.warn(`Error reporting failed: ${errorMessage(error)}`);
      }
    }
  }

  private async journalCycle(
    components: EngineComponents,
    dispatch: DispatchResult | undefined,
    downloads: RefreshResult | undefined
  ): Promise<void> {
    const { journal, logger } = components;
    try {
      if (dispatch?.error) {
        await journal.recordError(dispatch.error, 'upload');
      }
      for (const failure of dispatch?.failures ?? []) {
        if (!failure.rejected) continue;
        await journal.record({
          message: failure.error,
          category: 'rejection',
          entityType: failure.entityType,
          entityId: failure.entityId,
          metadata: { entryId: failure.entryId },
        });
      }
      for (const outcome of downloads?.outcomes ?? []) {
        if (outcome.success) continue;
        await journal.record({ message: outcome.message, category: 'download', metadata: { strategy: outcome.strategy } });
      }
    } catch (error) {
      logger.warn(`Failed to journal cycle errors: ${errorMessage(error)}`);
    }
  }

  private skip(components: EngineComponents, trigger: SYNC_TRIGGER, startedAt: Timestamp, reason: string): CycleReport {
    components.logger.debug(`Cycle skipped (${trigger}): ${reason}`);
    this.emitter.emit(SYNC_EVENT.CYCLE_SKIPPED, { trigger, reason });
    return {
      trigger,
      outcome: CYCLE_OUTCOME.SKIPPED,
      startedAt,
      finishedAt: now(),
      status: components.machine.status,
      reason,
    };
  }

  private async checkAuthenticated(components: EngineComponents): Promise<boolean> {
    const check = components.config.isAuthenticated;
    if (!check) return true;
    try {
      return await check();
    } catch (error) {
      components.logger.warn(`Authentication check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async purgeSynced(components: EngineComponents): Promise<void> {
    try {
      const removed = await components.store.purgeSyncedOlderThan(now() - components.config.syncedRetention);
      if (removed > 0) components.logger.debug(`Purged ${removed} synced entr${removed === 1 ? 'y' : 'ies'}`);
    } catch (error) {
      components.logger.warn(`Retention sweep failed: ${errorMessage(error)}`);
    }
  }

  // Connectivity

  private applyConnectivity(status: ConnectivityStatus, baseline: boolean): void {
    const components = this.components;
    if (!components) return;
    const { machine, scheduler, config, logger } = components;

    const wasConnected = this.connected;
    this.connected = status.connected;
    scheduler.handleConnectivity(status.connected);

    if (!status.connected && (baseline || wasConnected)) {
      logger.info('Connection lost');
      machine.connectivityLost();
      scheduler.cancel('retry');
      scheduler.scheduleOnce('degraded', config.degradedGracePeriod, () => {
        void this.checkDegraded(components);
      });
      this.emitter.emit(SYNC_EVENT.CONNECTION_OFFLINE, status);
      return;
    }

    if (status.connected && !wasConnected && !baseline) {
      logger.info('Connection restored');
      scheduler.cancel('degraded');
      if (!this.offlineMode) {
        machine.connectivityRestored();
      }
      this.emitter.emit(SYNC_EVENT.CONNECTION_ONLINE, status);
    }
  }

  private async checkDegraded(components: EngineComponents): Promise<void> {
    if (this.connected && !this.offlineMode) return;
    const pending = await this.countPending(components);
    if (pending > 0) {
      components.machine.markDegraded(`Working offline with ${pending} pending change(s)`);
    }
  }

  // Mutation log plumbing

  private async logMutation(input: MutationInput): Promise<MutationReceipt> {
    const built = this.buildEntry(input);
    if ('error' in built) {
      return { queued: false, persisted: false, error: built.error };
    }
    const [receipt] = await this.persistEntries([built.entry]);
    return receipt ?? { id: built.entry.id, queued: false, persisted: false, error: 'Not recorded' };
  }

  private buildEntry(input: MutationInput): { entry: SyncLogEntry } | { error: string } {
    if (input.entityType.trim() === '' || input.entityId.trim() === '') {
      return { error: 'entityType and entityId are required' };
    }
    try {
      return { entry: createSyncLogEntry(input) };
    } catch (error) {
      this.components?.logger.warn(`Mutation not recorded: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  /**
   * Append in order behind anything already buffered; on failure keep the
   * entries in memory so they reach the log on a later flush
   */
  private async persistEntries(entries: SyncLogEntry[]): Promise<MutationReceipt[]> {
    if (entries.length === 0) return [];

    const persisted = await this.logLock.runExclusive(async () => {
      const store = this.components?.store;
      if (store) {
        try {
          await this.flushBuffer(store);
          await store.appendMany(entries);
          return true;
        } catch (error) {
          this.components?.logger.warn(`Buffering ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}: ${errorMessage(error)}`);
        }
      }
      this.buffered.push(...entries);
      return false;
    });

    for (const entry of entries) {
      this.emitter.emit(SYNC_EVENT.MUTATION_LOGGED, { entry, persisted });
    }
    await this.refreshPendingCount();

    return entries.map(entry => ({ id: entry.id, queued: true, persisted }));
  }

  private async flushBuffer(store: SyncLogStore): Promise<void> {
    if (this.buffered.length === 0) return;
    const pending = [...this.buffered];
    await store.appendMany(pending);
    this.buffered = this.buffered.slice(pending.length);
    this.components?.logger.info(`Flushed ${pending.length} buffered entr${pending.length === 1 ? 'y' : 'ies'}`);
  }

  private async flushBufferSafely(): Promise<void> {
    const components = this.components;
    if (!components || this.buffered.length === 0) return;
    try {
      await this.logLock.runExclusive(() => this.flushBuffer(components.store));
    } catch (error) {
      components.logger.warn(`Buffered entries still not persisted: ${errorMessage(error)}`);
    }
  }

  private async countPending(components: EngineComponents): Promise<number> {
    try {
      return (await components.store.countPending()) + this.buffered.length;
    } catch (error) {
      components.logger.warn(`Failed to count pending entries: ${errorMessage(error)}`);
      return Math.max(components.machine.current.pendingCount, this.buffered.length);
    }
  }

  private async refreshPendingCount(): Promise<void> {
    const components = this.components;
    if (!components) return;
    components.machine.updatePendingCount(await this.countPending(components));
  }

  private require(operation: string): EngineComponents {
    if (!this.components) {
      throw new NotInitializedError(operation);
    }
    return this.components;
  }
}

const RERUN_TRIGGERS: ReadonlySet<SYNC_TRIGGER> = new Set([SYNC_TRIGGER.CONNECTIVITY, SYNC_TRIGGER.RETRY]);

function describeFailure(dispatch: DispatchResult | undefined, downloads: RefreshResult | undefined): string {
  if (dispatch?.error) return dispatch.error.message;
  const entryFailures = (dispatch?.failed ?? 0) + (dispatch?.rejected ?? 0);
  if (entryFailures > 0) return `${entryFailures} change(s) failed to sync`;
  const failedDownloads = downloads?.outcomes.filter(outcome => !outcome.success) ?? [];
  if (failedDownloads.length > 0) {
    return `Download failed: ${failedDownloads.map(outcome => outcome.strategy).join(', ')}`;
  }
  return 'Sync failed';
}
