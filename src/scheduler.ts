/**
 * Decides when sync cycles run: foreground interval, background task,
 * connectivity restoration, retry and recovery timers
 */

import type { BackgroundTaskRunner } from './interfaces';
import type { Timestamp } from './types';
import { SYNC_TRIGGER } from './enums';
import { BACKGROUND_TASK_NAME, DEFAULT_SYNC_CONFIG } from './config';
import { IntervalBackgroundRunner } from './adapters/interval-background-runner';
import { createLogger, type Logger } from './logger';
import { debounce, formatDuration, now } from './utils';

export type TimerName = 'initial' | 'retry' | 'recovery' | 'degraded';

const FOREGROUND_TIMERS: readonly TimerName[] = ['initial', 'retry', 'recovery'];

export interface SyncSchedulerOptions<R> {
  runCycle(trigger: SYNC_TRIGGER): Promise<R>;
  backgroundRunner?: BackgroundTaskRunner;
  logger?: Logger;
  syncInterval?: number;
  initialSyncDelay?: number;
  backgroundSyncInterval?: number;
  backgroundMinSpacing?: number;
  connectivityDebounce?: number;
}

export class SyncScheduler<R = unknown> {
  private foregroundTimer: NodeJS.Timeout | undefined;
  private readonly timers = new Map<TimerName, NodeJS.Timeout>();
  private readonly backgroundRunner: BackgroundTaskRunner;
  private readonly logger: Logger;
  private readonly intervals: {
    sync: number;
    initial: number;
    background: number;
    backgroundMinSpacing: number;
  };
  private readonly connectivityTrigger: (() => void) & { cancel(): void };
  private lastConnected: boolean | undefined;
  private lastBackgroundRunAt: Timestamp | undefined;
  private disposed = false;

  constructor(private readonly options: SyncSchedulerOptions<R>) {
    this.logger = options.logger ?? createLogger('SyncScheduler');
    this.backgroundRunner = options.backgroundRunner ?? new IntervalBackgroundRunner(this.logger.child('background'));
    this.intervals = {
      sync: options.syncInterval ?? DEFAULT_SYNC_CONFIG.syncInterval,
      initial: options.initialSyncDelay ?? DEFAULT_SYNC_CONFIG.initialSyncDelay,
      background: options.backgroundSyncInterval ?? DEFAULT_SYNC_CONFIG.backgroundSyncInterval,
      backgroundMinSpacing: options.backgroundMinSpacing ?? DEFAULT_SYNC_CONFIG.backgroundMinSpacing,
    };
    this.connectivityTrigger = debounce(() => {
      this.trigger(SYNC_TRIGGER.CONNECTIVITY);
    }, options.connectivityDebounce ?? DEFAULT_SYNC_CONFIG.connectivityDebounce);
  }

  get isForegroundActive(): boolean {
    return this.foregroundTimer !== undefined;
  }

  /**
   * Start the foreground interval plus the delayed initial cycle; no-op when running
   */
  startSync(): boolean {
    if (this.disposed || this.foregroundTimer) return false;

    this.foregroundTimer = setInterval(() => {
      this.trigger(SYNC_TRIGGER.INTERVAL);
    }, this.intervals.sync);
    this.scheduleOnce('initial', this.intervals.initial, () => {
      this.trigger(SYNC_TRIGGER.INITIAL);
    });

    this.logger.info(`Foreground sync every ${formatDuration(this.intervals.sync)}`);
    return true;
  }

  stopSync(): void {
    if (this.foregroundTimer) {
      clearInterval(this.foregroundTimer);
      this.foregroundTimer = undefined;
      this.logger.info('Foreground sync stopped');
    }
    for (const name of FOREGROUND_TIMERS) {
      this.cancel(name);
    }
    this.connectivityTrigger.cancel();
  }

  async startBackgroundSync(): Promise<void> {
    if (this.disposed) return;
    const frequency = Math.max(this.intervals.background, this.intervals.backgroundMinSpacing);
    await this.backgroundRunner.register({
      name: BACKGROUND_TASK_NAME,
      frequency,
      initialDelay: this.intervals.backgroundMinSpacing,
      run: async () => {
        await this.runBackgroundTask();
      },
    });
    this.logger.info(`Background sync registered every ${formatDuration(frequency)}`);
  }

  async stopBackgroundSync(): Promise<void> {
    await this.backgroundRunner.cancel(BACKGROUND_TASK_NAME);
    this.logger.info('Background sync cancelled');
  }

  async isBackgroundRegistered(): Promise<boolean> {
    return this.backgroundRunner.isRegistered(BACKGROUND_TASK_NAME);
  }

  /**
   * Body of the background task; runs closer than the minimum spacing are skipped
   */
  async runBackgroundTask(): Promise<R | undefined> {
    const current = now();
    if (this.lastBackgroundRunAt !== undefined && current - this.lastBackgroundRunAt < this.intervals.backgroundMinSpacing) {
      this.logger.debug('Background run skipped, minimum spacing not reached');
      return undefined;
    }
    this.lastBackgroundRunAt = current;
    return this.options.runCycle(SYNC_TRIGGER.BACKGROUND);
  }

  forceSync(): Promise<R> {
    return this.options.runCycle(SYNC_TRIGGER.MANUAL);
  }

  /**
   * Feed connectivity reports. The first report is only the baseline; a
   * disconnected -> connected transition schedules one debounced cycle.
   */
  handleConnectivity(connected: boolean): void {
    const previous = this.lastConnected;
    this.lastConnected = connected;
    if (previous === undefined) return;

    if (!connected) {
      this.connectivityTrigger.cancel();
      return;
    }
    if (previous === false && this.isForegroundActive) {
      this.logger.debug('Connectivity restored, scheduling sync');
      this.connectivityTrigger();
    }
  }

  scheduleRetry(delay: number): void {
    if (!this.isForegroundActive) return;
    this.logger.info(`Retrying in ${formatDuration(delay)}`);
    this.scheduleOnce('retry', delay, () => {
      this.trigger(SYNC_TRIGGER.RETRY);
    });
  }

  scheduleRecovery(delay: number): void {
    this.logger.warn(`Recovery attempt in ${formatDuration(delay)}`);
    this.scheduleOnce('recovery', delay, () => {
      this.trigger(SYNC_TRIGGER.RECOVERY);
    });
  }

  /**
   * Replace any timer with the same name
   */
  scheduleOnce(name: TimerName, delay: number, callback: () => void): void {
    if (this.disposed) return;
    this.cancel(name);
    const timer = setTimeout(() => {
      this.timers.delete(name);
      callback();
    }, delay);
    this.timers.set(name, timer);
  }

  cancel(name: TimerName): void {
    const timer = this.timers.get(name);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(name);
    }
  }

  isScheduled(name: TimerName): boolean {
    return this.timers.has(name);
  }

  async dispose(): Promise<void> {
    this.stopSync();
    for (const name of [...this.timers.keys()]) {
      this.cancel(name);
    }
    this.disposed = true;
    await this.stopBackgroundSync();
  }

  private trigger(trigger: SYNC_TRIGGER): void {
    if (this.disposed) return;
    void this.options.runCycle(trigger).catch((error: unknown) => {
      this.logger.error(`Scheduled ${trigger} cycle failed`, error);
    });
  }
}
