import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { SyncScheduler } from '../src/scheduler';
import { SYNC_TRIGGER } from '../src/enums';
import { BACKGROUND_TASK_NAME } from '../src/config';
import { createSilentLogger } from '../src/logger';
import type { BackgroundTask, BackgroundTaskRunner } from '../src/interfaces';

class FakeBackgroundRunner implements BackgroundTaskRunner {
  readonly tasks = new Map<string, BackgroundTask>();

  register(task: BackgroundTask): void {
    this.tasks.set(task.name, task);
  }

  cancel(name: string): void {
    this.tasks.delete(name);
  }

  isRegistered(name: string): boolean {
    return this.tasks.has(name);
  }
}

const MINUTE = 60_000;

describe('SyncScheduler', () => {
  let runCycle: Mock<(trigger: SYNC_TRIGGER) => Promise<SYNC_TRIGGER>>;
  let runner: FakeBackgroundRunner;
  let scheduler: SyncScheduler<SYNC_TRIGGER>;

  const triggers = (): SYNC_TRIGGER[] => runCycle.mock.calls.map(([trigger]) => trigger);

  beforeEach(() => {
    vi.useFakeTimers();
    runCycle = vi.fn((trigger: SYNC_TRIGGER) => Promise.resolve(trigger));
    runner = new FakeBackgroundRunner();
    scheduler = new SyncScheduler({
      runCycle,
      backgroundRunner: runner,
      logger: createSilentLogger(),
      syncInterval: 5 * MINUTE,
      initialSyncDelay: 3_000,
      backgroundSyncInterval: 60 * MINUTE,
      backgroundMinSpacing: 15 * MINUTE,
      connectivityDebounce: 2_000,
    });
  });

  afterEach(async () => {
    await scheduler.dispose();
    vi.useRealTimers();
  });

  describe('foreground', () => {
    it('should run an initial cycle after the delay and then on the interval', () => {
      expect(scheduler.startSync()).toBe(true);

      vi.advanceTimersByTime(2_999);
      expect(runCycle).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(triggers()).toEqual([SYNC_TRIGGER.INITIAL]);

      vi.advanceTimersByTime(5 * MINUTE);
      expect(triggers()).toEqual([SYNC_TRIGGER.INITIAL, SYNC_TRIGGER.INTERVAL]);
    });

    it('should ignore a second start', () => {
      scheduler.startSync();

      expect(scheduler.startSync()).toBe(false);
      vi.advanceTimersByTime(5 * MINUTE);
      expect(triggers()).toEqual([SYNC_TRIGGER.INITIAL, SYNC_TRIGGER.INTERVAL]);
    });

    it('should stop the interval and pending timers', () => {
      scheduler.startSync();
      scheduler.scheduleRetry(30_000);

      scheduler.stopSync();
      vi.advanceTimersByTime(10 * MINUTE);

      expect(runCycle).not.toHaveBeenCalled();
      expect(scheduler.isForegroundActive).toBe(false);
      expect(scheduler.isScheduled('retry')).toBe(false);
    });

    it('should log a failing scheduled cycle instead of throwing', async () => {
      runCycle.mockRejectedValueOnce(new Error('boom'));
      scheduler.startSync();

      await vi.advanceTimersByTimeAsync(3_000);

      expect(runCycle).toHaveBeenCalledTimes(1);
    });
  });

  describe('manual', () => {
    it('should run a manual cycle and return its result', async () => {
      await expect(scheduler.forceSync()).resolves.toBe(SYNC_TRIGGER.MANUAL);
    });
  });

  describe('retry and recovery', () => {
    it('should fire a retry only while foreground sync is active', () => {
      scheduler.scheduleRetry(30_000);
      expect(scheduler.isScheduled('retry')).toBe(false);

      scheduler.startSync();
      vi.advanceTimersByTime(3_000);
      scheduler.scheduleRetry(30_000);
      vi.advanceTimersByTime(30_000);

      expect(triggers()).toEqual([SYNC_TRIGGER.INITIAL, SYNC_TRIGGER.RETRY]);
    });

    it('should replace a pending timer with the same name', () => {
      scheduler.scheduleRecovery(60_000);
      vi.advanceTimersByTime(30_000);
      scheduler.scheduleRecovery(60_000);

      vi.advanceTimersByTime(30_000);
      expect(runCycle).not.toHaveBeenCalled();

      vi.advanceTimersByTime(30_000);
      expect(triggers()).toEqual([SYNC_TRIGGER.RECOVERY]);
      expect(scheduler.isScheduled('recovery')).toBe(false);
    });

    it('should cancel a named timer', () => {
      scheduler.scheduleRecovery(60_000);
      scheduler.cancel('recovery');

      vi.advanceTimersByTime(60_000);

      expect(runCycle).not.toHaveBeenCalled();
    });
  });

  describe('connectivity', () => {
    it('should treat the first report as the baseline', () => {
      scheduler.startSync();
      vi.advanceTimersByTime(3_000);
      runCycle.mockClear();

      scheduler.handleConnectivity(true);
      vi.advanceTimersByTime(2_000);

      expect(runCycle).not.toHaveBeenCalled();
    });

    it('should run one debounced cycle when the connection comes back', () => {
      scheduler.startSync();
      vi.advanceTimersByTime(3_000);
      runCycle.mockClear();

      scheduler.handleConnectivity(true);
      scheduler.handleConnectivity(false);
      scheduler.handleConnectivity(true);
      vi.advanceTimersByTime(1_000);
      scheduler.handleConnectivity(false);
      scheduler.handleConnectivity(true);
      vi.advanceTimersByTime(1_999);
      expect(runCycle).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(triggers()).toEqual([SYNC_TRIGGER.CONNECTIVITY]);
    });

    it('should drop a pending connectivity cycle when the connection drops again', () => {
      scheduler.startSync();
      vi.advanceTimersByTime(3_000);
      runCycle.mockClear();

      scheduler.handleConnectivity(false);
      scheduler.handleConnectivity(true);
      scheduler.handleConnectivity(false);
      vi.advanceTimersByTime(2_000);

      expect(runCycle).not.toHaveBeenCalled();
    });

    it('should not react to connectivity while foreground sync is stopped', () => {
      scheduler.handleConnectivity(false);
      scheduler.handleConnectivity(true);
      vi.advanceTimersByTime(2_000);

      expect(runCycle).not.toHaveBeenCalled();
    });
  });

  describe('background', () => {
    it('should register the background task with the minimum spacing', async () => {
      await scheduler.startBackgroundSync();

      const task = runner.tasks.get(BACKGROUND_TASK_NAME);
      expect(task).toMatchObject({ name: BACKGROUND_TASK_NAME, frequency: 60 * MINUTE, initialDelay: 15 * MINUTE });
      expect(await scheduler.isBackgroundRegistered()).toBe(true);
    });

    it('should never register a frequency below the minimum spacing', async () => {
      const eager = new SyncScheduler({
        runCycle,
        backgroundRunner: runner,
        logger: createSilentLogger(),
        backgroundSyncInterval: MINUTE,
        backgroundMinSpacing: 15 * MINUTE,
      });

      await eager.startBackgroundSync();

      expect(runner.tasks.get(BACKGROUND_TASK_NAME)?.frequency).toBe(15 * MINUTE);
      await eager.dispose();
    });

    it('should skip background runs closer than the minimum spacing', async () => {
      await expect(scheduler.runBackgroundTask()).resolves.toBe(SYNC_TRIGGER.BACKGROUND);

      vi.advanceTimersByTime(10 * MINUTE);
      await expect(scheduler.runBackgroundTask()).resolves.toBeUndefined();

      vi.advanceTimersByTime(5 * MINUTE);
      await expect(scheduler.runBackgroundTask()).resolves.toBe(SYNC_TRIGGER.BACKGROUND);
      expect(runCycle).toHaveBeenCalledTimes(2);
    });

    it('should run the cycle from the registered task body', async () => {
      await scheduler.startBackgroundSync();

      await runner.tasks.get(BACKGROUND_TASK_NAME)?.run();

      expect(triggers()).toEqual([SYNC_TRIGGER.BACKGROUND]);
    });

    it('should cancel the background task', async () => {
      await scheduler.startBackgroundSync();
      await scheduler.stopBackgroundSync();

      expect(await scheduler.isBackgroundRegistered()).toBe(false);
    });
  });

  it('should do nothing once disposed', async () => {
    await scheduler.startBackgroundSync();
    scheduler.startSync();

    await scheduler.dispose();
    vi.advanceTimersByTime(10 * MINUTE);

    expect(runCycle).not.toHaveBeenCalled();
    expect(scheduler.startSync()).toBe(false);
    expect(runner.tasks.size).toBe(0);
  });
});
