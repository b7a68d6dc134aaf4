import { describe, it, expect, beforeEach } from 'vitest';
import { SyncStatusMachine, canTransition } from '../src/status-machine';
import { SyncEventEmitter } from '../src/event-emitter';
import { RetryPolicy } from '../src/retry-policy';
import { SYNC_EVENT, SYNC_STATUS } from '../src/enums';
import { createSilentLogger } from '../src/logger';
import type { SyncStatusSnapshot } from '../src/types';

describe('SyncStatusMachine', () => {
  let emitter: SyncEventEmitter;
  let machine: SyncStatusMachine;
  let published: SyncStatusSnapshot[];

  beforeEach(() => {
    emitter = new SyncEventEmitter(createSilentLogger());
    machine = new SyncStatusMachine(emitter, new RetryPolicy(), createSilentLogger());
    published = [];
    emitter.on(SYNC_EVENT.STATUS_CHANGED, snapshot => {
      published.push(snapshot);
    });
  });

  it('should start idle with nothing pending', () => {
    expect(machine.current).toEqual({ status: SYNC_STATUS.IDLE, pendingCount: 0 });
    expect(machine.failureCount).toBe(0);
  });

  it('should follow the transition table', () => {
    expect(canTransition(SYNC_STATUS.IDLE, SYNC_STATUS.SYNCING)).toBe(true);
    expect(canTransition(SYNC_STATUS.IDLE, SYNC_STATUS.SUCCESS)).toBe(false);
    expect(canTransition(SYNC_STATUS.OFFLINE, SYNC_STATUS.SYNCING)).toBe(false);
    expect(canTransition(SYNC_STATUS.ERROR, SYNC_STATUS.RECOVERY)).toBe(true);
    expect(canTransition(SYNC_STATUS.DEGRADED, SYNC_STATUS.IDLE)).toBe(true);
  });

  it('should ignore transitions the table forbids', () => {
    expect(machine.transition(SYNC_STATUS.SUCCESS)).toBe(false);

    expect(machine.status).toBe(SYNC_STATUS.IDLE);
    expect(published).toHaveLength(0);
  });

  it('should publish a snapshot for each successful cycle', () => {
    machine.beginCycle();
    machine.recordSuccess(0, 12_000);

    expect(published.map(snapshot => snapshot.status)).toEqual([SYNC_STATUS.SYNCING, SYNC_STATUS.SUCCESS]);
    expect(machine.current).toEqual({
      status: SYNC_STATUS.SUCCESS,
      message: 'All changes synchronized',
      pendingCount: 0,
      lastSyncAt: 12_000,
    });
  });

  it('should mention remaining changes after success', () => {
    machine.beginCycle();
    machine.recordSuccess(4, 12_000);

    expect(machine.current.message).toBe('4 change(s) waiting');
  });

  it('should freeze published snapshots', () => {
    machine.beginCycle();

    expect(Object.isFrozen(machine.current)).toBe(true);
    expect(Object.isFrozen(published[0])).toBe(true);
  });

  it('should keep lastSyncAt across later transitions', () => {
    machine.beginCycle();
    machine.recordSuccess(0, 12_000);
    machine.beginCycle();
    machine.recordFailure('HTTP 500', 2);

    expect(machine.current).toMatchObject({ status: SYNC_STATUS.ERROR, lastSyncAt: 12_000, pendingCount: 2 });
  });

  it('should enter recovery after the configured number of consecutive failures', () => {
    for (let i = 1; i <= 9; i++) {
      machine.beginCycle();
      expect(machine.recordFailure('HTTP 500', 5)).toBe(SYNC_STATUS.ERROR);
    }

    machine.beginCycle();
    expect(machine.recordFailure('HTTP 500', 5)).toBe(SYNC_STATUS.RECOVERY);
    expect(machine.failureCount).toBe(10);
    expect(machine.current.message).toBe('Recovery mode after 10 consecutive failures');
  });

  it('should reset the failure streak on success', () => {
    machine.beginCycle();
    machine.recordFailure('HTTP 500', 1);
    machine.beginCycle();
    machine.recordFailure('HTTP 500', 1);

    machine.beginCycle();
    machine.recordSuccess(0);

    expect(machine.failureCount).toBe(0);
  });

  it('should not count failures while offline', () => {
    machine.connectivityLost();

    expect(machine.recordFailure('timeout', 3)).toBe(SYNC_STATUS.OFFLINE);
    expect(machine.failureCount).toBe(0);
    expect(machine.current.pendingCount).toBe(3);
  });

  it('should move offline, degraded and back to idle', () => {
    expect(machine.connectivityLost()).toBe(true);
    expect(machine.connectivityLost()).toBe(false);
    expect(machine.markDegraded('Offline for a while')).toBe(true);
    expect(machine.isOffline).toBe(true);
    expect(machine.connectivityLost()).toBe(false);

    expect(machine.connectivityRestored()).toBe(true);
    expect(machine.current).toMatchObject({ status: SYNC_STATUS.IDLE, message: 'Connection restored' });
    expect(machine.connectivityRestored()).toBe(false);
  });

  it('should publish pending count changes only when the count moves', () => {
    machine.updatePendingCount(2);
    machine.updatePendingCount(2);
    machine.updatePendingCount(3);

    expect(published.map(snapshot => snapshot.pendingCount)).toEqual([2, 3]);
    expect(machine.status).toBe(SYNC_STATUS.IDLE);
  });

  it('should reset from any status', () => {
    machine.connectivityLost();
    machine.reset('Sync state reset', 0);

    expect(machine.current).toEqual({ status: SYNC_STATUS.IDLE, message: 'Sync state reset', pendingCount: 0 });
  });

  it('should survive a throwing listener', () => {
    emitter.on(SYNC_EVENT.STATUS_CHANGED, () => {
      throw new Error('listener failure');
    });

    expect(machine.beginCycle()).toBe(true);
    expect(machine.status).toBe(SYNC_STATUS.SYNCING);
  });
});
