/**
 * Sync status state machine and its observable snapshot
 */

import type { SyncStatusSnapshot, Timestamp } from './types';
import { SYNC_EVENT, SYNC_STATUS } from './enums';
import type { SyncEventEmitter } from './event-emitter';
import { RetryPolicy } from './retry-policy';
import { createLogger, type Logger } from './logger';
import { now } from './utils';

const TRANSITIONS: Readonly<Record<SYNC_STATUS, readonly SYNC_STATUS[]>> = {
  [SYNC_STATUS.IDLE]: [SYNC_STATUS.SYNCING, SYNC_STATUS.OFFLINE],
  [SYNC_STATUS.SYNCING]: [SYNC_STATUS.SUCCESS, SYNC_STATUS.ERROR, SYNC_STATUS.IDLE, SYNC_STATUS.OFFLINE],
  [SYNC_STATUS.SUCCESS]: [SYNC_STATUS.SYNCING, SYNC_STATUS.IDLE, SYNC_STATUS.OFFLINE],
  [SYNC_STATUS.ERROR]: [SYNC_STATUS.SYNCING, SYNC_STATUS.RECOVERY, SYNC_STATUS.IDLE, SYNC_STATUS.OFFLINE],
  [SYNC_STATUS.RECOVERY]: [SYNC_STATUS.SYNCING, SYNC_STATUS.IDLE, SYNC_STATUS.OFFLINE],
  [SYNC_STATUS.OFFLINE]: [SYNC_STATUS.DEGRADED, SYNC_STATUS.IDLE],
  [SYNC_STATUS.DEGRADED]: [SYNC_STATUS.IDLE, SYNC_STATUS.OFFLINE],
};

export function canTransition(from: SYNC_STATUS, to: SYNC_STATUS): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface TransitionDetails {
  message?: string;
  pendingCount?: number;
  lastSyncAt?: Timestamp;
}

export class SyncStatusMachine {
  private snapshot: SyncStatusSnapshot = Object.freeze({ status: SYNC_STATUS.IDLE, pendingCount: 0 });
  private consecutiveFailures = 0;

  constructor(
    private readonly emitter: SyncEventEmitter,
    private readonly policy: RetryPolicy = new RetryPolicy(),
    private readonly logger: Logger = createLogger('SyncStatusMachine')
  ) {}

  get current(): SyncStatusSnapshot {
    return this.snapshot;
  }

  get status(): SYNC_STATUS {
    return this.snapshot.status;
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  get isOffline(): boolean {
    return this.status === SYNC_STATUS.OFFLINE || this.status === SYNC_STATUS.DEGRADED;
  }

  /**
   * Move to `to` if the table allows it; returns whether a snapshot was published
   */
  transition(to: SYNC_STATUS, details: TransitionDetails = {}): boolean {
    const from = this.snapshot.status;
    if (!canTransition(from, to)) {
      this.logger.debug(`Ignoring transition ${from} -> ${to}`);
      return false;
    }
    this.publish(to, details);
    return true;
  }

  beginCycle(message = 'Synchronizing'): boolean {
    return this.transition(SYNC_STATUS.SYNCING, { message });
  }

  recordSuccess(pendingCount: number, at: Timestamp = now()): void {
    this.consecutiveFailures = 0;
    this.transition(SYNC_STATUS.SUCCESS, {
      message: pendingCount === 0 ? 'All changes synchronized' : `${pendingCount} change(s) waiting`,
      pendingCount,
      lastSyncAt: at,
    });
  }

  /**
   * Count a failed cycle; crossing the circuit-breaker threshold moves on to recovery.
   * Failures while offline are not counted.
   */
  recordFailure(message: string, pendingCount: number): SYNC_STATUS {
    if (this.isOffline) {
      this.updatePendingCount(pendingCount);
      return this.status;
    }
    this.consecutiveFailures++;
    this.transition(SYNC_STATUS.ERROR, { message, pendingCount });
    if (this.policy.enterRecovery(this.consecutiveFailures)) {
      this.transition(SYNC_STATUS.RECOVERY, {
        message: `Recovery mode after ${this.consecutiveFailures} consecutive failures`,
        pendingCount,
      });
    }
    return this.status;
  }

  connectivityLost(message = 'No network connection'): boolean {
    if (this.status === SYNC_STATUS.OFFLINE) return false;
    if (this.status === SYNC_STATUS.DEGRADED) return false;
    return this.transition(SYNC_STATUS.OFFLINE, { message });
  }

  markDegraded(message: string): boolean {
    return this.transition(SYNC_STATUS.DEGRADED, { message });
  }

  connectivityRestored(message = 'Connection restored'): boolean {
    if (!this.isOffline) return false;
    return this.transition(SYNC_STATUS.IDLE, { message });
  }

  updatePendingCount(pendingCount: number): void {
    if (pendingCount === this.snapshot.pendingCount) return;
    this.publish(this.snapshot.status, { message: this.snapshot.message, pendingCount });
  }

  /**
   * Back to idle from anywhere, forgetting the failure streak
   */
  reset(message = 'Sync state reset', pendingCount = 0): void {
    this.consecutiveFailures = 0;
    this.publish(SYNC_STATUS.IDLE, { message, pendingCount });
  }

  private publish(status: SYNC_STATUS, details: TransitionDetails): void {
    const lastSyncAt = details.lastSyncAt ?? this.snapshot.lastSyncAt;
    const next: SyncStatusSnapshot = {
      status,
      pendingCount: details.pendingCount ?? this.snapshot.pendingCount,
      ...(details.message !== undefined ? { message: details.message } : {}),
      ...(lastSyncAt !== undefined ? { lastSyncAt } : {}),
    };
    this.snapshot = Object.freeze(next);
    this.logger.debug(`Status ${status}`, next);
    this.emitter.emit(SYNC_EVENT.STATUS_CHANGED, this.snapshot);
  }
}
