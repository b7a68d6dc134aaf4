/**
 * Typed event emitter for the sync engine
 */

import type { EventEmitter, SyncEventListener, SyncEvents } from './interfaces';
import { SYNC_EVENT } from './enums';
import { createLogger, type Logger } from './logger';

type ListenerMap = { [K in keyof SyncEvents]: Set<SyncEventListener<K>> };

export class SyncEventEmitter implements EventEmitter {
  private readonly listeners: ListenerMap = {
    [SYNC_EVENT.STATUS_CHANGED]: new Set(),
    [SYNC_EVENT.MUTATION_LOGGED]: new Set(),
    [SYNC_EVENT.CYCLE_STARTED]: new Set(),
    [SYNC_EVENT.CYCLE_COMPLETED]: new Set(),
    [SYNC_EVENT.CYCLE_SKIPPED]: new Set(),
    [SYNC_EVENT.BATCH_SENT]: new Set(),
    [SYNC_EVENT.BATCH_FAILED]: new Set(),
    [SYNC_EVENT.RECOVERY_ENTERED]: new Set(),
    [SYNC_EVENT.DOWNLOAD_COMPLETED]: new Set(),
    [SYNC_EVENT.DOWNLOAD_FAILED]: new Set(),
    [SYNC_EVENT.CONNECTION_ONLINE]: new Set(),
    [SYNC_EVENT.CONNECTION_OFFLINE]: new Set(),
  };

  constructor(private readonly logger: Logger = createLogger('SyncEventEmitter')) {}

  on<K extends keyof SyncEvents>(event: K, listener: SyncEventListener<K>): () => void {
    this.listeners[event].add(listener);

    // Return unsubscribe function
    return () => {
      this.off(event, listener);
    };
  }

  /**
   * Synchronous fan-out. A throwing or rejecting listener is logged and
   * never reaches the emitter or the other listeners.
   */
  emit<K extends keyof SyncEvents>(event: K, data: SyncEvents[K]): void {
    for (const listener of [...this.listeners[event]]) {
      try {
        const result = listener(data);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error(`Async listener for ${event} rejected`, error);
          });
        }
      } catch (error) {
        this.logger.error(`Error in event listener for ${event}`, error);
      }
    }
  }

  off<K extends keyof SyncEvents>(event: K, listener: SyncEventListener<K>): void {
    this.listeners[event].delete(listener);
  }

  removeAllListeners<K extends keyof SyncEvents>(event?: K): void {
    if (event) {
      this.listeners[event].clear();
      return;
    }
    for (const value of Object.values(SYNC_EVENT)) {
      this.listeners[value].clear();
    }
  }

  listenerCount<K extends keyof SyncEvents>(event: K): number {
    return this.listeners[event].size;
  }
}
