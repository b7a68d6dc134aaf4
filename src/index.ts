/**
 * Offline Sync Engine - durable mutation log with retry, recovery and
 * connectivity-aware synchronization
 *
 * @example
 * ```typescript
 * import {
 *   SyncEngine,
 *   JsonFileStorageAdapter,
 *   FetchTransportAdapter,
 *   ManualConnectivityAdapter,
 *   SYNC_EVENT,
 * } from 'offline-sync-engine';
 *
 * const engine = new SyncEngine();
 * await engine.initialize({
 *   storage: new JsonFileStorageAdapter('./data/sync.json'),
 *   transport: new FetchTransportAdapter({ baseUrl: 'https://api.example.com' }),
 *   connectivity: new ManualConnectivityAdapter(true),
 * });
 *
 * engine.on(SYNC_EVENT.CYCLE_COMPLETED, report => {
 *   console.log(`cycle ${report.outcome}: ${report.dispatch?.synced ?? 0} synced`);
 * });
 *
 * await engine.logCreate({ entityType: 'order', entityId: 'o-1', data: { total: 42 } });
 * ```
 */

// Core types and interfaces
export type * from './types';
export type * from './interfaces';

// Enums
export * from './enums';

// Errors and configuration
export * from './errors';
export * from './config';

// Logging
export * from './logger';

// Utilities
export * from './utils';

// Event system
export * from './event-emitter';

// Building blocks
export * from './retry-policy';
export * from './sync-log-store';
export * from './status-machine';
export * from './batch-dispatcher';
export * from './download-coordinator';
export * from './scheduler';
export * from './error-journal';

// Main sync engine
export * from './sync-engine';

// Adapters
export * from './adapters';
