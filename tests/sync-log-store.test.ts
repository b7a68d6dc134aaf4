import { describe, it, expect, beforeEach } from 'vitest';
import { SyncLogStore, createSyncLogEntry } from '../src/sync-log-store';
import { MemoryStorageAdapter } from '../src/adapters/memory-storage';
import { RetryPolicy } from '../src/retry-policy';
import { STORAGE_KEYS } from '../src/config';
import { SYNC_OPERATION } from '../src/enums';
import { InvalidPayloadError, PersistenceError } from '../src/errors';
import { createSilentLogger } from '../src/logger';
import { seedEntries } from './helpers';

describe('SyncLogStore', () => {
  let storage: MemoryStorageAdapter;
  let store: SyncLogStore;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
    store = new SyncLogStore(storage, new RetryPolicy(), createSilentLogger());
  });

  describe('createSyncLogEntry', () => {
    it('should build a pending entry with serialized data', () => {
      const entry = createSyncLogEntry(
        { entityType: 'order', entityId: 'o-1', operation: SYNC_OPERATION.UPDATE, data: { qty: 2 } },
        5_000
      );

      expect(entry).toMatchObject({
        entityType: 'order',
        entityId: 'o-1',
        operation: SYNC_OPERATION.UPDATE,
        payload: '{"qty":2}',
        isFile: false,
        synced: false,
        retryCount: 0,
        rejected: false,
        createdAt: 5_000,
      });
      expect(entry.id).toHaveLength(36);
    });

    it('should reject data that cannot be serialized', () => {
      const data: Record<string, unknown> = {};
      data.self = data;

      expect(() =>
        createSyncLogEntry({ entityType: 'order', entityId: 'o-1', operation: SYNC_OPERATION.CREATE, data })
      ).toThrow(InvalidPayloadError);
    });
  });

  describe('append and list', () => {
    it('should persist entries under the sync log key', async () => {
      const [entry] = await seedEntries(store, 1);

      const raw = await storage.getString(STORAGE_KEYS.SYNC_LOGS);
      expect(raw).not.toBeNull();
      expect(await store.get(entry?.id ?? '')).toEqual(entry);
    });

    it('should list pending entries oldest first', async () => {
      const late = createSyncLogEntry(
        { entityType: 'order', entityId: 'late', operation: SYNC_OPERATION.CREATE, data: {} },
        3_000
      );
      const early = createSyncLogEntry(
        { entityType: 'order', entityId: 'early', operation: SYNC_OPERATION.CREATE, data: {} },
        1_000
      );
      await store.append(late);
      await store.append(early);

      const pending = await store.listPending();
      expect(pending.map(entry => entry.entityId)).toEqual(['early', 'late']);
    });

    it('should keep insertion order for equal timestamps', async () => {
      const entries = ['a', 'b', 'c'].map(entityId =>
        createSyncLogEntry({ entityType: 'order', entityId, operation: SYNC_OPERATION.CREATE, data: {} }, 1_000)
      );
      await store.appendMany(entries);

      const pending = await store.listPending();
      expect(pending.map(entry => entry.entityId)).toEqual(['a', 'b', 'c']);
    });

    it('should refuse a duplicate id', async () => {
      const [entry] = await seedEntries(store, 1);
      if (!entry) throw new Error('seed failed');

      await expect(store.append(entry)).rejects.toBeInstanceOf(PersistenceError);
      expect(await store.countPending()).toBe(1);
    });

    it('should not lose entries appended concurrently', async () => {
      const entries = Array.from({ length: 10 }, (_, i) =>
        createSyncLogEntry(
          { entityType: 'order', entityId: `o-${i}`, operation: SYNC_OPERATION.CREATE, data: {} },
          1_000 + i
        )
      );

      await Promise.all(entries.map(entry => store.append(entry)));

      expect(await store.countPending()).toBe(10);
    });

    it('should return an empty log for a fresh store', async () => {
      expect(await store.listAll()).toEqual([]);
      expect(await store.countPending()).toBe(0);
    });
  });

  describe('markSynced', () => {
    it('should be idempotent', async () => {
      const [entry] = await seedEntries(store, 1);
      const id = entry?.id ?? '';

      expect(await store.markSynced(id, 9_000)).toBe(true);
      expect(await store.markSynced(id, 9_500)).toBe(false);

      const stored = await store.get(id);
      expect(stored?.synced).toBe(true);
      expect(stored?.syncedAt).toBe(9_000);
    });

    it('should ignore unknown ids', async () => {
      await seedEntries(store, 2);

      expect(await store.markSyncedMany(['missing'])).toBe(0);
      expect(await store.countPending()).toBe(2);
    });

    it('should drop synced entries from the pending list', async () => {
      const entries = await seedEntries(store, 3);

      await store.markSyncedMany(entries.slice(0, 2).map(entry => entry.id));

      const pending = await store.listPending();
      expect(pending.map(entry => entry.entityId)).toEqual(['order-2']);
    });
  });

  describe('failed attempts', () => {
    it('should count attempts and remember the last error', async () => {
      const [entry] = await seedEntries(store, 1);
      const id = entry?.id ?? '';

      await store.incrementRetry(id, 'HTTP 500', 2_000);
      const updated = await store.incrementRetry(id, 'HTTP 503', 3_000);

      expect(updated).toMatchObject({ retryCount: 2, lastError: 'HTTP 503', lastAttemptAt: 3_000, rejected: false });
      expect(await store.listFailed()).toHaveLength(1);
    });

    it('should flag rejected entries without syncing them', async () => {
      const [entry] = await seedEntries(store, 1);

      const updated = await store.markRejected(entry?.id ?? '', 'HTTP 400');

      expect(updated).toMatchObject({ rejected: true, synced: false, retryCount: 1, lastError: 'HTTP 400' });
    });

    it('should leave synced entries alone', async () => {
      const [entry] = await seedEntries(store, 1);
      const id = entry?.id ?? '';
      await store.markSynced(id);

      expect(await store.incrementRetry(id, 'late failure')).toBeUndefined();
      expect((await store.get(id))?.retryCount).toBe(0);
    });
  });

  describe('purging', () => {
    it('should remove only synced entries older than the cutoff', async () => {
      const entries = await seedEntries(store, 3);
      await store.markSynced(entries[0]?.id ?? '', 1_000);
      await store.markSynced(entries[1]?.id ?? '', 5_000);

      const removed = await store.purgeSyncedOlderThan(2_000);

      expect(removed).toBe(1);
      const remaining = await store.listAll();
      expect(remaining.map(entry => entry.entityId)).toEqual(['order-1', 'order-2']);
    });

    it('should remove stale rejected or exhausted pending entries', async () => {
      const entries = await seedEntries(store, 4, { startAt: 1_000 });
      const [rejected, exhausted, retrying] = entries;
      await store.markRejected(rejected?.id ?? '', 'HTTP 422');
      for (let i = 0; i < 3; i++) {
        await store.incrementRetry(exhausted?.id ?? '', 'HTTP 500');
      }
      await store.incrementRetry(retrying?.id ?? '', 'HTTP 500');

      const removed = await store.purgeStalePending(10_000);

      expect(removed).toBe(2);
      const pending = await store.listPending();
      expect(pending.map(entry => entry.entityId)).toEqual(['order-2', 'order-3']);
    });

    it('should keep stale entries created after the cutoff', async () => {
      const [entry] = await seedEntries(store, 1, { startAt: 50_000 });
      await store.markRejected(entry?.id ?? '', 'HTTP 422');

      expect(await store.purgeStalePending(10_000)).toBe(0);
    });

    it('should remove a single entry and clear everything', async () => {
      const entries = await seedEntries(store, 3);

      expect(await store.remove(entries[0]?.id ?? '')).toBe(true);
      expect(await store.remove('missing')).toBe(false);
      expect(await store.countPending()).toBe(2);

      await store.clear();
      expect(await store.listAll()).toEqual([]);
    });
  });

  describe('getStatistics', () => {
    it('should summarize the log', async () => {
      const entries = await seedEntries(store, 4);
      await seedEntries(store, 1, { entityType: 'photo', isFile: true, startAt: 2_000 });
      const [synced, rejected, exhausted, retrying] = entries;
      await store.markSynced(synced?.id ?? '');
      await store.markRejected(rejected?.id ?? '', 'HTTP 400');
      for (let i = 0; i < 3; i++) {
        await store.incrementRetry(exhausted?.id ?? '', 'HTTP 500');
      }
      await store.incrementRetry(retrying?.id ?? '', 'HTTP 500');

      expect(await store.getStatistics()).toEqual({
        total: 5,
        pending: 4,
        synced: 1,
        failed: 3,
        exhausted: 1,
        rejected: 1,
        files: 1,
      });
    });
  });

  describe('storage failures', () => {
    it('should raise PersistenceError when storage is unavailable', async () => {
      storage.setAvailable(false);

      await expect(store.listPending()).rejects.toBeInstanceOf(PersistenceError);
    });

    it('should raise PersistenceError and keep the log intact when a write fails', async () => {
      await seedEntries(store, 1);
      storage.failNextWrites(1);

      await expect(seedEntries(store, 1, { startAt: 5_000 })).rejects.toThrow('Failed to write sync log: Storage write failed');
      expect(await store.countPending()).toBe(1);
    });

    it('should raise PersistenceError for corrupt data', async () => {
      await storage.setString(STORAGE_KEYS.SYNC_LOGS, '{not json');

      await expect(store.listAll()).rejects.toThrow('Sync log is not valid JSON');
    });

    it('should raise PersistenceError for entries that fail validation', async () => {
      await storage.setString(STORAGE_KEYS.SYNC_LOGS, JSON.stringify([{ id: 'x' }]));

      await expect(store.listAll()).rejects.toBeInstanceOf(PersistenceError);
    });

    it('should default the rejected flag for older entries', async () => {
      const current = createSyncLogEntry(
        { entityType: 'order', entityId: 'o-1', operation: SYNC_OPERATION.CREATE, data: {} },
        1_000
      );
      const legacy = Object.fromEntries(Object.entries(current).filter(([key]) => key !== 'rejected'));
      await storage.setString(STORAGE_KEYS.SYNC_LOGS, JSON.stringify([legacy]));

      const [entry] = await store.listAll();
      expect(entry?.rejected).toBe(false);
    });
  });
});
