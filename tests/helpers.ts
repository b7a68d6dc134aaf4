import { z } from 'zod';
import type { RecordedRequest } from '../src/adapters/mock-transport';
import type { SyncLogStore } from '../src/sync-log-store';
import { createSyncLogEntry } from '../src/sync-log-store';
import { SYNC_OPERATION } from '../src/enums';
import type { SyncLogEntry, SyncPayload } from '../src/types';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface SeedOptions {
  entityType?: string;
  isFile?: boolean;
  startAt?: number;
  data?: (index: number) => SyncPayload;
}

/**
 * Append `count` entries with strictly increasing createdAt
 */
export async function seedEntries(store: SyncLogStore, count: number, options: SeedOptions = {}): Promise<SyncLogEntry[]> {
  const entries: SyncLogEntry[] = [];
  const startAt = options.startAt ?? 1_000;
  for (let i = 0; i < count; i++) {
    entries.push(
      createSyncLogEntry(
        {
          entityType: options.entityType ?? 'order',
          entityId: `${options.entityType ?? 'order'}-${i}`,
          operation: SYNC_OPERATION.CREATE,
          data: options.data ? options.data(i) : { index: i },
          isFile: options.isFile ?? false,
        },
        startAt + i
      )
    );
  }
  await store.appendMany(entries);
  return entries;
}

const dataBatchSchema = z.object({
  type: z.literal('DATA'),
  logs: z.array(
    z.object({
      syncId: z.string(),
      entityType: z.string(),
      entityId: z.string(),
      operation: z.string(),
      data: z.unknown(),
      createdAt: z.string(),
    })
  ),
  timestamp: z.string(),
});

export function dataBatchOf(request: RecordedRequest | undefined): z.infer<typeof dataBatchSchema> {
  return dataBatchSchema.parse(request?.body);
}

export function syncIdsOf(request: RecordedRequest | undefined): string[] {
  return dataBatchOf(request).logs.map(log => log.syncId);
}
