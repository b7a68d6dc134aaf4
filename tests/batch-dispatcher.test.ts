import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BatchDispatcher } from '../src/batch-dispatcher';
import { SyncLogStore } from '../src/sync-log-store';
import { SyncEventEmitter } from '../src/event-emitter';
import { RetryPolicy } from '../src/retry-policy';
import { MemoryStorageAdapter } from '../src/adapters/memory-storage';
import { MockTransportAdapter } from '../src/adapters/mock-transport';
import { BATCH_TYPE, CYCLE_OUTCOME, SYNC_EVENT } from '../src/enums';
import { PartialBatchFailure, ServerError, TransportError } from '../src/errors';
import { createSilentLogger } from '../src/logger';
import type { BatchInfo } from '../src/types';
import { createDeferred, dataBatchOf, seedEntries, syncIdsOf } from './helpers';

const DATA = '/sync/batch';
const FILES = '/sync/files';

describe('BatchDispatcher', () => {
  let storage: MemoryStorageAdapter;
  let store: SyncLogStore;
  let transport: MockTransportAdapter;
  let emitter: SyncEventEmitter;
  let dispatcher: BatchDispatcher;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
    const policy = new RetryPolicy();
    store = new SyncLogStore(storage, policy, createSilentLogger());
    transport = new MockTransportAdapter();
    emitter = new SyncEventEmitter(createSilentLogger());
    dispatcher = new BatchDispatcher({ store, transport, policy, emitter, logger: createSilentLogger() });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should do nothing when the log is empty', async () => {
    const result = await dispatcher.runCycle();

    expect(result).toEqual({
      outcome: CYCLE_OUTCOME.COMPLETED,
      batches: 0,
      synced: 0,
      failed: 0,
      rejected: 0,
      held: 0,
      failures: [],
      partialBatches: [],
    });
    expect(transport.requests).toHaveLength(0);
  });

  it('should split data entries into ordered batches of twenty', async () => {
    const entries = await seedEntries(store, 45);

    const result = await dispatcher.runCycle();

    const requests = transport.requestsTo('POST', DATA);
    expect(requests.map(request => syncIdsOf(request).length)).toEqual([20, 20, 5]);
    expect(requests.flatMap(request => syncIdsOf(request))).toEqual(entries.map(entry => entry.id));
    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, batches: 3, synced: 45 });
    expect(await store.countPending()).toBe(0);
  });

  it('should send the data batch wire format', async () => {
    const [entry] = await seedEntries(store, 1, { startAt: 0, data: () => ({ qty: 3 }) });

    await dispatcher.runCycle();

    const body = dataBatchOf(transport.requests[0]);
    expect(body.type).toBe('DATA');
    expect(body.logs).toEqual([
      {
        syncId: entry?.id,
        entityType: 'order',
        entityId: 'order-0',
        operation: 'create',
        data: { qty: 3 },
        createdAt: '1970-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('should upload file batches of five before data batches', async () => {
    await seedEntries(store, 2);
    await seedEntries(store, 7, {
      entityType: 'photo',
      isFile: true,
      startAt: 2_000,
      data: i => ({ base64Content: 'aGVsbG8=', fileName: `p${i}.png` }),
    });

    const result = await dispatcher.runCycle();

    expect(transport.requests.map(request => request.path)).toEqual([FILES, FILES, DATA]);
    expect(transport.requests.map(request => request.upload?.files.length ?? 0)).toEqual([5, 2, 0]);
    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, batches: 3, synced: 9 });
  });

  it('should decode file content and describe it in form fields', async () => {
    await seedEntries(store, 1, {
      entityType: 'photo',
      isFile: true,
      data: () => ({ base64Content: 'data:image/jpeg;base64,aGVsbG8=' }),
    });

    await dispatcher.runCycle();

    const upload = transport.requests[0]?.upload;
    expect(upload?.files).toHaveLength(1);
    expect(upload?.files[0]).toMatchObject({ fieldName: 'files', fileName: 'photo-0.jpg', contentType: 'image/jpeg' });
    expect(upload?.files[0]?.content.byteLength).toBe(5);
    expect(upload?.fields?.fileIds).toBe('["photo-0"]');
  });

  it('should reject a file entry without content locally', async () => {
    const [entry] = await seedEntries(store, 1, { entityType: 'photo', isFile: true, data: () => ({ fileName: 'x.png' }) });

    const result = await dispatcher.runCycle();

    expect(transport.requests).toHaveLength(0);
    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.PARTIAL, rejected: 1 });
    expect((await store.get(entry?.id ?? ''))?.rejected).toBe(true);
  });

  it('should abort the cycle on a server error', async () => {
    const entries = await seedEntries(store, 25);
    transport.route('POST', DATA, { status: 500 });

    const result = await dispatcher.runCycle();

    expect(transport.requests).toHaveLength(1);
    expect(result.outcome).toBe(CYCLE_OUTCOME.ABORTED);
    expect(result.error).toBeInstanceOf(ServerError);
    expect(result.failed).toBe(20);
    expect((await store.get(entries[0]?.id ?? ''))?.retryCount).toBe(1);
    expect((await store.get(entries[24]?.id ?? ''))?.retryCount).toBe(0);
  });

  it.each([401, 403, 408, 429])('should treat HTTP %i as a retryable outage', async status => {
    await seedEntries(store, 1);
    transport.route('POST', DATA, { status });

    const result = await dispatcher.runCycle();

    expect(result.outcome).toBe(CYCLE_OUTCOME.ABORTED);
    expect(result.rejected).toBe(0);
  });

  it('should abort the cycle on a transport error', async () => {
    await seedEntries(store, 1);
    transport.setConnected(false);

    const result = await dispatcher.runCycle();

    expect(result.outcome).toBe(CYCLE_OUTCOME.ABORTED);
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.failures[0]?.error).toBe('Network error or server unavailable');
  });

  it('should mark a refused batch rejected and keep going', async () => {
    const entries = await seedEntries(store, 25);
    transport.enqueue('POST', DATA, { status: 400 });
    const failed: Array<BatchInfo & { error: string }> = [];
    emitter.on(SYNC_EVENT.BATCH_FAILED, info => {
      failed.push(info);
    });

    const result = await dispatcher.runCycle();

    expect(transport.requests).toHaveLength(2);
    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.PARTIAL, synced: 5, rejected: 20 });
    expect((await store.get(entries[0]?.id ?? ''))?.rejected).toBe(true);
    expect(failed).toEqual([
      { type: BATCH_TYPE.DATA, size: 20, entryIds: entries.slice(0, 20).map(entry => entry.id), error: 'Server rejected DATA batch with 400' },
    ]);
  });

  it('should not resend rejected entries', async () => {
    await seedEntries(store, 2);
    transport.enqueue('POST', DATA, { status: 422 });
    await dispatcher.runCycle();

    const result = await dispatcher.runCycle();

    expect(transport.requests).toHaveLength(1);
    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, batches: 0, held: 0 });
  });

  it('should apply per-entry failures reported by syncId', async () => {
    const entries = await seedEntries(store, 3);
    const failing = entries[1]?.id ?? '';
    transport.route('POST', DATA, { status: 200, data: { failed: [{ syncId: failing, error: 'Validation failed' }] } });

    const result = await dispatcher.runCycle();

    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.PARTIAL, synced: 2, failed: 1, rejected: 0 });
    expect(await store.get(failing)).toMatchObject({ synced: false, retryCount: 1, lastError: 'Validation failed' });
    expect(await store.countPending()).toBe(1);
    expect(result.partialBatches).toHaveLength(1);
    expect(result.partialBatches[0]).toBeInstanceOf(PartialBatchFailure);
    expect(result.partialBatches[0]?.message).toBe('1 of 3 entries in DATA batch failed');
    expect(result.partialBatches[0]?.failedIds).toEqual([failing]);
  });

  it('should match reported failures by entity when no syncId is given', async () => {
    await seedEntries(store, 3);
    transport.route('POST', DATA, {
      status: 200,
      data: { failed: [{ entityType: 'order', entityId: 'order-2', retryable: false }] },
    });

    const result = await dispatcher.runCycle();

    expect(result).toMatchObject({ synced: 2, rejected: 1 });
    expect(result.failures).toEqual([
      expect.objectContaining({ entityId: 'order-2', error: 'Rejected by server', rejected: true }),
    ]);
  });

  it('should treat an unrecognized success body as full acceptance', async () => {
    await seedEntries(store, 2);
    transport.route('POST', DATA, { status: 200, data: { failed: 'nope' } });

    const result = await dispatcher.runCycle();

    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, synced: 2 });
  });

  it('should hold entries that ran out of attempts until a recovery pass', async () => {
    const [entry] = await seedEntries(store, 1);
    const id = entry?.id ?? '';
    for (let i = 0; i < 3; i++) {
      await store.incrementRetry(id, 'HTTP 500');
    }

    const normal = await dispatcher.runCycle();
    expect(normal).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, batches: 0, held: 1 });

    const recovery = await dispatcher.runCycle({ includeExhausted: true });
    expect(recovery).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, synced: 1, held: 0 });
    expect(syncIdsOf(transport.requests[0])).toEqual([id]);
  });

  it('should try an exhausted entry again once the recheck interval has passed', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T08:00:00.000Z'));
    const [entry] = await seedEntries(store, 1);
    const id = entry?.id ?? '';
    for (let i = 0; i < 3; i++) {
      await store.incrementRetry(id, 'HTTP 500');
    }

    vi.setSystemTime(new Date('2024-03-01T08:59:59.999Z'));
    expect(await dispatcher.runCycle()).toMatchObject({ batches: 0, held: 1 });

    vi.setSystemTime(new Date('2024-03-01T09:00:00.000Z'));
    const due = await dispatcher.runCycle();

    expect(due).toMatchObject({ outcome: CYCLE_OUTCOME.COMPLETED, synced: 1, held: 0 });
    expect(syncIdsOf(transport.requests[0])).toEqual([id]);
  });

  it('should skip a pass requested while one is running', async () => {
    await seedEntries(store, 1);
    const gate = createDeferred<void>();
    transport.route('POST', DATA, async () => {
      await gate.promise;
      return { status: 200 };
    });

    const first = dispatcher.runCycle();
    await vi.waitFor(() => expect(transport.requests).toHaveLength(1));
    const second = await dispatcher.runCycle();
    gate.resolve();

    expect(second.outcome).toBe(CYCLE_OUTCOME.SKIPPED);
    expect((await first).outcome).toBe(CYCLE_OUTCOME.COMPLETED);
    expect(dispatcher.isRunning).toBe(false);
  });

  it('should stop between batches when asked', async () => {
    await seedEntries(store, 45);
    let sent = 0;
    emitter.on(SYNC_EVENT.BATCH_SENT, () => {
      sent++;
    });

    const result = await dispatcher.runCycle({ shouldContinue: () => sent < 1 });

    expect(result).toMatchObject({ outcome: CYCLE_OUTCOME.STOPPED, batches: 1, synced: 20 });
    expect(await store.countPending()).toBe(25);
  });

  it('should time out a batch that never answers', async () => {
    vi.useFakeTimers();
    await seedEntries(store, 1);
    const never = createDeferred<{ status: number }>();
    transport.route('POST', DATA, () => never.promise);

    const pending = dispatcher.runCycle();
    await vi.advanceTimersByTimeAsync(60_000);
    const result = await pending;

    expect(result.outcome).toBe(CYCLE_OUTCOME.ABORTED);
    expect(result.error?.message).toBe('DATA batch upload timed out after 60000ms');
  });

  it('should abort when the log cannot be read', async () => {
    storage.setAvailable(false);

    const result = await dispatcher.runCycle();

    expect(result.outcome).toBe(CYCLE_OUTCOME.ABORTED);
    expect(result.error?.name).toBe('PersistenceError');
  });
});
