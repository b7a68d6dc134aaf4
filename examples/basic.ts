/**
 * Basic example showing how to use the sync engine
 */

import { z } from 'zod';
import {
  SyncEngine,
  MemoryStorageAdapter,
  MockTransportAdapter,
  ManualConnectivityAdapter,
  SYNC_EVENT,
  SYNC_OPERATION,
  type DownloadResult,
  type DownloadStrategy,
  type EntityRemover,
} from '../src/index';

const batchSchema = z.object({
  logs: z.array(
    z.object({
      syncId: z.string(),
      entityType: z.string(),
      operation: z.string(),
      data: z.record(z.unknown()),
    })
  ),
});

const catalog: DownloadStrategy = {
  name: 'catalog',
  async downloadData(lastSyncTimestamp?: number): Promise<DownloadResult> {
    const isIncremental = lastSyncTimestamp !== undefined;
    return {
      success: true,
      message: isIncremental ? 'Catalog changes applied' : 'Catalog downloaded',
      itemsDownloaded: isIncremental ? 1 : 12,
      isIncremental,
      deletedEntities: isIncremental ? { product: ['p-7'] } : undefined,
    };
  },
};

const remover: EntityRemover = {
  async removeEntities(entityType, ids) {
    console.log(`🗑️  Removed ${ids.length} ${entityType} record(s):`, ids.join(', '));
  },
};

async function basicExample(): Promise<void> {
  console.log('🚀 Starting Basic Sync Engine Example\n');

  // Create adapters
  const storage = new MemoryStorageAdapter();
  const connectivity = new ManualConnectivityAdapter(true);
  const transport = new MockTransportAdapter({ delay: 100 });

  // The server accepts everything except orders without a total
  transport.route('POST', '/sync/batch', request => {
    const { logs } = batchSchema.parse(request.body);
    const failed = logs
      .filter(log => log.entityType === 'order' && log.operation !== SYNC_OPERATION.DELETE && !('total' in log.data))
      .map(log => ({ syncId: log.syncId, error: 'total is required', retryable: false }));
    return { status: 200, data: { failed } };
  });

  // Create sync engine
  const syncEngine = new SyncEngine();

  // Set up event listeners
  syncEngine.onStatusChange(snapshot => {
    console.log(`📶 Status: ${snapshot.status} (${snapshot.pendingCount} pending) ${snapshot.message ?? ''}`);
  });

  syncEngine.on(SYNC_EVENT.CYCLE_STARTED, ({ trigger }) => {
    console.log(`🔄 ${trigger} sync started`);
  });

  syncEngine.on(SYNC_EVENT.BATCH_SENT, ({ type, size }) => {
    console.log(`📤 ${type} batch of ${size} sent`);
  });

  syncEngine.on(SYNC_EVENT.BATCH_FAILED, ({ type, error }) => {
    console.log(`❌ ${type} batch failed:`, error);
  });

  syncEngine.on(SYNC_EVENT.CYCLE_COMPLETED, report => {
    console.log(`✅ ${report.trigger} sync ${report.outcome}: ${report.dispatch?.synced ?? 0} synced`);
  });

  syncEngine.on(SYNC_EVENT.DOWNLOAD_COMPLETED, outcome => {
    console.log(`📥 ${outcome.strategy}: ${outcome.itemsDownloaded} item(s)`);
  });

  syncEngine.on(SYNC_EVENT.CONNECTION_ONLINE, () => {
    console.log('🌐 Connection: ONLINE');
  });

  syncEngine.on(SYNC_EVENT.CONNECTION_OFFLINE, () => {
    console.log('📴 Connection: OFFLINE');
  });

  // Start the sync engine
  console.log('Initializing sync engine...');
  await syncEngine.initialize(
    {
      storage,
      transport,
      connectivity,
      entityRemover: remover,
      autoStart: false,
      enableBackgroundSync: false,
    },
    [catalog]
  );

  // Record some mutations
  console.log('\n📝 Logging mutations...');
  await syncEngine.logCreate({ entityType: 'order', entityId: 'o-1', data: { total: 42 } });
  await syncEngine.logUpdate({ entityType: 'order', entityId: 'o-1', data: { total: 40, note: 'discount' } });
  await syncEngine.logCreate({ entityType: 'order', entityId: 'o-2', data: { items: 3 } });
  await syncEngine.logBatch({
    entityType: 'visit',
    operation: SYNC_OPERATION.CREATE,
    items: [
      { entityId: 'v-1', data: { customer: 'c-1' } },
      { entityId: 'v-2', data: { customer: 'c-2' } },
    ],
  });

  console.log('\n📊 Log statistics:', await syncEngine.getStatistics());

  // Manually trigger sync
  console.log('\n🔄 Manually triggering sync...');
  await syncEngine.forceSync();

  // Go offline, keep working, come back
  console.log('\n📴 Dropping connection...');
  connectivity.setConnected(false);
  await syncEngine.logDelete({ entityType: 'visit', entityId: 'v-2' });
  console.log(`Pending while offline: ${await syncEngine.getPendingCount()}`);

  connectivity.setConnected(true);
  await syncEngine.forceSync();

  console.log('\n📊 Final status:');
  console.log(syncEngine.getStatus());
  console.log('Rejected by server:', (await syncEngine.getErrorRecords()).map(record => record.message));

  // Stop the sync engine
  console.log('\n🛑 Shutting down sync engine...');
  await syncEngine.shutdown();

  console.log('\n✨ Example completed!');
}

// Run the example
basicExample().catch(console.error);
