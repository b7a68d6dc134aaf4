/**
 * Express.js backend example for the sync engine
 *
 * Implements the endpoints the engine talks to (data batches, file
 * batches, error reports, incremental downloads) on top of PostgreSQL.
 * Run with: npm run example:server
 */

import express, { type NextFunction, type Request, type Response as ExpressResponse } from 'express';
import { Pool, type PoolClient } from 'pg';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { z } from 'zod';
import { SYNC_OPERATION } from '../../src/enums';

const app = express();
const port = Number(process.env.PORT ?? 3000);

// Middleware
app.use(helmet());
app.use(compression());
app.use(
  cors({
    origin: process.env.CLIENT_ORIGIN ?? 'http://localhost:5173',
    credentials: true,
  })
);
app.use(express.json({ limit: '10mb' }));

// Database connection
const pool = new Pool({
  host: process.env.DB_HOST ?? 'localhost',
  port: Number(process.env.DB_PORT ?? 5432),
  database: process.env.DB_NAME ?? 'sync_engine',
  user: process.env.DB_USER ?? 'postgres',
  password: process.env.DB_PASSWORD ?? 'test-secret',
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

// Wire formats
const logSchema = z.object({
  syncId: z.string().min(1),
  entityType: z.string().min(1),
  entityId: z.string().min(1),
  operation: z.string(),
  data: z.unknown(),
  createdAt: z.string().datetime(),
});

const dataBatchSchema = z.object({
  type: z.literal('DATA'),
  logs: z.array(logSchema),
  timestamp: z.string(),
});

const fileLogSchema = logSchema.omit({ data: true }).extend({
  fileName: z.string(),
  contentType: z.string(),
});

const errorReportSchema = z.object({
  timestamp: z.string(),
  errors: z.array(
    z.object({
      id: z.string(),
      message: z.string(),
      code: z.string(),
      category: z.string(),
      entityType: z.string().optional(),
      entityId: z.string().optional(),
      metadata: z.record(z.unknown()).optional(),
      timestamp: z.string(),
    })
  ),
});

type SyncLog = z.infer<typeof logSchema>;

interface BatchFailure {
  syncId: string;
  error: string;
  retryable: boolean;
}

interface EntityRow {
  entity_id: string;
  data: Record<string, unknown>;
  deleted: boolean;
  updated_at: Date;
}

// Database schema
const initDB = async (): Promise<void> => {
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS entities (
        entity_type VARCHAR(100) NOT NULL,
        entity_id VARCHAR(255) NOT NULL,
        data JSONB NOT NULL DEFAULT '{}',
        deleted BOOLEAN NOT NULL DEFAULT FALSE,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (entity_type, entity_id)
      );

      CREATE TABLE IF NOT EXISTS applied_logs (
        sync_id VARCHAR(64) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS files (
        entity_type VARCHAR(100) NOT NULL,
        entity_id VARCHAR(255) NOT NULL,
        file_name VARCHAR(255) NOT NULL,
        content_type VARCHAR(100) NOT NULL,
        content BYTEA NOT NULL,
        uploaded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (entity_type, entity_id)
      );

      CREATE TABLE IF NOT EXISTS client_errors (
        id VARCHAR(64) PRIMARY KEY,
        code VARCHAR(64) NOT NULL,
        category VARCHAR(64) NOT NULL,
        message TEXT NOT NULL,
        entity_type VARCHAR(100),
        entity_id VARCHAR(255),
        metadata JSONB,
        occurred_at TIMESTAMPTZ NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_entities_updated_at
        ON entities(entity_type, updated_at);
    `);

    console.log('Database initialized successfully');
  } catch (error) {
    console.error('Database initialization failed:', error);
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Applies one log inside the caller's transaction. Replays of an already
 * applied syncId are acknowledged without touching the row again.
 */
const applyLog = async (client: PoolClient, log: SyncLog): Promise<BatchFailure | undefined> => {
  const applied = await client.query('INSERT INTO applied_logs (sync_id) VALUES ($1) ON CONFLICT DO NOTHING', [log.syncId]);
  if (applied.rowCount === 0) return undefined;

  if (log.operation === SYNC_OPERATION.DELETE) {
    await client.query(
      `INSERT INTO entities (entity_type, entity_id, deleted, updated_at)
       VALUES ($1, $2, TRUE, CURRENT_TIMESTAMP)
       ON CONFLICT (entity_type, entity_id)
       DO UPDATE SET deleted = TRUE, updated_at = CURRENT_TIMESTAMP`,
      [log.entityType, log.entityId]
    );
    return undefined;
  }

  if (log.operation !== SYNC_OPERATION.CREATE && log.operation !== SYNC_OPERATION.UPDATE) {
    return { syncId: log.syncId, error: `Unsupported operation: ${log.operation}`, retryable: false };
  }

  const data = z.record(z.unknown()).safeParse(log.data);
  if (!data.success) {
    return { syncId: log.syncId, error: 'data must be an object', retryable: false };
  }

  await client.query(
    `INSERT INTO entities (entity_type, entity_id, data, deleted, updated_at)
     VALUES ($1, $2, $3, FALSE, CURRENT_TIMESTAMP)
     ON CONFLICT (entity_type, entity_id)
     DO UPDATE SET data = entities.data || $3, deleted = FALSE, updated_at = CURRENT_TIMESTAMP`,
    [log.entityType, log.entityId, JSON.stringify(data.data)]
  );
  return undefined;
};

// Health check endpoint
app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({
      status: 'healthy',
      timestamp: Date.now(),
      database: 'connected',
    });
  } catch (error) {
    console.error('Health check failed:', error);
    res.status(503).json({
      status: 'unhealthy',
      error: 'Database connection failed',
      timestamp: Date.now(),
    });
  }
});

// Data batch endpoint - POST /sync/batch
app.post('/sync/batch', async (req, res, next) => {
  const parsed = dataBatchSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid batch', issues: parsed.error.issues });
    return;
  }

  const { logs } = parsed.data;
  console.log(`Data batch: ${logs.length} log(s)`);

  try {
    const client = await pool.connect();
    const failed: BatchFailure[] = [];

    try {
      await client.query('BEGIN');
      for (const log of logs) {
        await client.query('SAVEPOINT log');
        try {
          const failure = await applyLog(client, log);
          if (failure) {
            failed.push(failure);
            await client.query('ROLLBACK TO SAVEPOINT log');
          }
        } catch (error) {
          await client.query('ROLLBACK TO SAVEPOINT log');
          console.error(`Log ${log.syncId} failed:`, error);
          failed.push({ syncId: log.syncId, error: 'Could not apply change', retryable: true });
        }
      }
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }

    console.log(`Data batch applied: ${logs.length - failed.length} ok, ${failed.length} failed`);
    res.json({ failed });
  } catch (error) {
    next(error);
  }
});

// File batch endpoint - POST /sync/files (multipart: files, fileIds, logs)
app.post('/sync/files', express.raw({ type: 'multipart/form-data', limit: '50mb' }), async (req, res, next) => {
  try {
    const contentType = req.headers['content-type'];
    if (!Buffer.isBuffer(req.body) || !contentType) {
      res.status(400).json({ error: 'Expected a multipart/form-data body' });
      return;
    }

    const form = await new Response(req.body, { headers: { 'content-type': contentType } }).formData();
    const logsField = form.get('logs');
    const logs = z.array(fileLogSchema).safeParse(typeof logsField === 'string' ? JSON.parse(logsField) : undefined);
    const files = [];
    for (const value of form.getAll('files')) {
      if (typeof value !== 'string') files.push(value);
    }

    if (!logs.success || logs.data.length !== files.length) {
      res.status(400).json({ error: 'logs must describe every uploaded file' });
      return;
    }

    console.log(`File batch: ${files.length} file(s)`);
    const failed: BatchFailure[] = [];

    for (const [index, log] of logs.data.entries()) {
      const file = files[index];
      if (!file || file.size === 0) {
        failed.push({ syncId: log.syncId, error: 'Empty file', retryable: false });
        continue;
      }
      await pool.query(
        `INSERT INTO files (entity_type, entity_id, file_name, content_type, content)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (entity_type, entity_id)
         DO UPDATE SET file_name = $3, content_type = $4, content = $5, uploaded_at = CURRENT_TIMESTAMP`,
        [log.entityType, log.entityId, log.fileName, log.contentType, Buffer.from(await file.arrayBuffer())]
      );
    }

    res.json({ failed });
  } catch (error) {
    next(error);
  }
});

// Error report endpoint - POST /sync/errors
app.post('/sync/errors', async (req, res, next) => {
  const parsed = errorReportSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid error report' });
    return;
  }

  try {
    for (const record of parsed.data.errors) {
      await pool.query(
        `INSERT INTO client_errors (id, code, category, message, entity_type, entity_id, metadata, occurred_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (id) DO NOTHING`,
        [
          record.id,
          record.code,
          record.category,
          record.message,
          record.entityType ?? null,
          record.entityId ?? null,
          record.metadata ? JSON.stringify(record.metadata) : null,
          record.timestamp,
        ]
      );
    }
    console.log(`Stored ${parsed.data.errors.length} client error(s)`);
    res.status(202).json({ received: parsed.data.errors.length });
  } catch (error) {
    next(error);
  }
});

// Download endpoint - GET /sync/entities/:entityType?since=<ISO timestamp>
app.get('/sync/entities/:entityType', async (req, res, next) => {
  const since = z.string().datetime().optional().safeParse(req.query.since);
  if (!since.success) {
    res.status(400).json({ error: 'since must be an ISO timestamp' });
    return;
  }

  try {
    const { entityType } = req.params;
    const result = since.data
      ? await pool.query<EntityRow>(
          `SELECT entity_id, data, deleted, updated_at FROM entities
           WHERE entity_type = $1 AND updated_at > $2 ORDER BY updated_at ASC`,
          [entityType, since.data]
        )
      : await pool.query<EntityRow>(
          `SELECT entity_id, data, deleted, updated_at FROM entities
           WHERE entity_type = $1 AND deleted = FALSE ORDER BY updated_at ASC`,
          [entityType]
        );

    const items = result.rows.filter(row => !row.deleted).map(row => ({ id: row.entity_id, ...row.data }));
    const deleted = result.rows.filter(row => row.deleted).map(row => row.entity_id);

    res.json({
      items,
      deletedEntities: deleted.length > 0 ? { [entityType]: deleted } : {},
      isIncremental: since.data !== undefined,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    next(error);
  }
});

// Error handling middleware
app.use((error: unknown, _req: Request, res: ExpressResponse, _next: NextFunction) => {
  console.error('Unhandled error:', error);
  res.status(500).json({
    error: 'Internal server error',
    timestamp: Date.now(),
  });
});

// Start server
const startServer = async (): Promise<void> => {
  await initDB();

  app.listen(port, () => {
    console.log(`🚀 Sync server running on port ${port}`);
    console.log(`📊 Health check: http://localhost:${port}/health`);
    console.log(`📤 Data batches: http://localhost:${port}/sync/batch`);
    console.log(`📎 File batches: http://localhost:${port}/sync/files`);
    console.log(`📥 Downloads: http://localhost:${port}/sync/entities/:entityType`);
  });
};

// Graceful shutdown
const shutdown = (signal: string): void => {
  console.log(`${signal} received, shutting down gracefully...`);
  pool
    .end()
    .then(() => process.exit(0))
    .catch(error => {
      console.error('Failed to close the database pool:', error);
      process.exit(1);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

startServer().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
