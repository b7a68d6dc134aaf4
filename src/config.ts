/**
 * Engine configuration: defaults, validation and resolution
 */

import { z } from 'zod';
import type {
  BackgroundTaskRunner,
  ConnectivityAdapter,
  EntityRemover,
  MaybePromise,
  StorageAdapter,
  TransportAdapter,
} from './interfaces';
import { createLogger, type LogLevel, type Logger } from './logger';
import { ConfigurationError } from './errors';

export const STORAGE_KEYS = {
  SYNC_LOGS: 'sync_logs',
  SYNC_ERRORS: 'sync_errors',
  CHECKPOINT_PREFIX: 'sync_checkpoint:',
  BACKGROUND_SYNC_ENABLED: 'background_sync_enabled',
} as const;

export const BACKGROUND_TASK_NAME = 'background_sync_task';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const positive = z.number().int().positive();
const nonNegative = z.number().int().nonnegative();
const endpoint = z.string().min(1).startsWith('/');

const tunablesSchema = z
  .object({
    autoStart: z.boolean().default(true),
    enableBackgroundSync: z.boolean().default(true),
    enableDebugLogs: z.boolean().default(false),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),

    // Scheduling (ms)
    syncInterval: positive.default(5 * MINUTE),
    initialSyncDelay: nonNegative.default(3 * SECOND),
    backgroundSyncInterval: positive.default(HOUR),
    backgroundMinSpacing: positive.default(15 * MINUTE),
    connectivityDebounce: nonNegative.default(2 * SECOND),
    degradedGracePeriod: nonNegative.default(30 * SECOND),
    recoveryTimeout: positive.default(10 * MINUTE),

    // Retention (ms)
    syncedRetention: positive.default(7 * DAY),
    offlineRetention: positive.default(7 * DAY),
    maxIncrementalSyncAge: positive.default(7 * DAY),

    // Batching
    maxDataBatchSize: positive.default(20),
    maxFileBatchSize: positive.default(5),

    retry: z
      .object({
        maxAttempts: positive.default(3),
        baseDelay: positive.default(30 * SECOND),
        maxDelay: positive.default(8 * MINUTE),
        maxAbsoluteFailures: positive.default(10),
        recheckInterval: positive.default(HOUR),
      })
      .default({}),

    timeouts: z
      .object({
        download: positive.default(30 * SECOND),
        upload: positive.default(60 * SECOND),
        fileUpload: positive.default(120 * SECOND),
      })
      .default({}),

    endpoints: z
      .object({
        data: endpoint.default('/sync/batch'),
        files: endpoint.default('/sync/files'),
        errors: endpoint.default('/sync/errors'),
      })
      .default({}),

    errorReporting: z
      .object({
        enabled: z.boolean().default(false),
        batchSize: positive.default(10),
        maxRecords: positive.default(100),
      })
      .default({}),
  })
  .superRefine((value, ctx) => {
    if (value.retry.maxDelay < value.retry.baseDelay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelay'],
        message: 'must be greater than or equal to retry.baseDelay',
      });
    }
  });

export type SyncTunables = z.output<typeof tunablesSchema>;
export type SyncTunablesInput = z.input<typeof tunablesSchema>;

export interface SyncCollaborators {
  storage: StorageAdapter;
  transport: TransportAdapter;
  connectivity: ConnectivityAdapter;
  /** Required when download strategies report deletions */
  entityRemover?: EntityRemover;
  /** Defaults to an in-process interval runner */
  backgroundRunner?: BackgroundTaskRunner;
  logger?: Logger;
  /** Cycles are skipped while this resolves false */
  isAuthenticated?: () => MaybePromise<boolean>;
}

export type SyncEngineConfig = SyncCollaborators & SyncTunablesInput;

export interface ResolvedSyncConfig extends SyncTunables {
  storage: StorageAdapter;
  transport: TransportAdapter;
  connectivity: ConnectivityAdapter;
  entityRemover?: EntityRemover;
  backgroundRunner?: BackgroundTaskRunner;
  isAuthenticated?: () => MaybePromise<boolean>;
  logger: Logger;
}

export const DEFAULT_SYNC_CONFIG: SyncTunables = tunablesSchema.parse({});

/**
 * Validate tunables and fill defaults. Throws ConfigurationError listing every issue.
 */
export function resolveConfig(config: SyncEngineConfig): ResolvedSyncConfig {
  const missing = (['storage', 'transport', 'connectivity'] as const).filter(key => !config[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required collaborator(s): ${missing.join(', ')}`,
      missing.map(key => `${key}: required`)
    );
  }

  const parsed = tunablesSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid sync configuration: ${issues.join('; ')}`, issues);
  }

  const tunables = parsed.data;
  const level: LogLevel = tunables.logLevel ?? (tunables.enableDebugLogs ? 'debug' : 'info');

  const resolved: ResolvedSyncConfig = {
    ...tunables,
    storage: config.storage,
    transport: config.transport,
    connectivity: config.connectivity,
    logger: config.logger ?? createLogger('OfflineSync', { level }),
  };

  if (config.entityRemover) resolved.entityRemover = config.entityRemover;
  if (config.backgroundRunner) resolved.backgroundRunner = config.backgroundRunner;
  if (config.isAuthenticated) resolved.isAuthenticated = config.isAuthenticated;

  return resolved;
}
