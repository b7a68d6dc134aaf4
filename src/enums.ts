/**
 * Enumeration for sync lifecycle statuses
 */
export enum SYNC_STATUS {
  IDLE = 'idle',
  SYNCING = 'syncing',
  SUCCESS = 'success',
  ERROR = 'error',
  OFFLINE = 'offline',
  DEGRADED = 'degraded',
  RECOVERY = 'recovery',
}

/**
 * Enumeration for logged mutation kinds
 */
export enum SYNC_OPERATION {
  CREATE = 'create',
  UPDATE = 'update',
  DELETE = 'delete',
}

/**
 * Enumeration for upload batch kinds
 */
export enum BATCH_TYPE {
  DATA = 'DATA',
  FILES = 'FILES',
}

/**
 * Enumeration for network transports reported by connectivity adapters
 */
export enum CONNECTIVITY_TRANSPORT {
  WIFI = 'wifi',
  MOBILE = 'mobile',
  ETHERNET = 'ethernet',
  UNKNOWN = 'unknown',
  NONE = 'none',
}

/**
 * Enumeration for what started a sync cycle
 */
export enum SYNC_TRIGGER {
  INITIAL = 'initial',
  INTERVAL = 'interval',
  BACKGROUND = 'background',
  MANUAL = 'manual',
  CONNECTIVITY = 'connectivity',
  RETRY = 'retry',
  RECOVERY = 'recovery',
}

/**
 * Enumeration for the result of a dispatch cycle
 */
export enum CYCLE_OUTCOME {
  COMPLETED = 'completed',
  PARTIAL = 'partial',
  ABORTED = 'aborted',
  SKIPPED = 'skipped',
  STOPPED = 'stopped',
}

/**
 * Enumeration for sync event types
 */
export enum SYNC_EVENT {
  // Status events
  STATUS_CHANGED = 'status:changed',

  // Mutation log events
  MUTATION_LOGGED = 'mutation:logged',

  // Cycle events
  CYCLE_STARTED = 'cycle:started',
  CYCLE_COMPLETED = 'cycle:completed',
  CYCLE_SKIPPED = 'cycle:skipped',
  BATCH_SENT = 'batch:sent',
  BATCH_FAILED = 'batch:failed',
  RECOVERY_ENTERED = 'recovery:entered',

  // Download events
  DOWNLOAD_COMPLETED = 'download:completed',
  DOWNLOAD_FAILED = 'download:failed',

  // Connection events
  CONNECTION_ONLINE = 'connection:online',
  CONNECTION_OFFLINE = 'connection:offline',
}

/**
 * Enumeration for error codes carried by SyncError
 */
export enum ERROR_CODE {
  PERSISTENCE = 'PERSISTENCE_ERROR',
  TRANSPORT = 'TRANSPORT_ERROR',
  SERVER_REJECTION = 'SERVER_REJECTION',
  SERVER_ERROR = 'SERVER_ERROR',
  PARTIAL_BATCH_FAILURE = 'PARTIAL_BATCH_FAILURE',
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  RECOVERY_EXHAUSTED = 'RECOVERY_EXHAUSTED',
  CONFIGURATION = 'CONFIGURATION_ERROR',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  UNKNOWN = 'UNKNOWN_ERROR',
}
