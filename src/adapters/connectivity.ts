/**
 * Connectivity adapters: a manually driven one and a health-check poller
 */

import type { ConnectivityAdapter, TransportAdapter } from '../interfaces';
import type { ConnectivityStatus } from '../types';
import { CONNECTIVITY_TRANSPORT } from '../enums';
import { classifyStatus, errorMessage } from '../errors';
import { createLogger, type Logger } from '../logger';

type ConnectivityListener = (status: ConnectivityStatus) => void;

function offlineStatus(): ConnectivityStatus {
  return { connected: false, transport: CONNECTIVITY_TRANSPORT.NONE };
}

abstract class ListenerSet {
  protected readonly listeners = new Set<ConnectivityListener>();

  constructor(protected readonly logger: Logger) {}

  onChange(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected notify(status: ConnectivityStatus): void {
    for (const listener of [...this.listeners]) {
      try {
        listener({ ...status });
      } catch (error) {
        this.logger.error('Connectivity listener failed', error);
      }
    }
  }
}

/**
 * Connectivity driven by the host application (or a test)
 */
export class ManualConnectivityAdapter extends ListenerSet implements ConnectivityAdapter {
  private status: ConnectivityStatus;

  constructor(initial: boolean | ConnectivityStatus = true, logger: Logger = createLogger('ManualConnectivity')) {
    super(logger);
    this.status =
      typeof initial === 'boolean'
        ? initial
          ? { connected: true, transport: CONNECTIVITY_TRANSPORT.WIFI }
          : offlineStatus()
        : { ...initial };
  }

  async getStatus(): Promise<ConnectivityStatus> {
    return { ...this.status };
  }

  setStatus(status: ConnectivityStatus): void {
    this.status = { ...status };
    this.notify(this.status);
  }

  setConnected(connected: boolean, transport: CONNECTIVITY_TRANSPORT = CONNECTIVITY_TRANSPORT.WIFI): void {
    this.setStatus(connected ? { connected, transport } : offlineStatus());
  }
}

export interface PollingConnectivityOptions {
  transport: TransportAdapter;
  healthPath?: string;
  /** Poll interval in ms */
  interval?: number;
  /** Health check timeout in ms */
  timeout?: number;
  logger?: Logger;
}

/**
 * Checks a health endpoint through the transport; polling starts with the
 * first subscriber and emits only when reachability flips.
 */
export class PollingConnectivityAdapter extends ListenerSet implements ConnectivityAdapter {
  private readonly options: Required<Omit<PollingConnectivityOptions, 'logger'>>;
  private timer: NodeJS.Timeout | undefined;
  private last: ConnectivityStatus | undefined;
  private checking = false;

  constructor(options: PollingConnectivityOptions) {
    super(options.logger ?? createLogger('PollingConnectivity'));
    this.options = {
      transport: options.transport,
      healthPath: options.healthPath ?? '/health',
      interval: options.interval ?? 10000,
      timeout: options.timeout ?? 5000,
    };
  }

  async getStatus(): Promise<ConnectivityStatus> {
    const status = await this.checkHealth();
    this.last = status;
    return { ...status };
  }

  override onChange(listener: ConnectivityListener): () => void {
    const unsubscribe = super.onChange(listener);
    if (!this.timer) {
      this.timer = setInterval(() => {
        void this.poll();
      }, this.options.interval);
      this.timer.unref();
    }
    return () => {
      unsubscribe();
      if (this.listeners.size === 0) this.close();
    };
  }

  close(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** One poll step: check and notify on change */
  async poll(): Promise<void> {
    if (this.checking) return;
    this.checking = true;
    try {
      const status = await this.checkHealth();
      const changed = this.last === undefined || this.last.connected !== status.connected;
      this.last = status;
      if (changed) this.notify(status);
    } finally {
      this.checking = false;
    }
  }

  private async checkHealth(): Promise<ConnectivityStatus> {
    try {
      const response = await this.options.transport.get(this.options.healthPath, { timeout: this.options.timeout });
      return classifyStatus(response.status) === 'ok'
        ? { connected: true, transport: CONNECTIVITY_TRANSPORT.UNKNOWN }
        : offlineStatus();
    } catch (error) {
      this.logger.debug(`Health check failed: ${errorMessage(error)}`);
      return offlineStatus();
    }
  }
}
