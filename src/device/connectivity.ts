/**
 * Connectivity Monitor
 *
 * Tracks whether the cloud endpoint is reachable. `isConnected()` is a
 * synchronous read of the last probe; probes run on start() and then on a
 * fixed interval. Any HTTP answer, whatever its status, counts as reachable.
 */

import { EventEmitter } from 'events';
import { config } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeout.js';
import type { ConnectivityCapability } from '../agent/router/types.js';

const logger = createLogger('device:connectivity');

export type ConnectivityEvent = 'online' | 'offline';

export interface ConnectivityMonitorConfig {
  probeUrl: string;
  intervalMs: number;
  timeoutMs: number;
}

export interface ConnectivityStatus {
  connected: boolean;
  lastCheckedAt: Date | null;
  error?: string;
}

const DEFAULT_CONFIG: ConnectivityMonitorConfig = {
  probeUrl: config.connectivity.probeUrl,
  intervalMs: config.connectivity.intervalMs,
  timeoutMs: TIMEOUTS.CONNECTIVITY_PROBE,
};

export class ConnectivityMonitor extends EventEmitter implements ConnectivityCapability {
  private config: ConnectivityMonitorConfig;
  // Assume online until the first probe says otherwise
  private status: ConnectivityStatus = { connected: true, lastCheckedAt: null };
  private checkInterval: NodeJS.Timeout | null = null;
  private pending: Promise<ConnectivityStatus> | null = null;

  constructor(config?: Partial<ConnectivityMonitorConfig>) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isConnected(): boolean {
    return this.status.connected;
  }

  getStatus(): ConnectivityStatus {
    return { ...this.status };
  }

  /**
   * One HEAD request. Resolves; never rejects.
   */
  async probe(): Promise<ConnectivityStatus> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      await fetch(this.config.probeUrl, { method: 'HEAD', signal: controller.signal });
      return { connected: true, lastCheckedAt: new Date() };
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'AbortError'
          ? `Probe timed out after ${this.config.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : 'Connection failed';
      return { connected: false, lastCheckedAt: new Date(), error: message };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Probes and stores the result, emitting 'online' / 'offline' on change.
   * Overlapping calls share one probe.
   */
  async checkAndUpdate(): Promise<ConnectivityStatus> {
    if (!this.pending) {
      this.pending = this.probe()
        .then((next) => {
          this.apply(next);
          return next;
        })
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }

  start(): void {
    if (this.checkInterval) {
      return;
    }

    this.runCheck();
    this.checkInterval = setInterval(() => this.runCheck(), this.config.intervalMs);
    // Does not keep the process alive on its own
    this.checkInterval.unref();

    logger.debug(`Connectivity monitor started (interval: ${this.config.intervalMs}ms)`);
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
    logger.debug('Connectivity monitor stopped');
  }

  private runCheck(): void {
    this.checkAndUpdate().catch((error: unknown) => {
      logger.error('connectivity_check_failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
  }

  private apply(next: ConnectivityStatus): void {
    const wasConnected = this.status.connected;
    this.status = next;

    if (!wasConnected && next.connected) {
      logger.info('connectivity_online', { probe_url: this.config.probeUrl });
      this.emit('online');
    } else if (wasConnected && !next.connected) {
      logger.warn('connectivity_offline', { probe_url: this.config.probeUrl, error: next.error });
      this.emit('offline');
    }
  }
}
