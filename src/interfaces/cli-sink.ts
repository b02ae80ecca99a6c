/**
 * CLI Notification Sink
 *
 * Prints reminders above the prompt.
 */

import type { NotificationSink, NotificationMetadata } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('cli-sink');

const PREFIXES: Record<NotificationMetadata['type'], string> = {
  medication: '\x1b[33m💊\x1b[0m',
  appointment: '\x1b[33m📅\x1b[0m',
  refill: '\x1b[33m📦\x1b[0m',
};

export class CLINotificationSink implements NotificationSink {
  private available: boolean = true;
  private write: (line: string) => void;
  private afterPrint: () => void;

  /**
   * @param afterPrint - called after each notification, e.g. to redraw the prompt
   */
  constructor(options?: { write?: (line: string) => void; afterPrint?: () => void }) {
    this.write = options?.write ?? ((line) => {
      // Clear current line first (in case there's a prompt)
      process.stdout.write('\r\x1b[K');
      console.log(line);
    });
    this.afterPrint = options?.afterPrint ?? (() => undefined);
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  async send(message: string, metadata?: NotificationMetadata): Promise<boolean> {
    if (!this.available) {
      logger.debug('CLI sink not available, skipping notification');
      return false;
    }

    const prefix = metadata ? PREFIXES[metadata.type] : '\x1b[33m🔔\x1b[0m';
    this.write(`\n${prefix} ${message}\n`);
    this.afterPrint();

    logger.debug('Notification sent via CLI', { type: metadata?.type });
    return true;
  }

  isAvailable(): boolean {
    return this.available;
  }
}
