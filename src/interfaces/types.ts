/**
 * Terminal host types.
 */

/**
 * Metadata for proactive notifications.
 */
export interface NotificationMetadata {
  type: 'medication' | 'appointment' | 'refill';
  /** Medication or appointment id */
  referenceId: string;
  priority?: 'normal' | 'high';
}

/**
 * Where reminders are delivered.
 */
export interface NotificationSink {
  /**
   * @returns true if the notification was shown
   */
  send(message: string, metadata?: NotificationMetadata): Promise<boolean>;

  /** Check if the sink can show notifications now */
  isAvailable(): boolean;
}

/**
 * Handles "/command args" input.
 */
export interface CommandHandler {
  /**
   * @param command - Command name without the slash, lower-cased
   * @returns Text to print, or null if the command is unknown
   */
  handle(command: string, args: string): Promise<string | null>;
}
