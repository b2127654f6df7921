/**
 * Output channels for client logging.
 *
 * Hosts embedding the client (DCC plugins, farm jobs, services) usually own
 * their log window, so the client only writes lines into a channel they hand
 * over and never configures process-wide logging.
 */

export const LOG_PREFIX = '[TrackerApi]';

export interface LogChannel {
  appendLine(value: string): void;
}

export const consoleChannel: LogChannel = {
  appendLine(value: string): void {
    console.log(value);
  },
};

export const silentChannel: LogChannel = {
  appendLine(): void {
    // Dropped on purpose.
  },
};

/**
 * Channel keeping lines in memory, e.g. for a host UI panel
 */
export class MemoryChannel implements LogChannel {
  readonly lines: string[] = [];

  appendLine(value: string): void {
    this.lines.push(value);
  }

  clear(): void {
    this.lines.length = 0;
  }
}

export function logLine(channel: LogChannel, message: string): void {
  channel.appendLine(`${LOG_PREFIX} ${message}`);
}

export function trackEvent(
  channel: LogChannel,
  eventName: string,
  properties?: Record<string, unknown>
): void {
  const suffix = properties ? ` ${JSON.stringify(properties)}` : '';
  channel.appendLine(`${LOG_PREFIX} ${eventName}${suffix}`);
}
