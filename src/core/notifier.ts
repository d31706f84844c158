/**
 * ntfy notification module
 * Pushes availability and booking outcomes via ntfy.sh
 */

import type { NtfyConfig, NotificationMessage } from '../types/index.js';
import type { LogSink } from '../utils/logger.js';

/**
 * Notifier interface
 */
export interface Notifier {
  send(message: NotificationMessage): Promise<void>;
}

/**
 * Encode UTF-8 string for use in HTTP headers (RFC 2047)
 * Converts non-ASCII characters to encoded-word format
 */
export function encodeHeaderValue(value: string): string {
  // If value contains only ASCII characters, return as-is
  if (/^[\x00-\x7F]*$/.test(value)) {
    return value;
  }
  const base64 = Buffer.from(value, 'utf-8').toString('base64');
  return `=?utf-8?B?${base64}?=`;
}

/**
 * ntfy.sh implementation
 */
export class NtfyNotifier implements Notifier {
  constructor(
    private config: NtfyConfig & { topic: string },
    private logger: LogSink
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    const url = `${this.config.serverUrl}/${this.config.topic}`;

    const headers: Record<string, string> = {
      'Title': encodeHeaderValue(message.title),
      'Click': message.clickUrl,
      'Priority': this.config.priority,
    };

    if (this.config.tags.length > 0) {
      headers['Tags'] = this.config.tags.join(',');
    }

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/plain; charset=utf-8',
          ...headers,
        },
        body: message.body,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        throw new Error(`ntfy request failed: ${response.status} ${response.statusText} - ${errorText}`);
      }

      this.logger.info(`Notification sent to topic: ${this.config.topic}`);
    } catch (error) {
      this.logger.error('Failed to send notification', error);
      throw error;
    }
  }
}

/**
 * Used when no topic is configured
 */
export class SilentNotifier implements Notifier {
  async send(): Promise<void> {}
}

/**
 * Create a notifier for the configured topic, or a silent one
 */
export function createNotifier(config: NtfyConfig, logger: LogSink): Notifier {
  const { topic } = config;
  return topic ? new NtfyNotifier({ ...config, topic }, logger) : new SilentNotifier();
}
