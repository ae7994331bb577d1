// Slack notifier
// Posts DriftGuard reports to an incoming webhook as Block Kit messages

import { env } from '../env.js';
import { createLogger } from '../logger.js';

const log = createLogger({ module: 'slack' });

export const TRUNCATION_MARKER = '\n...\n[Report truncated - see full details in logs]';

export class SlackNotConfiguredError extends Error {
  constructor() {
    super('Slack webhook URL not configured. Set SLACK_WEBHOOK_URL environment variable.');
    this.name = 'SlackNotConfiguredError';
  }
}

export class SlackDeliveryError extends Error {
  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SlackDeliveryError';
  }
}

interface SlackTextObject {
  type: 'plain_text' | 'mrkdwn';
  text: string;
}

type SlackBlock =
  | { type: 'header'; text: SlackTextObject }
  | { type: 'section'; text?: SlackTextObject; fields?: SlackTextObject[] };

export interface SlackPayload {
  text: string;
  blocks: SlackBlock[];
}

export interface SlackNotifierOptions {
  webhookUrl?: string;
  timeoutMs?: number;
  maxMessageLength?: number;
  title?: string;
  now?: () => Date;
}

/**
 * Formats a timestamp as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// Lengths are in code points so an emoji is never split
export function truncateForSlack(content: string, maxLength: number): string {
  const codePoints = Array.from(content);
  if (codePoints.length <= maxLength) {
    return content;
  }
  return codePoints.slice(0, maxLength).join('') + TRUNCATION_MARKER;
}

export class SlackNotifier {
  private webhookUrl: string;
  private timeoutMs: number;
  private maxMessageLength: number;
  private title: string;
  private now: () => Date;

  constructor(options: SlackNotifierOptions = {}) {
    this.webhookUrl = options.webhookUrl ?? env.SLACK_WEBHOOK_URL;
    this.timeoutMs = options.timeoutMs ?? env.SLACK_TIMEOUT_MS;
    this.maxMessageLength = options.maxMessageLength ?? env.SLACK_MAX_MESSAGE_LENGTH;
    this.title = options.title ?? '🔒 DriftGuard Report';
    this.now = options.now ?? (() => new Date());
  }

  get configured(): boolean {
    return this.webhookUrl.length > 0;
  }

  timestamp(): string {
    return formatTimestamp(this.now());
  }

  buildPayload(message: string): SlackPayload {
    return {
      text: this.title,
      blocks: [
        {
          type: 'header',
          text: { type: 'plain_text', text: this.title },
        },
        {
          type: 'section',
          fields: [
            { type: 'mrkdwn', text: `*Timestamp:* ${this.timestamp()}` },
            { type: 'mrkdwn', text: '*Source:* DriftGuard Assistant' },
          ],
        },
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text: '```\n' + truncateForSlack(message, this.maxMessageLength) + '\n```',
          },
        },
      ],
    };
  }

  /**
   * Delivers `message` to the webhook.
   * Throws SlackNotConfiguredError when no webhook is set, SlackDeliveryError otherwise.
   */
  async send(message: string, signal?: AbortSignal): Promise<void> {
    if (!this.configured) {
      throw new SlackNotConfiguredError();
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.buildPayload(message)),
        signal: combined,
      });
    } catch (error) {
      const reason = timeout.aborted ? `timed out after ${this.timeoutMs}ms` : 'network error';
      log.warn({ err: error, reason }, 'Slack delivery failed');
      throw new SlackDeliveryError(`Failed to reach Slack webhook (${reason})`, undefined, { cause: error });
    }

    if (!response.ok) {
      log.warn({ status: response.status }, 'Slack rejected message');
      throw new SlackDeliveryError(`Failed to send to Slack. Status: ${response.status}`, response.status);
    }

    log.info('Message sent to Slack');
  }
}
