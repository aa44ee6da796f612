import type { Logger } from 'pino';
import type { AccountingLogEvent, LogEvent } from '../../domain/index.js';
import { SinkDeliveryFailedError } from '../../domain/index.js';
import type { Deliver, DeliveryResult } from './dispatcher.js';

/** HTTP status the webhook uses to ask callers to slow down. */
const RATE_LIMITED_STATUS = 429;

export interface WebhookConfig {
  url: string;
  username?: string | undefined;
  channel?: string | undefined;
}

export type AttachmentColor = 'good' | 'warning' | 'danger';

export interface SlackAttachment {
  fallback: string;
  color?: AttachmentColor;
  title: string;
  text?: string;
}

/** Body of a Slack-compatible incoming webhook request. */
export interface SlackMessage {
  text: string;
  username?: string;
  channel?: string;
  attachments?: SlackAttachment[];
}

const ACCOUNTING_STATES: Readonly<Record<string, string>> = {
  Q: 'queued',
  S: 'started',
  E: 'exited',
  D: 'deleted',
  A: 'aborted',
  R: 'rerun',
  C: 'checkpointed',
  T: 'restarted',
};

/** Escapes the characters Slack treats as control sequences. */
export function escapeSlackText(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function summarize(event: LogEvent): string {
  switch (event.source) {
    case 'server':
      return `[${event.timestamp}] ${event.section} ${event.about}: ${event.message}`;
    case 'accounting': {
      const state = ACCOUNTING_STATES[event.state] ?? `state ${event.state}`;
      const props = Object.entries(event.properties)
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');
      return `[${event.timestamp}] Job ${event.jobId} ${state}${props ? ` (${props})` : ''}`;
    }
  }
}

/**
 * Colour of an accounting record: finished or started jobs are good,
 * a non-zero exit status, abort or deletion is danger, reruns and
 * restarts are warnings. Other states carry no colour.
 */
export function accountingColor(event: AccountingLogEvent): AttachmentColor | undefined {
  switch (event.state) {
    case 'S':
      return 'good';
    case 'E': {
      const exitStatus = event.properties['Exit_status'];
      return exitStatus === undefined || exitStatus === '0' ? 'good' : 'danger';
    }
    case 'A':
    case 'D':
      return 'danger';
    case 'R':
    case 'T':
      return 'warning';
    default:
      return undefined;
  }
}

function accountingAttachment(event: AccountingLogEvent, fallback: string): SlackAttachment {
  const attachment: SlackAttachment = {
    fallback,
    title: escapeSlackText(`Job ${event.jobId}`),
  };
  const color = accountingColor(event);
  if (color) attachment.color = color;
  const props = Object.entries(event.properties).map(([key, value]) => `${key}: ${value}`);
  if (props.length > 0) attachment.text = escapeSlackText(props.join('\n'));
  return attachment;
}

export function formatSlackMessage(event: LogEvent, config: WebhookConfig): SlackMessage {
  const text = escapeSlackText(summarize(event));
  const message: SlackMessage = { text };
  if (config.username) message.username = config.username;
  if (config.channel) message.channel = config.channel;
  if (event.source === 'accounting') message.attachments = [accountingAttachment(event, text)];
  return message;
}

/**
 * Reads a `Retry-After` header as whole seconds. Both the delay form
 * (`120`) and the HTTP-date form are accepted; a date is counted from
 * `now`. Missing, unreadable or past values count as 0.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number {
  if (header === null) return 0;
  const value = header.trim();
  if (/^\d+$/.test(value)) return Number(value);

  const at = Date.parse(value);
  if (Number.isNaN(at)) return 0;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

/**
 * Creates the sink that POSTs each event to a Slack-compatible webhook.
 *
 * 2xx is a delivery, 429 a rate-limit signal carrying `Retry-After`,
 * anything else (or a network error) a failure. Never throws.
 */
export function createWebhookSink(config: WebhookConfig, log: Logger): Deliver {
  return async (event: LogEvent): Promise<DeliveryResult> => {
    const body = JSON.stringify(formatSlackMessage(event, config));
    log.info({ source: event.source, timestamp: event.timestamp }, 'Posting event to webhook');

    let response: Response;
    try {
      response = await fetch(config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
      });
    } catch (err: unknown) {
      return {
        status: 'failed',
        error: new SinkDeliveryFailedError('Webhook request failed', undefined, { cause: err }),
      };
    }

    if (response.ok) {
      return { status: 'delivered' };
    }

    if (response.status === RATE_LIMITED_STATUS) {
      return {
        status: 'rate_limited',
        retryAfterSeconds: parseRetryAfter(response.headers.get('Retry-After')),
      };
    }

    return {
      status: 'failed',
      error: new SinkDeliveryFailedError(
        `Webhook returned HTTP ${response.status}`,
        response.status,
      ),
    };
  };
}
