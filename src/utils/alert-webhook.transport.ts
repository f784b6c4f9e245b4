import Transport from 'winston-transport';
import axios from 'axios';

export interface AlertWebhookTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

export interface AlertLogEntry {
  level: string;
  message: unknown;
  timestamp?: string;
  logpath?: string;
  function?: string;
  [key: string]: unknown;
}

interface WebhookEmbed {
  title: string;
  description: string;
  color: number;
  fields: Array<{ name: string; value: string; inline: boolean }>;
  footer: { text: string };
}

export interface WebhookPayload {
  username: string;
  embeds: WebhookEmbed[];
}

const FORWARDED_LEVELS = new Set(['error', 'notify']);

export function buildWebhookPayload(info: AlertLogEntry): WebhookPayload {
  let color: number;
  let title: string;
  let footerText: string;

  switch (info.level) {
    case 'error':
      color = 15158332; // Red
      title = `🚨 ${info.level.toUpperCase()}: ${info.function || 'Unknown Context'}`;
      footerText = 'System Alert';
      break;
    case 'notify':
      color = 16744192; // Orange
      title = `🔥 WILDFIRE ALERT: ${info.function || 'Event Detection'}`;
      footerText = 'Suspicious Event';
      break;
    default:
      color = 10070709; // Grey
      title = `📢 LOG: ${info.level.toUpperCase()}`;
      footerText = 'System Log';
      break;
  }

  return {
    username: 'Wildfire Event Detector',
    embeds: [
      {
        title,
        description: `**Message:**\n${String(info.message)}`,
        color,
        fields: [
          { name: '📍 Source', value: info.logpath || 'unknown:0', inline: true },
          { name: '🕒 Time', value: info.timestamp || new Date().toISOString(), inline: true }
        ],
        footer: { text: footerText }
      }
    ]
  };
}

/**
 * Forwards `error` and `notify` entries to a Discord-compatible webhook.
 */
export class AlertWebhookTransport extends Transport {
  private readonly webhookUrl: string;

  constructor(opts: AlertWebhookTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: AlertLogEntry, callback: () => void): void {
    setImmediate(() => {
      this.emit('logged', info);
    });

    if (this.webhookUrl && FORWARDED_LEVELS.has(info.level)) {
      void this.send(info);
    }

    callback();
  }

  async send(info: AlertLogEntry): Promise<void> {
    try {
      await axios.post(this.webhookUrl, buildWebhookPayload(info));
    } catch (error) {
      // Not routed through the logger: a failing webhook would log itself forever
      console.error('Failed to deliver log entry to alert webhook:', error instanceof Error ? error.message : error);
    }
  }
}
