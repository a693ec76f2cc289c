import axios from 'axios';
import { NotificationChannel } from './notification.interface';

export type WebhookFormat = 'text' | 'discord';

/** Request body per chat flavour: plain-text bots or a Discord webhook. */
export const webhookBody = (format: WebhookFormat, text: string): Record<string, unknown> =>
  format === 'discord' ? { content: text } : { msgtype: 'text', text: { content: text } };

export class WebhookChannel implements NotificationChannel {
  readonly name = 'webhook';

  constructor(
    private readonly url: string,
    private readonly format: WebhookFormat,
    private readonly timeoutMs: number,
  ) {}

  async send(text: string): Promise<void> {
    await axios.post(this.url, webhookBody(this.format, text), { timeout: this.timeoutMs });
  }
}
