import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import {
  NOTIFICATION_CHANNELS,
  NotificationChannel,
  NotificationEvent,
  NotificationKind,
} from './notification.interface';

const ICONS: Record<NotificationKind, string> = {
  closed: '💰',
  stopped_out: '🛑',
  unfilled: '⌛',
  close_cancelled: '⚠️',
  monitor_timeout: '⚠️',
  rejected: '❌',
  aborted: '💥',
  stopped_manually: '⏹️',
  skipped: '⏭️',
  missed: '⏰',
  failed: '💥',
};

export function formatNotification(event: NotificationEvent): string {
  const lines = [`${ICONS[event.kind]} [${event.exchange.toUpperCase()}] ${event.symbol}: ${event.kind}`, event.message];
  for (const [key, value] of Object.entries(event.details ?? {})) {
    if (value !== undefined) {
      lines.push(`${key}: ${value}`);
    }
  }
  return lines.join('\n');
}

/** Longest wait for in-flight messages when the application shuts down. */
export const NOTIFICATION_DRAIN_MS = 10_000;

/**
 * Side channel for cycle outcomes. Delivery runs in the background and a
 * failing channel is only logged. Messages still in flight at shutdown are
 * awaited, up to NOTIFICATION_DRAIN_MS.
 */
@Injectable()
export class NotificationService implements OnApplicationShutdown {
  private readonly logger = new Logger(NotificationService.name);
  private readonly pending = new Set<Promise<void>>();

  constructor(@Inject(NOTIFICATION_CHANNELS) private readonly channels: NotificationChannel[]) {}

  notify(event: NotificationEvent): void {
    const delivery: Promise<void> = this.deliver(event).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Waits for in-flight deliveries. Resolves false when the time limit ran out first. */
  async flush(timeoutMs: number = NOTIFICATION_DRAIN_MS): Promise<boolean> {
    if (this.pending.size === 0) {
      return true;
    }
    this.logger.log(`📨 Waiting for ${this.pending.size} notification(s) to be delivered`);
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const drained = Promise.all([...this.pending]).then(() => true);
    try {
      const done = await Promise.race([drained, timedOut]);
      if (!done) {
        this.logger.warn(`⌛ ${this.pending.size} notification(s) still pending after ${timeoutMs}ms`);
      }
      return done;
    } finally {
      clearTimeout(timer);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.flush();
  }

  /** Resolves once every channel has answered; never rejects. */
  async deliver(event: NotificationEvent): Promise<void> {
    if (this.channels.length === 0) {
      return;
    }
    const text = formatNotification(event);
    const results = await Promise.allSettled(this.channels.map((channel) => channel.send(text)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(`❌ ${this.channels[index].name} notification failed: ${String(result.reason)}`);
      }
    });
  }
}
