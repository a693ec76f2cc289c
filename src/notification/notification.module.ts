import { Module } from '@nestjs/common';
import { AppConfigService } from '../config/config.service';
import { NOTIFICATION_CHANNELS, NotificationChannel } from './notification.interface';
import { NotificationService } from './notification.service';
import { TelegramChannel, createTelegramBot } from './telegram.channel';
import { WebhookChannel } from './webhook.channel';

@Module({
  providers: [
    {
      provide: NOTIFICATION_CHANNELS,
      useFactory: (configService: AppConfigService): NotificationChannel[] => {
        const { telegram, webhook } = configService.getNotificationConfig();
        const channels: NotificationChannel[] = [];
        if (telegram) {
          channels.push(new TelegramChannel(createTelegramBot(telegram.botToken), telegram.chatId));
        }
        if (webhook) {
          channels.push(new WebhookChannel(webhook.url, webhook.format, configService.getEngineConfig().requestTimeoutMs));
        }
        return channels;
      },
      inject: [AppConfigService],
    },
    NotificationService,
  ],
  exports: [NotificationService],
})
export class NotificationModule {}
