import TelegramBot from 'node-telegram-bot-api';
import { NotificationChannel } from './notification.interface';

export type TelegramSender = Pick<TelegramBot, 'sendMessage'>;

/** Send-only bot: created with polling off. */
export const createTelegramBot = (botToken: string): TelegramSender => new TelegramBot(botToken, { polling: false });

export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(
    private readonly bot: TelegramSender,
    private readonly chatId: string,
  ) {}

  async send(text: string): Promise<void> {
    await this.bot.sendMessage(this.chatId, text);
  }
}
