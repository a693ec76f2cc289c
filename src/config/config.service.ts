import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig, ExchangeSettings, loadConfig } from './app-config';
import { ExchangeId } from '../exchanges/exchange.interface';

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);
  private readonly config: AppConfig;

  constructor(configService: ConfigService) {
    this.config = loadConfig(
      (key) => configService.get<string>(key),
      (key, value) => this.logger.warn(`⚠️ Ignoring invalid ${key}=${value}, using default`),
    );
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key];
  }

  getExchangeConfig(exchange: ExchangeId): ExchangeSettings {
    return this.config.exchanges[exchange];
  }

  getEngineConfig() {
    return this.config.engine;
  }

  getTradingConfig() {
    return this.config.trading;
  }

  getNotificationConfig() {
    return this.config.notifications;
  }
}
