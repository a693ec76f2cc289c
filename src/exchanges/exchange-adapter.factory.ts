import { Injectable } from '@nestjs/common';
import { AppConfigService } from '../config/config.service';
import { ExchangeAdapter, ExchangeId, PositionMode } from './exchange.interface';
import { AdapterOptions } from './ccxt-exchange.adapter';
import { BinanceAdapter } from './binance/binance.adapter';
import { BybitAdapter } from './bybit/bybit.adapter';
import { GateioAdapter } from './gateio/gateio.adapter';
import { BitgetAdapter } from './bitget/bitget.adapter';

export interface AdapterOverrides {
  positionMode?: PositionMode;
}

/** One adapter instance per monitoring task; tasks never share a client. */
@Injectable()
export class ExchangeAdapterFactory {
  constructor(private readonly configService: AppConfigService) {}

  create(exchangeId: ExchangeId, overrides: AdapterOverrides = {}): ExchangeAdapter {
    const settings = this.configService.getExchangeConfig(exchangeId);
    const { requestTimeoutMs } = this.configService.getEngineConfig();
    const options: AdapterOptions = {
      credentials: {
        apiKey: settings.apiKey,
        secretKey: settings.secretKey,
        passphrase: settings.passphrase,
      },
      positionMode: overrides.positionMode ?? settings.positionMode,
      testnet: settings.testnet,
    };

    switch (exchangeId) {
      case 'binance':
        return new BinanceAdapter(options, requestTimeoutMs);
      case 'bybit':
        return new BybitAdapter(options, requestTimeoutMs);
      case 'gateio':
        return new GateioAdapter(options, requestTimeoutMs);
      case 'bitget':
        return new BitgetAdapter(options, requestTimeoutMs);
    }
  }
}
