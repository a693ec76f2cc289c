import { binance } from 'ccxt';
import { PlaceOrderRequest, PositionMode } from '../exchange.interface';
import { AdapterOptions, CcxtExchangeAdapter } from '../ccxt-exchange.adapter';

/**
 * Binance USDⓈ-M futures. In hedge mode every order carries an explicit
 * positionSide and the exchange refuses reduceOnly; in one-way mode the close
 * is marked reduceOnly instead.
 */
export function binanceOrderParams(request: PlaceOrderRequest, positionMode: PositionMode): Record<string, unknown> {
  if (positionMode === 'hedge') {
    return { positionSide: request.positionSide === 'long' ? 'LONG' : 'SHORT' };
  }
  return request.reduceOnly ? { reduceOnly: true } : {};
}

export class BinanceAdapter extends CcxtExchangeAdapter {
  constructor(options: AdapterOptions, requestTimeoutMs: number) {
    super(
      'binance',
      new binance({
        apiKey: options.credentials.apiKey,
        secret: options.credentials.secretKey,
        timeout: requestTimeoutMs,
        enableRateLimit: true,
        options: {
          defaultType: 'future',
          adjustForTimeDifference: true,
        },
      }),
      options,
    );
  }

  protected orderParams(request: PlaceOrderRequest): Record<string, unknown> {
    return binanceOrderParams(request, this.options.positionMode);
  }
}
