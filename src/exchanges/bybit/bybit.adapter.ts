import { bybit } from 'ccxt';
import { PlaceOrderRequest, PositionMode } from '../exchange.interface';
import { AdapterOptions, CcxtExchangeAdapter } from '../ccxt-exchange.adapter';

/** Bybit v5 linear: positionIdx 0 in one-way mode, 1 (long) or 2 (short) in hedge mode. */
export function bybitOrderParams(request: PlaceOrderRequest, positionMode: PositionMode): Record<string, unknown> {
  const params: Record<string, unknown> = {
    positionIdx: positionMode === 'hedge' ? (request.positionSide === 'long' ? 1 : 2) : 0,
  };
  if (request.reduceOnly) {
    params.reduceOnly = true;
  }
  return params;
}

export class BybitAdapter extends CcxtExchangeAdapter {
  constructor(options: AdapterOptions, requestTimeoutMs: number) {
    super(
      'bybit',
      new bybit({
        apiKey: options.credentials.apiKey,
        secret: options.credentials.secretKey,
        timeout: requestTimeoutMs,
        enableRateLimit: true,
        options: {
          defaultType: 'swap',
          adjustForTimeDifference: true,
        },
      }),
      options,
    );
  }

  protected orderParams(request: PlaceOrderRequest): Record<string, unknown> {
    return bybitOrderParams(request, this.options.positionMode);
  }
}
