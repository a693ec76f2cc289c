import { bitget } from 'ccxt';
import { PlaceOrderRequest, PositionMode } from '../exchange.interface';
import { AdapterOptions, CcxtExchangeAdapter } from '../ccxt-exchange.adapter';

/** Bitget USDT-M: cross margin, `hedged` flag in hedge mode so closes map to tradeSide=close. */
export function bitgetOrderParams(request: PlaceOrderRequest, positionMode: PositionMode): Record<string, unknown> {
  const params: Record<string, unknown> = { marginMode: 'cross' };
  if (positionMode === 'hedge') {
    params.hedged = true;
  }
  if (request.reduceOnly) {
    params.reduceOnly = true;
  }
  return params;
}

export class BitgetAdapter extends CcxtExchangeAdapter {
  constructor(options: AdapterOptions, requestTimeoutMs: number) {
    super(
      'bitget',
      new bitget({
        apiKey: options.credentials.apiKey,
        secret: options.credentials.secretKey,
        password: options.credentials.passphrase,
        timeout: requestTimeoutMs,
        enableRateLimit: true,
        options: {
          defaultType: 'swap',
        },
      }),
      options,
    );
  }

  protected requiresPassphrase(): boolean {
    return true;
  }

  protected orderParams(request: PlaceOrderRequest): Record<string, unknown> {
    return bitgetOrderParams(request, this.options.positionMode);
  }
}
