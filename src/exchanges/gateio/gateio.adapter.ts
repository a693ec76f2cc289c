import { gate } from 'ccxt';
import { PlaceOrderRequest } from '../exchange.interface';
import { ExchangeRejectedError } from '../exchange.errors';
import { AdapterOptions, CcxtExchangeAdapter, MarketLike } from '../ccxt-exchange.adapter';

export function gateOrderParams(request: PlaceOrderRequest): Record<string, unknown> {
  return request.reduceOnly ? { reduceOnly: true } : {};
}

/** Base quantity → whole contracts. */
export function toContracts(quantity: number, contractSize: number): number {
  return Math.round(quantity / contractSize);
}

/** Gate stores a client id in the order's `text` field behind a `t-` prefix. */
export const GATE_TEXT_PREFIX = 't-';

export function fromContracts(contracts: number, contractSize: number): number {
  return parseFloat((contracts * contractSize).toPrecision(12));
}

/**
 * Gate.io USDT perpetuals. Orders are sized in contracts, so quantities are
 * converted through the market's contract size. Single (one-way) mode only.
 */
export class GateioAdapter extends CcxtExchangeAdapter {
  constructor(options: AdapterOptions, requestTimeoutMs: number) {
    super(
      'gateio',
      new gate({
        apiKey: options.credentials.apiKey,
        secret: options.credentials.secretKey,
        timeout: requestTimeoutMs,
        enableRateLimit: true,
        options: {
          defaultType: 'swap',
        },
      }),
      options,
    );
  }

  async initialize(): Promise<void> {
    if (this.options.positionMode === 'hedge') {
      throw new ExchangeRejectedError('Gate.io adapter supports one-way position mode only', this.exchangeId);
    }
    await super.initialize();
  }

  protected orderParams(request: PlaceOrderRequest): Record<string, unknown> {
    return gateOrderParams(request);
  }

  protected matchesClientOrderId(reported: string | undefined, clientOrderId: string): boolean {
    return reported === clientOrderId || reported === `${GATE_TEXT_PREFIX}${clientOrderId}`;
  }

  protected toExchangeAmount(market: MarketLike, quantity: number): number {
    return toContracts(quantity, market.contractSize ?? 1);
  }

  protected fromExchangeAmount(market: MarketLike, amount: number): number {
    return fromContracts(amount, market.contractSize ?? 1);
  }
}
