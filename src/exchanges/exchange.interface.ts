export type ExchangeId = 'binance' | 'bybit' | 'gateio' | 'bitget';

export const EXCHANGE_IDS: readonly ExchangeId[] = ['binance', 'bybit', 'gateio', 'bitget'];

export const isExchangeId = (value: string): value is ExchangeId => EXCHANGE_IDS.some((id) => id === value);

export type OrderSide = 'buy' | 'sell';
export type PositionSide = 'long' | 'short';
export type PositionMode = 'one-way' | 'hedge';
export type OrderType = 'market' | 'limit';
export type OrderState = 'OPEN' | 'FILLED' | 'CANCELLED';

export interface InstrumentInfo {
  symbol: string;
  /** Minimum price increment */
  tickSize: number;
  /** Minimum quantity increment, in base asset units */
  stepSize: number;
  minQuantity: number;
}

export interface PlaceOrderRequest {
  symbol: string;
  side: OrderSide;
  /** Position the order opens or reduces; drives hedge-mode tagging */
  positionSide: PositionSide;
  type: OrderType;
  /** Base asset units */
  quantity: number;
  price?: number;
  reduceOnly: boolean;
  clientOrderId: string;
}

export interface OrderStatus {
  orderId: string;
  state: OrderState;
  filledQuantity: number;
  averagePrice?: number;
}

export interface FundingRateSnapshot {
  symbol: string;
  rate: number;
  /** Epoch ms of the next settlement published by the exchange */
  nextSettlement?: number;
  /** Epoch ms at which the exchange computed the rate */
  observedAt: number;
  intervalHours?: number;
}

export interface ExchangeCredentials {
  apiKey: string;
  secretKey: string;
  passphrase?: string;
}

/**
 * Capability set the engine consumes. Symbols are passed in the user's form
 * (e.g. BTCUSDT) and each adapter normalizes them to its own convention.
 */
export abstract class ExchangeAdapter {
  abstract readonly exchangeId: ExchangeId;

  abstract initialize(): Promise<void>;
  abstract normalizeSymbol(symbol: string): string;
  abstract getInstrument(symbol: string): Promise<InstrumentInfo>;
  abstract setLeverage(symbol: string, leverage: number): Promise<void>;

  // Trading
  abstract placeOrder(request: PlaceOrderRequest): Promise<string>;
  abstract findOrderByClientId(symbol: string, clientOrderId: string): Promise<string | undefined>;
  abstract cancelOrder(symbol: string, orderId: string): Promise<void>;
  abstract getOrderStatus(symbol: string, orderId: string): Promise<OrderStatus>;

  // Market data
  abstract getFundingRate(symbol: string): Promise<FundingRateSnapshot>;
  abstract getMarkPrice(symbol: string): Promise<number>;
  abstract getServerTime(): Promise<number>;
}
