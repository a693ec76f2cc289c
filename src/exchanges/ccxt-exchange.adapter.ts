import { Logger } from '@nestjs/common';
import { Exchange } from 'ccxt';
import {
  ExchangeAdapter,
  ExchangeCredentials,
  ExchangeId,
  FundingRateSnapshot,
  InstrumentInfo,
  OrderState,
  OrderStatus,
  PlaceOrderRequest,
  PositionMode,
} from './exchange.interface';
import {
  ExchangeAuthError,
  MarketDataUnavailableError,
  OrderNotFoundError,
  translateCcxtError,
} from './exchange.errors';
import { maskKey, validateCredentials } from './utils/credentials';
import { toPerpetualSymbol } from '../common/helper';

export interface AdapterOptions {
  credentials: ExchangeCredentials;
  positionMode: PositionMode;
  testnet: boolean;
}

/** Subset of a ccxt market the adapters read. */
export interface MarketLike {
  precision: { price?: number; amount?: number };
  limits: { amount?: { min?: number } };
  contractSize?: number;
}

/** Subset of a ccxt order the adapters read. */
export interface OrderLike {
  id: string;
  clientOrderId?: string;
  status?: string;
  filled?: number;
  average?: number;
}

export interface FundingRateLike {
  fundingRate?: number;
  timestamp?: number;
  fundingTimestamp?: number;
  interval?: string;
}

// ccxt precision modes
const DECIMAL_PLACES = 2;
const SIGNIFICANT_DIGITS = 3;

/** Converts a ccxt precision value into an increment. */
export function precisionToStep(precision: number | undefined, precisionMode: number | undefined): number | undefined {
  if (precision === undefined || !Number.isFinite(precision)) {
    return undefined;
  }
  if (precisionMode === DECIMAL_PLACES || precisionMode === SIGNIFICANT_DIGITS) {
    return parseFloat(Math.pow(10, -precision).toFixed(Math.max(0, precision)));
  }
  return precision;
}

export function toOrderState(status: string | undefined): OrderState {
  switch (status) {
    case 'closed':
      return 'FILLED';
    case 'canceled':
    case 'cancelled':
    case 'rejected':
    case 'expired':
      return 'CANCELLED';
    default:
      return 'OPEN';
  }
}

/** Parses ccxt funding intervals such as '8h' or '4h'. */
export function parseIntervalHours(interval: string | undefined): number | undefined {
  const match = interval?.match(/^(\d+(?:\.\d+)?)h$/);
  return match ? parseFloat(match[1]) : undefined;
}

/** Leverage and position-mode calls that fail only because nothing changed. */
export const isNoChangeError = (error: unknown): boolean =>
  error instanceof Error && /not modified|no need to change|leverage not changed|same as/i.test(error.message);

/**
 * Shared ccxt plumbing for USDT-margined perpetuals. Subclasses contribute the
 * exchange-specific order parameters and quantity units.
 */
export abstract class CcxtExchangeAdapter extends ExchangeAdapter {
  protected readonly logger: Logger;

  protected constructor(
    readonly exchangeId: ExchangeId,
    protected readonly exchange: Exchange,
    protected readonly options: AdapterOptions,
  ) {
    super();
    this.logger = new Logger(`${exchangeId}-adapter`);
    if (options.testnet) {
      exchange.setSandboxMode(true);
    }
  }

  /** Exchange-specific parameters for createOrder (position tagging, reduce-only). */
  protected abstract orderParams(request: PlaceOrderRequest): Record<string, unknown>;

  protected requiresPassphrase(): boolean {
    return false;
  }

  /** Base asset units → exchange order units. */
  protected toExchangeAmount(_market: MarketLike, quantity: number): number {
    return quantity;
  }

  /** Exchange order units → base asset units. */
  protected fromExchangeAmount(_market: MarketLike, amount: number): number {
    return amount;
  }

  async initialize(): Promise<void> {
    const validation = validateCredentials(this.options.credentials, this.requiresPassphrase());
    if (!validation.isValid) {
      throw new ExchangeAuthError(
        `API credentials invalid: ${validation.errors.join(', ')}`,
        this.exchangeId,
      );
    }
    this.logger.log(`🔑 API Key: ${maskKey(this.options.credentials.apiKey)} (${this.options.positionMode} mode)`);
    await this.call('loadMarkets', () => this.exchange.loadMarkets());
  }

  normalizeSymbol(symbol: string): string {
    return toPerpetualSymbol(symbol);
  }

  protected market(symbol: string): MarketLike {
    try {
      return this.exchange.market(this.normalizeSymbol(symbol));
    } catch (error) {
      throw translateCcxtError(error, this.exchangeId, 'market');
    }
  }

  async getInstrument(symbol: string): Promise<InstrumentInfo> {
    if (!this.exchange.markets) {
      await this.call('loadMarkets', () => this.exchange.loadMarkets());
    }
    const market = this.market(symbol);
    const mode = this.exchange.precisionMode;
    const tickSize = precisionToStep(market.precision.price, mode) ?? 0;
    const amountStep = precisionToStep(market.precision.amount, mode) ?? 0;
    const stepSize = this.fromExchangeAmount(market, amountStep);
    const minAmount = market.limits.amount?.min;

    return {
      symbol: this.normalizeSymbol(symbol),
      tickSize,
      stepSize,
      minQuantity: minAmount !== undefined ? this.fromExchangeAmount(market, minAmount) : stepSize,
    };
  }

  async setLeverage(symbol: string, leverage: number): Promise<void> {
    try {
      await this.call('setLeverage', () =>
        this.exchange.setLeverage(leverage, this.normalizeSymbol(symbol)),
      );
      this.logger.log(`⚙️ Leverage set to ${leverage}x for ${symbol}`);
    } catch (error) {
      if (!isNoChangeError(error)) {
        throw error;
      }
      this.logger.debug(`Leverage already ${leverage}x for ${symbol}`);
    }
  }

  async placeOrder(request: PlaceOrderRequest): Promise<string> {
    const symbol = this.normalizeSymbol(request.symbol);
    const market = this.market(request.symbol);
    const params = { ...this.orderParams(request), clientOrderId: request.clientOrderId };
    const amount = this.toExchangeAmount(market, request.quantity);

    this.logger.debug(
      `createOrder ${symbol} ${request.type} ${request.side} ${amount} @ ${request.price ?? 'market'} ${JSON.stringify(params)}`,
    );
    const order = await this.call('createOrder', () =>
      this.exchange.createOrder(symbol, request.type, request.side, amount, request.price, params),
    );
    return order.id;
  }

  async findOrderByClientId(symbol: string, clientOrderId: string): Promise<string | undefined> {
    const unified = this.normalizeSymbol(symbol);
    const open: OrderLike[] = await this.call('fetchOpenOrders', () => this.exchange.fetchOpenOrders(unified));
    const match = open.find((order) => this.matchesClientOrderId(order.clientOrderId, clientOrderId));
    if (match) {
      return match.id;
    }
    const closed: OrderLike[] = await this.call('fetchClosedOrders', () =>
      this.exchange.fetchClosedOrders(unified, undefined, 50),
    );
    return closed.find((order) => this.matchesClientOrderId(order.clientOrderId, clientOrderId))?.id;
  }

  /** Whether the client id an exchange reports back is the one we sent. */
  protected matchesClientOrderId(reported: string | undefined, clientOrderId: string): boolean {
    return reported === clientOrderId;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    await this.call('cancelOrder', () => this.exchange.cancelOrder(orderId, this.normalizeSymbol(symbol)));
  }

  async getOrderStatus(symbol: string, orderId: string): Promise<OrderStatus> {
    const market = this.market(symbol);
    const order: OrderLike = await this.call('fetchOrder', () =>
      this.exchange.fetchOrder(orderId, this.normalizeSymbol(symbol)),
    );
    if (!order.id) {
      throw new OrderNotFoundError(`Order ${orderId} not found`, this.exchangeId);
    }
    return {
      orderId: order.id,
      state: toOrderState(order.status),
      filledQuantity: this.fromExchangeAmount(market, order.filled ?? 0),
      averagePrice: order.average,
    };
  }

  async getFundingRate(symbol: string): Promise<FundingRateSnapshot> {
    const receivedAt = Date.now();
    const funding: FundingRateLike = await this.call('fetchFundingRate', () =>
      this.exchange.fetchFundingRate(this.normalizeSymbol(symbol)),
    );
    if (funding.fundingRate === undefined || !Number.isFinite(funding.fundingRate)) {
      throw new MarketDataUnavailableError(`No funding rate for ${symbol}`, this.exchangeId);
    }
    return {
      symbol: this.normalizeSymbol(symbol),
      rate: funding.fundingRate,
      nextSettlement: funding.fundingTimestamp,
      observedAt: funding.timestamp ?? receivedAt,
      intervalHours: parseIntervalHours(funding.interval),
    };
  }

  async getMarkPrice(symbol: string): Promise<number> {
    const ticker = await this.call('fetchTicker', () => this.exchange.fetchTicker(this.normalizeSymbol(symbol)));
    if ('markPrice' in ticker && typeof ticker.markPrice === 'number' && ticker.markPrice > 0) {
      return ticker.markPrice;
    }
    if (typeof ticker.last === 'number' && ticker.last > 0) {
      return ticker.last;
    }
    throw new MarketDataUnavailableError(`No mark price for ${symbol}`, this.exchangeId);
  }

  async getServerTime(): Promise<number> {
    const time = await this.call('fetchTime', () => this.exchange.fetchTime());
    if (time === undefined) {
      throw new MarketDataUnavailableError('Server time unavailable', this.exchangeId);
    }
    return time;
  }

  protected async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw translateCcxtError(error, this.exchangeId, operation);
    }
  }
}
