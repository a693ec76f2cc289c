import { Clock } from '../common/clock';
import {
  ExchangeAdapter,
  ExchangeId,
  FundingRateSnapshot,
  InstrumentInfo,
  OrderState,
  OrderStatus,
  PlaceOrderRequest,
} from '../exchanges/exchange.interface';
import { MarketDataUnavailableError, OrderNotFoundError } from '../exchanges/exchange.errors';

export interface FakeFill {
  /** Fill this long after placement; never fills when omitted */
  afterMs?: number;
  price?: number;
}

export interface FakeOrder {
  id: string;
  request: PlaceOrderRequest;
  state: OrderState;
  filledQuantity: number;
  averagePrice?: number;
  fillAt?: number;
  fillPrice?: number;
}

export interface PlaceFailure {
  error: Error;
  /** The exchange accepted the order even though the call failed */
  submitted: boolean;
}

/**
 * Scriptable in-process exchange driven by a test clock. Orders fill according
 * to `fillPlan`; failures are queued per call type.
 */
export class FakeExchangeAdapter extends ExchangeAdapter {
  exchangeId: ExchangeId = 'binance';
  instrument: InstrumentInfo = { symbol: 'BTC/USDT:USDT', tickSize: 0.01, stepSize: 0.001, minQuantity: 0.001 };
  fundingRate: FundingRateSnapshot | Error | undefined;
  markPrice: (now: number) => number = () => 100;
  serverTimeOffset = 0;
  initError?: Error;
  fillPlan: (request: PlaceOrderRequest, index: number) => FakeFill = (request) =>
    request.type === 'market' ? { afterMs: 0, price: 100 } : {};

  readonly orders = new Map<string, FakeOrder>();
  readonly placed: PlaceOrderRequest[] = [];
  readonly cancelled: string[] = [];
  readonly statusPolls: string[] = [];
  readonly leverageCalls: number[] = [];
  readonly placeFailures: PlaceFailure[] = [];
  readonly statusFailures: Error[] = [];
  readonly cancelFailures: Error[] = [];
  readonly markPriceFailures: Error[] = [];
  initialized = false;

  constructor(private readonly clock: Clock) {
    super();
  }

  async initialize(): Promise<void> {
    if (this.initError) {
      throw this.initError;
    }
    this.initialized = true;
  }

  normalizeSymbol(symbol: string): string {
    return symbol;
  }

  async getInstrument(): Promise<InstrumentInfo> {
    return this.instrument;
  }

  async setLeverage(_symbol: string, leverage: number): Promise<void> {
    this.leverageCalls.push(leverage);
  }

  async placeOrder(request: PlaceOrderRequest): Promise<string> {
    const failure = this.placeFailures.shift();
    if (failure && !failure.submitted) {
      throw failure.error;
    }
    const index = this.placed.length;
    this.placed.push(request);
    const id = `order-${index + 1}`;
    const plan = this.fillPlan(request, index);
    this.orders.set(id, {
      id,
      request,
      state: 'OPEN',
      filledQuantity: 0,
      fillAt: plan.afterMs !== undefined ? this.clock.now() + plan.afterMs : undefined,
      fillPrice: plan.price ?? request.price,
    });
    if (failure) {
      throw failure.error;
    }
    return id;
  }

  async findOrderByClientId(_symbol: string, clientOrderId: string): Promise<string | undefined> {
    for (const order of this.orders.values()) {
      if (order.request.clientOrderId === clientOrderId) {
        return order.id;
      }
    }
    return undefined;
  }

  async cancelOrder(_symbol: string, orderId: string): Promise<void> {
    this.cancelled.push(orderId);
    const failure = this.cancelFailures.shift();
    if (failure) {
      throw failure;
    }
    const order = this.settle(orderId);
    if (order.state !== 'OPEN') {
      throw new OrderNotFoundError(`Order ${orderId} is already ${order.state}`);
    }
    order.state = 'CANCELLED';
  }

  async getOrderStatus(_symbol: string, orderId: string): Promise<OrderStatus> {
    this.statusPolls.push(orderId);
    const failure = this.statusFailures.shift();
    if (failure) {
      throw failure;
    }
    const order = this.settle(orderId);
    return {
      orderId: order.id,
      state: order.state,
      filledQuantity: order.filledQuantity,
      averagePrice: order.averagePrice,
    };
  }

  async getFundingRate(): Promise<FundingRateSnapshot> {
    if (this.fundingRate instanceof Error) {
      throw this.fundingRate;
    }
    if (!this.fundingRate) {
      throw new MarketDataUnavailableError('No funding rate scripted');
    }
    return this.fundingRate;
  }

  async getMarkPrice(): Promise<number> {
    const failure = this.markPriceFailures.shift();
    if (failure) {
      throw failure;
    }
    return this.markPrice(this.clock.now());
  }

  async getServerTime(): Promise<number> {
    return this.clock.now() + this.serverTimeOffset;
  }

  /** Simulates a cancellation made outside the engine. */
  cancelExternally(orderId: string): void {
    this.settle(orderId).state = 'CANCELLED';
  }

  private settle(orderId: string): FakeOrder {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new OrderNotFoundError(`Unknown order ${orderId}`);
    }
    if (order.state === 'OPEN' && order.fillAt !== undefined && this.clock.now() >= order.fillAt) {
      order.state = 'FILLED';
      order.filledQuantity = order.request.quantity;
      order.averagePrice = order.fillPrice;
    }
    return order;
  }
}
