import { ExchangeId, PositionSide } from '../exchanges/exchange.interface';
import { RealizedPnl, computeRealizedPnl } from './pnl';

export type CloseStatus = 'NONE' | 'PENDING' | 'FILLED' | 'CANCELLED' | 'STOP_TRIGGERED';

const CLOSE_TRANSITIONS: Record<CloseStatus, readonly CloseStatus[]> = {
  NONE: ['PENDING'],
  PENDING: ['FILLED', 'CANCELLED', 'STOP_TRIGGERED'],
  FILLED: [],
  CANCELLED: [],
  STOP_TRIGGERED: [],
};

/** Whether the close side ended with the position flat. */
export const closesPosition = (status: CloseStatus): boolean => status === 'FILLED' || status === 'STOP_TRIGGERED';

export class InvalidOrderTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = InvalidOrderTransitionError.name;
  }
}

export interface ArbitrageOrderInit {
  symbol: string;
  exchange: ExchangeId;
  side: PositionSide;
  quantity: number;
  leverage: number;
  marginAmount?: number;
  fundingRateAtDecision: number;
}

export type ArbitrageOrderSnapshot = Readonly<
  ArbitrageOrderInit & {
    openOrderId?: string;
    openPrice?: number;
    openFillTime?: number;
    filledQuantity?: number;
    closeOrderId?: string;
    closeTargetPrice?: number;
    closePrice?: number;
    closeTime?: number;
    closeStatus: CloseStatus;
    pnl?: RealizedPnl;
    stopOrderId?: string;
    recordId?: number;
  }
>;

/**
 * Unit of work owned by one executor. Sizing and the funding rate captured at
 * decision time are fixed at construction; the close side only moves forward.
 */
export class ArbitrageOrder {
  readonly symbol: string;
  readonly exchange: ExchangeId;
  readonly side: PositionSide;
  readonly quantity: number;
  readonly leverage: number;
  readonly marginAmount?: number;
  readonly fundingRateAtDecision: number;

  openOrderId?: string;
  openPrice?: number;
  openFillTime?: number;
  filledQuantity?: number;
  closeTargetPrice?: number;
  closePrice?: number;
  closeTime?: number;
  pnl?: RealizedPnl;
  stopOrderId?: string;
  recordId?: number;

  private _closeOrderId?: string;
  private _closeStatus: CloseStatus = 'NONE';

  constructor(init: ArbitrageOrderInit) {
    this.symbol = init.symbol;
    this.exchange = init.exchange;
    this.side = init.side;
    this.quantity = init.quantity;
    this.leverage = init.leverage;
    this.marginAmount = init.marginAmount;
    this.fundingRateAtDecision = init.fundingRateAtDecision;
  }

  get closeOrderId(): string | undefined {
    return this._closeOrderId;
  }

  get closeStatus(): CloseStatus {
    return this._closeStatus;
  }

  /** Quantity the close side must cover. */
  get openQuantity(): number {
    return this.filledQuantity ?? this.quantity;
  }

  markOpenSubmitted(orderId: string): void {
    if (this.openOrderId !== undefined) {
      throw new InvalidOrderTransitionError(`Open order already submitted as ${this.openOrderId}`);
    }
    this.openOrderId = orderId;
  }

  markOpenFilled(price: number, time: number, filledQuantity: number): void {
    if (this.openOrderId === undefined) {
      throw new InvalidOrderTransitionError('Cannot fill an open order that was never submitted');
    }
    this.openPrice = price;
    this.openFillTime = time;
    this.filledQuantity = filledQuantity;
  }

  /** Attaches the take-profit order. Only legal once the open side has filled. */
  assignCloseOrder(orderId: string, targetPrice: number): void {
    if (this.openFillTime === undefined) {
      throw new InvalidOrderTransitionError('closeOrderId cannot be set before the open order fills');
    }
    this.transitionClose('PENDING');
    this._closeOrderId = orderId;
    this.closeTargetPrice = targetPrice;
  }

  transitionClose(next: CloseStatus): void {
    if (!CLOSE_TRANSITIONS[this._closeStatus].includes(next)) {
      throw new InvalidOrderTransitionError(`Illegal close transition ${this._closeStatus} → ${next}`);
    }
    this._closeStatus = next;
  }

  completeClose(status: 'FILLED' | 'STOP_TRIGGERED', price: number, time: number): void {
    this.transitionClose(status);
    this.closePrice = price;
    this.closeTime = time;
    if (this.openPrice !== undefined) {
      this.pnl = computeRealizedPnl(this.side, this.openPrice, price, this.openQuantity);
    }
  }

  snapshot(): ArbitrageOrderSnapshot {
    return {
      symbol: this.symbol,
      exchange: this.exchange,
      side: this.side,
      quantity: this.quantity,
      leverage: this.leverage,
      marginAmount: this.marginAmount,
      fundingRateAtDecision: this.fundingRateAtDecision,
      openOrderId: this.openOrderId,
      openPrice: this.openPrice,
      openFillTime: this.openFillTime,
      filledQuantity: this.filledQuantity,
      closeOrderId: this._closeOrderId,
      closeTargetPrice: this.closeTargetPrice,
      closePrice: this.closePrice,
      closeTime: this.closeTime,
      closeStatus: this._closeStatus,
      pnl: this.pnl,
      stopOrderId: this.stopOrderId,
      recordId: this.recordId,
    };
  }
}
