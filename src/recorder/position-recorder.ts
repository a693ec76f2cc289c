import { ExchangeId, PositionSide } from '../exchanges/exchange.interface';
import { CloseStatus } from '../executor/arbitrage-order';

export interface OpenRecord {
  symbol: string;
  exchange: ExchangeId;
  /** Epoch ms of the open fill; part of the record's identity */
  openTime: number;
  openPrice: number;
  quantity: number;
  leverage: number;
  direction: PositionSide;
  orderId: string;
  marginAmount?: number;
}

export interface CloseRecord {
  closePrice: number | null;
  closeOrderId: string | null;
  closeStatus: CloseStatus;
  closeTime: number;
  /** Realized price PnL in quote currency; null when the close has no price */
  pnlAmount: number | null;
}

export interface TradeRecord extends OpenRecord {
  id: number;
  closePrice: number | null;
  closeOrderId: string | null;
  closeStatus: CloseStatus | 'OPEN';
  closeTime: number | null;
  pnlAmount: number | null;
}

/**
 * Durable trade log. One row per (exchange, symbol, openTime); a task only
 * ever updates the row it created.
 */
export abstract class PositionRecorder {
  /** Returns the row id. Repeating an open for the same identity returns the existing id. */
  abstract recordOpen(record: OpenRecord): Promise<number>;
  abstract recordClose(recordId: number, record: CloseRecord): Promise<void>;
  abstract findById(recordId: number): Promise<TradeRecord | undefined>;
}
