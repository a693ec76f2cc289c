import { PositionSide } from '../exchanges/exchange.interface';

export interface RealizedPnl {
  /** Quote currency, before fees and funding */
  amount: number;
  percent: number;
}

const round = (value: number, decimals: number): number => parseFloat(value.toFixed(decimals));

/** Price difference times quantity, signed by the position side. */
export function computeRealizedPnl(
  side: PositionSide,
  openPrice: number,
  closePrice: number,
  quantity: number,
): RealizedPnl {
  const direction = side === 'long' ? 1 : -1;
  const diff = (closePrice - openPrice) * direction;
  return {
    amount: round(diff * quantity, 8),
    percent: openPrice > 0 ? round((diff / openPrice) * 100, 4) : 0,
  };
}
