import { roundToStep } from '../common/helper';
import { OrderSide, PositionSide } from '../exchanges/exchange.interface';
import { FundingDirection } from '../funding-gate/funding-gate.service';

/**
 * Breakeven close target. A long collecting negative funding sells at
 * `open × (1 + rate − feeBuffer)`, i.e. `open × (1 − |rate| − feeBuffer)`; a
 * short collecting positive funding buys back at `open × (1 + |rate| + feeBuffer)`.
 */
export function computeClosePrice(
  openPrice: number,
  fundingRateAtDecision: number,
  feeBuffer: number,
  side: PositionSide,
): number {
  const capture = Math.abs(fundingRateAtDecision) + feeBuffer;
  return side === 'long' ? openPrice * (1 - capture) : openPrice * (1 + capture);
}

/** Rounds onto the tick grid without crossing past the computed target: a sell up, a buy down. */
export function roundClosePrice(price: number, tickSize: number, side: PositionSide): number {
  return roundToStep(price, tickSize, closingSide(side) === 'sell' ? 'up' : 'down');
}

/** Negative funding is paid by shorts to longs, so the position takes the opposite sign. */
export const sideForFunding = (direction: FundingDirection): PositionSide => (direction === 'negative' ? 'long' : 'short');

export const entrySide = (side: PositionSide): OrderSide => (side === 'short' ? 'sell' : 'buy');

export const closingSide = (side: PositionSide): OrderSide => (side === 'short' ? 'buy' : 'sell');
