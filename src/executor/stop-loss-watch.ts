import { PositionSide } from '../exchanges/exchange.interface';

/** Lives only while a close order is pending. */
export interface StopLossWatch {
  readonly side: PositionSide;
  readonly triggerPrice: number;
  armed: boolean;
  checkedAt?: number;
}

export function createStopLossWatch(openPrice: number, side: PositionSide, threshold: number, armed: boolean): StopLossWatch {
  return {
    side,
    triggerPrice: side === 'short' ? openPrice * (1 + threshold) : openPrice * (1 - threshold),
    armed,
  };
}

/** A short breaches above its trigger, a long below. */
export function isBreached(watch: StopLossWatch, markPrice: number): boolean {
  if (!watch.armed) {
    return false;
  }
  return watch.side === 'short' ? markPrice > watch.triggerPrice : markPrice < watch.triggerPrice;
}
