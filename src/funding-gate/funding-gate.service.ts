import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { withRetry } from '../common/retry';
import { ExchangeAdapter, FundingRateSnapshot } from '../exchanges/exchange.interface';

/** Which funding sign the strategy collects. */
export type FundingDirection = 'negative' | 'positive';

export type GateVerdict = 'enter' | 'skip' | 'unknown';

export interface GateDecision {
  verdict: GateVerdict;
  threshold: number;
  direction: FundingDirection;
  rate?: number;
  snapshot?: FundingRateSnapshot;
  reason: string;
}

export interface GateCheck {
  threshold: number;
  direction: FundingDirection;
  intervalHours: number;
  clock: Clock;
  retryAttempts: number;
  retryBackoffMs: number;
  signal?: AbortSignal;
}

const HOUR_MS = 3_600_000;

/** `rate` strictly crosses `threshold` in the configured direction. */
export function shouldEnter(rate: number, threshold: number, direction: FundingDirection): boolean {
  return direction === 'negative' ? rate < threshold : rate > threshold;
}

export const directionFromThreshold = (threshold: number): FundingDirection =>
  threshold > 0 ? 'positive' : 'negative';

@Injectable()
export class FundingGate {
  private readonly logger = new Logger(FundingGate.name);

  /**
   * Evaluates a fetched snapshot. A missing snapshot, a non-finite rate or one
   * observed more than one funding interval ago is "unknown", never "skip".
   */
  evaluate(
    snapshot: FundingRateSnapshot | undefined,
    now: number,
    threshold: number,
    direction: FundingDirection,
    intervalHours: number,
  ): GateDecision {
    const base = { threshold, direction };
    if (!snapshot) {
      return { ...base, verdict: 'unknown', reason: 'funding rate could not be fetched' };
    }
    if (!Number.isFinite(snapshot.rate)) {
      return { ...base, verdict: 'unknown', snapshot, reason: 'funding rate is not a number' };
    }
    const age = now - snapshot.observedAt;
    if (age > intervalHours * HOUR_MS) {
      return {
        ...base,
        verdict: 'unknown',
        rate: snapshot.rate,
        snapshot,
        reason: `funding rate is stale (observed ${Math.round(age / 1000)}s ago)`,
      };
    }
    const enter = shouldEnter(snapshot.rate, threshold, direction);
    const comparator = direction === 'negative' ? '<' : '>';
    return {
      ...base,
      verdict: enter ? 'enter' : 'skip',
      rate: snapshot.rate,
      snapshot,
      reason: enter
        ? `rate ${snapshot.rate} ${comparator} ${threshold}`
        : `condition not met: rate ${snapshot.rate} is not ${comparator} ${threshold}`,
    };
  }

  /** Fetches the current rate (reads are retried on transport errors) and evaluates it. */
  async check(adapter: ExchangeAdapter, symbol: string, options: GateCheck): Promise<GateDecision> {
    let snapshot: FundingRateSnapshot | undefined;
    try {
      snapshot = await withRetry(() => adapter.getFundingRate(symbol), {
        clock: options.clock,
        attempts: options.retryAttempts,
        backoffMs: options.retryBackoffMs,
        signal: options.signal,
      });
    } catch (error) {
      this.logger.warn(`Funding rate fetch failed for ${adapter.exchangeId}:${symbol}: ${String(error)}`);
    }

    const decision = this.evaluate(
      snapshot,
      options.clock.now(),
      options.threshold,
      options.direction,
      snapshot?.intervalHours ?? options.intervalHours,
    );
    const label = `${adapter.exchangeId}:${symbol}`;
    if (decision.verdict === 'unknown') {
      this.logger.warn(`❓ ${label} funding rate UNKNOWN, skipping cycle: ${decision.reason}`);
    } else if (decision.verdict === 'skip') {
      this.logger.log(`⏭️ ${label} ${decision.reason}`);
    } else {
      this.logger.log(`✅ ${label} entering: ${decision.reason}`);
    }
    return decision;
  }
}
