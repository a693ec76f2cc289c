import { Injectable, Logger } from '@nestjs/common';
import { Clock, sleepUntil } from '../common/clock';
import { EngineSettings } from '../config/app-config';
import { FundingRateSnapshot } from '../exchanges/exchange.interface';
import { CycleTriggers, FundingWindow, nextWindow, triggersFor } from './funding-window';

@Injectable()
export class FundingScheduler {
  private readonly logger = new Logger(FundingScheduler.name);

  /** Window for the settlement after `now`, using the exchange schedule when available. */
  nextWindow(now: number, settings: EngineSettings, snapshot?: FundingRateSnapshot): FundingWindow {
    return nextWindow(now, snapshot?.intervalHours ?? settings.fundingIntervalHours, {
      anchorHourUtc: settings.anchorHourUtc,
      published: snapshot?.nextSettlement,
    });
  }

  /** Re-derives the schedule once `previous` has settled. */
  followingWindow(
    previous: FundingWindow,
    now: number,
    settings: EngineSettings,
    snapshot?: FundingRateSnapshot,
  ): FundingWindow {
    return this.nextWindow(Math.max(now, previous.settlementTime), settings, snapshot);
  }

  triggersFor(window: FundingWindow, settings: EngineSettings): CycleTriggers {
    return triggersFor(window, settings);
  }

  /** Suspends until `time`; returns false when the signal aborted the wait. */
  async waitUntil(clock: Clock, time: number, label: string, signal?: AbortSignal): Promise<boolean> {
    const remaining = time - clock.now();
    if (remaining > 0) {
      this.logger.log(`⏳ Waiting ${Math.round(remaining / 1000)}s until ${label} at ${new Date(time).toISOString()}`);
      await sleepUntil(clock, time, signal);
    }
    return !signal?.aborted;
  }
}
