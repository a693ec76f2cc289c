const HOUR_MS = 3_600_000;

export interface FundingWindow {
  readonly settlementTime: number;
  readonly intervalHours: number;
}

export interface CycleTriggers {
  preCheckAt: number;
  actionAt: number;
  /** Opening orders are not submitted after this instant */
  actionDeadline: number;
}

export interface TriggerSettings {
  preCheckLeadMs: number;
  actionLeadMs: number;
  actionGraceMs: number;
}

export interface WindowOptions {
  anchorHourUtc?: number;
  /** Next settlement as published by the exchange, when known */
  published?: number;
}

/**
 * Next funding window strictly after `now`. A published settlement wins when it
 * falls within one interval of `now`; otherwise the boundary is derived from the
 * interval anchored at `anchorHourUtc` (00:00 UTC by default).
 */
export function nextWindow(now: number, intervalHours: number, options: WindowOptions = {}): FundingWindow {
  if (!(intervalHours > 0)) {
    throw new RangeError(`Funding interval must be positive, got ${intervalHours}`);
  }
  const intervalMs = intervalHours * HOUR_MS;
  const { published } = options;

  if (published !== undefined && published > now && published - now <= intervalMs) {
    return Object.freeze({ settlementTime: published, intervalHours });
  }

  const anchor = (options.anchorHourUtc ?? 0) * HOUR_MS;
  const elapsed = Math.floor((now - anchor) / intervalMs);
  return Object.freeze({ settlementTime: anchor + (elapsed + 1) * intervalMs, intervalHours });
}

export function triggersFor(window: FundingWindow, settings: TriggerSettings): CycleTriggers {
  return {
    preCheckAt: window.settlementTime - settings.preCheckLeadMs,
    actionAt: window.settlementTime - settings.actionLeadMs,
    actionDeadline: window.settlementTime + settings.actionGraceMs,
  };
}
