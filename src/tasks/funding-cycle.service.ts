import { Injectable, Logger } from '@nestjs/common';
import { calculateCoinAmountFromMargin, decimalsOf, roundToStep } from '../common/helper';
import { RetryOptions, withRetry } from '../common/retry';
import { ExchangeAuthError, ExchangeRejectedError } from '../exchanges/exchange.errors';
import { InstrumentInfo } from '../exchanges/exchange.interface';
import { sideForFunding } from '../executor/close-price';
import { ExecutionResult } from '../executor/executor.interface';
import { OrderExecutorFactory } from '../executor/order-executor.factory';
import { FundingGate } from '../funding-gate/funding-gate.service';
import { NotificationKind } from '../notification/notification.interface';
import { NotificationService } from '../notification/notification.service';
import { FundingWindow } from '../scheduler/funding-window';
import { FundingScheduler } from '../scheduler/funding-scheduler.service';
import { toError } from './task.errors';
import { CycleContext, CycleOutcome, CycleStatus } from './task.interface';

/**
 * One settlement window: pre-check the funding rate, prepare the instrument,
 * wait for the action trigger and hand over to the executor.
 */
@Injectable()
export class FundingCycleService {
  private readonly logger = new Logger(FundingCycleService.name);

  constructor(
    private readonly scheduler: FundingScheduler,
    private readonly gate: FundingGate,
    private readonly executorFactory: OrderExecutorFactory,
    private readonly notificationService: NotificationService,
  ) {}

  async runCycle(ctx: CycleContext, window: FundingWindow): Promise<CycleOutcome> {
    const { spec, adapter, clock, signal } = ctx;
    const settlementTime = window.settlementTime;
    const triggers = this.scheduler.triggersFor(window, spec.engine);
    const end = (status: CycleStatus, reason: string, extra: Partial<CycleOutcome> = {}): CycleOutcome => ({
      status,
      settlementTime,
      reason,
      ...extra,
    });

    if (!(await this.scheduler.waitUntil(clock, triggers.preCheckAt, 'pre-check', signal))) {
      return end('stopped', 'stopped before the pre-check');
    }

    const decision = await this.gate.check(adapter, ctx.symbol, {
      threshold: spec.threshold,
      direction: spec.direction,
      intervalHours: window.intervalHours,
      clock,
      retryAttempts: spec.engine.readRetryAttempts,
      retryBackoffMs: spec.engine.readRetryBackoffMs,
      signal,
    });
    if (decision.verdict !== 'enter' || decision.rate === undefined) {
      const reason = decision.verdict === 'unknown' ? `rate_unknown: ${decision.reason}` : decision.reason;
      this.notify(ctx, 'skipped', reason, { rate: decision.rate, threshold: spec.threshold });
      return end('skipped', reason, { decision });
    }

    const side = sideForFunding(decision.direction);
    try {
      const instrument = await withRetry(() => adapter.getInstrument(ctx.symbol), this.retryOptions(ctx));
      await adapter.setLeverage(ctx.symbol, spec.leverage);
      const quantity = await this.sizeOrder(ctx, instrument);
      if (!(quantity >= instrument.minQuantity)) {
        const reason = `order size ${quantity} is below the minimum ${instrument.minQuantity}`;
        this.logger.warn(`❌ ${ctx.label} ${reason}`);
        this.notify(ctx, 'rejected', reason);
        return end('rejected', reason, { decision });
      }

      if (!(await this.scheduler.waitUntil(clock, triggers.actionAt, 'action', signal))) {
        return end('stopped', 'stopped before the action trigger', { decision });
      }
      if (clock.now() > triggers.actionDeadline) {
        const reason = `action deadline ${new Date(triggers.actionDeadline).toISOString()} already passed`;
        this.logger.warn(`⏰ ${ctx.label} ${reason}`);
        this.notify(ctx, 'missed', reason);
        return end('missed', reason, { decision });
      }

      const executor = this.executorFactory.create(adapter, clock, spec.engine, signal);
      const execution = await executor.execute({
        symbol: ctx.symbol,
        exchange: spec.exchange,
        side,
        quantity,
        leverage: spec.leverage,
        marginAmount: spec.sizing.kind === 'margin' ? spec.sizing.marginAmount : undefined,
        fundingRateAtDecision: decision.rate,
        settlementTime,
        actionDeadline: triggers.actionDeadline,
        instrument,
      });
      this.notifyExecution(ctx, execution);
      return end('executed', execution.outcome, {
        decision,
        execution,
        fatal: execution.error instanceof ExchangeAuthError ? execution.error : undefined,
      });
    } catch (error) {
      const failure = toError(error);
      this.logger.error(`💥 ${ctx.label} cycle preparation failed: ${failure.message}`);
      const status: 'rejected' | 'failed' = failure instanceof ExchangeRejectedError ? 'rejected' : 'failed';
      this.notify(ctx, status, failure.message);
      return end(status, failure.message, {
        decision,
        fatal: failure instanceof ExchangeAuthError ? failure : undefined,
      });
    }
  }

  /** Fixed quantity, or margin × leverage ÷ mark price; rounded down to the lot step. */
  private async sizeOrder(ctx: CycleContext, instrument: InstrumentInfo): Promise<number> {
    const { sizing, leverage } = ctx.spec;
    if (sizing.kind === 'quantity') {
      return roundToStep(sizing.quantity, instrument.stepSize, 'down');
    }
    const markPrice = await withRetry(() => ctx.adapter.getMarkPrice(ctx.symbol), this.retryOptions(ctx));
    const amount = calculateCoinAmountFromMargin(
      sizing.marginAmount,
      markPrice,
      leverage,
      Math.max(decimalsOf(instrument.stepSize) + 2, 6),
    );
    this.logger.debug(`${ctx.label} ${sizing.marginAmount} USDT x${leverage} @ ${markPrice} = ${amount}`);
    return roundToStep(amount, instrument.stepSize, 'down');
  }

  private notifyExecution(ctx: CycleContext, execution: ExecutionResult): void {
    const { order } = execution;
    this.notify(ctx, execution.outcome, execution.error?.message ?? `cycle finished: ${execution.outcome}`, {
      side: order.side,
      quantity: order.filledQuantity ?? order.quantity,
      rate: order.fundingRateAtDecision,
      open: order.openPrice,
      target: order.closeTargetPrice,
      close: order.closePrice,
      pnl: order.pnl?.amount,
      'pnl %': order.pnl?.percent,
    });
  }

  private notify(
    ctx: CycleContext,
    kind: NotificationKind,
    message: string,
    details?: Record<string, string | number | undefined>,
  ): void {
    this.notificationService.notify({ kind, exchange: ctx.spec.exchange, symbol: ctx.symbol, message, details });
  }

  private retryOptions(ctx: CycleContext): RetryOptions {
    return {
      clock: ctx.clock,
      attempts: ctx.spec.engine.readRetryAttempts,
      backoffMs: ctx.spec.engine.readRetryBackoffMs,
      signal: ctx.signal,
    };
  }
}
