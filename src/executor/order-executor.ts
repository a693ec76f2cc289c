import { Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { roundToStep } from '../common/helper';
import { RetryOptions, withRetry } from '../common/retry';
import { ExchangeAdapter, OrderStatus, PlaceOrderRequest } from '../exchanges/exchange.interface';
import {
  ExchangeAuthError,
  ExchangeError,
  ExchangeRejectedError,
  ExchangeTransportError,
} from '../exchanges/exchange.errors';
import { PositionRecorder } from '../recorder/position-recorder';
import { ArbitrageOrder, CloseStatus, closesPosition } from './arbitrage-order';
import { closingSide, computeClosePrice, entrySide, roundClosePrice } from './close-price';
import { newClientOrderId } from './client-order-id';
import {
  ExecutionOutcome,
  ExecutionPlan,
  ExecutionResult,
  ExecutorSettings,
  ExecutorState,
} from './executor.interface';
import { StopLossWatch, createStopLossWatch, isBreached } from './stop-loss-watch';

const TRANSITIONS: Record<ExecutorState, readonly ExecutorState[]> = {
  IDLE: ['OPEN_SUBMITTED', 'DONE'],
  OPEN_SUBMITTED: ['OPEN_FILLED', 'DONE'],
  OPEN_FILLED: ['CLOSE_SUBMITTED', 'DONE'],
  CLOSE_SUBMITTED: ['CLOSE_FILLED', 'STOP_TRIGGERED', 'CLOSE_CANCELLED', 'DONE'],
  CLOSE_FILLED: ['DONE'],
  STOP_TRIGGERED: ['DONE'],
  CLOSE_CANCELLED: ['DONE'],
  DONE: [],
};

/** Polls allowed for a stop-loss market order to report its fill price. */
const MARKET_FILL_POLLS = 10;

export class IllegalStateTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = IllegalStateTransitionError.name;
  }
}

type OpenFill = { kind: 'filled'; status: OrderStatus } | { kind: 'ended'; outcome: ExecutionOutcome };

/**
 * Drives one ArbitrageOrder from the opening market order to a terminal close:
 *
 *   IDLE → OPEN_SUBMITTED → OPEN_FILLED → CLOSE_SUBMITTED
 *        → CLOSE_FILLED | STOP_TRIGGERED | CLOSE_CANCELLED → DONE
 *
 * Any state may jump to DONE on a fatal error or a manual stop, after the
 * outstanding order has been cancelled. Each order id is cancelled at most once.
 */
export class OrderExecutor {
  private readonly logger = new Logger(OrderExecutor.name);
  private state: ExecutorState = 'IDLE';
  private readonly history: ExecutorState[] = ['IDLE'];
  private readonly cancelRequested = new Set<string>();
  private label = '';

  constructor(
    private readonly adapter: ExchangeAdapter,
    private readonly recorder: PositionRecorder,
    private readonly clock: Clock,
    private readonly settings: ExecutorSettings,
    private readonly signal?: AbortSignal,
  ) {}

  get currentState(): ExecutorState {
    return this.state;
  }

  private get stopped(): boolean {
    return this.signal?.aborted ?? false;
  }

  async execute(plan: ExecutionPlan): Promise<ExecutionResult> {
    if (this.state !== 'IDLE') {
      throw new IllegalStateTransitionError('An executor runs a single order');
    }
    this.label = `${plan.exchange}:${plan.symbol}`;
    const order = new ArbitrageOrder(plan);

    try {
      if (this.stopped) {
        return this.finish(order, 'stopped_manually');
      }
      return await this.run(order, plan);
    } catch (error) {
      return this.abandon(order, plan, error);
    }
  }

  private async run(order: ArbitrageOrder, plan: ExecutionPlan): Promise<ExecutionResult> {
    const submittedAt = this.clock.now();
    const openOrderId = await this.placeOrder({
      symbol: plan.symbol,
      side: entrySide(plan.side),
      positionSide: plan.side,
      type: 'market',
      quantity: plan.quantity,
      reduceOnly: false,
      clientOrderId: newClientOrderId('open', submittedAt),
    });
    order.markOpenSubmitted(openOrderId);
    this.transition('OPEN_SUBMITTED');
    this.logger.log(`📤 ${this.label} opened ${plan.side} ${plan.quantity} (order ${openOrderId})`);

    const fill = await this.awaitOpenFill(openOrderId, plan, submittedAt);
    if (fill.kind === 'ended') {
      return this.finish(order, fill.outcome);
    }

    const openPrice = fill.status.averagePrice ?? (await this.readMarkPrice(plan.symbol));
    if (openPrice === undefined) {
      throw new ExchangeError(`Fill price of ${openOrderId} is unknown`, plan.exchange);
    }
    const filledQuantity = fill.status.filledQuantity > 0 ? fill.status.filledQuantity : plan.quantity;
    order.markOpenFilled(openPrice, this.clock.now(), filledQuantity);
    this.transition('OPEN_FILLED');
    this.logger.log(`✅ ${this.label} open filled ${filledQuantity} @ ${openPrice}`);
    await this.recordOpen(order, openOrderId, openPrice);

    const target = roundClosePrice(
      computeClosePrice(openPrice, order.fundingRateAtDecision, this.settings.feeBuffer, plan.side),
      plan.instrument.tickSize,
      plan.side,
    );
    const closeOrderId = await this.placeOrder({
      symbol: plan.symbol,
      side: closingSide(plan.side),
      positionSide: plan.side,
      type: 'limit',
      quantity: roundToStep(filledQuantity, plan.instrument.stepSize, 'down'),
      price: target,
      reduceOnly: true,
      clientOrderId: newClientOrderId('close', this.clock.now()),
    });
    order.assignCloseOrder(closeOrderId, target);
    this.transition('CLOSE_SUBMITTED');
    this.logger.log(`🎯 ${this.label} close order ${closeOrderId} @ ${target}`);

    return this.monitorClose(order, plan, closeOrderId, openPrice, target);
  }

  /**
   * Polls the opening order until it fills, the exchange cancels it, or the
   * deadline (fill timeout or action deadline, whichever is first) passes.
   */
  private async awaitOpenFill(orderId: string, plan: ExecutionPlan, submittedAt: number): Promise<OpenFill> {
    const deadline = Math.min(submittedAt + this.settings.openFillTimeoutMs, plan.actionDeadline);

    for (;;) {
      const status = await this.pollStatus(plan.symbol, orderId);
      if (status?.state === 'FILLED') {
        return { kind: 'filled', status };
      }
      if (status?.state === 'CANCELLED') {
        if (status.filledQuantity > 0) {
          return { kind: 'filled', status };
        }
        this.logger.warn(`${this.label} opening order ${orderId} was cancelled by the exchange`);
        return { kind: 'ended', outcome: 'unfilled' };
      }

      if (this.stopped) {
        const final = await this.cancelOnce(plan.symbol, orderId, 'manual stop');
        if (final && final.filledQuantity > 0) {
          this.logger.error(`⚠️ ${this.label} opening order filled before the stop; position left open`);
        }
        return { kind: 'ended', outcome: 'stopped_manually' };
      }

      const now = this.clock.now();
      if (now >= deadline) {
        const final = await this.cancelOnce(plan.symbol, orderId, 'open fill timeout');
        if (final && final.filledQuantity > 0) {
          return { kind: 'filled', status: final };
        }
        this.logger.warn(`⌛ ${this.label} opening order ${orderId} unfilled after ${now - submittedAt}ms`);
        return { kind: 'ended', outcome: 'unfilled' };
      }
      await this.clock.sleep(Math.min(this.settings.pollIntervalMs, deadline - now), this.signal);
    }
  }

  /**
   * Polls the take-profit order while the stop-loss watch samples the mark
   * price. Ends on fill, stop, exchange cancellation, manual stop or ceiling.
   * The ceiling counts from close submission; the open phase before it is
   * bounded by the open deadline.
   */
  private async monitorClose(
    order: ArbitrageOrder,
    plan: ExecutionPlan,
    closeOrderId: string,
    openPrice: number,
    target: number,
  ): Promise<ExecutionResult> {
    const ceiling = this.clock.now() + this.settings.monitorCeilingMs;
    const watch = createStopLossWatch(
      openPrice,
      plan.side,
      this.settings.stopLossThreshold,
      !this.settings.armStopLossAtSettlement || this.clock.now() >= plan.settlementTime,
    );
    let lastCheck: number | undefined;

    for (;;) {
      const status = await this.pollStatus(plan.symbol, closeOrderId);
      if (status?.state === 'FILLED') {
        return this.closeFilled(order, status, target);
      }
      if (status?.state === 'CANCELLED') {
        return this.closeCancelled(order, closeOrderId, 'close_cancelled', 'close order cancelled by the exchange');
      }

      if (this.stopped) {
        const final = await this.cancelOnce(plan.symbol, closeOrderId, 'manual stop');
        if (final?.state === 'FILLED') {
          return this.closeFilled(order, final, target);
        }
        return this.closeCancelled(order, closeOrderId, 'stopped_manually', 'stopped manually');
      }

      const now = this.clock.now();
      if (!watch.armed && now >= plan.settlementTime) {
        watch.armed = true;
        this.logger.log(`🛡️ ${this.label} stop-loss armed at ${watch.triggerPrice}`);
      }
      if (watch.armed && (lastCheck === undefined || now - lastCheck >= this.settings.stopLossCheckIntervalMs)) {
        lastCheck = now;
        const mark = await this.readMarkPrice(plan.symbol);
        watch.checkedAt = now;
        if (mark !== undefined && isBreached(watch, mark)) {
          return this.triggerStop(order, plan, closeOrderId, watch, mark, target);
        }
      }

      const afterChecks = this.clock.now();
      if (afterChecks >= ceiling) {
        const final = await this.cancelOnce(plan.symbol, closeOrderId, 'monitoring ceiling');
        if (final?.state === 'FILLED') {
          return this.closeFilled(order, final, target);
        }
        return this.closeCancelled(
          order,
          closeOrderId,
          'monitor_timeout',
          `monitoring ceiling of ${this.settings.monitorCeilingMs}ms reached, position remains open`,
        );
      }
      await this.clock.sleep(Math.min(this.settings.pollIntervalMs, ceiling - afterChecks), this.signal);
    }
  }

  private async triggerStop(
    order: ArbitrageOrder,
    plan: ExecutionPlan,
    closeOrderId: string,
    watch: StopLossWatch,
    mark: number,
    target: number,
  ): Promise<ExecutionResult> {
    this.logger.warn(`🛑 ${this.label} stop-loss: mark ${mark} crossed ${watch.triggerPrice}`);
    const final = await this.cancelOnce(plan.symbol, closeOrderId, 'stop-loss');
    if (final?.state === 'FILLED') {
      return this.closeFilled(order, final, target);
    }

    const remaining = roundToStep(order.openQuantity - (final?.filledQuantity ?? 0), plan.instrument.stepSize, 'down');
    const stopOrderId = await this.placeOrder({
      symbol: plan.symbol,
      side: closingSide(plan.side),
      positionSide: plan.side,
      type: 'market',
      quantity: remaining,
      reduceOnly: true,
      clientOrderId: newClientOrderId('stop', this.clock.now()),
    });
    order.stopOrderId = stopOrderId;

    const fillPrice = (await this.awaitMarketFill(plan.symbol, stopOrderId)) ?? mark;
    order.completeClose('STOP_TRIGGERED', fillPrice, this.clock.now());
    this.transition('STOP_TRIGGERED');
    await this.recordClose(order, fillPrice, stopOrderId, 'STOP_TRIGGERED');
    this.logger.warn(`🛑 ${this.label} stopped out @ ${fillPrice} (order ${stopOrderId}), pnl ${order.pnl?.amount}`);
    return this.finish(order, 'stopped_out');
  }

  private async closeFilled(order: ArbitrageOrder, status: OrderStatus, target: number): Promise<ExecutionResult> {
    const price = status.averagePrice ?? target;
    order.completeClose('FILLED', price, this.clock.now());
    this.transition('CLOSE_FILLED');
    await this.recordClose(order, price, status.orderId, 'FILLED');
    this.logger.log(`💰 ${this.label} closed @ ${price}, pnl ${order.pnl?.amount} (${order.pnl?.percent}%)`);
    return this.finish(order, 'closed');
  }

  private async closeCancelled(
    order: ArbitrageOrder,
    closeOrderId: string,
    outcome: ExecutionOutcome,
    reason: string,
  ): Promise<ExecutionResult> {
    order.transitionClose('CANCELLED');
    this.transition('CLOSE_CANCELLED');
    await this.recordClose(order, null, closeOrderId, 'CANCELLED');
    this.logger.warn(`⚠️ ${this.label} ${reason}`);
    return this.finish(order, outcome);
  }

  /** Cancels whatever is outstanding and ends in DONE. Never throws. */
  private async abandon(order: ArbitrageOrder, plan: ExecutionPlan, error: unknown): Promise<ExecutionResult> {
    const failure = error instanceof Error ? error : new Error(String(error));
    const outcome: ExecutionOutcome = failure instanceof ExchangeRejectedError ? 'rejected' : 'aborted';
    this.logger.error(
      `💥 ${this.label} abandoned in ${this.state}: ${failure.message}`,
      JSON.stringify({ error: failure.name, order: order.snapshot() }),
    );

    try {
      if (this.state === 'OPEN_SUBMITTED' && order.openOrderId !== undefined) {
        await this.cancelOnce(plan.symbol, order.openOrderId, 'abandon');
      }
      if (order.closeStatus === 'PENDING' && order.closeOrderId !== undefined) {
        await this.cancelOnce(plan.symbol, order.closeOrderId, 'abandon');
        order.transitionClose('CANCELLED');
        await this.recordClose(order, null, order.closeOrderId, 'CANCELLED');
      }
    } catch (cleanupError) {
      this.logger.error(`${this.label} cleanup after failure did not complete: ${String(cleanupError)}`);
    }

    if (order.openFillTime !== undefined && !closesPosition(order.closeStatus)) {
      this.logger.error(`⚠️ ${this.label} position of ${order.openQuantity} remains open and needs attention`);
    }
    return this.finish(order, outcome, failure);
  }

  private finish(order: ArbitrageOrder, outcome: ExecutionOutcome, error?: Error): ExecutionResult {
    this.transition('DONE');
    this.logger.log(`🏁 ${this.label} done: ${outcome}`);
    return { outcome, order: order.snapshot(), states: [...this.history], error };
  }

  private transition(next: ExecutorState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new IllegalStateTransitionError(`Illegal executor transition ${this.state} → ${next}`);
    }
    this.logger.debug(`${this.label} ${this.state} → ${next}`);
    this.state = next;
    this.history.push(next);
  }

  /**
   * Places an order. After a transport failure the exchange is asked whether
   * the order landed (by client id) before it is sent once more.
   */
  private async placeOrder(request: PlaceOrderRequest): Promise<string> {
    try {
      return await this.adapter.placeOrder(request);
    } catch (error) {
      if (!(error instanceof ExchangeTransportError)) {
        this.logger.error(`${this.label} order refused: ${String(error)}`, JSON.stringify(request));
        throw error;
      }
      this.logger.warn(`${this.label} placement of ${request.clientOrderId} failed in transit, checking exchange`);
      const existing = await withRetry(
        () => this.adapter.findOrderByClientId(request.symbol, request.clientOrderId),
        this.retryOptions(),
      );
      if (existing !== undefined) {
        this.logger.log(`${this.label} order ${request.clientOrderId} had landed as ${existing}`);
        return existing;
      }
      return this.adapter.placeOrder(request);
    }
  }

  /** Cancels an order once and re-reads its status to learn how it ended. */
  private async cancelOnce(symbol: string, orderId: string, reason: string): Promise<OrderStatus | undefined> {
    if (!this.cancelRequested.has(orderId)) {
      this.cancelRequested.add(orderId);
      try {
        await this.adapter.cancelOrder(symbol, orderId);
        this.logger.log(`🚫 ${this.label} cancelled ${orderId} (${reason})`);
      } catch (error) {
        this.logger.warn(`${this.label} cancel of ${orderId} failed (${reason}): ${String(error)}`);
      }
    }
    return this.pollStatus(symbol, orderId);
  }

  /** Status read with transport retries. Returns undefined when the read keeps failing. */
  private async pollStatus(symbol: string, orderId: string): Promise<OrderStatus | undefined> {
    try {
      return await withRetry(() => this.adapter.getOrderStatus(symbol, orderId), this.retryOptions());
    } catch (error) {
      if (error instanceof ExchangeAuthError) {
        throw error;
      }
      this.logger.warn(`${this.label} status of ${orderId} unavailable: ${String(error)}`);
      return undefined;
    }
  }

  private async readMarkPrice(symbol: string): Promise<number | undefined> {
    try {
      return await withRetry(() => this.adapter.getMarkPrice(symbol), this.retryOptions());
    } catch (error) {
      if (error instanceof ExchangeAuthError) {
        throw error;
      }
      this.logger.warn(`${this.label} mark price unavailable: ${String(error)}`);
      return undefined;
    }
  }

  private async awaitMarketFill(symbol: string, orderId: string): Promise<number | undefined> {
    for (let i = 0; i < MARKET_FILL_POLLS; i++) {
      const status = await this.pollStatus(symbol, orderId);
      if (status?.state === 'FILLED') {
        return status.averagePrice;
      }
      if (this.stopped) {
        break;
      }
      await this.clock.sleep(this.settings.pollIntervalMs, this.signal);
    }
    return undefined;
  }

  private async recordOpen(order: ArbitrageOrder, orderId: string, openPrice: number): Promise<void> {
    try {
      order.recordId = await this.recorder.recordOpen({
        symbol: order.symbol,
        exchange: order.exchange,
        openTime: order.openFillTime ?? this.clock.now(),
        openPrice,
        quantity: order.openQuantity,
        leverage: order.leverage,
        direction: order.side,
        orderId,
        marginAmount: order.marginAmount,
      });
    } catch (error) {
      this.logger.error(`${this.label} could not record open: ${String(error)}`);
    }
  }

  private async recordClose(
    order: ArbitrageOrder,
    closePrice: number | null,
    closeOrderId: string | null,
    closeStatus: CloseStatus,
  ): Promise<void> {
    if (order.recordId === undefined) {
      return;
    }
    try {
      await this.recorder.recordClose(order.recordId, {
        closePrice,
        closeOrderId,
        closeStatus,
        closeTime: order.closeTime ?? this.clock.now(),
        pnlAmount: order.pnl?.amount ?? null,
      });
    } catch (error) {
      this.logger.error(`${this.label} could not record close: ${String(error)}`);
    }
  }

  private retryOptions(): RetryOptions {
    return {
      clock: this.clock,
      attempts: this.settings.readRetryAttempts,
      backoffMs: this.settings.readRetryBackoffMs,
      signal: this.signal,
    };
  }
}
