import { ManualClock } from '../common/clock';
import { ExchangeAuthError, ExchangeRejectedError, ExchangeTransportError } from '../exchanges/exchange.errors';
import { SqlitePositionRecorder } from '../recorder/sqlite-position-recorder';
import { FakeExchangeAdapter } from '../testing/fake-exchange.adapter';
import { ExecutionPlan, ExecutorSettings } from './executor.interface';
import { IllegalStateTransitionError, OrderExecutor } from './order-executor';

const T0 = Date.UTC(2024, 2, 10, 7, 59, 55);
const SETTLEMENT = T0 + 5_000;

const settings: ExecutorSettings = {
  pollIntervalMs: 200,
  openFillTimeoutMs: 1_000,
  monitorCeilingMs: 60_000,
  feeBuffer: 0.001,
  stopLossThreshold: 0.001,
  stopLossCheckIntervalMs: 1_000,
  armStopLossAtSettlement: true,
  readRetryAttempts: 2,
  readRetryBackoffMs: 50,
};

describe('OrderExecutor', () => {
  let clock: ManualClock;
  let adapter: FakeExchangeAdapter;
  let recorder: SqlitePositionRecorder;

  const planFor = (overrides: Partial<ExecutionPlan> = {}): ExecutionPlan => ({
    symbol: 'BTC/USDT:USDT',
    exchange: 'binance',
    side: 'long',
    quantity: 0.01,
    leverage: 5,
    fundingRateAtDecision: -0.006,
    settlementTime: SETTLEMENT,
    actionDeadline: T0 + 30_000,
    instrument: adapter.instrument,
    ...overrides,
  });

  const executor = (overrides: Partial<ExecutorSettings> = {}, signal?: AbortSignal) =>
    new OrderExecutor(adapter, recorder, clock, { ...settings, ...overrides }, signal);

  beforeEach(() => {
    clock = new ManualClock(T0);
    adapter = new FakeExchangeAdapter(clock);
    recorder = new SqlitePositionRecorder(':memory:');
  });

  afterEach(() => {
    recorder.onModuleDestroy();
  });

  it('opens, places the take-profit order and records the filled close', async () => {
    adapter.fillPlan = (request, index) =>
      index === 0 ? { afterMs: 0, price: 100 } : { afterMs: 7_000, price: request.price };

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('closed');
    expect(result.states).toEqual(['IDLE', 'OPEN_SUBMITTED', 'OPEN_FILLED', 'CLOSE_SUBMITTED', 'CLOSE_FILLED', 'DONE']);
    expect(adapter.placed[0]).toMatchObject({ side: 'buy', positionSide: 'long', type: 'market', reduceOnly: false });
    expect(adapter.placed[1]).toMatchObject({
      side: 'sell',
      type: 'limit',
      price: 99.3,
      quantity: 0.01,
      reduceOnly: true,
    });
    expect(result.order).toMatchObject({
      openOrderId: 'order-1',
      openPrice: 100,
      closeOrderId: 'order-2',
      closeTargetPrice: 99.3,
      closePrice: 99.3,
      closeStatus: 'FILLED',
      closeTime: T0 + 7_000,
      pnl: { amount: -0.007, percent: -0.7 },
    });
    expect(adapter.cancelled).toEqual([]);

    await expect(recorder.findById(1)).resolves.toMatchObject({
      openTime: T0,
      openPrice: 100,
      direction: 'long',
      orderId: 'order-1',
      closePrice: 99.3,
      closeOrderId: 'order-2',
      closeStatus: 'FILLED',
      closeTime: T0 + 7_000,
      pnlAmount: -0.007,
    });
  });

  it('buys back above the open price for a short position', async () => {
    adapter.fillPlan = (request) => ({ afterMs: 0, price: request.price ?? 100 });

    const result = await executor().execute(planFor({ side: 'short', fundingRateAtDecision: 0.006 }));

    expect(result.outcome).toBe('closed');
    expect(adapter.placed[0]).toMatchObject({ side: 'sell', positionSide: 'short', type: 'market' });
    expect(adapter.placed[1]).toMatchObject({ side: 'buy', type: 'limit', price: 100.7, reduceOnly: true });
  });

  it('cancels an unfilled opening order exactly once at the fill timeout', async () => {
    adapter.fillPlan = () => ({});

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('unfilled');
    expect(result.states).toEqual(['IDLE', 'OPEN_SUBMITTED', 'DONE']);
    expect(adapter.cancelled).toEqual(['order-1']);
    // six polls up to the deadline, one read after the cancel
    expect(adapter.statusPolls).toHaveLength(7);
    expect(adapter.placed).toHaveLength(1);
    expect(clock.now()).toBe(T0 + 1_000);
    expect(recorder.count()).toBe(0);
  });

  it('bounds the opening order by the action deadline', async () => {
    adapter.fillPlan = () => ({});

    const result = await executor({ openFillTimeoutMs: 600_000 }).execute(planFor({ actionDeadline: T0 + 1_400 }));

    expect(result.outcome).toBe('unfilled');
    expect(adapter.cancelled).toEqual(['order-1']);
    expect(clock.now()).toBe(T0 + 1_400);
  });

  it('stops out with a reduce-only market order when the mark crosses the trigger', async () => {
    adapter.fillPlan = (request, index) =>
      request.type === 'market' ? { afterMs: 0, price: index === 0 ? 100 : 99.84 } : {};
    adapter.markPrice = (now) => (now >= T0 + 6_000 ? 99.85 : 100);

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('stopped_out');
    expect(result.states).toEqual([
      'IDLE',
      'OPEN_SUBMITTED',
      'OPEN_FILLED',
      'CLOSE_SUBMITTED',
      'STOP_TRIGGERED',
      'DONE',
    ]);
    expect(adapter.cancelled).toEqual(['order-2']);
    expect(adapter.placed[2]).toMatchObject({ side: 'sell', type: 'market', quantity: 0.01, reduceOnly: true });
    expect(result.order).toMatchObject({
      stopOrderId: 'order-3',
      closePrice: 99.84,
      closeStatus: 'STOP_TRIGGERED',
      closeTime: T0 + 6_000,
    });
    await expect(recorder.findById(1)).resolves.toMatchObject({
      closePrice: 99.84,
      closeOrderId: 'order-3',
      closeStatus: 'STOP_TRIGGERED',
    });
  });

  it('stops waiting for the stop-loss fill on a manual stop', async () => {
    const controller = new AbortController();
    adapter.fillPlan = (request, index) => (index === 0 ? { afterMs: 0, price: 100 } : {});
    adapter.markPrice = (now) => {
      if (now >= T0 + 6_000) {
        controller.abort();
        return 99.85;
      }
      return 100;
    };

    const result = await executor({}, controller.signal).execute(planFor());

    expect(result.outcome).toBe('stopped_out');
    expect(result.order).toMatchObject({ stopOrderId: 'order-3', closePrice: 99.85 });
    expect(adapter.statusPolls.filter((id) => id === 'order-3')).toHaveLength(1);
    expect(clock.now()).toBe(T0 + 6_000);
  });

  it('ignores adverse marks before settlement while the watch is unarmed', async () => {
    adapter.fillPlan = (request, index) =>
      index === 0 ? { afterMs: 0, price: 100 } : { afterMs: 3_000, price: request.price };
    adapter.markPrice = () => 99.5;

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('closed');
    expect(adapter.cancelled).toEqual([]);
  });

  it('cancels the close order at the monitoring ceiling and leaves the position open', async () => {
    adapter.fillPlan = (request) => (request.type === 'market' ? { afterMs: 0, price: 100 } : {});

    const result = await executor({ monitorCeilingMs: 2_000 }).execute(planFor());

    expect(result.outcome).toBe('monitor_timeout');
    expect(result.states).toEqual([
      'IDLE',
      'OPEN_SUBMITTED',
      'OPEN_FILLED',
      'CLOSE_SUBMITTED',
      'CLOSE_CANCELLED',
      'DONE',
    ]);
    expect(adapter.cancelled).toEqual(['order-2']);
    expect(clock.now()).toBe(T0 + 2_000);
    await expect(recorder.findById(1)).resolves.toMatchObject({ closeStatus: 'CANCELLED', closePrice: null });
  });

  it('reports a close order cancelled by the exchange', async () => {
    adapter.fillPlan = (request) => (request.type === 'market' ? { afterMs: 0, price: 100 } : {});
    adapter.markPrice = (now) => {
      if (now >= T0 + 1_000) {
        adapter.cancelExternally('order-2');
      }
      return 100;
    };

    const result = await executor({ armStopLossAtSettlement: false }).execute(planFor());

    expect(result.outcome).toBe('close_cancelled');
    expect(adapter.cancelled).toEqual([]);
    expect(result.order.closeStatus).toBe('CANCELLED');
  });

  it('abandons with outcome rejected when the exchange refuses the opening order', async () => {
    adapter.placeFailures.push({ error: new ExchangeRejectedError('insufficient margin', 'binance'), submitted: false });

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('rejected');
    expect(result.states).toEqual(['IDLE', 'DONE']);
    expect(result.error).toBeInstanceOf(ExchangeRejectedError);
    expect(adapter.placed).toHaveLength(0);
  });

  it('cancels the pending close order when credentials fail mid-monitoring', async () => {
    adapter.fillPlan = (request) => (request.type === 'market' ? { afterMs: 0, price: 100 } : {});
    adapter.markPriceFailures.push(new ExchangeAuthError('invalid api key', 'binance'));

    const result = await executor({ armStopLossAtSettlement: false }).execute(planFor());

    expect(result.outcome).toBe('aborted');
    expect(result.error).toBeInstanceOf(ExchangeAuthError);
    expect(result.states).toEqual(['IDLE', 'OPEN_SUBMITTED', 'OPEN_FILLED', 'CLOSE_SUBMITTED', 'DONE']);
    expect(adapter.cancelled).toEqual(['order-2']);
    await expect(recorder.findById(1)).resolves.toMatchObject({ closeStatus: 'CANCELLED', closeOrderId: 'order-2' });
  });

  it('does nothing when stopped before starting', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await executor({}, controller.signal).execute(planFor());

    expect(result.outcome).toBe('stopped_manually');
    expect(result.states).toEqual(['IDLE', 'DONE']);
    expect(adapter.placed).toHaveLength(0);
  });

  it('cancels the close order once on a manual stop', async () => {
    const controller = new AbortController();
    adapter.fillPlan = (request) => (request.type === 'market' ? { afterMs: 0, price: 100 } : {});
    adapter.markPrice = (now) => {
      if (now >= T0 + 2_000) {
        controller.abort();
      }
      return 100;
    };

    const result = await executor({ armStopLossAtSettlement: false }, controller.signal).execute(planFor());

    expect(result.outcome).toBe('stopped_manually');
    expect(result.states).toContain('CLOSE_CANCELLED');
    expect(adapter.cancelled).toEqual(['order-2']);
    expect(clock.now()).toBe(T0 + 2_000);
  });

  it('adopts an order that landed despite a transport failure', async () => {
    adapter.fillPlan = (request) => ({ afterMs: 0, price: request.price ?? 100 });
    adapter.placeFailures.push({ error: new ExchangeTransportError('socket hang up', 'binance'), submitted: true });

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('closed');
    expect(result.order.openOrderId).toBe('order-1');
    expect(adapter.placed).toHaveLength(2);
  });

  it('resends an order lost in transit with the same client id', async () => {
    adapter.fillPlan = (request) => ({ afterMs: 0, price: request.price ?? 100 });
    adapter.placeFailures.push({ error: new ExchangeTransportError('socket hang up', 'binance'), submitted: false });

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('closed');
    expect(adapter.placed).toHaveLength(2);
    expect(adapter.placed[0].clientOrderId).toMatch(/^fao/);
  });

  it('keeps polling after a status read keeps failing', async () => {
    adapter.fillPlan = (request) => ({ afterMs: 0, price: request.price ?? 100 });
    adapter.statusFailures.push(
      new ExchangeTransportError('timeout', 'binance'),
      new ExchangeTransportError('timeout', 'binance'),
      new ExchangeTransportError('timeout', 'binance'),
    );

    const result = await executor().execute(planFor());

    expect(result.outcome).toBe('closed');
    expect(clock.now()).toBe(T0 + 300);
  });

  it('runs a single order per executor', async () => {
    adapter.fillPlan = (request) => ({ afterMs: 0, price: request.price ?? 100 });
    const once = executor();
    await once.execute(planFor());

    await expect(once.execute(planFor())).rejects.toThrow(IllegalStateTransitionError);
  });
});
