import { Test } from '@nestjs/testing';
import { ManualClock } from '../common/clock';
import { DEFAULT_ENGINE_SETTINGS } from '../config/app-config';
import { ExchangeAuthError } from '../exchanges/exchange.errors';
import { ExchangeAdapterFactory } from '../exchanges/exchange-adapter.factory';
import { OrderExecutorFactory } from '../executor/order-executor.factory';
import { FundingGate } from '../funding-gate/funding-gate.service';
import { NOTIFICATION_CHANNELS } from '../notification/notification.interface';
import { NotificationService } from '../notification/notification.service';
import { PositionRecorder } from '../recorder/position-recorder';
import { SqlitePositionRecorder } from '../recorder/sqlite-position-recorder';
import { ClockFactory } from '../scheduler/clock.factory';
import { FundingScheduler } from '../scheduler/funding-scheduler.service';
import { FakeExchangeAdapter } from '../testing/fake-exchange.adapter';
import { FundingCycleService } from './funding-cycle.service';
import { MonitoringTaskService } from './monitoring-task.service';
import { TaskAlreadyRunningError } from './task.errors';
import { MonitoringTaskSpec } from './task.interface';
import { TaskRegistry } from './task-registry.service';

const SETTLEMENT = Date.UTC(2024, 2, 10, 8, 0, 0);
const EIGHT_HOURS = 8 * 3_600_000;

const spec = (overrides: Partial<MonitoringTaskSpec> = {}): MonitoringTaskSpec => ({
  exchange: 'binance',
  symbol: 'BTCUSDT',
  threshold: -0.005,
  direction: 'negative',
  sizing: { kind: 'quantity', quantity: 0.01 },
  leverage: 5,
  loop: false,
  engine: { ...DEFAULT_ENGINE_SETTINGS, readRetryBackoffMs: 50 },
  ...overrides,
});

describe('MonitoringTaskService', () => {
  let clock: ManualClock;
  let adapter: FakeExchangeAdapter;
  let recorder: SqlitePositionRecorder;
  let send: jest.Mock;
  let service: MonitoringTaskService;

  beforeEach(async () => {
    clock = new ManualClock(SETTLEMENT - 60_000);
    adapter = new FakeExchangeAdapter(clock);
    adapter.fundingRate = {
      symbol: 'BTCUSDT',
      rate: -0.001,
      observedAt: SETTLEMENT - 20_000,
      nextSettlement: SETTLEMENT,
    };
    recorder = new SqlitePositionRecorder(':memory:');
    send = jest.fn().mockResolvedValue(undefined);

    const moduleRef = await Test.createTestingModule({
      providers: [
        MonitoringTaskService,
        FundingCycleService,
        TaskRegistry,
        FundingScheduler,
        FundingGate,
        OrderExecutorFactory,
        NotificationService,
        { provide: NOTIFICATION_CHANNELS, useValue: [{ name: 'spy', send }] },
        { provide: PositionRecorder, useValue: recorder },
        { provide: ExchangeAdapterFactory, useValue: { create: () => adapter } },
        { provide: ClockFactory, useValue: { create: async () => clock } },
      ],
    }).compile();

    service = moduleRef.get(MonitoringTaskService);
  });

  afterEach(() => {
    recorder.onModuleDestroy();
  });

  it('runs one cycle for the published settlement', async () => {
    const result = await service.run(spec(), new AbortController().signal);

    expect(result.fatal).toBeUndefined();
    expect(result.cycles).toHaveLength(1);
    expect(result.cycles[0]).toMatchObject({ status: 'skipped', settlementTime: SETTLEMENT });
    expect(adapter.initialized).toBe(true);
  });

  it('keeps looping over later settlements until stopped', async () => {
    const controller = new AbortController();
    send.mockImplementation(async () => {
      if (send.mock.calls.length === 2) {
        controller.abort();
      }
    });

    const result = await service.run(spec({ loop: true }), controller.signal);

    expect(result.cycles.map((cycle) => cycle.settlementTime)).toEqual([SETTLEMENT, SETTLEMENT + EIGHT_HOURS]);
    // the snapshot is a full interval old by the second pre-check
    expect(result.cycles[1].reason).toMatch(/^rate_unknown: funding rate is stale/);
  });

  it('reports an initialisation failure as fatal', async () => {
    adapter.initError = new ExchangeAuthError('invalid api key', 'binance');

    const result = await service.run(spec(), new AbortController().signal);

    expect(result.fatal).toBeInstanceOf(ExchangeAuthError);
    expect(result.cycles).toEqual([]);
  });

  it('refuses a duplicate task while one is running', async () => {
    const running = service.start(spec());

    expect(() => service.start(spec({ symbol: 'BTC/USDT:USDT' }))).toThrow(TaskAlreadyRunningError);

    const result = await running.done;
    expect(result.cycles).toHaveLength(1);
  });
});
