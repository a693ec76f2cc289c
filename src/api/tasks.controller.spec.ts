import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { AppConfigService } from '../config/config.service';
import { MonitoringTaskService } from '../tasks/monitoring-task.service';
import { MonitoringTaskSpec, TaskResult } from '../tasks/task.interface';
import { TaskRegistry } from '../tasks/task-registry.service';
import { HealthController } from './health.controller';
import { TasksController } from './tasks.controller';

const untilAborted = (signal: AbortSignal): Promise<TaskResult> =>
  new Promise((resolve) => {
    const settle = () => resolve({ exchange: 'binance', symbol: 'BTCUSDT', cycles: [] });
    if (signal.aborted) {
      settle();
      return;
    }
    signal.addEventListener('abort', settle, { once: true });
  });

describe('TasksController', () => {
  let registry: TaskRegistry;
  let controller: TasksController;
  let health: HealthController;
  let started: MonitoringTaskSpec[];

  beforeEach(async () => {
    registry = new TaskRegistry();
    started = [];
    const monitoringTasks = {
      start: (spec: MonitoringTaskSpec) => {
        started.push(spec);
        return registry.start(
          { exchange: spec.exchange, symbol: spec.symbol, threshold: spec.threshold, loop: spec.loop },
          untilAborted,
        );
      },
    };

    const moduleRef = await Test.createTestingModule({
      controllers: [TasksController, HealthController],
      providers: [
        { provide: TaskRegistry, useValue: registry },
        { provide: MonitoringTaskService, useValue: monitoringTasks },
        { provide: AppConfigService, useValue: new AppConfigService(new ConfigService({ DEFAULT_QUANTITY: '0.01' })) },
      ],
    }).compile();

    controller = moduleRef.get(TasksController);
    health = moduleRef.get(HealthController);
  });

  afterEach(async () => {
    await registry.stopAll();
  });

  it('starts a task with configured defaults and lists it', () => {
    const info = controller.start({ exchange: 'binance', symbol: 'BTCUSDT', threshold: -0.01 });

    expect(info).toMatchObject({ key: 'binance:BTC/USDT:USDT', threshold: -0.01, loop: false });
    expect(started[0].sizing).toEqual({ kind: 'quantity', quantity: 0.01 });
    expect(controller.list()).toHaveLength(1);
    expect(health.check()).toMatchObject({ status: 'ok', tasks: 1 });
  });

  it('answers 409 for a symbol that is already monitored', () => {
    controller.start({ exchange: 'binance', symbol: 'BTCUSDT' });

    expect(() => controller.start({ exchange: 'binance', symbol: 'BTC/USDT:USDT' })).toThrow(ConflictException);
  });

  it('answers 400 for contradictory sizing', () => {
    expect(() => controller.start({ exchange: 'bybit', symbol: 'BTCUSDT', quantity: 1, margin: 100 })).toThrow(
      BadRequestException,
    );
  });

  it('stops a running task', async () => {
    const running = controller.start({ exchange: 'gateio', symbol: 'ETHUSDT' });

    expect(controller.stop('gateio', 'ETHUSDT')).toEqual({ stopping: 'gateio:ETHUSDT' });
    await registry.stopAll();
    expect(controller.list()).toEqual([]);
    expect(running.key).toBe('gateio:ETH/USDT:USDT');
  });

  it('answers 404 for unknown tasks and exchanges', () => {
    expect(() => controller.stop('bybit', 'BTCUSDT')).toThrow(NotFoundException);
    expect(() => controller.stop('kraken', 'BTCUSDT')).toThrow(NotFoundException);
  });
});
