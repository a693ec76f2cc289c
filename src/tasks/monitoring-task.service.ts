import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { ExchangeAdapterFactory } from '../exchanges/exchange-adapter.factory';
import { ExchangeAdapter, FundingRateSnapshot } from '../exchanges/exchange.interface';
import { ClockFactory } from '../scheduler/clock.factory';
import { FundingScheduler } from '../scheduler/funding-scheduler.service';
import { FundingCycleService } from './funding-cycle.service';
import { RunningTask, TaskRegistry } from './task-registry.service';
import { toError } from './task.errors';
import { MonitoringTaskSpec, TaskResult } from './task.interface';

@Injectable()
export class MonitoringTaskService {
  private readonly logger = new Logger(MonitoringTaskService.name);

  constructor(
    private readonly adapterFactory: ExchangeAdapterFactory,
    private readonly clockFactory: ClockFactory,
    private readonly scheduler: FundingScheduler,
    private readonly cycleService: FundingCycleService,
    private readonly registry: TaskRegistry,
  ) {}

  /** Registers and starts a task; throws TaskAlreadyRunningError for a busy key. */
  start(spec: MonitoringTaskSpec): RunningTask {
    const task = this.registry.start(
      { exchange: spec.exchange, symbol: spec.symbol, threshold: spec.threshold, loop: spec.loop },
      (signal) => this.run(spec, signal),
    );
    void task.done.then((result) => this.logResult(result));
    return task;
  }

  /**
   * Runs one settlement cycle, or consecutive ones when `spec.loop` is set,
   * until aborted. Never rejects; initialisation and credential failures come
   * back as `fatal`.
   */
  async run(spec: MonitoringTaskSpec, signal: AbortSignal): Promise<TaskResult> {
    const result: TaskResult = { exchange: spec.exchange, symbol: spec.symbol, cycles: [] };
    const label = `${spec.exchange}:${spec.symbol}`;

    let adapter: ExchangeAdapter;
    let clock: Clock;
    try {
      adapter = this.adapterFactory.create(spec.exchange, { positionMode: spec.positionMode });
      await adapter.initialize();
      clock = await this.clockFactory.create(adapter, spec.engine.timeSyncSamples, spec.manualTime);
    } catch (error) {
      this.logger.error(`💥 ${label} could not start: ${String(error)}`);
      return { ...result, fatal: toError(error) };
    }

    const symbol = adapter.normalizeSymbol(spec.symbol);
    try {
      let window = this.scheduler.nextWindow(clock.now(), spec.engine, await this.peekFundingRate(adapter, symbol));
      while (!signal.aborted) {
        this.logger.log(`📅 ${label} next settlement ${new Date(window.settlementTime).toISOString()}`);
        const outcome = await this.cycleService.runCycle({ spec, adapter, clock, symbol, label, signal }, window);
        result.cycles.push(outcome);
        this.logger.log(`🔁 ${label} cycle ${outcome.status}: ${outcome.reason}`);

        if (outcome.fatal) {
          result.fatal = outcome.fatal;
          break;
        }
        if (!spec.loop) {
          break;
        }
        window = this.scheduler.followingWindow(
          window,
          clock.now(),
          spec.engine,
          await this.peekFundingRate(adapter, symbol),
        );
      }
    } catch (error) {
      this.logger.error(`💥 ${label} stopped on an unexpected error: ${String(error)}`);
      result.fatal = toError(error);
    }
    return result;
  }

  /** Funding snapshot for the published settlement time; absent when the read fails. */
  private async peekFundingRate(adapter: ExchangeAdapter, symbol: string): Promise<FundingRateSnapshot | undefined> {
    try {
      return await adapter.getFundingRate(symbol);
    } catch (error) {
      this.logger.debug(`Funding schedule unavailable for ${adapter.exchangeId}:${symbol}: ${String(error)}`);
      return undefined;
    }
  }

  private logResult(result: TaskResult): void {
    const summary = result.cycles.map((cycle) => cycle.status).join(', ') || 'no cycles';
    if (result.fatal) {
      this.logger.error(`🏁 ${result.exchange}:${result.symbol} ended with error: ${result.fatal.message} (${summary})`);
    } else {
      this.logger.log(`🏁 ${result.exchange}:${result.symbol} finished (${summary})`);
    }
  }
}
