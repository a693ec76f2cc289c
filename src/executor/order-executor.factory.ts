import { Injectable } from '@nestjs/common';
import { Clock } from '../common/clock';
import { ExchangeAdapter } from '../exchanges/exchange.interface';
import { PositionRecorder } from '../recorder/position-recorder';
import { ExecutorSettings } from './executor.interface';
import { OrderExecutor } from './order-executor';

/** Executors are single-use; one is built per funding cycle. */
@Injectable()
export class OrderExecutorFactory {
  constructor(private readonly recorder: PositionRecorder) {}

  create(adapter: ExchangeAdapter, clock: Clock, settings: ExecutorSettings, signal?: AbortSignal): OrderExecutor {
    return new OrderExecutor(adapter, this.recorder, clock, settings, signal);
  }
}
