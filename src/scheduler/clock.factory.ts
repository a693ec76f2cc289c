import { Injectable, Logger } from '@nestjs/common';
import { Clock, SystemClock } from '../common/clock';
import { ExchangeAdapter } from '../exchanges/exchange.interface';
import { TimeSyncService } from './time-sync.service';

/** Supplies the clock a monitoring task runs on. */
@Injectable()
export class ClockFactory {
  private readonly logger = new Logger(ClockFactory.name);

  constructor(private readonly timeSync: TimeSyncService) {}

  /**
   * With a manual time the clock starts there and runs forward in real time;
   * otherwise it follows the exchange clock.
   */
  async create(adapter: ExchangeAdapter, samples: number, manualTime?: number): Promise<Clock> {
    if (manualTime !== undefined) {
      this.logger.warn(`🧪 Manual time override: ${new Date(manualTime).toISOString()}`);
      return SystemClock.startingAt(manualTime);
    }
    return new SystemClock(await this.timeSync.measureOffset(adapter, samples));
  }
}
