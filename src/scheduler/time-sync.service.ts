import { Injectable, Logger } from '@nestjs/common';
import { ExchangeAdapter } from '../exchanges/exchange.interface';

@Injectable()
export class TimeSyncService {
  private readonly logger = new Logger(TimeSyncService.name);

  /**
   * Offset (server − local, in ms) between the exchange and this host. Each
   * sample is centred on the request round trip; the sample with the smallest
   * magnitude is kept. Returns 0 when no sample succeeds.
   */
  async measureOffset(adapter: ExchangeAdapter, samples: number, localNow: () => number = Date.now): Promise<number> {
    let best: number | undefined;

    for (let i = 0; i < samples; i++) {
      const sentAt = localNow();
      try {
        const serverTime = await adapter.getServerTime();
        const receivedAt = localNow();
        const offset = serverTime - (sentAt + receivedAt) / 2;
        if (best === undefined || Math.abs(offset) < Math.abs(best)) {
          best = offset;
        }
      } catch (error) {
        this.logger.warn(`Server time sample ${i + 1}/${samples} failed on ${adapter.exchangeId}: ${String(error)}`);
      }
    }

    if (best === undefined) {
      this.logger.warn(`⚠️ Could not sync time with ${adapter.exchangeId}, using local clock`);
      return 0;
    }
    const offset = Math.round(best);
    this.logger.log(`🕒 ${adapter.exchangeId} clock offset: ${offset}ms`);
    return offset;
  }
}
