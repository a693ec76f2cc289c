import { ManualClock } from '../common/clock';
import { ExchangeTransportError } from '../exchanges/exchange.errors';
import { FakeExchangeAdapter } from '../testing/fake-exchange.adapter';
import { TimeSyncService } from './time-sync.service';

describe('TimeSyncService', () => {
  const service = new TimeSyncService();

  it('keeps the sample with the smallest offset', async () => {
    const adapter = new FakeExchangeAdapter(new ManualClock(0));
    const serverTimes = [10_300, 20_120, 30_090, 40_200];
    jest.spyOn(adapter, 'getServerTime').mockImplementation(async () => {
      const next = serverTimes.shift();
      if (next === undefined) {
        throw new Error('no more samples');
      }
      return next;
    });
    // request sent / response received, 10ms round trip each
    const local = [10_000, 10_010, 20_000, 20_010, 30_000, 30_010, 40_000, 40_010];
    const localNow = () => local.shift() ?? 0;

    await expect(service.measureOffset(adapter, 4, localNow)).resolves.toBe(85);
  });

  it('skips failed samples', async () => {
    const adapter = new FakeExchangeAdapter(new ManualClock(0));
    jest
      .spyOn(adapter, 'getServerTime')
      .mockRejectedValueOnce(new ExchangeTransportError('timeout'))
      .mockResolvedValueOnce(1_500);

    await expect(service.measureOffset(adapter, 2, () => 1_000)).resolves.toBe(500);
  });

  it('falls back to zero when every sample fails', async () => {
    const adapter = new FakeExchangeAdapter(new ManualClock(0));
    jest.spyOn(adapter, 'getServerTime').mockRejectedValue(new ExchangeTransportError('timeout'));

    await expect(service.measureOffset(adapter, 3, () => 1_000)).resolves.toBe(0);
  });
});
