import { gate } from 'ccxt';
import { GateioAdapter } from './gateio.adapter';

const CLIENT_ID = 'faolt2abc12deadbeef';

/** A futures order as Gate returns it, run through ccxt's own parser. */
const gateOrder = (id: string, text: string, status: 'open' | 'finished') =>
  new gate().parseOrder({
    id,
    contract: 'BTC_USDT',
    text,
    status,
    finish_as: status === 'finished' ? 'filled' : '_new',
    size: 1,
    left: status === 'finished' ? 0 : 1,
    price: '0',
    tif: 'ioc',
    create_time: 1710057595.123,
  });

describe('GateioAdapter', () => {
  const adapter = new GateioAdapter(
    { credentials: { apiKey: 'test-key', secretKey: 'test-secret' }, positionMode: 'one-way', testnet: false },
    5_000,
  );

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('finds an open order whose text carries the t- prefix', async () => {
    const open = gateOrder('123', `t-${CLIENT_ID}`, 'open');
    jest.spyOn(gate.prototype, 'fetchOpenOrders').mockResolvedValue([open]);
    const closed = jest.spyOn(gate.prototype, 'fetchClosedOrders').mockResolvedValue([]);

    expect(open.clientOrderId).toBe(`t-${CLIENT_ID}`);
    await expect(adapter.findOrderByClientId('BTCUSDT', CLIENT_ID)).resolves.toBe('123');
    expect(closed).not.toHaveBeenCalled();
  });

  it('falls back to recently closed orders', async () => {
    jest.spyOn(gate.prototype, 'fetchOpenOrders').mockResolvedValue([]);
    jest.spyOn(gate.prototype, 'fetchClosedOrders').mockResolvedValue([gateOrder('456', `t-${CLIENT_ID}`, 'finished')]);

    await expect(adapter.findOrderByClientId('BTCUSDT', CLIENT_ID)).resolves.toBe('456');
  });

  it('ignores orders placed under another client id', async () => {
    jest.spyOn(gate.prototype, 'fetchOpenOrders').mockResolvedValue([gateOrder('789', 't-faoother0000000000', 'open')]);
    jest.spyOn(gate.prototype, 'fetchClosedOrders').mockResolvedValue([]);

    await expect(adapter.findOrderByClientId('BTCUSDT', CLIENT_ID)).resolves.toBeUndefined();
  });
});
