import { describe, expect, it } from 'vitest';
import { FakeExchange } from '../testing/fakeExchange.js';
import { FixedClock } from '../testing/helpers.js';
import { DependencyError } from '../utils/errors.js';
import { DryRunExchange } from './dryRun.js';

describe('DryRunExchange', () => {
    it('reads market data from the wrapped exchange', async () => {
        const live = new FakeExchange(new FixedClock());
        live.tickers['ETH/BTC'] = { ask: 1, bid: 0.9, last: 1, high: 1, low: 0.8 };
        const dry = new DryRunExchange(live);

        await expect(dry.getTicker('ETH/BTC')).resolves.toEqual({ ask: 1, bid: 0.9, last: 1, high: 1, low: 0.8 });
        expect(dry.name).toBe('Fake');
    });

    it('fills simulated orders immediately and never touches the live account', async () => {
        const live = new FakeExchange(new FixedClock());
        const dry = new DryRunExchange(live);

        const { id } = await dry.buy('ETH/BTC', 0.05, 20);
        expect(id.startsWith('dry_run_buy_')).toBe(true);

        const order = await dry.getOrder(id, 'ETH/BTC');
        expect(order).toMatchObject({ id, pair: 'ETH/BTC', side: 'buy', status: 'closed', amount: 20, remaining: 0, price: 0.05, fee: null });
        await expect(dry.getBalance()).resolves.toBe(999.9);
        await expect(dry.getTradesForOrder()).resolves.toEqual([]);
        expect(live.callsTo('buy')).toEqual([]);
        expect(live.callsTo('getBalance')).toEqual([]);
    });

    it('forgets cancelled orders', async () => {
        const dry = new DryRunExchange(new FakeExchange(new FixedClock()));
        const { id } = await dry.sell('ETH/BTC', 0.06, 20);

        await dry.cancelOrder(id);

        await expect(dry.getOrder(id, 'ETH/BTC')).rejects.toThrow(DependencyError);
    });
});
