import { beforeEach, describe, expect, it } from 'vitest';
import { FakeExchange } from '../testing/fakeExchange.js';
import { FixedClock } from '../testing/helpers.js';
import { OperationalError } from '../utils/errors.js';
import { WhitelistCache, refreshWhitelist } from './whitelist.js';

const MINUTE = 60_000;

describe('refreshWhitelist', () => {
    it('keeps active stake-currency markets that are not blacklisted, in order', async () => {
        const exchange = new FakeExchange(new FixedClock());
        exchange.markets = [
            { symbol: 'ETH/BTC', quote: 'BTC', active: true },
            { symbol: 'LTC/BTC', quote: 'BTC', active: false },
            { symbol: 'XRP/BTC', quote: 'BTC', active: true },
            { symbol: 'ETH/USDT', quote: 'USDT', active: true },
            { symbol: 'NEO/BTC', quote: 'BTC', active: true },
        ];

        const result = await refreshWhitelist(exchange, ['NEO/BTC', 'ETH/BTC', 'LTC/BTC', 'ETH/USDT', 'XRP/BTC', 'DOGE/BTC'], 'BTC', ['XRP/BTC']);
        expect(result).toEqual(['NEO/BTC', 'ETH/BTC']);
    });
});

describe('WhitelistCache', () => {
    let clock: FixedClock;
    let exchange: FakeExchange;
    let cache: WhitelistCache;

    beforeEach(() => {
        clock = new FixedClock();
        exchange = new FakeExchange(clock);
        exchange.summaries = {
            'ETH/BTC': { symbol: 'ETH/BTC', quoteVolume: 10 },
            'LTC/BTC': { symbol: 'LTC/BTC', quoteVolume: 30 },
            'ETH/USDT': { symbol: 'ETH/USDT', quoteVolume: 100 },
            'XRP/BTC': { symbol: 'XRP/BTC', quoteVolume: 20 },
        };
        cache = new WhitelistCache(clock);
    });

    it('ranks pairs of the quote currency by volume', async () => {
        await expect(cache.genPairWhitelist(exchange, 'BTC')).resolves.toEqual(['LTC/BTC', 'XRP/BTC', 'ETH/BTC']);
    });

    it('reuses the ranking for 30 minutes', async () => {
        await cache.genPairWhitelist(exchange, 'BTC');
        exchange.summaries['ETH/BTC'] = { symbol: 'ETH/BTC', quoteVolume: 500 };

        clock.advance(29 * MINUTE);
        await expect(cache.genPairWhitelist(exchange, 'BTC')).resolves.toEqual(['LTC/BTC', 'XRP/BTC', 'ETH/BTC']);
        expect(exchange.callsTo('getTickers')).toHaveLength(1);

        clock.advance(2 * MINUTE);
        await expect(cache.genPairWhitelist(exchange, 'BTC')).resolves.toEqual(['ETH/BTC', 'LTC/BTC', 'XRP/BTC']);
        expect(exchange.callsTo('getTickers')).toHaveLength(2);
    });

    it('caches each quote currency separately', async () => {
        await cache.genPairWhitelist(exchange, 'BTC');
        await expect(cache.genPairWhitelist(exchange, 'USDT')).resolves.toEqual(['ETH/USDT']);
        expect(exchange.callsTo('getTickers')).toHaveLength(2);
    });

    it('requires ticker support', async () => {
        exchange.capabilities.delete('fetchTickers');
        await expect(cache.genPairWhitelist(exchange, 'BTC')).rejects.toThrow(OperationalError);
    });
});
