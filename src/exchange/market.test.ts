import { describe, expect, it } from 'vitest';
import { baseFromPair, intervalMinutes, parseTickerFrame, quoteFromPair } from './market.js';

describe('pairs and intervals', () => {
    it('splits base/quote symbols', () => {
        expect(baseFromPair('ETH/BTC')).toBe('ETH');
        expect(quoteFromPair('ETH/BTC')).toBe('BTC');
        expect(quoteFromPair('ETHBTC')).toBeNull();
    });

    it('converts intervals to minutes', () => {
        expect(intervalMinutes('5m')).toBe(5);
        expect(intervalMinutes('1h')).toBe(60);
        expect(intervalMinutes('1d')).toBe(1440);
    });
});

describe('parseTickerFrame', () => {
    it('merges duplicate timestamps, sorts and drops the forming candle', () => {
        const frame = parseTickerFrame([
            { t: 120_000, o: 2, h: 2, l: 2, c: 2, v: 1 },
            { t: 0, o: 1, h: 2, l: 0.5, c: 1.5, v: 10 },
            { t: 60_000, o: 1.5, h: 3, l: 1, c: 2, v: 5 },
            { t: 0, o: 9, h: 4, l: 0.2, c: 1.8, v: 7 },
        ]);

        expect(frame).toEqual([
            { t: 0, o: 1, h: 4, l: 0.2, c: 1.8, v: 10 },
            { t: 60_000, o: 1.5, h: 3, l: 1, c: 2, v: 5 },
        ]);
    });

    it('returns nothing for a single candle', () => {
        expect(parseTickerFrame([{ t: 0, o: 1, h: 1, l: 1, c: 1, v: 1 }])).toEqual([]);
    });
});
