import { describe, expect, it } from 'vitest';
import type { BidStrategyConfig } from '../config.js';
import type { OrderBook } from '../types.js';
import { DependencyError } from '../utils/errors.js';
import { getTargetBid } from './pricing.js';

const bid = (over: Partial<BidStrategyConfig> = {}): BidStrategyConfig => ({
    askLastBalance: 0,
    useBookOrder: false,
    bookOrderTop: 1,
    percentFromTop: 0,
    ...over,
});

const ticker = (ask: number, last: number) => ({ ask, bid: ask - 1, last, high: 0, low: 0 });

describe('getTargetBid', () => {
    it('uses the ask when it is below last', () => {
        expect(getTargetBid('ETH/BTC', ticker(10, 11), bid())).toBe(10);
    });

    it('blends ask towards last otherwise', () => {
        expect(getTargetBid('ETH/BTC', ticker(10, 9), bid({ askLastBalance: 0.5 }))).toBe(9.5);
        expect(getTargetBid('ETH/BTC', ticker(10, 9), bid())).toBe(10);
    });

    it('bids one step above the chosen book level when that is cheaper', () => {
        const book: OrderBook = {
            bids: [
                [9, 1],
                [8.5, 1],
            ],
            asks: [],
        };
        expect(getTargetBid('ETH/BTC', ticker(10, 11), bid({ useBookOrder: true, bookOrderTop: 2 }), book)).toBeCloseTo(8.50000001, 10);
    });

    it('keeps the ticker rate when the book is higher', () => {
        const book: OrderBook = { bids: [[12, 1]], asks: [] };
        expect(getTargetBid('ETH/BTC', ticker(10, 11), bid({ useBookOrder: true }), book)).toBe(10);
    });

    it('fails when the book is too shallow', () => {
        const book: OrderBook = { bids: [[9, 1]], asks: [] };
        expect(() => getTargetBid('ETH/BTC', ticker(10, 11), bid({ useBookOrder: true, bookOrderTop: 3 }), book)).toThrow(DependencyError);
    });

    it('discounts by percentFromTop', () => {
        expect(getTargetBid('ETH/BTC', ticker(10, 11), bid({ percentFromTop: 0.5 }))).toBe(5);
    });
});
