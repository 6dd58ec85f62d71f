import { describe, expect, it } from 'vitest';
import { crossedAbove, crossedBelow, ema, macd, rsi } from './indicators.js';

describe('indicators', () => {
    it('ema seeds with the simple average', () => {
        expect(ema([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
        expect(ema([1, 2], 3)).toEqual([NaN, NaN]);
    });

    it('rsi is 100 for a strictly rising series', () => {
        const out = rsi([1, 2, 3, 4, 5, 6], 3);
        expect(out.slice(0, 3).every(Number.isNaN)).toBe(true);
        expect(out.slice(3)).toEqual([100, 100, 100]);
    });

    it('macd line is zero on a flat series', () => {
        const flat = new Array(40).fill(10);
        const { macd: line, signal } = macd(flat);
        expect(line[39]).toBeCloseTo(0, 10);
        expect(signal[39]).toBeCloseTo(0, 10);
        expect(Number.isNaN(line[24])).toBe(true);
    });

    it('detects crosses', () => {
        expect(crossedAbove([1, 3, 4], [2, 2, 2])).toEqual([false, true, false]);
        expect(crossedBelow([3, 1, 0], [2, 2, 2])).toEqual([false, true, false]);
    });
});
