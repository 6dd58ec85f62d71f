// src/exchange/market.ts
import type { Candle, Interval } from '../types.js';

export function intervalMs(interval: Interval): number {
    switch (interval) {
        case '1m':
            return 60_000;
        case '3m':
            return 180_000;
        case '5m':
            return 300_000;
        case '15m':
            return 900_000;
        case '30m':
            return 1_800_000;
        case '1h':
            return 3_600_000;
        case '4h':
            return 14_400_000;
        case '1d':
            return 86_400_000;
        default:
            throw new Error(`Unsupported interval: ${String(interval)}`);
    }
}

export function intervalMinutes(interval: Interval): number {
    return intervalMs(interval) / 60_000;
}

/** `ETH/BTC` -> `ETH` */
export function baseFromPair(pair: string): string {
    return pair.split('/')[0];
}

/** `ETH/BTC` -> `BTC`, or null when the symbol is not a base/quote pair. */
export function quoteFromPair(pair: string): string | null {
    const parts = pair.split('/');
    return parts.length === 2 ? parts[1] : null;
}

/**
 * Normalises raw OHLCV rows: duplicate timestamps are merged (first open, max high, min low,
 * last close, max volume), rows are sorted by time and the last, still-forming candle is dropped.
 */
export function parseTickerFrame(rows: Candle[]): Candle[] {
    const byTime = new Map<number, Candle>();
    for (const row of rows) {
        const prev = byTime.get(row.t);
        if (!prev) {
            byTime.set(row.t, { ...row });
            continue;
        }
        prev.h = Math.max(prev.h, row.h);
        prev.l = Math.min(prev.l, row.l);
        prev.c = row.c;
        prev.v = Math.max(prev.v, row.v);
    }
    const sorted = [...byTime.values()].sort((a, b) => a.t - b.t);
    return sorted.slice(0, -1);
}
