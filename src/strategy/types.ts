import type { Candle, Interval, RoiTable } from '../types.js';

/** Candles plus named indicator columns, all aligned by index. */
export type IndicatorFrame = {
    candles: Candle[];
    columns: Record<string, number[]>;
};

export type SignalFrame = IndicatorFrame & {
    buy: boolean[];
    sell: boolean[];
};

/**
 * Pluggable trading strategy. One implementation is resolved at start-up and injected
 * into the analyzer.
 */
export interface Strategy {
    readonly name: string;
    /** Walked in definition order, see `Analyzer.minRoiReached`. */
    readonly minimalRoi: RoiTable;
    /** Negative fraction of the open rate, e.g. -0.10. */
    readonly stoploss: number;
    readonly tickerInterval: Interval;

    adviseIndicators(candles: Candle[], pair: string): IndicatorFrame;
    adviseBuy(frame: IndicatorFrame, pair: string): boolean[];
    adviseSell(frame: IndicatorFrame, pair: string): boolean[];
}
