import type { Candle, Interval, RoiTable } from '../types.js';
import { crossedAbove, crossedBelow, ema, macd, rsi } from './indicators.js';
import type { IndicatorFrame, Strategy } from './types.js';

/**
 * Trend-following entries on an EMA cross confirmed by MACD, exits when RSI is stretched
 * and the fast EMA falls back under the slow one.
 */
export class DefaultStrategy implements Strategy {
    readonly name = 'default';
    readonly minimalRoi: RoiTable = [
        [0, 0.04],
        [20, 0.02],
        [30, 0.01],
        [40, 0],
    ];
    readonly stoploss = -0.1;
    readonly tickerInterval: Interval = '5m';

    adviseIndicators(candles: Candle[]): IndicatorFrame {
        const close = candles.map((c) => c.c);
        const m = macd(close);
        return {
            candles,
            columns: {
                ema5: ema(close, 5),
                ema21: ema(close, 21),
                rsi: rsi(close, 14),
                macd: m.macd,
                macdSignal: m.signal,
            },
        };
    }

    adviseBuy(frame: IndicatorFrame): boolean[] {
        const { ema5, ema21, rsi: r, macd: line, macdSignal } = frame.columns;
        const cross = crossedAbove(ema5, ema21);
        return cross.map((crossed, i) => crossed && line[i] > macdSignal[i] && r[i] < 70);
    }

    adviseSell(frame: IndicatorFrame): boolean[] {
        const { ema5, ema21, rsi: r } = frame.columns;
        const cross = crossedBelow(ema5, ema21);
        return cross.map((crossed, i) => crossed || r[i] > 80);
    }
}
