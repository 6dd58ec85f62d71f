// Indicator series are aligned with their input: index i describes candle i, NaN until warmed up.

export function ema(values: number[], period: number): number[] {
    const out: number[] = new Array(values.length).fill(NaN);
    if (values.length < period) return out;
    const k = 2 / (period + 1);

    out[period - 1] = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
    for (let i = period; i < values.length; i++) {
        out[i] = values[i] * k + out[i - 1] * (1 - k);
    }
    return out;
}

export function macd(values: number[], fast = 12, slow = 26, signal = 9) {
    const emaFast = ema(values, fast);
    const emaSlow = ema(values, slow);
    const line = values.map((_, i) => emaFast[i] - emaSlow[i]);

    // signal EMA runs over the defined part of the MACD line only
    const firstDefined = line.findIndex(Number.isFinite);
    const signalLine: number[] = new Array(values.length).fill(NaN);
    if (firstDefined >= 0) {
        ema(line.slice(firstDefined), signal).forEach((v, j) => {
            signalLine[firstDefined + j] = v;
        });
    }
    const hist = line.map((v, i) => v - signalLine[i]);
    return { macd: line, signal: signalLine, hist };
}

/** Wilder's RSI. */
export function rsi(values: number[], period = 14): number[] {
    const out: number[] = new Array(values.length).fill(NaN);
    if (values.length <= period) return out;

    let avgGain = 0;
    let avgLoss = 0;
    for (let i = 1; i <= period; i++) {
        const diff = values[i] - values[i - 1];
        avgGain += Math.max(0, diff) / period;
        avgLoss += Math.max(0, -diff) / period;
    }
    out[period] = toRsi(avgGain, avgLoss);

    for (let i = period + 1; i < values.length; i++) {
        const diff = values[i] - values[i - 1];
        avgGain = (avgGain * (period - 1) + Math.max(0, diff)) / period;
        avgLoss = (avgLoss * (period - 1) + Math.max(0, -diff)) / period;
        out[i] = toRsi(avgGain, avgLoss);
    }
    return out;
}

function toRsi(avgGain: number, avgLoss: number): number {
    if (avgLoss === 0) return 100;
    return 100 - 100 / (1 + avgGain / avgLoss);
}

/** True at i when `a` moved from at-or-below `b` to above it. */
export function crossedAbove(a: number[], b: number[]): boolean[] {
    return a.map((v, i) => i > 0 && a[i - 1] <= b[i - 1] && v > b[i]);
}

export function crossedBelow(a: number[], b: number[]): boolean[] {
    return crossedAbove(b, a);
}
