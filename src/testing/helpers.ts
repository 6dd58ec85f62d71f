import type { BotConfig } from '../config.js';
import type { FiatConverter } from '../notify/fiat.js';
import type { Notifier } from '../notify/notifier.js';
import type { IndicatorFrame, Strategy } from '../strategy/types.js';
import type { Candle, Interval, RoiTable, Signal } from '../types.js';
import type { Clock } from '../utils/functions.js';

/** Clock whose time only moves when told to, or when something sleeps. */
export class FixedClock implements Clock {
    sleeps: number[] = [];

    constructor(public current: Date = new Date('2024-03-01T12:00:00.000Z')) {}

    now(): Date {
        return new Date(this.current.getTime());
    }

    advance(ms: number) {
        this.current = new Date(this.current.getTime() + ms);
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.advance(ms);
    }
}

export class RecordingNotifier implements Notifier {
    messages: string[] = [];

    async send(text: string): Promise<void> {
        this.messages.push(text);
    }
}

/** Converts at a fixed rate for every currency. */
export class StaticFiat implements FiatConverter {
    readonly #rate: number;

    constructor(rate: number) {
        this.#rate = rate;
    }

    async convertAmount(amount: number): Promise<number> {
        return amount * this.#rate;
    }
}

/**
 * Strategy whose last-row signal per pair is set by the test.
 */
export class StubStrategy implements Strategy {
    readonly name = 'stub';
    signals: Record<string, Signal> = {};
    failWith: Error | null = null;

    constructor(
        public minimalRoi: RoiTable = [
            [0, 0.04],
            [20, 0.02],
            [30, 0.01],
            [40, 0],
        ],
        public stoploss = -0.1,
        public tickerInterval: Interval = '5m',
    ) {}

    adviseIndicators(candles: Candle[]): IndicatorFrame {
        if (this.failWith) throw this.failWith;
        return { candles, columns: {} };
    }

    adviseBuy(frame: IndicatorFrame, pair: string): boolean[] {
        return frame.candles.map((_, i) => i === frame.candles.length - 1 && this.signals[pair]?.buy === true);
    }

    adviseSell(frame: IndicatorFrame, pair: string): boolean[] {
        return frame.candles.map((_, i) => i === frame.candles.length - 1 && this.signals[pair]?.sell === true);
    }
}

/** Three 5m candles ending at `now`; the last one is still forming and gets dropped on parse. */
export function freshCandles(now: Date): Candle[] {
    const end = Math.floor(now.getTime() / 300_000) * 300_000;
    return [end - 600_000, end - 300_000, end].map((t) => ({ t, o: 1, h: 1, l: 1, c: 1, v: 1 }));
}

export function makeConfig(overrides: Partial<BotConfig> = {}): BotConfig {
    return {
        botId: 'test-bot',
        dryRun: true,
        initialState: 'running',
        exchange: { name: 'fake', key: null, secret: null, pairWhitelist: ['ETH/BTC', 'LTC/BTC'], pairBlacklist: [] },
        stakeCurrency: 'BTC',
        stakeAmount: 1,
        maxOpenTrades: 2,
        fiatDisplayCurrency: 'USD',
        dynamicWhitelist: null,
        highRiskTrading: false,
        disableBuy: false,
        bidStrategy: { askLastBalance: 0, useBookOrder: false, bookOrderTop: 1, percentFromTop: 0 },
        askStrategy: { useBookOrder: false, bookOrderMin: 1, bookOrderMax: 1 },
        experimental: {
            useSellSignal: false,
            sellProfitOnly: false,
            sellFullfilledAtRoi: false,
            checkDepthOfMarket: false,
            domBidsAsksDelta: 0,
            askAboveMidRange: false,
        },
        trailingStop: { enabled: false, positive: null },
        unfilledTimeout: null,
        internals: { processThrottleSecs: 5, retryTimeoutSecs: 30 },
        strategy: { name: 'default', minimalRoi: null, stoploss: null, tickerInterval: null },
        telegram: null,
        mongoUri: null,
        ...overrides,
    };
}
