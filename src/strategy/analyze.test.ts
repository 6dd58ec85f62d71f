import { beforeEach, describe, expect, it } from 'vitest';
import { FakeExchange } from '../testing/fakeExchange.js';
import { FixedClock, StubStrategy, freshCandles, makeConfig } from '../testing/helpers.js';
import { Trade } from '../trade/trade.js';
import { OperationalError, TemporaryError } from '../utils/errors.js';
import { Analyzer, orderBookVolumes, type AnalyzerConfig } from './analyze.js';

const MINUTE = 60_000;

function makeTrade(clock: FixedClock, minutesAgo: number): Trade {
    return new Trade({
        botId: 'test-bot',
        exchange: 'fake',
        pair: 'ETH/BTC',
        feeOpen: 0,
        feeClose: 0,
        openRate: 1,
        stakeAmount: 1,
        amount: 1,
        openDate: new Date(clock.now().getTime() - minutesAgo * MINUTE),
    });
}

describe('Analyzer', () => {
    let clock: FixedClock;
    let exchange: FakeExchange;
    let strategy: StubStrategy;

    const analyzer = (cfg: Partial<AnalyzerConfig> = {}) => new Analyzer(strategy, exchange, { ...makeConfig(), ...cfg }, clock);

    beforeEach(() => {
        clock = new FixedClock();
        exchange = new FakeExchange(clock);
        strategy = new StubStrategy();
    });

    describe('getSignal', () => {
        it('reads the flags of the last complete candle', async () => {
            exchange.history['ETH/BTC'] = freshCandles(clock.now());
            strategy.signals['ETH/BTC'] = { buy: true, sell: false };
            await expect(analyzer().getSignal('ETH/BTC')).resolves.toEqual({ buy: true, sell: false });
            expect(exchange.callsTo('getTickerHistory')).toEqual([['ETH/BTC', '5m']]);
        });

        it('returns no signal for empty history', async () => {
            strategy.signals['ETH/BTC'] = { buy: true, sell: false };
            await expect(analyzer().getSignal('ETH/BTC')).resolves.toEqual({ buy: false, sell: false });
        });

        it('returns no signal when the data is stale', async () => {
            exchange.history['ETH/BTC'] = freshCandles(new Date(clock.now().getTime() - 50 * MINUTE));
            strategy.signals['ETH/BTC'] = { buy: true, sell: false };
            await expect(analyzer().getSignal('ETH/BTC')).resolves.toEqual({ buy: false, sell: false });
        });

        it('returns no signal when the strategy throws', async () => {
            exchange.history['ETH/BTC'] = freshCandles(clock.now());
            strategy.signals['ETH/BTC'] = { buy: true, sell: false };
            strategy.failWith = new Error('bad column');
            await expect(analyzer().getSignal('ETH/BTC')).resolves.toEqual({ buy: false, sell: false });
        });

        it('returns no signal when the history request is rejected', async () => {
            exchange.history['ETH/BTC'] = freshCandles(clock.now());
            strategy.signals['ETH/BTC'] = { buy: true, sell: false };
            exchange.failures.getTickerHistory = new OperationalError('Could not fetch 5m candles for ETH/BTC: bad symbol');
            await expect(analyzer().getSignal('ETH/BTC')).resolves.toEqual({ buy: false, sell: false });
        });

        it('lets temporary failures through to the loop', async () => {
            exchange.failures.getTickerHistory = new TemporaryError('Could not fetch 5m candles for ETH/BTC due to timeout');
            await expect(analyzer().getSignal('ETH/BTC')).rejects.toThrow(TemporaryError);
        });
    });

    describe('minRoiReached', () => {
        it('sells once the elapsed ROI threshold is beaten', () => {
            const trade = makeTrade(clock, 45);
            expect(analyzer().minRoiReached(trade, 1.06, clock.now())).toEqual({ sell: true, type: 'roi' });
        });

        it('walks the table in order and stops at the first entry not yet elapsed', () => {
            const early = makeTrade(clock, 10);
            expect(analyzer().minRoiReached(early, 1.03, clock.now())).toEqual({ sell: false, type: 'none' });

            const later = makeTrade(clock, 25);
            expect(analyzer().minRoiReached(later, 1.03, clock.now())).toEqual({ sell: true, type: 'roi' });
        });

        it('does not sell at exactly the boundary minute', () => {
            strategy.minimalRoi = [[20, 0.01]];
            const trade = makeTrade(clock, 20);
            expect(analyzer().minRoiReached(trade, 1.5, clock.now())).toEqual({ sell: false, type: 'none' });
        });

        it('initialises the stop-loss from the open rate', () => {
            const trade = makeTrade(clock, 5);
            analyzer().minRoiReached(trade, 1, clock.now());
            expect(trade.stopLoss).toBe(0.9);
            expect(trade.initialStopLoss).toBe(0.9);
        });

        it('reports a stop-loss hit before ROI', () => {
            const trade = makeTrade(clock, 45);
            trade.stopLoss = 1.2;
            expect(analyzer().minRoiReached(trade, 1.1, clock.now())).toEqual({ sell: true, type: 'stop_loss' });
        });

        it('ratchets a trailing stop without ever lowering it', () => {
            strategy.minimalRoi = [[0, 1]];
            const a = analyzer({ trailingStop: { enabled: true, positive: null } });
            const trade = makeTrade(clock, 5);

            a.minRoiReached(trade, 1.2, clock.now());
            expect(trade.stopLoss).toBeCloseTo(1.08, 10);

            a.minRoiReached(trade, 1.1, clock.now());
            expect(trade.stopLoss).toBeCloseTo(1.08, 10);
        });

        it('uses the positive trailing distance while in profit', () => {
            strategy.minimalRoi = [[0, 1]];
            const trade = makeTrade(clock, 5);
            analyzer({ trailingStop: { enabled: true, positive: 0.02 } }).minRoiReached(trade, 1.2, clock.now());
            expect(trade.stopLoss).toBeCloseTo(1.176, 10);
        });
    });

    describe('shouldSell', () => {
        const experimental = (over: Partial<AnalyzerConfig['experimental']>) => ({ ...makeConfig().experimental, ...over });

        it('sells on a sell signal when enabled', () => {
            const trade = makeTrade(clock, 5);
            const a = analyzer({ experimental: experimental({ useSellSignal: true }) });
            expect(a.shouldSell(trade, 0.95, clock.now(), false, true)).toEqual({ sell: true, type: 'sell_signal' });
            expect(a.shouldSell(trade, 0.95, clock.now(), true, true)).toEqual({ sell: false, type: 'none' });
        });

        it('ignores sell signals when disabled', () => {
            const trade = makeTrade(clock, 5);
            expect(analyzer().shouldSell(trade, 0.95, clock.now(), false, true)).toEqual({ sell: false, type: 'none' });
        });

        it('holds losing trades when selling in profit only', () => {
            const trade = makeTrade(clock, 5);
            const a = analyzer({ experimental: experimental({ useSellSignal: true, sellProfitOnly: true }) });
            expect(a.shouldSell(trade, 0.95, clock.now(), false, true)).toEqual({ sell: false, type: 'none' });
            expect(a.shouldSell(trade, 1.01, clock.now(), false, true)).toEqual({ sell: true, type: 'sell_signal' });
        });

        it('reports the stop-loss when it fires together with a sell signal', () => {
            const trade = makeTrade(clock, 5);
            const a = analyzer({ experimental: experimental({ useSellSignal: true }) });
            expect(a.shouldSell(trade, 0.85, clock.now(), false, true)).toEqual({ sell: true, type: 'stop_loss' });
        });

        it('still stops out a losing trade when selling in profit only', () => {
            const trade = makeTrade(clock, 5);
            const a = analyzer({ experimental: experimental({ sellProfitOnly: true }) });
            expect(a.shouldSell(trade, 0.85, clock.now(), false, false)).toEqual({ sell: true, type: 'stop_loss' });
        });
    });

    describe('getRoiRate', () => {
        it('prices the first elapsed threshold', () => {
            strategy.minimalRoi = [[10, 0.5]];
            const trade = makeTrade(clock, 15);
            trade.openRate = 2;
            expect(analyzer().getRoiRate(trade, 2.2, 0, clock.now())).toBe(3);
        });

        it('keeps the sell rate before any threshold elapsed', () => {
            strategy.minimalRoi = [[10, 0.5]];
            const trade = makeTrade(clock, 5);
            expect(analyzer().getRoiRate(trade, 2.2, 0, clock.now())).toBe(2.2);
        });
    });
});

describe('orderBookVolumes', () => {
    it('sums the sizes on each side', () => {
        expect(
            orderBookVolumes({
                bids: [
                    [1, 2],
                    [0.9, 3],
                ],
                asks: [[1.1, 1]],
            }),
        ).toEqual({ bids: 5, asks: 1 });
    });
});
