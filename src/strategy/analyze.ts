import type { BotConfig } from '../config.js';
import type { ExchangeClient } from '../exchange/client.js';
import { intervalMinutes, parseTickerFrame } from '../exchange/market.js';
import type { Trade } from '../trade/trade.js';
import type { Candle, Interval, OrderBook, SellDecision, Signal } from '../types.js';
import { TemporaryError } from '../utils/errors.js';
import { errorMessage, logger, systemClock, truncNum, type Clock } from '../utils/functions.js';
import type { SignalFrame, Strategy } from './types.js';

const NO_SIGNAL: Signal = { buy: false, sell: false };

export type AnalyzerConfig = Pick<BotConfig, 'experimental' | 'trailingStop'>;

/**
 * Turns candles into buy/sell signals through the configured strategy and decides
 * when an open trade should be sold.
 */
export class Analyzer {
    readonly #strategy: Strategy;
    readonly #exchange: Pick<ExchangeClient, 'getTickerHistory'>;
    readonly #cfg: AnalyzerConfig;
    readonly #clock: Clock;

    constructor(strategy: Strategy, exchange: Pick<ExchangeClient, 'getTickerHistory'>, cfg: AnalyzerConfig, clock: Clock = systemClock) {
        this.#strategy = strategy;
        this.#exchange = exchange;
        this.#cfg = cfg;
        this.#clock = clock;
    }

    get tickerInterval(): Interval {
        return this.#strategy.tickerInterval;
    }

    analyzeTickerFrame(candles: Candle[], pair: string): SignalFrame {
        const frame = this.#strategy.adviseIndicators(candles, pair);
        return {
            ...frame,
            buy: this.#strategy.adviseBuy(frame, pair),
            sell: this.#strategy.adviseSell(frame, pair),
        };
    }

    /** Signal of the last complete candle. Missing, stale or failing data yields no signal. */
    async getSignal(pair: string, interval: Interval = this.tickerInterval): Promise<Signal> {
        let raw: Candle[];
        try {
            raw = await this.#exchange.getTickerHistory(pair, interval);
        } catch (error) {
            if (error instanceof TemporaryError) throw error;
            logger.warn(`[SIGNAL ${pair}] Unable to fetch ticker history:`, errorMessage(error));
            return NO_SIGNAL;
        }
        if (raw.length === 0) {
            logger.warn(`[SIGNAL ${pair}] Empty ticker history`);
            return NO_SIGNAL;
        }

        let frame: SignalFrame;
        try {
            frame = this.analyzeTickerFrame(parseTickerFrame(raw), pair);
        } catch (error) {
            logger.warn(`[SIGNAL ${pair}] Unable to analyze ticker:`, errorMessage(error));
            return NO_SIGNAL;
        }

        const last = frame.candles.length - 1;
        if (last < 0) {
            logger.warn(`[SIGNAL ${pair}] Empty dataframe`);
            return NO_SIGNAL;
        }

        const signalDate = frame.candles[last].t;
        const maxAgeMs = (intervalMinutes(interval) * 2 + 5) * 60_000;
        if (signalDate < this.#clock.now().getTime() - maxAgeMs) {
            logger.warn(`[SIGNAL ${pair}] Outdated history, last candle ${new Date(signalDate).toISOString()}`);
            return NO_SIGNAL;
        }

        const signal = { buy: frame.buy[last] === true, sell: frame.sell[last] === true };
        logger.debug(`[SIGNAL ${pair}] trigger: ${new Date(signalDate).toISOString()} buy=${signal.buy} sell=${signal.sell}`);
        return signal;
    }

    shouldSell(trade: Trade, rate: number, now: Date, buy: boolean, sell: boolean): SellDecision {
        const roi = this.minRoiReached(trade, rate, now);
        if (roi.sell) {
            logger.debug(`[SELL ${trade.pair}] Required profit reached (${roi.type})`);
            return roi;
        }

        const { sellProfitOnly, useSellSignal } = this.#cfg.experimental;
        if (sellProfitOnly && trade.calcProfit(rate) <= 0) {
            return { sell: false, type: 'none' };
        }

        if (sell && !buy && useSellSignal) {
            logger.debug(`[SELL ${trade.pair}] Sell signal received`);
            return { sell: true, type: 'sell_signal' };
        }
        return { sell: false, type: 'none' };
    }

    /**
     * Stop-loss first, then the ROI table walked in order. Adjusts the trade's stop-loss as a side effect.
     */
    minRoiReached(trade: Trade, currentRate: number, now: Date): SellDecision {
        const currentProfit = trade.calcProfitPercent(currentRate);

        if (trade.stopLoss === null) {
            trade.adjustStopLoss(trade.openRate, this.#strategy.stoploss);
        }

        if (trade.stopLoss !== null && trade.stopLoss >= currentRate) {
            logger.log(`[SELL ${trade.pair}] Stop loss hit: ${trade.stopLoss} >= ${currentRate}`);
            return { sell: true, type: 'stop_loss' };
        }

        if (this.#cfg.trailingStop.enabled) {
            const positive = this.#cfg.trailingStop.positive;
            if (positive !== null && currentProfit > 0) {
                trade.adjustStopLoss(currentRate, positive);
            } else {
                trade.adjustStopLoss(currentRate, this.#strategy.stoploss);
            }
        }

        const elapsed = (now.getTime() - trade.openDate.getTime()) / 60_000;
        for (const [minutes, threshold] of this.#strategy.minimalRoi) {
            if (elapsed <= minutes) return { sell: false, type: 'none' };
            if (currentProfit > threshold) return { sell: true, type: 'roi' };
        }
        return { sell: false, type: 'none' };
    }

    /** Exit price that realises the first elapsed ROI threshold after fees, or `sellRate` when none applies. */
    getRoiRate(trade: Trade, sellRate: number, takerFee: number, now: Date): number {
        const elapsed = (now.getTime() - trade.openDate.getTime()) / 60_000;
        const entry = this.#strategy.minimalRoi.find(([minutes]) => elapsed > minutes);
        if (!entry) return sellRate;

        const roiRate = truncNum(trade.openRate * (1 + entry[1]) * (1 + 2.1 * takerFee), 8);
        logger.debug(`[ROI ${trade.pair}] elapsed ${elapsed.toFixed(1)}min, threshold ${entry[1]}, rate ${roiRate}`);
        return roiRate;
    }
}

/** Total size on each side of the book. */
export function orderBookVolumes(book: OrderBook): { bids: number; asks: number } {
    const sum = (levels: OrderBook['bids']) => levels.reduce((acc, [, size]) => acc + size, 0);
    return { bids: sum(book.bids), asks: sum(book.asks) };
}
