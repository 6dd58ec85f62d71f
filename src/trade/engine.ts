import type { BotStateHandle } from '../bot/state.js';
import type { BotConfig } from '../config.js';
import type { TradeRepository } from '../db/tradeRepository.js';
import type { ExchangeClient } from '../exchange/client.js';
import type { FiatConverter } from '../notify/fiat.js';
import type { Notifier } from '../notify/notifier.js';
import { orderBookVolumes, type Analyzer } from '../strategy/analyze.js';
import type { ExchangeOrder, SellDecision } from '../types.js';
import { DependencyError, OperationalError, TemporaryError } from '../utils/errors.js';
import { errorMessage, logger, systemClock, type Clock } from '../utils/functions.js';
import { getTargetBid } from './pricing.js';
import { getRealAmount } from './reconcile.js';
import { getHighStakeAmount } from './stake.js';
import { Trade } from './trade.js';
import { refreshWhitelist, WhitelistCache } from './whitelist.js';

const DOM_BOOK_DEPTH = 1000;
const RESTART_HINT = 'Issue `/start` if you think it is safe to restart.';

type Settlement = { tag: string; title: string; verb: string };

const SETTLE = {
    timeout: { tag: 'TIMEOUT', title: 'Timeout', verb: 'cancelled' },
    canceled: { tag: 'CANCELED', title: 'Canceled', verb: 'cancelled on exchange' },
} satisfies Record<string, Settlement>;

export type EngineDeps = {
    cfg: BotConfig;
    exchange: ExchangeClient;
    repo: TradeRepository;
    analyzer: Analyzer;
    notifier: Notifier;
    fiat: FiatConverter;
    state: BotStateHandle;
    whitelistCache?: WhitelistCache;
    clock?: Clock;
};

/**
 * One tick of trading: refresh the whitelist, manage open trades, maybe open a new one
 * and cancel stale orders.
 */
export class TradeEngine {
    readonly #cfg: BotConfig;
    readonly #exchange: ExchangeClient;
    readonly #repo: TradeRepository;
    readonly #analyzer: Analyzer;
    readonly #notifier: Notifier;
    readonly #fiat: FiatConverter;
    readonly #state: BotStateHandle;
    readonly #whitelistCache: WhitelistCache;
    readonly #clock: Clock;

    constructor(deps: EngineDeps) {
        this.#cfg = deps.cfg;
        this.#exchange = deps.exchange;
        this.#repo = deps.repo;
        this.#analyzer = deps.analyzer;
        this.#notifier = deps.notifier;
        this.#fiat = deps.fiat;
        this.#state = deps.state;
        this.#clock = deps.clock ?? systemClock;
        this.#whitelistCache = deps.whitelistCache ?? new WhitelistCache(this.#clock);
    }

    /** Returns true when a trade was opened or a sell was placed. */
    async processTick(): Promise<boolean> {
        let changed = false;
        try {
            const whitelist = await this.getWhitelist();

            const trades = await this.#repo.findOpen(this.#cfg.botId);
            for (const trade of trades) {
                changed = (await this.processMaybeExecuteSell(trade)) || changed;
            }

            if (!this.#cfg.disableBuy && trades.length < this.#cfg.maxOpenTrades) {
                changed = (await this.processMaybeExecuteBuy(whitelist)) || changed;
            }

            if (this.#cfg.unfilledTimeout && !this.#cfg.dryRun) {
                await this.checkHandleTimedout(this.#cfg.unfilledTimeout);
            }
        } catch (error) {
            if (error instanceof TemporaryError) {
                const secs = this.#cfg.internals.retryTimeoutSecs;
                logger.warn(`[TICK] Got ${error.message}, retrying in ${secs} seconds...`);
                await this.#clock.sleep(secs * 1000);
                return false;
            }
            if (error instanceof OperationalError) {
                const trace = error.stack ?? `${error.name}: ${error.message}`;
                await this.#notifier.send(`*Status:* OperationalException:\n\`\`\`\n${trace}\n\`\`\`${RESTART_HINT}`);
                logger.error('[TICK] OperationalException, stopping trader:', trace);
                this.#state.stop();
                return false;
            }
            throw error;
        }
        return changed;
    }

    async getWhitelist(): Promise<string[]> {
        const { stakeCurrency, dynamicWhitelist, exchange: ex } = this.#cfg;
        const source = dynamicWhitelist ? await this.#whitelistCache.genPairWhitelist(this.#exchange, stakeCurrency) : ex.pairWhitelist;
        const sanitized = await refreshWhitelist(this.#exchange, source, stakeCurrency, ex.pairBlacklist);
        return dynamicWhitelist ? sanitized.slice(0, dynamicWhitelist) : sanitized;
    }

    /** Reconciles an outstanding order, then runs the sell path. Dependency failures only skip this trade. */
    async processMaybeExecuteSell(trade: Trade): Promise<boolean> {
        try {
            if (trade.openOrderId) {
                let order = await this.#exchange.getOrder(trade.openOrderId, trade.pair);
                if (order.status === 'canceled') {
                    if (await this.handleCanceledOrder(trade, order)) return false;
                } else {
                    if (order.side === 'buy') {
                        const realAmount = await getRealAmount(this.#exchange, trade, order);
                        if (realAmount !== order.amount) {
                            order = { ...order, amount: realAmount };
                            trade.feeOpen = 0;
                        }
                    }
                    trade.update(order, this.#clock.now());
                    await this.#repo.update(trade);
                }
            }

            if (trade.isOpen && trade.openOrderId === null) {
                return await this.handleTrade(trade);
            }
        } catch (error) {
            if (!(error instanceof DependencyError)) throw error;
            logger.warn(`[SELL ${trade.pair}] Unable to sell trade: ${error.message}`);
        }
        return false;
    }

    async processMaybeExecuteBuy(whitelist: string[]): Promise<boolean> {
        try {
            return await this.createTrade(whitelist);
        } catch (error) {
            if (!(error instanceof DependencyError)) throw error;
            logger.warn(`[BUY] Unable to create trade: ${error.message}`);
            return false;
        }
    }

    /**
     * Sell path for one open trade without an outstanding order. Returns true when a sell was placed.
     */
    async handleTrade(trade: Trade): Promise<boolean> {
        if (!trade.isOpen) throw new Error(`Attempt to handle closed trade: ${trade}`);
        logger.debug(`[SELL ${trade.pair}] Handling ${trade}`);

        const { experimental, askStrategy } = this.#cfg;
        const now = this.#clock.now();
        const ticker = await this.#exchange.getTicker(trade.pair);
        const currentRate = ticker.bid;
        let sellRate = currentRate;

        let buy = false;
        let sell = false;
        if (experimental.useSellSignal) {
            ({ buy, sell } = await this.#analyzer.getSignal(trade.pair));
            logger.debug(`[SELL ${trade.pair}] signal buy=${buy} sell=${sell}`);
        }

        if (experimental.sellFullfilledAtRoi) {
            const takerFee = await this.#exchange.getFee(trade.pair, 'taker');
            sellRate = this.#analyzer.getRoiRate(trade, sellRate, takerFee, now);
        }

        const stopLossBefore = trade.stopLoss;

        if (askStrategy.useBookOrder) {
            const book = await this.#exchange.getOrderBook(trade.pair, askStrategy.bookOrderMax);
            for (let i = askStrategy.bookOrderMin; i <= askStrategy.bookOrderMax; i++) {
                const level = book.asks[i - 1];
                if (!level) {
                    logger.debug(`[SELL ${trade.pair}] Order book has no ask at level ${i}`);
                    break;
                }
                if (level[0] > sellRate) sellRate = level[0];
                const decision = this.#analyzer.shouldSell(trade, sellRate, now, buy, sell);
                if (decision.sell) {
                    await this.executeSell(trade, sellRate, currentRate, decision);
                    return true;
                }
            }
        } else {
            const decision = this.#analyzer.shouldSell(trade, sellRate, now, buy, sell);
            if (decision.sell) {
                await this.executeSell(trade, sellRate, currentRate, decision);
                return true;
            }
        }

        if (trade.stopLoss !== stopLossBefore) await this.#repo.update(trade);
        return false;
    }

    async executeSell(trade: Trade, limit: number, currentRate: number, decision: SellDecision) {
        const { id } = await this.#exchange.sell(trade.pair, limit, trade.amount);
        trade.openOrderId = id;
        trade.closeRateRequested = limit;
        await this.#repo.update(trade);

        const profitPercent = trade.calcProfitPercent(limit);
        const profit = trade.calcProfit(limit);
        const gain = profitPercent > 0 ? 'profit' : 'loss';
        logger.log(`[SELL ${trade.pair}] Placed sell order ${id} at ${limit} (${decision.type}, ${gain} ${(profitPercent * 100).toFixed(2)}%)`);

        let message =
            `*${this.#exchange.name}:* Selling\n` +
            `*Current Pair:* ${trade.pair}\n` +
            `*Limit:* \`${limit}\`\n` +
            `*Amount:* \`${trade.amount.toFixed(8)}\`\n` +
            `*Open Rate:* \`${trade.openRate.toFixed(8)}\`\n` +
            `*Current Rate:* \`${currentRate.toFixed(8)}\`\n` +
            `*Reason:* \`${decision.type}\`\n` +
            `*Profit:* \`${(profitPercent * 100).toFixed(2)}%\``;

        const { fiatDisplayCurrency, stakeCurrency } = this.#cfg;
        if (fiatDisplayCurrency) {
            const profitFiat = await this.#fiat.convertAmount(profit, stakeCurrency, fiatDisplayCurrency);
            message += ` \`(${gain}: ${profit.toFixed(8)} ${stakeCurrency} / ${profitFiat.toFixed(3)} ${fiatDisplayCurrency})\``;
        } else {
            message += ` \`(${gain}: ${profit.toFixed(8)})\``;
        }
        await this.#notifier.send(message);
    }

    /**
     * Buy path: picks the first whitelisted pair with a buy signal that passes the admission
     * filters. Returns false when no pair qualifies.
     */
    async createTrade(whitelist: string[]): Promise<boolean> {
        const cfg = this.#cfg;
        const openTrades = await this.#repo.findOpen(cfg.botId);

        let stake = cfg.stakeAmount;
        if (cfg.highRiskTrading) {
            stake = getHighStakeAmount(cfg, await this.#repo.findAll(cfg.botId), openTrades.length);
        }
        logger.debug(`[BUY] Creating new trade with stake ${stake} ${cfg.stakeCurrency}`);

        const balance = await this.#exchange.getBalance(cfg.stakeCurrency);
        if (balance < stake) {
            throw new DependencyError(`stake amount is not fulfilled (currency=${cfg.stakeCurrency}, balance=${balance}, stake=${stake})`);
        }

        const openPairs = new Set(openTrades.map((t) => t.pair));
        const candidates = whitelist.filter((pair) => !openPairs.has(pair));
        if (candidates.length === 0) throw new DependencyError('No currency pairs in whitelist');

        for (const pair of candidates) {
            const { buy, sell } = await this.#analyzer.getSignal(pair);
            if (!buy || sell) continue;
            if (!(await this.passesBuyFilters(pair))) continue;
            await this.executeBuy(pair, stake);
            return true;
        }
        return false;
    }

    async passesBuyFilters(pair: string): Promise<boolean> {
        const { checkDepthOfMarket, domBidsAsksDelta, askAboveMidRange } = this.#cfg.experimental;

        if (checkDepthOfMarket && domBidsAsksDelta > 0) {
            const volumes = orderBookVolumes(await this.#exchange.getOrderBook(pair, DOM_BOOK_DEPTH));
            const ratio = volumes.bids / volumes.asks;
            logger.debug(`[BUY ${pair}] bids/asks ratio ${ratio.toFixed(4)}, required ${domBidsAsksDelta}`);
            if (!(ratio >= domBidsAsksDelta)) {
                logger.log(`[BUY ${pair}] Skipped: depth of market ratio ${ratio.toFixed(4)} below ${domBidsAsksDelta}`);
                return false;
            }
        }

        if (askAboveMidRange) {
            const ticker = await this.#exchange.getTicker(pair);
            const mid = (ticker.high + ticker.low) / 2;
            if (!(ticker.ask > mid)) {
                logger.log(`[BUY ${pair}] Skipped: ask ${ticker.ask} not above mid range ${mid}`);
                return false;
            }
        }
        return true;
    }

    async executeBuy(pair: string, stake: number): Promise<Trade> {
        const cfg = this.#cfg;
        const ticker = await this.#exchange.getTicker(pair);
        const book = cfg.bidStrategy.useBookOrder ? await this.#exchange.getOrderBook(pair, cfg.bidStrategy.bookOrderTop) : undefined;
        const buyLimit = getTargetBid(pair, ticker, cfg.bidStrategy, book);
        const amount = stake / buyLimit;

        const fee = await this.#exchange.getFee(pair, 'maker');
        const { id } = await this.#exchange.buy(pair, buyLimit, amount);
        logger.log(`[BUY ${pair}] Placed buy order ${id}: ${amount} at ${buyLimit}`);

        const trade = await this.#repo.create(
            new Trade({
                botId: cfg.botId,
                exchange: this.#exchange.id,
                pair,
                stakeAmount: stake,
                amount,
                feeOpen: fee,
                feeClose: fee,
                openRate: buyLimit,
                openRateRequested: buyLimit,
                openDate: this.#clock.now(),
                openOrderId: id,
            }),
        );

        let message = `*${this.#exchange.name}:* Buying ${pair}\nwith limit \`${buyLimit.toFixed(8)} (${stake} ${cfg.stakeCurrency}`;
        if (cfg.fiatDisplayCurrency) {
            const stakeFiat = await this.#fiat.convertAmount(stake, cfg.stakeCurrency, cfg.fiatDisplayCurrency);
            message += `, ${stakeFiat.toFixed(3)} ${cfg.fiatDisplayCurrency}`;
        }
        await this.#notifier.send(`${message})\``);
        return trade;
    }

    /** Cancels outstanding orders older than the configured timeouts (minutes). */
    async checkHandleTimedout(timeouts: { buy: number; sell: number }) {
        const now = this.#clock.now().getTime();
        const buyCutoff = now - timeouts.buy * 60_000;
        const sellCutoff = now - timeouts.sell * 60_000;

        for (const trade of await this.#repo.findWithOpenOrder(this.#cfg.botId)) {
            const orderId = trade.openOrderId;
            if (!orderId) continue;
            try {
                const order = await this.#exchange.getOrder(orderId, trade.pair);
                if (order.status !== 'open') continue;

                const orderTime = Date.parse(order.datetime);
                if (order.side === 'buy' && orderTime < buyCutoff) {
                    await this.handleTimedoutLimitBuy(trade, order);
                } else if (order.side === 'sell' && orderTime < sellCutoff) {
                    await this.handleTimedoutLimitSell(trade, order);
                }
            } catch (error) {
                if (!(error instanceof DependencyError || error instanceof TemporaryError)) throw error;
                logger.warn(`[TIMEOUT ${trade.pair}] Cannot handle order ${orderId}: ${errorMessage(error)}`);
            }
        }
    }

    /** Returns true when the trade was deleted. */
    async handleTimedoutLimitBuy(trade: Trade, order: ExchangeOrder): Promise<boolean> {
        await this.#exchange.cancelOrder(order.id, trade.pair);
        return this.#settleBuy(trade, order, SETTLE.timeout);
    }

    /** Returns true when the whole sell order was unfilled. */
    async handleTimedoutLimitSell(trade: Trade, order: ExchangeOrder): Promise<boolean> {
        await this.#exchange.cancelOrder(order.id, trade.pair);
        return this.#settleSell(trade, order, SETTLE.timeout);
    }

    /** Settles an order cancelled outside the bot the same way as a timed-out one. Returns true when the trade was deleted. */
    async handleCanceledOrder(trade: Trade, order: ExchangeOrder): Promise<boolean> {
        logger.warn(`[CANCELED ${trade.pair}] ${order.side} order ${order.id} was cancelled on the exchange`);
        if (order.side === 'buy') return this.#settleBuy(trade, order, SETTLE.canceled);
        await this.#settleSell(trade, order, SETTLE.canceled);
        return false;
    }

    async #settleBuy(trade: Trade, order: ExchangeOrder, how: Settlement): Promise<boolean> {
        if (order.remaining === order.amount) {
            await this.#repo.delete(trade);
            logger.log(`[${how.tag} ${trade.pair}] Buy order ${order.id} unfilled, trade deleted`);
            await this.#notifier.send(`*${how.title}:* Unfilled buy order for ${trade.pair} ${how.verb}`);
            return true;
        }

        trade.amount = order.amount - order.remaining;
        trade.stakeAmount = trade.amount * trade.openRate;
        trade.openOrderId = null;
        await this.#repo.update(trade);
        logger.log(`[${how.tag} ${trade.pair}] Partial buy order ${order.id}, keeping ${trade.amount}`);
        await this.#notifier.send(`*${how.title}:* Remaining buy order for ${trade.pair} ${how.verb}`);
        return false;
    }

    async #settleSell(trade: Trade, order: ExchangeOrder, how: Settlement): Promise<boolean> {
        const unfilled = order.remaining === order.amount;
        if (!unfilled) {
            trade.amount = order.remaining;
            trade.stakeAmount = trade.amount * trade.openRate;
        }
        trade.closeRate = null;
        trade.closeRateRequested = null;
        trade.closeProfit = null;
        trade.closeDate = null;
        trade.isOpen = true;
        trade.openOrderId = null;
        await this.#repo.update(trade);

        logger.log(`[${how.tag} ${trade.pair}] Sell order ${order.id} not filled, trade reopened with amount ${trade.amount}`);
        await this.#notifier.send(`*${how.title}:* ${unfilled ? 'Unfilled' : 'Remaining'} sell order for ${trade.pair} ${how.verb}`);
        return unfilled;
    }
}
