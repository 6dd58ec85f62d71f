import type { BotConfig } from '../config.js';
import type { Candle, ExchangeOrder, Interval, MarketInfo, OrderBook, OrderFill, Ticker, TickerSummary } from '../types.js';
import { logger } from '../utils/functions.js';
import { CcxtExchange } from './ccxtExchange.js';
import { DryRunExchange } from './dryRun.js';

export type ExchangeCapability = 'fetchTickers' | 'fetchMyTrades';
export type TakerOrMaker = 'taker' | 'maker';

/**
 * Everything the bot needs from an exchange. Implementations throw the errors from
 * `utils/errors.ts` so callers can tell a retryable hiccup from a real problem.
 */
export interface ExchangeClient {
    readonly id: string;
    readonly name: string;
    has(capability: ExchangeCapability): boolean;

    getTicker(pair: string): Promise<Ticker>;
    getTickers(): Promise<Record<string, TickerSummary>>;
    getOrderBook(pair: string, depth: number): Promise<OrderBook>;
    getMarkets(): Promise<MarketInfo[]>;
    getTickerHistory(pair: string, interval: Interval): Promise<Candle[]>;

    buy(pair: string, rate: number, amount: number): Promise<{ id: string }>;
    sell(pair: string, rate: number, amount: number): Promise<{ id: string }>;
    cancelOrder(orderId: string, pair: string): Promise<void>;
    getOrder(orderId: string, pair: string): Promise<ExchangeOrder>;
    getTradesForOrder(orderId: string, pair: string, since: Date): Promise<OrderFill[]>;

    getFee(pair: string, takerOrMaker: TakerOrMaker): Promise<number>;
    getBalance(currency: string): Promise<number>;
}

/**
 * Builds the live ccxt client, loads its markets and wraps it for paper trading when dry-run is on.
 */
export async function createExchange(cfg: BotConfig): Promise<ExchangeClient> {
    const live = new CcxtExchange(cfg.exchange.name, { apiKey: cfg.exchange.key, secret: cfg.exchange.secret });
    await live.init();
    logger.log(`[EXCHANGE] Using ${live.name} (${cfg.dryRun ? 'dry-run' : 'live'})`);
    return cfg.dryRun ? new DryRunExchange(live) : live;
}
