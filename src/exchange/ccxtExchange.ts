// src/exchange/ccxtExchange.ts
import ccxt from 'ccxt';
import type { Exchange, Order } from 'ccxt';
import type { Candle, ExchangeOrder, FeeInfo, Interval, MarketInfo, OrderBook, OrderFill, OrderStatus, Ticker, TickerSummary } from '../types.js';
import type { ExchangeCapability, ExchangeClient, TakerOrMaker } from './client.js';
import { DependencyError, OperationalError, TemporaryError } from '../utils/errors.js';
import { errorMessage, logger, withRetries } from '../utils/functions.js';

const API_RETRY_COUNT = 4;

type Credentials = { apiKey: string | null; secret: string | null };
type CcxtOptions = { apiKey?: string; secret?: string; enableRateLimit: boolean };

const FACTORIES: Record<string, (opts: CcxtOptions) => Exchange> = {
    binance: (opts) => new ccxt.binance(opts),
    bybit: (opts) => new ccxt.bybit(opts),
    coinbase: (opts) => new ccxt.coinbase(opts),
    kraken: (opts) => new ccxt.kraken(opts),
    kucoin: (opts) => new ccxt.kucoin(opts),
    okx: (opts) => new ccxt.okx(opts),
};

export const SUPPORTED_EXCHANGES = Object.keys(FACTORIES);

function num(value: unknown, field: string, context: string): number {
    const n = Number(value);
    if (value == null || !Number.isFinite(n)) {
        throw new DependencyError(`${context}: exchange returned no usable ${field}`);
    }
    return n;
}

function toFee(fee: { currency?: string | undefined; cost?: number | undefined } | undefined): FeeInfo | null {
    if (!fee || !fee.currency || fee.cost == null) return null;
    return { currency: fee.currency, cost: Number(fee.cost) };
}

function toStatus(status: string | undefined): OrderStatus {
    if (status === 'closed') return 'closed';
    if (status === 'canceled' || status === 'cancelled' || status === 'expired' || status === 'rejected') return 'canceled';
    return 'open';
}

function toOrder(o: Order, pair: string): ExchangeOrder {
    const timestamp = o.timestamp ?? Date.now();
    return {
        id: String(o.id),
        pair: o.symbol ?? pair,
        side: o.side === 'sell' ? 'sell' : 'buy',
        status: toStatus(o.status),
        amount: Number(o.amount ?? 0),
        remaining: Number(o.remaining ?? 0),
        price: Number(o.average ?? o.price ?? 0),
        fee: toFee(o.fee),
        datetime: o.datetime ?? new Date(timestamp).toISOString(),
    };
}

/**
 * Live exchange client on top of ccxt. Network errors are retried, then surfaced as
 * TemporaryError; rejected orders as DependencyError; anything else ccxt raises as OperationalError.
 */
export class CcxtExchange implements ExchangeClient {
    readonly #api: Exchange;

    constructor(exchangeId: string, credentials: Credentials) {
        const factory = FACTORIES[exchangeId];
        if (!factory) {
            throw new OperationalError(`Exchange ${exchangeId} is not supported. Use one of: ${SUPPORTED_EXCHANGES.join(', ')}`);
        }
        const opts: CcxtOptions = { enableRateLimit: true };
        if (credentials.apiKey) opts.apiKey = credentials.apiKey;
        if (credentials.secret) opts.secret = credentials.secret;
        this.#api = factory(opts);
    }

    get id(): string {
        return String(this.#api.id);
    }

    get name(): string {
        return String(this.#api.name ?? this.#api.id);
    }

    async init() {
        await this.#call('loadMarkets', () => this.#api.loadMarkets());
        logger.log(`[EXCHANGE] ${this.name}: ${Object.keys(this.#api.markets ?? {}).length} markets loaded.`);
    }

    has(capability: ExchangeCapability): boolean {
        return Boolean(this.#api.has[capability]);
    }

    async #call<T>(context: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await withRetries(fn, context, {
                maxRetries: API_RETRY_COUNT,
                shouldRetry: (e) => e instanceof ccxt.NetworkError,
            });
        } catch (e) {
            if (e instanceof ccxt.NetworkError) {
                throw new TemporaryError(`Could not ${context} due to ${e.name}: ${e.message}`, { cause: e });
            }
            if (e instanceof ccxt.InsufficientFunds || e instanceof ccxt.InvalidOrder || e instanceof ccxt.OrderNotFound) {
                throw new DependencyError(`Could not ${context}: ${e.message}`, { cause: e });
            }
            if (e instanceof ccxt.BaseError) {
                throw new OperationalError(`Could not ${context}: ${errorMessage(e)}`, { cause: e });
            }
            throw e;
        }
    }

    async getTicker(pair: string): Promise<Ticker> {
        const t = await this.#call(`fetch ticker for ${pair}`, () => this.#api.fetchTicker(pair));
        const ctx = `[TICKER ${pair}]`;
        return {
            ask: num(t.ask, 'ask', ctx),
            bid: num(t.bid, 'bid', ctx),
            last: num(t.last, 'last', ctx),
            high: Number(t.high ?? NaN),
            low: Number(t.low ?? NaN),
        };
    }

    async getTickers(): Promise<Record<string, TickerSummary>> {
        const tickers = await this.#call('fetch tickers', () => this.#api.fetchTickers());
        const out: Record<string, TickerSummary> = {};
        for (const [symbol, t] of Object.entries(tickers)) {
            out[symbol] = { symbol: t.symbol ?? symbol, quoteVolume: Number(t.quoteVolume ?? 0) };
        }
        return out;
    }

    async getOrderBook(pair: string, depth: number): Promise<OrderBook> {
        const book = await this.#call(`fetch order book for ${pair}`, () => this.#api.fetchOrderBook(pair, depth));
        const levels = (rows: unknown[][]) => rows.map(([price, size]): [number, number] => [Number(price), Number(size)]);
        return { bids: levels(book.bids), asks: levels(book.asks) };
    }

    async getMarkets(): Promise<MarketInfo[]> {
        const markets = await this.#call('load markets', () => this.#api.loadMarkets());
        const out: MarketInfo[] = [];
        for (const m of Object.values(markets)) {
            if (!m) continue;
            // ccxt leaves `active` undefined when the exchange does not report it
            out.push({ symbol: m.symbol, quote: m.quote, active: m.active !== false });
        }
        return out;
    }

    async getTickerHistory(pair: string, interval: Interval): Promise<Candle[]> {
        const rows = await this.#call(`fetch ${interval} candles for ${pair}`, () => this.#api.fetchOHLCV(pair, interval));
        return rows.map(([t, o, h, l, c, v]) => ({
            t: Number(t),
            o: Number(o),
            h: Number(h),
            l: Number(l),
            c: Number(c),
            v: Number(v),
        }));
    }

    async buy(pair: string, rate: number, amount: number): Promise<{ id: string }> {
        const order = await this.#call(`place buy order on ${pair}`, () => this.#api.createLimitBuyOrder(pair, amount, rate));
        return { id: String(order.id) };
    }

    async sell(pair: string, rate: number, amount: number): Promise<{ id: string }> {
        const order = await this.#call(`place sell order on ${pair}`, () => this.#api.createLimitSellOrder(pair, amount, rate));
        return { id: String(order.id) };
    }

    async cancelOrder(orderId: string, pair: string): Promise<void> {
        await this.#call(`cancel order ${orderId}`, () => this.#api.cancelOrder(orderId, pair));
    }

    async getOrder(orderId: string, pair: string): Promise<ExchangeOrder> {
        const order = await this.#call(`fetch order ${orderId}`, () => this.#api.fetchOrder(orderId, pair));
        return toOrder(order, pair);
    }

    async getTradesForOrder(orderId: string, pair: string, since: Date): Promise<OrderFill[]> {
        if (!this.has('fetchMyTrades')) return [];
        const trades = await this.#call(`fetch trades for ${pair}`, () => this.#api.fetchMyTrades(pair, since.getTime()));
        return trades.filter((t) => t.order === orderId).map((t) => ({ amount: Number(t.amount ?? 0), fee: toFee(t.fee) }));
    }

    async getFee(pair: string, takerOrMaker: TakerOrMaker): Promise<number> {
        const fee = await this.#call(`calculate ${takerOrMaker} fee for ${pair}`, async () => this.#api.calculateFee(pair, 'limit', 'buy', 1, 1, takerOrMaker));
        return Number(fee.rate ?? 0);
    }

    async getBalance(currency: string): Promise<number> {
        const balances = await this.#call('fetch balance', () => this.#api.fetchBalance());
        const entry = balances[currency];
        return Number(entry?.free ?? 0);
    }
}
