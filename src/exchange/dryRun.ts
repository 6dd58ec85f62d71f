import { randomUUID } from 'node:crypto';
import type { Candle, ExchangeOrder, Interval, MarketInfo, OrderBook, OrderFill, OrderSide, Ticker, TickerSummary } from '../types.js';
import type { ExchangeCapability, ExchangeClient, TakerOrMaker } from './client.js';
import { DependencyError } from '../utils/errors.js';
import { logger } from '../utils/functions.js';

const DRY_RUN_BALANCE = 999.9;

/**
 * Paper-trading wrapper: market data comes from the real exchange, orders are
 * simulated and reported as filled at the requested rate right away.
 */
export class DryRunExchange implements ExchangeClient {
    readonly #market: ExchangeClient;
    readonly #orders = new Map<string, ExchangeOrder>();

    constructor(market: ExchangeClient) {
        this.#market = market;
    }

    get id() {
        return this.#market.id;
    }

    get name() {
        return this.#market.name;
    }

    has(capability: ExchangeCapability): boolean {
        return this.#market.has(capability);
    }

    getTicker(pair: string): Promise<Ticker> {
        return this.#market.getTicker(pair);
    }

    getTickers(): Promise<Record<string, TickerSummary>> {
        return this.#market.getTickers();
    }

    getOrderBook(pair: string, depth: number): Promise<OrderBook> {
        return this.#market.getOrderBook(pair, depth);
    }

    getMarkets(): Promise<MarketInfo[]> {
        return this.#market.getMarkets();
    }

    getTickerHistory(pair: string, interval: Interval): Promise<Candle[]> {
        return this.#market.getTickerHistory(pair, interval);
    }

    getFee(pair: string, takerOrMaker: TakerOrMaker): Promise<number> {
        return this.#market.getFee(pair, takerOrMaker);
    }

    #place(side: OrderSide, pair: string, rate: number, amount: number) {
        const id = `dry_run_${side}_${randomUUID()}`;
        this.#orders.set(id, {
            id,
            pair,
            side,
            status: 'closed',
            amount,
            remaining: 0,
            price: rate,
            fee: null,
            datetime: new Date().toISOString(),
        });
        logger.log(`[DRY-RUN ${pair}] Simulated ${side} of ${amount} at ${rate} (${id})`);
        return { id };
    }

    async buy(pair: string, rate: number, amount: number) {
        return this.#place('buy', pair, rate, amount);
    }

    async sell(pair: string, rate: number, amount: number) {
        return this.#place('sell', pair, rate, amount);
    }

    async cancelOrder(orderId: string): Promise<void> {
        this.#orders.delete(orderId);
    }

    async getOrder(orderId: string, pair: string): Promise<ExchangeOrder> {
        const order = this.#orders.get(orderId);
        if (!order) throw new DependencyError(`Dry-run order ${orderId} for ${pair} not found`);
        return { ...order };
    }

    async getTradesForOrder(): Promise<OrderFill[]> {
        return [];
    }

    async getBalance(): Promise<number> {
        return DRY_RUN_BALANCE;
    }
}
