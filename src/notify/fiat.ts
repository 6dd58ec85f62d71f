import { request, type Dispatcher } from 'undici';
import { errorMessage, logger, systemClock, type Clock } from '../utils/functions.js';
import { getHttpAgent, isRecord } from './http.js';

const CACHE_TTL_MS = 6 * 60 * 1000;

const COIN_IDS: Record<string, string> = {
    BTC: 'bitcoin',
    ETH: 'ethereum',
    USDT: 'tether',
    USDC: 'usd-coin',
    BNB: 'binancecoin',
    SOL: 'solana',
    XRP: 'ripple',
    ADA: 'cardano',
    DOGE: 'dogecoin',
    LTC: 'litecoin',
    DOT: 'polkadot',
    TRX: 'tron',
};

export interface FiatConverter {
    /** Value of `amount` of `crypto` in `fiat`, or 0 when no rate is available. */
    convertAmount(amount: number, crypto: string, fiat: string): Promise<number>;
}

export type CoinGeckoOptions = {
    baseUrl?: string;
    dispatcher?: Dispatcher;
    clock?: Clock;
};

export class CoinGeckoFiatConverter implements FiatConverter {
    readonly #baseUrl: string;
    readonly #dispatcher: Dispatcher;
    readonly #clock: Clock;
    readonly #cache = new Map<string, { price: number; fetchedAt: number }>();

    constructor(opts: CoinGeckoOptions = {}) {
        this.#baseUrl = opts.baseUrl ?? 'https://api.coingecko.com';
        this.#dispatcher = opts.dispatcher ?? getHttpAgent();
        this.#clock = opts.clock ?? systemClock;
    }

    async convertAmount(amount: number, crypto: string, fiat: string): Promise<number> {
        const price = await this.getPrice(crypto, fiat);
        return amount * price;
    }

    async getPrice(crypto: string, fiat: string): Promise<number> {
        const coin = crypto.toUpperCase();
        const vs = fiat.toLowerCase();
        const key = `${coin}_${vs}`;
        const now = this.#clock.now().getTime();

        const cached = this.#cache.get(key);
        if (cached && now - cached.fetchedAt < CACHE_TTL_MS) return cached.price;

        const id = COIN_IDS[coin];
        if (!id) {
            logger.warn(`[FIAT] No price source for ${coin}`);
            return 0;
        }

        try {
            const price = await this.#fetchPrice(id, vs);
            this.#cache.set(key, { price, fetchedAt: now });
            return price;
        } catch (error) {
            logger.warn(`[FIAT] Unable to fetch ${coin}/${vs.toUpperCase()} price:`, errorMessage(error));
            return 0;
        }
    }

    async #fetchPrice(id: string, vs: string): Promise<number> {
        const url = `${this.#baseUrl}/api/v3/simple/price?ids=${encodeURIComponent(id)}&vs_currencies=${encodeURIComponent(vs)}`;
        const { statusCode, body } = await request(url, { method: 'GET', headers: { accept: 'application/json' }, dispatcher: this.#dispatcher });
        if (statusCode !== 200) {
            await body.text();
            throw new Error(`HTTP ${statusCode}`);
        }

        const json: unknown = await body.json();
        const entry = isRecord(json) ? json[id] : undefined;
        const price = isRecord(entry) ? entry[vs] : undefined;
        if (typeof price !== 'number') throw new Error(`No ${vs} price for ${id} in response`);
        return price;
    }
}
