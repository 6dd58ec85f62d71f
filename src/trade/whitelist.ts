import type { ExchangeClient } from '../exchange/client.js';
import { quoteFromPair } from '../exchange/market.js';
import { OperationalError } from '../utils/errors.js';
import { logger, systemClock, type Clock } from '../utils/functions.js';

const TTL_MS = 30 * 60 * 1000;

type Entry = { pairs: string[]; builtAt: number };

/**
 * Volume-ranked pair lists per quote currency, rebuilt at most every 30 minutes.
 */
export class WhitelistCache {
    readonly #entries = new Map<string, Entry>();
    readonly #clock: Clock;

    constructor(clock: Clock = systemClock) {
        this.#clock = clock;
    }

    async genPairWhitelist(exchange: Pick<ExchangeClient, 'has' | 'getTickers'>, quote: string): Promise<string[]> {
        const now = this.#clock.now().getTime();
        const cached = this.#entries.get(quote);
        if (cached && now - cached.builtAt < TTL_MS) return [...cached.pairs];

        if (!exchange.has('fetchTickers')) {
            throw new OperationalError('Exchange does not support dynamic whitelist (fetchTickers unavailable)');
        }

        const tickers = await exchange.getTickers();
        const pairs = Object.entries(tickers)
            .filter(([symbol]) => quoteFromPair(symbol) === quote)
            .sort(([, a], [, b]) => b.quoteVolume - a.quoteVolume)
            .map(([symbol]) => symbol);

        this.#entries.set(quote, { pairs, builtAt: now });
        logger.log(`[WHITELIST] Ranked ${pairs.length} ${quote} pairs by volume`);
        return [...pairs];
    }
}

/**
 * Keeps, in order, the pairs the exchange lists against the stake currency that are active and not blacklisted.
 */
export async function refreshWhitelist(
    exchange: Pick<ExchangeClient, 'getMarkets'>,
    whitelist: string[],
    stakeCurrency: string,
    blacklist: string[],
): Promise<string[]> {
    const markets = await exchange.getMarkets();
    const valid = new Set(markets.filter((m) => m.quote === stakeCurrency && m.active).map((m) => m.symbol));

    const sanitized: string[] = [];
    for (const pair of whitelist) {
        if (blacklist.includes(pair)) continue;
        if (!valid.has(pair)) {
            logger.log(`[WHITELIST] Ignoring ${pair}: not an active ${stakeCurrency} market`);
            continue;
        }
        if (!sanitized.includes(pair)) sanitized.push(pair);
    }
    return sanitized;
}
