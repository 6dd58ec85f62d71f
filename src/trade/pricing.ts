import type { BidStrategyConfig } from '../config.js';
import type { OrderBook, Ticker } from '../types.js';
import { DependencyError } from '../utils/errors.js';
import { logger, truncNum } from '../utils/functions.js';

/** Smallest price step added on top of a book bid. */
export const SATOSHI = 1e-8;

/**
 * Entry price for a limit buy. Uses the ticker (ask, or a blend towards last), optionally capped
 * by a book bid one step above level `bookOrderTop`, then discounted by `percentFromTop`.
 */
export function getTargetBid(pair: string, ticker: Ticker, bid: BidStrategyConfig, book?: OrderBook): number {
    let rate = ticker.ask < ticker.last ? ticker.ask : ticker.ask + bid.askLastBalance * (ticker.last - ticker.ask);

    if (bid.useBookOrder) {
        if (!book) throw new DependencyError(`Order book required for ${pair}`);
        const level = book.bids[bid.bookOrderTop - 1];
        if (!level) throw new DependencyError(`Order book for ${pair} has no bid at level ${bid.bookOrderTop}`);
        const bookRate = level[0] + SATOSHI;
        logger.debug(`[BID ${pair}] book rate ${bookRate}, ticker rate ${rate}`);
        rate = Math.min(rate, bookRate);
    }

    if (bid.percentFromTop > 0) {
        rate = truncNum(rate - rate * bid.percentFromTop, 8);
    }
    return rate;
}
