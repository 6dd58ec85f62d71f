import type { Trade } from './trade.js';
import { logger, mean, truncNum } from '../utils/functions.js';

export type StakeConfig = {
    stakeAmount: number;
    maxOpenTrades: number;
};

/** Realised profit and the average open fee over closed trades. */
export function getTradeProfitsFees(trades: Trade[]): { profit: number; fees: number } {
    const closed = trades.filter((t) => !t.isOpen);
    return {
        profit: closed.reduce((acc, t) => acc + t.calcProfit(), 0),
        fees: mean(closed.map((t) => t.feeOpen)),
    };
}

/**
 * Grows the stake with cumulative realised profit relative to the initial capital
 * (`stakeAmount * maxOpenTrades`). Only applies while trade slots are left.
 */
export function getHighStakeAmount(cfg: StakeConfig, trades: Trade[], openCount: number): number {
    const stake = cfg.stakeAmount;
    if (cfg.maxOpenTrades - openCount <= 0) return stake;

    const initial = stake * cfg.maxOpenTrades;
    const { profit, fees } = getTradeProfitsFees(trades);
    if (profit <= 0) return stake;

    const pct = (initial + profit) / initial - 1 - fees * 2;
    const high = truncNum(stake * (1 + truncNum(pct, 2)), 8);
    logger.log(`[STAKE] High risk stake ${high} (realised profit ${profit}, avg fee ${fees})`);
    return high;
}
