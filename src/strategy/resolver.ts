import type { StrategyOverrides } from '../config.js';
import { logger } from '../utils/functions.js';
import { DefaultStrategy } from './defaultStrategy.js';
import type { Strategy } from './types.js';

const REGISTRY: Record<string, () => Strategy> = {
    default: () => new DefaultStrategy(),
};

/**
 * Instantiates the named strategy and lets the configuration override its
 * ROI table, stop-loss and ticker interval.
 */
export function resolveStrategy(overrides: StrategyOverrides): Strategy {
    const factory = REGISTRY[overrides.name];
    if (!factory) {
        throw new Error(`Unknown strategy "${overrides.name}". Available: ${Object.keys(REGISTRY).join(', ')}`);
    }
    const base = factory();

    if (overrides.minimalRoi) logger.log('[STRATEGY] Overriding minimal_roi with config:', overrides.minimalRoi);
    if (overrides.stoploss !== null) logger.log(`[STRATEGY] Overriding stoploss with config: ${overrides.stoploss}`);
    if (overrides.tickerInterval) logger.log(`[STRATEGY] Overriding ticker interval with config: ${overrides.tickerInterval}`);

    return {
        name: base.name,
        minimalRoi: overrides.minimalRoi ?? base.minimalRoi,
        stoploss: overrides.stoploss ?? base.stoploss,
        tickerInterval: overrides.tickerInterval ?? base.tickerInterval,
        adviseIndicators: (candles, pair) => base.adviseIndicators(candles, pair),
        adviseBuy: (frame, pair) => base.adviseBuy(frame, pair),
        adviseSell: (frame, pair) => base.adviseSell(frame, pair),
    };
}
