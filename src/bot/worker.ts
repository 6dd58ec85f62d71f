import type { BotConfig } from '../config.js';
import type { Notifier } from '../notify/notifier.js';
import type { Strategy } from '../strategy/types.js';
import type { TradeEngine } from '../trade/engine.js';
import type { BotState } from '../types.js';
import { logger, systemClock, type Clock } from '../utils/functions.js';
import type { BotStateHandle } from './state.js';

export type WorkerDeps = {
    cfg: BotConfig;
    engine: Pick<TradeEngine, 'processTick'>;
    notifier: Notifier;
    state: BotStateHandle;
    strategy: Strategy;
    clock?: Clock;
};

/**
 * Drives the engine: reports state changes, and while running executes one tick
 * per `processThrottleSecs` at most.
 */
export class Worker {
    readonly #deps: WorkerDeps;
    readonly #clock: Clock;
    #lastState: BotState | null = null;

    constructor(deps: WorkerDeps) {
        this.#deps = deps;
        this.#clock = deps.clock ?? systemClock;
    }

    async run() {
        while (!this.#deps.state.shutdownRequested) {
            await this.runOnce();
        }
    }

    async runOnce(): Promise<BotState> {
        const { state, notifier, engine, cfg } = this.#deps;
        const current = state.state;

        if (current !== this.#lastState) {
            logger.log(`[WORKER] Changing state to: ${current}`);
            await notifier.send(`*Status:* \`${current}\``);
            if (current === 'running') await this.initialMessages();
            this.#lastState = current;
        }

        if (current === 'stopped') {
            await this.#clock.sleep(1000);
        } else {
            await this.throttle(() => engine.processTick(), cfg.internals.processThrottleSecs);
        }
        return current;
    }

    /** Runs `fn` and then sleeps for whatever is left of `minSecs`. */
    async throttle<T>(fn: () => Promise<T>, minSecs: number): Promise<T> {
        const start = this.#clock.now().getTime();
        const result = await fn();
        const elapsed = this.#clock.now().getTime() - start;
        const wait = Math.max(minSecs * 1000 - elapsed, 0);
        logger.debug(`[WORKER] Throttling for ${(wait / 1000).toFixed(2)} seconds`);
        await this.#clock.sleep(wait);
        return result;
    }

    async initialMessages() {
        const { cfg, notifier, strategy } = this.#deps;

        if (cfg.dryRun) {
            await notifier.send('*Warning:* Dry run is enabled. All trades are simulated.');
            if (cfg.bidStrategy.useBookOrder || cfg.askStrategy.useBookOrder) {
                await notifier.send('*Warning:* Order book pricing is enabled in dry run. Simulated fills happen at the requested price.');
            }
        }
        if (cfg.highRiskTrading) {
            await notifier.send('*Warning:* High risk trading is enabled. Stake grows with realised profit.');
        }

        const checks: string[] = [];
        if (cfg.experimental.checkDepthOfMarket) checks.push(`depth of market (bids/asks >= ${cfg.experimental.domBidsAsksDelta})`);
        if (cfg.experimental.askAboveMidRange) checks.push('ask above mid range');

        await notifier.send(
            `*Exchange:* \`${cfg.exchange.name}\`\n` +
                `*Stake per trade:* \`${cfg.stakeAmount} ${cfg.stakeCurrency}\`\n` +
                `*Minimum ROI:* \`${JSON.stringify(strategy.minimalRoi)}\`\n` +
                `*Ticker Interval:* \`${strategy.tickerInterval}\`\n` +
                `*Pre-buy checks:* \`${checks.length ? checks.join(', ') : 'none'}\``,
        );

        if (cfg.dynamicWhitelist) {
            await notifier.send(`*Whitelist:* Dynamic, top ${cfg.dynamicWhitelist} pairs by volume`);
        } else {
            await notifier.send(`*Whitelist:* Static, ${cfg.exchange.pairWhitelist.join(', ')}`);
        }
    }

    async cleanup() {
        logger.log('[WORKER] Cleaning up...');
        await this.#deps.notifier.send('*Status:* `Process died ...`');
    }
}
