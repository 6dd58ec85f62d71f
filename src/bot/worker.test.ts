import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { BotConfig } from '../config.js';
import { FixedClock, RecordingNotifier, StubStrategy, makeConfig } from '../testing/helpers.js';
import { BotStateHandle } from './state.js';
import { Worker } from './worker.js';

describe('Worker', () => {
    let clock: FixedClock;
    let notifier: RecordingNotifier;
    let processTick: Mock<() => Promise<boolean>>;

    const build = (state: BotStateHandle, over: Partial<BotConfig> = { dryRun: false }) =>
        new Worker({ cfg: makeConfig(over), engine: { processTick }, notifier, state, strategy: new StubStrategy([[0, 0.04]]), clock });

    beforeEach(() => {
        clock = new FixedClock();
        notifier = new RecordingNotifier();
        processTick = vi.fn<() => Promise<boolean>>().mockResolvedValue(false);
    });

    it('announces the running state once and throttles each tick', async () => {
        const worker = build(new BotStateHandle('running'));

        await worker.runOnce();
        await worker.runOnce();

        expect(processTick).toHaveBeenCalledTimes(2);
        expect(clock.sleeps).toEqual([5000, 5000]);
        expect(notifier.messages).toEqual([
            '*Status:* `running`',
            '*Exchange:* `fake`\n*Stake per trade:* `1 BTC`\n*Minimum ROI:* `[[0,0.04]]`\n*Ticker Interval:* `5m`\n*Pre-buy checks:* `none`',
            '*Whitelist:* Static, ETH/BTC, LTC/BTC',
        ]);
    });

    it('idles while stopped', async () => {
        const worker = build(new BotStateHandle('stopped'));

        await expect(worker.runOnce()).resolves.toBe('stopped');

        expect(processTick).not.toHaveBeenCalled();
        expect(clock.sleeps).toEqual([1000]);
        expect(notifier.messages).toEqual(['*Status:* `stopped`']);
    });

    it('reports a transition from running to stopped', async () => {
        const state = new BotStateHandle('running');
        const worker = build(state);
        await worker.runOnce();

        state.stop();
        await worker.runOnce();

        expect(notifier.messages.at(-1)).toBe('*Status:* `stopped`');
    });

    it('warns about dry run and high risk on start', async () => {
        const worker = build(new BotStateHandle('running'), { dryRun: true, highRiskTrading: true });
        await worker.runOnce();

        expect(notifier.messages.slice(1, 3)).toEqual([
            '*Warning:* Dry run is enabled. All trades are simulated.',
            '*Warning:* High risk trading is enabled. Stake grows with realised profit.',
        ]);
    });

    it('only sleeps for what is left of the throttle window', async () => {
        const worker = build(new BotStateHandle('running'));
        const result = await worker.throttle(async () => {
            clock.advance(2000);
            return 'done';
        }, 5);

        expect(result).toBe('done');
        expect(clock.sleeps).toEqual([3000]);
    });

    it('runs until shutdown is requested', async () => {
        const state = new BotStateHandle('running');
        processTick.mockImplementation(async () => {
            state.requestShutdown();
            return false;
        });

        await build(state).run();

        expect(processTick).toHaveBeenCalledTimes(1);
    });

    it('says goodbye on cleanup', async () => {
        await build(new BotStateHandle('running')).cleanup();
        expect(notifier.messages).toEqual(['*Status:* `Process died ...`']);
    });
});
