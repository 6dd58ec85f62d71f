import type { BotState } from '../types.js';
import { logger } from '../utils/functions.js';

/** Run state shared by the worker loop, the engine and the signal handlers. */
export class BotStateHandle {
    #state: BotState;
    #shutdownRequested = false;

    constructor(initial: BotState) {
        this.#state = initial;
    }

    get state(): BotState {
        return this.#state;
    }

    get shutdownRequested(): boolean {
        return this.#shutdownRequested;
    }

    start() {
        this.#state = 'running';
    }

    stop() {
        this.#state = 'stopped';
    }

    requestShutdown() {
        if (!this.#shutdownRequested) logger.log('[BOT] Shutdown requested, finishing current iteration...');
        this.#shutdownRequested = true;
    }
}
