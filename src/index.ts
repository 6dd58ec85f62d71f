#!/usr/bin/env node
// src/index.ts
import 'dotenv/config';
import { BotStateHandle } from './bot/state.js';
import { Worker } from './bot/worker.js';
import { loadConfig } from './config.js';
import { connectDB, disconnectDB } from './db/connect.js';
import { createExchange } from './exchange/client.js';
import { CoinGeckoFiatConverter } from './notify/fiat.js';
import { closeHttpAgent } from './notify/http.js';
import { createNotifier } from './notify/notifier.js';
import { Analyzer } from './strategy/analyze.js';
import { resolveStrategy } from './strategy/resolver.js';
import { TradeEngine } from './trade/engine.js';
import { logger } from './utils/functions.js';

async function main() {
    const cfg = loadConfig();
    logger.log(`Starting bot ${cfg.botId} (${cfg.dryRun ? 'dry-run' : 'live'})`);

    const repo = await connectDB(cfg.mongoUri);
    const exchange = await createExchange(cfg);
    const strategy = resolveStrategy(cfg.strategy);
    logger.log(`Strategy: ${strategy.name}, interval ${strategy.tickerInterval}, stoploss ${strategy.stoploss}`);

    const notifier = createNotifier(cfg.telegram);
    const fiat = new CoinGeckoFiatConverter();
    const state = new BotStateHandle(cfg.initialState);
    const analyzer = new Analyzer(strategy, exchange, cfg);
    const engine = new TradeEngine({ cfg, exchange, repo, analyzer, notifier, fiat, state });
    const worker = new Worker({ cfg, engine, notifier, state, strategy });

    const shutdown = () => state.requestShutdown();
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
        await worker.run();
    } finally {
        await worker.cleanup();
        await disconnectDB();
        await closeHttpAgent();
    }
}

main().catch((e) => {
    logger.error(e);
    process.exit(1);
});
