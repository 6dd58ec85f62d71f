import type { BotState, Interval, RoiTable } from './types.js';

type Env = Record<string, string | undefined>;

export const INTERVALS: readonly Interval[] = ['1m', '3m', '5m', '15m', '30m', '1h', '4h', '1d'];

export type BidStrategyConfig = {
    askLastBalance: number;
    useBookOrder: boolean;
    bookOrderTop: number;
    percentFromTop: number;
};

export type AskStrategyConfig = {
    useBookOrder: boolean;
    bookOrderMin: number;
    bookOrderMax: number;
};

export type ExperimentalConfig = {
    useSellSignal: boolean;
    sellProfitOnly: boolean;
    sellFullfilledAtRoi: boolean;
    checkDepthOfMarket: boolean;
    domBidsAsksDelta: number;
    askAboveMidRange: boolean;
};

export type TrailingStopConfig = {
    enabled: boolean;
    positive: number | null;
};

export type StrategyOverrides = {
    name: string;
    minimalRoi: RoiTable | null;
    stoploss: number | null;
    tickerInterval: Interval | null;
};

export type BotConfig = {
    botId: string;
    dryRun: boolean;
    initialState: BotState;
    exchange: {
        name: string;
        key: string | null;
        secret: string | null;
        pairWhitelist: string[];
        pairBlacklist: string[];
    };
    stakeCurrency: string;
    stakeAmount: number;
    maxOpenTrades: number;
    fiatDisplayCurrency: string | null;
    dynamicWhitelist: number | null;
    highRiskTrading: boolean;
    disableBuy: boolean;
    bidStrategy: BidStrategyConfig;
    askStrategy: AskStrategyConfig;
    experimental: ExperimentalConfig;
    trailingStop: TrailingStopConfig;
    unfilledTimeout: { buy: number; sell: number } | null;
    internals: {
        processThrottleSecs: number;
        retryTimeoutSecs: number;
    };
    strategy: StrategyOverrides;
    telegram: { token: string; chatId: string } | null;
    mongoUri: string | null;
};

function opt(env: Env, name: string): string | undefined {
    const v = env[name];
    return v === undefined || v.trim() === '' ? undefined : v.trim();
}

function must(env: Env, name: string): string {
    const v = opt(env, name);
    if (v === undefined) {
        throw new Error(`Missing env: ${name}`);
    }
    return v;
}

function num(env: Env, name: string, fallback: number): number {
    const v = opt(env, name);
    if (v === undefined) return fallback;
    const n = Number(v);
    if (!Number.isFinite(n)) throw new Error(`Invalid number in env ${name}: "${v}"`);
    return n;
}

function optNum(env: Env, name: string): number | null {
    return opt(env, name) === undefined ? null : num(env, name, 0);
}

function bool(env: Env, name: string, fallback: boolean): boolean {
    const v = opt(env, name);
    if (v === undefined) return fallback;
    return ['true', '1', 'yes'].includes(v.toLowerCase());
}

function list(env: Env, name: string): string[] {
    return (opt(env, name) ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
}

/**
 * Parses `0:0.04,20:0.02,30:0.01` into an ROI table, keeping the written order.
 */
export function parseRoiTable(raw: string): RoiTable {
    return raw
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean)
        .map((entry): [number, number] => {
            const [minutes, profit] = entry.split(':').map((x) => Number(x.trim()));
            if (!Number.isFinite(minutes) || !Number.isFinite(profit)) {
                throw new Error(`Invalid ROI entry "${entry}", expected <minutes>:<profit>`);
            }
            return [minutes, profit];
        });
}

function parseInterval(raw: string): Interval {
    const found = INTERVALS.find((i) => i === raw);
    if (!found) throw new Error(`Unsupported ticker interval: ${raw}`);
    return found;
}

function parseState(raw: string): BotState {
    const s = raw.toLowerCase();
    if (s !== 'running' && s !== 'stopped') throw new Error(`Invalid INITIAL_STATE: ${raw}`);
    return s;
}

export function loadConfig(env: Env = process.env): BotConfig {
    const dryRun = bool(env, 'DRY_RUN', true);
    const key = dryRun ? opt(env, 'EXCHANGE_KEY') ?? null : must(env, 'EXCHANGE_KEY');
    const secret = dryRun ? opt(env, 'EXCHANGE_SECRET') ?? null : must(env, 'EXCHANGE_SECRET');

    const buyTimeout = optNum(env, 'UNFILLED_TIMEOUT_BUY');
    const sellTimeout = optNum(env, 'UNFILLED_TIMEOUT_SELL');

    const telegramToken = opt(env, 'TELEGRAM_TOKEN');
    const telegramChat = opt(env, 'TELEGRAM_CHAT_ID');

    const roiRaw = opt(env, 'MINIMAL_ROI');
    const intervalRaw = opt(env, 'TICKER_INTERVAL');
    const dynamicWhitelist = optNum(env, 'DYNAMIC_WHITELIST');

    const cfg: BotConfig = {
        botId: opt(env, 'BOT_ID') ?? 'default',
        dryRun,
        initialState: parseState(opt(env, 'INITIAL_STATE') ?? 'running'),
        exchange: {
            name: (opt(env, 'EXCHANGE_NAME') ?? 'binance').toLowerCase(),
            key,
            secret,
            pairWhitelist: list(env, 'PAIR_WHITELIST'),
            pairBlacklist: list(env, 'PAIR_BLACKLIST'),
        },
        stakeCurrency: (opt(env, 'STAKE_CURRENCY') ?? 'BTC').toUpperCase(),
        stakeAmount: num(env, 'STAKE_AMOUNT', 0.01),
        maxOpenTrades: num(env, 'MAX_OPEN_TRADES', 3),
        fiatDisplayCurrency: opt(env, 'FIAT_DISPLAY_CURRENCY')?.toUpperCase() ?? (env.FIAT_DISPLAY_CURRENCY === undefined ? 'USD' : null),
        dynamicWhitelist: dynamicWhitelist && dynamicWhitelist > 0 ? Math.floor(dynamicWhitelist) : null,
        highRiskTrading: bool(env, 'HIGH_RISK_TRADING', false),
        disableBuy: bool(env, 'DISABLE_BUY', false),
        bidStrategy: {
            askLastBalance: num(env, 'BID_ASK_LAST_BALANCE', 0),
            useBookOrder: bool(env, 'BID_USE_BOOK_ORDER', false),
            bookOrderTop: num(env, 'BID_BOOK_ORDER_TOP', 1),
            percentFromTop: num(env, 'BID_PERCENT_FROM_TOP', 0),
        },
        askStrategy: {
            useBookOrder: bool(env, 'ASK_USE_BOOK_ORDER', false),
            bookOrderMin: num(env, 'ASK_BOOK_ORDER_MIN', 1),
            bookOrderMax: num(env, 'ASK_BOOK_ORDER_MAX', 1),
        },
        experimental: {
            useSellSignal: bool(env, 'USE_SELL_SIGNAL', false),
            sellProfitOnly: bool(env, 'SELL_PROFIT_ONLY', false),
            sellFullfilledAtRoi: bool(env, 'SELL_FULLFILLED_AT_ROI', false),
            checkDepthOfMarket: bool(env, 'CHECK_DEPTH_OF_MARKET', false),
            domBidsAsksDelta: num(env, 'DOM_BIDS_ASKS_DELTA', 0),
            askAboveMidRange: bool(env, 'BUY_ASK_ABOVE_MID_RANGE', false),
        },
        trailingStop: {
            enabled: bool(env, 'TRAILING_STOP', false),
            positive: optNum(env, 'TRAILING_STOP_POSITIVE'),
        },
        unfilledTimeout: buyTimeout !== null && sellTimeout !== null ? { buy: buyTimeout, sell: sellTimeout } : null,
        internals: {
            processThrottleSecs: num(env, 'PROCESS_THROTTLE_SECS', 5),
            retryTimeoutSecs: num(env, 'RETRY_TIMEOUT_SECS', 30),
        },
        strategy: {
            name: opt(env, 'STRATEGY') ?? 'default',
            minimalRoi: roiRaw ? parseRoiTable(roiRaw) : null,
            stoploss: optNum(env, 'STOPLOSS'),
            tickerInterval: intervalRaw ? parseInterval(intervalRaw) : null,
        },
        telegram: telegramToken && telegramChat ? { token: telegramToken, chatId: telegramChat } : null,
        mongoUri: opt(env, 'MONGO_URI') ?? null,
    };

    validateConfig(cfg);
    return cfg;
}

export function validateConfig(cfg: BotConfig) {
    if (!(cfg.stakeAmount > 0)) throw new Error('STAKE_AMOUNT must be positive');
    if (!Number.isInteger(cfg.maxOpenTrades) || cfg.maxOpenTrades < 1) throw new Error('MAX_OPEN_TRADES must be a positive integer');
    if (cfg.bidStrategy.askLastBalance < 0 || cfg.bidStrategy.askLastBalance > 1) throw new Error('BID_ASK_LAST_BALANCE must be within [0, 1]');
    if (cfg.bidStrategy.bookOrderTop < 1) throw new Error('BID_BOOK_ORDER_TOP must be at least 1');
    if (cfg.bidStrategy.percentFromTop < 0 || cfg.bidStrategy.percentFromTop >= 1) throw new Error('BID_PERCENT_FROM_TOP must be within [0, 1)');
    const { bookOrderMin, bookOrderMax } = cfg.askStrategy;
    if (bookOrderMin < 1 || bookOrderMax < bookOrderMin) {
        throw new Error(`ASK_BOOK_ORDER_MIN/MAX must satisfy 1 <= min <= max (got ${bookOrderMin}/${bookOrderMax})`);
    }
    if (cfg.trailingStop.positive === 0) throw new Error('TRAILING_STOP_POSITIVE must not be 0');
    if (!cfg.dynamicWhitelist && cfg.exchange.pairWhitelist.length === 0) {
        throw new Error('PAIR_WHITELIST is empty and DYNAMIC_WHITELIST is not set');
    }
}
