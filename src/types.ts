export type Candle = {
    t: number; // open time (ms)
    o: number;
    h: number;
    l: number;
    c: number;
    v: number;
};

export type Interval = '1m' | '3m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d';

export type Ticker = {
    ask: number;
    bid: number;
    last: number;
    high: number;
    low: number;
};

export type TickerSummary = {
    symbol: string;
    quoteVolume: number;
};

/** [price, size], best level first. */
export type BookLevel = [number, number];

export type OrderBook = {
    bids: BookLevel[];
    asks: BookLevel[];
};

export type MarketInfo = {
    symbol: string;
    quote: string;
    active: boolean;
};

export type OrderSide = 'buy' | 'sell';
export type OrderStatus = 'open' | 'closed' | 'canceled';

export type FeeInfo = {
    currency: string;
    cost: number;
};

export type ExchangeOrder = {
    id: string;
    pair: string;
    side: OrderSide;
    status: OrderStatus;
    amount: number;
    remaining: number;
    price: number;
    fee: FeeInfo | null;
    datetime: string;
};

export type OrderFill = {
    amount: number;
    fee: FeeInfo | null;
};

/** Ordered [elapsed minutes, required profit] entries, walked in definition order. */
export type RoiTable = Array<[number, number]>;

export type Signal = {
    buy: boolean;
    sell: boolean;
};

export type SellType = 'roi' | 'stop_loss' | 'sell_signal' | 'none';

export type SellDecision = {
    sell: boolean;
    type: SellType;
};

export type BotState = 'running' | 'stopped';
