import type { ExchangeOrder } from '../types.js';
import { logger } from '../utils/functions.js';

/** Persisted shape of a trade. */
export type TradeRecord = {
    botId: string;
    exchange: string;
    pair: string;
    isOpen: boolean;
    feeOpen: number;
    feeClose: number;
    openRate: number;
    openRateRequested: number | null;
    closeRate: number | null;
    closeRateRequested: number | null;
    closeProfit: number | null;
    stakeAmount: number;
    amount: number;
    openDate: Date;
    closeDate: Date | null;
    openOrderId: string | null;
    stopLoss: number | null;
    initialStopLoss: number | null;
};

type RequiredFields = 'botId' | 'exchange' | 'pair' | 'feeOpen' | 'feeClose' | 'openRate' | 'stakeAmount' | 'amount' | 'openDate';

export type TradeInit = Pick<TradeRecord, RequiredFields> & Partial<Omit<TradeRecord, RequiredFields>> & { id?: string | null };

function round8(x: number): number {
    return Number(x.toFixed(8));
}

export class Trade implements TradeRecord {
    id: string | null;
    botId: string;
    exchange: string;
    pair: string;
    isOpen: boolean;
    feeOpen: number;
    feeClose: number;
    openRate: number;
    openRateRequested: number | null;
    closeRate: number | null;
    closeRateRequested: number | null;
    closeProfit: number | null;
    stakeAmount: number;
    amount: number;
    openDate: Date;
    closeDate: Date | null;
    openOrderId: string | null;
    stopLoss: number | null;
    initialStopLoss: number | null;

    constructor(init: TradeInit) {
        this.id = init.id ?? null;
        this.botId = init.botId;
        this.exchange = init.exchange;
        this.pair = init.pair;
        this.isOpen = init.isOpen ?? true;
        this.feeOpen = init.feeOpen;
        this.feeClose = init.feeClose;
        this.openRate = init.openRate;
        this.openRateRequested = init.openRateRequested ?? null;
        this.closeRate = init.closeRate ?? null;
        this.closeRateRequested = init.closeRateRequested ?? null;
        this.closeProfit = init.closeProfit ?? null;
        this.stakeAmount = init.stakeAmount;
        this.amount = init.amount;
        this.openDate = init.openDate;
        this.closeDate = init.closeDate ?? null;
        this.openOrderId = init.openOrderId ?? null;
        this.stopLoss = init.stopLoss ?? null;
        this.initialStopLoss = init.initialStopLoss ?? null;
    }

    toRecord(): TradeRecord {
        return {
            botId: this.botId,
            exchange: this.exchange,
            pair: this.pair,
            isOpen: this.isOpen,
            feeOpen: this.feeOpen,
            feeClose: this.feeClose,
            openRate: this.openRate,
            openRateRequested: this.openRateRequested,
            closeRate: this.closeRate,
            closeRateRequested: this.closeRateRequested,
            closeProfit: this.closeProfit,
            stakeAmount: this.stakeAmount,
            amount: this.amount,
            openDate: this.openDate,
            closeDate: this.closeDate,
            openOrderId: this.openOrderId,
            stopLoss: this.stopLoss,
            initialStopLoss: this.initialStopLoss,
        };
    }

    toString(): string {
        return `Trade(id=${this.id}, pair=${this.pair}, amount=${this.amount.toFixed(8)}, open_rate=${this.openRate.toFixed(8)}, open_since=${this.openDate.toISOString()})`;
    }

    /**
     * Moves the stop-loss to `rate * (1 - |stoploss|)` if that is higher than the current one.
     * The first call also records the initial stop-loss. Returns the stop-loss in effect.
     */
    adjustStopLoss(rate: number, stoploss: number): number {
        const newLoss = rate * (1 - Math.abs(stoploss));

        const current = this.stopLoss;

        if (current === null) {
            this.initialStopLoss = newLoss;
        }

        if (current === null || current < newLoss) {
            logger.debug(`[STOPLOSS ${this.pair}] adjusted to ${newLoss.toFixed(8)} (was ${current ?? 'unset'})`);
            this.stopLoss = newLoss;
            return newLoss;
        }
        return current;
    }

    /** Applies a filled order. Orders that are not closed yet are ignored. */
    update(order: ExchangeOrder, now: Date) {
        if (order.status !== 'closed') return;

        logger.log(`[TRADE ${this.pair}] Updating with filled ${order.side} order ${order.id}`);
        if (order.side === 'buy') {
            this.openRate = order.price;
            this.amount = order.amount;
            this.openOrderId = null;
            logger.log(`[TRADE ${this.pair}] Buy order filled: ${this}`);
        } else {
            this.close(order.price, now);
            logger.log(`[TRADE ${this.pair}] Sell order filled: ${this}`);
        }
    }

    close(rate: number, now: Date) {
        this.closeRate = rate;
        this.closeProfit = this.calcProfitPercent();
        this.closeDate = now;
        this.isOpen = false;
        this.openOrderId = null;
        logger.log(`[TRADE ${this.pair}] Marked as closed at ${rate} (profit ${(this.closeProfit * 100).toFixed(2)}%)`);
    }

    calcOpenTradePrice(fee?: number): number {
        const buyTrade = this.amount * this.openRate;
        return buyTrade + buyTrade * (fee ?? this.feeOpen);
    }

    /** Value received when selling at `rate` (defaults to the close rate), net of fees. */
    calcCloseTradePrice(rate?: number, fee?: number): number {
        const r = rate ?? this.closeRate;
        if (r === null) return 0;
        const sellTrade = this.amount * r;
        return sellTrade - sellTrade * (fee ?? this.feeClose);
    }

    calcProfit(rate?: number, fee?: number): number {
        return round8(this.calcCloseTradePrice(rate, fee) - this.calcOpenTradePrice());
    }

    calcProfitPercent(rate?: number, fee?: number): number {
        return round8(this.calcCloseTradePrice(rate, fee) / this.calcOpenTradePrice() - 1);
    }
}
