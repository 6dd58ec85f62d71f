import mongoose from 'mongoose';
import type { TradeRecord } from '../trade/trade.js';

const tradeSchema = new mongoose.Schema<TradeRecord>(
    {
        botId: { type: String, required: true, index: true },
        exchange: { type: String, required: true },
        pair: { type: String, required: true },
        isOpen: { type: Boolean, required: true, default: true, index: true },
        feeOpen: { type: Number, required: true, default: 0 },
        feeClose: { type: Number, required: true, default: 0 },
        openRate: { type: Number, required: true },
        openRateRequested: { type: Number, default: null },
        closeRate: { type: Number, default: null },
        closeRateRequested: { type: Number, default: null },
        closeProfit: { type: Number, default: null },
        stakeAmount: { type: Number, required: true },
        amount: { type: Number, required: true },
        openDate: { type: Date, required: true },
        closeDate: { type: Date, default: null },
        openOrderId: { type: String, default: null },
        stopLoss: { type: Number, default: null },
        initialStopLoss: { type: Number, default: null },
    },
    {
        timestamps: true,
    },
);

export const TradeModel = mongoose.model<TradeRecord>('Trade', tradeSchema);
