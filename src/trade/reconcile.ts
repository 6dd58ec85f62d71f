import type { ExchangeClient } from '../exchange/client.js';
import { baseFromPair } from '../exchange/market.js';
import type { ExchangeOrder } from '../types.js';
import { OperationalError } from '../utils/errors.js';
import { logger } from '../utils/functions.js';
import type { Trade } from './trade.js';

// fills are summed in floating point
const AMOUNT_EPSILON = 1e-8;

/**
 * Amount actually received for a filled buy once the exchange has taken its fee in the base currency.
 */
export async function getRealAmount(exchange: Pick<ExchangeClient, 'getTradesForOrder'>, trade: Trade, order: ExchangeOrder): Promise<number> {
    const orderAmount = order.amount;
    if (trade.feeOpen === 0 || order.status === 'open') return orderAmount;

    const base = baseFromPair(trade.pair);
    if (order.fee && order.fee.currency === base) {
        const real = orderAmount - order.fee.cost;
        logger.log(`[RECONCILE ${trade.pair}] Fee of ${order.fee.cost} ${order.fee.currency} taken from order, amount ${orderAmount} -> ${real}`);
        return real;
    }

    const fills = await exchange.getTradesForOrder(order.id, trade.pair, trade.openDate);
    if (fills.length === 0) {
        logger.log(`[RECONCILE ${trade.pair}] No fills found for order ${order.id}`);
        return orderAmount;
    }

    let amount = 0;
    let feeAbs = 0;
    for (const fill of fills) {
        amount += fill.amount;
        if (fill.fee && fill.fee.currency === base) feeAbs += fill.fee.cost;
    }
    if (Math.abs(amount - orderAmount) > AMOUNT_EPSILON * Math.max(1, orderAmount)) {
        throw new OperationalError(`Half bought? Amounts don't match (order ${orderAmount}, fills ${amount})`);
    }
    const real = orderAmount - feeAbs;
    if (feeAbs > 0) logger.log(`[RECONCILE ${trade.pair}] Applying fee of ${feeAbs}, amount ${orderAmount} -> ${real}`);
    return real;
}
