import { randomUUID } from 'node:crypto';
import type { Types } from 'mongoose';
import { TradeModel } from '../models/Trade.js';
import { Trade, type TradeRecord } from '../trade/trade.js';

/**
 * Trade storage, scoped by bot id. Every mutation is committed before the call resolves.
 */
export interface TradeRepository {
    findOpen(botId: string): Promise<Trade[]>;
    findWithOpenOrder(botId: string): Promise<Trade[]>;
    /** All trades of the bot, oldest first. */
    findAll(botId: string): Promise<Trade[]>;
    /** Inserts the trade and assigns its id. */
    create(trade: Trade): Promise<Trade>;
    update(trade: Trade): Promise<void>;
    delete(trade: Trade): Promise<void>;
}

type TradeDoc = TradeRecord & { _id: Types.ObjectId };

function fromDoc(doc: TradeDoc): Trade {
    const { _id, ...record } = doc;
    return new Trade({ ...record, id: String(_id) });
}

function requireId(trade: Trade): string {
    if (!trade.id) throw new Error(`Trade ${trade.pair} has not been persisted yet`);
    return trade.id;
}

export class MongoTradeRepository implements TradeRepository {
    async findOpen(botId: string): Promise<Trade[]> {
        const docs = await TradeModel.find({ botId, isOpen: true }).sort({ _id: 1 }).lean<TradeDoc[]>().exec();
        return docs.map(fromDoc);
    }

    async findWithOpenOrder(botId: string): Promise<Trade[]> {
        const docs = await TradeModel.find({ botId, openOrderId: { $ne: null } }).sort({ _id: 1 }).lean<TradeDoc[]>().exec();
        return docs.map(fromDoc);
    }

    async findAll(botId: string): Promise<Trade[]> {
        const docs = await TradeModel.find({ botId }).sort({ _id: 1 }).lean<TradeDoc[]>().exec();
        return docs.map(fromDoc);
    }

    async create(trade: Trade): Promise<Trade> {
        const doc = await TradeModel.create(trade.toRecord());
        trade.id = String(doc._id);
        return trade;
    }

    async update(trade: Trade): Promise<void> {
        await TradeModel.updateOne({ _id: requireId(trade) }, { $set: trade.toRecord() }).exec();
    }

    async delete(trade: Trade): Promise<void> {
        await TradeModel.deleteOne({ _id: requireId(trade) }).exec();
    }
}

/**
 * Process-local storage, used when no database is configured (dry runs) and in tests.
 * Returns fresh copies so callers only see what was committed.
 */
export class InMemoryTradeRepository implements TradeRepository {
    readonly #rows = new Map<string, TradeRecord>();

    #load(filter: (r: TradeRecord) => boolean): Trade[] {
        const out: Trade[] = [];
        for (const [id, record] of this.#rows) {
            if (filter(record)) out.push(new Trade({ ...record, id }));
        }
        return out;
    }

    async findOpen(botId: string): Promise<Trade[]> {
        return this.#load((r) => r.botId === botId && r.isOpen);
    }

    async findWithOpenOrder(botId: string): Promise<Trade[]> {
        return this.#load((r) => r.botId === botId && r.openOrderId !== null);
    }

    async findAll(botId: string): Promise<Trade[]> {
        return this.#load((r) => r.botId === botId);
    }

    async create(trade: Trade): Promise<Trade> {
        trade.id = randomUUID();
        this.#rows.set(trade.id, trade.toRecord());
        return trade;
    }

    async update(trade: Trade): Promise<void> {
        const id = requireId(trade);
        if (!this.#rows.has(id)) throw new Error(`Trade ${id} does not exist`);
        this.#rows.set(id, trade.toRecord());
    }

    async delete(trade: Trade): Promise<void> {
        this.#rows.delete(requireId(trade));
    }
}
