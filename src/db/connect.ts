import mongoose from 'mongoose';
import { logger } from '../utils/functions.js';
import { InMemoryTradeRepository, MongoTradeRepository, type TradeRepository } from './tradeRepository.js';

/**
 * Connects to MongoDB when a URI is configured. Without one, trades live in memory
 * for the lifetime of the process.
 */
export async function connectDB(mongoUri: string | null): Promise<TradeRepository> {
    if (!mongoUri) {
        logger.warn('[MongoDB] MONGO_URI is not set. Trades are kept in memory and lost on restart.');
        return new InMemoryTradeRepository();
    }

    try {
        await mongoose.connect(mongoUri);
        logger.log('[MongoDB] Connected.');
        return new MongoTradeRepository();
    } catch (error) {
        logger.error('[MongoDB] Connection failed:', error);
        throw error;
    }
}

export async function disconnectDB() {
    if (mongoose.connection.readyState !== 0) {
        await mongoose.disconnect();
        logger.log('[MongoDB] Disconnected.');
    }
}
