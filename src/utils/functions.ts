import chalk from 'chalk';

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Time source for everything that schedules or timestamps trades. */
export interface Clock {
    now(): Date;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => new Date(),
    sleep,
};

function getTimestamp(): string {
    return `[${new Date().toISOString().slice(11, 23)}]`;
}

const debugEnabled = () => (process.env.LOG_LEVEL ?? 'info').toLowerCase() === 'debug';

/**
 * Console wrapper that prefixes every line with a coloured timestamp.
 */
export const logger = {
    debug: (...args: unknown[]) => {
        if (debugEnabled()) console.debug(chalk.gray(getTimestamp()), ...args);
    },
    log: (...args: unknown[]) => console.log(chalk.white(getTimestamp()), ...args),
    warn: (...args: unknown[]) => console.warn(chalk.yellow(getTimestamp()), ...args),
    error: (...args: unknown[]) => console.error(chalk.red(getTimestamp()), ...args),
};

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function withRetries<T>(
    fn: () => Promise<T>,
    context: string,
    { maxRetries = 4, delayMs = 1000, shouldRetry = () => true }: { maxRetries?: number; delayMs?: number; shouldRetry?: (error: unknown) => boolean } = {},
): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
        try {
            if (attempt > 1) logger.log(`[RETRY ${context}] Attempt ${attempt}/${maxRetries}...`);
            return await fn();
        } catch (error) {
            lastError = error;
            if (!shouldRetry(error)) throw error;
            logger.warn(`[RETRY ${context}] Attempt ${attempt}/${maxRetries} failed:`, errorMessage(error));
            if (attempt < maxRetries) {
                const backoff = delayMs * 2 ** (attempt - 1) + Math.random() * 500;
                logger.warn(`[RETRY ${context}] Retrying in ${Math.round(backoff / 1000)}s...`);
                await sleep(backoff);
            }
        }
    }
    logger.error(`[RETRY ${context}] All attempts failed.`);
    throw lastError;
}

/** Truncates (never rounds up) to `decimals` places. */
export function truncNum(value: number, decimals: number): number {
    const m = 10 ** decimals;
    return Math.floor(value * m) / m;
}

export function mean(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((a, b) => a + b, 0) / values.length;
}
