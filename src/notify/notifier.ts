import { request, type Dispatcher } from 'undici';
import { errorMessage, logger } from '../utils/functions.js';
import { getHttpAgent } from './http.js';

/** Delivery of operator messages. `send` never rejects. */
export interface Notifier {
    send(text: string): Promise<void>;
}

export class LogNotifier implements Notifier {
    async send(text: string): Promise<void> {
        logger.log(`[NOTIFY] ${text}`);
    }
}

export type TelegramOptions = {
    token: string;
    chatId: string;
    baseUrl?: string;
    dispatcher?: Dispatcher;
};

/**
 * Sends Markdown messages to one Telegram chat through the Bot API. Failures are logged and dropped.
 */
export class TelegramNotifier implements Notifier {
    readonly #url: string;
    readonly #chatId: string;
    readonly #dispatcher: Dispatcher;

    constructor(opts: TelegramOptions) {
        this.#url = `${opts.baseUrl ?? 'https://api.telegram.org'}/bot${opts.token}/sendMessage`;
        this.#chatId = opts.chatId;
        this.#dispatcher = opts.dispatcher ?? getHttpAgent();
    }

    async send(text: string): Promise<void> {
        logger.debug(`[TELEGRAM] ${text}`);
        try {
            const { statusCode, body } = await request(this.#url, {
                method: 'POST',
                headers: { 'content-type': 'application/json' },
                body: JSON.stringify({ chat_id: this.#chatId, text, parse_mode: 'Markdown', disable_web_page_preview: true }),
                dispatcher: this.#dispatcher,
            });
            const raw = await body.text();
            if (statusCode >= 400) {
                logger.warn(`[TELEGRAM] sendMessage failed with ${statusCode}: ${raw.slice(0, 200)}`);
            }
        } catch (error) {
            logger.warn('[TELEGRAM] sendMessage error:', errorMessage(error));
        }
    }
}

export function createNotifier(telegram: { token: string; chatId: string } | null): Notifier {
    if (!telegram) {
        logger.log('[NOTIFY] Telegram is not configured, messages go to the log only.');
        return new LogNotifier();
    }
    return new TelegramNotifier(telegram);
}
