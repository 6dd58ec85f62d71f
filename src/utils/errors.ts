/**
 * Expected, recoverable condition (low balance, empty whitelist, rejected order).
 * Handled where the buy or sell attempt is made; the tick carries on.
 */
export class DependencyError extends Error {
    override name = 'DependencyError';
}

/**
 * Transient failure talking to the exchange. The whole tick pauses for the retry timeout.
 */
export class TemporaryError extends Error {
    override name = 'TemporaryError';
}

/**
 * Unexpected state that needs a human. The bot notifies and moves to `stopped`.
 */
export class OperationalError extends Error {
    override name = 'OperationalError';
}
