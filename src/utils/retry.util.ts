import { logger } from '../config/logger';

/**
 * Outcome of a bounded retry: either the operation's value or the last
 * error, together with the number of attempts spent.
 */
export type AttemptResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: Error; attempts: number };

export interface AttemptOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    attempt<T>(operation: () => Promise<T>, options?: AttemptOptions): Promise<AttemptResult<T>>;
}

/**
 * Retry Utility
 *
 * Bounded retry combinator for model calls. Every failure counts as
 * transient until the attempt budget is spent; the caller decides what the
 * final error means instead of catching it out of a loop.
 */
export class RetryUtil {
    /**
     * Run `operation` up to `maxAttempts` times (default 2: one call plus one retry).
     */
    static async attempt<T>(
        operation: () => Promise<T>,
        options: AttemptOptions = {}
    ): Promise<AttemptResult<T>> {
        const {
            maxAttempts = 2,
            baseDelay = 0,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        const budget = Math.max(1, Math.floor(maxAttempts));
        let lastError: Error = new Error(`${operationName} was not attempted`);

        for (let attempt = 1; attempt <= budget; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts: budget
                }, `Executing ${operationName} (attempt ${attempt}/${budget})`);

                const value = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts: budget
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return { ok: true, value, attempts: attempt };

            } catch (error: unknown) {
                lastError = this.toError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts: budget,
                    error: lastError.message
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === budget) {
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                if (delay > 0) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        delay
                    }, `Retrying ${operationName} in ${delay}ms`);

                    await this.sleep(delay);
                }
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts: budget,
            error: lastError.message
        }, `${operationName} failed after ${budget} attempts`);

        return { ok: false, error: lastError, attempts: budget };
    }

    private static toError(error: unknown): Error {
        if (error instanceof Error) {
            return error;
        }
        return new Error(typeof error === 'string' ? error : JSON.stringify(error));
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
