import { logger } from './logger';
import { ErrorClassifier } from '../core/ErrorClassifier';

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    retryCondition?: (error: unknown) => boolean;
    /** Checked before every attempt and ends a pending backoff; the last error is rethrown. */
    signal?: AbortSignal;
}

export class ErrorHandler {
    /**
     * Executes a function with exponential backoff retries. A rate-limit
     * message naming a cooldown ("retry after 20 seconds") waits at least that long.
     */
    public static async withRetry<T>(
        fn: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxRetries = 3,
            initialDelay = 1000,
            maxDelay = 10000,
            retryCondition = () => true,
            signal
        } = options;

        let lastError: unknown = new Error('Operation aborted before the first attempt');

        for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
            if (signal?.aborted) break;
            try {
                return await fn();
            } catch (error) {
                lastError = error;

                if (attempt > maxRetries || !retryCondition(error) || signal?.aborted) {
                    break;
                }

                const backoff = ErrorClassifier.getBackoffDelay(attempt - 1, initialDelay, maxDelay);
                const delay = Math.max(backoff, ErrorClassifier.classify(error).cooldownMs ?? 0);
                logger.warn(`ErrorHandler: Attempt ${attempt} failed. Retrying in ${delay}ms... (Error: ${ErrorClassifier.messageOf(error)})`);
                await this.sleep(delay, signal);
            }
        }

        throw lastError;
    }

    private static sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise(resolve => {
            const done = () => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', done);
                resolve();
            };
            const timer = setTimeout(done, ms);
            signal?.addEventListener('abort', done, { once: true });
        });
    }
}
