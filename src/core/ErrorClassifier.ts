export enum ErrorType {
    RATE_LIMIT = 'rate_limit',
    TIMEOUT = 'timeout',
    TARGET_CLOSED = 'target_closed',
    NETWORK_ERROR = 'network_error',
    INVALID_RESPONSE = 'invalid_response',
    UNKNOWN = 'unknown'
}

export interface ClassifiedError {
    type: ErrorType;
    message: string;
    retryable: boolean;
    cooldownMs?: number;
    originalError?: unknown;
}

/**
 * Classifies errors from oracle round-trips and browser driver calls so the
 * oracle client can decide on retries and the capability registry can report
 * a failure without leaking raw exception text.
 */
export class ErrorClassifier {
    public static classify(error: unknown): ClassifiedError {
        const errorMsg = this.messageOf(error).toLowerCase();

        // Rate limit first: provider 429 bodies often mention timeouts too
        if (this.isRateLimit(errorMsg)) {
            return {
                type: ErrorType.RATE_LIMIT,
                message: 'Rate limit exceeded',
                retryable: true,
                cooldownMs: this.extractCooldown(errorMsg),
                originalError: error
            };
        }

        if (this.isTimeout(errorMsg)) {
            return {
                type: ErrorType.TIMEOUT,
                message: 'Operation timed out',
                retryable: true,
                originalError: error
            };
        }

        if (this.isTargetClosed(errorMsg)) {
            return {
                type: ErrorType.TARGET_CLOSED,
                message: 'Browser page was closed',
                retryable: false,
                originalError: error
            };
        }

        if (this.isNetworkError(errorMsg)) {
            return {
                type: ErrorType.NETWORK_ERROR,
                message: 'Network connectivity issue',
                retryable: true,
                originalError: error
            };
        }

        if (this.isInvalidResponse(errorMsg)) {
            return {
                type: ErrorType.INVALID_RESPONSE,
                message: 'Invalid or malformed response',
                retryable: false,
                originalError: error
            };
        }

        return {
            type: ErrorType.UNKNOWN,
            message: errorMsg || 'Unknown error occurred',
            retryable: false,
            originalError: error
        };
    }

    /**
     * Message for an unexpected exception that may be shown to the oracle.
     * Only the category survives; the raw text belongs in the log.
     */
    public static sanitize(error: unknown): string {
        const classified = this.classify(error);
        const category = classified.type === ErrorType.UNKNOWN ? 'internal error' : classified.type.replace(/_/g, ' ');
        return `tool failed: ${category}`;
    }

    public static messageOf(error: unknown): string {
        if (error instanceof Error) return error.message;
        if (typeof error === 'object' && error !== null && 'message' in error) {
            return String(error.message);
        }
        return error === undefined || error === null ? '' : String(error);
    }

    private static isRateLimit(msg: string): boolean {
        const patterns = [
            'rate limit',
            'quota exceeded',
            'too many requests',
            '429',
            'throttle',
            'requests per'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isTimeout(msg: string): boolean {
        const patterns = [
            'timeout',
            'timed out',
            'deadline exceeded',
            'econnaborted',
            'etimedout',
            'aborted due to timeout'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isTargetClosed(msg: string): boolean {
        const patterns = [
            'target closed',
            'target page, context or browser has been closed',
            'browser has been closed',
            'page has been closed'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isNetworkError(msg: string): boolean {
        const patterns = [
            'econnrefused',
            'enotfound',
            'network',
            'connection refused',
            'host not found',
            'econnreset',
            'fetch failed',
            'err_name_not_resolved',
            'err_connection'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isInvalidResponse(msg: string): boolean {
        const patterns = [
            'invalid json',
            'parse error',
            'unexpected token',
            'malformed',
            'syntax error'
        ];
        return patterns.some(p => msg.includes(p));
    }

    /** Cooldown the message asks for, if it names one. */
    private static extractCooldown(msg: string): number | undefined {
        const secondsMatch = msg.match(/retry after (\d+) second/i);
        if (secondsMatch) {
            return parseInt(secondsMatch[1], 10) * 1000;
        }

        const minutesMatch = msg.match(/retry after (\d+) minute/i);
        if (minutesMatch) {
            return parseInt(minutesMatch[1], 10) * 60 * 1000;
        }

        return undefined;
    }

    /**
     * Exponential backoff with up to 30% jitter, capped at maxDelay before jitter.
     */
    public static getBackoffDelay(attemptCount: number, baseDelay: number = 1000, maxDelay: number = 30000): number {
        const exponential = Math.min(baseDelay * Math.pow(2, attemptCount), maxDelay);
        const jitter = Math.random() * 0.3 * exponential;
        return Math.floor(exponential + jitter);
    }
}
