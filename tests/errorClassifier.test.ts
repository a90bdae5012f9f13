import { describe, expect, it } from 'vitest';
import { ErrorClassifier, ErrorType } from '../src/core/ErrorClassifier';

describe('ErrorClassifier', () => {
    it('should classify rate limit errors', () => {
        const errors = [
            'Rate limit exceeded',
            'Too many requests',
            'Quota exceeded',
            'Error 429: rate limit'
        ];

        for (const errorMsg of errors) {
            const classified = ErrorClassifier.classify({ message: errorMsg });
            expect(classified.type).toBe(ErrorType.RATE_LIMIT);
            expect(classified.retryable).toBe(true);
            expect(classified.cooldownMs).toBeUndefined();
        }
    });

    it('should classify timeout errors', () => {
        const errors = [
            'Request timeout',
            'Connection timed out',
            'ETIMEDOUT',
            'Deadline exceeded'
        ];

        for (const errorMsg of errors) {
            const classified = ErrorClassifier.classify({ message: errorMsg });
            expect(classified.type).toBe(ErrorType.TIMEOUT);
            expect(classified.retryable).toBe(true);
        }
    });

    it('should classify network errors', () => {
        const errors = [
            'ECONNREFUSED',
            'Network error',
            'Connection refused',
            'ENOTFOUND'
        ];

        for (const errorMsg of errors) {
            const classified = ErrorClassifier.classify({ message: errorMsg });
            expect(classified.type).toBe(ErrorType.NETWORK_ERROR);
            expect(classified.retryable).toBe(true);
        }
    });

    it('should classify closed browser targets as non-retryable', () => {
        const errors = [
            'Target closed',
            'page.goto: Target page, context or browser has been closed',
            'Browser has been closed'
        ];

        for (const errorMsg of errors) {
            const classified = ErrorClassifier.classify(new Error(errorMsg));
            expect(classified.type).toBe(ErrorType.TARGET_CLOSED);
            expect(classified.retryable).toBe(false);
        }
    });

    it('should classify invalid response errors as non-retryable', () => {
        const errors = [
            'Invalid JSON',
            'Parse error in response',
            'Unexpected token',
            'Malformed response'
        ];

        for (const errorMsg of errors) {
            const classified = ErrorClassifier.classify({ message: errorMsg });
            expect(classified.type).toBe(ErrorType.INVALID_RESPONSE);
            expect(classified.retryable).toBe(false);
        }
    });

    it('should extract cooldown from rate limit messages', () => {
        const error = 'Rate limit exceeded. Retry after 30 seconds';
        const classified = ErrorClassifier.classify({ message: error });
        
        expect(classified.type).toBe(ErrorType.RATE_LIMIT);
        expect(classified.cooldownMs).toBe(30000);
    });

    it('should read a cooldown given in minutes', () => {
        const classified = ErrorClassifier.classify(new Error('429 Too Many Requests: retry after 2 minutes'));

        expect(classified.cooldownMs).toBe(120000);
    });

    it('should calculate exponential backoff correctly', () => {
        const delays: number[] = [];
        for (let i = 0; i < 5; i++) {
            delays.push(ErrorClassifier.getBackoffDelay(i, 1000, 30000));
        }

        // Each delay should be roughly double the previous (with jitter)
        for (let i = 1; i < delays.length; i++) {
            expect(delays[i]).toBeGreaterThan(delays[i - 1]);
        }

        // Should cap at max delay
        const maxedDelay = ErrorClassifier.getBackoffDelay(10, 1000, 5000);
        expect(maxedDelay).toBeLessThanOrEqual(5000 * 1.3); // Allow for jitter
    });

    it('should handle unknown errors', () => {
        const classified = ErrorClassifier.classify({ message: 'Something weird happened' });
        
        expect(classified.type).toBe(ErrorType.UNKNOWN);
        expect(classified.retryable).toBe(false);
    });

    it('should preserve original error in classification', () => {
        const originalError = new Error('Test error');
        const classified = ErrorClassifier.classify(originalError);
        
        expect(classified.originalError).toBe(originalError);
    });

    it('should sanitize exceptions down to their category', () => {
        expect(ErrorClassifier.sanitize(new Error('connect ECONNREFUSED 127.0.0.1:9222'))).toBe('tool failed: network error');
        expect(ErrorClassifier.sanitize(new Error('Timeout 5000ms exceeded.'))).toBe('tool failed: timeout');
        expect(ErrorClassifier.sanitize(new Error('Target closed'))).toBe('tool failed: target closed');
        expect(ErrorClassifier.sanitize(new Error('cannot read /home/user/.cache/state'))).toBe('tool failed: internal error');
    });

    it('should read a message from anything thrown', () => {
        expect(ErrorClassifier.messageOf(new Error('plain'))).toBe('plain');
        expect(ErrorClassifier.messageOf({ message: 42 })).toBe('42');
        expect(ErrorClassifier.messageOf('bare string')).toBe('bare string');
        expect(ErrorClassifier.messageOf(undefined)).toBe('');
    });
});
