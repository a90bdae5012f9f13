import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10000,
        env: {
            SLEUTH_LOG_TO_FILE: 'false',
            LOG_LEVEL: 'error'
        }
    }
});
