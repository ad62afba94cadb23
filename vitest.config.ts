import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['image-api/src/**/*.test.ts'],
        environment: 'node',
        testTimeout: 20000,
    },
});
