import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Enable globals (describe, it, expect) without imports
        globals: true,

        environment: 'node',

        // Keeps the logger silent
        env: { NODE_ENV: 'test' },

        include: ['src/**/*.test.ts'],

        coverage: {
            provider: 'v8',
            reporter: ['text', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts'],
            reportsDirectory: './coverage',
        },

        // Deeper search tests walk a few thousand nodes
        testTimeout: 20000,
    },
});
