import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        exclude: ['dist/**', 'node_modules/**'],
        globals: true,
        environment: 'node',
        testTimeout: 15000,
    },
});
