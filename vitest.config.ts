import { defineConfig } from 'vitest/config';
import { fileURLToPath, URL } from 'node:url';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        exclude: [
            'node_modules/**/*',
            'dist/**/*',
        ],
        testTimeout: 30000,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: [
                'dist/**/*',
                'node_modules/**/*',
                'tests/**/*',
                // Process entry point, exercised through tests/cli
                'src/main.ts',
            ],
            thresholds: {
                lines: 80,
                statements: 80,
                branches: 70,
                functions: 80,
            },
        },
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
