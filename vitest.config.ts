import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts', 'src/**/*.spec.ts', 'src/server.ts'],
            thresholds: {
                lines: 85,
                functions: 85,
                branches: 80,
                statements: 85,
            },
        },
        globals: true,
    },
    resolve: {
        // Handle .js imports in TypeScript source files
        alias: [
            // Resolve .js imports to .ts files
            { find: /^(\.{1,2}\/.+)\.js$/, replacement: '$1' },
        ],
    },
    esbuild: {
        target: 'node20',
    },
});
