import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.spec.ts'],
        testTimeout: 30000,
        alias: {
            '@src': fileURLToPath(new URL('./src', import.meta.url)),
        },
        coverage: {
            provider: 'istanbul',
            reporter: ['text', 'html', 'lcov'],
            reportsDirectory: './coverage',
            include: ['src/**/*.ts'],
            exclude: [
                'src/cli.ts', 'src/index.ts',
                // Barrels re-export only
                'src/core/types.ts', 'src/core/utils.ts',
                '**/index.ts',
                'tests/fixtures/**'
            ],
        },
    },
});
