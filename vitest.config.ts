import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
    resolve: {
        alias: {
            '@src': resolve(__dirname, './src'),
            '@spec': resolve(__dirname, './spec'),
        },
    },
    test: {
        globals: false,
        environment: 'node',
        setupFiles: ['./src/test-setup.ts'],
        include: ['spec/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        // Codec specs run the real image libraries
        testTimeout: 20000,
        hookTimeout: 10000,
        reporters: ['default'],
    },
});
