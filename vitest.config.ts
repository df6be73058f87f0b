import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            'gridnav/blocks': fileURLToPath(new URL('./blocks/index.ts', import.meta.url)),
            gridnav: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['tst/**/*.test.ts'],
    },
});
