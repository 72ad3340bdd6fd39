import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        environment: 'node',
        restoreMocks: true,
        unstubGlobals: true,
        unstubEnvs: true,
    },
});
