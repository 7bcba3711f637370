import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'paragraph-layout',
        environment: 'node',
        include: ['src/**/*.test.ts'],
    },
});
