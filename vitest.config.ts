import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['vault/typescript/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
