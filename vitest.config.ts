import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['discord-bot/tests/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
