import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['discord-bot/src/**/*.test.ts'],
  },
});
