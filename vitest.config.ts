import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['lexer/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
  },
});
