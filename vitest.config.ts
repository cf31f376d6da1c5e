import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      FORMWIRE_LOG_FORMAT: 'json',
      FORMWIRE_LOG_LEVEL: 'silent',
    },
  },
});
