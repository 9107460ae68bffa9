import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      LIFECYCLE_LOG_LEVEL: 'fatal',
    },
  },
});
