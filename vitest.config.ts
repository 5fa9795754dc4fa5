import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      CALLABLE_REGISTRY_LOG_LEVEL: 'silent',
    },
  },
});
