import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['shared/test/**/*.test.ts', 'services/**/test/**/*.test.ts'],
    testTimeout: 10000
  }
});
