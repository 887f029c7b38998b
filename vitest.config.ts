import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    projects: [
      'packages/core/vitest.config.ts',
      'packages/shared/vitest.config.ts',
    ],
  },
});
