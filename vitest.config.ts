import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['./engine/vitest.config.ts'],
  },
});
