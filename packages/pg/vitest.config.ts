import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'pg',
    environment: 'node',
    include: ['test/**/*.spec.ts'],
  },
});
