import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'leandoc',
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli-dump.ts', 'src/cli-check.ts'],
    },
  },
});
