import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // No TTY under the runner; force ansis to emit escapes so color output is checkable
    env: { FORCE_COLOR: '3', NO_COLOR: '' },
  },
});
