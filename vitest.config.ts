import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Everything under test is pure Node code, no DOM needed
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
});
