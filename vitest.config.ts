import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/dispatch/index.ts',
        'src/partition/index.ts',
        'src/reporting/index.ts',
        'src/serialization/index.ts',
      ],
    },
  },
});
