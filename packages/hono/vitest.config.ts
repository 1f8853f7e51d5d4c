import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test-setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/*.test.ts',
        '**/test-setup.ts',
        'dist/**',
        '**/index.ts',
        '**/*.d.ts',
        '**/vitest.config.ts',
        'src/services/log.ts',
        'src/static/**',
      ],
    },
  },
});
