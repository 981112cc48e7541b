import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    pool: 'forks',
    testTimeout: 10000,
    // tool lifecycle logs stay out of test output
    env: { PROMPT_LEDGER_LOG_LEVEL: 'warn' },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: [
        'src/server/**',
        'src/services/**',
        'src/utils/**',
        'src/models/**',
        'src/config/**'
      ],
      exclude: ['**/*.d.ts', 'src/tests/**']
    }
  }
});
