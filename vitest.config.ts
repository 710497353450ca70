import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment configuration
    environment: 'node',
    // Tests spawn real subprocesses for the command runner
    testTimeout: 15000,
    // Coverage configuration
    coverage: {
      reporter: ['text', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.config.*',
        'tests/**'
      ]
    },
    // Include test files
    include: [
      'tests/**/*.{test,spec}.ts'
    ]
  }
});
