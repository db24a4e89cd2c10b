import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      // tsc compiles test files to dist/ too; running those would duplicate
      // every test against a possibly stale build.
      '**/dist/**',
    ],
    coverage: {
      exclude: [
        // Test files themselves
        '**/*.test.ts',

        // Test infrastructure — utilities, builders, and helpers used only by tests
        'src/test-helpers/**',

        // Process entry point; wiring only
        'src/index.ts',
      ],
      // 'text' = terminal summary table (always on)
      // 'html' = interactive line-by-line report at coverage/index.html
      reporter: ['text', 'html'],
      reportsDirectory: './coverage',
    },
  },
});
