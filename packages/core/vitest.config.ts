import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    target: 'es2022',
    // Annotations are legacy decorators; keep them regardless of which tsconfig esbuild picks up
    tsconfigRaw: {
      compilerOptions: {
        experimentalDecorators: true,
      },
    },
  },
  test: {
    globals: true,

    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov', 'json'],
      exclude: ['node_modules/**', 'dist/**', 'tests/**', '**/*.test.ts', 'vitest.config.ts'],
      include: ['src/**/*.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
    // Environment-variable tests mutate process.env; keep files in one worker
    fileParallelism: false,
  },
});
