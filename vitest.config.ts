import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        // Top-level re-exports
        'src/index.ts',
        // All barrel index files
        'src/**/index.ts',
        // Type-only files (interfaces, no executable code)
        'src/types/**',
        'src/http/transport.ts',
        'src/client/resourceContext.ts',
        // CLI command handlers (require stdin/stdout E2E testing)
        'src/cli/commands/**',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
  resolve: {
    conditions: ['node'],
  },
});
